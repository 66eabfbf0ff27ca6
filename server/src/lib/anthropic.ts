import Anthropic from '@anthropic-ai/sdk';

export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey, maxRetries: 0 });
}

/**
 * Concatenate the text blocks of an Anthropic response. Returns an empty
 * string when the response carries no text.
 */
export function extractResponseText(response: Anthropic.Message): string {
  let text = '';
  for (const block of response.content) {
    if (block.type === 'text') text += block.text;
  }
  return text;
}
