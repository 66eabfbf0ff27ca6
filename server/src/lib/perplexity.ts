import { ProviderHttpError } from './errors.js';
import { createCombinedAbortSignal } from './llm-provider.js';

const PERPLEXITY_URL = 'https://api.perplexity.ai/chat/completions';
const REQUEST_TIMEOUT_MS = 120_000;

export interface PerplexityMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

interface PerplexityResponse {
  choices?: Array<{
    message?: { content?: string; role?: string };
  }>;
  citations?: string[];
}

export interface PerplexityResult {
  text: string;
  citations: string[];
}

export class PerplexityClient {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly apiKey: string,
    private readonly model = 'sonar-pro',
    fetchImpl?: typeof fetch,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async query(
    messages: PerplexityMessage[],
    options?: { temperature?: number; max_tokens?: number; signal?: AbortSignal },
  ): Promise<PerplexityResult> {
    const { signal, cleanup } = createCombinedAbortSignal(options?.signal, REQUEST_TIMEOUT_MS);
    try {
      const response = await this.fetchImpl(PERPLEXITY_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: options?.temperature ?? 0.2,
          max_tokens: options?.max_tokens ?? 4096,
        }),
        signal,
      });

      if (!response.ok) {
        const error = await response.text().catch(() => '');
        throw new ProviderHttpError('Perplexity', response.status, response.headers, error);
      }

      const data = (await response.json()) as PerplexityResponse;
      return {
        text: data.choices?.[0]?.message?.content ?? '',
        citations: data.citations ?? [],
      };
    } finally {
      cleanup();
    }
  }
}
