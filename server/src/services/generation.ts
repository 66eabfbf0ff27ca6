import { z } from 'zod';
import { InvalidOutputError } from '../lib/errors.js';
import type { ServiceClients } from '../lib/llm.js';
import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { parseResponse } from '../lib/parse-response.js';
import { GENERATION_SYSTEM_PROMPT } from '../pipeline/prompts.js';
import type { TopicResult } from '../pipeline/types.js';
import type { GenerationService } from './types.js';

/** Shorter responses are treated as empty. */
const MIN_RESPONSE_CHARS = 10;

export const QuestionSetSchema = z.object({
  all_questions: z.array(
    z.object({
      skill: z.string(),
      questions: z.array(z.string()),
    }),
  ),
});

export type QuestionSet = z.infer<typeof QuestionSetSchema>;

export function toTopicResults(set: QuestionSet): TopicResult[] {
  return set.all_questions
    .map((entry) => ({
      topic: entry.skill.trim(),
      items: entry.questions.map((question) => question.trim()).filter((question) => question.length > 0),
    }))
    .filter((result) => result.topic.length > 0 && result.items.length > 0);
}

export class LLMGenerationService implements GenerationService {
  private readonly log: Logger;

  constructor(
    private readonly clients: ServiceClients,
    log?: Logger,
  ) {
    this.log = log ?? logger.child({ service: 'generation' });
  }

  async generate(prompt: string, signal: AbortSignal): Promise<TopicResult[]> {
    const response = await this.clients.llm.chat({
      model: this.clients.models.generation,
      system: GENERATION_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: this.clients.maxTokens,
      temperature: 0.2,
      signal,
    });

    if (response.text.trim().length < MIN_RESPONSE_CHARS) {
      throw new InvalidOutputError('Generation returned an empty response');
    }

    const results = toTopicResults(parseResponse(response.text, QuestionSetSchema, { all_questions: [] }, this.log));
    if (results.length === 0) {
      throw new InvalidOutputError('Generation returned no usable questions');
    }
    return results;
  }
}
