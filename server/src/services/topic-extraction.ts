import { z } from 'zod';
import { InvalidOutputError } from '../lib/errors.js';
import type { ServiceClients } from '../lib/llm.js';
import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { parseResponse } from '../lib/parse-response.js';
import { buildTopicExtractionPrompt, EXTRACTION_SYSTEM_PROMPT } from '../pipeline/prompts.js';
import type { Topic } from '../pipeline/types.js';
import type { TopicExtractor } from './types.js';

const MAX_DOCUMENT_CHARS = 30_000;

export const ExtractedSkillsSchema = z.object({
  skills: z.array(z.string()),
});

export class LLMTopicExtractor implements TopicExtractor {
  private readonly log: Logger;

  constructor(
    private readonly clients: ServiceClients,
    log?: Logger,
  ) {
    this.log = log ?? logger.child({ service: 'topic-extraction' });
  }

  async extract(documentText: string, count: number, signal: AbortSignal): Promise<Topic[]> {
    const response = await this.clients.llm.chat({
      model: this.clients.models.extraction,
      system: EXTRACTION_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildTopicExtractionPrompt(documentText.slice(0, MAX_DOCUMENT_CHARS), count) }],
      max_tokens: 1_024,
      temperature: 0.2,
      signal,
    });

    const parsed = parseResponse(response.text, ExtractedSkillsSchema, { skills: [] }, this.log);
    const skills = parsed.skills.map((skill) => skill.trim()).filter((skill) => skill.length > 0);
    if (skills.length === 0) {
      throw new InvalidOutputError('Skill extraction returned no skills');
    }
    return skills;
  }
}
