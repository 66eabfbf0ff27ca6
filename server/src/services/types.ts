import type { Topic, TopicContext, TopicResult } from '../pipeline/types.js';

/**
 * Finds background material per topic. May return `content: null` for topics
 * it found nothing for; throws only when the whole call fails.
 */
export interface DiscoveryService {
  discover(topics: readonly Topic[], signal: AbortSignal): Promise<TopicContext[]>;
}

/** Turns a prompt into per-topic items. Throws InvalidOutputError on empty output. */
export interface GenerationService {
  generate(prompt: string, signal: AbortSignal): Promise<TopicResult[]>;
}

export interface TopicExtractor {
  extract(documentText: string, count: number, signal: AbortSignal): Promise<Topic[]>;
}
