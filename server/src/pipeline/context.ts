import type { Topic, TopicContext } from './types.js';

/** Characters per token for the size heuristic. Provider-specific; tune per model. */
export const CHARS_PER_TOKEN = 4;

export const NO_CONTEXT_TEXT = 'No technical context available.';

const CONTEXT_SEPARATOR = '\n\n---\n\n';

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

export function normalizeTopicKey(topic: string): string {
  return topic.trim().toLowerCase().replace(/\s+/g, ' ');
}

export interface ContextSplit {
  /** Topic → discovered text, in batch order. */
  contextual: Map<Topic, string>;
  contextFree: Topic[];
}

/**
 * Match discovered material back to the batch's topics. A topic without a
 * non-blank entry is context-free.
 */
export function splitByContext(topics: readonly Topic[], discovered: readonly TopicContext[]): ContextSplit {
  const byKey = new Map<string, string>();
  for (const entry of discovered) {
    const content = entry.content?.trim();
    if (!content) continue;
    const key = normalizeTopicKey(entry.topic);
    const existing = byKey.get(key);
    byKey.set(key, existing ? `${existing}\n\n${content}` : content);
  }

  const contextual = new Map<Topic, string>();
  const contextFree: Topic[] = [];
  for (const topic of topics) {
    const content = byKey.get(normalizeTopicKey(topic));
    if (content) {
      contextual.set(topic, content);
    } else {
      contextFree.push(topic);
    }
  }
  return { contextual, contextFree };
}

export function mergeContext(topics: readonly Topic[], contextual: ReadonlyMap<Topic, string>): string {
  const sections = topics
    .map((topic) => {
      const content = contextual.get(topic);
      return content ? `Skill: ${topic}\n${content}` : null;
    })
    .filter((section): section is string => section !== null);
  return sections.length > 0 ? sections.join(CONTEXT_SEPARATOR) : NO_CONTEXT_TEXT;
}
