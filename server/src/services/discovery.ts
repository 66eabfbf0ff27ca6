import { InvalidOutputError } from '../lib/errors.js';
import type { ServiceClients } from '../lib/llm.js';
import { normalizeTopicKey } from '../pipeline/context.js';
import { buildDiscoveryPrompt, DISCOVERY_SYSTEM_PROMPT } from '../pipeline/prompts.js';
import type { Topic, TopicContext } from '../pipeline/types.js';
import type { DiscoveryService } from './types.js';

const HEADER_PATTERN = /^#{2,3}\s+(.+?)\s*$/;

function cleanHeader(raw: string): string {
  return raw
    .replace(/\*\*/g, '')
    .replace(/^skill\s*:\s*/i, '')
    .replace(/[:\s]+$/, '')
    .trim();
}

/**
 * Split a research answer on `## Topic` headers and pair sections with the
 * requested topics. Exact (normalised) header matches win; a header that
 * contains the topic name, or the reverse, is accepted next. Topics without a
 * section get `content: null`.
 */
export function parseDiscoverySections(text: string, topics: readonly Topic[]): TopicContext[] {
  const sections: Array<{ key: string; lines: string[] }> = [];
  for (const line of text.split(/\r?\n/)) {
    const header = HEADER_PATTERN.exec(line.trim());
    if (header) {
      sections.push({ key: normalizeTopicKey(cleanHeader(header[1])), lines: [] });
    } else if (sections.length > 0) {
      sections[sections.length - 1].lines.push(line);
    }
  }

  const bodies = sections.map((section) => ({ key: section.key, body: section.lines.join('\n').trim() }));
  const used = new Set<number>();
  const pick = (predicate: (key: string) => boolean): string | null => {
    const index = bodies.findIndex((entry, i) => !used.has(i) && entry.body.length > 0 && predicate(entry.key));
    if (index < 0) return null;
    used.add(index);
    return bodies[index].body;
  };

  const exact = topics.map((topic) => pick((key) => key === normalizeTopicKey(topic)));
  return topics.map((topic, i) => {
    const target = normalizeTopicKey(topic);
    const content = exact[i] ?? pick((key) => key.length > 0 && (key.includes(target) || target.includes(key)));
    return { topic, content };
  });
}

/**
 * Web-grounded research through Perplexity, or the configured LLM when no
 * Perplexity key is set.
 */
export class ResearchDiscoveryService implements DiscoveryService {
  constructor(private readonly clients: ServiceClients) {}

  async discover(topics: readonly Topic[], signal: AbortSignal): Promise<TopicContext[]> {
    const prompt = buildDiscoveryPrompt(topics);
    const text = this.clients.perplexity
      ? (await this.clients.perplexity.query(
          [
            { role: 'system', content: DISCOVERY_SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          { signal },
        )).text
      : (await this.clients.llm.chat({
          model: this.clients.models.generation,
          system: DISCOVERY_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: this.clients.maxTokens,
          signal,
        })).text;

    if (!text.trim()) {
      throw new InvalidOutputError('Discovery returned no content');
    }
    return parseDiscoverySections(text, topics);
  }
}
