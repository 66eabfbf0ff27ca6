import { describe, it, expect, vi } from 'vitest';
import { InvalidOutputError } from '../lib/errors.js';
import { PerplexityClient } from '../lib/perplexity.js';
import { DISCOVERY_SYSTEM_PROMPT } from '../pipeline/prompts.js';
import { ResearchDiscoveryService, parseDiscoverySections } from '../services/discovery.js';
import { ScriptedLLM, jsonResponse, scriptedClients } from './llm-fakes.js';

describe('parseDiscoverySections', () => {
  it('pairs sections with topics by exact then partial header match', () => {
    const text = [
      'Here is the research you asked for.',
      '## Python',
      'Python content line',
      '',
      '### **Skill: Docker:**',
      'Docker stuff',
      '## Kubernetes (K8s)',
      'K8s details',
      '## Unrelated',
    ].join('\n');

    expect(parseDiscoverySections(text, ['Python', 'Docker', 'Kubernetes', 'Rust'])).toEqual([
      { topic: 'Python', content: 'Python content line' },
      { topic: 'Docker', content: 'Docker stuff' },
      { topic: 'Kubernetes', content: 'K8s details' },
      { topic: 'Rust', content: null },
    ]);
  });

  it('uses each section once', () => {
    const text = '## Go\nGo notes';
    expect(parseDiscoverySections(text, ['Go', 'go'])).toEqual([
      { topic: 'Go', content: 'Go notes' },
      { topic: 'go', content: null },
    ]);
  });

  it('returns null content for every topic when there are no headers', () => {
    expect(parseDiscoverySections('Just prose.', ['SQL'])).toEqual([{ topic: 'SQL', content: null }]);
  });
});

describe('ResearchDiscoveryService', () => {
  it('falls back to the LLM when no research client is configured', async () => {
    const llm = new ScriptedLLM(['## Go\nGo notes']);
    const service = new ResearchDiscoveryService(scriptedClients(llm));

    const result = await service.discover(['Go'], new AbortController().signal);

    expect(result).toEqual([{ topic: 'Go', content: 'Go notes' }]);
    expect(llm.requests[0].model).toBe('gen-model');
    expect(llm.requests[0].system).toBe(DISCOVERY_SYSTEM_PROMPT);
    expect(llm.requests[0].messages[0].content).toContain('- Skill: Go -> Query: "Go" interview questions');
  });

  it('queries Perplexity when a client is available', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ choices: [{ message: { content: '## Go\nFrom search' } }], citations: ['https://example.com'] }),
    );
    const llm = new ScriptedLLM([]);
    const perplexity = new PerplexityClient('test-key', 'sonar-pro', fetchImpl);
    const service = new ResearchDiscoveryService(scriptedClients(llm, perplexity));

    const result = await service.discover(['Go'], new AbortController().signal);

    expect(result).toEqual([{ topic: 'Go', content: 'From search' }]);
    expect(llm.requests).toEqual([]);
    const body: unknown = JSON.parse(String(fetchImpl.mock.calls[0][1]?.body));
    expect(body).toMatchObject({ model: 'sonar-pro', messages: [{ role: 'system', content: DISCOVERY_SYSTEM_PROMPT }] });
  });

  it('rejects a blank answer as invalid output', async () => {
    const service = new ResearchDiscoveryService(scriptedClients(new ScriptedLLM(['   '])));

    await expect(service.discover(['Go'], new AbortController().signal)).rejects.toBeInstanceOf(InvalidOutputError);
  });
});
