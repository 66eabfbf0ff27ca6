import { describe, it, expect } from 'vitest';
import { NO_CONTEXT_TEXT, estimateTokens, mergeContext, normalizeTopicKey, splitByContext } from '../pipeline/context.js';

describe('estimateTokens', () => {
  it('counts four characters per token, rounding down', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcdefghi')).toBe(2);
    expect(estimateTokens('x'.repeat(4_000))).toBe(1_000);
  });
});

describe('normalizeTopicKey', () => {
  it('ignores case and surrounding or repeated whitespace', () => {
    expect(normalizeTopicKey('  Machine   Learning ')).toBe('machine learning');
  });
});

describe('splitByContext', () => {
  it('marks topics without usable content as context-free', () => {
    const { contextual, contextFree } = splitByContext(
      ['Python', 'Docker', 'Rust'],
      [
        { topic: 'python', content: '  Python internals  ' },
        { topic: 'Docker', content: '   ' },
        { topic: 'Rust', content: null },
      ],
    );

    expect([...contextual]).toEqual([['Python', 'Python internals']]);
    expect(contextFree).toEqual(['Docker', 'Rust']);
  });

  it('joins repeated entries for the same topic', () => {
    const { contextual } = splitByContext(['Go'], [
      { topic: 'Go', content: 'Goroutines' },
      { topic: 'go', content: 'Channels' },
    ]);
    expect(contextual.get('Go')).toBe('Goroutines\n\nChannels');
  });

  it('treats topics missing from discovery as context-free', () => {
    expect(splitByContext(['Kafka'], []).contextFree).toEqual(['Kafka']);
  });
});

describe('mergeContext', () => {
  it('labels each section with its topic', () => {
    const contextual = new Map([
      ['SQL', 'Joins and indexes'],
      ['Redis', 'Eviction policies'],
    ]);
    expect(mergeContext(['SQL', 'Redis'], contextual)).toBe(
      'Skill: SQL\nJoins and indexes\n\n---\n\nSkill: Redis\nEviction policies',
    );
  });

  it('uses the placeholder when nothing was discovered', () => {
    expect(mergeContext(['SQL'], new Map())).toBe(NO_CONTEXT_TEXT);
  });
});
