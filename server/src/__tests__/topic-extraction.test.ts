import { describe, it, expect } from 'vitest';
import { EXTRACTION_SYSTEM_PROMPT } from '../pipeline/prompts.js';
import { LLMTopicExtractor } from '../services/topic-extraction.js';
import { ScriptedLLM, scriptedClients } from './llm-fakes.js';
import { silentLog } from './fixtures.js';

const signal = () => new AbortController().signal;

describe('LLMTopicExtractor', () => {
  it('returns the trimmed, non-blank skills', async () => {
    const llm = new ScriptedLLM(['{"skills": [" Python ", "", "SQL"]}']);
    const extractor = new LLMTopicExtractor(scriptedClients(llm), silentLog);

    expect(await extractor.extract('Resume body', 10, signal())).toEqual(['Python', 'SQL']);
    expect(llm.requests[0]).toMatchObject({ model: 'ext-model', system: EXTRACTION_SYSTEM_PROMPT, max_tokens: 1_024 });
    expect(llm.requests[0].messages[0].content).toContain('extract exactly 10 technical skills');
  });

  it('sends at most 30,000 characters of the document', async () => {
    const llm = new ScriptedLLM(['{"skills": ["Go"]}']);
    const extractor = new LLMTopicExtractor(scriptedClients(llm), silentLog);

    await extractor.extract('x'.repeat(40_000), 5, signal());

    const content = llm.requests[0].messages[0].content;
    expect(content).toContain('x'.repeat(30_000));
    expect(content).not.toContain('x'.repeat(30_001));
  });

  it('rejects an answer without skills', async () => {
    const extractor = new LLMTopicExtractor(scriptedClients(new ScriptedLLM(['{"skills": []}'])), silentLog);
    await expect(extractor.extract('Resume', 10, signal())).rejects.toThrow('Skill extraction returned no skills');
  });
});
