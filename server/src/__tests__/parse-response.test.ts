import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseResponse } from '../lib/parse-response.js';
import { silentLog } from './fixtures.js';

const SkillsSchema = z.object({ skills: z.array(z.string()) });
const fallback = { skills: ['fallback'] };

describe('parseResponse', () => {
  it('returns data matching the schema', () => {
    expect(parseResponse('{"skills": ["Go"]}', SkillsSchema, fallback, silentLog)).toEqual({ skills: ['Go'] });
  });

  it('falls back on a schema mismatch', () => {
    expect(parseResponse('{"skills": "Go"}', SkillsSchema, fallback, silentLog)).toBe(fallback);
  });

  it('falls back on text that is not JSON', () => {
    expect(parseResponse('Sorry, no skills today.', SkillsSchema, fallback, silentLog)).toBe(fallback);
  });
});
