import type { z } from 'zod';
import { repairJSON } from './json-repair.js';
import { ParseFailure } from './errors.js';
import logger from './logger.js';
import type { Logger } from './logger.js';

/**
 * Parse model output against a schema. Malformed or mismatched payloads log a
 * ParseFailure and yield `fallback`; this never throws.
 */
export function parseResponse<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
  fallback: z.output<S>,
  log: Logger = logger,
): z.output<S> {
  const candidate = repairJSON(raw);
  if (candidate === null) {
    const failure = new ParseFailure('Response is not JSON', { snippet: raw.slice(0, 200) });
    log.warn({ code: failure.code, details: failure.details }, failure.message);
    return fallback;
  }

  const result = schema.safeParse(candidate);
  if (!result.success) {
    const failure = new ParseFailure('Response does not match schema', {
      issues: result.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    log.warn({ code: failure.code, details: failure.details }, failure.message);
    return fallback;
  }
  return result.data;
}
