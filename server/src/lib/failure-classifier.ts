import { AttemptTimeoutError, DailyQuotaExhaustedError, InvalidOutputError } from './errors.js';

export type RetryDecision = 'fatal' | 'retryable' | 'unknown';

export type FailureCategory =
  | 'service_overload'
  | 'quota_error'
  | 'timeout'
  | 'invalid_output'
  | 'rejected'
  | 'aborted'
  | 'unknown';

export interface FailureClassification {
  decision: RetryDecision;
  category: FailureCategory;
  /** Provider-supplied Retry-After, when present. */
  retryAfterMs: number | null;
  status: number | null;
}

// ─── Tables ──────────────────────────────────────────────────────────

const OVERLOAD_STATUSES = new Set([425, 429, 500, 502, 503, 504, 529]);
const REJECTED_STATUSES = new Set([400, 401, 403, 404, 422]);

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ECONNABORTED',
  'EAI_AGAIN',
  'EPIPE',
]);
const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const QUOTA_PATTERNS = [
  'quota exhausted',
  'quota exceeded',
  'exceeded your current quota',
  'insufficient_quota',
  'insufficient credits',
  'daily limit',
  'resource_exhausted',
  'billing',
  'payment required',
];
const TIMEOUT_PATTERNS = ['timed out', 'timeout', 'deadline exceeded'];
const OVERLOAD_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'service unavailable',
  'bad gateway',
  'gateway timeout',
  'internal server error',
  'connection reset',
  'socket hang up',
  'fetch failed',
  'network error',
];

const MAX_CAUSE_DEPTH = 5;

// ─── Structured readers ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) return headers.get(name);
  if (!isRecord(headers)) return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
  const value = key ? headers[key] : undefined;
  return typeof value === 'string' ? value : null;
}

export function getStatusCode(error: unknown): number | null {
  if (!isRecord(error)) return null;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.statusCode === 'number') return error.statusCode;
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') return response.status;
  return null;
}

function getErrorCode(error: unknown): string | null {
  if (!isRecord(error)) return null;
  return typeof error.code === 'string' ? error.code.toUpperCase() : null;
}

/** Retry-After in seconds or as an HTTP date; 0 when absent or unparseable. */
export function getRetryAfterMs(error: unknown, now = Date.now()): number {
  if (!isRecord(error)) return 0;
  const response = error.response;
  const raw = readHeader(error.headers, 'retry-after')
    ?? (isRecord(response) ? readHeader(response.headers, 'retry-after') : null);
  if (!raw) return 0;

  const seconds = Number.parseFloat(raw);
  if (Number.isFinite(seconds) && seconds > 0) return Math.round(seconds * 1000);

  const date = Date.parse(raw);
  if (Number.isFinite(date) && date > now) return date - now;
  return 0;
}

function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = isRecord(current) ? current.cause : undefined;
  }
  return chain;
}

function chainText(chain: unknown[]): string {
  return chain
    .map((entry) => (entry instanceof Error ? `${entry.name}: ${entry.message}` : String(entry)))
    .join(' | ')
    .toLowerCase();
}

function matches(text: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => text.includes(pattern));
}

// ─── Classification ──────────────────────────────────────────────────

/**
 * Map any thrown value to a retry decision. Structured signals (error type,
 * HTTP status, socket code) win; message patterns across the cause chain are
 * the fallback.
 */
export function classifyFailure(error: unknown): FailureClassification {
  const chain = causeChain(error);
  const text = chainText(chain);
  const status = chain.map(getStatusCode).find((s): s is number => s !== null) ?? null;
  const retryAfterMs = chain.map((entry) => getRetryAfterMs(entry)).find((ms) => ms > 0) ?? null;
  const result = (decision: RetryDecision, category: FailureCategory): FailureClassification => ({
    decision,
    category,
    retryAfterMs,
    status,
  });

  if (chain.some((entry) => entry instanceof Error && entry.name === 'AbortError')) {
    return result('fatal', 'aborted');
  }
  if (chain.some((entry) => entry instanceof DailyQuotaExhaustedError)) {
    return result('fatal', 'quota_error');
  }
  if (chain.some((entry) => entry instanceof AttemptTimeoutError)) {
    return result('retryable', 'timeout');
  }
  if (chain.some((entry) => entry instanceof InvalidOutputError)) {
    return result('retryable', 'invalid_output');
  }

  if (status !== null) {
    if (status === 402) return result('fatal', 'quota_error');
    // Quota text outranks the status: providers report exhausted quotas as 429, 400 or 403.
    if ((status === 429 || REJECTED_STATUSES.has(status)) && matches(text, QUOTA_PATTERNS)) {
      return result('fatal', 'quota_error');
    }
    if (status === 408) return result('retryable', 'timeout');
    if (OVERLOAD_STATUSES.has(status)) return result('retryable', 'service_overload');
    if (REJECTED_STATUSES.has(status)) return result('fatal', 'rejected');
  }

  for (const entry of chain) {
    const code = getErrorCode(entry);
    if (!code) continue;
    if (TIMEOUT_ERROR_CODES.has(code)) return result('retryable', 'timeout');
    if (TRANSIENT_ERROR_CODES.has(code)) return result('retryable', 'service_overload');
  }

  if (matches(text, QUOTA_PATTERNS)) return result('fatal', 'quota_error');
  if (matches(text, TIMEOUT_PATTERNS)) return result('retryable', 'timeout');
  if (matches(text, OVERLOAD_PATTERNS)) return result('retryable', 'service_overload');
  // Status text embedded in message ("Request failed with status 503")
  if (/\b(429|500|502|503|504|529)\b/.test(text)) return result('retryable', 'service_overload');

  return result('unknown', 'unknown');
}
