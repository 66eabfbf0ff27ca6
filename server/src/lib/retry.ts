import { withTimeout } from './concurrency.js';
import { AttemptTimeoutError, InvalidOutputError } from './errors.js';
import { classifyFailure } from './failure-classifier.js';
import type { FailureCategory, RetryDecision } from './failure-classifier.js';
import type { RetryPolicy } from './config.js';
import type { ServiceRateLimiter } from './rate-limiter.js';
import { sleep as defaultSleep } from './sleep.js';
import type { SleepFn } from './sleep.js';
import logger from './logger.js';
import type { Logger } from './logger.js';

export type ExecutionResult<T> =
  | { ok: true; value: T; attempts: number }
  | {
      ok: false;
      error: Error;
      classification: RetryDecision;
      category: FailureCategory;
      attempts: number;
    };

export interface ExecuteOptions<T> extends Partial<RetryPolicy> {
  /** Shows up in logs and timeout messages. */
  label?: string;
  /** Rejects a resolved value as empty/invalid output, which is retried. */
  validate?: (value: T) => boolean;
  log?: Logger;
}

export interface RetryExecutorOptions {
  sleep?: SleepFn;
  now?: () => number;
  log?: Logger;
}

/** Exponential backoff for retry number `retry` (0-based), capped. */
export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Runs one external call with rate-limit admission, a per-attempt timeout,
 * failure classification and capped exponential backoff. A rate-limited
 * service is locked in the shared limiter for the Retry-After, or for
 * `minLockMs` when the provider sends none. Never throws.
 */
export class RetryExecutor {
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly limiter: ServiceRateLimiter,
    private readonly policy: RetryPolicy,
    options: RetryExecutorOptions = {},
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? logger;
  }

  async execute<T>(
    call: (signal: AbortSignal) => Promise<T>,
    service: string,
    options: ExecuteOptions<T> = {},
  ): Promise<ExecutionResult<T>> {
    const maxRetries = options.maxRetries ?? this.policy.maxRetries;
    const baseDelayMs = options.baseDelayMs ?? this.policy.baseDelayMs;
    const maxDelayMs = options.maxDelayMs ?? this.policy.maxDelayMs;
    const timeoutMs = options.timeoutMs ?? this.policy.timeoutMs;
    const minLockMs = options.minLockMs ?? this.policy.minLockMs;
    const label = options.label ?? service;
    const log = options.log ?? this.log;

    for (let attempt = 0; ; attempt++) {
      try {
        await this.limiter.acquire(service);
        const value = await this.attempt(call, label, timeoutMs);
        if (options.validate && !options.validate(value)) {
          throw new InvalidOutputError(`${label} returned empty or invalid output`);
        }
        return { ok: true, value, attempts: attempt + 1 };
      } catch (err) {
        const error = toError(err);
        const failure = classifyFailure(err);
        const attempts = attempt + 1;

        if (failure.decision === 'fatal') {
          log.error({ service, label, category: failure.category, error: error.message }, 'Fatal failure, not retrying');
          return { ok: false, error, classification: 'fatal', category: failure.category, attempts };
        }
        if (attempt >= maxRetries) {
          log.error({ service, label, attempts, category: failure.category, error: error.message }, 'Retries exhausted');
          return { ok: false, error, classification: failure.decision, category: failure.category, attempts };
        }

        // Prefer the server's Retry-After; fall back to exponential backoff.
        const delay = failure.retryAfterMs !== null
          ? Math.min(failure.retryAfterMs, maxDelayMs)
          : backoffDelay(attempt, baseDelayMs, maxDelayMs);
        if (failure.category === 'service_overload' && (failure.retryAfterMs !== null || failure.status === 429)) {
          // Sibling calls to the same service back off too, hinted or not.
          const lockMs = failure.retryAfterMs !== null ? delay : minLockMs;
          await this.limiter.lock(service, this.now() + lockMs);
        }

        log.warn(
          { service, label, attempt: attempts, delay_ms: delay, category: failure.category, error: error.message },
          'Retryable failure, backing off',
        );
        await this.sleep(delay);
      }
    }
  }

  private async attempt<T>(
    call: (signal: AbortSignal) => Promise<T>,
    label: string,
    timeoutMs: number,
  ): Promise<T> {
    const controller = new AbortController();
    return withTimeout(
      call(controller.signal),
      timeoutMs,
      () => new AttemptTimeoutError(label, timeoutMs),
      () => controller.abort(new AttemptTimeoutError(label, timeoutMs)),
    );
  }
}
