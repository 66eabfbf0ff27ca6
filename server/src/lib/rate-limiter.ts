import { createConcurrencyLimiter } from './concurrency.js';
import { DailyQuotaExhaustedError } from './errors.js';
import type { ConcurrencyLimiter } from './concurrency.js';
import { sleep as defaultSleep } from './sleep.js';
import type { SleepFn } from './sleep.js';
import logger from './logger.js';
import type { Logger } from './logger.js';

export const RATE_WINDOW_MS = 60_000;
export const DAILY_WINDOW_MS = 24 * 60 * 60_000;

export interface RateLimiterOptions {
  /** Requests per minute for services missing from the limits table. */
  defaultRpm?: number;
  /** Requests per 24h. Services missing here have no daily cap. */
  dailyLimits?: Readonly<Record<string, number>>;
  windowMs?: number;
  now?: () => number;
  sleep?: SleepFn;
  log?: Logger;
}

export interface ServiceUsage {
  used: number;
  limit: number;
  locked_until: number | null;
  daily_used: number;
  daily_limit: number | null;
}

/**
 * Sliding-window admission gate keyed by service name. All bookkeeping runs
 * under one mutex; waits happen outside it and are followed by a fresh check.
 */
export class ServiceRateLimiter {
  private readonly limits: Readonly<Record<string, number>>;
  private readonly dailyLimits: Readonly<Record<string, number>>;
  private readonly defaultRpm: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly log: Logger;
  private readonly mutex: ConcurrencyLimiter = createConcurrencyLimiter(1);
  private readonly grants = new Map<string, number[]>();
  private readonly daily = new Map<string, number[]>();
  private readonly lockouts = new Map<string, number>();

  constructor(limits: Readonly<Record<string, number>>, options: RateLimiterOptions = {}) {
    for (const [service, rpm] of Object.entries(limits)) {
      if (!Number.isInteger(rpm) || rpm <= 0) {
        throw new RangeError(`RPM for ${service} must be a positive integer, got ${rpm}`);
      }
    }
    const dailyLimits = options.dailyLimits ?? {};
    for (const [service, limit] of Object.entries(dailyLimits)) {
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new RangeError(`Daily limit for ${service} must be a positive integer, got ${limit}`);
      }
    }
    this.limits = limits;
    this.dailyLimits = dailyLimits;
    this.defaultRpm = options.defaultRpm ?? 60;
    this.windowMs = options.windowMs ?? RATE_WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log ?? logger.child({ component: 'rate-limiter' });
  }

  limitFor(service: string): number {
    return this.limits[service] ?? this.defaultRpm;
  }

  /** Rejects with `DailyQuotaExhaustedError` instead of waiting once the daily cap is used up. */
  async acquire(service: string): Promise<void> {
    for (;;) {
      const waitMs = await this.mutex.run(async () => this.tryAdmit(service));
      if (waitMs <= 0) return;
      this.log.debug({ service, wait_ms: waitMs }, 'Rate limit reached, waiting');
      await this.sleep(waitMs);
    }
  }

  /** Refuse admission to `service` until `untilMs`. A later deadline wins. */
  async lock(service: string, untilMs: number): Promise<void> {
    await this.mutex.run(async () => {
      const current = this.lockouts.get(service) ?? 0;
      if (untilMs > current) {
        this.lockouts.set(service, untilMs);
        this.log.warn({ service, locked_for_ms: untilMs - this.now() }, 'Service locked');
      }
    });
  }

  usage(service: string): ServiceUsage {
    const now = this.now();
    const history = this.grants.get(service) ?? [];
    const lockedUntil = this.lockouts.get(service);
    const daily = this.daily.get(service) ?? [];
    return {
      used: history.filter((t) => t > now - this.windowMs).length,
      limit: this.limitFor(service),
      locked_until: lockedUntil !== undefined && lockedUntil > now ? lockedUntil : null,
      daily_used: daily.filter((t) => t > now - DAILY_WINDOW_MS).length,
      daily_limit: this.dailyLimits[service] ?? null,
    };
  }

  services(): string[] {
    return [...new Set([...Object.keys(this.limits), ...Object.keys(this.dailyLimits), ...this.grants.keys()])];
  }

  /** Returns 0 when a slot was granted, else how long to wait before asking again. */
  private tryAdmit(service: string): number {
    const now = this.now();
    const daily = this.checkDailyQuota(service, now);

    const lockedUntil = this.lockouts.get(service);
    if (lockedUntil !== undefined) {
      if (now < lockedUntil) return lockedUntil - now;
      this.lockouts.delete(service);
    }

    const history = prune(this.grants, service, now - this.windowMs);
    if (history.length < this.limitFor(service)) {
      history.push(now);
      daily?.push(now);
      return 0;
    }
    return history[0] + this.windowMs - now;
  }

  /** Throws when the 24h cap is used up; returns the daily history to record into. */
  private checkDailyQuota(service: string, now: number): number[] | null {
    const limit = this.dailyLimits[service];
    if (limit === undefined) return null;

    const history = prune(this.daily, service, now - DAILY_WINDOW_MS);
    if (history.length >= limit) {
      const resetsInMs = history[0] + DAILY_WINDOW_MS - now;
      this.log.error({ service, daily_used: history.length, daily_limit: limit, resets_in_ms: resetsInMs }, 'Daily quota exhausted');
      throw new DailyQuotaExhaustedError(service, history.length, limit, resetsInMs);
    }
    return history;
  }
}

/** Drops timestamps at or before `cutoff` and returns the live history. */
function prune(store: Map<string, number[]>, service: string, cutoff: number): number[] {
  let history = store.get(service);
  if (!history) {
    history = [];
    store.set(service, history);
  }
  while (history.length > 0 && history[0] <= cutoff) {
    history.shift();
  }
  return history;
}
