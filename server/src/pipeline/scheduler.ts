import { createConcurrencyLimiter } from '../lib/concurrency.js';
import type { ConcurrencyLimiter } from '../lib/concurrency.js';
import type { Logger } from '../lib/logger.js';
import { sleep as defaultSleep } from '../lib/sleep.js';
import type { SleepFn } from '../lib/sleep.js';
import type { Batch } from './types.js';

export interface BatchSchedulerOptions {
  maxConcurrent: number;
  /** Delay between successive launches so batches do not hit providers in the same instant. */
  staggerMs?: number;
  sleep?: SleepFn;
  log: Logger;
}

export interface SchedulerStats {
  active: number;
  waiting: number;
}

/**
 * Runs one unit of work per batch, at most `maxConcurrent` at a time. A unit
 * that throws is logged and contained; siblings keep running.
 */
export class BatchScheduler {
  private readonly gate: ConcurrencyLimiter;
  private readonly staggerMs: number;
  private readonly sleep: SleepFn;
  private readonly log: Logger;

  constructor(options: BatchSchedulerOptions) {
    this.gate = createConcurrencyLimiter(options.maxConcurrent);
    this.staggerMs = options.staggerMs ?? 0;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log;
  }

  get stats(): SchedulerStats {
    return { active: this.gate.active, waiting: this.gate.pending };
  }

  /** Resolves once every unit has settled. Never rejects. */
  async dispatch(batches: readonly Batch[], runUnit: (batch: Batch) => Promise<unknown>): Promise<void> {
    const units = batches.map(async (batch, position) => {
      try {
        if (this.staggerMs > 0 && position > 0) {
          await this.sleep(position * this.staggerMs);
        }
        await this.gate.run(() => runUnit(batch));
      } catch (err) {
        this.log.error({ err, batch_index: batch.index }, 'Batch unit failed');
      }
    });
    await Promise.all(units);
  }
}
