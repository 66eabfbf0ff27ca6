import { PipelineTimeoutError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ExternalEvent, RunState, TimeoutEvent } from './types.js';

export interface DeadlineOptions {
  state: RunState;
  /** When the budget started counting. Defaults to the first pull. */
  startedAt?: number;
  now?: () => number;
  log?: Logger;
}

const EXPIRED = Symbol('deadline-expired');

export function timeoutEvent(budgetMs: number, elapsedMs: number, state: RunState): TimeoutEvent {
  return {
    type: 'timeout',
    message: new PipelineTimeoutError(budgetMs).message,
    elapsed_ms: elapsedMs,
    completed_batches: state.completed,
    total_batches: state.total_batches,
  };
}

/**
 * Forwards `source` until the wall-clock budget runs out. Every pull waits at
 * most for the remaining budget; on expiry one `timeout` is yielded and the
 * source is abandoned. Work already running is not cancelled.
 */
export async function* superviseDeadline(
  source: AsyncIterator<ExternalEvent, void, undefined>,
  budgetMs: number,
  options: DeadlineOptions,
): AsyncGenerator<ExternalEvent, void, undefined> {
  const now = options.now ?? Date.now;
  const startedAt = options.startedAt ?? now();
  const deadline = startedAt + budgetMs;

  for (;;) {
    const remaining = deadline - now();
    const next = remaining > 0 ? await pullWithin(source, remaining, options.log) : EXPIRED;

    if (next === EXPIRED) {
      const event = timeoutEvent(budgetMs, now() - startedAt, options.state);
      options.log?.warn(
        { budget_ms: budgetMs, completed: event.completed_batches, total_batches: event.total_batches },
        'Pipeline deadline reached, abandoning remaining batches',
      );
      yield event;
      return;
    }

    if (next.done) return;
    yield next.value;
  }
}

async function pullWithin(
  source: AsyncIterator<ExternalEvent, void, undefined>,
  ms: number,
  log?: Logger,
): Promise<IteratorResult<ExternalEvent, void> | typeof EXPIRED> {
  const pending = source.next();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<typeof EXPIRED>((resolve) => {
    timer = setTimeout(() => resolve(EXPIRED), ms);
  });

  try {
    const winner = await Promise.race([pending, expiry]);
    if (winner === EXPIRED) {
      void pending.catch((err: unknown) => log?.warn({ err }, 'Abandoned event source failed after deadline'));
    }
    return winner;
  } finally {
    clearTimeout(timer);
  }
}
