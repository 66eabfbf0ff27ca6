import type { Logger } from '../lib/logger.js';
import type { EventChannel } from './event-channel.js';
import type { ExternalEvent, PipelineEvent, RunState } from './types.js';

/**
 * Single consumer over the run's channel. Completion signals are counted, not
 * forwarded; the loop ends exactly when every dispatched batch has reported,
 * then yields one `complete`.
 */
export async function* drainEvents(
  channel: EventChannel<PipelineEvent>,
  state: RunState,
  log?: Logger,
): AsyncGenerator<ExternalEvent, void, undefined> {
  while (state.completed < state.total_batches) {
    const event = await channel.pull();

    if (event.type === 'batch_completed') {
      state.completed += 1;
      if (event.outcome === 'success') state.succeeded += 1;
      else if (event.outcome === 'partial') state.partial += 1;
      else state.failed += 1;
      log?.info(
        {
          batch_index: event.batch_index,
          outcome: event.outcome,
          processed: event.processed_topics,
          total: event.total_topics,
          completed: state.completed,
          total_batches: state.total_batches,
        },
        'Batch completed',
      );
      continue;
    }

    if (event.type === 'data') {
      state.results.push({ topic: event.topic, items: event.items });
    }
    yield event;
  }

  yield {
    type: 'complete',
    result_count: state.results.length,
    total_batches: state.total_batches,
    succeeded: state.succeeded,
    partial: state.partial,
    failed: state.failed,
  };
}
