import { describe, it, expect } from 'vitest';
import { drainEvents } from '../pipeline/aggregator.js';
import { runBatchPipeline } from '../pipeline/batch-pipeline.js';
import { EventChannel } from '../pipeline/event-channel.js';
import { createRunState } from '../pipeline/types.js';
import type { Batch, PipelineEvent } from '../pipeline/types.js';
import type { DiscoveryService } from '../services/types.js';
import { ProviderHttpError } from '../lib/errors.js';
import { FakeDiscovery, FakeGeneration, collect, createTestExecutor, silentLog } from './fixtures.js';

describe('drainEvents', () => {
  it('forwards progress, counts completions and closes with a summary', async () => {
    const channel = new EventChannel<PipelineEvent>();
    const state = createRunState(2);
    channel.push({ type: 'status', stage: 'discovering', message: 'Finding sources for Batch 1/2...' });
    channel.push({ type: 'data', topic: 'Go', items: ['Why goroutines?'], batch_index: 1 });
    channel.push({ type: 'batch_completed', batch_index: 1, outcome: 'success', total_topics: 1, processed_topics: 1 });
    channel.push({
      type: 'error',
      scope: 'batch',
      batch_index: 2,
      message: 'Source discovery failed for Batch 2/2: boom',
      error_type: 'unknown',
    });
    channel.push({ type: 'batch_completed', batch_index: 2, outcome: 'failure', total_topics: 1, processed_topics: 0 });

    const events = await collect(drainEvents(channel, state, silentLog));

    expect(events.map((event) => event.type)).toEqual(['status', 'data', 'error', 'complete']);
    expect(events[3]).toEqual({
      type: 'complete',
      result_count: 1,
      total_batches: 2,
      succeeded: 1,
      partial: 0,
      failed: 1,
    });
    expect(state.results).toEqual([{ topic: 'Go', items: ['Why goroutines?'] }]);
  });

  it('stops after the last completion even when more events are queued', async () => {
    const channel = new EventChannel<PipelineEvent>();
    channel.push({ type: 'batch_completed', batch_index: 1, outcome: 'partial', total_topics: 2, processed_topics: 1 });
    channel.push({ type: 'status', message: 'late' });

    const events = await collect(drainEvents(channel, createRunState(1)));

    expect(events).toEqual([{ type: 'complete', result_count: 0, total_batches: 1, succeeded: 0, partial: 1, failed: 0 }]);
    expect(channel.size).toBe(1);
  });

  it('completes immediately when nothing was dispatched', async () => {
    const events = await collect(drainEvents(new EventChannel<PipelineEvent>(), createRunState(0)));
    expect(events).toEqual([{ type: 'complete', result_count: 0, total_batches: 0, succeeded: 0, partial: 0, failed: 0 }]);
  });

  it('exits after one completion per batch, however many generation calls a batch makes', async () => {
    const channel = new EventChannel<PipelineEvent>();
    const batches: Batch[] = [
      { index: 1, topics: ['Erlang'] },
      { index: 2, topics: ['Go', 'Rust'] },
      { index: 3, topics: ['Kafka', 'Redis', 'Nginx', 'Consul'] },
    ];
    const state = createRunState(batches.length);
    const { executor } = createTestExecutor();
    const generation = new FakeGeneration();
    const failingDiscovery: DiscoveryService = {
      discover: async () => {
        throw new ProviderHttpError('Perplexity', 400, new Headers(), 'bad query');
      },
    };

    const running = Promise.all(
      batches.map((batch) =>
        runBatchPipeline(batch, {
          discovery: batch.index === 1 ? failingDiscovery : new FakeDiscovery(),
          generation,
          executor,
          emit: (event) => channel.push(event),
          totalBatches: batches.length,
          // Batch 3 is forced down to single-topic calls.
          safeTokenLimit: batch.index === 3 ? 1 : 10_000,
          log: silentLog,
        }),
      ),
    );
    const events = await collect(drainEvents(channel, state));
    await running;

    expect(generation.calls.filter((call) => call.length === 1)).toHaveLength(4);
    expect(generation.prompts).toHaveLength(5);
    expect(state.completed).toBe(3);
    expect(events.filter((event) => event.type === 'error')).toHaveLength(1);
    expect(events[events.length - 1]).toEqual({
      type: 'complete',
      result_count: 6,
      total_batches: 3,
      succeeded: 2,
      partial: 0,
      failed: 1,
    });
    expect(channel.size).toBe(0);
  });
});
