import type { PipelineSettings } from '../lib/config.js';
import { createRunLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { RetryExecutor } from '../lib/retry.js';
import type { SleepFn } from '../lib/sleep.js';
import type { DiscoveryService, GenerationService, TopicExtractor } from '../services/types.js';
import { drainEvents } from './aggregator.js';
import { runBatchPipeline } from './batch-pipeline.js';
import { normalizeTopicKey } from './context.js';
import { superviseDeadline, timeoutEvent } from './deadline.js';
import { EventChannel } from './event-channel.js';
import { partitionTopics } from './partition.js';
import { BatchScheduler } from './scheduler.js';
import { createRunState } from './types.js';
import type { CompleteEvent, ExternalEvent, PipelineEvent, RunState, Topic } from './types.js';

export interface RunInput {
  runId: string;
  documentText: string;
  /** Skips extraction when supplied. */
  topics?: readonly Topic[];
}

export interface RunSummary {
  run_id: string;
  terminal: 'complete' | 'timeout' | 'abandoned';
  topics: number;
  total_batches: number;
  completed_batches: number;
  succeeded: number;
  partial: number;
  failed: number;
  result_count: number;
  duration_ms: number;
}

/**
 * `settings.pipelineTimeoutMs` counts from the start of the run, extraction
 * included. An extraction call in flight is bounded only by its own
 * per-attempt timeout; once it returns past the deadline no batch is
 * dispatched.
 */
export interface RunDependencies {
  settings: PipelineSettings;
  executor: RetryExecutor;
  discovery: DiscoveryService;
  generation: GenerationService;
  extractor: TopicExtractor;
  log?: Logger;
  sleep?: SleepFn;
  now?: () => number;
  onFinish?: (summary: RunSummary) => void;
}

/** Trim, drop blanks and case-insensitive duplicates, keep first spelling. */
export function normalizeTopicList(topics: readonly string[], limit?: number): Topic[] {
  const seen = new Set<string>();
  const out: Topic[] = [];
  for (const raw of topics) {
    const topic = raw.trim().replace(/\s+/g, ' ');
    const key = normalizeTopicKey(topic);
    if (!topic || seen.has(key)) continue;
    seen.add(key);
    out.push(topic);
    if (limit !== undefined && out.length >= limit) break;
  }
  return out;
}

function emptyCompletion(): CompleteEvent {
  return { type: 'complete', result_count: 0, total_batches: 0, succeeded: 0, partial: 0, failed: 0 };
}

/**
 * One full run: topic extraction, partitioning, bounded dispatch of batch
 * pipelines and a deadline-supervised drain. The sequence always ends with
 * exactly one `complete` or `timeout`.
 */
export async function* runInterviewPipeline(
  input: RunInput,
  deps: RunDependencies,
): AsyncGenerator<ExternalEvent, void, undefined> {
  const { settings, executor } = deps;
  const now = deps.now ?? Date.now;
  const log = deps.log ?? createRunLogger(input.runId);
  const startedAt = now();

  let topics: Topic[] = [];
  let state: RunState = createRunState(0);
  let terminal: RunSummary['terminal'] = 'abandoned';

  try {
    // ─── Step 1: topics ───────────────────────────────────────────
    yield { type: 'status', stage: 'extracting', message: 'Extracting skills from document...' };

    if (input.topics) {
      topics = normalizeTopicList(input.topics);
    } else {
      const extracted = await executor.execute(
        (signal) => deps.extractor.extract(input.documentText, settings.topicCount, signal),
        'extraction',
        { label: 'topic extraction', log, validate: (value) => value.length > 0 },
      );
      if (!extracted.ok) {
        log.error({ category: extracted.category, error: extracted.error.message }, 'Topic extraction failed');
        yield {
          type: 'error',
          scope: 'run',
          message: `Skill extraction failed: ${extracted.error.message}`,
          error_type: extracted.category,
        };
        terminal = 'complete';
        yield emptyCompletion();
        return;
      }
      topics = normalizeTopicList(extracted.value, settings.topicCount);
    }

    if (topics.length === 0) {
      yield { type: 'error', scope: 'run', message: 'No skills found in the document', error_type: 'no_topics' };
      terminal = 'complete';
      yield emptyCompletion();
      return;
    }

    // ─── Step 2: dispatch ─────────────────────────────────────────
    const batches = partitionTopics(topics, settings.batchSize);
    state = createRunState(batches.length);

    const elapsedMs = now() - startedAt;
    if (elapsedMs >= settings.pipelineTimeoutMs) {
      log.warn({ budget_ms: settings.pipelineTimeoutMs, elapsed_ms: elapsedMs }, 'Budget spent before dispatch');
      terminal = 'timeout';
      yield timeoutEvent(settings.pipelineTimeoutMs, elapsedMs, state);
      return;
    }

    const channel = new EventChannel<PipelineEvent>();
    log.info({ topics: topics.length, batches: batches.length, batch_size: settings.batchSize }, 'Dispatching batches');
    yield {
      type: 'status',
      stage: 'discovering',
      message: `Processing ${topics.length} skills in ${batches.length} batches...`,
    };

    const scheduler = new BatchScheduler({
      maxConcurrent: settings.maxConcurrentBatches,
      staggerMs: settings.batchStaggerMs,
      sleep: deps.sleep,
      log,
    });
    const dispatched = scheduler.dispatch(batches, (batch) =>
      runBatchPipeline(batch, {
        discovery: deps.discovery,
        generation: deps.generation,
        executor,
        emit: (event) => channel.push(event),
        totalBatches: batches.length,
        safeTokenLimit: settings.safeTokenLimit,
        log,
      }),
    );

    // ─── Step 3: supervised drain ─────────────────────────────────
    const drain = drainEvents(channel, state, log);
    for await (const event of superviseDeadline(drain, settings.pipelineTimeoutMs, { state, startedAt, now, log })) {
      if (event.type === 'complete' || event.type === 'timeout') terminal = event.type;
      yield event;
    }

    if (terminal === 'timeout') {
      void dispatched.then(() => log.info({ run_id: input.runId }, 'Abandoned batches settled after deadline'));
    } else {
      await dispatched;
    }
  } finally {
    const summary: RunSummary = {
      run_id: input.runId,
      terminal,
      topics: topics.length,
      total_batches: state.total_batches,
      completed_batches: state.completed,
      succeeded: state.succeeded,
      partial: state.partial,
      failed: state.failed,
      result_count: state.results.length,
      duration_ms: now() - startedAt,
    };
    log.info(summary, 'Pipeline run finished');
    deps.onFinish?.(summary);
  }
}
