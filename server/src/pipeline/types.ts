import type { FailureCategory } from '../lib/failure-classifier.js';

// ─── Work units ──────────────────────────────────────────────────────

export type Topic = string;

export interface Batch {
  /** 1-based position in dispatch order. */
  index: number;
  topics: Topic[];
}

/** `content: null` marks a topic discovery found nothing usable for. */
export interface TopicContext {
  topic: Topic;
  content: string | null;
}

export type BatchOutcome = 'success' | 'partial' | 'failure';

export type RunStage = 'extracting' | 'discovering' | 'generating' | 'aggregating';

export interface TopicResult {
  topic: Topic;
  items: string[];
}

// ─── Events ──────────────────────────────────────────────────────────

export interface StatusEvent {
  type: 'status';
  message: string;
  stage?: RunStage;
}

export interface DataEvent {
  type: 'data';
  topic: Topic;
  items: string[];
  batch_index: number;
}

export interface TopicErrorEvent {
  type: 'error';
  scope: 'topic';
  topic: Topic;
  batch_index: number;
  message: string;
  error_type: FailureCategory | 'no_result';
}

export interface BatchErrorEvent {
  type: 'error';
  scope: 'batch';
  batch_index: number;
  message: string;
  error_type: FailureCategory;
}

export interface RunErrorEvent {
  type: 'error';
  scope: 'run';
  message: string;
  error_type: FailureCategory | 'no_topics';
}

export interface ServiceErrorEvent {
  type: 'service_error';
  batch_index: number;
  message: string;
  error_type: FailureCategory;
}

export interface QuotaErrorEvent {
  type: 'quota_error';
  batch_index: number;
  message: string;
  user_message: string;
}

/** Internal join signal. Counted by the aggregator, never forwarded. */
export interface BatchCompletedEvent {
  type: 'batch_completed';
  batch_index: number;
  outcome: BatchOutcome;
  total_topics: number;
  processed_topics: number;
}

export interface CompleteEvent {
  type: 'complete';
  result_count: number;
  total_batches: number;
  succeeded: number;
  partial: number;
  failed: number;
}

export interface TimeoutEvent {
  type: 'timeout';
  message: string;
  elapsed_ms: number;
  completed_batches: number;
  total_batches: number;
}

/** Everything a batch pipeline may put on the channel. */
export type PipelineEvent =
  | StatusEvent
  | DataEvent
  | TopicErrorEvent
  | BatchErrorEvent
  | ServiceErrorEvent
  | QuotaErrorEvent
  | BatchCompletedEvent;

/** What crosses the boundary to the transport. */
export type ExternalEvent =
  | Exclude<PipelineEvent, BatchCompletedEvent>
  | RunErrorEvent
  | CompleteEvent
  | TimeoutEvent;

export type EmitFn = (event: PipelineEvent) => void;

// ─── Run state ───────────────────────────────────────────────────────

export interface RunState {
  total_batches: number;
  completed: number;
  succeeded: number;
  partial: number;
  failed: number;
  results: TopicResult[];
}

export function createRunState(totalBatches: number): RunState {
  return {
    total_batches: totalBatches,
    completed: 0,
    succeeded: 0,
    partial: 0,
    failed: 0,
    results: [],
  };
}
