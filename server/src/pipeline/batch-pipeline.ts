import { DiscoveryFailure, GenerationFailure } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ExecutionResult, RetryExecutor } from '../lib/retry.js';
import type { DiscoveryService, GenerationService } from '../services/types.js';
import { estimateTokens, mergeContext, normalizeTopicKey, splitByContext } from './context.js';
import { buildContextFreePrompt, buildContextPrompt } from './prompts.js';
import type {
  Batch,
  BatchOutcome,
  EmitFn,
  PipelineEvent,
  Topic,
  TopicContext,
  TopicResult,
} from './types.js';

export interface BatchPipelineDeps {
  discovery: DiscoveryService;
  generation: GenerationService;
  executor: RetryExecutor;
  emit: EmitFn;
  totalBatches: number;
  safeTokenLimit: number;
  log: Logger;
}

type PipelineState = 'discovering' | 'building_context' | 'deciding' | 'generating' | 'splitting' | 'done';

/** Share of the token budget past which a group is logged as close to the limit. */
const BUDGET_WARNING_RATIO = 0.8;

export const QUOTA_USER_MESSAGE =
  'The research service has reached its usage quota. Please try again later.';

interface BatchContext {
  batch: Batch;
  deps: BatchPipelineDeps;
  log: Logger;
  /** Topics that produced a data event. */
  produced: Set<Topic>;
  transition: (state: PipelineState, extra?: Record<string, unknown>) => void;
}

// ─── Entry point ─────────────────────────────────────────────────────

/**
 * Discovery then generation for one batch. Over-budget context is bisected
 * and generated in parallel halves. Emits exactly one `batch_completed`,
 * whatever happens inside.
 */
export async function runBatchPipeline(batch: Batch, deps: BatchPipelineDeps): Promise<BatchOutcome> {
  const log = deps.log.child({ batch_index: batch.index });
  const ctx: BatchContext = {
    batch,
    deps,
    log,
    produced: new Set<Topic>(),
    transition: (state, extra) => log.debug({ state, ...extra }, 'Batch pipeline transition'),
  };

  let outcome: BatchOutcome = 'failure';
  try {
    await runStages(ctx);
  } catch (err) {
    log.error({ err }, 'Batch pipeline failed unexpectedly');
  } finally {
    outcome = outcomeFor(ctx.produced.size, batch.topics.length);
    ctx.transition('done', { outcome, processed: ctx.produced.size });
    deps.emit({
      type: 'batch_completed',
      batch_index: batch.index,
      outcome,
      total_topics: batch.topics.length,
      processed_topics: ctx.produced.size,
    });
  }
  return outcome;
}

export function outcomeFor(processed: number, total: number): BatchOutcome {
  if (total > 0 && processed >= total) return 'success';
  return processed > 0 ? 'partial' : 'failure';
}

async function runStages(ctx: BatchContext): Promise<void> {
  const { batch, deps } = ctx;
  const label = `Batch ${batch.index}/${deps.totalBatches}`;

  ctx.transition('discovering', { topics: batch.topics.length });
  deps.emit({ type: 'status', stage: 'discovering', message: `Finding sources for ${label}...` });
  const discovered = await deps.executor.execute(
    (signal) => deps.discovery.discover(batch.topics, signal),
    'discovery',
    { label: `discovery ${label}`, log: ctx.log },
  );
  if (!discovered.ok) {
    const failure = new DiscoveryFailure(`Source discovery failed for ${label}: ${discovered.error.message}`, discovered.error);
    ctx.log.warn({ category: discovered.category, attempts: discovered.attempts }, failure.message);
    deps.emit(discoveryFailureEvent(batch.index, failure.message, discovered));
    return;
  }

  ctx.transition('building_context');
  const { contextual, contextFree } = splitByContext(batch.topics, discovered.value);
  const contextTopics = batch.topics.filter((topic) => contextual.has(topic));
  if (contextFree.length > 0) {
    ctx.log.info({ context_free: contextFree }, 'Topics without discovered context');
  }

  deps.emit({ type: 'status', stage: 'generating', message: `Generating questions for ${label}...` });

  const units: Array<Promise<void>> = [];
  if (contextTopics.length > 0) {
    units.push(generateWithinBudget(ctx, contextTopics, contextual));
  }
  for (const topic of contextFree) {
    units.push(generateGroup(ctx, [topic], buildContextFreePrompt([topic])));
  }
  await Promise.all(units);
}

// ─── Budget decision and bisection ───────────────────────────────────

async function generateWithinBudget(
  ctx: BatchContext,
  topics: Topic[],
  contextual: ReadonlyMap<Topic, string>,
): Promise<void> {
  const merged = mergeContext(topics, contextual);
  const estimate = estimateTokens(merged);
  const limit = ctx.deps.safeTokenLimit;
  ctx.transition('deciding', { topics: topics.length, estimated_tokens: estimate, limit });

  if (estimate <= limit || topics.length === 1) {
    if (estimate > limit) {
      ctx.log.warn({ topic: topics[0], estimated_tokens: estimate, limit }, 'Single topic exceeds token budget, generating anyway');
    } else if (estimate > limit * BUDGET_WARNING_RATIO) {
      ctx.log.warn({ estimated_tokens: estimate, limit }, 'Context is close to the token budget');
    }
    await generateGroup(ctx, topics, buildContextPrompt(topics, merged));
    return;
  }

  const mid = Math.floor(topics.length / 2);
  const left = topics.slice(0, mid);
  const right = topics.slice(mid);
  ctx.transition('splitting', { left: left.length, right: right.length, estimated_tokens: estimate });
  await Promise.all([
    generateWithinBudget(ctx, left, contextual),
    generateWithinBudget(ctx, right, contextual),
  ]);
}

// ─── Generation ──────────────────────────────────────────────────────

async function generateGroup(ctx: BatchContext, topics: Topic[], prompt: string): Promise<void> {
  const { batch, deps } = ctx;
  ctx.transition('generating', { topics });

  const result = await deps.executor.execute(
    (signal) => deps.generation.generate(prompt, signal),
    'generation',
    {
      label: `generation batch ${batch.index} [${topics.join(', ')}]`,
      log: ctx.log,
      validate: (value) => value.length > 0,
    },
  );

  if (!result.ok) {
    const failure = new GenerationFailure(`Question generation failed: ${result.error.message}`, result.error);
    ctx.log.warn({ topics, category: result.category, attempts: result.attempts }, failure.message);
    for (const topic of topics) {
      deps.emit({
        type: 'error',
        scope: 'topic',
        topic,
        batch_index: batch.index,
        message: failure.message,
        error_type: result.category,
      });
    }
    return;
  }

  const assigned = assignResults(topics, result.value);
  for (const topic of topics) {
    const items = assigned.get(topic);
    if (items && items.length > 0) {
      ctx.produced.add(topic);
      deps.emit({ type: 'data', topic, items, batch_index: batch.index });
    } else {
      deps.emit({
        type: 'error',
        scope: 'topic',
        topic,
        batch_index: batch.index,
        message: `No questions generated for ${topic}`,
        error_type: 'no_result',
      });
    }
  }
}

/**
 * Map returned entries onto requested topics by normalised name. Entries the
 * model renamed fill the remaining topics in order; extras are dropped.
 */
export function assignResults(topics: readonly Topic[], results: readonly TopicResult[]): Map<Topic, string[]> {
  const assigned = new Map<Topic, string[]>();
  const byKey = new Map(topics.map((topic) => [normalizeTopicKey(topic), topic] as const));
  const unmatched: TopicResult[] = [];

  for (const result of results) {
    const topic = byKey.get(normalizeTopicKey(result.topic));
    if (topic === undefined) {
      unmatched.push(result);
    } else if (!assigned.has(topic)) {
      assigned.set(topic, result.items);
    }
  }

  const open = topics.filter((topic) => !assigned.has(topic));
  open.forEach((topic, i) => {
    const result = unmatched[i];
    if (result) assigned.set(topic, result.items);
  });
  return assigned;
}

// ─── Failure events ──────────────────────────────────────────────────

function discoveryFailureEvent(
  batchIndex: number,
  message: string,
  failure: Extract<ExecutionResult<TopicContext[]>, { ok: false }>,
): PipelineEvent {
  switch (failure.category) {
    case 'quota_error':
      return { type: 'quota_error', batch_index: batchIndex, message, user_message: QUOTA_USER_MESSAGE };
    case 'service_overload':
    case 'timeout':
      return { type: 'service_error', batch_index: batchIndex, message, error_type: failure.category };
    default:
      return { type: 'error', scope: 'batch', batch_index: batchIndex, message, error_type: failure.category };
  }
}
