import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { PipelineSettings, RetryPolicy } from '../lib/config.js';
import { ServiceRateLimiter } from '../lib/rate-limiter.js';
import { RetryExecutor } from '../lib/retry.js';
import type { DiscoveryService, GenerationService, TopicExtractor } from '../services/types.js';
import type { ExternalEvent, Topic, TopicContext, TopicResult } from '../pipeline/types.js';

export const silentLog: Logger = logger.child({ test: true });

/** Manually advanced clock whose sleep moves time forward instead of waiting. */
export function createSimulatedClock(start = 0) {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
    sleeps,
  };
}

export const FAST_RETRY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 100,
  maxDelayMs: 1_000,
  timeoutMs: 5_000,
  minLockMs: 0,
};

/** Executor whose limiter never blocks and whose backoff is recorded, not slept. */
export function createTestExecutor(policy: RetryPolicy = FAST_RETRY) {
  const sleeps: number[] = [];
  const limiter = new ServiceRateLimiter(
    { discovery: 10_000, generation: 10_000, extraction: 10_000 },
    { log: silentLog },
  );
  const executor = new RetryExecutor(limiter, policy, {
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    log: silentLog,
  });
  return { executor, limiter, sleeps };
}

export function testSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    batchSize: 3,
    maxConcurrentBatches: 2,
    batchStaggerMs: 0,
    topicCount: 10,
    safeTokenLimit: 10_000,
    pipelineTimeoutMs: 60_000,
    maxUploadBytes: 1024 * 1024,
    rpm: { discovery: 10_000, generation: 10_000, extraction: 10_000 },
    dailyLimits: {},
    retry: FAST_RETRY,
    ...overrides,
  };
}

// ─── Fake services ───────────────────────────────────────────────────

export function contextFor(topic: Topic): string {
  return `Background material about ${topic}.`;
}

/** Every topic gets a short context section. */
export class FakeDiscovery implements DiscoveryService {
  readonly calls: Topic[][] = [];

  constructor(private readonly contentFor: (topic: Topic) => string | null = contextFor) {}

  async discover(topics: readonly Topic[]): Promise<TopicContext[]> {
    this.calls.push([...topics]);
    return topics.map((topic) => ({ topic, content: this.contentFor(topic) }));
  }
}

/** Reads the requested topics back out of the prompt's first line. */
export function topicsInPrompt(prompt: string): Topic[] {
  const firstLine = prompt.split('\n')[0];
  const single = /for this skill: (.+)\.$/.exec(firstLine);
  if (single) return [single[1]];
  const many = /for these skills: (.+)\.$/.exec(firstLine);
  return many ? many[1].split(', ') : [];
}

/** Answers every prompt with two questions per requested topic. */
export class FakeGeneration implements GenerationService {
  readonly prompts: string[] = [];

  async generate(prompt: string): Promise<TopicResult[]> {
    this.prompts.push(prompt);
    return topicsInPrompt(prompt).map((topic) => ({
      topic,
      items: [`What is ${topic}?`, `When would you avoid ${topic}?`],
    }));
  }

  /** Topic lists of every generation call, in call order. */
  get calls(): Topic[][] {
    return this.prompts.map(topicsInPrompt);
  }
}

export class FakeExtractor implements TopicExtractor {
  constructor(private readonly topics: Topic[]) {}

  async extract(): Promise<Topic[]> {
    return this.topics;
  }
}

export async function collect(events: AsyncIterable<ExternalEvent>): Promise<ExternalEvent[]> {
  const out: ExternalEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}
