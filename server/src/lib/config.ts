import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export type ServiceName = 'discovery' | 'generation' | 'extraction';

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt wall-clock limit. */
  timeoutMs: number;
  /** Service lockout after a 429 that carries no Retry-After. */
  minLockMs: number;
}

export interface PipelineSettings {
  batchSize: number;
  maxConcurrentBatches: number;
  batchStaggerMs: number;
  topicCount: number;
  safeTokenLimit: number;
  pipelineTimeoutMs: number;
  maxUploadBytes: number;
  rpm: Record<ServiceName, number>;
  dailyLimits: Partial<Record<ServiceName, number>>;
  retry: RetryPolicy;
}

type Env = Record<string, string | undefined>;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// ─── Pipeline settings ───────────────────────────────────────────────

const pipelineSchema = z.object({
  BATCH_SIZE: positiveInt(3),
  MAX_CONCURRENT_BATCHES: positiveInt(3),
  BATCH_STAGGER_MS: z.coerce.number().int().min(0).default(250),
  TOPIC_COUNT: positiveInt(10),
  SAFE_TOKEN_LIMIT: positiveInt(6_000),
  PIPELINE_TIMEOUT_MS: positiveInt(600_000),
  MAX_UPLOAD_BYTES: positiveInt(10 * 1024 * 1024),
  DISCOVERY_RPM: positiveInt(10),
  GENERATION_RPM: positiveInt(20),
  EXTRACTION_RPM: positiveInt(30),
  RETRY_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: positiveInt(1_000),
  RETRY_MAX_DELAY_MS: positiveInt(30_000),
  ATTEMPT_TIMEOUT_MS: positiveInt(120_000),
  RETRY_MIN_LOCK_MS: z.coerce.number().int().min(0).default(5_000),
  DISCOVERY_DAILY_LIMIT: z.coerce.number().int().positive().optional(),
  GENERATION_DAILY_LIMIT: z.coerce.number().int().positive().optional(),
  EXTRACTION_DAILY_LIMIT: z.coerce.number().int().positive().optional(),
});

/** Blank variables count as unset so defaults apply. */
function pick(env: Env, keys: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) out[key] = value;
  }
  return out;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/** Unset limits are left out so the limiter treats them as uncapped. */
function dailyLimits(limits: Record<ServiceName, number | undefined>): Partial<Record<ServiceName, number>> {
  const out: Partial<Record<ServiceName, number>> = {};
  if (limits.discovery !== undefined) out.discovery = limits.discovery;
  if (limits.generation !== undefined) out.generation = limits.generation;
  if (limits.extraction !== undefined) out.extraction = limits.extraction;
  return out;
}

export function loadPipelineSettings(env: Env = process.env): PipelineSettings {
  const parsed = pipelineSchema.safeParse(pick(env, Object.keys(pipelineSchema.shape)));
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join('; ')}`, { issues });
  }
  const v = parsed.data;
  if (v.RETRY_BASE_DELAY_MS > v.RETRY_MAX_DELAY_MS) {
    throw new ConfigurationError('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS', {
      base_delay_ms: v.RETRY_BASE_DELAY_MS,
      max_delay_ms: v.RETRY_MAX_DELAY_MS,
    });
  }

  return {
    batchSize: v.BATCH_SIZE,
    maxConcurrentBatches: v.MAX_CONCURRENT_BATCHES,
    batchStaggerMs: v.BATCH_STAGGER_MS,
    topicCount: v.TOPIC_COUNT,
    safeTokenLimit: v.SAFE_TOKEN_LIMIT,
    pipelineTimeoutMs: v.PIPELINE_TIMEOUT_MS,
    maxUploadBytes: v.MAX_UPLOAD_BYTES,
    rpm: {
      discovery: v.DISCOVERY_RPM,
      generation: v.GENERATION_RPM,
      extraction: v.EXTRACTION_RPM,
    },
    dailyLimits: dailyLimits({
      discovery: v.DISCOVERY_DAILY_LIMIT,
      generation: v.GENERATION_DAILY_LIMIT,
      extraction: v.EXTRACTION_DAILY_LIMIT,
    }),
    retry: {
      maxRetries: v.RETRY_MAX_RETRIES,
      baseDelayMs: v.RETRY_BASE_DELAY_MS,
      maxDelayMs: v.RETRY_MAX_DELAY_MS,
      timeoutMs: v.ATTEMPT_TIMEOUT_MS,
      minLockMs: v.RETRY_MIN_LOCK_MS,
    },
  };
}

// ─── Provider settings ───────────────────────────────────────────────

export type LLMProviderName = 'openrouter' | 'anthropic';

export interface ProviderSettings {
  llmProvider: LLMProviderName;
  openRouterApiKey?: string;
  openRouterBaseUrl: string;
  anthropicApiKey?: string;
  perplexityApiKey?: string;
  perplexityModel: string;
  generationModel: string;
  extractionModel: string;
  maxTokens: number;
}

const providerSchema = z.object({
  LLM_PROVIDER: z.enum(['openrouter', 'anthropic']).optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  ANTHROPIC_API_KEY: z.string().optional(),
  PERPLEXITY_API_KEY: z.string().optional(),
  PERPLEXITY_MODEL: z.string().default('sonar-pro'),
  GENERATION_MODEL: z.string().optional(),
  EXTRACTION_MODEL: z.string().optional(),
  MAX_TOKENS: positiveInt(4_096),
});

const DEFAULT_MODELS: Record<LLMProviderName, { generation: string; extraction: string }> = {
  openrouter: { generation: 'deepseek/deepseek-chat', extraction: 'openai/gpt-oss-20b' },
  anthropic: { generation: 'claude-sonnet-4-5-20250929', extraction: 'claude-haiku-4-5-20251001' },
};

export function loadProviderSettings(env: Env = process.env): ProviderSettings {
  const parsed = providerSchema.safeParse(pick(env, Object.keys(providerSchema.shape)));
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid provider configuration: ${issues.join('; ')}`, { issues });
  }
  const v = parsed.data;
  const llmProvider: LLMProviderName = v.LLM_PROVIDER ?? (v.OPENROUTER_API_KEY ? 'openrouter' : 'anthropic');

  return {
    llmProvider,
    openRouterApiKey: v.OPENROUTER_API_KEY,
    openRouterBaseUrl: v.OPENROUTER_BASE_URL,
    anthropicApiKey: v.ANTHROPIC_API_KEY,
    perplexityApiKey: v.PERPLEXITY_API_KEY,
    perplexityModel: v.PERPLEXITY_MODEL,
    generationModel: v.GENERATION_MODEL ?? DEFAULT_MODELS[llmProvider].generation,
    extractionModel: v.EXTRACTION_MODEL ?? DEFAULT_MODELS[llmProvider].extraction,
    maxTokens: v.MAX_TOKENS,
  };
}
