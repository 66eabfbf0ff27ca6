// ─── Base ────────────────────────────────────────────────────────────

export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: { code: string; status?: number; details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.status = options.status ?? 500;
    this.details = options.details;
  }
}

// ─── Pre-flight ──────────────────────────────────────────────────────

/** Invalid settings. Raised before any work starts. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'CONFIGURATION_ERROR', status: 500, details });
  }
}

/** Bad input document or request body. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'VALIDATION_ERROR', status: 400, details });
  }
}

// ─── Stage failures ──────────────────────────────────────────────────

export class DiscoveryFailure extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'DISCOVERY_FAILURE', status: 502, cause });
  }
}

export class GenerationFailure extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'GENERATION_FAILURE', status: 502, cause });
  }
}

/** Malformed model output. Logged and replaced by a fallback value, never thrown to callers. */
export class ParseFailure extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'PARSE_FAILURE', status: 502, details });
  }
}

export class PipelineTimeoutError extends AppError {
  constructor(budgetMs: number) {
    super(`Pipeline exceeded its ${budgetMs}ms budget`, {
      code: 'PIPELINE_TIMEOUT',
      status: 504,
      details: { budget_ms: budgetMs },
    });
  }
}

// ─── External call failures ──────────────────────────────────────────

/**
 * Non-2xx response from a provider. Keeps the status and headers so the
 * failure classifier can read them without parsing the message.
 */
export class ProviderHttpError extends Error {
  readonly status: number;
  readonly headers: Headers;
  readonly body: string;

  constructor(provider: string, status: number, headers: Headers, body: string) {
    super(`${provider} API error ${status}: ${body.slice(0, 500)}`);
    this.name = 'ProviderHttpError';
    this.status = status;
    this.headers = headers;
    this.body = body;
  }
}

export class AttemptTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/** The local 24h request cap for a service is used up. Not worth retrying. */
export class DailyQuotaExhaustedError extends Error {
  readonly service: string;
  readonly resetsInMs: number;

  constructor(service: string, used: number, limit: number, resetsInMs: number) {
    super(
      `Daily quota exhausted for ${service} (${used}/${limit} used in the last 24h, ` +
        `resets in ${Math.ceil(resetsInMs / 60_000)} min)`,
    );
    this.name = 'DailyQuotaExhaustedError';
    this.service = service;
    this.resetsInMs = resetsInMs;
  }
}

/** Provider answered, but with nothing usable. */
export class InvalidOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOutputError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
