import type Anthropic from '@anthropic-ai/sdk';
import { extractResponseText } from './anthropic.js';
import { ProviderHttpError } from './errors.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

/** Provider-side ceiling; the retry executor applies its own shorter per-attempt limit. */
const PROVIDER_TIMEOUT_MS = 180_000;

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };
  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: controller.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(private readonly client: Anthropic) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    const response = await this.client.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: params.messages,
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
      },
      { signal: params.signal, timeout: PROVIDER_TIMEOUT_MS },
    );

    return {
      text: extractResponseText(response),
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenRouter provider (OpenAI-compatible) ─────────────────────────

export interface OpenRouterConfig {
  apiKey: string;
  baseUrl: string;
  fetch?: typeof fetch;
}

interface OpenAIChatResponse {
  choices?: Array<{
    message?: { content?: string | null };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

export class OpenRouterProvider implements LLMProvider {
  readonly name = 'openrouter';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenRouterConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.fetchImpl = config.fetch ?? fetch;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, PROVIDER_TIMEOUT_MS);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: params.model,
          max_tokens: params.max_tokens,
          temperature: params.temperature ?? 0.2,
          messages: [{ role: 'system', content: params.system }, ...params.messages],
        }),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw new ProviderHttpError('OpenRouter', response.status, response.headers, errText);
      }

      const data = (await response.json()) as OpenAIChatResponse;
      return {
        text: data.choices?.[0]?.message?.content ?? '',
        usage: {
          input_tokens: data.usage?.prompt_tokens ?? 0,
          output_tokens: data.usage?.completion_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}
