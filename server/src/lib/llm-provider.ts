import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { MalformedCompletionError, UpstreamHttpError } from './errors.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * One opaque text-completion endpoint. Implementations make exactly one
 * network attempt per call; retry policy lives in the adaptation service.
 */
export interface CompletionProvider {
  readonly name: string;
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface ProviderOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
}

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    if (callerSignal) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
    if (!timeoutController.signal.aborted) {
      timeoutController.abort();
    }
  };

  return { signal: combinedController.signal, cleanup };
}

/**
 * POST a JSON body and return the parsed JSON reply. Non-2xx responses
 * become UpstreamHttpError carrying the status; a 2xx body that is not JSON
 * is MalformedCompletionError. An aborted request rethrows the abort reason
 * so timeouts read as "Timed out after ...".
 */
async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  signal: AbortSignal,
  label: string,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (signal.aborted && signal.reason instanceof Error) throw signal.reason;
    throw err;
  }

  if (!response.ok) {
    const errText = await response.text().catch(() => '');
    throw new UpstreamHttpError(
      `${label} API error ${response.status}: ${errText.slice(0, 300)}`,
      response.status,
      response.headers,
    );
  }

  try {
    const payload: unknown = await response.json();
    return payload;
  } catch (err) {
    throw new MalformedCompletionError(`${label} API returned a body that is not JSON`, { cause: err });
  }
}

function parseReply<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedCompletionError(
      `${label} API reply has an unexpected shape${issue ? ` (${issue.path.join('.') || 'root'}: ${issue.message})` : ''}`,
    );
  }
  return parsed.data;
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

const OpenAIChatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).passthrough() }).passthrough())
    .default([]),
  usage: z
    .object({ prompt_tokens: z.number().optional(), completion_tokens: z.number().optional() })
    .passthrough()
    .optional(),
}).passthrough();

export class OpenAICompatibleProvider implements CompletionProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: ProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(request.signal, this.timeoutMs);
    try {
      const payload = await postJson(
        `${this.baseUrl}/chat/completions`,
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature ?? 0.3,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
        },
        this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
        signal,
        'Completion',
      );

      const data = parseReply(OpenAIChatResponseSchema, payload, 'Completion');
      return {
        text: data.choices[0]?.message.content ?? '',
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

// ─── Ollama provider ─────────────────────────────────────────────────

const OllamaGenerateResponseSchema = z.object({
  response: z.string().default(''),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
}).passthrough();

export class OllamaProvider implements CompletionProvider {
  readonly name = 'ollama';
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: ProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(request.signal, this.timeoutMs);
    try {
      const payload = await postJson(
        `${this.baseUrl}/api/generate`,
        {
          model: this.model,
          system: request.system,
          prompt: request.prompt,
          stream: false,
          options: {
            temperature: request.temperature ?? 0.3,
            num_predict: request.maxTokens,
          },
        },
        {},
        signal,
        'Ollama',
      );

      const data = parseReply(OllamaGenerateResponseSchema, payload, 'Ollama');
      return {
        text: data.response,
        usage: {
          input_tokens: data.prompt_eval_count ?? 0,
          output_tokens: data.eval_count ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements CompletionProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly options: ProviderOptions;
  private client: Anthropic | null = null;

  constructor(options: ProviderOptions) {
    this.model = options.model;
    this.options = options;
  }

  /** Lazily created so the module imports cleanly without credentials. */
  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseUrl,
        timeout: this.options.timeoutMs,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await this.getClient().messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature ?? 0.3,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}
