import { z } from 'zod';
import { ServiceUnavailableError, toErrorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('lmstudio-client');

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | ChatContentPart[];
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/** Remove markdown code fences a model may wrap around JSON. */
export function stripCodeFences(content: string): string {
  return content.replace(/```(?:json)?\n?|\n?```/g, '').trim();
}

/**
 * Parse the first JSON object in a model reply. Returns undefined when there is none.
 */
export function extractJson(content: string): unknown {
  const clean = stripCodeFences(content);
  const start = clean.indexOf('{');
  const end = clean.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  try {
    const parsed: unknown = JSON.parse(clean.slice(start, end + 1));
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Minimal OpenAI-compatible chat client for a local LM Studio server.
 */
export class LmStudioClient {
  private totalRequests = 0;
  private totalLatency = 0;
  private errorCount = 0;
  private lastError?: string;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey?: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  get endpoint(): string {
    return this.baseUrl;
  }

  async chat(model: string, messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const startTime = Date.now();
    this.totalRequests++;

    const controller = new AbortController();
    const timeoutId = options.timeoutMs
      ? setTimeout(() => controller.abort(), options.timeoutMs)
      : undefined;
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await this.fetchImpl(`${this.baseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          model,
          messages,
          temperature: options.temperature ?? 0.1,
          max_tokens: options.maxTokens ?? 300,
          stream: false,
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw new Error(`HTTP ${res.status}: ${text.slice(0, 200)}`);
      }

      const body: unknown = await res.json();
      const parsed = ChatCompletionSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error(`Malformed chat completion: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }

      const content = parsed.data.choices[0].message.content?.trim() ?? '';
      logger.debug('Chat completion finished', {
        model,
        latencyMs: Date.now() - startTime,
        totalTokens: parsed.data.usage?.total_tokens,
      });
      return content;
    } catch (error) {
      this.errorCount++;
      this.lastError = toErrorMessage(error);
      throw error;
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
      this.totalLatency += Date.now() - startTime;
    }
  }

  async healthCheck(): Promise<{ healthy: boolean; latency?: number; error?: string }> {
    try {
      const startTime = Date.now();
      const response = await this.fetchImpl(`${this.baseUrl}/v1/models`, {
        method: 'GET',
        headers: this.headers(),
        signal: AbortSignal.timeout(5000),
      });

      const latency = Date.now() - startTime;
      return response.ok
        ? { healthy: true, latency }
        : { healthy: false, latency, error: `HTTP ${response.status}` };
    } catch (error) {
      return { healthy: false, error: toErrorMessage(error) };
    }
  }

  /** Rejects with ServiceUnavailableError when the server does not answer. */
  async ensureAvailable(service: string): Promise<void> {
    const health = await this.healthCheck();
    if (!health.healthy) {
      throw new ServiceUnavailableError(service, health.error ?? 'health check failed');
    }
  }

  getStats(): { totalRequests: number; averageLatencyMs: number; errorRate: number; lastError?: string } {
    return {
      totalRequests: this.totalRequests,
      averageLatencyMs: this.totalRequests > 0 ? this.totalLatency / this.totalRequests : 0,
      errorRate: this.totalRequests > 0 ? this.errorCount / this.totalRequests : 0,
      lastError: this.lastError,
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}
