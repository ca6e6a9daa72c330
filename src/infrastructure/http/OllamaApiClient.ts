import { FetchError, Response } from 'node-fetch';
import { z } from 'zod';
import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import { GenerationError, errorMessage } from '../../core/errors/ResearchErrors.js';
import {
  withRetry,
  CircuitBreaker,
  CircuitBreakerStats,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
} from '../../utils/retry.js';
import { FetchLike, defaultFetch, isTimeoutError } from './HttpClient.js';
import { Logger, createLogger } from '../../utils/logger.js';

const GenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional(),
});

/**
 * Transient Ollama failures: network errors, overload and server errors
 */
export function isTransientOllamaError(error: unknown): boolean {
  if (error instanceof FetchError) {
    return !isTimeoutError(error);
  }
  return error instanceof GenerationError && error.status !== null && (error.status === 429 || error.status >= 500);
}

export interface OllamaClientOptions {
  timeoutMs?: number;
  circuitBreaker?: CircuitBreaker;
  retryConfig?: RetryConfig;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Ollama API Client implementation.
 * Generation goes through a circuit breaker wrapped around the retry policy.
 */
export class OllamaApiClient implements IOllamaClient {
  private apiUrl: string;
  private timeoutMs: number;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;
  private fetchImpl: FetchLike;
  private logger: Logger;

  constructor(apiUrl: string, options: OllamaClientOptions = {}) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.logger = options.logger ?? createLogger('Ollama');
  }

  async generate(model: string, prompt: string, systemPrompt?: string): Promise<string> {
    const response = await this.circuitBreaker.execute(() =>
      withRetry(
        async () => {
          const res = await this.fetchImpl(`${this.apiUrl}/api/generate`, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
            },
            body: JSON.stringify({
              model,
              prompt,
              system: systemPrompt,
              stream: false,
              options: {
                num_ctx: 8192, // raw research data runs to several thousand tokens
                temperature: 0.1,
                top_p: 0.9,
                keep_alive: '10m',
              },
            }),
            timeout: this.timeoutMs,
          });

          if (!res.ok) {
            throw new GenerationError('ollama', `HTTP ${res.status}`, { status: res.status });
          }

          return res;
        },
        this.retryConfig,
        {
          shouldRetry: isTransientOllamaError,
          onLog: (log) => {
            if (!log.success && log.nextRetryInMs !== undefined) {
              this.logger.warn(`Attempt ${log.attempt} failed (${log.error}), retrying in ${log.nextRetryInMs}ms`);
            }
          },
        }
      )
    );

    const data = GenerateResponseSchema.safeParse(await this.readJson(response));
    if (!data.success) {
      throw new GenerationError('ollama', 'unexpected response payload');
    }
    return data.data.response;
  }

  async listModels(): Promise<string[]> {
    const response = await withRetry(
      async () => {
        const res = await this.fetchImpl(`${this.apiUrl}/api/tags`, {
          method: 'GET',
          headers: { 'Content-Type': 'application/json' },
          timeout: 5000,
        });
        if (!res.ok) {
          throw new GenerationError('ollama', `HTTP ${res.status}`, { status: res.status });
        }
        return res;
      },
      { ...this.retryConfig, maxAttempts: 2 },
      { shouldRetry: isTransientOllamaError }
    );

    const data = TagsResponseSchema.safeParse(await this.readJson(response));
    if (!data.success) {
      throw new GenerationError('ollama', 'unexpected model list payload');
    }
    return (data.data.models ?? []).map((m) => m.name);
  }

  getCircuitBreakerStats(): CircuitBreakerStats {
    return this.circuitBreaker.getStats();
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new GenerationError('ollama', `invalid JSON response: ${errorMessage(error)}`, { cause: error });
    }
  }
}
