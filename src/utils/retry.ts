/**
 * Retry with exponential backoff and jitter, plus a circuit breaker,
 * for calls into unreliable upstream APIs
 */

import { SearchError } from '../core/errors/ResearchErrors.js';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFraction: number; // 0..1
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 10000,
  jitterFraction: 0.2,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Decides whether a failure is worth another attempt. Defaults to rate-limit failures only. */
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  signal?: AbortSignal;
  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number;
}

/**
 * Only rate limiting is worth waiting out; unreachable or malformed
 * responses fail the same way on every attempt.
 */
export function isRateLimitError(error: unknown): boolean {
  return error instanceof SearchError && error.kind === 'RateLimited';
}

/**
 * Delay before the attempt following `attempt` (1-based):
 * min(maxDelay, baseDelay * 2^(attempt-1)) scaled into [1-jitter, 1+jitter]
 */
export function computeBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const exponential = Math.min(config.maxDelayMs, config.baseDelayMs * 2 ** (attempt - 1));
  const factor = 1 - config.jitterFraction + random() * 2 * config.jitterFraction;
  return Math.max(0, Math.round(exponential * factor));
}

/**
 * Executes a function with exponential backoff retry logic.
 * The last failure is rethrown unchanged once attempts run out, and
 * failures rejected by `shouldRetry` propagate on the first occurrence.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRateLimitError;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, config.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();

    try {
      const result = await fn(attempt);
      options.onLog?.({ timestamp: new Date(), attempt, success: true });
      return result;
    } catch (error) {
      const retryable = attempt < maxAttempts && shouldRetry(error);
      const delay = retryable ? computeBackoffDelay(attempt, config, random) : undefined;

      options.onLog?.({
        timestamp: new Date(),
        attempt,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: delay,
      });

      if (delay === undefined) {
        throw error;
      }

      await sleep(delay, options.signal);
    }
  }
}

/**
 * Settles with the promise, or rejects with the signal's reason as soon as it aborts
 */
export async function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  let onAbort = () => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
  });
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Rejects with `onTimeout()` if the promise has not settled within `ms`,
 * or with the signal's reason if it aborts first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([abortable(promise, signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `fn` under a deadline. The signal handed to `fn` aborts when the
 * deadline passes, when `parent` aborts, or once the call has settled, so
 * an abandoned call releases its socket and timers.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  const forward = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', forward, { once: true });

  try {
    return await withTimeout(fn(controller.signal), ms, onTimeout, controller.signal);
  } finally {
    parent?.removeEventListener('abort', forward);
    controller.abort();
  }
}

/**
 * Sleep that wakes early, rejecting with the signal's reason, on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: Date | null;
  logs: Array<{ timestamp: Date; state: CircuitState; reason: string }>;
}

/**
 * Circuit Breaker Pattern
 * Stops calling a provider that keeps failing until `resetTimeoutMs` has passed,
 * then lets trial calls through (half-open); two successes close it again.
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: CircuitBreakerStats['logs'] = [];

  constructor(
    private readonly failureThreshold: number = 5,
    private readonly resetTimeoutMs: number = 60000,
    private readonly now: () => number = Date.now
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const elapsed = this.now() - (this.lastFailureTime ?? this.now());
      if (elapsed > this.resetTimeoutMs) {
        this.transition('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new Error(
          `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${this.resetTimeoutMs - elapsed}ms`
        );
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    if (this.state === 'half-open') {
      this.successCount++;
      if (this.successCount >= 2) {
        this.failureCount = 0;
        this.transition('closed', 'Recovered from temporary failure');
      }
    } else {
      this.failureCount = Math.max(0, this.failureCount - 1);
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.transition('open', 'Failed while in half-open state');
    } else if (this.state === 'closed' && this.failureCount >= this.failureThreshold) {
      this.transition('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private transition(state: CircuitState, reason: string): void {
    this.state = state;
    this.logs.push({ timestamp: new Date(this.now()), state, reason });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime !== null ? new Date(this.lastFailureTime) : null,
      logs: [...this.logs],
    };
  }

  reset(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.transition('closed', 'Manual reset');
  }
}
