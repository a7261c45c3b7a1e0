/**
 * Backoff for model and search calls.
 *
 * Only transient failures are retried. A rejected API key or a prompt the model
 * refuses fails on the first attempt.
 */

import { createPrefixedLogger, type Logger } from '../utils/logger';
import { RETRY_CONFIG } from './config/pipeline';
import { errorMessage } from './tools/parse-utils';

export { RETRY_CONFIG } from './config/pipeline';

export interface RetryOptions {
  /** Retries after the first attempt */
  readonly maxRetries?: number;
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
  /** Names the call in log lines and the cancellation error, e.g. "Email reviewer" */
  readonly context?: string;
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

export type TransientFailure = 'rate-limit' | 'network' | 'server' | 'malformed-output';

const TRANSIENT_PATTERNS: Readonly<Record<TransientFailure, readonly RegExp[]>> = {
  'rate-limit': [/rate.?limit/i, /too.?many.?requests/i, /429/],
  network: [/network/i, /fetch.*fail/i, /ETIMEDOUT/, /ECONNRESET/, /ECONNREFUSED/, /socket.?hang.?up/i],
  server: [
    /5\d{2}/,
    /internal.?server.?error/i,
    /service.?unavailable/i,
    /bad.?gateway/i,
    /overloaded/i,
    /capacity/i,
    /temporarily/i,
  ],
  // Structured output is sampled, so a second attempt can parse
  'malformed-output': [/did not match schema/i, /could not parse/i, /no object generated/i, /failed to parse/i, /invalid json/i],
};

function httpStatus(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Names the kind of transient failure, or null when retrying would not help.
 * Timeouts are never transient: the budget was too short.
 */
export function classifyFailure(error: unknown): TransientFailure | null {
  if (!error) return null;
  if (error instanceof DOMException && error.name === 'TimeoutError') return null;

  const message = errorMessage(error);
  for (const [kind, patterns] of Object.entries(TRANSIENT_PATTERNS)) {
    if (patterns.some((pattern) => pattern.test(message))) {
      return isTransientFailure(kind) ? kind : null;
    }
  }

  const status = httpStatus(error);
  if (status === 429) return 'rate-limit';
  if (status !== undefined && status >= 500 && status < 600) return 'server';
  return null;
}

function isTransientFailure(kind: string): kind is TransientFailure {
  return kind in TRANSIENT_PATTERNS;
}

export function isRetryableError(error: unknown): boolean {
  return classifyFailure(error) !== null;
}

/**
 * Backoff for the given zero-based retry, capped at maxDelayMs and then
 * jittered by up to 25% either way.
 */
export function calculateDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  const base = Math.min(initialDelayMs * RETRY_CONFIG.BACKOFF_MULTIPLIER ** attempt, maxDelayMs);
  const jitter = base * 0.25 * (Math.random() * 2 - 1);
  return Math.round(base + jitter);
}

/**
 * Resolves after `ms`, or early when the signal aborts.
 *
 * @example
 * await sleep(2000); // pause between universities
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn`, retrying transient failures with exponential backoff.
 *
 * @throws the last error once retries run out, the first non-transient error,
 *   or `"<context> was cancelled"` when the signal aborts
 *
 * @example
 * const result = await withRetry(() => generateText({ model, prompt }), {
 *   context: 'Email refiner',
 *   logger: log,
 * });
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? RETRY_CONFIG.MAX_RETRIES;
  const initialDelayMs = options.initialDelayMs ?? RETRY_CONFIG.INITIAL_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? RETRY_CONFIG.MAX_DELAY_MS;
  const context = options.context ?? 'operation';
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const { signal } = options;
  const log = options.logger ?? createPrefixedLogger('[Retry]');
  const totalAttempts = maxRetries + 1;

  const assertNotCancelled = (): void => {
    if (signal?.aborted) throw new Error(`${context} was cancelled`);
  };

  for (let attempt = 1; ; attempt++) {
    assertNotCancelled();
    try {
      return await fn();
    } catch (error) {
      assertNotCancelled();
      if (!shouldRetry(error)) throw error;

      if (attempt >= totalAttempts) {
        log.warn(`${context} failed after ${totalAttempts} attempts: ${errorMessage(error)}`);
        throw error;
      }

      const delay = calculateDelay(attempt - 1, initialDelayMs, maxDelayMs);
      log.info(`${context} failed (attempt ${attempt}/${totalAttempts}), retrying in ${delay}ms: ${errorMessage(error)}`);
      await sleep(delay, signal);
    }
  }
}
