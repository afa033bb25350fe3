import { logger } from './logger';
import {
  TransientCallError,
  classifyTransientStatus,
  errorMessage,
  isTransientCallError,
} from './errors';

export interface RetryContext {
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: TransientCallError;
}

export interface RetryOptions {
  /** Retries after the first attempt; 0 disables retrying */
  maxRetries: number;
  /** Delay before the first retry, doubled for each later one */
  backoffMs: number;
  onRetry?: (context: RetryContext) => void;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_MESSAGE_PATTERN =
  /timeout|timed out|network|connection|ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|socket hang up|fetch failed/i;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `operation`, retrying only on TransientCallError with exponential backoff.
 * Any other error, or the last transient one, is rethrown.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep || sleep;
  let attempt = 0;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isTransientCallError(error) || attempt >= options.maxRetries) {
        throw error;
      }

      const delayMs = options.backoffMs * 2 ** attempt;
      attempt++;

      logger.debug(`[ErrorRecovery] Transient failure (${error.reason}), retry ${attempt}/${options.maxRetries} in ${delayMs}ms`);
      options.onRetry?.({ attempt, maxRetries: options.maxRetries, delayMs, error });

      if (delayMs > 0) {
        await wait(delayMs);
      }
    }
  }
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const candidate = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof candidate === 'number' ? candidate : undefined;
}

/**
 * Convert a provider error into a TransientCallError when it is recoverable.
 * Returns null for errors that should propagate as they are.
 */
export function toTransientCallError(error: unknown): TransientCallError | null {
  if (isTransientCallError(error)) {
    return error;
  }

  const message = errorMessage(error);
  const status = readStatus(error);

  if (status !== undefined) {
    const reason = classifyTransientStatus(status);
    return reason ? new TransientCallError(message, reason, status, { cause: error }) : null;
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TransientCallError(message, error.name === 'AbortError' ? 'aborted' : 'timeout', undefined, { cause: error });
  }

  if (TRANSIENT_MESSAGE_PATTERN.test(message)) {
    const reason = /timeout|timed out|ETIMEDOUT/i.test(message) ? 'timeout' : 'network';
    return new TransientCallError(message, reason, undefined, { cause: error });
  }

  return null;
}
