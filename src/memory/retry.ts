import { setTimeout as sleep } from 'node:timers/promises';
import { toStorageError } from '../errors.js';
import type { StructuredLogger } from '../observability/logger.js';

export interface StorageRetryOptions {
  /** Extra attempts after the first (default: 2) */
  retries?: number;
  /** Linear backoff step between attempts (default: 100) */
  delayMs?: number;
  logger?: StructuredLogger;
}

/**
 * Run a memory operation, retrying retryable StorageErrors a bounded number
 * of times. Anything else is rethrown as a StorageError straight away.
 */
export async function withStorageRetry<T>(
  action: string,
  operation: () => Promise<T>,
  options: StorageRetryOptions = {}
): Promise<T> {
  const retries = options.retries ?? 2;
  const delayMs = options.delayMs ?? 100;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const storageError = toStorageError(error, action);
      if (!storageError.retryable || attempt >= retries) {
        throw storageError;
      }
      options.logger?.warning('Storage operation failed, retrying', {
        action,
        attempt: attempt + 1,
        retries,
        error: storageError.message,
      });
      if (delayMs > 0) {
        await sleep(delayMs * (attempt + 1));
      }
    }
  }
}
