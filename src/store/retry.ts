/**
 * Bounded retry with exponential backoff and a per-attempt timeout for
 * document store calls.
 *
 * Only transient failures (dropped connections, timeouts, serialization
 * conflicts reported by the database) are retried. When the attempts run
 * out the last failure is wrapped in a {@link StorageUnavailableError};
 * any other error propagates unchanged on the first occurrence.
 *
 * A write is repeated only when the database certainly did not apply it.
 * After a timeout or a connection lost mid-statement the first attempt may
 * have committed, and a second run of a conditional write would then miss
 * its own change, so such a failure ends the call at once.
 *
 * @module store/retry
 */

import { StorageUnavailableError } from '../utils/errors.js';

export interface RetryOptions {
  /** Total attempts including the first one. Defaults to 3. */
  maxAttempts?: number;
  /** Base delay for exponential backoff. Defaults to 50 ms. */
  baseDelayMs?: number;
  /** Deadline for a single attempt. Defaults to 5000 ms. */
  timeoutMs?: number;
  /** Overrides the default transient-error classification. */
  isTransient?: (err: unknown) => boolean;
  /** Called before each retry; useful for logging. */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
  /** Whether the operation may run again after its outcome became unknown. Defaults to true. */
  idempotent?: boolean;
}

export class StorageTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Storage call exceeded ${timeoutMs} ms`);
    this.name = 'StorageTimeoutError';
  }
}

/** SQLSTATE classes and socket errors worth another attempt. */
const TRANSIENT_PG_PREFIXES = ['08', '53', '57P'];
const TRANSIENT_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
]);

function errorCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

/** Default transient-error classification. */
export function isTransientStorageError(err: unknown): boolean {
  if (err instanceof StorageTimeoutError) return true;
  const code = errorCode(err);
  if (!code) return false;
  return TRANSIENT_CODES.has(code) || TRANSIENT_PG_PREFIXES.some((prefix) => code.startsWith(prefix));
}

/** Failures after which the statement may or may not have been applied. */
const OUTCOME_UNKNOWN_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EPIPE', '08003', '08006']);

/**
 * True when the failed call may have reached the database and taken
 * effect. A refused connection or an error reported by the server means
 * the statement was not applied.
 */
export function isOutcomeUnknown(err: unknown): boolean {
  if (err instanceof StorageTimeoutError) return true;
  const code = errorCode(err);
  return code !== null && OUTCOME_UNKNOWN_CODES.has(code);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withTimeout<T>(operation: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StorageTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([operation(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run a store operation with bounded retry.
 *
 * @param name - Operation name carried by the final error
 * @throws {StorageUnavailableError} When every attempt failed transiently,
 *   or a non-idempotent call failed with an unknown outcome
 */
export async function withStorageRetry<T>(
  name: string,
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 50;
  const timeoutMs = options.timeoutMs ?? 5000;
  const isTransient = options.isTransient ?? isTransientStorageError;
  const sleep = options.sleep ?? defaultSleep;
  const idempotent = options.idempotent ?? true;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await withTimeout(operation, timeoutMs);
    } catch (err) {
      if (!isTransient(err)) throw err;
      if (!idempotent && isOutcomeUnknown(err)) {
        throw new StorageUnavailableError(name, attempt, err);
      }
      lastError = err;
      if (attempt < maxAttempts) {
        const delay = baseDelayMs * Math.pow(2, attempt - 1);
        options.onRetry?.(err, attempt, delay);
        await sleep(delay);
      }
    }
  }

  throw new StorageUnavailableError(name, maxAttempts, lastError);
}
