/**
 * Typed errors for the challenge module.
 *
 * Expected security outcomes (wrong code, expired challenge, lost race)
 * are returned as result unions by the managers. The classes below cover
 * everything a caller has to handle as an exception: requests that must
 * be corrected by the client, rate limiting, and infrastructure failures.
 *
 * @module utils/errors
 */

import { CHALLENGE_ERROR_CODES, type ChallengeErrorCode } from '../types/index.js';

export class ChallengeError extends Error {
  constructor(
    public readonly code: ChallengeErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ChallengeError';
  }
}

/** A request argument is missing or malformed. */
export class InvalidRequestError extends ChallengeError {
  constructor(
    message: string,
    public readonly fields: Record<string, string[]> = {},
  ) {
    super(CHALLENGE_ERROR_CODES.INVALID_REQUEST, message);
    this.name = 'InvalidRequestError';
  }
}

/**
 * Authentication method metadata does not satisfy the schema of its type.
 * `fields` maps each offending field to its messages.
 */
export class InvalidMetadataError extends ChallengeError {
  constructor(
    message: string,
    public readonly fields: Record<string, string[]>,
  ) {
    super(CHALLENGE_ERROR_CODES.INVALID_METADATA, message);
    this.name = 'InvalidMetadataError';
  }
}

/** A new challenge was requested inside the re-issuance window. */
export class RateLimitedError extends ChallengeError {
  constructor(public readonly retryAfterSeconds: number) {
    super(
      CHALLENGE_ERROR_CODES.RATE_LIMITED,
      `Too many requests. Retry in ${retryAfterSeconds} seconds.`,
    );
    this.name = 'RateLimitedError';
  }
}

/** The document store kept failing after the bounded retry. */
export class StorageUnavailableError extends ChallengeError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      CHALLENGE_ERROR_CODES.STORAGE_UNAVAILABLE,
      `Storage operation "${operation}" failed after ${attempts} attempt(s)`,
      cause,
    );
    this.name = 'StorageUnavailableError';
  }
}

/** The SMS, email or push transport rejected a message. */
export class NotificationError extends ChallengeError {
  constructor(message: string, cause?: unknown) {
    super(CHALLENGE_ERROR_CODES.NOTIFICATION_FAILED, message, cause);
    this.name = 'NotificationError';
  }
}
