/**
 * API response formatters for consistent JSON response structure.
 *
 * All API responses follow a predictable format:
 * - Success responses include `success: true` and the relevant data
 * - Error responses include `success: false`, an error object with code/message/fields,
 *   and a request correlation ID for debugging
 *
 * Manager failure reasons are translated here. `NOT_FOUND` and `EXPIRED`
 * share one response so a caller cannot tell an unknown challenge from a
 * stale one.
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CHALLENGE_ERROR_CODES,
  type ChallengeErrorCode,
  type ErrorResponse,
  type OtpVerifyFailure,
  type PasskeyConsumeFailure,
  type PushRespondFailure,
} from '../types/index.js';
import {
  ChallengeError,
  InvalidMetadataError,
  InvalidRequestError,
  RateLimitedError,
} from './errors.js';

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

const ERROR_STATUS_MAP: Record<ChallengeErrorCode, number> = {
  AUTH_INVALID_REQUEST: 400,
  AUTH_INVALID_METADATA: 400,
  AUTH_RATE_LIMITED: 429,
  AUTH_CHALLENGE_INVALID: 400,
  AUTH_CODE_INVALID: 401,
  AUTH_ATTEMPTS_EXHAUSTED: 403,
  AUTH_ALREADY_CONSUMED: 409,
  AUTH_CREDENTIAL_MISMATCH: 401,
  AUTH_INVALID_TRANSITION: 409,
  AUTH_FORBIDDEN: 403,
  AUTH_NOT_FOUND: 404,
  NOTIFICATION_SERVICE_ERROR: 503,
  STORAGE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

/** Default HTTP status for unknown error codes. */
const DEFAULT_ERROR_STATUS = 500;

// ─── Correlation ID ──────────────────────────────────────────────────────────

/** Request correlation ID (UUID v4), echoed in error bodies and logs. */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Error Formatters ────────────────────────────────────────────────────────

export interface ErrorDetails {
  fields?: Record<string, string[]>;
  remainingAttempts?: number;
  retryAfterSeconds?: number;
}

/**
 * Format an error response with error code, message, optional details,
 * and a correlation ID.
 *
 * @param requestId - Correlation ID; auto-generated if not provided
 */
export function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
  details: ErrorDetails = {},
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    requestId: requestId ?? generateRequestId(),
  };

  if (details.fields && Object.keys(details.fields).length > 0) {
    response.error.fields = details.fields;
  }
  if (details.remainingAttempts !== undefined) {
    response.error.remainingAttempts = details.remainingAttempts;
  }
  if (details.retryAfterSeconds !== undefined) {
    response.error.retryAfterSeconds = details.retryAfterSeconds;
  }

  return response;
}

/** HTTP status for an error code; 500 for unknown codes. */
export function getHttpStatusForError(code: string): number {
  const known = Object.values(CHALLENGE_ERROR_CODES).find((candidate) => candidate === code);
  return known ? ERROR_STATUS_MAP[known] : DEFAULT_ERROR_STATUS;
}

/** Convenience wrapper for request validation failures. */
export function formatValidationError(
  message: string,
  fields: Record<string, string[]>,
  requestId?: string,
): ErrorResponse {
  return formatErrorResponse(CHALLENGE_ERROR_CODES.INVALID_REQUEST, message, requestId, { fields });
}

/**
 * Format an internal server error response.
 * Uses a generic message to avoid leaking implementation details.
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    CHALLENGE_ERROR_CODES.INTERNAL_ERROR,
    'An unexpected error occurred. Please try again later.',
    requestId,
  );
}

/** Status and body for anything thrown out of a handler. */
export function formatThrownError(
  err: unknown,
  requestId?: string,
): { status: number; body: ErrorResponse } {
  if (!(err instanceof ChallengeError)) {
    return { status: DEFAULT_ERROR_STATUS, body: formatInternalError(requestId) };
  }

  const details: ErrorDetails = {};
  if (err instanceof InvalidRequestError || err instanceof InvalidMetadataError) {
    details.fields = err.fields;
  }
  if (err instanceof RateLimitedError) {
    details.retryAfterSeconds = err.retryAfterSeconds;
  }

  // Storage and delivery failures keep their code but not their internals.
  const message =
    err.code === CHALLENGE_ERROR_CODES.STORAGE_UNAVAILABLE
      ? 'The service is temporarily unavailable. Please try again later.'
      : err.code === CHALLENGE_ERROR_CODES.NOTIFICATION_FAILED
        ? 'The message could not be delivered. Please try again later.'
        : err.message;

  return {
    status: getHttpStatusForError(err.code),
    body: formatErrorResponse(err.code, message, requestId, details),
  };
}

// ─── Manager Failure Reasons ─────────────────────────────────────────────────

export type ChallengeFailureReason =
  | OtpVerifyFailure
  | PasskeyConsumeFailure
  | PushRespondFailure
  | 'INVALID_CODE';

const INVALID_OR_EXPIRED = {
  code: CHALLENGE_ERROR_CODES.CHALLENGE_INVALID,
  message: 'The challenge is invalid or has expired.',
};

const FAILURE_RESPONSES: Record<ChallengeFailureReason, { code: ChallengeErrorCode; message: string }> = {
  NOT_FOUND: INVALID_OR_EXPIRED,
  EXPIRED: INVALID_OR_EXPIRED,
  EXHAUSTED: {
    code: CHALLENGE_ERROR_CODES.ATTEMPTS_EXHAUSTED,
    message: 'Too many incorrect attempts. Request a new code.',
  },
  ALREADY_CONSUMED: {
    code: CHALLENGE_ERROR_CODES.ALREADY_CONSUMED,
    message: 'This challenge has already been used.',
  },
  ALREADY_USED: {
    code: CHALLENGE_ERROR_CODES.ALREADY_CONSUMED,
    message: 'This challenge has already been used.',
  },
  INVALID_CODE: {
    code: CHALLENGE_ERROR_CODES.CODE_INVALID,
    message: 'The code is incorrect.',
  },
  CREDENTIAL_MISMATCH: {
    code: CHALLENGE_ERROR_CODES.CREDENTIAL_MISMATCH,
    message: 'This challenge must be answered by a different credential.',
  },
  INVALID_TRANSITION: {
    code: CHALLENGE_ERROR_CODES.INVALID_TRANSITION,
    message: 'This request has already been resolved.',
  },
  USER_MISMATCH: {
    code: CHALLENGE_ERROR_CODES.FORBIDDEN,
    message: 'This request belongs to another user.',
  },
};

/** Error body for a failure reason returned by one of the managers. */
export function formatFailure(
  reason: ChallengeFailureReason,
  requestId?: string,
  details: ErrorDetails = {},
): ErrorResponse {
  const { code, message } = FAILURE_RESPONSES[reason];
  return formatErrorResponse(code, message, requestId, details);
}
