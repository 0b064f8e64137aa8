/**
 * Challenge controller: request parsing and result shaping for the
 * challenge API.
 *
 * Each handler takes the untyped request pieces, a {@link RequestContext}
 * and the managers it needs, and returns either a success body or an
 * {@link ErrorResponse}. Expected failures come back as values; anything
 * a manager throws propagates to the application's error handler.
 *
 * The acting user is whoever the upstream gateway authenticated, passed
 * in `RequestContext.actorId`.
 *
 * @module controllers/challengeController
 */

import {
  CHALLENGE_ERROR_CODES,
  OtpPurpose,
  PasskeyChallengeType,
  PushAuthDecision,
  PushAuthPurpose,
  type Actor,
  type AuthMethodView,
  type ErrorResponse,
  type OtpChannel,
  type PushAuthRequest,
  type PushAuthStatus,
} from '../types/index.js';
import { parseAuthMethodType } from '../policy/authMethodPolicy.js';
import { formatErrorResponse, formatFailure, formatValidationError } from '../utils/responses.js';
import { toView, type AuthMethodRegistry } from '../services/authMethodRegistry.js';
import type { OtpChallengeManager } from '../services/otpChallengeManager.js';
import type { PasskeyChallengeManager } from '../services/passkeyChallengeManager.js';
import type { PushAuthRequestManager } from '../services/pushAuthRequestManager.js';

// ─── Dependencies & Context ──────────────────────────────────────────────────

export interface ChallengeDependencies {
  otp: OtpChallengeManager;
  passkey: PasskeyChallengeManager;
  push: PushAuthRequestManager;
  registry: AuthMethodRegistry;
}

export interface RequestContext {
  requestId: string;
  ipAddress: string | null;
  userAgent: string | null;
  /** Authenticated user making the call, when there is one. */
  actorId: string | null;
}

// ─── Response Bodies ─────────────────────────────────────────────────────────

export interface OtpIssuedBody {
  success: true;
  sessionId: string;
  channel: OtpChannel;
  expiresAt: Date;
}

export interface OtpVerifiedBody {
  success: true;
  sessionId: string;
  purpose: OtpPurpose;
  userId: string | null;
  verifiedAt: Date | null;
}

export interface PasskeyChallengeBody {
  success: true;
  challengeId: string;
  challenge: string;
  expiresAt: Date;
}

export interface PasskeyConsumedBody {
  success: true;
  challengeId: string;
  type: PasskeyChallengeType;
  userId: string;
  credentialId: string | null;
}

export interface PushCreatedBody {
  success: true;
  requestId: string;
  challenge: string;
  expiresAt: Date;
}

export interface PushRequestView {
  id: string;
  userId: string;
  status: PushAuthStatus;
  purpose: PushAuthPurpose;
  createdAt: Date;
  expiresAt: Date;
  resolvedAt: Date | null;
}

export interface PushStatusBody {
  success: true;
  request: PushRequestView;
}

export interface PushCancelledBody {
  success: true;
  cancelled: number;
}

export interface MethodBody {
  success: true;
  method: AuthMethodView;
}

export interface MethodListBody {
  success: true;
  methods: AuthMethodView[];
}

type Result<T> = T | ErrorResponse;

// ─── Body Reading ────────────────────────────────────────────────────────────

/** Reads fields from an untyped JSON body, collecting per-field problems. */
class BodyReader {
  readonly fields: Record<string, string[]> = {};
  private readonly body: Record<string, unknown> = {};

  constructor(body: unknown) {
    if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
      for (const [key, value] of Object.entries(body)) this.body[key] = value;
    }
  }

  get ok(): boolean {
    return Object.keys(this.fields).length === 0;
  }

  raw(name: string): unknown {
    return this.body[name];
  }

  requiredString(name: string): string {
    const value = this.body[name];
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
    this.fail(name, 'is required');
    return '';
  }

  optionalString(name: string): string | null {
    const value = this.body[name];
    if (value === undefined || value === null) return null;
    if (typeof value === 'string') return value;
    this.fail(name, 'must be a string');
    return null;
  }

  optionalPositiveInt(name: string): number | undefined {
    const value = this.body[name];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
    this.fail(name, 'must be a positive integer');
    return undefined;
  }

  requiredBoolean(name: string): boolean {
    const value = this.body[name];
    if (typeof value === 'boolean') return value;
    this.fail(name, 'must be a boolean');
    return false;
  }

  enumValue<E extends string>(name: string, values: readonly [E, ...E[]], fallback?: E): E {
    const value = this.body[name];
    if ((value === undefined || value === null) && fallback !== undefined) return fallback;
    const match = values.find((candidate) => candidate === value);
    if (match !== undefined) return match;
    this.fail(name, `must be one of ${values.join(', ')}`);
    return fallback ?? values[0];
  }

  private fail(name: string, message: string): void {
    (this.fields[name] ??= []).push(message);
  }
}

const OTP_PURPOSES = [OtpPurpose.REGISTRATION, OtpPurpose.AUTHENTICATION] as const;
const PASSKEY_TYPES = [PasskeyChallengeType.REGISTRATION, PasskeyChallengeType.AUTHENTICATION] as const;
const PUSH_PURPOSES = [PushAuthPurpose.SIGN_IN, PushAuthPurpose.MFA, PushAuthPurpose.RECOVERY] as const;
const PUSH_DECISIONS = [PushAuthDecision.APPROVE, PushAuthDecision.DENY] as const;

function invalid(reader: BodyReader, ctx: RequestContext): ErrorResponse {
  return formatValidationError('Invalid request', reader.fields, ctx.requestId);
}

function requireActor(ctx: RequestContext): Actor | ErrorResponse {
  if (ctx.actorId) return { id: ctx.actorId };
  return formatErrorResponse(
    CHALLENGE_ERROR_CODES.FORBIDDEN,
    'An authenticated user is required.',
    ctx.requestId,
  );
}

function toPushView(request: PushAuthRequest): PushRequestView {
  return {
    id: request.id,
    userId: request.userId,
    status: request.status,
    purpose: request.purpose,
    createdAt: request.createdAt,
    expiresAt: request.expiresAt,
    resolvedAt: request.resolvedAt,
  };
}

// ─── OTP ─────────────────────────────────────────────────────────────────────

export async function issueOtp(
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'otp'>,
): Promise<Result<OtpIssuedBody>> {
  const reader = new BodyReader(body);
  const identifier = reader.requiredString('identifier');
  const purpose = reader.enumValue('purpose', OTP_PURPOSES);
  const countryCode = reader.optionalString('countryCode');
  const userId = reader.optionalString('userId');
  const ttlSeconds = reader.optionalPositiveInt('ttlSeconds');
  if (!reader.ok) return invalid(reader, ctx);

  const issued = await deps.otp.issue({ identifier, countryCode, purpose, userId, ttlSeconds });
  return { success: true, ...issued };
}

export async function verifyOtp(
  sessionId: string,
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'otp'>,
): Promise<Result<OtpVerifiedBody>> {
  const reader = new BodyReader(body);
  const code = reader.requiredString('code');
  if (!reader.ok) return invalid(reader, ctx);

  const result = await deps.otp.verify(sessionId, code);
  if (result.success) {
    return {
      success: true,
      sessionId: result.session.id,
      purpose: result.session.purpose,
      userId: result.session.userId,
      verifiedAt: result.session.verifiedAt,
    };
  }
  if (result.reason === 'INVALID_CODE') {
    return formatFailure('INVALID_CODE', ctx.requestId, { remainingAttempts: result.remainingAttempts });
  }
  return formatFailure(result.reason, ctx.requestId);
}

// ─── Passkey ─────────────────────────────────────────────────────────────────

export async function issuePasskeyChallenge(
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'passkey'>,
): Promise<Result<PasskeyChallengeBody>> {
  const reader = new BodyReader(body);
  const userId = reader.requiredString('userId');
  const type = reader.enumValue('type', PASSKEY_TYPES);
  const sessionId = reader.optionalString('sessionId');
  const credentialId = reader.optionalString('credentialId');
  const ttlSeconds = reader.optionalPositiveInt('ttlSeconds');
  if (!reader.ok) return invalid(reader, ctx);

  const issued = await deps.passkey.issue({ userId, type, sessionId, credentialId, ttlSeconds });
  return { success: true, ...issued };
}

export async function consumePasskeyChallenge(
  challengeId: string,
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'passkey'>,
): Promise<Result<PasskeyConsumedBody>> {
  const reader = new BodyReader(body);
  const credentialId = reader.optionalString('credentialId');
  if (!reader.ok) return invalid(reader, ctx);

  const result = await deps.passkey.consume(challengeId, credentialId);
  if (!result.success) return formatFailure(result.reason, ctx.requestId);
  return {
    success: true,
    challengeId: result.challenge.id,
    type: result.challenge.type,
    userId: result.challenge.userId,
    credentialId: result.challenge.respondingCredentialId,
  };
}

// ─── Push ────────────────────────────────────────────────────────────────────

export async function createPushAuthRequest(
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'push'>,
): Promise<Result<PushCreatedBody>> {
  const reader = new BodyReader(body);
  const userId = reader.requiredString('userId');
  const purpose = reader.enumValue('purpose', PUSH_PURPOSES, PushAuthPurpose.SIGN_IN);
  const location = reader.optionalString('location');
  const ttlSeconds = reader.optionalPositiveInt('ttlSeconds');
  if (!reader.ok) return invalid(reader, ctx);

  const created = await deps.push.create({
    userId,
    purpose,
    location,
    ttlSeconds,
    ipAddress: ctx.ipAddress,
    userAgent: ctx.userAgent,
  });
  return { success: true, ...created };
}

export async function respondPushAuth(
  requestId: string,
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'push'>,
): Promise<Result<PushStatusBody>> {
  const actor = requireActor(ctx);
  if ('success' in actor) return actor;

  const reader = new BodyReader(body);
  const decision = reader.enumValue('decision', PUSH_DECISIONS);
  if (!reader.ok) return invalid(reader, ctx);

  const result = await deps.push.respond(requestId, decision, actor);
  if (!result.success) return formatFailure(result.reason, ctx.requestId);
  return { success: true, request: toPushView(result.request) };
}

export async function pollPushAuthStatus(
  requestId: string,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'push'>,
): Promise<Result<PushStatusBody>> {
  const request = await deps.push.poll(requestId);
  if (!request) return formatFailure('NOT_FOUND', ctx.requestId);
  return { success: true, request: toPushView(request) };
}

/** Cancel every pending push request of the calling user. */
export async function cancelPendingPushAuth(
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'push'>,
): Promise<Result<PushCancelledBody>> {
  const actor = requireActor(ctx);
  if ('success' in actor) return actor;

  const cancelled = await deps.push.cancelPendingForUser(actor.id, actor);
  return { success: true, cancelled };
}

// ─── Authentication Methods ──────────────────────────────────────────────────

/** OTP methods start unverified; only a verified code flips the flag. */
function claimsVerified(metadata: unknown): boolean {
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'verified' in metadata &&
    metadata.verified !== undefined &&
    metadata.verified !== false
  );
}

export async function registerAuthMethod(
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'registry'>,
): Promise<Result<MethodBody>> {
  const actor = requireActor(ctx);
  if ('success' in actor) return actor;

  const reader = new BodyReader(body);
  const type = parseAuthMethodType(reader.raw('type'));
  const displayName = reader.optionalString('displayName');
  if (!type) {
    return formatValidationError('Invalid request', { type: ['is not a supported method type'] }, ctx.requestId);
  }
  if (!reader.ok) return invalid(reader, ctx);

  const metadata = reader.raw('metadata');
  if ((type === 'SMS_OTP' || type === 'EMAIL_OTP') && claimsVerified(metadata)) {
    return formatValidationError(
      'Invalid request',
      { 'metadata.verified': ['is set only by verifying a code'] },
      ctx.requestId,
    );
  }

  const method = await deps.registry.register(
    actor.id,
    type,
    metadata,
    actor,
    displayName ?? undefined,
  );
  return { success: true, method: toView(method) };
}

export async function listAuthMethods(
  userId: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'registry'>,
): Promise<Result<MethodListBody>> {
  if (typeof userId !== 'string' || userId.trim().length === 0) {
    return formatValidationError('Invalid request', { userId: ['is required'] }, ctx.requestId);
  }
  return { success: true, methods: await deps.registry.list(userId.trim()) };
}

export async function setAuthMethodEnabled(
  methodId: string,
  body: unknown,
  ctx: RequestContext,
  deps: Pick<ChallengeDependencies, 'registry'>,
): Promise<Result<MethodBody>> {
  const actor = requireActor(ctx);
  if ('success' in actor) return actor;

  const reader = new BodyReader(body);
  const enabled = reader.requiredBoolean('enabled');
  if (!reader.ok) return invalid(reader, ctx);

  const existing = await deps.registry.get(methodId);
  if (existing && existing.userId !== actor.id) return formatFailure('USER_MISMATCH', ctx.requestId);

  const method = existing ? await deps.registry.setEnabled(methodId, enabled, actor) : null;
  if (!method) {
    return formatErrorResponse(
      CHALLENGE_ERROR_CODES.NOT_FOUND,
      'Authentication method not found.',
      ctx.requestId,
    );
  }
  return { success: true, method: toView(method) };
}
