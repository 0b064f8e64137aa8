/**
 * Core type definitions for the challenge & verification module.
 *
 * Records are plain data. Behaviour (validity checks, security levels,
 * masking) lives in the policy helpers and managers that operate on them.
 * Optional values are stored as explicit `null` so conditional writes can
 * match on them.
 */

// ─── Enums ───────────────────────────────────────────────────────────────────

export enum OtpPurpose {
  REGISTRATION = 'REGISTRATION',
  AUTHENTICATION = 'AUTHENTICATION',
}

export enum OtpChannel {
  SMS = 'SMS',
  EMAIL = 'EMAIL',
}

export enum PasskeyChallengeType {
  REGISTRATION = 'REGISTRATION',
  AUTHENTICATION = 'AUTHENTICATION',
}

export enum PushAuthStatus {
  PENDING = 'PENDING',
  APPROVED = 'APPROVED',
  DENIED = 'DENIED',
  EXPIRED = 'EXPIRED',
  CANCELLED = 'CANCELLED',
}

export enum PushAuthPurpose {
  SIGN_IN = 'SIGN_IN',
  MFA = 'MFA',
  RECOVERY = 'RECOVERY',
}

export enum PushAuthDecision {
  APPROVE = 'APPROVE',
  DENY = 'DENY',
}

export enum SecurityLevel {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
}

export const OAUTH_PROVIDERS = ['GOOGLE', 'FACEBOOK', 'MICROSOFT', 'GITHUB', 'APPLE'] as const;

export type OAuthProvider = (typeof OAUTH_PROVIDERS)[number];

export type OAuthMethodType = `OAUTH_${OAuthProvider}`;

export type AuthMethodType = 'PASSKEY' | 'TOTP' | 'SMS_OTP' | 'EMAIL_OTP' | OAuthMethodType;

/** Terminal push states; no transition leaves any of them. */
export const TERMINAL_PUSH_STATUSES: readonly PushAuthStatus[] = [
  PushAuthStatus.APPROVED,
  PushAuthStatus.DENIED,
  PushAuthStatus.EXPIRED,
  PushAuthStatus.CANCELLED,
];

// ─── Authentication Method Metadata ──────────────────────────────────────────

export type TotpAlgorithm = 'SHA1' | 'SHA256' | 'SHA512';

export interface PasskeyMetadata {
  kind: 'PASSKEY';
  credentialId: string;
  publicKey: string;
  signatureCount: number;
  aaguid: string | null;
  deviceName: string | null;
  transports: string[];
}

export interface TotpMetadata {
  kind: 'TOTP';
  secretKey: string;
  algorithm: TotpAlgorithm;
  digits: number;
  period: number;
  verified: boolean;
}

export interface SmsOtpMetadata {
  kind: 'SMS_OTP';
  phoneNumber: string;
  countryCode: string | null;
  verified: boolean;
}

export interface EmailOtpMetadata {
  kind: 'EMAIL_OTP';
  emailAddress: string;
  verified: boolean;
}

export interface OAuthMetadata {
  kind: 'OAUTH';
  provider: OAuthProvider;
  providerUserId: string;
  email: string | null;
  verified: boolean;
}

export type AuthMethodMetadata =
  | PasskeyMetadata
  | TotpMetadata
  | SmsOtpMetadata
  | EmailOtpMetadata
  | OAuthMetadata;

// ─── Data Models ─────────────────────────────────────────────────────────────

/** Every record kept in a document store carries a string id. */
export interface StoredDocument {
  id: string;
}

export interface AuthenticationMethod extends StoredDocument {
  userId: string;
  type: AuthMethodType;
  displayName: string;
  enabled: boolean;
  lastUsedAt: Date | null;
  metadata: AuthMethodMetadata;
  createdAt: Date;
  updatedAt: Date;
  createdBy: string;
  updatedBy: string;
}

export interface OtpSession extends StoredDocument {
  identifier: string;
  countryCode: string | null;
  channel: OtpChannel;
  userId: string | null;
  purpose: OtpPurpose;
  codeHash: string;
  salt: string;
  createdAt: Date;
  expiresAt: Date;
  attempts: number;
  maxAttempts: number;
  verified: boolean;
  verifiedAt: Date | null;
  lastAttemptAt: Date | null;
}

export interface PasskeyChallenge extends StoredDocument {
  challenge: string;
  userId: string;
  sessionId: string | null;
  credentialId: string | null;
  type: PasskeyChallengeType;
  used: boolean;
  usedAt: Date | null;
  respondingCredentialId: string | null;
  createdAt: Date;
  expiresAt: Date;
}

export interface PushAuthRequest extends StoredDocument {
  userId: string;
  challenge: string;
  status: PushAuthStatus;
  purpose: PushAuthPurpose;
  ipAddress: string | null;
  userAgent: string | null;
  location: string | null;
  createdAt: Date;
  expiresAt: Date;
  resolvedAt: Date | null;
  resolvedBy: string | null;
}

/** Last-issuance marker behind the store-backed re-issuance gate. */
export interface IssuanceMark extends StoredDocument {
  lastIssuedAt: Date;
}

// ─── Actors ──────────────────────────────────────────────────────────────────

/**
 * Whoever performs a mutating call. There is no implicit identity:
 * scheduled jobs pass their own job name.
 */
export interface Actor {
  id: string;
}

// ─── Result Types ────────────────────────────────────────────────────────────

export type OtpVerifyFailure = 'NOT_FOUND' | 'EXPIRED' | 'EXHAUSTED' | 'ALREADY_CONSUMED';

export type OtpVerifyResult =
  | { success: true; session: OtpSessionView }
  | { success: false; reason: OtpVerifyFailure }
  | { success: false; reason: 'INVALID_CODE'; remainingAttempts: number };

export type PasskeyConsumeFailure = 'NOT_FOUND' | 'EXPIRED' | 'ALREADY_USED' | 'CREDENTIAL_MISMATCH';

export type PasskeyConsumeResult =
  | { success: true; challenge: PasskeyChallenge }
  | { success: false; reason: PasskeyConsumeFailure };

export type PushRespondFailure = 'NOT_FOUND' | 'INVALID_TRANSITION' | 'EXPIRED' | 'USER_MISMATCH';

export type PushRespondResult =
  | { success: true; request: PushAuthRequest }
  | { success: false; reason: PushRespondFailure; status?: PushAuthStatus };

/** OTP session without its secret material. */
export type OtpSessionView = Omit<OtpSession, 'codeHash' | 'salt'>;

export interface AuthMethodView {
  id: string;
  userId: string;
  type: AuthMethodType;
  displayName: string;
  enabled: boolean;
  lastUsedAt: Date | null;
  createdAt: Date;
  maskedIdentifier: string;
  securityLevel: SecurityLevel;
  configured: boolean;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: Date;
}

// ─── API Response Types ──────────────────────────────────────────────────────

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string[]>;
    remainingAttempts?: number;
    retryAfterSeconds?: number;
  };
  requestId: string;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const CHALLENGE_ERROR_CODES = {
  INVALID_REQUEST: 'AUTH_INVALID_REQUEST',
  INVALID_METADATA: 'AUTH_INVALID_METADATA',
  RATE_LIMITED: 'AUTH_RATE_LIMITED',
  CHALLENGE_INVALID: 'AUTH_CHALLENGE_INVALID',
  CODE_INVALID: 'AUTH_CODE_INVALID',
  ATTEMPTS_EXHAUSTED: 'AUTH_ATTEMPTS_EXHAUSTED',
  ALREADY_CONSUMED: 'AUTH_ALREADY_CONSUMED',
  CREDENTIAL_MISMATCH: 'AUTH_CREDENTIAL_MISMATCH',
  INVALID_TRANSITION: 'AUTH_INVALID_TRANSITION',
  FORBIDDEN: 'AUTH_FORBIDDEN',
  NOT_FOUND: 'AUTH_NOT_FOUND',
  NOTIFICATION_FAILED: 'NOTIFICATION_SERVICE_ERROR',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ChallengeErrorCode = (typeof CHALLENGE_ERROR_CODES)[keyof typeof CHALLENGE_ERROR_CODES];
