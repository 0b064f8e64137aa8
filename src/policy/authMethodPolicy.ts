/**
 * Authentication method policy: type parsing, metadata construction,
 * configuration checks, security levels and display labels.
 *
 * Metadata arrives as untyped JSON (request bodies, stored documents) and
 * leaves as one of the {@link AuthMethodMetadata} variants. Construction
 * reports every offending field at once.
 *
 * @module policy/authMethodPolicy
 */

import {
  OAUTH_PROVIDERS,
  SecurityLevel,
  type AuthMethodMetadata,
  type AuthMethodType,
  type AuthenticationMethod,
  type OAuthProvider,
  type TotpAlgorithm,
} from '../types/index.js';
import { InvalidMetadataError } from '../utils/errors.js';
import { maskEmail, maskPhone } from '../utils/masking.js';
import { normalizePhone, validateEmail } from '../utils/validators/identifierValidator.js';

export const AUTH_METHOD_TYPES: readonly AuthMethodType[] = [
  'PASSKEY',
  'TOTP',
  'SMS_OTP',
  'EMAIL_OTP',
  ...OAUTH_PROVIDERS.map((provider) => oauthType(provider)),
];

const TOTP_ALGORITHMS: readonly TotpAlgorithm[] = ['SHA1', 'SHA256', 'SHA512'];

const SECURITY_RANK: Record<SecurityLevel, number> = {
  [SecurityLevel.LOW]: 1,
  [SecurityLevel.MEDIUM]: 2,
  [SecurityLevel.HIGH]: 3,
};

const PROVIDER_LABELS: Record<OAuthProvider, string> = {
  GOOGLE: 'Google Account',
  FACEBOOK: 'Facebook Account',
  MICROSOFT: 'Microsoft Account',
  GITHUB: 'GitHub Account',
  APPLE: 'Apple ID',
};

function oauthType(provider: OAuthProvider): AuthMethodType {
  return `OAUTH_${provider}`;
}

export function parseAuthMethodType(value: unknown): AuthMethodType | null {
  return AUTH_METHOD_TYPES.find((type) => type === value) ?? null;
}

/** Provider of an `OAUTH_*` type, or null for every other type. */
export function oauthProviderOf(type: AuthMethodType): OAuthProvider | null {
  return OAUTH_PROVIDERS.find((provider) => oauthType(provider) === type) ?? null;
}

// ─── Metadata Construction ───────────────────────────────────────────────────

/** Collects per-field problems while reading an untyped metadata object. */
class MetadataReader {
  readonly errors: Record<string, string[]> = {};
  private readonly source: Record<string, unknown>;

  constructor(input: unknown) {
    this.source = {};
    if (typeof input === 'object' && input !== null && !Array.isArray(input)) {
      for (const [key, value] of Object.entries(input)) {
        this.source[key] = value;
      }
    } else {
      this.fail('metadata', 'must be an object');
    }
  }

  get ok(): boolean {
    return Object.keys(this.errors).length === 0;
  }

  fail(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  required(field: string): string {
    const value = this.source[field];
    if (value === undefined || value === null) {
      this.fail(field, 'is required');
      return '';
    }
    if (typeof value !== 'string' || value.trim().length === 0) {
      this.fail(field, 'must be a non-empty string');
      return '';
    }
    return value.trim();
  }

  optionalString(field: string): string | null {
    const value = this.source[field];
    if (value === undefined || value === null) return null;
    if (typeof value !== 'string') {
      this.fail(field, 'must be a string');
      return null;
    }
    return value;
  }

  integer(field: string, fallback: number, isAllowed: (n: number) => boolean, rule: string): number {
    const value = this.source[field];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || !isAllowed(value)) {
      this.fail(field, rule);
      return fallback;
    }
    return value;
  }

  boolean(field: string): boolean {
    const value = this.source[field];
    if (value === undefined || value === null) return false;
    if (typeof value !== 'boolean') {
      this.fail(field, 'must be a boolean');
      return false;
    }
    return value;
  }

  stringArray(field: string): string[] {
    const value = this.source[field];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      this.fail(field, 'must be an array of strings');
      return [];
    }
    return [...value];
  }

  oneOf<E extends string>(field: string, values: readonly E[], fallback: E): E {
    const value = this.source[field];
    if (value === undefined || value === null) return fallback;
    const match = values.find((candidate) => candidate === value);
    if (match === undefined) {
      this.fail(field, `must be one of ${values.join(', ')}`);
      return fallback;
    }
    return match;
  }
}

/**
 * Build strongly-typed metadata for a method type.
 *
 * Phone numbers are stored in E.164 and email addresses lower-cased, so
 * they compare equal to normalised OTP identifiers.
 *
 * @throws {InvalidMetadataError} Listing every missing or ill-typed field
 */
export function buildMetadata(type: AuthMethodType, input: unknown): AuthMethodMetadata {
  const reader = new MetadataReader(input);
  const metadata = readVariant(type, reader);
  if (!reader.ok) {
    throw new InvalidMetadataError(`Invalid metadata for ${type}`, reader.errors);
  }
  return metadata;
}

function readVariant(type: AuthMethodType, reader: MetadataReader): AuthMethodMetadata {
  switch (type) {
    case 'PASSKEY':
      return {
        kind: 'PASSKEY',
        credentialId: reader.required('credentialId'),
        publicKey: reader.required('publicKey'),
        signatureCount: reader.integer('signatureCount', 0, (n) => n >= 0, 'must be a non-negative integer'),
        aaguid: reader.optionalString('aaguid'),
        deviceName: reader.optionalString('deviceName'),
        transports: reader.stringArray('transports'),
      };
    case 'TOTP':
      return {
        kind: 'TOTP',
        secretKey: reader.required('secretKey'),
        algorithm: reader.oneOf('algorithm', TOTP_ALGORITHMS, 'SHA1'),
        digits: reader.integer('digits', 6, (n) => n >= 6 && n <= 8, 'must be between 6 and 8'),
        period: reader.integer('period', 30, (n) => n > 0, 'must be a positive integer'),
        verified: reader.boolean('verified'),
      };
    case 'SMS_OTP': {
      const raw = reader.required('phoneNumber');
      const countryCode = reader.optionalString('countryCode');
      const phoneNumber = raw ? normalizePhone(raw, countryCode) : null;
      if (raw && !phoneNumber) reader.fail('phoneNumber', 'must be a valid phone number');
      return {
        kind: 'SMS_OTP',
        phoneNumber: phoneNumber ?? raw,
        countryCode,
        verified: reader.boolean('verified'),
      };
    }
    case 'EMAIL_OTP': {
      const emailAddress = reader.required('emailAddress').toLowerCase();
      if (emailAddress && !validateEmail(emailAddress).valid) {
        reader.fail('emailAddress', 'must be a valid email address');
      }
      return { kind: 'EMAIL_OTP', emailAddress, verified: reader.boolean('verified') };
    }
    default: {
      const expected = oauthProviderOf(type);
      const provider = reader.required('provider');
      if (!expected) reader.fail('type', 'is not a supported method type');
      else if (provider && provider !== expected) {
        reader.fail('provider', `must match method type ${type}`);
      }
      return {
        kind: 'OAUTH',
        provider: expected ?? 'GOOGLE',
        providerUserId: reader.required('providerUserId'),
        email: reader.optionalString('email'),
        verified: reader.boolean('verified'),
      };
    }
  }
}

// ─── Derived Properties ──────────────────────────────────────────────────────

/** Whether the method can be used to authenticate. */
export function isConfigured(metadata: AuthMethodMetadata): boolean {
  switch (metadata.kind) {
    case 'PASSKEY':
      return metadata.credentialId.length > 0 && metadata.publicKey.length > 0;
    case 'TOTP':
      return metadata.secretKey.length > 0 && metadata.verified;
    case 'SMS_OTP':
      return metadata.phoneNumber.length > 0 && metadata.verified;
    case 'EMAIL_OTP':
      return metadata.emailAddress.length > 0 && metadata.verified;
    case 'OAUTH':
      return metadata.providerUserId.length > 0 && metadata.verified;
  }
}

export function securityLevel(type: AuthMethodType): SecurityLevel {
  switch (type) {
    case 'PASSKEY':
      return SecurityLevel.HIGH;
    case 'SMS_OTP':
    case 'EMAIL_OTP':
      return SecurityLevel.LOW;
    default:
      return SecurityLevel.MEDIUM;
  }
}

/** The higher of two levels. */
export function maxSecurityLevel(a: SecurityLevel, b: SecurityLevel): SecurityLevel {
  return SECURITY_RANK[a] >= SECURITY_RANK[b] ? a : b;
}

/** Human-readable name of a method type. */
export function methodLabel(type: AuthMethodType): string {
  switch (type) {
    case 'PASSKEY':
      return 'Passkey';
    case 'TOTP':
      return 'Authenticator App';
    case 'SMS_OTP':
      return 'SMS';
    case 'EMAIL_OTP':
      return 'Email';
    default: {
      const provider = oauthProviderOf(type);
      return provider ? PROVIDER_LABELS[provider] : type;
    }
  }
}

/** Masked phone or email for OTP methods, the type label otherwise. */
export function maskedIdentifier(method: Pick<AuthenticationMethod, 'type' | 'metadata'>): string {
  switch (method.metadata.kind) {
    case 'SMS_OTP':
      return maskPhone(method.metadata.phoneNumber);
    case 'EMAIL_OTP':
      return maskEmail(method.metadata.emailAddress);
    default:
      return methodLabel(method.type);
  }
}

/**
 * What makes an enrollment unique for its owner: the phone number, email
 * address, credential id or provider account. A user has at most one
 * authenticator app.
 */
export function enrollmentKey(metadata: AuthMethodMetadata): string {
  switch (metadata.kind) {
    case 'PASSKEY':
      return metadata.credentialId;
    case 'TOTP':
      return 'TOTP';
    case 'SMS_OTP':
      return metadata.phoneNumber;
    case 'EMAIL_OTP':
      return metadata.emailAddress;
    case 'OAUTH':
      return `${metadata.provider}:${metadata.providerUserId}`;
  }
}

/** Copy of `metadata` with its `verified` flag set, where it has one. */
export function withVerified(metadata: AuthMethodMetadata): AuthMethodMetadata {
  return metadata.kind === 'PASSKEY' ? metadata : { ...metadata, verified: true };
}
