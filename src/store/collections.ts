/**
 * Collection schemas: name, backing table and decoder for every record
 * type the challenge module stores.
 *
 * @module store/collections
 */

import {
  OtpChannel,
  OtpPurpose,
  PasskeyChallengeType,
  PushAuthPurpose,
  PushAuthStatus,
  type AuthMethodMetadata,
  type AuthMethodType,
  type AuthenticationMethod,
  type IssuanceMark,
  type OtpSession,
  type PasskeyChallenge,
  type PushAuthRequest,
} from '../types/index.js';
import { buildMetadata, parseAuthMethodType } from '../policy/authMethodPolicy.js';
import { InvalidMetadataError } from '../utils/errors.js';
import { DocumentDecodeError, FieldReader, type CollectionSchema } from './codec.js';

const enumValues = <E extends string>(values: Record<string, E>): E[] => Object.values(values);

export const otpSessions: CollectionSchema<OtpSession> = {
  name: 'otpSessions',
  table: 'otp_sessions',
  decode(raw) {
    const f = new FieldReader(raw, this.name);
    return {
      id: f.string('id'),
      identifier: f.string('identifier'),
      countryCode: f.nullableString('countryCode'),
      channel: f.oneOf('channel', enumValues(OtpChannel)),
      userId: f.nullableString('userId'),
      purpose: f.oneOf('purpose', enumValues(OtpPurpose)),
      codeHash: f.string('codeHash'),
      salt: f.string('salt'),
      createdAt: f.date('createdAt'),
      expiresAt: f.date('expiresAt'),
      attempts: f.number('attempts'),
      maxAttempts: f.number('maxAttempts'),
      verified: f.boolean('verified'),
      verifiedAt: f.nullableDate('verifiedAt'),
      lastAttemptAt: f.nullableDate('lastAttemptAt'),
    };
  },
};

export const passkeyChallenges: CollectionSchema<PasskeyChallenge> = {
  name: 'passkeyChallenges',
  table: 'passkey_challenges',
  decode(raw) {
    const f = new FieldReader(raw, this.name);
    return {
      id: f.string('id'),
      challenge: f.string('challenge'),
      userId: f.string('userId'),
      sessionId: f.nullableString('sessionId'),
      credentialId: f.nullableString('credentialId'),
      type: f.oneOf('type', enumValues(PasskeyChallengeType)),
      used: f.boolean('used'),
      usedAt: f.nullableDate('usedAt'),
      respondingCredentialId: f.nullableString('respondingCredentialId'),
      createdAt: f.date('createdAt'),
      expiresAt: f.date('expiresAt'),
    };
  },
};

export const pushAuthRequests: CollectionSchema<PushAuthRequest> = {
  name: 'pushAuthRequests',
  table: 'push_auth_requests',
  decode(raw) {
    const f = new FieldReader(raw, this.name);
    return {
      id: f.string('id'),
      userId: f.string('userId'),
      challenge: f.string('challenge'),
      status: f.oneOf('status', enumValues(PushAuthStatus)),
      purpose: f.oneOf('purpose', enumValues(PushAuthPurpose)),
      ipAddress: f.nullableString('ipAddress'),
      userAgent: f.nullableString('userAgent'),
      location: f.nullableString('location'),
      createdAt: f.date('createdAt'),
      expiresAt: f.date('expiresAt'),
      resolvedAt: f.nullableDate('resolvedAt'),
      resolvedBy: f.nullableString('resolvedBy'),
    };
  },
};

export const authMethods: CollectionSchema<AuthenticationMethod> = {
  name: 'authMethods',
  table: 'auth_methods',
  decode(raw) {
    const f = new FieldReader(raw, this.name);
    const type = parseAuthMethodType(f.raw('type'));
    if (!type) throw new DocumentDecodeError(this.name, 'type', 'an authentication method type');

    return {
      id: f.string('id'),
      userId: f.string('userId'),
      type,
      displayName: f.string('displayName'),
      enabled: f.boolean('enabled'),
      lastUsedAt: f.nullableDate('lastUsedAt'),
      metadata: decodeMetadata(this.name, type, f.raw('metadata')),
      createdAt: f.date('createdAt'),
      updatedAt: f.date('updatedAt'),
      createdBy: f.string('createdBy'),
      updatedBy: f.string('updatedBy'),
    };
  },
};

function decodeMetadata(collection: string, type: AuthMethodType, raw: unknown): AuthMethodMetadata {
  try {
    return buildMetadata(type, raw);
  } catch (err) {
    if (err instanceof InvalidMetadataError) {
      throw new DocumentDecodeError(collection, 'metadata', `valid ${type} metadata`);
    }
    throw err;
  }
}

export const issuanceMarks: CollectionSchema<IssuanceMark> = {
  name: 'issuanceMarks',
  table: 'issuance_marks',
  decode(raw) {
    const f = new FieldReader(raw, this.name);
    return { id: f.string('id'), lastIssuedAt: f.date('lastIssuedAt') };
  },
};

/** Every collection, in migration order. */
export const ALL_COLLECTIONS = [
  otpSessions,
  passkeyChallenges,
  pushAuthRequests,
  authMethods,
  issuanceMarks,
] as const;
