/**
 * Hashing and randomness for challenges.
 *
 * OTP codes are stored only as `SHA-256(salt || code)` and compared in
 * constant time. Codes, salts and challenge values all come from a
 * {@link RandomSource}, which tests replace with a deterministic one.
 *
 * @module crypto/challengeCrypto
 */

import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';

export interface Hasher {
  hash(code: string, salt: string): string;
  /** Constant-time comparison of `code` against a stored hash. */
  verify(code: string, salt: string, expectedHash: string): boolean;
}

export interface RandomSource {
  bytes(length: number): Buffer;
}

/** Bytes at or above this bound are rejected so `byte % 10` stays uniform. */
const DIGIT_REJECTION_BOUND = 250;

export const SALT_BYTES = 16;
export const CHALLENGE_BYTES = 32;

/** Salted SHA-256, hex encoded. */
export class Sha256Hasher implements Hasher {
  hash(code: string, salt: string): string {
    return createHash('sha256').update(salt).update(code).digest('hex');
  }

  verify(code: string, salt: string, expectedHash: string): boolean {
    const actual = Buffer.from(this.hash(code, salt), 'hex');
    const expected = Buffer.from(expectedHash, 'hex');
    if (actual.length !== expected.length) return false;
    return timingSafeEqual(actual, expected);
  }
}

export const cryptoRandomSource: RandomSource = {
  bytes: (length) => randomBytes(length),
};

/**
 * Uniformly distributed numeric code of `length` digits (leading zeros
 * allowed), drawn by rejection sampling.
 */
export function generateNumericCode(random: RandomSource, length: number): string {
  let code = '';
  while (code.length < length) {
    for (const byte of random.bytes(length - code.length)) {
      if (byte < DIGIT_REJECTION_BOUND) code += String(byte % 10);
    }
  }
  return code;
}

/** Fresh hex salt. */
export function generateSalt(random: RandomSource): string {
  return random.bytes(SALT_BYTES).toString('hex');
}

/** 32 random bytes, base64url without padding. */
export function generateChallenge(random: RandomSource): string {
  return random.bytes(CHALLENGE_BYTES).toString('base64url');
}
