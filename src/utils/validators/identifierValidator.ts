/**
 * Validation and normalisation of OTP identifiers.
 *
 * An identifier is either an email address (delivered over EMAIL) or a
 * phone number (delivered over SMS). Normalised forms are what gets
 * stored, throttled on, and matched against enrolled methods:
 * - emails are trimmed and lower-cased;
 * - phone numbers are reduced to E.164 (`+` followed by digits), with the
 *   country calling code prefixed when the input lacks a leading `+`.
 *
 * @module utils/validators/identifierValidator
 */

import { OtpChannel, type ValidationResult } from '../../types/index.js';

/** RFC 5321 limits. */
const MAX_EMAIL_LENGTH = 254;
const MAX_LOCAL_PART_LENGTH = 64;

/**
 * Practical address pattern: dot-atom local part, dotted domain labels
 * without leading or trailing hyphens, alphabetic TLD.
 */
const EMAIL_REGEX =
  /^[a-z0-9!#$%&'*+/=?^_`{|}~-]+(?:\.[a-z0-9!#$%&'*+/=?^_`{|}~-]+)*@(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z]{2,}$/i;

/** E.164 allows at most 15 digits; shorter than 7 is never a subscriber number. */
const E164_REGEX = /^\+[1-9]\d{6,14}$/;

const COUNTRY_CODE_REGEX = /^\+?[1-9]\d{0,3}$/;

export interface NormalizedIdentifier {
  identifier: string;
  channel: OtpChannel;
  /** Calling code without `+`, or null for email identifiers. */
  countryCode: string | null;
}

/**
 * Validate an email address.
 *
 * @example
 * validateEmail('user@example.com'); // { valid: true, errors: [] }
 * validateEmail('user@'); // { valid: false, errors: ['Invalid email format'] }
 */
export function validateEmail(email: string): ValidationResult {
  const trimmed = email.trim();
  if (trimmed.length === 0) {
    return { valid: false, errors: ['Email is required'] };
  }
  if (trimmed.length > MAX_EMAIL_LENGTH) {
    return { valid: false, errors: [`Email must not exceed ${MAX_EMAIL_LENGTH} characters`] };
  }

  const atIndex = trimmed.lastIndexOf('@');
  if (atIndex > MAX_LOCAL_PART_LENGTH) {
    return {
      valid: false,
      errors: [`Email local part must not exceed ${MAX_LOCAL_PART_LENGTH} characters`],
    };
  }
  if (!EMAIL_REGEX.test(trimmed)) {
    return { valid: false, errors: ['Invalid email format'] };
  }
  return { valid: true, errors: [] };
}

/** Validate a phone number already in E.164 form. */
export function validatePhone(phoneNumber: string): ValidationResult {
  if (phoneNumber.trim().length === 0) {
    return { valid: false, errors: ['Phone number is required'] };
  }
  if (!E164_REGEX.test(phoneNumber)) {
    return { valid: false, errors: ['Phone number must be in international format'] };
  }
  return { valid: true, errors: [] };
}

/**
 * Reduce a phone number to E.164.
 *
 * Returns null when the result would not be a valid number, including a
 * national number supplied without a country code.
 */
export function normalizePhone(raw: string, countryCode?: string | null): string | null {
  const trimmed = raw.trim();
  const digits = trimmed.replace(/\D/g, '');
  if (digits.length === 0) return null;

  let normalized: string;
  if (trimmed.startsWith('+')) {
    normalized = `+${digits}`;
  } else {
    const code = normalizeCountryCode(countryCode);
    if (!code) return null;
    // national trunk prefix
    const national = digits.replace(/^0+/, '');
    normalized = `+${code}${national}`;
  }

  return validatePhone(normalized).valid ? normalized : null;
}

/** Calling code without `+`, or null when absent or malformed. */
export function normalizeCountryCode(countryCode?: string | null): string | null {
  if (!countryCode) return null;
  const trimmed = countryCode.trim();
  if (!COUNTRY_CODE_REGEX.test(trimmed)) return null;
  return trimmed.replace(/^\+/, '');
}

/**
 * Normalise an OTP identifier and pick its delivery channel.
 *
 * @returns null when the identifier is neither a valid email address nor
 *   a phone number that can be put into E.164
 */
export function normalizeIdentifier(
  raw: string,
  countryCode?: string | null,
): NormalizedIdentifier | null {
  if (raw.includes('@')) {
    const email = raw.trim().toLowerCase();
    if (!validateEmail(email).valid) return null;
    return { identifier: email, channel: OtpChannel.EMAIL, countryCode: null };
  }

  const phone = normalizePhone(raw, countryCode);
  if (!phone) return null;
  return {
    identifier: phone,
    channel: OtpChannel.SMS,
    countryCode: normalizeCountryCode(countryCode),
  };
}
