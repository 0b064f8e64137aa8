/**
 * Unit tests for identifier validation and normalisation.
 *
 * @module utils/validators/identifierValidator.test
 */

import { describe, it, expect } from 'vitest';
import { OtpChannel } from '../../types/index.js';
import {
  normalizeCountryCode,
  normalizeIdentifier,
  normalizePhone,
  validateEmail,
  validatePhone,
} from './identifierValidator.js';

describe('validateEmail', () => {
  it('should accept a simple email', () => {
    expect(validateEmail('user@example.com')).toEqual({ valid: true, errors: [] });
  });

  it('should accept plus addressing and subdomains', () => {
    expect(validateEmail('first.last+tag@mail.example.co.uk').valid).toBe(true);
  });

  it('should reject an empty value', () => {
    expect(validateEmail('   ')).toEqual({ valid: false, errors: ['Email is required'] });
  });

  it('should reject a missing domain', () => {
    expect(validateEmail('user@')).toEqual({ valid: false, errors: ['Invalid email format'] });
  });

  it('should reject consecutive dots in the local part', () => {
    expect(validateEmail('a..b@example.com').valid).toBe(false);
  });

  it('should reject an over-long local part', () => {
    const result = validateEmail(`${'a'.repeat(65)}@example.com`);
    expect(result.errors).toEqual(['Email local part must not exceed 64 characters']);
  });

  it('should reject an over-long address', () => {
    const result = validateEmail(`user@${'a'.repeat(250)}.com`);
    expect(result.errors).toEqual(['Email must not exceed 254 characters']);
  });
});

describe('validatePhone', () => {
  it('should accept E.164 numbers', () => {
    expect(validatePhone('+15551234567').valid).toBe(true);
  });

  it('should reject numbers without a leading +', () => {
    expect(validatePhone('15551234567').errors).toEqual([
      'Phone number must be in international format',
    ]);
  });

  it('should reject numbers longer than 15 digits', () => {
    expect(validatePhone('+1234567890123456').valid).toBe(false);
  });
});

describe('normalizePhone', () => {
  it('should strip formatting from an international number', () => {
    expect(normalizePhone('+1 (555) 123-4567')).toBe('+15551234567');
  });

  it('should prefix the country code to a national number', () => {
    expect(normalizePhone('555-123-4567', '1')).toBe('+15551234567');
  });

  it('should drop the national trunk prefix', () => {
    expect(normalizePhone('08012345678', '+234')).toBe('+2348012345678');
  });

  it('should ignore the country code when the number already has +', () => {
    expect(normalizePhone('+447700900123', '1')).toBe('+447700900123');
  });

  it('should return null for a national number without a country code', () => {
    expect(normalizePhone('5551234567')).toBeNull();
  });

  it('should return null when there are no digits', () => {
    expect(normalizePhone('call me')).toBeNull();
  });
});

describe('normalizeCountryCode', () => {
  it('should strip the leading +', () => {
    expect(normalizeCountryCode('+44')).toBe('44');
  });

  it('should reject malformed codes', () => {
    expect(normalizeCountryCode('0')).toBeNull();
    expect(normalizeCountryCode('12345')).toBeNull();
    expect(normalizeCountryCode(null)).toBeNull();
  });
});

describe('normalizeIdentifier', () => {
  it('should lower-case and trim emails and choose EMAIL', () => {
    expect(normalizeIdentifier('  Alice@Example.COM ')).toEqual({
      identifier: 'alice@example.com',
      channel: OtpChannel.EMAIL,
      countryCode: null,
    });
  });

  it('should normalise phone numbers and choose SMS', () => {
    expect(normalizeIdentifier('(555) 123-4567', '+1')).toEqual({
      identifier: '+15551234567',
      channel: OtpChannel.SMS,
      countryCode: '1',
    });
  });

  it('should return null for an invalid email', () => {
    expect(normalizeIdentifier('alice@')).toBeNull();
  });

  it('should return null for an unusable phone number', () => {
    expect(normalizeIdentifier('12')).toBeNull();
  });
});
