/**
 * Display masking for phone numbers and email addresses.
 *
 * Used for the `maskedIdentifier` of enrolled methods and for every log
 * line that mentions a challenge identifier.
 *
 * @module utils/masking
 */

const BULLET = '•';
const PHONE_PREFIX = `+${BULLET} (${BULLET.repeat(3)}) ${BULLET.repeat(3)}-`;

/** `+15550001234` → `+• (•••) •••-1234`. */
export function maskPhone(phoneNumber: string): string {
  const digits = phoneNumber.replace(/\D/g, '');
  return PHONE_PREFIX + digits.slice(-4);
}

/**
 * `alice@example.com` → `al••@example.com`; local parts of two
 * characters or fewer are hidden entirely (`••@example.com`).
 */
export function maskEmail(emailAddress: string): string {
  const at = emailAddress.lastIndexOf('@');
  if (at < 0) return BULLET.repeat(2);

  const local = emailAddress.slice(0, at);
  const domain = emailAddress.slice(at + 1);
  const visible = local.length <= 2 ? '' : local.slice(0, 2);
  return `${visible}${BULLET.repeat(2)}@${domain}`;
}

/** Mask an OTP identifier of either channel. */
export function maskIdentifier(identifier: string): string {
  return identifier.includes('@') ? maskEmail(identifier) : maskPhone(identifier);
}
