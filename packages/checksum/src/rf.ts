/**
 * RF Creditor Reference (ISO 11649)
 *
 * "RF" + two check digits + up to 21 alphanumeric characters,
 * checked with the same mod-97 scheme as IBAN.
 */

import { computeCheckDigits, mod97, MOD97_VALID_REMAINDER } from './mod97.js';

export const RF_PREFIX = 'RF';

/**
 * RF reference length bounds
 */
export const RF_LIMITS = {
  minLength: 5,
  maxLength: 25,
  /** Characters after prefix and check digits */
  maxBodyLength: 21,
} as const;

const RF_PATTERN = /^RF[A-Z0-9]+$/;
const RF_BODY_PATTERN = /^[A-Z0-9]+$/;

/**
 * Check a structured creditor reference.
 *
 * Unlike {@link isValidIban} no whitespace is stripped; callers pass the
 * reference exactly as it will be transmitted.
 */
export function isValidRfReference(identifier: string): boolean {
  if (identifier.length < RF_LIMITS.minLength || identifier.length > RF_LIMITS.maxLength) {
    return false;
  }

  if (!RF_PATTERN.test(identifier)) {
    return false;
  }

  return mod97(identifier) === MOD97_VALID_REMAINDER;
}

/**
 * Create an RF reference for a creditor's own reference body
 *
 * @param body - 1-21 uppercase letters or digits
 * @returns Reference with computed check digits, e.g. "RF45G72UUR"
 * @throws RangeError if the body cannot form a valid reference
 */
export function createRfReference(body: string): string {
  if (body.length === 0 || body.length > RF_LIMITS.maxBodyLength) {
    throw new RangeError(
      `RF reference body must be 1-${RF_LIMITS.maxBodyLength} characters, got ${body.length}`
    );
  }
  if (!RF_BODY_PATTERN.test(body)) {
    throw new RangeError('RF reference body must contain only uppercase letters and digits');
  }

  return `${RF_PREFIX}${computeCheckDigits(RF_PREFIX, body)}${body}`;
}
