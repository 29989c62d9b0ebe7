/**
 * IBAN Checksum Validation (ISO 13616)
 * Uses Mod-97 algorithm
 */

import { mod97, MOD97_VALID_REMAINDER } from './mod97.js';

/**
 * IBAN length bounds (country code and check digits included)
 */
export const IBAN_LIMITS = {
  minLength: 5,
  maxLength: 34,
} as const;

/**
 * Two uppercase letters (country), then uppercase letters or digits
 */
const IBAN_PATTERN = /^[A-Z]{2}[A-Z0-9]+$/;

const WHITESPACE = /\s/g;

/**
 * Validates an IBAN using the mod-97 algorithm
 *
 * Whitespace anywhere in the input is ignored. Letters must already be
 * uppercase; lowercase input is rejected rather than folded.
 *
 * @param identifier - IBAN string (spaces allowed)
 * @returns true if structure and checksum are valid
 */
export function isValidIban(identifier: string): boolean {
  const iban = identifier.replace(WHITESPACE, '');

  if (iban.length < IBAN_LIMITS.minLength || iban.length > IBAN_LIMITS.maxLength) {
    return false;
  }

  if (!IBAN_PATTERN.test(iban)) {
    return false;
  }

  return mod97(iban) === MOD97_VALID_REMAINDER;
}

/**
 * Normalizes an IBAN by removing whitespace and converting to uppercase
 */
export function normalizeIban(iban: string): string {
  return iban.replace(WHITESPACE, '').toUpperCase();
}

/**
 * Formats an IBAN with spaces every 4 characters for readability
 */
export function formatIban(iban: string): string {
  return normalizeIban(iban)
    .replace(/(.{4})/g, '$1 ')
    .trim();
}
