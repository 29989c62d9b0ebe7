/**
 * @epcqr/checksum
 *
 * Mod-97 check digits for IBAN (ISO 13616) and RF creditor references
 * (ISO 11649). Pure functions, no dependencies.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { isValidIban, isValidRfReference } from '@epcqr/checksum';
 *
 * isValidIban('DE90 8306 5408 0004 1042 42'); // true
 * isValidRfReference('RF45G72UUR'); // true
 * ```
 */

export {
  MOD97_VALID_REMAINDER,
  computeCheckDigits,
  mod97,
  rearrange,
  toCheckDigitString,
} from './mod97.js';

export { IBAN_LIMITS, formatIban, isValidIban, normalizeIban } from './iban.js';

export { RF_LIMITS, RF_PREFIX, createRfReference, isValidRfReference } from './rf.js';
