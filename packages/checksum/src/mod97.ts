/**
 * ISO 7064 MOD 97-10
 *
 * Shared by IBAN (ISO 13616) and RF creditor references (ISO 11649):
 * the first four characters move to the end, letters map to 10-35
 * (A=10 ... Z=35) and the resulting digit string is read as a decimal
 * number. A check passes when that number is 1 modulo 97.
 */

const CODE_A = 65;
const CODE_Z = 90;
const CODE_0 = 48;

/**
 * Remainder that a valid identifier leaves modulo 97
 */
export const MOD97_VALID_REMAINDER = 1;

function isUppercaseLetter(code: number): boolean {
  return code >= CODE_A && code <= CODE_Z;
}

/**
 * Convert an uppercase letter's char code to its check value
 * A=10, B=11, ..., Z=35
 */
function letterValue(code: number): number {
  return code - CODE_A + 10;
}

/**
 * Move the first four characters to the end
 */
export function rearrange(identifier: string): string {
  return identifier.slice(4) + identifier.slice(0, 4);
}

/**
 * Rearranged identifier with every letter replaced by its two-digit value.
 *
 * Mostly useful for diagnostics; the check itself runs on {@link mod97},
 * which never materialises this string as a number.
 */
export function toCheckDigitString(identifier: string): string {
  let digits = '';

  for (const char of rearrange(identifier)) {
    const code = char.charCodeAt(0);
    digits += isUppercaseLetter(code) ? letterValue(code).toString() : char;
  }

  return digits;
}

/**
 * Calculate the rearranged identifier modulo 97.
 *
 * Reduced one character at a time (a letter contributes two digits),
 * so the accumulator never exceeds 97 * 100 regardless of input length.
 * Input must already be restricted to A-Z and 0-9.
 */
export function mod97(identifier: string): number {
  let remainder = 0;

  for (const char of rearrange(identifier)) {
    const code = char.charCodeAt(0);
    if (isUppercaseLetter(code)) {
      remainder = (remainder * 100 + letterValue(code)) % 97;
    } else {
      remainder = (remainder * 10 + (code - CODE_0)) % 97;
    }
  }

  return remainder;
}

/**
 * Compute the two check digits for a prefix and body
 *
 * @param prefix - Two uppercase letters (country code, or "RF")
 * @param body - Uppercase alphanumeric remainder of the identifier
 * @returns Check digits, zero padded ("02" ... "98")
 */
export function computeCheckDigits(prefix: string, body: string): string {
  const remainder = mod97(`${prefix}00${body}`);
  return (98 - remainder).toString().padStart(2, '0');
}
