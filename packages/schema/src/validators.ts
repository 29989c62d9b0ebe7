/**
 * Field validators
 *
 * Zod schemas for the individual payload fields, plus the schema for raw
 * payment input (JSON/YAML documents, CLI flags) accepted by
 * PayloadBuilder.fromInput().
 */

import { z } from 'zod';
import { isValidIban, isValidRfReference } from '@epcqr/checksum';
import {
  BENE_PURPOSE_CODE,
  CHARACTER_SETS,
  CHARACTER_SET_CODES,
  IDENTIFICATIONS,
  IDENTIFICATION_CODES,
  PAYLOAD_LIMITS,
  VERSIONS,
  VERSION_CODES,
} from './constants.js';
import { PURPOSE_BENE, customPurpose, remittanceReference, remittanceText } from './fields.js';
import type { Purpose, Remittance } from './types.js';

// ============================================================================
// Patterns
// ============================================================================

/**
 * Amount grammar: 1-9 integer digits, a dot, exactly 2 decimals.
 * No sign, no thousands separator, no exponent.
 */
export const AMOUNT_PATTERN = /^[0-9]{1,9}\.[0-9]{2}$/;

const ZERO_AMOUNT_PATTERN = /^0+\.00$/;

/**
 * Custom purpose code: exactly 4 uppercase ASCII letters
 */
export const PURPOSE_CODE_PATTERN = /^[A-Z]{4}$/;

// ============================================================================
// Field Schemas
// ============================================================================

export const AmountSchema = z
  .string()
  .regex(AMOUNT_PATTERN, 'Invalid amount format (expected 1-9 digits, a dot and 2 decimals)')
  .refine((value) => !ZERO_AMOUNT_PATTERN.test(value), 'Amount must be at least 0.01');

export const PurposeCodeSchema = z
  .string()
  .regex(PURPOSE_CODE_PATTERN, 'Invalid purpose code (expected 4 uppercase letters)');

export const IbanSchema = z.string().refine(isValidIban, 'Invalid IBAN');

export const RfReferenceSchema = z.string().refine(isValidRfReference, 'Invalid RF creditor reference');

/**
 * Length is counted in code points, so characters outside the BMP count once
 */
export const RemittanceTextSchema = z
  .string()
  .refine(
    (text) => [...text].length <= PAYLOAD_LIMITS.maxRemittanceTextLength,
    `Remittance text exceeds ${PAYLOAD_LIMITS.maxRemittanceTextLength} characters`
  );

// ============================================================================
// Field Checks
// ============================================================================

export function isValidAmount(amount: string): boolean {
  return AmountSchema.safeParse(amount).success;
}

export function isValidPurpose(purpose: Purpose): boolean {
  return purpose.type === 'bene' || PurposeCodeSchema.safeParse(purpose.code).success;
}

export function isValidRemittanceText(text: string): boolean {
  return RemittanceTextSchema.safeParse(text).success;
}

// ============================================================================
// Raw Input
// ============================================================================

/**
 * Accept either the enum name ("V1") or its wire code ("001")
 */
function nameOrCode<T extends string>(names: readonly T[], codes: Readonly<Record<T, string>>) {
  return z.string().transform((value, ctx): T => {
    const name = names.find((candidate) => candidate === value || codes[candidate] === value);
    if (name === undefined) {
      const accepted = names.flatMap((candidate) => [candidate, codes[candidate]]);
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected one of ${[...new Set(accepted)].join(', ')}`,
      });
      return z.NEVER;
    }
    return name;
  });
}

/**
 * Raw payment input
 *
 * Only the shape is checked here. Field rules (checksums, amount grammar,
 * purpose code, text length) are left to PayloadBuilder.build() so that
 * every payload error is reported through the same error kinds.
 */
export const PaymentInputSchema = z
  .object({
    version: nameOrCode(VERSIONS, VERSION_CODES).optional(),
    characterSet: nameOrCode(CHARACTER_SETS, CHARACTER_SET_CODES).optional(),
    identification: nameOrCode(IDENTIFICATIONS, IDENTIFICATION_CODES).optional(),
    bic: z.string().optional(),
    beneficiary: z.string().optional(),
    iban: z.string().optional(),
    amount: z.string().optional(),
    purpose: z.string().optional(),
    reference: z.string().optional(),
    text: z.string().optional(),
    information: z.string().optional(),
  })
  .strict()
  .refine((input) => input.reference === undefined || input.text === undefined, {
    message: 'reference and text are mutually exclusive',
    path: ['reference'],
  });

export type PaymentInput = z.infer<typeof PaymentInputSchema>;

/**
 * Map a purpose code from raw input onto the tagged value
 */
export function toPurpose(code: string): Purpose {
  return code === BENE_PURPOSE_CODE ? PURPOSE_BENE : customPurpose(code);
}

/**
 * Map the reference/text pair from raw input onto the tagged value
 */
export function toRemittance(input: Pick<PaymentInput, 'reference' | 'text'>): Remittance | undefined {
  if (input.reference !== undefined) {
    return remittanceReference(input.reference);
  }
  if (input.text !== undefined) {
    return remittanceText(input.text);
  }
  return undefined;
}
