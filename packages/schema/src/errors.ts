/**
 * EPC Payload Error Model
 *
 * One error kind per validation rule. The builder reports the first
 * failing rule only; kinds are listed here in evaluation order.
 */

import type { ZodError } from 'zod';
import type { PayloadField } from './types.js';

export const PAYLOAD_ERROR_KINDS = [
  'MissingVersion',
  'MissingCharacterSet',
  'MissingIdentification',
  'BicRequiredForVersion',
  'MissingBeneficiary',
  'MissingIban',
  'InvalidIban',
  'InvalidAmount',
  'InvalidPurpose',
  'InvalidRemittanceReference',
  'RemittanceTextTooLong',
] as const;

export type PayloadErrorKind = (typeof PAYLOAD_ERROR_KINDS)[number];

/**
 * Error registry entry
 */
export interface PayloadErrorDefinition {
  /** Stable machine-readable code */
  code: string;
  /** Field the rule applies to */
  field: PayloadField;
  title: string;
  /** Short hint for fixing the input */
  remediation: string;
}

export const PAYLOAD_ERRORS: Readonly<Record<PayloadErrorKind, PayloadErrorDefinition>> = {
  MissingVersion: {
    code: 'E_MISSING_VERSION',
    field: 'version',
    title: 'Version missing',
    remediation: 'Set the payload version (V1 or V2)',
  },
  MissingCharacterSet: {
    code: 'E_MISSING_CHARACTER_SET',
    field: 'characterSet',
    title: 'Character set missing',
    remediation: 'Set the character set (UTF8)',
  },
  MissingIdentification: {
    code: 'E_MISSING_IDENTIFICATION',
    field: 'identification',
    title: 'Identification missing',
    remediation: 'Set the identification code (SCT or INST)',
  },
  BicRequiredForVersion: {
    code: 'E_BIC_REQUIRED',
    field: 'bic',
    title: 'BIC required',
    remediation: 'Set the BIC, or use version V2 where it is optional',
  },
  MissingBeneficiary: {
    code: 'E_MISSING_BENEFICIARY',
    field: 'beneficiary',
    title: 'Beneficiary missing',
    remediation: 'Set a non-empty beneficiary name',
  },
  MissingIban: {
    code: 'E_MISSING_IBAN',
    field: 'iban',
    title: 'IBAN missing',
    remediation: "Set the beneficiary's IBAN",
  },
  InvalidIban: {
    code: 'E_INVALID_IBAN',
    field: 'iban',
    title: 'Invalid IBAN',
    remediation: 'Check the IBAN for typos; its check digits do not match',
  },
  InvalidAmount: {
    code: 'E_INVALID_AMOUNT',
    field: 'amount',
    title: 'Invalid amount',
    remediation: 'Use 1-9 integer digits, a dot and 2 decimals, between 0.01 and 999999999.99',
  },
  InvalidPurpose: {
    code: 'E_INVALID_PURPOSE',
    field: 'purpose',
    title: 'Invalid purpose',
    remediation: 'Use BENE or a custom code of exactly 4 uppercase letters',
  },
  InvalidRemittanceReference: {
    code: 'E_INVALID_REMITTANCE_REFERENCE',
    field: 'remittance',
    title: 'Invalid remittance reference',
    remediation: 'Use an ISO 11649 RF creditor reference, or send the text as unstructured remittance',
  },
  RemittanceTextTooLong: {
    code: 'E_REMITTANCE_TEXT_TOO_LONG',
    field: 'remittance',
    title: 'Remittance text too long',
    remediation: 'Shorten the remittance text to at most 140 characters',
  },
};

/**
 * Structured payload error
 */
export interface PayloadError {
  kind: PayloadErrorKind;
  code: string;
  field: PayloadField;
  /** Human-readable message */
  message: string;
}

/**
 * Create the structured error for a failed rule
 */
export function createPayloadError(kind: PayloadErrorKind): PayloadError {
  const definition = PAYLOAD_ERRORS[kind];
  return {
    kind,
    code: definition.code,
    field: definition.field,
    message: `${definition.title}: ${definition.remediation}`,
  };
}

/**
 * Thrown by PayloadBuilder.buildOrThrow()
 */
export class PayloadBuildError extends Error {
  constructor(public readonly error: PayloadError) {
    super(error.message);
    this.name = 'PayloadBuildError';
  }

  get kind(): PayloadErrorKind {
    return this.error.kind;
  }
}

/**
 * Thrown when raw input does not have the shape of a payment
 */
export class PaymentInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodError['issues']
  ) {
    super(message);
    this.name = 'PaymentInputError';
  }
}
