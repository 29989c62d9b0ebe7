/**
 * EPC QR Payload Constants
 *
 * Code tables for the fixed-position fields of the payload
 * (EPC069-12, "Quick Response Code: Guidelines to Enable Data
 * Capture for the Initiation of a SEPA Credit Transfer").
 */

import type { CharacterSet, Identification, Version } from './types.js';

/**
 * Service tag, always the first line
 */
export const SERVICE_TAG = 'BCD' as const;

/**
 * Payload versions
 *
 * - V1: "001", EEA and non-EEA, BIC mandatory
 * - V2: "002", EEA only, BIC optional
 */
export const VERSIONS = ['V1', 'V2'] as const;

/**
 * Character sets
 *
 * Only UTF-8 ("1") is produced. Codes 2-8 (ISO 8859-1, -2, -4, -5, -7,
 * -10, -15) are reserved by the guidelines and would need transliteration.
 */
export const CHARACTER_SETS = ['UTF8'] as const;

/**
 * Identification codes
 *
 * - SCT: SEPA Credit Transfer
 * - INST: SEPA Instant Credit Transfer
 */
export const IDENTIFICATIONS = ['SCT', 'INST'] as const;

export const VERSION_CODES: Readonly<Record<Version, string>> = {
  V1: '001',
  V2: '002',
};

export const CHARACTER_SET_CODES: Readonly<Record<CharacterSet, string>> = {
  UTF8: '1',
};

export const IDENTIFICATION_CODES: Readonly<Record<Identification, string>> = {
  SCT: 'SCT',
  INST: 'INST',
};

/**
 * Purpose code for payments to the beneficiary's own benefit
 */
export const BENE_PURPOSE_CODE = 'BENE' as const;

/**
 * Field limits
 */
export const PAYLOAD_LIMITS = {
  /** Maximum digits before the decimal point of an amount */
  maxAmountIntegerDigits: 9,
  /** Exact digits after the decimal point of an amount */
  amountFractionDigits: 2,
  /** Exact length of a custom purpose code */
  purposeCodeLength: 4,
  /** Maximum characters of unstructured remittance text */
  maxRemittanceTextLength: 140,
  /** Lines of a formatted payload, empty ones included */
  lineCount: 12,
} as const;
