/**
 * EPC QR Payload Types
 */

import type {
  CHARACTER_SETS,
  IDENTIFICATIONS,
  SERVICE_TAG,
  VERSIONS,
} from './constants.js';

export type ServiceTag = typeof SERVICE_TAG;
export type Version = (typeof VERSIONS)[number];
export type CharacterSet = (typeof CHARACTER_SETS)[number];
export type Identification = (typeof IDENTIFICATIONS)[number];

/**
 * Purpose of the credit transfer
 *
 * Either the well-known BENE code or a custom ISO 20022 ExternalPurpose1Code
 * (four uppercase letters).
 */
export type Purpose = { type: 'bene' } | { type: 'custom'; code: string };

/**
 * Remittance information
 *
 * Structured (RF creditor reference) and unstructured (free text) are
 * mutually exclusive, so they share one field.
 */
export type Remittance =
  | { type: 'reference'; reference: string }
  | { type: 'text'; text: string };

/**
 * Every field of an EPC payload. Absent optional fields are undefined.
 */
export interface PayloadFields {
  readonly serviceTag: ServiceTag;
  readonly version: Version;
  readonly characterSet: CharacterSet;
  readonly identification: Identification;
  /** BIC of the beneficiary's bank (required for V1) */
  readonly bic?: string;
  /** Name of the beneficiary */
  readonly beneficiary: string;
  /** IBAN of the beneficiary, without whitespace */
  readonly iban: string;
  /** Amount in EUR, e.g. "10.00" */
  readonly amount?: string;
  readonly purpose?: Purpose;
  readonly remittance?: Remittance;
  /** Beneficiary to originator information */
  readonly information?: string;
}

/**
 * Name of a settable payload field
 */
export type PayloadField = Exclude<keyof PayloadFields, 'serviceTag'>;
