/**
 * Payload Formatter
 *
 * Serializes a built payload into the newline-delimited text a QR encoder
 * embeds (byte mode). Line positions are fixed: absent optional fields
 * render as empty lines, and there is no trailing newline.
 */

import {
  CHARACTER_SET_CODES,
  IDENTIFICATION_CODES,
  VERSION_CODES,
} from './constants.js';
import { purposeCode } from './fields.js';
import type { EpcPayload } from './payload.js';

export const LINE_SEPARATOR = '\n';

/**
 * The payload's lines in wire order
 *
 * Structured reference and unstructured text keep separate lines; at most
 * one of them is non-empty.
 *
 * Field values are emitted verbatim. A value containing a line break is not
 * rejected by the builder, and it pushes later fields down in the joined
 * text, so the twelve-line layout holds only for single-line values.
 */
export function payloadLines(payload: EpcPayload): string[] {
  const { remittance } = payload;

  return [
    payload.serviceTag,
    VERSION_CODES[payload.version],
    CHARACTER_SET_CODES[payload.characterSet],
    IDENTIFICATION_CODES[payload.identification],
    payload.bic ?? '',
    payload.beneficiary,
    payload.iban,
    payload.amount ?? '',
    payload.purpose !== undefined ? purposeCode(payload.purpose) : '',
    remittance?.type === 'reference' ? remittance.reference : '',
    remittance?.type === 'text' ? remittance.text : '',
    payload.information ?? '',
  ];
}

export function formatPayload(payload: EpcPayload): string {
  return payloadLines(payload).join(LINE_SEPARATOR);
}
