/**
 * Constructors for the tagged field values
 */

import { BENE_PURPOSE_CODE } from './constants.js';
import type { Purpose, Remittance } from './types.js';

export const PURPOSE_BENE: Purpose = { type: 'bene' };

export function customPurpose(code: string): Purpose {
  return { type: 'custom', code };
}

export function remittanceReference(reference: string): Remittance {
  return { type: 'reference', reference };
}

export function remittanceText(text: string): Remittance {
  return { type: 'text', text };
}

/**
 * Wire code of a purpose
 */
export function purposeCode(purpose: Purpose): string {
  return purpose.type === 'bene' ? BENE_PURPOSE_CODE : purpose.code;
}
