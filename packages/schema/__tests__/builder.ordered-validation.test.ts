/**
 * Tests for PayloadBuilder.build() evaluation order
 *
 * Verifies:
 * 1. Every emitted error kind is registered in PAYLOAD_ERRORS
 * 2. Multi-failure precedence: with several broken fields, the reported
 *    kind is the first one in evaluation order
 * 3. Evaluation order is locked as a testable contract
 */

import { describe, it, expect } from 'vitest';
import { PayloadBuilder } from '../src/builder';
import { PAYLOAD_ERRORS, PAYLOAD_ERROR_KINDS, type PayloadErrorKind } from '../src/errors';
import { customPurpose, remittanceReference, remittanceText } from '../src/fields';

/**
 * The fix for each rule, in evaluation order
 */
const FIXES: Array<[PayloadErrorKind, (builder: PayloadBuilder) => void]> = [
  ['MissingVersion', (b) => b.version('V1')],
  ['MissingCharacterSet', (b) => b.characterSet('UTF8')],
  ['MissingIdentification', (b) => b.identification('SCT')],
  ['BicRequiredForVersion', (b) => b.bic('GENODEF1SLR')],
  ['MissingBeneficiary', (b) => b.beneficiary('Codeberg e.V.')],
  ['MissingIban', (b) => b.iban('DE90 8306 5408 0004 1042 43')],
  ['InvalidIban', (b) => b.iban('DE90 8306 5408 0004 1042 42')],
  ['InvalidAmount', (b) => b.amount('10.00')],
  ['InvalidPurpose', (b) => b.purpose(customPurpose('GDDS'))],
  ['InvalidRemittanceReference', (b) => b.remittance(remittanceText('y'.repeat(141)))],
  ['RemittanceTextTooLong', (b) => b.remittance(remittanceText('order 17'))],
];

function brokenBuilder(): PayloadBuilder {
  return new PayloadBuilder()
    .amount('0.00')
    .purpose(customPurpose('abcd'))
    .remittance(remittanceReference('RF55G72UUR'));
}

describe('ordered validation - error registry', () => {
  it('lists every kind exactly once, in evaluation order', () => {
    expect(FIXES.map(([kind]) => kind)).toEqual([...PAYLOAD_ERROR_KINDS]);
  });

  it('emits only registered kinds', () => {
    const builder = brokenBuilder();
    for (const [kind, fix] of FIXES) {
      const result = builder.build();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(PAYLOAD_ERRORS[result.error.kind]).toBeDefined();
        expect(result.error.kind).toBe(kind);
      }
      fix(builder);
    }
  });
});

describe('ordered validation - precedence', () => {
  it('reports each rule only once the earlier rules pass', () => {
    const builder = brokenBuilder();
    const reported: string[] = [];

    for (const [, fix] of FIXES) {
      const result = builder.build();
      if (!result.ok) reported.push(result.error.kind);
      fix(builder);
    }

    expect(reported).toEqual([...PAYLOAD_ERROR_KINDS]);
    expect(builder.build().ok).toBe(true);
  });

  it('checks the BIC before the beneficiary', () => {
    const result = new PayloadBuilder()
      .version('V1')
      .characterSet('UTF8')
      .identification('SCT')
      .build();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('BicRequiredForVersion');
  });

  it('skips the BIC rule for version 2', () => {
    const result = new PayloadBuilder()
      .version('V2')
      .characterSet('UTF8')
      .identification('SCT')
      .build();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('MissingBeneficiary');
  });

  it('checks the amount before the purpose', () => {
    const result = new PayloadBuilder()
      .version('V2')
      .characterSet('UTF8')
      .identification('SCT')
      .beneficiary('Codeberg e.V.')
      .iban('DE90830654080004104242')
      .purpose(customPurpose('no'))
      .amount('1')
      .build();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('InvalidAmount');
  });
});
