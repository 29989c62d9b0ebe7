/**
 * Mod-97 transform tests
 */
import { describe, it, expect } from 'vitest';
import {
  MOD97_VALID_REMAINDER,
  computeCheckDigits,
  mod97,
  rearrange,
  toCheckDigitString,
} from '../src/mod97';

describe('rearrange', () => {
  it('moves the first four characters to the end', () => {
    expect(rearrange('RF45G72UUR')).toBe('G72UURRF45');
  });

  it('leaves a four character string unchanged', () => {
    expect(rearrange('DE90')).toBe('DE90');
  });
});

describe('toCheckDigitString', () => {
  it('transforms IBANs', () => {
    expect(toCheckDigitString('DE68210501700012345678')).toBe('210501700012345678131468');
    expect(toCheckDigitString('GB82WEST12345698765432')).toBe('3214282912345698765432161182');
  });

  it('transforms structured references', () => {
    expect(toCheckDigitString('RF45G72UUR')).toBe('1672303027271545');
    expect(toCheckDigitString('RF6518K5')).toBe('18205271565');
    expect(toCheckDigitString('RF35C4')).toBe('124271535');
    expect(toCheckDigitString('RF214377')).toBe('4377271521');
  });
});

describe('mod97', () => {
  it('returns 1 for valid identifiers', () => {
    expect(MOD97_VALID_REMAINDER).toBe(1);
    expect(mod97('DE90830654080004104242')).toBe(1);
    expect(mod97('GB82WEST12345698765432')).toBe(1);
    expect(mod97('RF45G72UUR')).toBe(1);
  });

  it('returns the actual remainder for invalid identifiers', () => {
    expect(mod97('DE90830654080004104243')).toBe(28);
    expect(mod97('RF55G72UUR')).toBe(11);
  });

  it('matches a big integer computation for long input', () => {
    const identifier = 'XY12' + 'A1B2C3D4E5F6G7H8I9J0'.repeat(50);
    const expected = Number(BigInt(toCheckDigitString(identifier)) % 97n);

    expect(mod97(identifier)).toBe(expected);
  });
});

describe('computeCheckDigits', () => {
  it('reproduces known check digits', () => {
    expect(computeCheckDigits('DE', '830654080004104242')).toBe('90');
    expect(computeCheckDigits('GB', 'WEST12345698765432')).toBe('82');
    expect(computeCheckDigits('RF', 'G72UUR')).toBe('45');
  });

  it('always produces two digits', () => {
    for (const body of ['1', 'ABC', '0000', 'ZZZZZZZZ']) {
      expect(computeCheckDigits('RF', body)).toMatch(/^\d{2}$/);
    }
  });
});
