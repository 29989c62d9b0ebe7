/**
 * RF creditor reference tests
 */
import { describe, it, expect } from 'vitest';
import { RF_LIMITS, createRfReference, isValidRfReference } from '../src/rf';
import { isValidIban } from '../src/iban';

describe('isValidRfReference', () => {
  it('accepts valid references', () => {
    expect(isValidRfReference('RF45G72UUR')).toBe(true);
    expect(isValidRfReference('RF18539007547034')).toBe(true);
    expect(isValidRfReference('RF6518K5')).toBe(true);
  });

  it('rejects wrong check digits', () => {
    expect(isValidRfReference('RF55G72UUR')).toBe(false);
    expect(isValidRfReference('RF35C4')).toBe(false);
    expect(isValidRfReference('RF214377')).toBe(false);
  });

  it('rejects empty and short input', () => {
    expect(isValidRfReference('')).toBe(false);
    expect(isValidRfReference('RF45')).toBe(false);
  });

  it('rejects input longer than 25 characters', () => {
    expect(RF_LIMITS.maxLength).toBe(25);
    const tooLong = createRfReference('1'.repeat(21)) + '1';
    expect(tooLong).toHaveLength(26);
    expect(isValidRfReference(tooLong)).toBe(false);
  });

  it('requires the RF prefix', () => {
    expect(isValidRfReference('DE90830654080004104242')).toBe(false);
    expect(isValidRfReference('rf45G72UUR')).toBe(false);
  });

  it('does not strip whitespace', () => {
    expect(isValidRfReference('RF45 G72U UR')).toBe(false);
    expect(isValidRfReference(' RF45G72UUR')).toBe(false);
  });

  it('rejects lowercase body characters', () => {
    expect(isValidRfReference('RF45g72uur')).toBe(false);
  });

  it('requires the literal prefix where IBAN validation takes any country code', () => {
    expect(isValidIban('RF45G72UUR')).toBe(true);
    expect(isValidRfReference('DE90830654080004104242')).toBe(false);
  });
});

describe('createRfReference', () => {
  it('computes check digits', () => {
    expect(createRfReference('G72UUR')).toBe('RF45G72UUR');
    expect(createRfReference('539007547034')).toBe('RF18539007547034');
    expect(createRfReference('4377')).toBe('RF684377');
    expect(createRfReference('1')).toBe('RF741');
  });

  it('produces references that validate', () => {
    for (const body of ['C4', 'ABC123', '1'.repeat(RF_LIMITS.maxBodyLength)]) {
      expect(isValidRfReference(createRfReference(body))).toBe(true);
    }
  });

  it('rejects bodies it cannot encode', () => {
    expect(() => createRfReference('')).toThrow(RangeError);
    expect(() => createRfReference('1'.repeat(22))).toThrow(RangeError);
    expect(() => createRfReference('abc')).toThrow(RangeError);
    expect(() => createRfReference('AB-12')).toThrow(RangeError);
  });
});
