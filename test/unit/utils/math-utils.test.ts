import { describe, it, expect } from 'vitest';
import { gcd, massChargeRatio, precisionDigits } from 'src/utils/math-utils';

describe('gcd', () => {
  it('reduces any number of integers', () => {
    expect(gcd([4])).toBe(4);
    expect(gcd([3, 6])).toBe(3);
    expect(gcd([6, 7])).toBe(1);
    expect(gcd([6, 12, 6])).toBe(6);
  });

  it('ignores signs', () => {
    expect(gcd([-4, 6])).toBe(2);
  });

  it('is 1 for no numbers', () => {
    expect(gcd([])).toBe(1);
  });
});

describe('precisionDigits', () => {
  it('fits the value into the width', () => {
    expect(precisionDigits(-0.12345678, 5)).toBe(2);
    expect(precisionDigits(1.23456789, 5)).toBe(3);
    expect(precisionDigits(12.3456789, 5)).toBe(2);
    expect(precisionDigits(12345.6789, 5)).toBe(1);
    expect(precisionDigits(0, 9)).toBe(7);
  });
});

describe('massChargeRatio', () => {
  it('divides by the charge magnitude', () => {
    expect(massChargeRatio(96, -2)).toBe(48);
    expect(massChargeRatio(18, 0)).toBe(18);
  });
});
