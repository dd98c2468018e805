import { describe, it, expect } from 'vitest';
import { fromFractions } from 'src/parsers/fraction-parser';

describe('fromFractions', () => {
  it('finds the smallest integer ratio', () => {
    expect(fromFractions({ H: 0.112, O: 0.888 })).toBe('H2O');
    expect(fromFractions({ H: 8.97, C: 59.39, O: 31.64 })).toBe('C5H9O2');
  });

  it('accepts deuterium and isotopes', () => {
    expect(fromFractions({ D: 0.2, O: 0.8 })).toBe('O[2H]2');
    expect(fromFractions({ O: 0.26, '30Si': 0.74 })).toBe('O2[30Si]3');
    expect(fromFractions({ O: 0.26, '[30Si]': 0.74 })).toBe('O2[30Si]3');
  });

  it('returns the empty formula for no fractions', () => {
    expect(fromFractions({})).toBe('');
  });

  it('rejects zero and negative fractions', () => {
    expect(() => fromFractions({ H: 0, O: 0 })).toThrow('invalid list of mass fractions');
    expect(() => fromFractions({ H: 0, O: 1 })).toThrow('invalid list of mass fractions');
    expect(() => fromFractions({ H: -0.5, O: 1 })).toThrow('invalid list of mass fractions');
    expect(() => fromFractions({ H: Number.NaN, O: 1 })).toThrow('invalid list of mass fractions');
  });

  it('rejects unknown elements and isotopes', () => {
    expect(() => fromFractions({ Xx: 1 })).toThrow("unknown element 'Xx'");
    expect(() => fromFractions({ '31Si': 1 })).toThrow("unknown isotope '31Si'");
  });
});
