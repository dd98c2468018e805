import { describe, it, expect } from 'vitest';
import { formatCharge, joinCharge, splitCharge } from 'src/parsers/charge-parser';

describe('splitCharge', () => {
  it('returns neutral formulas unchanged', () => {
    expect(splitCharge('H2O')).toEqual(['H2O', 0]);
    expect(splitCharge('[13C]O2')).toEqual(['[13C]O2', 0]);
  });

  it('counts runs of signs', () => {
    expect(splitCharge('Formula+')).toEqual(['Formula', 1]);
    expect(splitCharge('Formula-')).toEqual(['Formula', -1]);
    expect(splitCharge('Pt2++')).toEqual(['Pt2', 2]);
    expect(splitCharge('C8H14Br4+-')).toEqual(['C8H14Br4', 0]);
    expect(splitCharge('C14H17N2O_-')).toEqual(['C14H17N2O', -1]);
  });

  it('reads magnitudes after a separator or closing bracket', () => {
    expect(splitCharge('SO4_2-')).toEqual(['SO4', -2]);
    expect(splitCharge('[AsO4]3-')).toEqual(['AsO4', -3]);
    expect(splitCharge('[[F]]2-')).toEqual(['[F]', -2]);
  });

  it('reads a sign followed by a magnitude', () => {
    expect(splitCharge('O2-2')).toEqual(['O2', -2]);
    expect(splitCharge('Fe+3')).toEqual(['Fe', 3]);
  });

  it('treats digits before a bare sign as part of the formula', () => {
    expect(splitCharge('NO2-')).toEqual(['NO2', -1]);
  });

  it('only strips the trailing suffix', () => {
    expect(splitCharge('Formul+a+')).toEqual(['Formul+a', 1]);
  });

  it('keeps brackets that do not enclose the whole formula', () => {
    expect(splitCharge('[CH3][13C]+')).toEqual(['[CH3][13C]', 1]);
  });
});

describe('formatCharge', () => {
  it('renders signs and magnitudes', () => {
    expect(formatCharge(0)).toBe('');
    expect(formatCharge(1)).toBe('+');
    expect(formatCharge(-1)).toBe('-');
    expect(formatCharge(2)).toBe('2+');
    expect(formatCharge(-3)).toBe('3-');
  });

  it('prefixes the separator for magnitudes above one', () => {
    expect(formatCharge(2, '_')).toBe('_2+');
    expect(formatCharge(1, '_')).toBe('+');
  });
});

describe('joinCharge', () => {
  it('wraps charged formulas in brackets', () => {
    expect(joinCharge('SO4', -2)).toBe('[SO4]2-');
    expect(joinCharge('NH4', 1)).toBe('[NH4]+');
    expect(joinCharge('H2O', 0)).toBe('H2O');
  });

  it('appends the suffix directly with a separator', () => {
    expect(joinCharge('SO4', -2, '_')).toBe('SO4_2-');
    expect(joinCharge('NH4', 1, '_')).toBe('NH4+');
  });

  it('round-trips through splitCharge', () => {
    expect(splitCharge(joinCharge('[13C]H4', 2))).toEqual(['[13C]H4', 2]);
  });
});
