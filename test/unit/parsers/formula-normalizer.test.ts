import { describe, it, expect } from 'vitest';
import { FormulaError } from 'src/errors';
import { classifyInput, fromString, substituteGroups } from 'src/parsers/formula-normalizer';

function captureError(fn: () => unknown): FormulaError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FormulaError) return error;
    throw error;
  }
  return undefined;
}

describe('fromString', () => {
  it('strips whitespace', () => {
    expect(fromString(' H2 O ')).toBe('H2O');
  });

  it('expands hydrate dots and counted terms', () => {
    expect(fromString('CuSO4.5H2O')).toBe('CuSO4(H2O)5');
    expect(fromString('CuSO4+5*H2O')).toBe('CuSO4(H2O)5');
    expect(fromString('H2O+CO2')).toBe('H2OCO2');
  });

  it('replaces deuterium but not symbols starting with D', () => {
    expect(fromString('D2O')).toBe('[2H]2O');
    expect(fromString('DyCl3')).toBe('DyCl3');
  });

  it('keeps deuterium counts in front of a bare charge sign', () => {
    expect(fromString('CD3+')).toBe('[C[2H]3]+');
    expect(fromString('D2+')).toBe('[[2H]2]+');
  });

  it('substitutes group abbreviations', () => {
    expect(fromString('EtOH')).toBe('(C2H5)OH');
    expect(fromString('XyzO', { groups: { Xyz: 'CH3' } })).toBe('(CH3)O');
    expect(fromString('EtOH', { parseGroups: false })).toBe('EtOH');
  });

  it('moves the charge behind a bracketed formula', () => {
    expect(fromString('SO4_2-')).toBe('[SO4]2-');
    expect(fromString('NH4+')).toBe('[NH4]+');
    expect(fromString('[AsO4]3-')).toBe('[AsO4]3-');
    expect(fromString('C8H14Br4+-')).toBe('C8H14Br4');
  });

  it('expands sequences', () => {
    expect(fromString('ATG')).toBe('((C10H12N5O5P)(C10H12N5O6P)(C10H13N2O7P)H2O)');
    expect(fromString('MDRGEQGLLK')).toBe(
      '((C4H5NO3)(C5H7NO3)(C2H3NO)2(C6H12N2O)(C6H11NO)2(C5H9NOS)(C5H8N2O2)(C6H12N4O)H2O)',
    );
    expect(fromString('peptide(GG)')).toBe('((C2H3NO)2H2O)');
    expect(fromString('dsrna(AU)')).toBe('((C10H12N5O6P)2(C9H11N2O8P)2(H2O)2)');
  });

  it('derives formulas from mass fractions', () => {
    expect(fromString('H: 0.112, O: 0.888')).toBe('H2O');
    expect(fromString('O:0.26,30Si:0.74')).toBe('O2[30Si]3');
  });

  it('rejects malformed mass fraction lists', () => {
    expect(() => fromString('H:0.1,O')).toThrow('invalid list of mass fractions');
    expect(() => fromString('H:x,O:1')).toThrow('invalid list of mass fractions');
    expect(() => fromString('H:0,O:0')).toThrow('invalid list of mass fractions');
    expect(() => fromString('H:0,O:1')).toThrow('invalid list of mass fractions');
    expect(() => fromString('H:-0.1,O:1')).toThrow('invalid list of mass fractions');
  });

  it('leaves arithmetic alone when disabled', () => {
    expect(fromString('CuSO4.5H2O', { parseArithmetic: false })).toBe('CuSO4.5H2O');
  });

  it('rejects subtraction with the position of the minus sign', () => {
    const error = captureError(() => fromString('H2O-H2O'));
    expect(error).toBeInstanceOf(FormulaError);
    expect(error?.message).toBe('subtraction not allowed');
    expect(error?.formula).toBe('H2O-H2O');
    expect(error?.position).toBe(3);
  });

  it('rejects terms that do not start with an element or bracket', () => {
    expect(() => fromString('C+a')).toThrow("unexpected character 'a'");
    expect(() => fromString('+H2O')).toThrow('missing term');
  });

  it('rejects non-string input', () => {
    expect(() => Reflect.apply(fromString, undefined, [42])).toThrow('formula must be a string');
  });

  it('returns the empty string for empty input', () => {
    expect(fromString('')).toBe('');
  });
});

describe('classifyInput', () => {
  it('checks mass fractions before sequences', () => {
    expect(classifyInput('A:0.5,G:0.5')).toEqual({ kind: 'fractions' });
  });

  it('recognizes DNA, RNA and peptide sequences', () => {
    expect(classifyInput('ATTG')).toEqual({ kind: 'sequence', sequence: 'ssdna' });
    expect(classifyInput('AUCG')).toEqual({ kind: 'sequence', sequence: 'ssrna' });
    expect(classifyInput('MDRGEQGLLK')).toEqual({ kind: 'sequence', sequence: 'peptide' });
  });

  it('reads everything else as plain formula', () => {
    expect(classifyInput('H2O')).toEqual({ kind: 'plain' });
    expect(classifyInput('CC')).toEqual({ kind: 'plain' });
    expect(classifyInput('G')).toEqual({ kind: 'plain' });
    expect(classifyInput('ATG', { parseOligos: false })).toEqual({ kind: 'plain' });
  });
});

describe('substituteGroups', () => {
  it('prefers longer abbreviations', () => {
    expect(substituteGroups('MeO', { M: 'X', Me: 'CH3' })).toBe('(CH3)O');
  });
});
