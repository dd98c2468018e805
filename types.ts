// Core types for formula parsing and mass calculation

/**
 * One nuclide of an element.
 * Abundances of all isotopes of an element sum to 1.
 */
export interface Isotope {
  massnumber: number; // protons + neutrons
  mass: number; // relative atomic mass
  abundance: number; // natural abundance in [0, 1]
}

/**
 * Isotope composed of the most abundant isotopes of each atom in a formula.
 */
export interface FormulaIsotope extends Isotope {
  charge: number;
}

/**
 * Element symbol -> isotope selector -> count.
 * Selector 0 means natural isotopic distribution, otherwise a mass number.
 * Counts are always positive.
 */
export type ElementCounts = Map<string, Map<number, number>>;

export type ReadonlyElementCounts = ReadonlyMap<string, ReadonlyMap<number, number>>;

export interface ParsedFormula {
  expanded: string; // normalized formula including charge suffix
  elements: ElementCounts;
  charge: number;
}

export type OligoType = 'ssdna' | 'dsdna' | 'ssrna' | 'dsrna';

export type SequenceType = 'ssdna' | 'ssrna' | 'peptide';

/**
 * Shape of a normalizer input, decided once before expansion.
 */
export type InputKind =
  | { kind: 'fractions' }
  | { kind: 'sequence'; sequence: SequenceType }
  | { kind: 'plain' };

export interface NormalizeOptions {
  groups?: Readonly<Record<string, string>>; // default: built-in abbreviations
  parseGroups?: boolean; // default true
  parseFractions?: boolean; // default true
  parseOligos?: boolean; // default true
  parseArithmetic?: boolean; // default true
}

export interface FormulaOptions extends NormalizeOptions {
  allowEmpty?: boolean; // default false
}

export interface SpectrumOptions {
  minFraction?: number; // default 1e-9
  minIntensity?: number; // percent of the most abundant bin, unset keeps all
}

export interface CompositionItem {
  symbol: string; // 'C', '13C' or 'e-'
  count: number;
  mass: number;
  fraction: number;
}

export interface SpectrumEntry {
  massnumber: number;
  mass: number;
  fraction: number;
  intensity: number; // percent of the most abundant bin
  mz: number;
}
