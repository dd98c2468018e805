import type { InputKind, NormalizeOptions } from 'types';
import { AMINOACIDS, PEPTIDE_MARKERS } from 'src/constants';
import { FormulaError } from 'src/errors';
import { getChemicalGroups } from 'src/utils/chemical-groups';
import { joinCharge, splitCharge } from './charge-parser';
import { fromFractions } from './fraction-parser';
import { fromOligo, fromPeptide, PREPROCESSORS } from './sequence-parser';

const PREPROCESSOR_CALL = new RegExp(`(${Object.keys(PREPROCESSORS).join('|')})\\((.*?)\\)`, 'g');
const DEUTERIUM = /D(?![a-z])/g;
const COUNTED_TERM = /^(\d+)\*?(.*)$/;
const TERM_START = /^[A-Z([{<]/;

/**
 * Rewrite user input into a normalized formula composed of element and
 * isotope symbols, brackets, counts and an optional trailing charge.
 *
 * Supports abbreviations of chemical groups, DNA/RNA and peptide sequences,
 * lists of mass fractions, deuterium as 'D', ion charges, and '+', '*' and
 * '.' as arithmetic, e.g. 'CuSO4.5H2O' -> 'CuSO4(H2O)5'.
 */
export function fromString(input: string, opts: NormalizeOptions = {}): string {
  if (typeof input !== 'string') {
    throw new FormulaError('formula must be a string');
  }
  let formula = input.replace(/\s/g, '');

  if (opts.parseGroups ?? true) {
    formula = substituteGroups(formula, opts.groups ?? getChemicalGroups());
  }

  const kind = classifyInput(formula, opts);
  if (process.env.VERBOSE) {
    console.debug(`[formula-normalizer] ${JSON.stringify(input)} classified as`, kind);
  }

  switch (kind.kind) {
    case 'fractions':
      return fromFractions(parseFractionList(formula));
    case 'sequence':
      return kind.sequence === 'peptide' ? fromPeptide(formula) : fromOligo(formula, kind.sequence);
    case 'plain':
      return normalizePlain(formula, opts);
  }
}

/**
 * Decide how an input is expanded. Precedence: list of mass fractions,
 * then DNA, RNA and peptide sequences, then everything else.
 */
export function classifyInput(formula: string, opts: NormalizeOptions = {}): InputKind {
  if ((opts.parseFractions ?? true) && formula.includes(':') && formula.includes(',')) {
    return { kind: 'fractions' };
  }
  if ((opts.parseOligos ?? true) && formula.length > 1) {
    const chars = new Set(formula);
    if (isSubset(chars, 'ATCG') && intersects(chars, 'ATG')) {
      return { kind: 'sequence', sequence: 'ssdna' };
    }
    if (isSubset(chars, 'AUCG') && intersects(chars, 'AG')) {
      return { kind: 'sequence', sequence: 'ssrna' };
    }
    if (isSubset(chars, Object.keys(AMINOACIDS).join('')) && intersects(chars, PEPTIDE_MARKERS)) {
      return { kind: 'sequence', sequence: 'peptide' };
    }
  }
  return { kind: 'plain' };
}

/**
 * Replace abbreviations by their bracketed expansion, longest keys first.
 */
export function substituteGroups(formula: string, groups: Readonly<Record<string, string>>): string {
  let result = formula;
  for (const key of Object.keys(groups).sort().reverse()) {
    if (key) result = result.split(key).join(`(${groups[key]})`);
  }
  return result;
}

/**
 * 'O:0.26,30Si:0.74' -> {O: 0.26, 30Si: 0.74}
 */
function parseFractionList(formula: string): Record<string, number> {
  const fractions: Record<string, number> = {};
  for (const item of formula.split(',')) {
    const [symbol, value, ...rest] = item.split(':');
    const fraction = Number(value);
    if (!symbol || !value || rest.length > 0 || !Number.isFinite(fraction) || fraction <= 0) {
      throw new FormulaError('invalid list of mass fractions', formula);
    }
    fractions[symbol] = fraction;
  }
  return fractions;
}

function normalizePlain(formula: string, opts: NormalizeOptions): string {
  let result = formula;

  if ((opts.parseOligos ?? true) && result.length > 1) {
    result = result.replace(PREPROCESSOR_CALL, (call: string, name: string, sequence: string) => {
      const expand = PREPROCESSORS[name];
      return expand ? expand(sequence) : call;
    });
  }

  // before '[2H]' is written: its ']' would read as a charge separator
  const [body, charge] = splitCharge(result);
  result = body.replace(DEUTERIUM, '[2H]');

  if (opts.parseArithmetic ?? true) {
    result = expandArithmetic(result);
  }

  return joinCharge(result, charge);
}

/**
 * '.' and '+' join terms; a leading count, optionally followed by '*',
 * multiplies its term: 'CuSO4+5*H2O' -> 'CuSO4(H2O)5'.
 */
function expandArithmetic(formula: string): string {
  const minus = formula.indexOf('-');
  if (minus >= 0) {
    throw new FormulaError('subtraction not allowed', formula, minus);
  }

  const joined = formula.replace(/\./g, '+');
  if (!joined.includes('+')) return joined;

  const terms: string[] = [];
  let offset = 0;
  for (const term of joined.split('+')) {
    const counted = COUNTED_TERM.exec(term);
    const body = counted ? (counted[2] ?? '') : term;
    const bodyOffset = offset + term.length - body.length;
    if (!TERM_START.test(body)) {
      throw new FormulaError(
        body ? `unexpected character '${body[0]}'` : 'missing term',
        joined,
        bodyOffset,
      );
    }
    terms.push(counted ? `(${body})${counted[1]}` : term);
    offset += term.length + 1;
  }
  return terms.join('');
}

function isSubset(chars: Set<string>, alphabet: string): boolean {
  for (const ch of chars) {
    if (!alphabet.includes(ch)) return false;
  }
  return true;
}

function intersects(chars: Set<string>, alphabet: string): boolean {
  for (const ch of alphabet) {
    if (chars.has(ch)) return true;
  }
  return false;
}
