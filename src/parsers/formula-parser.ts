import type { ElementCounts } from 'types';
import { CLOSING_BRACKETS, OPENING_BRACKETS } from 'src/constants';
import { FormulaError } from 'src/errors';
import { getElementTable } from 'src/utils/element-table';

export interface ParseOptions {
  allowEmpty?: boolean; // default false
}

const FIRST_CHARS = /^[([{<1-9A-Z]/;
const VALID_CHARS = /^[()[\]{}<>0-9A-Za-z]$/;

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9';
const isUpper = (ch: string | undefined): boolean => ch !== undefined && ch >= 'A' && ch <= 'Z';
const isLower = (ch: string | undefined): boolean => ch !== undefined && ch >= 'a' && ch <= 'z';

/**
 * Count atoms per element and isotope in a normalized, charge-free formula.
 *
 * Scans right to left so that each count is read before the term it
 * multiplies. `multipliers[level]` holds the product of all group counts
 * enclosing the current nesting level.
 *
 * Digits directly before an element symbol select an isotope when they
 * start the formula or follow an opening bracket ('12C', '[13C]');
 * anywhere else they are the count of the preceding term.
 */
export function parseElements(formula: string, opts: ParseOptions = {}): ElementCounts {
  const elements: ElementCounts = new Map();

  if (!formula) {
    if (opts.allowEmpty) return elements;
    throw new FormulaError('empty formula', formula, 0);
  }
  if (!FIRST_CHARS.test(formula)) {
    throw new FormulaError(`unexpected character '${formula[0]}'`, formula, 0);
  }

  const table = getElementTable();
  let symbol = ''; // pending lowercase letter of a two-letter symbol
  let num = 0; // count of the term to the right
  let level = 0; // nesting depth
  const multipliers = [1];

  let i = formula.length;
  while (i > 0) {
    i--;
    const ch = formula[i] ?? '';

    if (!VALID_CHARS.test(ch)) {
      throw new FormulaError(`unexpected character '${ch}'`, formula, i);
    }

    if (OPENING_BRACKETS.includes(ch)) {
      level--;
      if (level < 0) {
        throw new FormulaError(`missing closing parenthesis '${CLOSING_BRACKETS}'`, formula, i);
      }
      if (num !== 0) {
        throw new FormulaError('count without element', formula, i + 1);
      }
    } else if (CLOSING_BRACKETS.includes(ch)) {
      level++;
      multipliers[level] = (num || 1) * (multipliers[level - 1] ?? 1);
      num = 0;
    } else if (isDigit(ch)) {
      const end = i + 1;
      while (i > 0 && isDigit(formula[i - 1])) i--;
      num = parseInt(formula.slice(i, end), 10);
      if (num === 0) {
        throw new FormulaError('count is zero', formula, i);
      }
    } else if (isLower(ch)) {
      if (!isUpper(formula[i - 1])) {
        throw new FormulaError(`unexpected character '${ch}'`, formula, i);
      }
      symbol = ch;
    } else {
      // uppercase letter completes a symbol
      symbol = ch + symbol;
      const element = table.find(symbol);
      if (!element || element.symbol !== symbol) {
        throw new FormulaError(`unknown symbol '${symbol}'`, formula, i);
      }

      let massnumber = 0;
      let start = i;
      while (start > 0 && isDigit(formula[start - 1])) start--;
      if (start < i && (start === 0 || OPENING_BRACKETS.includes(formula[start - 1] ?? ''))) {
        massnumber = parseInt(formula.slice(start, i), 10);
        if (!element.isotope(massnumber)) {
          throw new FormulaError(`unknown isotope '${massnumber}${symbol}'`, formula, start);
        }
        i = start;
      }

      const count = (num || 1) * (multipliers[level] ?? 1);
      let isotopes = elements.get(symbol);
      if (!isotopes) {
        isotopes = new Map();
        elements.set(symbol, isotopes);
      }
      isotopes.set(massnumber, (isotopes.get(massnumber) ?? 0) + count);
      symbol = '';
      num = 0;
    }
  }

  if (num !== 0) {
    throw new FormulaError('number preceding formula', formula, 0);
  }
  if (level !== 0) {
    throw new FormulaError(`missing opening parenthesis '${OPENING_BRACKETS}'`, formula, 0);
  }
  if (elements.size === 0 && !opts.allowEmpty) {
    throw new FormulaError('invalid formula', formula, 0);
  }
  if (process.env.VERBOSE) {
    console.debug(`[formula-parser] ${formula}: ${elements.size} elements`);
  }
  return elements;
}
