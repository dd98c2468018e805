import type { FormulaOptions, ParsedFormula } from './types';
import { fromString } from './src/parsers/formula-normalizer';
import { splitCharge } from './src/parsers/charge-parser';
import { parseElements } from './src/parsers/formula-parser';

/**
 * Normalize a formula string and count its atoms.
 *
 * 'CuSO4.5H2O' -> expanded 'CuSO4(H2O)5', elements {Cu: {0: 1}, S: {0: 1},
 * O: {0: 9}, H: {0: 10}}, charge 0.
 */
export function parseFormula(input: string, opts: FormulaOptions = {}): ParsedFormula {
  const expanded = fromString(input, opts);
  const [body, charge] = splitCharge(expanded);
  const elements = parseElements(body, { allowEmpty: opts.allowEmpty ?? false });
  return { expanded, elements, charge };
}
