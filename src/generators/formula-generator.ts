import type { ReadonlyElementCounts } from 'types';
import { joinCharge } from 'src/parsers/charge-parser';

/**
 * Templates for the four kinds of terms in a rendered formula.
 */
export interface FormulaFormat {
  element(symbol: string): string;
  elementCount(symbol: string, count: number): string;
  isotope(massnumber: number, symbol: string): string;
  isotopeCount(massnumber: number, symbol: string, count: number): string;
}

export const TEXT_FORMAT: FormulaFormat = {
  element: symbol => symbol,
  elementCount: (symbol, count) => `${symbol}${count}`,
  isotope: (massnumber, symbol) => `[${massnumber}${symbol}]`,
  isotopeCount: (massnumber, symbol, count) => `[${massnumber}${symbol}]${count}`,
};

export const HTML_FORMAT: FormulaFormat = {
  element: symbol => symbol,
  elementCount: (symbol, count) => `${symbol}<sub>${count}</sub>`,
  isotope: (massnumber, symbol) => `<sup>${massnumber}</sup>${symbol}`,
  isotopeCount: (massnumber, symbol, count) => `<sup>${massnumber}</sup>${symbol}<sub>${count}</sub>`,
};

export interface FromElementsOptions {
  divisor?: number; // default 1
  charge?: number; // default 0
  format?: FormulaFormat; // default TEXT_FORMAT
}

/**
 * Element symbols in Hill order: C, then H, then the rest alphabetically.
 * Without carbon all symbols, H included, are alphabetical.
 */
export function hillSorted(symbols: Iterable<string>): string[] {
  const rest = new Set(symbols);
  const result: string[] = [];
  if (rest.has('C')) {
    rest.delete('C');
    result.push('C');
    if (rest.has('H')) {
      rest.delete('H');
      result.push('H');
    }
  }
  return result.concat([...rest].sort());
}

/**
 * Formula string in Hill notation. Counts and charge are divided by divisor.
 */
export function fromElements(elements: ReadonlyElementCounts, opts: FromElementsOptions = {}): string {
  const divisor = opts.divisor ?? 1;
  const format = opts.format ?? TEXT_FORMAT;
  const parts: string[] = [];

  for (const symbol of hillSorted(elements.keys())) {
    const isotopes = elements.get(symbol);
    if (!isotopes) continue;
    for (const massnumber of [...isotopes.keys()].sort((a, b) => a - b)) {
      const count = Math.trunc((isotopes.get(massnumber) ?? 0) / divisor);
      if (massnumber) {
        parts.push(count === 1 ? format.isotope(massnumber, symbol) : format.isotopeCount(massnumber, symbol, count));
      } else {
        parts.push(count === 1 ? format.element(symbol) : format.elementCount(symbol, count));
      }
    }
  }

  return joinCharge(parts.join(''), Math.trunc((opts.charge ?? 0) / divisor));
}
