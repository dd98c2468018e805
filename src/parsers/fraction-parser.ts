import { minBy, range, sortBy, sumBy } from 'es-toolkit';
import { FormulaError } from 'src/errors';
import { getElementTable } from 'src/utils/element-table';

export interface FractionOptions {
  maxCount?: number; // largest multiplier tried, exclusive; default 10
  precision?: number; // acceptable rounding error per symbol; default 1e-4
}

/**
 * Formula from elemental mass fractions, e.g. {H: 0.112, O: 0.888} -> 'H2O'.
 * Keys are element symbols, 'D', or isotopes as '30Si' or '[30Si]'.
 * Fractions need not sum to 1.
 */
export function fromFractions(
  fractions: Readonly<Record<string, number>>,
  opts: FractionOptions = {},
): string {
  const maxCount = opts.maxCount ?? 10;
  const entries = Object.entries(fractions);
  if (entries.length === 0) return '';
  if (entries.some(([, fraction]) => !Number.isFinite(fraction) || fraction <= 0)) {
    const list = entries.map(([key, fraction]) => `${key}:${fraction}`).join(',');
    throw new FormulaError('invalid list of mass fractions', list);
  }

  // divide normalized fractions by element/isotope mass
  const total = sumBy(entries, ([, fraction]) => fraction);
  const numbers = entries.map(([key, fraction]) => {
    const { symbol, mass } = resolveSymbol(key);
    return { symbol, number: fraction / (total * mass) };
  });

  const smallest = minBy(numbers, n => n.number)?.number ?? 1;
  const ratios = numbers.map(n => ({ symbol: n.symbol, number: n.number / smallest }));

  // smallest multiplier that turns all ratios into near-integers
  const precision = (opts.precision ?? 1e-4) * ratios.length;
  let best = 1e6;
  let factor = 1;
  for (const i of range(1, maxCount)) {
    const error = sumBy(ratios, r => Math.abs(i * r.number - Math.round(i * r.number)));
    if (error < best) {
      best = error;
      factor = i;
      if (best < i * precision) break;
    }
  }

  return sortBy(ratios, ['symbol'])
    .map(({ symbol, number }) => {
      const count = Math.round(factor * number);
      return count > 1 ? `${symbol}${count}` : symbol;
    })
    .join('');
}

// 'C' -> element C, 'D' -> [2H], '30Si' or '[30Si]' -> isotope
function resolveSymbol(key: string): { symbol: string; mass: number } {
  const table = getElementTable();
  const symbol = key === 'D' ? '2H' : key;

  if (/^[A-Z]/.test(symbol)) {
    const element = table.find(symbol);
    if (!element || element.symbol !== symbol) {
      throw new FormulaError(`unknown element '${symbol}'`);
    }
    return { symbol, mass: element.mass };
  }

  const match = /^\[?(\d+)([A-Z][a-z]?)\]?$/.exec(symbol);
  const massnumber = parseInt(match?.[1] ?? '', 10);
  const elementSymbol = match?.[2] ?? '';
  const element = table.find(elementSymbol);
  const isotope = element?.symbol === elementSymbol ? element.isotope(massnumber) : undefined;
  if (!isotope) {
    throw new FormulaError(`unknown isotope '${symbol}'`);
  }
  return { symbol: `[${massnumber}${elementSymbol}]`, mass: isotope.mass };
}
