import { sumBy } from 'es-toolkit';
import type { CompositionItem } from 'types';
import { precisionDigits } from './math-utils';

export interface CompositionTotal {
  count: number;
  mass: number;
  fraction: number;
}

/**
 * Elemental composition of a formula: ordered, read-only list of
 * (symbol, count, mass, fraction) items.
 */
export class Composition implements Iterable<CompositionItem> {
  private readonly items: readonly CompositionItem[];
  private cachedTotal: CompositionTotal | undefined;

  constructor(items: Iterable<CompositionItem>) {
    this.items = Object.freeze([...items].map(item => Object.freeze({ ...item })));
  }

  get size(): number {
    return this.items.length;
  }

  get(symbol: string): CompositionItem | undefined {
    return this.items.find(item => item.symbol === symbol);
  }

  /**
   * Sums of counts, masses and fractions.
   */
  get total(): CompositionTotal {
    this.cachedTotal ??= {
      count: sumBy(this.items, item => item.count),
      mass: sumBy(this.items, item => item.mass),
      fraction: sumBy(this.items, item => item.fraction),
    };
    return this.cachedTotal;
  }

  toArray(): CompositionItem[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<CompositionItem> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Plain text table; a total row is added for more than one item.
   */
  toString(): string {
    if (this.items.length === 0) return '';
    const total = this.total;
    const precision = precisionDigits(total.mass, 9);
    const row = (symbol: string, count: number, mass: number, fraction: number): string =>
      symbol.padEnd(7) +
      String(count).padStart(8) +
      mass.toFixed(precision).padStart(15) +
      (fraction * 100).toFixed(4).padStart(12);

    const lines = [
      'Element'.padEnd(7) + 'Count'.padStart(8) + 'Relative mass'.padStart(15) + 'Fraction %'.padStart(12),
    ];
    for (const item of this.items) {
      lines.push(row(item.symbol, item.count, item.mass, item.fraction));
    }
    if (this.items.length > 1) {
      lines.push(row('Total:', total.count, total.mass, total.fraction));
    }
    return lines.join('\n');
  }
}
