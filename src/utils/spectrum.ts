import { maxBy, sumBy } from 'es-toolkit';
import type { ReadonlyElementCounts, SpectrumEntry, SpectrumOptions } from 'types';
import { ELECTRON } from 'src/constants';
import { getElementTable } from './element-table';
import { getIsotope } from './mass-calculator';
import { precisionDigits } from './math-utils';

interface Bin {
  mass: number; // fraction-weighted mean mass
  fraction: number;
}

/**
 * Low resolution mass distribution: bins keyed by mass number, combining
 * the natural isotopes of every atom one atom at a time. Bins below
 * `minFraction` are dropped after every step.
 */
export function computeSpectrum(
  elements: ReadonlyElementCounts,
  charge = 0,
  opts: SpectrumOptions = {},
): SpectrumEntry[] {
  const minFraction = opts.minFraction ?? 1e-9;
  if (elements.size === 0) return [];

  const table = getElementTable();
  let bins = new Map<number, Bin>([[0, { mass: 0, fraction: 1 }]]);

  for (const [symbol, isotopes] of elements) {
    const element = table.get(symbol);
    for (const [massnumber, count] of isotopes) {
      if (massnumber) {
        const isotope = getIsotope(symbol, massnumber);
        const next = new Map<number, Bin>();
        for (const [key, bin] of bins) {
          addToBin(next, key + isotope.massnumber * count, bin.mass + isotope.mass * count, bin.fraction);
        }
        bins = prune(next, minFraction);
        continue;
      }
      for (let atom = 0; atom < count; atom++) {
        const next = new Map<number, Bin>();
        for (const [key, bin] of bins) {
          for (const isotope of element.isotopes.values()) {
            addToBin(next, key + isotope.massnumber, bin.mass + isotope.mass, bin.fraction * isotope.abundance);
          }
        }
        bins = prune(next, minFraction);
      }
    }
  }

  if (process.env.VERBOSE) {
    console.debug(`[spectrum] ${bins.size} bins above ${minFraction}`);
  }

  const maxFraction = maxBy([...bins.values()], bin => bin.fraction)?.fraction ?? 0;
  const shift = ELECTRON.mass * charge;
  const divisor = Math.max(1, Math.abs(charge));
  const entries: SpectrumEntry[] = [];
  for (const [massnumber, bin] of [...bins].sort(([a], [b]) => a - b)) {
    const mass = bin.mass - shift;
    const intensity = maxFraction ? (bin.fraction / maxFraction) * 100 : 0;
    if (opts.minIntensity !== undefined && intensity < opts.minIntensity) continue;
    entries.push({ massnumber, mass, fraction: bin.fraction, intensity, mz: mass / divisor });
  }
  return entries;
}

function addToBin(bins: Map<number, Bin>, key: number, mass: number, fraction: number): void {
  const bin = bins.get(key);
  if (!bin) {
    bins.set(key, { mass, fraction });
    return;
  }
  const total = bin.fraction + fraction;
  if (total > 0) bin.mass = (bin.fraction * bin.mass + fraction * mass) / total;
  bin.fraction = total;
}

function prune(bins: Map<number, Bin>, minFraction: number): Map<number, Bin> {
  for (const [key, bin] of bins) {
    if (bin.fraction < minFraction) bins.delete(key);
  }
  return bins;
}

/**
 * Mass distribution of a formula, ordered by mass number.
 */
export class Spectrum implements Iterable<SpectrumEntry> {
  private readonly entries: readonly SpectrumEntry[];
  private readonly index: ReadonlyMap<number, SpectrumEntry>;

  constructor(entries: Iterable<SpectrumEntry>) {
    this.entries = Object.freeze(
      [...entries].sort((a, b) => a.massnumber - b.massnumber).map(entry => Object.freeze({ ...entry })),
    );
    this.index = new Map(this.entries.map(entry => [entry.massnumber, entry]));
  }

  get size(): number {
    return this.entries.length;
  }

  get(massnumber: number): SpectrumEntry | undefined {
    return this.index.get(massnumber);
  }

  /**
   * Most abundant entry; the first one when several share the largest fraction.
   */
  get peak(): SpectrumEntry {
    const peak = maxBy([...this.entries], entry => entry.fraction);
    if (!peak) throw new Error('empty spectrum');
    return peak;
  }

  /**
   * Fraction-weighted sum of masses over the retained entries.
   */
  get mean(): number {
    return sumBy(this.entries, entry => entry.mass * entry.fraction);
  }

  /**
   * Smallest and largest mass number.
   */
  get range(): [number, number] {
    const first = this.entries[0];
    const last = this.entries[this.entries.length - 1];
    if (!first || !last) throw new Error('empty spectrum');
    return [first.massnumber, last.massnumber];
  }

  toArray(): SpectrumEntry[] {
    return [...this.entries];
  }

  [Symbol.iterator](): Iterator<SpectrumEntry> {
    return this.entries[Symbol.iterator]();
  }

  toString(): string {
    if (this.entries.length === 0) return '';
    const precision = precisionDigits(this.peak.mass, 9);
    const lines = ['A'.padEnd(6) + 'Relative mass'.padEnd(13) + 'Fraction %'.padStart(14) + 'Intensity %'.padStart(15)];
    for (const entry of this.entries) {
      lines.push(
        String(entry.massnumber).padEnd(6) +
          entry.mass.toFixed(precision).padEnd(13) +
          (entry.fraction * 100).toFixed(6).padStart(14) +
          entry.intensity.toFixed(6).padStart(15),
      );
    }
    return lines.join('\n');
  }
}
