import type {
  ElementCounts,
  FormulaIsotope,
  FormulaOptions,
  ReadonlyElementCounts,
  SpectrumOptions,
} from 'types';
import { parseFormula } from 'parser';
import { FormulaError } from 'src/errors';
import { fromElements } from 'src/generators/formula-generator';
import { joinCharge, splitCharge } from 'src/parsers/charge-parser';
import { Composition } from 'src/utils/composition';
import { getAverageMass, getComposition, getMonoisotopic } from 'src/utils/mass-calculator';
import { gcd, massChargeRatio } from 'src/utils/math-utils';
import { computeSpectrum, Spectrum } from 'src/utils/spectrum';

// Canonical strings need no group, sequence or fraction expansion
const CANONICAL: FormulaOptions = {
  parseGroups: false,
  parseFractions: false,
  parseOligos: false,
  allowEmpty: true,
};

/**
 * Chemical formula.
 *
 * The input is normalized and parsed on construction; invalid input throws
 * FormulaError. Derived values are computed on first access and cached.
 *
 * @example
 * const water = new Formula('H2O');
 * water.mass; // 18.01528
 * new Formula('CuSO4.5H2O').formula; // 'CuSO4(H2O)5'
 */
export class Formula {
  /** Normalized formula including the charge suffix */
  readonly formula: string;
  readonly charge: number;
  private readonly counts: ElementCounts;

  private cachedHill: string | undefined;
  private cachedEmpirical: string | undefined;
  private cachedAtoms: number | undefined;
  private cachedGcd: number | undefined;
  private cachedMass: number | undefined;
  private cachedIsotope: FormulaIsotope | undefined;
  private readonly compositions = new Map<boolean, Composition>();
  private readonly spectra = new Map<string, Spectrum>();

  constructor(input: string, opts: FormulaOptions = {}) {
    const parsed = parseFormula(input, opts);
    this.formula = parsed.expanded;
    this.charge = parsed.charge;
    this.counts = parsed.elements;
  }

  /**
   * Atom counts by element symbol and isotope mass number (0: natural).
   */
  get elements(): ReadonlyElementCounts {
    return this.counts;
  }

  /**
   * Formula in Hill notation, e.g. 'BrC2H5' -> 'C2H5Br'.
   */
  get hill(): string {
    this.cachedHill ??= fromElements(this.counts, { charge: this.charge });
    return this.cachedHill;
  }

  /**
   * Hill notation with the simplest whole number ratio of atoms,
   * e.g. 'C6H12O6' -> 'CH2O'.
   */
  get empirical(): string {
    this.cachedEmpirical ??= fromElements(this.counts, { divisor: this.gcd, charge: this.charge });
    return this.cachedEmpirical;
  }

  get atoms(): number {
    if (this.cachedAtoms === undefined) {
      let atoms = 0;
      for (const isotopes of this.counts.values()) {
        for (const count of isotopes.values()) atoms += count;
      }
      this.cachedAtoms = atoms;
    }
    return this.cachedAtoms;
  }

  /**
   * Greatest common divisor of all atom counts and the charge.
   */
  get gcd(): number {
    if (this.cachedGcd === undefined) {
      const numbers: number[] = [];
      for (const isotopes of this.counts.values()) numbers.push(...isotopes.values());
      if (this.charge) numbers.push(this.charge);
      this.cachedGcd = gcd(numbers);
    }
    return this.cachedGcd;
  }

  /**
   * Average relative molecular mass, corrected for the electrons of an ion.
   */
  get mass(): number {
    this.cachedMass ??= getAverageMass(this.counts, this.charge);
    return this.cachedMass;
  }

  /**
   * Mass, mass number and abundance of the molecule made of the most
   * abundant isotopes.
   */
  get isotope(): FormulaIsotope {
    this.cachedIsotope ??= getMonoisotopic(this.counts, this.charge);
    return { ...this.cachedIsotope };
  }

  get monoisotopicMass(): number {
    return this.isotope.mass;
  }

  get nominalMass(): number {
    return this.isotope.massnumber;
  }

  /**
   * Mass-to-charge ratio; the mass itself for neutral formulas.
   */
  get mz(): number {
    return massChargeRatio(this.mass, this.charge);
  }

  /**
   * Elemental composition in Hill order. With `isotopic`, explicit isotopes
   * are listed separately from the natural element.
   */
  composition(isotopic = true): Composition {
    let composition = this.compositions.get(isotopic);
    if (!composition) {
      composition = new Composition(getComposition(this.counts, this.charge, isotopic));
      this.compositions.set(isotopic, composition);
    }
    return composition;
  }

  /**
   * Low resolution mass distribution.
   */
  spectrum(opts: SpectrumOptions = {}): Spectrum {
    const key = `${opts.minFraction ?? ''}|${opts.minIntensity ?? ''}`;
    let spectrum = this.spectra.get(key);
    if (!spectrum) {
      spectrum = new Spectrum(computeSpectrum(this.counts, this.charge, opts));
      this.spectra.set(key, spectrum);
    }
    return spectrum;
  }

  /**
   * Both formulas combined, e.g. H2O + HO- -> '[(H2O)(HO)]-'.
   */
  add(other: Formula): Formula {
    if (!(other instanceof Formula)) {
      throw new TypeError('can only add Formula instance');
    }
    const [left, leftCharge] = splitCharge(this.formula);
    const [right, rightCharge] = splitCharge(other.formula);
    return new Formula(joinCharge(`(${left})(${right})`, leftCharge + rightCharge), CANONICAL);
  }

  /**
   * Remove the atoms of another formula. Every element and isotope of
   * `other` must be present in at least the same number.
   */
  subtract(other: Formula): Formula {
    if (!(other instanceof Formula)) {
      throw new TypeError('can only subtract Formula instance');
    }
    const counts: ElementCounts = new Map();
    for (const [symbol, isotopes] of this.counts) counts.set(symbol, new Map(isotopes));

    for (const [symbol, isotopes] of other.counts) {
      const remaining = counts.get(symbol);
      if (!remaining) {
        throw new FormulaError(`element '${symbol}' not in ${this.formula}`, this.formula);
      }
      for (const [massnumber, count] of isotopes) {
        const label = massnumber ? `${massnumber}${symbol}` : symbol;
        const available = remaining.get(massnumber);
        if (available === undefined) {
          throw new FormulaError(`element '${label}' not in ${this.formula}`, this.formula);
        }
        if (available < count) {
          throw new FormulaError(`negative number of element '${label}'`, this.formula);
        }
        if (available === count) remaining.delete(massnumber);
        else remaining.set(massnumber, available - count);
      }
      if (remaining.size === 0) counts.delete(symbol);
    }

    return new Formula(fromElements(counts, { charge: this.charge - other.charge }), CANONICAL);
  }

  /**
   * This formula repeated `times` times, e.g. H2O * 2 -> '(H2O)2'.
   */
  multiply(times: number): Formula {
    if (!Number.isInteger(times) || times < 1) {
      throw new TypeError('can only multiply with positive integer');
    }
    const [body, charge] = splitCharge(this.formula);
    return new Formula(joinCharge(`(${body})${times}`, charge * times), CANONICAL);
  }

  toString(): string {
    return this.formula;
  }
}
