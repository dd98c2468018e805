import type { Isotope } from 'types';
import { isRecord, readDataFile, readNumber, readString } from './data-loader';

export interface ElementData {
  number: number;
  symbol: string;
  name: string;
  group: number;
  period: number;
  block: string;
  series: number;
  mass: number; // standard atomic weight
  eleneg: number; // Pauling scale
  eleaffin: number; // eV
  covrad: number; // Angstrom
  atmrad: number; // Angstrom
  vdwrad: number; // Angstrom
  tboil: number; // K
  tmelt: number; // K
  density: number; // g/cm3 (g/L for gases)
  eleconfig: string;
  oxistates: string;
  ionenergy: number[]; // eV
  isotopes: Isotope[];
}

/**
 * Chemical element with its natural isotopic composition.
 * Instances are shared through the element table and never mutated.
 */
export class Element {
  readonly number: number;
  readonly symbol: string;
  readonly name: string;
  readonly group: number;
  readonly period: number;
  readonly block: string;
  readonly series: number;
  readonly mass: number;
  readonly eleneg: number;
  readonly eleaffin: number;
  readonly covrad: number;
  readonly atmrad: number;
  readonly vdwrad: number;
  readonly tboil: number;
  readonly tmelt: number;
  readonly density: number;
  readonly eleconfig: string;
  readonly oxistates: string;
  readonly ionenergy: readonly number[];
  readonly isotopes: ReadonlyMap<number, Isotope>;
  private cachedNominalMass: number | undefined;

  constructor(data: ElementData) {
    this.number = data.number;
    this.symbol = data.symbol;
    this.name = data.name;
    this.group = data.group;
    this.period = data.period;
    this.block = data.block;
    this.series = data.series;
    this.mass = data.mass;
    this.eleneg = data.eleneg;
    this.eleaffin = data.eleaffin;
    this.covrad = data.covrad;
    this.atmrad = data.atmrad;
    this.vdwrad = data.vdwrad;
    this.tboil = data.tboil;
    this.tmelt = data.tmelt;
    this.density = data.density;
    this.eleconfig = data.eleconfig;
    this.oxistates = data.oxistates;
    this.ionenergy = [...data.ionenergy];
    const isotopes = new Map<number, Isotope>();
    for (const iso of [...data.isotopes].sort((a, b) => a.massnumber - b.massnumber)) {
      isotopes.set(iso.massnumber, { ...iso });
    }
    this.isotopes = isotopes;
  }

  get protons(): number {
    return this.number;
  }

  get electrons(): number {
    return this.number;
  }

  /**
   * Mass number of the most abundant natural isotope.
   */
  get nominalMass(): number {
    if (this.cachedNominalMass === undefined) {
      let nominalMass = 0;
      let maxAbundance = 0;
      for (const [massnumber, iso] of this.isotopes) {
        if (iso.abundance > maxAbundance) {
          maxAbundance = iso.abundance;
          nominalMass = massnumber;
        }
      }
      this.cachedNominalMass = nominalMass;
    }
    return this.cachedNominalMass;
  }

  get neutrons(): number {
    return this.nominalMass - this.protons;
  }

  /**
   * Relative atomic mass calculated from the isotopic composition.
   */
  get exactMass(): number {
    let mass = 0;
    for (const iso of this.isotopes.values()) mass += iso.mass * iso.abundance;
    return mass;
  }

  /**
   * The most abundant natural isotope.
   */
  get mostAbundantIsotope(): Isotope {
    const iso = this.isotopes.get(this.nominalMass);
    if (!iso) throw new Error(`${this.symbol} - element has no isotopes`);
    return iso;
  }

  isotope(massnumber: number): Isotope | undefined {
    return this.isotopes.get(massnumber);
  }

  /**
   * Throw if the isotope table or the ionization energies are inconsistent.
   */
  validate(): void {
    if (this.isotopes.size === 0) {
      throw new Error(`${this.symbol} - element has no isotopes`);
    }
    for (let i = 1; i < this.ionenergy.length; i++) {
      if ((this.ionenergy[i] ?? 0) <= (this.ionenergy[i - 1] ?? 0)) {
        throw new Error(`${this.symbol} - ionenergy not increasing`);
      }
    }
    let mass = 0;
    let fraction = 0;
    for (const iso of this.isotopes.values()) {
      mass += iso.mass * iso.abundance;
      fraction += iso.abundance;
    }
    if (Math.abs(mass - this.mass) > 0.03) {
      throw new Error(
        `${this.symbol} - average of isotope masses (${mass.toFixed(4)}) != mass (${this.mass.toFixed(4)})`,
      );
    }
    if (Math.abs(fraction - 1.0) > 1e-9) {
      throw new Error(`${this.symbol} - sum of isotope abundances != 1.0`);
    }
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Elements in atomic number order with lookup by number, symbol and name.
 */
export class ElementTable implements Iterable<Element> {
  private readonly elements: Element[] = [];
  private readonly index = new Map<string | number, Element>();

  constructor(elements: Iterable<ElementData>) {
    for (const data of elements) {
      if (data.number !== this.elements.length + 1) {
        throw new Error(`elements must be added in order: ${data.symbol} has number ${data.number}`);
      }
      const element = new Element(data);
      this.elements.push(element);
      this.index.set(element.number, element);
      this.index.set(element.symbol, element);
      this.index.set(element.name, element);
    }
  }

  static fromFile(filename = 'elements.json', dataDir?: string): ElementTable {
    const raw = readDataFile(filename, dataDir);
    if (!Array.isArray(raw)) {
      throw new Error(`${filename}: expected an array of elements`);
    }
    const table = new ElementTable(raw.map((item, i) => toElementData(item, `${filename}[${i}]`)));
    if (process.env.VERBOSE) {
      console.debug(`[element-table] loaded ${table.size} elements from ${filename}`);
    }
    return table;
  }

  get size(): number {
    return this.elements.length;
  }

  has(key: string | number): boolean {
    return this.index.has(key);
  }

  find(key: string | number): Element | undefined {
    return this.index.get(key);
  }

  get(key: string | number): Element {
    const element = this.index.get(key);
    if (!element) throw new Error(`unknown element '${key}'`);
    return element;
  }

  validate(): void {
    for (const element of this.elements) element.validate();
  }

  [Symbol.iterator](): Iterator<Element> {
    return this.elements[Symbol.iterator]();
  }

  toString(): string {
    return `[${this.elements.map(e => e.symbol).join(', ')}]`;
  }
}

function toElementData(item: unknown, source: string): ElementData {
  if (!isRecord(item)) throw new Error(`${source}: expected an object`);
  const isotopes = item['isotopes'];
  const ionenergy = item['ionenergy'];
  if (!Array.isArray(isotopes)) throw new Error(`${source}: field 'isotopes' must be an array`);
  if (!Array.isArray(ionenergy)) throw new Error(`${source}: field 'ionenergy' must be an array`);

  return {
    number: readNumber(item, 'number', source),
    symbol: readString(item, 'symbol', source),
    name: readString(item, 'name', source),
    group: readNumber(item, 'group', source),
    period: readNumber(item, 'period', source),
    block: readString(item, 'block', source),
    series: readNumber(item, 'series', source),
    mass: readNumber(item, 'mass', source),
    eleneg: readNumber(item, 'eleneg', source),
    eleaffin: readNumber(item, 'eleaffin', source),
    covrad: readNumber(item, 'covrad', source),
    atmrad: readNumber(item, 'atmrad', source),
    vdwrad: readNumber(item, 'vdwrad', source),
    tboil: readNumber(item, 'tboil', source),
    tmelt: readNumber(item, 'tmelt', source),
    density: readNumber(item, 'density', source),
    eleconfig: readString(item, 'eleconfig', source),
    oxistates: readString(item, 'oxistates', source),
    ionenergy: ionenergy.map((value, i) => {
      if (typeof value !== 'number') throw new Error(`${source}: ionenergy[${i}] must be a number`);
      return value;
    }),
    isotopes: isotopes.map((iso, i) => {
      const isoSource = `${source}.isotopes[${i}]`;
      if (!isRecord(iso)) throw new Error(`${isoSource}: expected an object`);
      return {
        massnumber: readNumber(iso, 'massnumber', isoSource),
        mass: readNumber(iso, 'mass', isoSource),
        abundance: readNumber(iso, 'abundance', isoSource),
      };
    }),
  };
}

let globalTable: ElementTable | null = null;

/**
 * Process-wide element table, loaded on first call.
 */
export function getElementTable(): ElementTable {
  if (!globalTable) {
    globalTable = ElementTable.fromFile();
  }
  return globalTable;
}

/**
 * Reset global table (useful for testing)
 */
export function resetElementTable(): void {
  globalTable = null;
}
