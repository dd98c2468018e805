export { Formula } from 'src/formula';
export { FormulaError } from 'src/errors';
export { parseFormula } from 'parser';
export { fromString, classifyInput, substituteGroups } from 'src/parsers/formula-normalizer';
export { parseElements } from 'src/parsers/formula-parser';
export type { ParseOptions } from 'src/parsers/formula-parser';
export { splitCharge, formatCharge, joinCharge } from 'src/parsers/charge-parser';
export { fromSequence, fromPeptide, fromOligo, PREPROCESSORS } from 'src/parsers/sequence-parser';
export { fromFractions } from 'src/parsers/fraction-parser';
export type { FractionOptions } from 'src/parsers/fraction-parser';
export { fromElements, hillSorted, TEXT_FORMAT, HTML_FORMAT } from 'src/generators/formula-generator';
export type { FormulaFormat, FromElementsOptions } from 'src/generators/formula-generator';
export { analyze } from 'src/generators/report-generator';
export type { AnalyzeOptions } from 'src/generators/report-generator';
export { Element, ElementTable, getElementTable, resetElementTable } from 'src/utils/element-table';
export type { ElementData } from 'src/utils/element-table';
export { getChemicalGroups, loadChemicalGroups } from 'src/utils/chemical-groups';
export { getAverageMass, getMonoisotopic, getComposition, getIsotope } from 'src/utils/mass-calculator';
export { Composition } from 'src/utils/composition';
export type { CompositionTotal } from 'src/utils/composition';
export { Spectrum, computeSpectrum } from 'src/utils/spectrum';
export { gcd, precisionDigits, massChargeRatio } from 'src/utils/math-utils';
export {
  ELECTRON,
  PROTON,
  NEUTRON,
  POSITRON,
  ELEMENTARY_CHARGE,
  AMINOACIDS,
  DEOXYNUCLEOTIDES,
  NUCLEOTIDES,
} from 'src/constants';
export type { Particle } from 'src/constants';
export type {
  Isotope,
  FormulaIsotope,
  ElementCounts,
  ReadonlyElementCounts,
  ParsedFormula,
  OligoType,
  SequenceType,
  InputKind,
  NormalizeOptions,
  FormulaOptions,
  SpectrumOptions,
  CompositionItem,
  SpectrumEntry,
} from 'types';
