import { countBy } from 'es-toolkit';
import type { OligoType } from 'types';
import { FormulaError } from 'src/errors';
import {
  AMINOACIDS,
  DEOXYNUCLEOTIDES,
  DNA_COMPLEMENTS,
  NUCLEOTIDES,
  RNA_COMPLEMENTS,
} from 'src/constants';
import { joinCharge, splitCharge } from './charge-parser';

/**
 * Translate a sequence through `items` and return the histogram of the
 * translated items as formula, e.g. 'AA' with {A: 'B'} -> '(B)2'.
 * Items are emitted in key order.
 */
export function fromSequence(sequence: string, items: Readonly<Record<string, string>>): string {
  for (let i = 0; i < sequence.length; i++) {
    const item = sequence[i] ?? '';
    if (!Object.hasOwn(items, item)) {
      throw new FormulaError(`unknown sequence item '${item}'`, sequence, i);
    }
  }
  const counts = countBy([...sequence], item => item);
  const parts: string[] = [];
  for (const key of Object.keys(items).sort()) {
    const count = counts[key] ?? 0;
    if (count === 1) parts.push(`(${items[key]})`);
    else if (count > 1) parts.push(`(${items[key]})${count}`);
  }
  return parts.join('');
}

/**
 * Formula of a polymer of unmodified amino acids, e.g. 'GG' -> '((C2H3NO)2H2O)'.
 * A trailing charge ('..._2+') is kept on the result.
 */
export function fromPeptide(sequence: string): string {
  const [residues, charge] = splitCharge(sequence.replace(/\s/g, ''));
  return joinCharge(`(${fromSequence(residues, AMINOACIDS)}H2O)`, charge);
}

/**
 * Formula of a polymer of unmodified (deoxy)nucleotides.
 * Each strand carries a 5' monophosphate; double strands add the complement.
 */
export function fromOligo(sequence: string, type: OligoType = 'ssdna'): string {
  const [bases, charge] = splitCharge(sequence.replace(/\s/g, ''));
  const isRna = type === 'ssrna' || type === 'dsrna';
  const items = isRna ? NUCLEOTIDES : DEOXYNUCLEOTIDES;

  let formula: string;
  if (type === 'dsdna' || type === 'dsrna') {
    const complements = isRna ? RNA_COMPLEMENTS : DNA_COMPLEMENTS;
    let strand = '';
    for (let i = 0; i < bases.length; i++) {
      const complement = complements[bases[i] ?? ''];
      if (complement === undefined) {
        throw new FormulaError(`unknown sequence item '${bases[i]}'`, bases, i);
      }
      strand += complement;
    }
    formula = `(${fromSequence(bases + strand, items)}(H2O)2)`;
  } else {
    formula = `(${fromSequence(bases, items)}H2O)`;
  }
  return joinCharge(formula, charge);
}

/**
 * Sequence functions recognized inside formulas, e.g. 'peptide(GG)'.
 */
export const PREPROCESSORS: Readonly<Record<string, (sequence: string) => string>> = {
  peptide: fromPeptide,
  ssdna: sequence => fromOligo(sequence, 'ssdna'),
  dsdna: sequence => fromOligo(sequence, 'dsdna'),
  ssrna: sequence => fromOligo(sequence, 'ssrna'),
  dsrna: sequence => fromOligo(sequence, 'dsrna'),
};
