import { Formula } from 'src/formula';
import { formatCharge } from 'src/parsers/charge-parser';
import { precisionDigits } from 'src/utils/math-utils';

export interface AnalyzeOptions {
  maxAtoms?: number; // spectrum is skipped from this many atoms on; default 250
  minFraction?: number; // default 1e-9
  minIntensity?: number;
  debug?: boolean; // print every section even when redundant; default false
}

/**
 * Plain text analysis of a formula: notations, masses, elemental
 * composition and mass distribution. Errors are reported as a single
 * 'Error: ...' line.
 */
export function analyze(input: string, opts: AnalyzeOptions = {}): string {
  const maxAtoms = opts.maxAtoms ?? 250;
  const debug = opts.debug ?? false;
  const lines: string[] = [];

  try {
    const f = new Formula(input);

    if (f.formula.length <= 50) lines.push(`Formula: ${f.formula}`);
    if (debug || f.hill !== input) lines.push(`Hill notation: ${f.hill}`);
    if (debug || f.empirical !== f.hill) lines.push(`Empirical formula: ${f.empirical}`);

    const precision = precisionDigits(f.mass, 9);
    const isotope = f.isotope;
    lines.push('', `Nominal mass: ${isotope.massnumber}`);
    if (debug || f.mass !== isotope.mass) {
      lines.push(`Average mass: ${f.mass.toFixed(precision)}`);
    }
    lines.push(
      `Monoisotopic mass: ${isotope.mass.toFixed(precision)} (${(isotope.abundance * 100).toFixed(3)}%)`,
    );
    if (f.charge) {
      lines.push(`m/z (${formatCharge(f.charge)}): ${f.mz.toFixed(precision)}`);
    }
    lines.push(`Number of atoms: ${f.atoms}`);

    const composition = f.composition();
    if (debug || composition.size > 1) {
      lines.push('', 'Elemental Composition', '', composition.toString());
    }

    if (f.atoms < maxAtoms) {
      const spectrum = f.spectrum({ minFraction: opts.minFraction, minIntensity: opts.minIntensity });
      if (spectrum.size > 1 || (debug && spectrum.size > 0)) {
        const peak = spectrum.peak;
        lines.push(
          '',
          'Mass Distribution',
          '',
          `Most abundant mass: ${peak.mass.toFixed(precision)} (${(peak.fraction * 100).toFixed(3)}%)`,
          `Mean mass: ${spectrum.mean.toFixed(precision)}`,
          '',
          spectrum.toString(),
        );
      }
    }
  } catch (error) {
    lines.push(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }

  return lines.join('\n');
}
