import type { CompositionItem, FormulaIsotope, Isotope, ReadonlyElementCounts } from 'types';
import { ELECTRON } from 'src/constants';
import { hillSorted } from 'src/generators/formula-generator';
import { getElementTable } from './element-table';

/**
 * Isotope of `symbol` selected by `massnumber`; throws when the element
 * has no such isotope.
 */
export function getIsotope(symbol: string, massnumber: number): Isotope {
  const isotope = getElementTable().get(symbol).isotope(massnumber);
  if (!isotope) throw new Error(`unknown isotope '${massnumber}${symbol}'`);
  return isotope;
}

/**
 * Average relative molecular mass. Explicit isotopes contribute their own
 * mass, all other atoms the standard atomic weight. Each unit of positive
 * charge removes one electron mass.
 */
export function getAverageMass(elements: ReadonlyElementCounts, charge = 0): number {
  const table = getElementTable();
  let mass = 0;
  for (const [symbol, isotopes] of elements) {
    const element = table.get(symbol);
    for (const [massnumber, count] of isotopes) {
      mass += (massnumber ? getIsotope(symbol, massnumber).mass : element.mass) * count;
    }
  }
  return mass - ELECTRON.mass * charge;
}

/**
 * Isotope composed of the most abundant isotope of every atom, or of the
 * explicit isotope where one is given.
 */
export function getMonoisotopic(elements: ReadonlyElementCounts, charge = 0): FormulaIsotope {
  const table = getElementTable();
  const result: FormulaIsotope = { massnumber: 0, mass: 0, abundance: 1, charge };
  for (const [symbol, isotopes] of elements) {
    const element = table.get(symbol);
    for (const [massnumber, count] of isotopes) {
      const isotope = massnumber ? getIsotope(symbol, massnumber) : element.mostAbundantIsotope;
      result.mass += isotope.mass * count;
      result.massnumber += isotope.massnumber * count;
      result.abundance *= isotope.abundance ** count;
    }
  }
  result.mass -= ELECTRON.mass * charge;
  return result;
}

/**
 * Count, mass and mass fraction per element in Hill order. With `isotopic`,
 * explicit isotopes are listed separately as e.g. '13C' after the natural
 * element. A charged formula gets a final 'e-' entry for the missing or
 * excess electrons, so that masses add up to the total mass.
 */
export function getComposition(
  elements: ReadonlyElementCounts,
  charge = 0,
  isotopic = true,
): CompositionItem[] {
  const table = getElementTable();
  const total = getAverageMass(elements, charge);
  const fractionOf = (mass: number): number => (total ? mass / total : 0);
  const items: CompositionItem[] = [];

  for (const symbol of hillSorted(elements.keys())) {
    const isotopes = elements.get(symbol);
    if (!isotopes) continue;
    const element = table.get(symbol);

    if (isotopic) {
      for (const massnumber of [...isotopes.keys()].sort((a, b) => a - b)) {
        const count = isotopes.get(massnumber) ?? 0;
        const mass = (massnumber ? getIsotope(symbol, massnumber).mass : element.mass) * count;
        items.push({
          symbol: massnumber ? `${massnumber}${symbol}` : symbol,
          count,
          mass,
          fraction: fractionOf(mass),
        });
      }
    } else {
      let count = 0;
      let mass = 0;
      for (const [massnumber, n] of isotopes) {
        count += n;
        mass += (massnumber ? getIsotope(symbol, massnumber).mass : element.mass) * n;
      }
      items.push({ symbol, count, mass, fraction: fractionOf(mass) });
    }
  }

  if (charge) {
    const mass = -ELECTRON.mass * charge;
    items.push({ symbol: 'e-', count: -charge, mass, fraction: fractionOf(mass) });
  }
  return items;
}
