import { describe, it, expect } from 'vitest';
import { NEUTRON, POSITRON, PROTON, ELECTRON, ELEMENTARY_CHARGE } from 'src/constants';
import { Element, ElementTable, getElementTable, resetElementTable } from 'src/utils/element-table';
import type { ElementData } from 'src/utils/element-table';

function elementData(overrides: Partial<ElementData>): ElementData {
  return {
    number: 1,
    symbol: 'H',
    name: 'Hydrogen',
    group: 1,
    period: 1,
    block: 's',
    series: 1,
    mass: 1.007941,
    eleneg: 2.2,
    eleaffin: 0.75420375,
    covrad: 0.32,
    atmrad: 0.79,
    vdwrad: 1.2,
    tboil: 20.28,
    tmelt: 13.81,
    density: 0.084,
    eleconfig: '1s',
    oxistates: '1*, -1',
    ionenergy: [13.5984],
    isotopes: [
      { massnumber: 1, mass: 1.00782503223, abundance: 0.999885 },
      { massnumber: 2, mass: 2.01410177812, abundance: 0.000115 },
    ],
    ...overrides,
  };
}

describe('ElementTable', () => {
  const table = getElementTable();

  it('holds 109 elements in atomic number order', () => {
    expect(table.size).toBe(109);
    const symbols = [...table].map(element => element.symbol);
    expect(symbols[0]).toBe('H');
    expect(symbols[5]).toBe('C');
    expect(symbols[108]).toBe('Mt');
  });

  it('looks elements up by symbol, name and number', () => {
    expect(table.get('C').name).toBe('Carbon');
    expect(table.get(26).symbol).toBe('Fe');
    expect(table.get('Iron').number).toBe(26);
    expect(table.has('Fe')).toBe(true);
    expect(table.has('Xx')).toBe(false);
    expect(table.find('Xx')).toBeUndefined();
    expect(() => table.get('Xx')).toThrow("unknown element 'Xx'");
  });

  it('returns the same instance until reset', () => {
    const current = getElementTable();
    expect(getElementTable()).toBe(current);
    resetElementTable();
    const reloaded = getElementTable();
    expect(reloaded).not.toBe(current);
    expect(reloaded.get('Fe').number).toBe(26);
  });

  it('passes validation for every element', () => {
    expect(() => table.validate()).not.toThrow();
    for (const element of table) {
      let abundance = 0;
      for (const isotope of element.isotopes.values()) abundance += isotope.abundance;
      expect(Math.abs(abundance - 1)).toBeLessThan(1e-9);
    }
  });

  it('requires elements in order', () => {
    expect(() => new ElementTable([elementData({ number: 2 })])).toThrow('elements must be added in order');
  });
});

describe('Element', () => {
  it('has as many protons and electrons as its atomic number', () => {
    const iron = getElementTable().get('Fe');
    expect(iron.protons).toBe(26);
    expect(iron.electrons).toBe(26);
  });

  it('derives nominal mass from the most abundant isotope', () => {
    const carbon = getElementTable().get('C');
    expect(carbon.nominalMass).toBe(12);
    expect(carbon.neutrons).toBe(6);
    expect(carbon.protons).toBe(6);
    expect(carbon.mostAbundantIsotope.mass).toBe(12);
    expect(carbon.exactMass).toBeCloseTo(12.0107359, 6);
    expect(String(carbon)).toBe('Carbon');
  });

  it('orders isotopes by mass number', () => {
    const chlorine = getElementTable().get('Cl');
    expect([...chlorine.isotopes.keys()]).toEqual([35, 37]);
    expect(chlorine.isotope(37)?.abundance).toBe(0.2424);
    expect(chlorine.isotope(36)).toBeUndefined();
  });

  it('detects inconsistent data', () => {
    expect(() => new Element(elementData({ isotopes: [] })).validate()).toThrow('H - element has no isotopes');
    expect(() => new Element(elementData({ ionenergy: [13.6, 12.0] })).validate()).toThrow(
      'H - ionenergy not increasing',
    );
    expect(() => new Element(elementData({ mass: 1.1 })).validate()).toThrow('H - average of isotope masses');
    expect(() =>
      new Element(
        elementData({ mass: 0.907, isotopes: [{ massnumber: 1, mass: 1.00782503223, abundance: 0.9 }] }),
      ).validate(),
    ).toThrow('H - sum of isotope abundances != 1.0');
    expect(() => new Element(elementData({})).validate()).not.toThrow();
  });
});

describe('particles', () => {
  it('carries the elementary charge with the right sign', () => {
    expect(PROTON.charge).toBe(ELEMENTARY_CHARGE);
    expect(POSITRON.charge).toBe(ELEMENTARY_CHARGE);
    expect(ELECTRON.charge).toBe(-ELEMENTARY_CHARGE);
    expect(NEUTRON.charge).toBe(0);
    expect(POSITRON.mass).toBe(ELECTRON.mass);
    expect(PROTON.mass).toBeLessThan(NEUTRON.mass);
  });
});
