import { isRecord, readDataFile } from './data-loader';

let defaultGroups: Readonly<Record<string, string>> | null = null;

/**
 * Built-in abbreviations of common chemical groups (amino acid residues,
 * protecting groups, substituents), e.g. `Et` -> `C2H5`.
 */
export function getChemicalGroups(): Readonly<Record<string, string>> {
  if (!defaultGroups) {
    defaultGroups = loadChemicalGroups();
  }
  return defaultGroups;
}

export function loadChemicalGroups(filename = 'groups.json', dataDir?: string): Readonly<Record<string, string>> {
  const raw = readDataFile(filename, dataDir);
  if (!isRecord(raw)) throw new Error(`${filename}: expected an object`);
  const groups: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string') {
      throw new Error(`${filename}: expansion of '${key}' must be a string`);
    }
    groups[key] = value;
  }
  return Object.freeze(groups);
}
