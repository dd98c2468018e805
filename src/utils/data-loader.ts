import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const DEFAULT_DATA_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'data');

/**
 * Read and parse a JSON file from the data directory.
 * The result is untyped; callers validate the shape they expect.
 */
export function readDataFile(filename: string, dataDir: string = DEFAULT_DATA_DIR): unknown {
  const filePath = join(dataDir, filename);
  if (process.env.VERBOSE) {
    console.debug(`[data-loader] reading ${filePath}`);
  }
  return JSON.parse(readFileSync(filePath, 'utf-8'));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readNumber(record: Record<string, unknown>, key: string, source: string): number {
  const value = record[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`${source}: field '${key}' must be a number`);
  }
  return value;
}

export function readString(record: Record<string, unknown>, key: string, source: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new Error(`${source}: field '${key}' must be a string`);
  }
  return value;
}
