import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const DATA_DIR = join(__dirname, '..', 'data');

/**
 * Read and parse a JSON file shipped in the package data directory
 */
export function readDataFile(name: string): unknown {
  return JSON.parse(readFileSync(join(DATA_DIR, name), 'utf-8'));
}
