import { sha256Hex } from '../utils/canonical.js';

/**
 * A piece of source text under analysis, identified by its content hash
 */
export interface CodeUnit {
  readonly id: string;
  readonly source: string;
}

export function createCodeUnit(source: string): CodeUnit {
  return Object.freeze({ id: sha256Hex(source), source });
}
