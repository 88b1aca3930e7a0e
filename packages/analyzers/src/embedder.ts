import { createHash } from 'node:crypto';
import type { EmbeddingModel } from '@code-verdict/verdict-core';
import { extractFeatures } from './features.js';
import { createPythonParser } from './parser.js';

export const DEFAULT_EMBEDDING_DIMENSION = 64;

/**
 * Bucket and sign for one feature token, derived from its SHA-256 digest
 */
export function hashFeature(feature: string, dimension: number): { index: number; sign: 1 | -1 } {
  const digest = createHash('sha256').update(feature, 'utf-8').digest();
  return {
    index: digest.readUInt32BE(0) % dimension,
    sign: (digest[4] & 1) === 0 ? 1 : -1,
  };
}

/**
 * Signed feature hashing into an L2-normalized vector.
 *
 * Deterministic: identical source always yields the identical vector. Source
 * with no features maps to the zero vector. Malformed source is embedded from
 * its recovered tree rather than rejected.
 */
export class FeatureHashEmbedder implements EmbeddingModel {
  readonly dimension: number;
  private readonly parser = createPythonParser();

  constructor(dimension = DEFAULT_EMBEDDING_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`embedding dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  embedFeatures(features: readonly string[]): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const feature of features) {
      const { index, sign } = hashFeature(feature, this.dimension);
      vector[index] += sign;
    }

    const length = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return length === 0 ? vector : vector.map((v) => v / length);
  }

  async embed(code: string, signal?: AbortSignal): Promise<readonly number[]> {
    signal?.throwIfAborted();
    return this.embedFeatures(extractFeatures(this.parser.parse(code), code));
  }
}
