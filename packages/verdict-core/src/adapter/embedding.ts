import { VectorSignalSchema, type DegradedSignal, type VectorSignal } from '../schemas/index.js';
import { deepFreeze } from '../utils/index.js';

export type EmbeddingResult = { signal: VectorSignal } | { degraded: DegradedSignal };

/**
 * Validate a raw embedding into a vector signal named `embedding`
 */
export function normalizeEmbedding(raw: unknown, expectedDimension?: number): EmbeddingResult {
  const degraded = (reason: DegradedSignal['reason'], detail: string): EmbeddingResult => ({
    degraded: { name: 'embedding', reason, detail },
  });

  if (!Array.isArray(raw)) {
    return degraded('parse_error', 'embedding is not an array');
  }
  const values: unknown[] = raw;
  const numbers = values.filter((v): v is number => typeof v === 'number');
  if (numbers.length !== values.length) {
    return degraded('parse_error', 'embedding contains non-numeric values');
  }
  if (numbers.length === 0) {
    return degraded('out_of_domain', 'embedding is empty');
  }
  if (!numbers.every((v) => Number.isFinite(v))) {
    return degraded('out_of_domain', 'embedding contains non-finite values');
  }
  if (expectedDimension !== undefined && numbers.length !== expectedDimension) {
    return degraded('out_of_domain', `expected dimension ${expectedDimension}, got ${numbers.length}`);
  }

  return {
    signal: deepFreeze(
      VectorSignalSchema.parse({
        kind: 'vector',
        name: 'embedding',
        sourceKind: 'embedding',
        value: numbers,
        dimension: numbers.length,
        confidence: 1,
      }),
    ),
  };
}
