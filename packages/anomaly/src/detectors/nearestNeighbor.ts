import type { ReferenceSet } from '../reference.js';
import { assertDimension, euclideanDistance } from '../vectors.js';
import {
  yieldToEventLoop,
  type Detector,
  type DetectorContext,
  type DetectorMetadata,
  type Embedding,
  type ScoreResult,
} from './detector.js';

/** Reference points compared between yields */
const CHUNK_SIZE = 256;

export interface NearestNeighborOptions {
  /** Number of neighbours averaged (default: 5, capped at the reference size) */
  k?: number;
}

/**
 * Mean distance to the k nearest reference embeddings
 */
export class NearestNeighborDetector implements Detector {
  readonly metadata: DetectorMetadata = {
    id: 'nearest-neighbor',
    name: 'Nearest Neighbour Distance',
    description: 'Mean Euclidean distance to the k closest reference embeddings',
    version: '1.0.0',
  };

  private readonly k: number;

  constructor(
    private readonly reference: ReferenceSet,
    options: NearestNeighborOptions = {},
  ) {
    const k = options.k ?? 5;
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }
    this.k = Math.min(k, reference.size);
  }

  async score(embedding: Embedding, context: DetectorContext): Promise<ScoreResult> {
    context.signal.throwIfAborted();
    assertDimension(embedding, this.reference.dimension);

    const points = this.reference.getPoints();
    const distances: number[] = [];
    for (let start = 0; start < points.length; start += CHUNK_SIZE) {
      await yieldToEventLoop(context.signal);
      for (const point of points.slice(start, start + CHUNK_SIZE)) {
        distances.push(euclideanDistance(embedding, point));
      }
    }
    const nearest = distances.sort((a, b) => a - b).slice(0, this.k);

    const rawScore = nearest.reduce((sum, d) => sum + d, 0) / nearest.length;

    return {
      rawScore,
      details: { k: this.k, nearestDistance: nearest[0] },
    };
  }
}
