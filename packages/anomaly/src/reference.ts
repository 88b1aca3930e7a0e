import { type Vector, isFiniteVector, meanVector } from './vectors.js';

/**
 * Baseline embeddings the detectors measure against.
 *
 * Built once and shared read-only by every detector and every analysis:
 * points are copied and frozen on construction, and nothing exposes a way
 * to change them afterwards.
 */
export class ReferenceSet {
  readonly dimension: number;
  readonly centroid: Vector;
  private readonly points: readonly Vector[];

  constructor(embeddings: readonly Vector[]) {
    if (embeddings.length === 0) {
      throw new RangeError('reference set requires at least one embedding');
    }

    const dimension = embeddings[0].length;
    if (dimension === 0) {
      throw new RangeError('reference embeddings must not be empty');
    }

    embeddings.forEach((embedding, index) => {
      if (embedding.length !== dimension) {
        throw new RangeError(
          `reference embedding ${index} has dimension ${embedding.length}, expected ${dimension}`,
        );
      }
      if (!isFiniteVector(embedding)) {
        throw new RangeError(`reference embedding ${index} contains non-finite values`);
      }
    });

    this.dimension = dimension;
    this.points = Object.freeze(embeddings.map((e) => Object.freeze([...e])));
    this.centroid = Object.freeze(meanVector(this.points));
  }

  get size(): number {
    return this.points.length;
  }

  getPoints(): readonly Vector[] {
    return this.points;
  }

  /**
   * Copy without the point at `index` (leave-one-out scoring)
   */
  without(index: number): ReferenceSet {
    if (this.points.length < 2) {
      throw new RangeError('cannot remove the only reference embedding');
    }
    return new ReferenceSet(this.points.filter((_, i) => i !== index));
  }
}
