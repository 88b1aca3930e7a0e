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

/**
 * Density detector: distance from the embedding to the baseline centroid.
 *
 * Code that sits far from the bulk of the reference corpus scores high.
 */
export class CentroidDistanceDetector implements Detector {
  readonly metadata: DetectorMetadata = {
    id: 'centroid-distance',
    name: 'Centroid Distance',
    description: 'Euclidean distance between the embedding and the reference centroid',
    version: '1.0.0',
  };

  constructor(private readonly reference: ReferenceSet) {}

  async score(embedding: Embedding, context: DetectorContext): Promise<ScoreResult> {
    await yieldToEventLoop(context.signal);
    assertDimension(embedding, this.reference.dimension);

    const distance = euclideanDistance(embedding, this.reference.centroid);

    return {
      rawScore: distance,
      details: { referenceSize: this.reference.size },
    };
  }
}
