import { cosineSimilarity, isFiniteVector } from '@code-verdict/anomaly';
import { DomainViolation, type QualityModel, type QualityPrediction } from '@code-verdict/verdict-core';

export interface QualityExample {
  embedding: readonly number[];
  /** Known quality in [0, 1] */
  quality: number;
  /** Name reported when this example is the closest match */
  label?: string;
}

export interface NearestNeighborQualityOptions {
  /** Number of neighbours consulted per prediction (default: 3) */
  k?: number;
  /** Similarity above which the closest example is reported (default: 0.7) */
  matchSimilarity?: number;
}

/**
 * Predicts quality from the most similar labelled examples.
 *
 * quality is the similarity-weighted mean of the k nearest examples, and
 * confidence is their mean positive cosine similarity. When no neighbour is
 * similar at all the corpus mean is returned with confidence 0. A closest
 * example above the match similarity is reported alongside the prediction.
 */
export class NearestNeighborQualityModel implements QualityModel {
  readonly dimension: number;
  private readonly examples: readonly Required<QualityExample>[];
  private readonly k: number;
  private readonly matchSimilarity: number;
  private readonly meanQuality: number;

  constructor(examples: readonly QualityExample[], options: NearestNeighborQualityOptions = {}) {
    if (examples.length === 0) {
      throw new RangeError('quality model requires at least one example');
    }

    const k = options.k ?? 3;
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }

    const dimension = examples[0].embedding.length;
    examples.forEach((example, index) => {
      if (example.embedding.length !== dimension || !isFiniteVector(example.embedding)) {
        throw new RangeError(`example ${index} is not a finite vector of dimension ${dimension}`);
      }
      if (!(example.quality >= 0 && example.quality <= 1)) {
        throw new RangeError(`example ${index} has quality ${example.quality}, expected [0, 1]`);
      }
    });

    this.dimension = dimension;
    this.examples = examples.map((e, index) => ({
      embedding: [...e.embedding],
      quality: e.quality,
      label: e.label ?? `example ${index}`,
    }));
    this.k = Math.min(k, examples.length);
    this.matchSimilarity = options.matchSimilarity ?? 0.7;
    this.meanQuality = examples.reduce((sum, e) => sum + e.quality, 0) / examples.length;
  }

  async predict(embedding: readonly number[], signal?: AbortSignal): Promise<QualityPrediction> {
    signal?.throwIfAborted();

    if (embedding.length !== this.dimension) {
      throw new DomainViolation(
        'predicted_quality',
        embedding.length,
        `expected embedding of dimension ${this.dimension}, got ${embedding.length}`,
      );
    }

    const neighbours = this.examples
      .map((example, index) => ({
        index,
        label: example.label,
        quality: example.quality,
        similarity: cosineSimilarity(embedding, example.embedding),
      }))
      .sort((a, b) => b.similarity - a.similarity || a.index - b.index)
      .slice(0, this.k);

    const totalWeight = neighbours.reduce((sum, n) => sum + Math.max(n.similarity, 0), 0);
    if (totalWeight === 0) {
      return { quality: this.meanQuality, confidence: 0 };
    }

    const quality = neighbours.reduce((sum, n) => sum + Math.max(n.similarity, 0) * n.quality, 0) / totalWeight;
    const prediction: QualityPrediction = {
      quality: Math.min(Math.max(quality, 0), 1),
      confidence: Math.min(totalWeight / this.k, 1),
    };

    const [closest] = neighbours;
    if (closest !== undefined && closest.similarity > this.matchSimilarity) {
      prediction.match = {
        reference: closest.label,
        similarity: Math.min(closest.similarity, 1),
        quality: closest.quality,
      };
    }
    return prediction;
  }
}
