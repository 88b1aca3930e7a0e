import type { EnsembleVerdict } from '@code-verdict/anomaly';
import type { Insight, SecurityFinding } from './schemas/index.js';

/**
 * Metric name to raw measurement, e.g. `{ cyclomatic_complexity: 7 }`
 */
export type StructureMetrics = Record<string, number>;

/**
 * Parser / static-metrics provider.
 *
 * May reject with ParseError on malformed input; the structure category is
 * then degraded rather than the analysis aborted.
 */
export interface StructureAnalyzer {
  analyzeStructure(code: string, signal?: AbortSignal): Promise<StructureMetrics>;
}

export interface SecurityChecker {
  scan(code: string, signal?: AbortSignal): Promise<SecurityFinding[]>;
}

/**
 * Embedding model. Must be deterministic for identical input.
 */
export interface EmbeddingModel {
  /** Length of every vector the model returns */
  readonly dimension: number;
  embed(code: string, signal?: AbortSignal): Promise<readonly number[]>;
}

/**
 * The known sample an embedding most resembles
 */
export interface ReferenceMatch {
  reference: string;
  /** Cosine similarity to the sample */
  similarity: number;
  /** The sample's labelled quality */
  quality: number;
}

export interface QualityPrediction {
  /** Estimated quality, declared range [0, 1] */
  quality: number;
  confidence: number;
  /** Set when one sample is close enough to be worth reporting */
  match?: ReferenceMatch;
}

export interface QualityModel {
  predict(embedding: readonly number[], signal?: AbortSignal): Promise<QualityPrediction>;
}

/**
 * Rule-based code review. Its insights are reported but never scored.
 */
export interface CodeReviewer {
  review(code: string, signal?: AbortSignal): Promise<Insight[]>;
}

/**
 * Anything that turns an embedding into an ensemble verdict
 */
export interface AnomalyDetector {
  detect(embedding: readonly number[]): Promise<EnsembleVerdict>;
}
