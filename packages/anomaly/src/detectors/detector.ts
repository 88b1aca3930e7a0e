import { setImmediate } from 'node:timers/promises';
import type { Vector } from '../vectors.js';

export type Embedding = Vector;

/**
 * Context provided to detectors for a single scoring call
 */
export interface DetectorContext {
  /** Fires when the ensemble gives up on this detector (timeout) */
  signal: AbortSignal;
}

/**
 * Raw output of one detector
 */
export interface ScoreResult {
  /** Uncalibrated anomaly score, larger means more anomalous */
  rawScore: number;

  /** Detector-specific diagnostics */
  details?: Record<string, unknown>;
}

/**
 * Detector metadata
 */
export interface DetectorMetadata {
  /** Unique detector identifier, referenced from configuration */
  id: string;

  /** Human-readable name */
  name: string;

  /** What the detector measures */
  description: string;

  /** Version of the detector */
  version: string;
}

/**
 * Detector interface - all anomaly detectors must implement this
 */
export interface Detector {
  readonly metadata: DetectorMetadata;

  /**
   * Score an embedding against the detector's baseline.
   *
   * Detectors must be deterministic (same embedding, same score) and must
   * not mutate any shared state; the ensemble calls them concurrently.
   */
  score(embedding: Embedding, context: DetectorContext): Promise<ScoreResult>;
}

/**
 * Let timers and other detectors run, then stop if the call was abandoned.
 * Long-running detectors call this between chunks of work.
 */
export async function yieldToEventLoop(signal: AbortSignal): Promise<void> {
  await setImmediate();
  signal.throwIfAborted();
}

/**
 * Type guard to check if an object is a valid Detector
 */
export function isDetector(obj: unknown): obj is Detector {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  if (!('metadata' in obj) || !('score' in obj)) {
    return false;
  }

  const { metadata, score } = obj;
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'id' in metadata &&
    typeof metadata.id === 'string' &&
    typeof score === 'function'
  );
}
