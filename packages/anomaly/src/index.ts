// Vectors
export {
  dot,
  norm,
  subtract,
  euclideanDistance,
  cosineSimilarity,
  meanVector,
  isFiniteVector,
  assertDimension,
} from './vectors.js';
export type { Vector } from './vectors.js';

// Reference data
export { ReferenceSet } from './reference.js';

// Detectors
export {
  DetectorRegistry,
  createDefaultRegistry,
  CentroidDistanceDetector,
  NearestNeighborDetector,
  ReconstructionErrorDetector,
  principalComponents,
  isDetector,
  yieldToEventLoop,
} from './detectors/index.js';

export type {
  Detector,
  DetectorContext,
  DetectorMetadata,
  Embedding,
  ScoreResult,
  NearestNeighborOptions,
  ReconstructionErrorOptions,
} from './detectors/index.js';

// Calibration
export { normalizeScore, fitCalibration, referenceScoreHistory } from './calibration.js';

// Votes and verdicts
export { createVote } from './vote.js';
export type { DetectorVote, DetectorFailure, DetectorFailureReason, EnsembleVerdict } from './vote.js';

// Ensemble
export { EnsembleAnomalyDetector, createEnsemble, fuseVotes } from './ensemble.js';
export type { EnsembleMember, EnsembleSettings } from './ensemble.js';
