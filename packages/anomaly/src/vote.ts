/**
 * Output of one detector for one embedding. Lives for a single detection run.
 */
export interface DetectorVote {
  detectorId: string;

  /** Uncalibrated score as returned by the detector */
  rawScore: number;

  /** Score after the detector's calibration, in [0, 1] */
  normalizedScore: number;

  /** Threshold the normalized score was compared against */
  threshold: number;

  /** Reliability weight used during fusion */
  weight: number;

  /** normalizedScore >= threshold */
  flagged: boolean;

  details: Record<string, unknown>;

  durationMs: number;
}

export type DetectorFailureReason = 'timeout' | 'unavailable' | 'out_of_domain';

/**
 * A detector excluded from the vote
 */
export interface DetectorFailure {
  detectorId: string;
  reason: DetectorFailureReason;
  message: string;
  durationMs: number;
}

/**
 * Consensus of all detectors for one embedding
 */
export interface EnsembleVerdict {
  /** Reliability-weighted mean of normalized scores; null when no detector produced a score */
  fusedScore: number | null;

  /** Fraction of valid votes that flagged the unit; null when no detector produced a score */
  agreementRatio: number | null;

  anomalous: boolean;

  /** 0.5 + |agreementRatio - 0.5|, capped when the quorum is not met */
  confidence: number;

  /** True when fewer valid votes than the quorum were collected */
  degraded: boolean;

  quorumMet: boolean;

  validVotes: number;

  totalDetectors: number;

  votes: readonly DetectorVote[];

  failures: readonly DetectorFailure[];
}

/**
 * Create a vote, deriving the flag from the threshold
 */
export function createVote(params: {
  detectorId: string;
  rawScore: number;
  normalizedScore: number;
  threshold: number;
  weight: number;
  details?: Record<string, unknown>;
  durationMs?: number;
}): DetectorVote {
  return Object.freeze({
    detectorId: params.detectorId,
    rawScore: params.rawScore,
    normalizedScore: params.normalizedScore,
    threshold: params.threshold,
    weight: params.weight,
    flagged: params.normalizedScore >= params.threshold,
    details: params.details ?? {},
    durationMs: params.durationMs ?? 0,
  });
}
