import { pino, type Logger } from 'pino';
import {
  ConfigurationError,
  getEnabledDetectors,
  type DetectorConfig,
  type EnsembleConfig,
} from '@code-verdict/config';
import { withTimeout, isTimeoutError } from '@code-verdict/resilience';
import { normalizeScore } from './calibration.js';
import type { Detector, Embedding } from './detectors/detector.js';
import type { DetectorRegistry } from './detectors/index.js';
import { createVote, type DetectorFailure, type DetectorVote, type EnsembleVerdict } from './vote.js';

/**
 * A detector together with its ensemble configuration
 */
export interface EnsembleMember {
  detector: Detector;
  config: DetectorConfig;
}

export type EnsembleSettings = Omit<EnsembleConfig, 'detectors'>;

type MemberOutcome = { vote: DetectorVote } | { failure: DetectorFailure };

/**
 * Fuse valid votes into a verdict.
 *
 * Failed detectors are already excluded from `votes`; `totalDetectors`
 * only feeds the report.
 */
export function fuseVotes(
  votes: readonly DetectorVote[],
  failures: readonly DetectorFailure[],
  totalDetectors: number,
  settings: Pick<EnsembleSettings, 'quorum' | 'agreementThreshold' | 'overrideScore' | 'degradedConfidenceCap'>,
): EnsembleVerdict {
  const validVotes = votes.length;

  if (validVotes === 0) {
    return Object.freeze({
      fusedScore: null,
      agreementRatio: null,
      anomalous: false,
      confidence: 0,
      degraded: true,
      quorumMet: false,
      validVotes,
      totalDetectors,
      votes,
      failures,
    });
  }

  const totalWeight = votes.reduce((sum, v) => sum + v.weight, 0);
  const fusedScore = votes.reduce((sum, v) => sum + v.weight * v.normalizedScore, 0) / totalWeight;
  const agreementRatio = votes.filter((v) => v.flagged).length / validVotes;

  // A single strong score can carry the verdict even when the vote is split
  const anomalous = agreementRatio >= settings.agreementThreshold || fusedScore >= settings.overrideScore;

  const quorumMet = validVotes >= settings.quorum;
  let confidence = 0.5 + Math.abs(agreementRatio - 0.5);
  if (!quorumMet) {
    confidence = Math.min(confidence, settings.degradedConfidenceCap);
  }

  return Object.freeze({
    fusedScore,
    agreementRatio,
    anomalous,
    confidence,
    degraded: !quorumMet,
    quorumMet,
    validVotes,
    totalDetectors,
    votes,
    failures,
  });
}

/**
 * Ensemble anomaly detector - runs every member detector concurrently and
 * fuses their votes.
 *
 * Stateless between runs. It handles:
 * - Per-detector timeout with cancellation
 * - Error isolation (one detector failing doesn't stop others)
 * - Calibration, voting and quorum
 */
export class EnsembleAnomalyDetector {
  private readonly members: readonly EnsembleMember[];
  private readonly settings: EnsembleSettings;
  private readonly logger: Logger;

  constructor(members: EnsembleMember[], settings: EnsembleSettings, logger?: Logger) {
    if (members.length === 0) {
      throw new ConfigurationError('ensemble requires at least one detector');
    }
    this.members = Object.freeze([...members]);
    this.settings = settings;
    this.logger = logger ?? pino({ level: 'silent' });

    if (settings.quorum > members.length) {
      this.logger.warn(
        { quorum: settings.quorum, detectors: members.length },
        'Quorum exceeds the number of detectors; every verdict will be degraded',
      );
    }
  }

  /**
   * Score an embedding with every member and return the consensus.
   * Never rejects: detector faults end up in `failures`.
   */
  async detect(embedding: Embedding): Promise<EnsembleVerdict> {
    const outcomes = await Promise.all(this.members.map((member) => this.runMember(member, embedding)));

    const votes: DetectorVote[] = [];
    const failures: DetectorFailure[] = [];
    for (const outcome of outcomes) {
      if ('vote' in outcome) {
        votes.push(outcome.vote);
      } else {
        failures.push(outcome.failure);
      }
    }

    const verdict = fuseVotes(votes, failures, this.members.length, this.settings);

    if (!verdict.quorumMet) {
      this.logger.warn(
        { validVotes: verdict.validVotes, quorum: this.settings.quorum, failed: failures.map((f) => f.detectorId) },
        'Ensemble quorum not met',
      );
    }
    this.logger.debug(
      {
        fusedScore: verdict.fusedScore,
        agreementRatio: verdict.agreementRatio,
        anomalous: verdict.anomalous,
        confidence: verdict.confidence,
      },
      'Ensemble verdict',
    );

    return verdict;
  }

  getMembers(): readonly EnsembleMember[] {
    return this.members;
  }

  private async runMember(member: EnsembleMember, embedding: Embedding): Promise<MemberOutcome> {
    const { detector, config } = member;
    const detectorId = detector.metadata.id;
    const start = Date.now();

    try {
      const result = await withTimeout(
        (signal) => detector.score(embedding, { signal }),
        this.settings.detectorTimeoutMs,
        `Detector ${detectorId}`,
      );

      if (!Number.isFinite(result.rawScore)) {
        return {
          failure: {
            detectorId,
            reason: 'out_of_domain',
            message: `Detector ${detectorId} returned a non-finite score`,
            durationMs: Date.now() - start,
          },
        };
      }

      return {
        vote: createVote({
          detectorId,
          rawScore: result.rawScore,
          normalizedScore: normalizeScore(result.rawScore, config.calibration),
          threshold: config.threshold,
          weight: config.weight,
          details: result.details,
          durationMs: Date.now() - start,
        }),
      };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      const reason = isTimeoutError(error) ? 'timeout' : 'unavailable';
      this.logger.warn({ detectorId, reason, err: error }, 'Detector excluded from vote');

      return {
        failure: {
          detectorId,
          reason,
          message: error.message,
          durationMs: Date.now() - start,
        },
      };
    }
  }
}

/**
 * Build an ensemble from configuration, resolving detector IDs in the registry.
 *
 * @throws ConfigurationError if a configured detector is not registered
 */
export function createEnsemble(
  registry: DetectorRegistry,
  config: EnsembleConfig,
  logger?: Logger,
): EnsembleAnomalyDetector {
  const members = getEnabledDetectors(config).map((detectorConfig) => {
    const detector = registry.get(detectorConfig.id);
    if (!detector) {
      throw new ConfigurationError(
        `Detector ${detectorConfig.id} is configured but not registered (known: ${registry.getIds().join(', ') || 'none'})`,
      );
    }
    return { detector, config: detectorConfig };
  });

  const settings: EnsembleSettings = {
    quorum: config.quorum,
    detectorTimeoutMs: config.detectorTimeoutMs,
    agreementThreshold: config.agreementThreshold,
    overrideScore: config.overrideScore,
    degradedConfidenceCap: config.degradedConfidenceCap,
  };
  return new EnsembleAnomalyDetector(members, settings, logger);
}
