import { describe, it, expect, beforeEach, vi } from 'vitest';
import { pino } from 'pino';
import { ConfigurationError, ensembleConfigSchema, type DetectorConfig } from '@code-verdict/config';
import {
  DetectorRegistry,
  EnsembleAnomalyDetector,
  ReferenceSet,
  createDefaultRegistry,
  createEnsemble,
  createVote,
  fuseVotes,
  type Detector,
  type DetectorContext,
  type DetectorMetadata,
  type Embedding,
  type EnsembleMember,
  type EnsembleSettings,
  type ScoreResult,
} from '../src/index.js';

const EMBEDDING: Embedding = [0.1, 0.2, 0.3];

const SETTINGS: EnsembleSettings = {
  quorum: 2,
  detectorTimeoutMs: 100,
  agreementThreshold: 0.5,
  overrideScore: 0.8,
  degradedConfidenceCap: 0.4,
};

function metadata(id: string): DetectorMetadata {
  return { id, name: id, description: `${id} test detector`, version: '1.0.0' };
}

/**
 * Detector that returns a fixed raw score
 */
class FixedDetector implements Detector {
  readonly metadata: DetectorMetadata;

  constructor(
    id: string,
    private readonly rawScore: number,
  ) {
    this.metadata = metadata(id);
  }

  async score(): Promise<ScoreResult> {
    return { rawScore: this.rawScore };
  }
}

/**
 * Detector that throws an error for testing
 */
class ErrorDetector implements Detector {
  readonly metadata = metadata('error-detector');

  async score(): Promise<ScoreResult> {
    throw new Error('Intentional error for testing');
  }
}

/**
 * Detector that takes far longer than any timeout, but stops when aborted
 */
class SlowDetector implements Detector {
  readonly metadata: DetectorMetadata;
  aborted = false;

  constructor(id: string) {
    this.metadata = metadata(id);
  }

  async score(_embedding: Embedding, context: DetectorContext): Promise<ScoreResult> {
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(resolve, 5000);
      context.signal.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          this.aborted = true;
          reject(new Error('aborted'));
        },
        { once: true },
      );
    });
    return { rawScore: 0 };
  }
}

/**
 * Detector that blocks the event loop instead of awaiting
 */
class BusyDetector implements Detector {
  readonly metadata: DetectorMetadata;

  constructor(
    id: string,
    private readonly busyMs: number,
  ) {
    this.metadata = metadata(id);
  }

  async score(): Promise<ScoreResult> {
    const until = Date.now() + this.busyMs;
    while (Date.now() < until) {
      // spin
    }
    return { rawScore: 0.9 };
  }
}

/**
 * Identity calibration so raw scores are the normalized scores
 */
function member(detector: Detector, overrides: Partial<DetectorConfig> = {}): EnsembleMember {
  return {
    detector,
    config: {
      id: detector.metadata.id,
      weight: 1,
      threshold: 0.5,
      calibration: { method: 'minmax', min: 0, max: 1 },
      enabled: true,
      ...overrides,
    },
  };
}

function fixedEnsemble(scores: number[], settings: EnsembleSettings = SETTINGS): EnsembleAnomalyDetector {
  return new EnsembleAnomalyDetector(
    scores.map((s, i) => member(new FixedDetector(`fixed-${i}`, s))),
    settings,
  );
}

describe('DetectorRegistry', () => {
  let registry: DetectorRegistry;

  beforeEach(() => {
    registry = new DetectorRegistry();
  });

  it('registers and retrieves detectors', () => {
    const detector = new FixedDetector('a', 0.1);
    registry.register(detector);

    expect(registry.has('a')).toBe(true);
    expect(registry.get('a')).toBe(detector);
  });

  it('throws on duplicate registration', () => {
    registry.register(new FixedDetector('a', 0.1));

    expect(() => registry.register(new FixedDetector('a', 0.2))).toThrow('already registered');
  });

  it('rejects values that do not implement Detector', () => {
    const plugin: Detector = JSON.parse('{"metadata":{"id":"plugin"}}');

    expect(() => registry.register(plugin)).toThrow(TypeError);
    expect(registry.has('plugin')).toBe(false);
  });

  it('returns all detectors and IDs in registration order', () => {
    registry.register(new FixedDetector('a', 0.1));
    registry.register(new FixedDetector('b', 0.2));

    expect(registry.getAll()).toHaveLength(2);
    expect(registry.getIds()).toEqual(['a', 'b']);
  });

  it('removes and clears detectors', () => {
    registry.register(new FixedDetector('a', 0.1));
    registry.register(new FixedDetector('b', 0.2));

    expect(registry.remove('a')).toBe(true);
    expect(registry.getIds()).toEqual(['b']);
    registry.clear();
    expect(registry.getAll()).toHaveLength(0);
  });

  it('creates the default registry with the built-in detectors', () => {
    const reference = new ReferenceSet([
      [0, 0],
      [1, 1],
    ]);

    expect(createDefaultRegistry(reference).getIds()).toEqual([
      'centroid-distance',
      'reconstruction-error',
      'nearest-neighbor',
    ]);
  });
});

describe('EnsembleAnomalyDetector', () => {
  it('reaches full confidence when every detector flags', async () => {
    const verdict = await fixedEnsemble([0.9, 0.85, 0.95]).detect(EMBEDDING);

    expect(verdict.validVotes).toBe(3);
    expect(verdict.agreementRatio).toBe(1);
    expect(verdict.fusedScore).toBeCloseTo(0.9, 10);
    expect(verdict.anomalous).toBe(true);
    expect(verdict.confidence).toBe(1);
    expect(verdict.quorumMet).toBe(true);
    expect(verdict.degraded).toBe(false);
    expect(verdict.votes.map((v) => v.flagged)).toEqual([true, true, true]);
  });

  it('reaches full confidence when no detector flags', async () => {
    const verdict = await fixedEnsemble([0.1, 0.2, 0.3]).detect(EMBEDDING);

    expect(verdict.agreementRatio).toBe(0);
    expect(verdict.fusedScore).toBeCloseTo(0.2, 10);
    expect(verdict.anomalous).toBe(false);
    expect(verdict.confidence).toBe(1);
  });

  it('lowers confidence when the vote is split', async () => {
    const verdict = await fixedEnsemble([0.9, 0.2, 0.1]).detect(EMBEDDING);

    expect(verdict.agreementRatio).toBeCloseTo(1 / 3, 10);
    expect(verdict.fusedScore).toBeCloseTo(0.4, 10);
    expect(verdict.anomalous).toBe(false);
    expect(verdict.confidence).toBeCloseTo(2 / 3, 10);
  });

  it('treats an even split as anomalous with confidence 0.5', async () => {
    const verdict = await fixedEnsemble([0.9, 0.1]).detect(EMBEDDING);

    expect(verdict.agreementRatio).toBe(0.5);
    expect(verdict.anomalous).toBe(true);
    expect(verdict.confidence).toBe(0.5);
  });

  it('lets one heavily weighted detector override a minority vote', async () => {
    const ensemble = new EnsembleAnomalyDetector(
      [
        member(new FixedDetector('strong', 0.95), { weight: 10 }),
        member(new FixedDetector('weak-1', 0.3)),
        member(new FixedDetector('weak-2', 0.3)),
      ],
      SETTINGS,
    );

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.agreementRatio).toBeCloseTo(1 / 3, 10);
    expect(verdict.fusedScore).toBeCloseTo((9.5 + 0.3 + 0.3) / 12, 10);
    expect(verdict.anomalous).toBe(true);
  });

  it('weights the fused score by detector reliability', async () => {
    const ensemble = new EnsembleAnomalyDetector(
      [member(new FixedDetector('a', 0.8), { weight: 3 }), member(new FixedDetector('b', 0.4))],
      SETTINGS,
    );

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.fusedScore).toBeCloseTo(0.7, 10);
  });

  it('applies each detector calibration and threshold', async () => {
    const ensemble = new EnsembleAnomalyDetector(
      [
        member(new FixedDetector('minmax', 3), { calibration: { method: 'minmax', min: 2, max: 6 }, threshold: 0.3 }),
        member(new FixedDetector('sigmoid', 1), { calibration: { method: 'sigmoid', midpoint: 1, slope: 4 }, threshold: 0.6 }),
      ],
      SETTINGS,
    );

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.votes[0]?.normalizedScore).toBe(0.25);
    expect(verdict.votes[0]?.flagged).toBe(false);
    expect(verdict.votes[1]?.normalizedScore).toBe(0.5);
    expect(verdict.votes[1]?.flagged).toBe(false);
    expect(verdict.votes[1]?.rawScore).toBe(1);
  });

  it('excludes a failing detector and keeps the others', async () => {
    const ensemble = new EnsembleAnomalyDetector(
      [member(new FixedDetector('a', 0.9)), member(new FixedDetector('b', 0.8)), member(new ErrorDetector())],
      SETTINGS,
    );

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.validVotes).toBe(2);
    expect(verdict.totalDetectors).toBe(3);
    expect(verdict.failures).toHaveLength(1);
    expect(verdict.failures[0]?.detectorId).toBe('error-detector');
    expect(verdict.failures[0]?.reason).toBe('unavailable');
    expect(verdict.failures[0]?.message).toBe('Intentional error for testing');
    expect(verdict.quorumMet).toBe(true);
    expect(verdict.confidence).toBe(1);
  });

  it('caps confidence when timeouts break the quorum', async () => {
    const slowA = new SlowDetector('slow-a');
    const slowB = new SlowDetector('slow-b');
    const ensemble = new EnsembleAnomalyDetector(
      [member(new FixedDetector('fast', 0.9)), member(slowA), member(slowB)],
      { ...SETTINGS, detectorTimeoutMs: 30 },
    );

    const start = Date.now();
    const verdict = await ensemble.detect(EMBEDDING);

    expect(Date.now() - start).toBeLessThan(1000);
    expect(verdict.validVotes).toBe(1);
    expect(verdict.failures.map((f) => f.reason)).toEqual(['timeout', 'timeout']);
    expect(verdict.failures[0]?.message).toBe('Detector slow-a timed out after 30ms');
    expect(verdict.quorumMet).toBe(false);
    expect(verdict.degraded).toBe(true);
    expect(verdict.confidence).toBe(0.4);
    expect(verdict.fusedScore).toBe(0.9);
    expect(slowA.aborted).toBe(true);
    expect(slowB.aborted).toBe(true);
  });

  it('counts a detector that blocks past its budget as timed out', async () => {
    const ensemble = new EnsembleAnomalyDetector(
      [member(new BusyDetector('busy', 150)), member(new FixedDetector('a', 0.2)), member(new FixedDetector('b', 0.3))],
      { ...SETTINGS, detectorTimeoutMs: 30 },
    );

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.votes.map((v) => v.detectorId)).toEqual(['a', 'b']);
    expect(verdict.failures).toHaveLength(1);
    expect(verdict.failures[0]?.reason).toBe('timeout');
    expect(verdict.failures[0]?.message).toBe('Detector busy timed out after 30ms');
    expect(verdict.quorumMet).toBe(true);
  });

  it('runs a single detector below quorum as a degraded ensemble', async () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');

    const ensemble = new EnsembleAnomalyDetector([member(new FixedDetector('only', 0.9))], SETTINGS, logger);

    expect(warn).toHaveBeenCalledWith(
      { quorum: 2, detectors: 1 },
      'Quorum exceeds the number of detectors; every verdict will be degraded',
    );

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.anomalous).toBe(true);
    expect(verdict.quorumMet).toBe(false);
    expect(verdict.degraded).toBe(true);
    expect(verdict.confidence).toBe(0.4);
  });

  it('returns a degraded verdict when every detector fails', async () => {
    const ensemble = new EnsembleAnomalyDetector([member(new ErrorDetector())], { ...SETTINGS, quorum: 1 });

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.fusedScore).toBeNull();
    expect(verdict.agreementRatio).toBeNull();
    expect(verdict.anomalous).toBe(false);
    expect(verdict.confidence).toBe(0);
    expect(verdict.degraded).toBe(true);
    expect(verdict.validVotes).toBe(0);
  });

  it('rejects non-finite raw scores', async () => {
    const ensemble = new EnsembleAnomalyDetector(
      [member(new FixedDetector('nan', Number.NaN)), member(new FixedDetector('ok', 0.2))],
      { ...SETTINGS, quorum: 1 },
    );

    const verdict = await ensemble.detect(EMBEDDING);

    expect(verdict.failures).toEqual([
      { detectorId: 'nan', reason: 'out_of_domain', message: 'Detector nan returned a non-finite score', durationMs: expect.any(Number) },
    ]);
    expect(verdict.validVotes).toBe(1);
  });

  it('requires at least one member', () => {
    expect(() => new EnsembleAnomalyDetector([], SETTINGS)).toThrow(ConfigurationError);
  });
});

describe('fuseVotes', () => {
  it('is exactly 1.0 confident for unanimous votes', () => {
    const votes = [0.6, 0.7, 0.99].map((s, i) =>
      createVote({ detectorId: `d${i}`, rawScore: s, normalizedScore: s, threshold: 0.5, weight: 1 }),
    );

    expect(fuseVotes(votes, [], 3, SETTINGS).confidence).toBe(1);
  });

  it('derives the flag from the threshold, inclusive', () => {
    expect(createVote({ detectorId: 'd', rawScore: 0.5, normalizedScore: 0.5, threshold: 0.5, weight: 1 }).flagged).toBe(true);
    expect(createVote({ detectorId: 'd', rawScore: 0.49, normalizedScore: 0.49, threshold: 0.5, weight: 1 }).flagged).toBe(false);
  });
});

describe('createEnsemble', () => {
  it('fails fast when a configured detector is not registered', () => {
    const registry = new DetectorRegistry();
    registry.register(new FixedDetector('a', 0.1));
    const config = ensembleConfigSchema.parse({ detectors: [{ id: 'a' }, { id: 'missing' }] });

    expect(() => createEnsemble(registry, config)).toThrow(ConfigurationError);
    expect(() => createEnsemble(registry, config)).toThrow('Detector missing is configured but not registered');
  });

  it('skips disabled detectors', () => {
    const registry = new DetectorRegistry();
    registry.register(new FixedDetector('a', 0.1));
    registry.register(new FixedDetector('b', 0.1));
    const config = ensembleConfigSchema.parse({ detectors: [{ id: 'a' }, { id: 'b', enabled: false }], quorum: 1 });

    const ensemble = createEnsemble(registry, config);

    expect(ensemble.getMembers().map((m) => m.detector.metadata.id)).toEqual(['a']);
  });

  it('flags a far-away embedding with the default detectors', async () => {
    const reference = new ReferenceSet([
      [0, 0],
      [0.1, 0],
      [0, 0.1],
      [0.1, 0.1],
    ]);
    const ensemble = createEnsemble(createDefaultRegistry(reference), ensembleConfigSchema.parse({}));

    const verdict = await ensemble.detect([1.5, 1.5]);

    expect(verdict.validVotes).toBe(3);
    expect(verdict.votes.map((v) => v.detectorId)).toEqual([
      'centroid-distance',
      'reconstruction-error',
      'nearest-neighbor',
    ]);
    // The reference spans the plane, so reconstruction leaves no residual
    expect(verdict.votes.map((v) => v.flagged)).toEqual([true, false, true]);
    expect(verdict.agreementRatio).toBeCloseTo(2 / 3, 10);
    expect(verdict.anomalous).toBe(true);
  });
});
