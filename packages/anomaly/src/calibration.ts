import type { Calibration } from '@code-verdict/config';
import type { ReferenceSet } from './reference.js';
import type { Detector } from './detectors/detector.js';

/**
 * Map a raw detector score onto [0, 1] with the detector's own calibration
 */
export function normalizeScore(rawScore: number, calibration: Calibration): number {
  if (calibration.method === 'minmax') {
    const scaled = (rawScore - calibration.min) / (calibration.max - calibration.min);
    return Math.min(1, Math.max(0, scaled));
  }
  return 1 / (1 + Math.exp(-calibration.slope * (rawScore - calibration.midpoint)));
}

/**
 * Derive calibration parameters from a historical score distribution.
 *
 * minmax spans the observed range. sigmoid centres on the mean and sets the
 * slope so that mean + 2 standard deviations maps to 0.95.
 */
export function fitCalibration(method: Calibration['method'], history: readonly number[]): Calibration {
  if (history.length === 0) {
    throw new RangeError('cannot fit calibration on an empty score history');
  }
  if (!history.every((s) => Number.isFinite(s))) {
    throw new RangeError('score history contains non-finite values');
  }

  if (method === 'minmax') {
    const min = Math.min(...history);
    const max = Math.max(...history);
    if (max <= min) {
      throw new RangeError('score history has zero spread');
    }
    return { method: 'minmax', min, max };
  }

  const mean = history.reduce((sum, s) => sum + s, 0) / history.length;
  const variance = history.reduce((sum, s) => sum + (s - mean) ** 2, 0) / history.length;
  const std = Math.sqrt(variance);
  if (std === 0) {
    throw new RangeError('score history has zero spread');
  }
  return { method: 'sigmoid', midpoint: mean, slope: Math.log(19) / (2 * std) };
}

/**
 * Leave-one-out scores of every reference embedding, for fitting calibration.
 *
 * `build` constructs a fresh detector over the reduced reference set so the
 * scored point never sees itself.
 */
export async function referenceScoreHistory(
  reference: ReferenceSet,
  build: (subset: ReferenceSet) => Detector,
): Promise<number[]> {
  const signal = new AbortController().signal;
  const points = reference.getPoints();
  const scores: number[] = [];

  for (let i = 0; i < points.length; i++) {
    const detector = build(reference.without(i));
    const result = await detector.score(points[i], { signal });
    scores.push(result.rawScore);
  }

  return scores;
}
