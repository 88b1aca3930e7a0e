import type { Logger } from 'pino';
import {
  CATEGORIES,
  ConfigurationError,
  type Category,
  type CategoryWeights,
  type IntegratorConfig,
  type QualityBands,
} from '@code-verdict/config';
import {
  ASSESSMENT_VERSION,
  type Assessment,
  type CodeUnit,
  type DegradedSignal,
  type ExplanationEntry,
  type Insight,
  type QualityLevel,
  type ScalarSignal,
  type Signal,
} from '../schemas/index.js';
import {
  canonicalJson,
  deepFreeze,
  roundTo,
  sha256Hex,
  sortDegraded,
  sortExplanation,
  sortInsights,
} from '../utils/index.js';
import { silentLogger } from '../lib/logger.js';

type CategoryRecord<T> = Record<Category, T>;

function categoryRecord<T>(initial: T): CategoryRecord<T> {
  return { structure: initial, security: initial, anomaly: initial, predicted_quality: initial };
}

/**
 * Renormalize static category weights over the categories that have data.
 *
 * Only categories with a positive configured weight take part. Excluded
 * categories get weight 0. Returns null when no category takes part.
 */
export function renormalizeWeights(
  weights: CategoryWeights,
  available: readonly Category[],
): CategoryRecord<number> | null {
  const participating = available.filter((c) => weights[c] > 0);
  const total = participating.reduce((sum, c) => sum + weights[c], 0);
  if (participating.length === 0 || total <= 0) {
    return null;
  }

  const result = categoryRecord(0);
  for (const category of participating) {
    result[category] = weights[category] / total;
  }
  return result;
}

export function qualityLevel(score: number, bands: QualityBands): QualityLevel {
  if (score >= bands.excellent) return 'excellent';
  if (score >= bands.good) return 'good';
  if (score >= bands.acceptable) return 'acceptable';
  return 'needs_review';
}

function describeDegraded(degraded: readonly DegradedSignal[]): string {
  return degraded.map((d) => `${d.name} (${d.reason})`).join(', ');
}

function buildSummary(
  overallScore: number | null,
  level: QualityLevel,
  confidence: number,
  explanation: readonly ExplanationEntry[],
  degraded: readonly DegradedSignal[],
): string {
  const parts: string[] = [];

  if (overallScore === null) {
    parts.push('Insufficient signal: no category produced a usable signal.');
  } else {
    parts.push(`Score ${overallScore.toFixed(2)}/100 (${level}), confidence ${confidence.toFixed(2)}.`);
    const [largest] = explanation;
    if (largest) {
      parts.push(`Largest contribution: ${largest.signalName}.`);
    }
    const weakest = [...explanation].sort((a, b) => a.value - b.value || a.signalName.localeCompare(b.signalName))[0];
    if (weakest) {
      parts.push(`Weakest signal: ${weakest.signalName} (${weakest.value.toFixed(2)}).`);
    }
  }

  if (degraded.length > 0) {
    parts.push(`Degraded: ${describeDegraded(degraded)}.`);
  }
  return parts.join(' ');
}

/**
 * Result Integrator - fuses normalized signals into one explainable assessment.
 *
 * Stateless and deterministic: identical inputs yield identical assessments,
 * including the content-derived assessmentId.
 */
export class ResultIntegrator {
  private readonly weights: CategoryWeights;
  private readonly bands: QualityBands;
  private readonly logger: Logger;

  /** Categories with a positive configured weight */
  private readonly scoredCategories: readonly Category[];

  constructor(config: IntegratorConfig, logger?: Logger) {
    this.scoredCategories = CATEGORIES.filter((c) => config.categoryWeights[c] > 0);
    if (this.scoredCategories.length === 0) {
      throw new ConfigurationError('category weights must sum to a positive total');
    }
    this.weights = config.categoryWeights;
    this.bands = config.qualityBands;
    this.logger = logger ?? silentLogger();
  }

  integrate(
    unit: CodeUnit,
    signals: readonly Signal[],
    degraded: readonly DegradedSignal[],
    insights: readonly Insight[] = [],
  ): Assessment {
    const scalars = signals.filter((s): s is ScalarSignal => s.kind === 'scalar');

    const subscores = categoryRecord<number | null>(null);
    const totalConfidence = categoryRecord(0);
    const available: Category[] = [];

    for (const category of CATEGORIES) {
      const group = scalars.filter((s) => s.category === category);
      const total = group.reduce((sum, s) => sum + s.confidence, 0);
      if (group.length === 0 || total <= 0) continue;

      // Confidence-weighted mean; the category's static weight cancels out
      const mean = group.reduce((sum, s) => sum + s.confidence * s.value, 0) / total;
      subscores[category] = Math.min(1, mean);
      totalConfidence[category] = total;
      available.push(category);
    }

    const sortedDegraded = sortDegraded(degraded.map((d) => ({ ...d })));
    const sortedInsights = sortInsights(insights.map((i) => ({ ...i })));
    const weights = renormalizeWeights(this.weights, available);

    if (weights === null) {
      this.logger.debug({ codeUnitId: unit.id, degraded: sortedDegraded.length }, 'Insufficient signal');
      return this.build(unit, {
        status: 'insufficient_signal',
        overallScore: null,
        qualityLevel: 'insufficient_signal',
        confidence: 0,
        subscores,
        categoryWeights: categoryRecord(0),
        explanation: [],
        degradedSignals: sortedDegraded,
        insights: sortedInsights,
      });
    }

    const entries: ExplanationEntry[] = [];
    let weightedConfidence = 0;
    for (const signal of scalars) {
      const categoryWeight = weights[signal.category];
      if (categoryWeight === 0) continue;

      const weight = categoryWeight * (signal.confidence / totalConfidence[signal.category]);
      entries.push({
        signalName: signal.name,
        category: signal.category,
        value: signal.value,
        weight,
        contribution: 100 * signal.value * weight,
      });
      weightedConfidence += weight * signal.confidence;
    }

    let raw = 0;
    for (const category of CATEGORIES) {
      raw += (subscores[category] ?? 0) * weights[category];
    }
    const overallScore = Math.min(100, Math.max(0, roundTo(100 * raw, 2)));

    const participating = CATEGORIES.filter((c) => weights[c] > 0).length;
    const confidence = Math.min(1, weightedConfidence * (participating / this.scoredCategories.length));
    const level = qualityLevel(overallScore, this.bands);

    this.logger.debug({ codeUnitId: unit.id, overallScore, confidence, participating }, 'Integrated signals');

    return this.build(unit, {
      status: 'scored',
      overallScore,
      qualityLevel: level,
      confidence,
      subscores,
      categoryWeights: weights,
      explanation: sortExplanation(entries),
      degradedSignals: sortedDegraded,
      insights: sortedInsights,
    });
  }

  private build(
    unit: CodeUnit,
    parts: Omit<Assessment, 'assessmentVersion' | 'assessmentId' | 'codeUnitId' | 'summary'>,
  ): Assessment {
    const payload: Omit<Assessment, 'assessmentId'> = {
      assessmentVersion: ASSESSMENT_VERSION,
      codeUnitId: unit.id,
      ...parts,
      summary: buildSummary(parts.overallScore, parts.qualityLevel, parts.confidence, parts.explanation, parts.degradedSignals),
    };

    return deepFreeze({ ...payload, assessmentId: sha256Hex(canonicalJson(payload)) });
  }
}
