import { z } from 'zod';
import type { MetricRule } from '@code-verdict/config';
import {
  ScalarSignalSchema,
  SecurityFindingSchema,
  withinScale,
  type DegradedReason,
  type ScalarSignal,
  type Scale,
  type SecurityFinding,
  type Severity,
} from '../schemas/index.js';
import { deepFreeze } from '../utils/index.js';
import type { AdapterResult, ProducerName } from './outcome.js';

/**
 * Turns one producer's output into signals
 */
export interface ProducerNormalizer {
  readonly producer: ProducerName;

  /** Every signal this producer can emit; all of them degrade when the producer fails */
  readonly signalNames: readonly string[];

  /**
   * Validate the output and map it onto [0, 1]. Values outside the declared
   * scale become `out_of_domain` entries, never clamped.
   */
  normalize(output: unknown): AdapterResult;
}

const UNIT: Scale = { type: 'unit' };

export function scalarSignal(input: Omit<ScalarSignal, 'kind'>): ScalarSignal {
  return deepFreeze(ScalarSignalSchema.parse({ kind: 'scalar', ...input }));
}

export function degradeAll(names: readonly string[], reason: DegradedReason, detail?: string): AdapterResult {
  return {
    signals: [],
    degraded: names.map((name) => (detail === undefined ? { name, reason } : { name, reason, detail })),
  };
}

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)).join('; ');
}

function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

const StructureOutputSchema = z.record(z.number());

/**
 * Static metrics, squashed so that small values score near 1:
 * value = 1 - logistic(slope * (raw - midpoint))
 */
export function createStructureNormalizer(rules: Record<string, MetricRule>): ProducerNormalizer {
  const names = Object.keys(rules).sort();

  return {
    producer: 'structure',
    signalNames: names,
    normalize(output) {
      const parsed = StructureOutputSchema.safeParse(output);
      if (!parsed.success) {
        return degradeAll(names, 'parse_error', describeIssues(parsed.error));
      }

      const result: AdapterResult = { signals: [], degraded: [] };
      for (const name of names) {
        const rule = rules[name];
        const raw: number | undefined = parsed.data[name];

        if (raw === undefined) {
          if (rule.required) {
            result.degraded.push({ name, reason: 'missing', detail: 'metric not reported' });
          }
          continue;
        }

        const scale: Scale = { type: 'unbounded', min: rule.min };
        if (!withinScale(raw, scale)) {
          result.degraded.push({ name, reason: 'out_of_domain', detail: `${raw} is outside [${rule.min}, inf)` });
          continue;
        }

        result.signals.push(
          scalarSignal({
            name,
            category: 'structure',
            sourceKind: 'static',
            value: 1 - logistic(rule.slope * (raw - rule.midpoint)),
            rawValue: raw,
            scale,
            confidence: rule.confidence,
          }),
        );
      }
      return result;
    },
  };
}

const SEVERITY_POINTS: Record<Severity, number> = {
  LOW: 5,
  MEDIUM: 15,
  HIGH: 30,
  CRITICAL: 60,
};

/**
 * Risk in [0, 100]: summed severity points, capped at 100. Any CRITICAL finding forces 100.
 */
export function securityRisk(findings: readonly SecurityFinding[]): number {
  let raw = 0;
  let hasCritical = false;
  for (const finding of findings) {
    raw += SEVERITY_POINTS[finding.severity];
    if (finding.severity === 'CRITICAL') {
      hasCritical = true;
    }
  }
  return hasCritical ? 100 : Math.min(100, raw);
}

const SecurityOutputSchema = z.array(SecurityFindingSchema);

export function createSecurityNormalizer(confidence: number): ProducerNormalizer {
  const names = ['security_severity'];

  return {
    producer: 'security',
    signalNames: names,
    normalize(output) {
      const parsed = SecurityOutputSchema.safeParse(output);
      if (!parsed.success) {
        return degradeAll(names, 'parse_error', describeIssues(parsed.error));
      }

      const risk = securityRisk(parsed.data);
      return {
        signals: [
          scalarSignal({
            name: 'security_severity',
            category: 'security',
            sourceKind: 'static',
            value: 1 - risk / 100,
            rawValue: risk,
            scale: { type: 'range', min: 0, max: 100 },
            confidence,
          }),
        ],
        degraded: [],
      };
    },
  };
}

const AnomalyOutputSchema = z.object({
  fusedScore: z.number().nullable(),
  confidence: z.number().min(0).max(1),
});

/**
 * Ensemble verdict to `anomaly_score`: value = 1 - fusedScore
 */
export function createAnomalyNormalizer(): ProducerNormalizer {
  const names = ['anomaly_score'];

  return {
    producer: 'anomaly',
    signalNames: names,
    normalize(output) {
      const parsed = AnomalyOutputSchema.safeParse(output);
      if (!parsed.success) {
        return degradeAll(names, 'parse_error', describeIssues(parsed.error));
      }

      const { fusedScore, confidence } = parsed.data;
      if (fusedScore === null) {
        return degradeAll(names, 'unavailable', 'no detector produced a score');
      }
      if (!withinScale(fusedScore, UNIT)) {
        return degradeAll(names, 'out_of_domain', `fused score ${fusedScore} is outside [0, 1]`);
      }

      return {
        signals: [
          scalarSignal({
            name: 'anomaly_score',
            category: 'anomaly',
            sourceKind: 'ml-anomaly',
            value: 1 - fusedScore,
            rawValue: fusedScore,
            scale: UNIT,
            confidence,
          }),
        ],
        degraded: [],
      };
    },
  };
}

const PredictionOutputSchema = z.object({
  quality: z.number(),
  confidence: z.number(),
});

export function createPredictedQualityNormalizer(): ProducerNormalizer {
  const names = ['predicted_quality'];

  return {
    producer: 'predicted_quality',
    signalNames: names,
    normalize(output) {
      const parsed = PredictionOutputSchema.safeParse(output);
      if (!parsed.success) {
        return degradeAll(names, 'parse_error', describeIssues(parsed.error));
      }

      const { quality, confidence } = parsed.data;
      if (!withinScale(quality, UNIT)) {
        return degradeAll(names, 'out_of_domain', `predicted quality ${quality} is outside [0, 1]`);
      }
      if (!withinScale(confidence, UNIT)) {
        return degradeAll(names, 'out_of_domain', `model confidence ${confidence} is outside [0, 1]`);
      }

      return {
        signals: [
          scalarSignal({
            name: 'predicted_quality',
            category: 'predicted_quality',
            sourceKind: 'ml-quality',
            value: quality,
            rawValue: quality,
            scale: UNIT,
            confidence,
          }),
        ],
        degraded: [],
      };
    },
  };
}
