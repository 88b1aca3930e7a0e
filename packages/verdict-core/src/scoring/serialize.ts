import type { Assessment, AssessmentStatus, DegradedReason, InsightKind, QualityLevel } from '../schemas/index.js';

/**
 * Wire form of an assessment
 */
export interface SerializedAssessment {
  status: AssessmentStatus;
  quality_level: QualityLevel;
  overall_score: number | null;
  confidence: number;
  subscores: Record<string, number | null>;
  explanation: { signal_name: string; value: number; weight: number; contribution: number }[];
  degraded_signals: { name: string; reason: DegradedReason }[];
  insights: { kind: InsightKind; code: string; message: string; line: number | null }[];
}

export function serializeAssessment(assessment: Assessment): SerializedAssessment {
  return {
    status: assessment.status,
    quality_level: assessment.qualityLevel,
    overall_score: assessment.overallScore,
    confidence: assessment.confidence,
    subscores: { ...assessment.subscores },
    explanation: assessment.explanation.map((e) => ({
      signal_name: e.signalName,
      value: e.value,
      weight: e.weight,
      contribution: e.contribution,
    })),
    degraded_signals: assessment.degradedSignals.map((d) => ({ name: d.name, reason: d.reason })),
    insights: assessment.insights.map((i) => ({ kind: i.kind, code: i.code, message: i.message, line: i.line ?? null })),
  };
}
