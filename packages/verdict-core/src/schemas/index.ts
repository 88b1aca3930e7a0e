export {
  SignalSchema,
  ScalarSignalSchema,
  VectorSignalSchema,
  ScaleSchema,
  SeverityEnum,
  SourceKindEnum,
  withinScale,
} from './signal.js';
export type { Signal, ScalarSignal, VectorSignal, Scale, Severity, SourceKind } from './signal.js';

export { DegradedSignalSchema, DegradedReasonEnum } from './degraded.js';
export type { DegradedSignal, DegradedReason } from './degraded.js';

export { InsightSchema, InsightKindEnum } from './insight.js';
export type { Insight, InsightKind } from './insight.js';

export { SecurityFindingSchema } from './security.js';
export type { SecurityFinding } from './security.js';

export {
  AssessmentSchema,
  AssessmentStatusEnum,
  QualityLevelEnum,
  ExplanationEntrySchema,
  ASSESSMENT_VERSION,
} from './assessment.js';
export type { Assessment, AssessmentStatus, QualityLevel, ExplanationEntry } from './assessment.js';

export { createCodeUnit } from './codeUnit.js';
export type { CodeUnit } from './codeUnit.js';
