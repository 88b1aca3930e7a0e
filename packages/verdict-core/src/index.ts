// Schemas
export {
  SignalSchema,
  ScalarSignalSchema,
  VectorSignalSchema,
  ScaleSchema,
  SeverityEnum,
  SourceKindEnum,
  withinScale,
  DegradedSignalSchema,
  DegradedReasonEnum,
  SecurityFindingSchema,
  AssessmentSchema,
  AssessmentStatusEnum,
  QualityLevelEnum,
  ExplanationEntrySchema,
  InsightSchema,
  InsightKindEnum,
  ASSESSMENT_VERSION,
  createCodeUnit,
} from './schemas/index.js';

export type {
  Signal,
  ScalarSignal,
  VectorSignal,
  Scale,
  Severity,
  SourceKind,
  DegradedSignal,
  DegradedReason,
  SecurityFinding,
  Assessment,
  AssessmentStatus,
  QualityLevel,
  ExplanationEntry,
  Insight,
  InsightKind,
  CodeUnit,
} from './schemas/index.js';

// Utils
export { canonicalJson, sha256Hex, sortExplanation, sortDegraded, sortInsights, deepFreeze, roundTo } from './utils/index.js';

// Errors
export {
  ParseError,
  SignalUnavailable,
  DomainViolation,
  reasonFromError,
  signalUnavailable,
  toError,
} from './errors.js';

// Logging
export { createLogger, silentLogger } from './lib/logger.js';

// Collaborators
export type {
  StructureAnalyzer,
  StructureMetrics,
  SecurityChecker,
  EmbeddingModel,
  QualityModel,
  QualityPrediction,
  ReferenceMatch,
  CodeReviewer,
  AnomalyDetector,
} from './collaborators.js';

// Signal adapter
export {
  SignalAdapter,
  createStructureNormalizer,
  createSecurityNormalizer,
  createAnomalyNormalizer,
  createPredictedQualityNormalizer,
  securityRisk,
  scalarSignal,
  normalizeEmbedding,
  succeeded,
  failed,
} from './adapter/index.js';

export type {
  ProducerNormalizer,
  EmbeddingResult,
  ProducerName,
  ProducerOutcome,
  RawOutputs,
  AdapterResult,
} from './adapter/index.js';

// Quality predictor
export { QualityPredictorAdapter } from './predictor/qualityPredictor.js';

// Scoring
export { ResultIntegrator, renormalizeWeights, qualityLevel, serializeAssessment } from './scoring/index.js';
export type { SerializedAssessment } from './scoring/index.js';

// Orchestration
export { QualityOrchestrator } from './orchestrator.js';
export type { Collaborators, OrchestratorOptions } from './orchestrator.js';

export { InMemoryAssessmentCache } from './cache.js';
export type { AssessmentCache } from './cache.js';
