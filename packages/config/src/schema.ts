import { z } from 'zod';

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Quality categories scored by the integrator
 */
export const CATEGORIES = ['structure', 'security', 'anomaly', 'predicted_quality'] as const;
export const categorySchema = z.enum(CATEGORIES);
export type Category = z.infer<typeof categorySchema>;

/**
 * Min-max calibration: raw scores in [min, max] map linearly onto [0, 1]
 */
export const minMaxCalibrationSchema = z
  .object({
    method: z.literal('minmax'),
    min: z.number().finite(),
    max: z.number().finite(),
  })
  .refine((c) => c.max > c.min, { message: 'minmax calibration requires max > min' });
export type MinMaxCalibration = z.infer<typeof minMaxCalibrationSchema>;

/**
 * Sigmoid calibration: 1 / (1 + exp(-slope * (raw - midpoint)))
 */
export const sigmoidCalibrationSchema = z.object({
  method: z.literal('sigmoid'),
  midpoint: z.number().finite(),
  slope: z.number().finite().positive('sigmoid slope must be positive'),
});
export type SigmoidCalibration = z.infer<typeof sigmoidCalibrationSchema>;

export const calibrationSchema = z.union([minMaxCalibrationSchema, sigmoidCalibrationSchema]);
export type Calibration = z.infer<typeof calibrationSchema>;

/**
 * Per-detector ensemble membership
 */
export const detectorConfigSchema = z.object({
  /** Registered detector ID */
  id: z.string().min(1),

  /** Static reliability weight used when fusing normalized scores */
  weight: z.coerce.number().positive().max(10).default(1),

  /** Normalized score at or above which the detector flags the unit */
  threshold: z.coerce.number().min(0).max(1).default(0.5),

  /** Raw score calibration (distances between unit-norm embeddings lie in [0, 2]) */
  calibration: calibrationSchema.default({ method: 'minmax', min: 0, max: 2 }),

  /** Whether the detector takes part in the vote (default: true) */
  enabled: z.coerce.boolean().default(true),
});
export type DetectorConfig = z.infer<typeof detectorConfigSchema>;

export const DEFAULT_DETECTORS: DetectorConfig[] = [
  { id: 'centroid-distance', weight: 1, threshold: 0.5, calibration: { method: 'minmax', min: 0, max: 2 }, enabled: true },
  { id: 'reconstruction-error', weight: 1, threshold: 0.5, calibration: { method: 'minmax', min: 0, max: 2 }, enabled: true },
  { id: 'nearest-neighbor', weight: 1, threshold: 0.5, calibration: { method: 'minmax', min: 0, max: 2 }, enabled: true },
];

/**
 * Ensemble anomaly detector configuration
 */
export const ensembleConfigSchema = z
  .object({
    detectors: z.array(detectorConfigSchema).min(1).default(DEFAULT_DETECTORS),

    /**
     * Minimum valid votes before the verdict is trusted. May exceed the
     * number of enabled detectors; every verdict is then degraded.
     */
    quorum: z.coerce.number().int().min(1).default(2),

    /** Timeout per detector in milliseconds (default: 2000) */
    detectorTimeoutMs: z.coerce.number().int().min(1).max(60000).default(2000),

    /** Fraction of flagging detectors that makes the unit anomalous */
    agreementThreshold: z.coerce.number().min(0).max(1).default(0.5),

    /** Fused score that makes the unit anomalous regardless of agreement */
    overrideScore: z.coerce.number().min(0).max(1).default(0.8),

    /** Confidence ceiling when the quorum is not met */
    degradedConfidenceCap: z.coerce.number().min(0).max(1).default(0.4),
  })
  .refine(
    (data) => new Set(data.detectors.map((d) => d.id)).size === data.detectors.length,
    { message: 'detector IDs must be unique', path: ['detectors'] },
  );
export type EnsembleConfig = z.infer<typeof ensembleConfigSchema>;

/**
 * Static category weights; renormalized over available categories at scoring time
 */
export const categoryWeightsSchema = z
  .object({
    structure: z.coerce.number().min(0).default(0.25),
    security: z.coerce.number().min(0).default(0.35),
    anomaly: z.coerce.number().min(0).default(0.2),
    predicted_quality: z.coerce.number().min(0).default(0.2),
  })
  .refine((w) => w.structure + w.security + w.anomaly + w.predicted_quality > 0, {
    message: 'category weights must sum to a positive total',
  });
export type CategoryWeights = z.infer<typeof categoryWeightsSchema>;

/**
 * Lower bounds (0-100) of the reported quality levels
 */
export const qualityBandsSchema = z
  .object({
    excellent: z.coerce.number().min(0).max(100).default(85),
    good: z.coerce.number().min(0).max(100).default(70),
    acceptable: z.coerce.number().min(0).max(100).default(60),
  })
  .refine((b) => b.excellent >= b.good && b.good >= b.acceptable, {
    message: 'quality bands must satisfy excellent >= good >= acceptable',
  });
export type QualityBands = z.infer<typeof qualityBandsSchema>;

export const integratorConfigSchema = z.object({
  categoryWeights: categoryWeightsSchema.default({}),
  qualityBands: qualityBandsSchema.default({}),
});
export type IntegratorConfig = z.infer<typeof integratorConfigSchema>;

/**
 * Logistic squashing for one unbounded static metric
 */
export const metricRuleSchema = z.object({
  midpoint: z.number().finite(),
  slope: z.number().finite().positive(),
  /** Declared lower bound of the raw metric */
  min: z.number().finite().default(0),
  /** Confidence the producer declares for this metric */
  confidence: z.number().min(0).max(1).default(0.9),
  /** Missing required metrics are reported as degraded; optional ones are skipped */
  required: z.boolean().default(false),
});
export type MetricRule = z.infer<typeof metricRuleSchema>;

export const DEFAULT_METRIC_RULES: Record<string, MetricRule> = {
  cyclomatic_complexity: { midpoint: 10, slope: 0.3, min: 1, confidence: 0.9, required: true },
  max_nesting_depth: { midpoint: 4, slope: 1, min: 0, confidence: 0.8, required: false },
  average_function_length: { midpoint: 30, slope: 0.15, min: 0, confidence: 0.7, required: false },
  max_argument_count: { midpoint: 5, slope: 1, min: 0, confidence: 0.8, required: false },
};

export const normalizationConfigSchema = z.object({
  metrics: z.record(metricRuleSchema).default(DEFAULT_METRIC_RULES),
  securityConfidence: z.coerce.number().min(0).max(1).default(0.8),
});
export type NormalizationConfig = z.infer<typeof normalizationConfigSchema>;

/**
 * Per-call analysis limits
 */
export const analysisConfigSchema = z.object({
  /** Largest accepted source text in bytes (default: 10KB) */
  maxCodeBytes: z.coerce.number().int().min(1).default(10000),

  /** Timeout for each collaborator call in milliseconds */
  providerTimeoutMs: z.coerce.number().int().min(1).max(120000).default(5000),

  /** Worker pool size for batch analysis */
  batchConcurrency: z.coerce.number().int().min(1).max(64).default(4),
});
export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

/**
 * Thresholds for the rule-based code reviewer
 */
export const reviewConfigSchema = z.object({
  /** Statements in one function body before it is reported as long */
  maxFunctionStatements: z.coerce.number().int().min(1).default(50),

  /** Positional parameters before a signature is reported */
  maxArguments: z.coerce.number().int().min(0).default(4),

  /** Functions in a class-free module before suggesting classes */
  maxFunctionsWithoutClasses: z.coerce.number().int().min(1).default(10),

  /** Names starting with one of these count as descriptive */
  descriptiveVerbs: z
    .array(z.string().min(1))
    .default(['get', 'set', 'create', 'update', 'delete', 'calculate', 'process']),

  /** Cosine similarity above which the closest reference sample is reported */
  referenceMatchSimilarity: z.coerce.number().min(-1).max(1).default(0.7),
});
export type ReviewConfig = z.infer<typeof reviewConfigSchema>;

/**
 * Complete configuration
 */
export const verdictConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  ensemble: ensembleConfigSchema.default({}),
  integrator: integratorConfigSchema.default({}),
  normalization: normalizationConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
  review: reviewConfigSchema.default({}),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
});
export type VerdictConfig = z.infer<typeof verdictConfigSchema>;

/**
 * Detectors that take part in the vote
 */
export function getEnabledDetectors(config: EnsembleConfig): DetectorConfig[] {
  return config.detectors.filter((d) => d.enabled);
}
