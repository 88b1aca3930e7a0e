export {
  logLevelSchema,
  logFormatSchema,
  loggingConfigSchema,
  CATEGORIES,
  categorySchema,
  minMaxCalibrationSchema,
  sigmoidCalibrationSchema,
  calibrationSchema,
  detectorConfigSchema,
  DEFAULT_DETECTORS,
  ensembleConfigSchema,
  categoryWeightsSchema,
  qualityBandsSchema,
  integratorConfigSchema,
  metricRuleSchema,
  DEFAULT_METRIC_RULES,
  normalizationConfigSchema,
  analysisConfigSchema,
  reviewConfigSchema,
  verdictConfigSchema,
  getEnabledDetectors,
} from './schema.js';

export type {
  LogLevel,
  LogFormat,
  LoggingConfig,
  Category,
  MinMaxCalibration,
  SigmoidCalibration,
  Calibration,
  DetectorConfig,
  EnsembleConfig,
  CategoryWeights,
  QualityBands,
  IntegratorConfig,
  MetricRule,
  NormalizationConfig,
  AnalysisConfig,
  ReviewConfig,
  VerdictConfig,
} from './schema.js';

export { loadConfig, parseConfig } from './load.js';
export { ConfigurationError } from './errors.js';
