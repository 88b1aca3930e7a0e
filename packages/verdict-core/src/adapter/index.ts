export { SignalAdapter } from './signalAdapter.js';
export {
  createStructureNormalizer,
  createSecurityNormalizer,
  createAnomalyNormalizer,
  createPredictedQualityNormalizer,
  securityRisk,
  scalarSignal,
  type ProducerNormalizer,
} from './normalizers.js';
export { normalizeEmbedding, type EmbeddingResult } from './embedding.js';
export { succeeded, failed } from './outcome.js';
export type { ProducerName, ProducerOutcome, RawOutputs, AdapterResult } from './outcome.js';
