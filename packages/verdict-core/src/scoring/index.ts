export { ResultIntegrator, renormalizeWeights, qualityLevel } from './integrator.js';
export { serializeAssessment, type SerializedAssessment } from './serialize.js';
