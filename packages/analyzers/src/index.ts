// Parsing
export {
  createPythonParser,
  assertWellFormed,
  findSyntaxError,
  maskedLines,
  walkTree,
  findNodesOfType,
  getNodeText,
  getLine,
  bodyStatements,
  functionName,
  positionalParameters,
  hasDocstring,
  PyNodes,
} from './parser.js';
export type { SyntaxNode } from './parser.js';

// Structure metrics
export {
  TreeSitterStructureAnalyzer,
  measureStructure,
  decisionPoints,
  maxNestingDepth,
  cyclomaticComplexity,
} from './structure.js';

// Security
export { PatternSecurityScanner, loadSecurityRules, securityRuleSchema } from './security.js';
export type { SecurityRule } from './security.js';

// Embedding
export { extractFeatures, functionFeatures, operationFeatures } from './features.js';
export { FeatureHashEmbedder, hashFeature, DEFAULT_EMBEDDING_DIMENSION } from './embedder.js';

// Review
export {
  RuleBasedReviewer,
  GOOD_PATTERNS,
  CONCERNING_PATTERNS,
  matchPatterns,
  isDescriptiveName,
} from './reviewer.js';

// Quality prediction
export { NearestNeighborQualityModel } from './qualityModel.js';
export type { QualityExample, NearestNeighborQualityOptions } from './qualityModel.js';

// Reference wiring
export { createReferenceCollaborators, loadReferenceSamples, referenceSampleSchema } from './reference.js';
export type { ReferenceSample, ReferenceCollaboratorOptions } from './reference.js';
