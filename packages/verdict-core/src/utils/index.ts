export { canonicalJson, sha256Hex } from './canonical.js';
export { sortExplanation, sortDegraded, sortInsights } from './sort.js';
export { deepFreeze, roundTo } from './freeze.js';
