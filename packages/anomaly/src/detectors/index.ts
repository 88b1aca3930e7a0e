import type { ReferenceSet } from '../reference.js';
import { isDetector, type Detector } from './detector.js';
import { CentroidDistanceDetector } from './centroidDistance.js';
import { NearestNeighborDetector, type NearestNeighborOptions } from './nearestNeighbor.js';
import { ReconstructionErrorDetector, type ReconstructionErrorOptions } from './reconstructionError.js';

export { CentroidDistanceDetector } from './centroidDistance.js';
export { NearestNeighborDetector, type NearestNeighborOptions } from './nearestNeighbor.js';
export {
  ReconstructionErrorDetector,
  principalComponents,
  type ReconstructionErrorOptions,
} from './reconstructionError.js';
export { isDetector, yieldToEventLoop } from './detector.js';
export type { Detector, DetectorContext, DetectorMetadata, Embedding, ScoreResult } from './detector.js';

/**
 * Detector registry - maps detector IDs to detector instances
 */
export class DetectorRegistry {
  private detectors: Map<string, Detector> = new Map();

  /**
   * Register a detector
   *
   * @throws TypeError if the value does not implement Detector
   */
  register(detector: Detector): void {
    // Detectors may come from plugins compiled without these types
    if (!isDetector(detector)) {
      throw new TypeError('Detector must have metadata with a string id and a score function');
    }
    if (this.detectors.has(detector.metadata.id)) {
      throw new Error(`Detector with ID ${detector.metadata.id} is already registered`);
    }
    this.detectors.set(detector.metadata.id, detector);
  }

  /**
   * Get a detector by ID
   */
  get(id: string): Detector | undefined {
    return this.detectors.get(id);
  }

  /**
   * Get all registered detectors
   */
  getAll(): Detector[] {
    return Array.from(this.detectors.values());
  }

  getIds(): string[] {
    return Array.from(this.detectors.keys());
  }

  has(id: string): boolean {
    return this.detectors.has(id);
  }

  remove(id: string): boolean {
    return this.detectors.delete(id);
  }

  clear(): void {
    this.detectors.clear();
  }
}

/**
 * Create a registry with the built-in detectors over one shared reference set
 */
export function createDefaultRegistry(
  reference: ReferenceSet,
  options: {
    nearestNeighbor?: NearestNeighborOptions;
    reconstruction?: ReconstructionErrorOptions;
  } = {},
): DetectorRegistry {
  const registry = new DetectorRegistry();

  registry.register(new CentroidDistanceDetector(reference));
  registry.register(new ReconstructionErrorDetector(reference, options.reconstruction));
  registry.register(new NearestNeighborDetector(reference, options.nearestNeighbor));

  return registry;
}
