import type { ReferenceSet } from '../reference.js';
import { type Vector, assertDimension, dot, norm, subtract } from '../vectors.js';
import {
  yieldToEventLoop,
  type Detector,
  type DetectorContext,
  type DetectorMetadata,
  type Embedding,
  type ScoreResult,
} from './detector.js';

export interface ReconstructionErrorOptions {
  /** Principal components kept (default: 3) */
  components?: number;

  /** Power-iteration steps per component (default: 100) */
  iterations?: number;
}

const EPSILON = 1e-10;

/**
 * Leading principal directions of the centered reference set, found by power
 * iteration with deflation. The start vector is the largest residual point,
 * so results are deterministic.
 */
export function principalComponents(
  centered: readonly Vector[],
  count: number,
  iterations: number,
): Vector[] {
  let residuals = centered.map((p) => [...p]);
  const components: Vector[] = [];

  for (let c = 0; c < count; c++) {
    let start = residuals[0];
    for (const r of residuals) {
      if (norm(r) > norm(start)) start = r;
    }
    const startNorm = norm(start);
    if (startNorm < EPSILON) break;

    let v = start.map((x) => x / startNorm);
    for (let i = 0; i < iterations; i++) {
      const next = new Array<number>(v.length).fill(0);
      for (const r of residuals) {
        const projection = dot(r, v);
        for (let j = 0; j < next.length; j++) {
          next[j] += projection * r[j];
        }
      }
      const nextNorm = norm(next);
      if (nextNorm < EPSILON) break;
      v = next.map((x) => x / nextNorm);
    }

    components.push(Object.freeze(v));
    residuals = residuals.map((r) => {
      const projection = dot(r, v);
      return r.map((x, j) => x - projection * v[j]);
    });
  }

  return components;
}

/**
 * Reconstruction-error detector.
 *
 * Projects the embedding onto the reference set's leading principal
 * components and scores the length of what the projection cannot explain.
 */
export class ReconstructionErrorDetector implements Detector {
  readonly metadata: DetectorMetadata = {
    id: 'reconstruction-error',
    name: 'Reconstruction Error',
    description: 'Residual norm after projecting onto the reference principal components',
    version: '1.0.0',
  };

  private readonly components: readonly Vector[];

  constructor(
    private readonly reference: ReferenceSet,
    options: ReconstructionErrorOptions = {},
  ) {
    const count = options.components ?? 3;
    const iterations = options.iterations ?? 100;
    const centered = reference.getPoints().map((p) => subtract(p, reference.centroid));
    this.components = Object.freeze(principalComponents(centered, count, iterations));
  }

  get componentCount(): number {
    return this.components.length;
  }

  async score(embedding: Embedding, context: DetectorContext): Promise<ScoreResult> {
    context.signal.throwIfAborted();
    assertDimension(embedding, this.reference.dimension);

    const residual = subtract(embedding, this.reference.centroid);
    for (const component of this.components) {
      await yieldToEventLoop(context.signal);
      const projection = dot(residual, component);
      for (let j = 0; j < residual.length; j++) {
        residual[j] -= projection * component[j];
      }
    }

    return {
      rawScore: norm(residual),
      details: { components: this.components.length },
    };
  }
}
