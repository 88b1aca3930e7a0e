export type Vector = readonly number[];

export function dot(a: Vector, b: Vector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(a: Vector): number {
  return Math.sqrt(dot(a, a));
}

export function subtract(a: Vector, b: Vector): number[] {
  return a.map((value, i) => value - b[i]);
}

export function euclideanDistance(a: Vector, b: Vector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero length
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  const denominator = norm(a) * norm(b);
  if (denominator === 0) return 0;
  return dot(a, b) / denominator;
}

/**
 * Component-wise mean of equally sized vectors
 */
export function meanVector(vectors: readonly Vector[]): number[] {
  if (vectors.length === 0) {
    throw new RangeError('cannot average an empty set of vectors');
  }
  const result = new Array<number>(vectors[0].length).fill(0);
  for (const v of vectors) {
    for (let i = 0; i < result.length; i++) {
      result[i] += v[i];
    }
  }
  return result.map((sum) => sum / vectors.length);
}

export function isFiniteVector(value: Vector): boolean {
  return value.every((x) => Number.isFinite(x));
}

/**
 * Throw when an embedding does not match the expected dimension
 */
export function assertDimension(vector: Vector, dimension: number): void {
  if (vector.length !== dimension) {
    throw new RangeError(`expected embedding of dimension ${dimension}, got ${vector.length}`);
  }
}
