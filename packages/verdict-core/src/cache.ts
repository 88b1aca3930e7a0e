import type { Assessment } from './schemas/index.js';

/**
 * Caller-supplied store of finished assessments, keyed by code unit ID
 */
export interface AssessmentCache {
  get(codeUnitId: string): Assessment | undefined;
  set(codeUnitId: string, assessment: Assessment): void;
}

/**
 * Least-recently-used in-memory cache
 */
export class InMemoryAssessmentCache implements AssessmentCache {
  private readonly entries: Map<string, Assessment> = new Map();

  constructor(private readonly maxEntries = 1000) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(codeUnitId: string): Assessment | undefined {
    const assessment = this.entries.get(codeUnitId);
    if (assessment !== undefined) {
      // Re-insert to mark as most recently used
      this.entries.delete(codeUnitId);
      this.entries.set(codeUnitId, assessment);
    }
    return assessment;
  }

  set(codeUnitId: string, assessment: Assessment): void {
    this.entries.delete(codeUnitId);
    this.entries.set(codeUnitId, assessment);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
