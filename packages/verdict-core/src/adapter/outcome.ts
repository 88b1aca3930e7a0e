import type { Category } from '@code-verdict/config';
import type { DegradedReason, DegradedSignal, ScalarSignal } from '../schemas/index.js';

/**
 * Producers feeding the adapter; each one scores the category of the same name
 */
export type ProducerName = Category;

/**
 * What a producer call ended with
 */
export type ProducerOutcome<T> =
  | { status: 'ok'; output: T }
  | { status: 'failed'; reason: DegradedReason; detail?: string };

/**
 * Producer outcomes for one code unit; an absent key means the producer never ran
 */
export type RawOutputs = Partial<Record<ProducerName, ProducerOutcome<unknown>>>;

export interface AdapterResult {
  signals: ScalarSignal[];
  degraded: DegradedSignal[];
}

export function succeeded<T>(output: T): ProducerOutcome<T> {
  return { status: 'ok', output };
}

export function failed<T = never>(reason: DegradedReason, detail?: string): ProducerOutcome<T> {
  return detail === undefined ? { status: 'failed', reason } : { status: 'failed', reason, detail };
}
