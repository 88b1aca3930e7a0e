import { isTimeoutError } from '@code-verdict/resilience';
import type { DegradedReason } from './schemas/index.js';

/**
 * Raised by structure providers on malformed source
 */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * A producer could not deliver its signal. `reason` is what the assessment
 * records; the underlying failure, if any, is kept as `cause`.
 */
export class SignalUnavailable extends Error {
  constructor(
    readonly signalName: string,
    readonly reason: DegradedReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SignalUnavailable';
  }
}

/**
 * A value outside its declared scale. Such values are discarded, never clamped.
 */
export class DomainViolation extends Error {
  constructor(
    readonly signalName: string,
    readonly value: unknown,
    message: string,
  ) {
    super(message);
    this.name = 'DomainViolation';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Map a producer failure onto the reason recorded in the assessment
 */
export function reasonFromError(error: unknown): DegradedReason {
  if (error instanceof SignalUnavailable) return error.reason;
  if (isTimeoutError(error)) return 'timeout';
  if (error instanceof ParseError) return 'parse_error';
  if (error instanceof DomainViolation) return 'out_of_domain';
  return 'unavailable';
}

/**
 * Wrap whatever a producer threw as the SignalUnavailable it amounts to.
 * Producers may also throw SignalUnavailable themselves to pick the reason.
 */
export function signalUnavailable(signalName: string, error: unknown): SignalUnavailable {
  if (error instanceof SignalUnavailable) return error;
  const cause = toError(error);
  return new SignalUnavailable(signalName, reasonFromError(cause), cause.message, { cause });
}
