import type { DegradedSignal, ExplanationEntry, Insight } from '../schemas/index.js';

/**
 * Sort explanation entries: absolute contribution descending, then signal name ascending.
 */
export function sortExplanation<T extends Pick<ExplanationEntry, 'contribution' | 'signalName'>>(entries: T[]): T[] {
  return [...entries].sort((a, b) => {
    const diff = Math.abs(b.contribution) - Math.abs(a.contribution);
    if (diff !== 0) return diff;
    return a.signalName.localeCompare(b.signalName);
  });
}

/**
 * Sort degraded signals: name ascending, then reason ascending.
 */
export function sortDegraded<T extends Pick<DegradedSignal, 'name' | 'reason'>>(degraded: T[]): T[] {
  return [...degraded].sort((a, b) => {
    const nameDiff = a.name.localeCompare(b.name);
    if (nameDiff !== 0) return nameDiff;
    return a.reason.localeCompare(b.reason);
  });
}

/**
 * Sort insights: line ascending (module-wide insights first), then code, then message.
 */
export function sortInsights<T extends Pick<Insight, 'line' | 'code' | 'message'>>(insights: T[]): T[] {
  return [...insights].sort(
    (a, b) => (a.line ?? 0) - (b.line ?? 0) || a.code.localeCompare(b.code) || a.message.localeCompare(b.message),
  );
}
