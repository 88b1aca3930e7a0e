import { describe, it, expect } from 'vitest';
import { integratorConfigSchema } from '@code-verdict/config';
import { ResultIntegrator } from '../src/scoring/integrator.js';
import { scalarSignal } from '../src/adapter/normalizers.js';
import { canonicalJson, sha256Hex } from '../src/utils/canonical.js';
import { sortExplanation, sortDegraded } from '../src/utils/sort.js';
import { deepFreeze, roundTo } from '../src/utils/freeze.js';
import { createCodeUnit, type DegradedSignal } from '../src/schemas/index.js';

const unit = createCodeUnit('def f(x):\n    return x\n');
const integrator = new ResultIntegrator(integratorConfigSchema.parse({}));

const signals = [
  scalarSignal({
    name: 'cyclomatic_complexity',
    category: 'structure',
    sourceKind: 'static',
    value: 0.8,
    rawValue: 5,
    scale: { type: 'unbounded', min: 1 },
    confidence: 0.9,
  }),
  scalarSignal({
    name: 'security_severity',
    category: 'security',
    sourceKind: 'static',
    value: 0.85,
    rawValue: 15,
    scale: { type: 'range', min: 0, max: 100 },
    confidence: 0.8,
  }),
];

const degraded: DegradedSignal[] = [
  { name: 'predicted_quality', reason: 'missing' },
  { name: 'anomaly_score', reason: 'missing' },
];

describe('Assessment determinism', () => {
  it('should produce the same assessment for identical input', () => {
    const first = integrator.integrate(unit, signals, degraded);
    const second = integrator.integrate(unit, signals, degraded);
    expect(second).toEqual(first);
    expect(second.assessmentId).toBe(first.assessmentId);
  });

  it('should produce the same assessmentId regardless of input order', () => {
    const first = integrator.integrate(unit, signals, degraded);
    const second = integrator.integrate(unit, [...signals].reverse(), [...degraded].reverse());
    expect(second.assessmentId).toBe(first.assessmentId);
  });

  it('should change the assessmentId when the code unit changes', () => {
    const other = createCodeUnit('def g(x):\n    return x\n');
    expect(integrator.integrate(other, signals, degraded).assessmentId).not.toBe(
      integrator.integrate(unit, signals, degraded).assessmentId,
    );
  });

  it('should hash the canonical payload', () => {
    const assessment = integrator.integrate(unit, signals, degraded);
    const { assessmentId, ...payload } = assessment;
    expect(assessmentId).toBe(sha256Hex(canonicalJson(payload)));
  });

  it('should freeze the assessment deeply', () => {
    const assessment = integrator.integrate(unit, signals, degraded);
    expect(Object.isFrozen(assessment)).toBe(true);
    expect(Object.isFrozen(assessment.explanation)).toBe(true);
    expect(Object.isFrozen(assessment.explanation[0])).toBe(true);
    expect(Object.isFrozen(assessment.subscores)).toBe(true);
  });

  it('should not freeze the caller degraded entries', () => {
    const mine: DegradedSignal[] = [{ name: 'embedding', reason: 'timeout' }];
    integrator.integrate(unit, signals, mine);
    expect(Object.isFrozen(mine[0])).toBe(false);
  });
});

describe('canonicalJson', () => {
  it('should produce stable output regardless of key insertion order', () => {
    const a = { z: 1, a: 2, m: 3 };
    const b = { a: 2, m: 3, z: 1 };
    expect(canonicalJson(a)).toBe(canonicalJson(b));
  });

  it('should handle nested objects', () => {
    const a = { outer: { z: 1, a: 2 }, x: 'hello' };
    const b = { x: 'hello', outer: { a: 2, z: 1 } };
    expect(canonicalJson(a)).toBe(canonicalJson(b));
  });

  it('should handle arrays', () => {
    const val = { arr: [3, 1, 2] };
    // Arrays should preserve order (not sort)
    expect(canonicalJson(val)).toBe('{"arr":[3,1,2]}');
  });

  it('should drop undefined values', () => {
    expect(canonicalJson({ b: undefined, a: 1 })).toBe('{"a":1}');
  });

  it('should handle null and undefined', () => {
    expect(canonicalJson(null)).toBe('null');
    expect(canonicalJson(undefined)).toBeUndefined();
  });
});

describe('sha256Hex', () => {
  it('should produce consistent hashes', () => {
    const hash1 = sha256Hex('hello world');
    const hash2 = sha256Hex('hello world');
    expect(hash1).toBe(hash2);
  });

  it('should produce 64-char hex string', () => {
    const hash = sha256Hex('test');
    expect(hash).toHaveLength(64);
    expect(hash).toMatch(/^[0-9a-f]+$/);
  });
});

describe('sortExplanation', () => {
  it('should sort by absolute contribution desc then signalName asc', () => {
    const entries = [
      { signalName: 'b', contribution: 5 },
      { signalName: 'c', contribution: -20 },
      { signalName: 'a', contribution: 5 },
      { signalName: 'd', contribution: 10 },
    ];
    const sorted = sortExplanation(entries);
    expect(sorted.map((e) => e.signalName)).toEqual(['c', 'd', 'a', 'b']);
    expect(entries[0]?.signalName).toBe('b');
  });
});

describe('sortDegraded', () => {
  it('should sort by name asc then reason asc', () => {
    const sorted = sortDegraded([
      { name: 'embedding', reason: 'timeout' as const },
      { name: 'detector:a', reason: 'unavailable' as const },
      { name: 'detector:a', reason: 'timeout' as const },
    ]);
    expect(sorted).toEqual([
      { name: 'detector:a', reason: 'timeout' },
      { name: 'detector:a', reason: 'unavailable' },
      { name: 'embedding', reason: 'timeout' },
    ]);
  });
});

describe('roundTo', () => {
  it('should round half away from zero', () => {
    expect(roundTo(47.00015, 2)).toBe(47);
    expect(roundTo(-2.5, 0)).toBe(-3);
    expect(roundTo(91.66666, 2)).toBe(91.67);
  });
});

describe('deepFreeze', () => {
  it('should freeze nested structures and return the same reference', () => {
    const value = { a: [{ b: 1 }] };
    const frozen = deepFreeze(value);
    expect(frozen).toBe(value);
    expect(Object.isFrozen(value.a[0])).toBe(true);
  });
});
