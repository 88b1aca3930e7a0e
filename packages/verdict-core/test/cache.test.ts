import { describe, it, expect, beforeEach } from 'vitest';
import { integratorConfigSchema } from '@code-verdict/config';
import { InMemoryAssessmentCache } from '../src/cache.js';
import { ResultIntegrator } from '../src/scoring/integrator.js';
import { createCodeUnit, type Assessment } from '../src/schemas/index.js';

const integrator = new ResultIntegrator(integratorConfigSchema.parse({}));

function assessmentFor(source: string): Assessment {
  return integrator.integrate(createCodeUnit(source), [], [{ name: 'input', reason: 'out_of_domain' }]);
}

describe('InMemoryAssessmentCache', () => {
  let cache: InMemoryAssessmentCache;

  beforeEach(() => {
    cache = new InMemoryAssessmentCache(2);
  });

  it('should return stored assessments', () => {
    const a = assessmentFor('a');
    cache.set('a', a);

    expect(cache.get('a')).toBe(a);
    expect(cache.get('missing')).toBeUndefined();
  });

  it('should evict the least recently used entry', () => {
    cache.set('a', assessmentFor('a'));
    cache.set('b', assessmentFor('b'));
    cache.get('a');
    cache.set('c', assessmentFor('c'));

    expect(cache.size).toBe(2);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBeDefined();
    expect(cache.get('c')).toBeDefined();
  });

  it('should replace an existing entry without growing', () => {
    cache.set('a', assessmentFor('a'));
    const replacement = assessmentFor('a2');
    cache.set('a', replacement);

    expect(cache.size).toBe(1);
    expect(cache.get('a')).toBe(replacement);
  });

  it('should clear all entries', () => {
    cache.set('a', assessmentFor('a'));
    cache.clear();

    expect(cache.size).toBe(0);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new InMemoryAssessmentCache(0)).toThrow('maxEntries must be a positive integer, got 0');
  });
});
