import { describe, it, expect } from 'vitest';
import { reviewConfigSchema } from '@code-verdict/config';
import { GOOD_PATTERNS, RuleBasedReviewer, isDescriptiveName, matchPatterns } from '../src/reviewer.js';

const VERBS = reviewConfigSchema.parse({}).descriptiveVerbs;

describe('matchPatterns', () => {
  it('should match a pattern exactly or as a name prefix', () => {
    expect(matchPatterns(['func_calculate_total', 'args_3', 'func_calculated'], GOOD_PATTERNS)).toEqual([
      'func_calculate',
      'args_3',
    ]);
  });
});

describe('isDescriptiveName', () => {
  it.each([
    ['load_settings', true],
    ['getter', true],
    ['__init__', true],
    ['helper', false],
    ['do_it', false],
  ])('%s -> %s', (name, expected) => {
    expect(isDescriptiveName(name, VERBS)).toBe(expected);
  });
});

describe('RuleBasedReviewer', () => {
  const reviewer = new RuleBasedReviewer();

  it('should report the strengths of a well-formed function', async () => {
    const code = 'def calculate_total(price, tax):\n    """Total with tax."""\n    return price + tax\n';

    expect(await reviewer.review(code)).toEqual([
      {
        kind: 'strength',
        code: 'good_patterns',
        category: 'predicted_quality',
        message: 'Function "calculate_total" shows patterns of well-rated code: func_calculate, return_single, args_2',
        line: 1,
      },
    ]);
  });

  it('should report every problem of a function', async () => {
    const code = 'x = 1\n\ndef f(a, b, c, d, e):\n    return a\n';

    expect(await reviewer.review(code)).toEqual([
      {
        kind: 'issue',
        code: 'too_many_arguments',
        category: 'structure',
        message: 'Function "f" takes 5 arguments, limit is 4',
        line: 3,
      },
      {
        kind: 'issue',
        code: 'non_descriptive_name',
        category: 'structure',
        message: 'Function "f" could have a more descriptive name',
        line: 3,
      },
      {
        kind: 'issue',
        code: 'missing_docstring',
        category: 'structure',
        message: 'Function "f" has no docstring',
        line: 3,
      },
      {
        kind: 'strength',
        code: 'good_patterns',
        category: 'predicted_quality',
        message: 'Function "f" shows patterns of well-rated code: return_single',
        line: 3,
      },
      {
        kind: 'issue',
        code: 'concerning_patterns',
        category: 'predicted_quality',
        message: 'Function "f" shows patterns of poorly rated code: args_5',
        line: 3,
      },
    ]);
  });

  it('should flag functions over the statement limit', async () => {
    const strict = new RuleBasedReviewer(reviewConfigSchema.parse({ maxFunctionStatements: 2 }));
    const code = 'def process_items(items):\n    total = 0\n    total += 1\n    return total\n';

    const long = (await strict.review(code)).filter((i) => i.code === 'long_function');

    expect(long).toEqual([
      {
        kind: 'issue',
        code: 'long_function',
        category: 'structure',
        message: 'Function "process_items" has 3 statements, limit is 2',
        line: 1,
      },
    ]);
  });

  describe('modules without classes', () => {
    const strict = new RuleBasedReviewer(reviewConfigSchema.parse({ maxFunctionsWithoutClasses: 1 }));

    it('should suggest grouping loose functions', async () => {
      const insights = await strict.review('def get_a():\n    return 1\n\ndef get_b():\n    return 2\n');

      expect(insights.filter((i) => i.code === 'no_classes')).toEqual([
        {
          kind: 'issue',
          code: 'no_classes',
          category: 'structure',
          message: '2 functions but no classes; consider grouping related functions',
        },
      ]);
    });

    it('should stay quiet once a class exists', async () => {
      const code = 'class Pair:\n    def get_a(self):\n        return 1\n\n    def get_b(self):\n        return 2\n';

      expect((await strict.review(code)).some((i) => i.code === 'no_classes')).toBe(false);
    });
  });

  it('should stop when the call is already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(reviewer.review('def f():\n    pass\n', controller.signal)).rejects.toThrow();
  });
});
