import type Parser from 'tree-sitter';
import { reviewConfigSchema, type ReviewConfig } from '@code-verdict/config';
import type { CodeReviewer, Insight } from '@code-verdict/verdict-core';
import { functionFeatures } from './features.js';
import {
  bodyStatements,
  createPythonParser,
  findNodesOfType,
  functionName,
  getLine,
  hasDocstring,
  positionalParameters,
  PyNodes,
  type SyntaxNode,
} from './parser.js';

/** Feature tokens common in well-rated reference code */
export const GOOD_PATTERNS = ['func_calculate', 'func_process', 'func_validate', 'return_single', 'args_2', 'args_3'];

/** Feature tokens common in poorly rated reference code */
export const CONCERNING_PATTERNS = ['high_conditional_complexity', 'high_loop_complexity', 'args_5', 'args_6', 'args_7'];

const DUNDER = /^__\w+__$/;

/**
 * Patterns present in a feature list. `func_calculate` also matches
 * `func_calculate_total`.
 */
export function matchPatterns(features: readonly string[], patterns: readonly string[]): string[] {
  return patterns.filter((pattern) =>
    features.some((feature) => feature === pattern || feature.startsWith(`${pattern}_`)),
  );
}

export function isDescriptiveName(name: string, verbs: readonly string[]): boolean {
  if (DUNDER.test(name)) return true;
  return (name.includes('_') && name.length > 8) || verbs.some((verb) => name.startsWith(verb));
}

/**
 * Rule-based reviewer over a tree-sitter parse.
 *
 * Reports long functions, wide signatures, vague names, missing docstrings,
 * modules that never group their functions into classes, and the feature
 * patterns the embedding associates with good or poor code. Malformed source
 * is reviewed from its recovered tree.
 */
export class RuleBasedReviewer implements CodeReviewer {
  private readonly parser = createPythonParser();

  constructor(private readonly config: ReviewConfig = reviewConfigSchema.parse({})) {}

  async review(code: string, signal?: AbortSignal): Promise<Insight[]> {
    signal?.throwIfAborted();
    return this.reviewTree(this.parser.parse(code), code);
  }

  reviewTree(tree: Parser.Tree, source: string): Insight[] {
    const root = tree.rootNode;
    const functions = findNodesOfType(root, [PyNodes.FUNCTION_DEFINITION]);
    const insights = functions.flatMap((fn) => this.reviewFunction(fn, source));

    const classCount = findNodesOfType(root, [PyNodes.CLASS_DEFINITION]).length;
    if (classCount === 0 && functions.length > this.config.maxFunctionsWithoutClasses) {
      insights.push({
        kind: 'issue',
        code: 'no_classes',
        category: 'structure',
        message: `${functions.length} functions but no classes; consider grouping related functions`,
      });
    }
    return insights;
  }

  private reviewFunction(fn: SyntaxNode, source: string): Insight[] {
    const name = functionName(fn, source);
    const line = getLine(fn);
    const insights: Insight[] = [];
    const issue = (code: string, message: string): void => {
      insights.push({ kind: 'issue', code, category: 'structure', message, line });
    };

    const statements = bodyStatements(fn).length;
    if (statements > this.config.maxFunctionStatements) {
      issue('long_function', `Function "${name}" has ${statements} statements, limit is ${this.config.maxFunctionStatements}`);
    }

    const argumentCount = positionalParameters(fn, source).length;
    if (argumentCount > this.config.maxArguments) {
      issue('too_many_arguments', `Function "${name}" takes ${argumentCount} arguments, limit is ${this.config.maxArguments}`);
    }

    if (!isDescriptiveName(name, this.config.descriptiveVerbs)) {
      issue('non_descriptive_name', `Function "${name}" could have a more descriptive name`);
    }

    if (!hasDocstring(fn)) {
      issue('missing_docstring', `Function "${name}" has no docstring`);
    }

    const features = functionFeatures(fn, source);
    const good = matchPatterns(features, GOOD_PATTERNS);
    if (good.length > 0) {
      insights.push({
        kind: 'strength',
        code: 'good_patterns',
        category: 'predicted_quality',
        message: `Function "${name}" shows patterns of well-rated code: ${good.join(', ')}`,
        line,
      });
    }
    const concerning = matchPatterns(features, CONCERNING_PATTERNS);
    if (concerning.length > 0) {
      insights.push({
        kind: 'issue',
        code: 'concerning_patterns',
        category: 'predicted_quality',
        message: `Function "${name}" shows patterns of poorly rated code: ${concerning.join(', ')}`,
        line,
      });
    }

    return insights;
  }
}
