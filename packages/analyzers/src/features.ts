import type Parser from 'tree-sitter';
import {
  findNodesOfType,
  functionName,
  positionalParameters,
  PyNodes,
  walkTree,
  type SyntaxNode,
} from './parser.js';

const OPERATIONS: Record<string, string> = {
  [PyNodes.CALL]: 'operation_call',
  [PyNodes.ASSIGNMENT]: 'operation_assign',
  [PyNodes.AUGMENTED_ASSIGNMENT]: 'operation_aug_assign',
  [PyNodes.COMPARISON_OPERATOR]: 'operation_compare',
  [PyNodes.SUBSCRIPT]: 'operation_subscript',
};

const ARITHMETIC = new Set(['+', '-', '*', '/', '%', '**', '//']);

/**
 * Operation kinds present under a node
 */
export function operationFeatures(node: SyntaxNode): string[] {
  const found = new Set<string>();
  walkTree(node, (n) => {
    const operation = OPERATIONS[n.type];
    if (operation !== undefined) found.add(operation);
    if (n.type === PyNodes.BINARY_OPERATOR) {
      const operator = n.childForFieldName('operator');
      if (operator !== null && ARITHMETIC.has(operator.type)) found.add('operation_math');
    }
  });
  return [...found].sort();
}

function isEmptyReturn(node: SyntaxNode): boolean {
  const value = node.namedChildren;
  return value.length === 0 || (value.length === 1 && value[0].type === PyNodes.NONE);
}

function returnFeature(node: SyntaxNode): string {
  const returns = findNodesOfType(node, [PyNodes.RETURN_STATEMENT]);
  if (returns.every(isEmptyReturn)) return 'return_none';
  return returns.length === 1 ? 'return_single' : 'return_multiple';
}

function complexityFeatures(node: SyntaxNode): string[] {
  const conditionals = findNodesOfType(node, [PyNodes.IF_STATEMENT, PyNodes.ELIF_CLAUSE]).length;
  const loops = findNodesOfType(node, [PyNodes.FOR_STATEMENT, PyNodes.WHILE_STATEMENT]).length;

  const features: string[] = [];
  if (conditionals > 3) features.push('high_conditional_complexity');
  if (loops > 2) features.push('high_loop_complexity');
  return features;
}

function blockFeatures(node: SyntaxNode): string[] {
  return [...operationFeatures(node), ...complexityFeatures(node), returnFeature(node)];
}

/**
 * Feature tokens for one function: its name, positional arity and the
 * shape of its body
 */
export function functionFeatures(fn: SyntaxNode, source: string): string[] {
  const body = fn.childForFieldName('body');
  return [
    `func_${functionName(fn, source)}`,
    `args_${positionalParameters(fn, source).length}`,
    ...(body === null ? ['return_none'] : blockFeatures(body)),
  ];
}

/**
 * Feature tokens describing the shape of each function.
 *
 * Source without functions is described as a single module-level block.
 * Recovered trees are accepted, so malformed source still yields the
 * features of the parts that did parse.
 */
export function extractFeatures(tree: Parser.Tree, source: string): string[] {
  const functions = findNodesOfType(tree.rootNode, [PyNodes.FUNCTION_DEFINITION]);
  if (functions.length === 0) {
    return ['module_block', ...blockFeatures(tree.rootNode)];
  }
  return functions.flatMap((fn) => functionFeatures(fn, source));
}
