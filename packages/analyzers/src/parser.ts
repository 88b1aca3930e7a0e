import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { ParseError } from '@code-verdict/verdict-core';

export type SyntaxNode = Parser.SyntaxNode;

/** tree-sitter-python node types the analyzers inspect */
export const PyNodes = {
  MODULE: 'module',
  FUNCTION_DEFINITION: 'function_definition',
  CLASS_DEFINITION: 'class_definition',
  IMPORT_STATEMENT: 'import_statement',
  IMPORT_FROM_STATEMENT: 'import_from_statement',
  FUTURE_IMPORT_STATEMENT: 'future_import_statement',
  IF_STATEMENT: 'if_statement',
  ELIF_CLAUSE: 'elif_clause',
  FOR_STATEMENT: 'for_statement',
  WHILE_STATEMENT: 'while_statement',
  BOOLEAN_OPERATOR: 'boolean_operator',
  COMPARISON_OPERATOR: 'comparison_operator',
  BINARY_OPERATOR: 'binary_operator',
  ASSIGNMENT: 'assignment',
  AUGMENTED_ASSIGNMENT: 'augmented_assignment',
  CALL: 'call',
  SUBSCRIPT: 'subscript',
  RETURN_STATEMENT: 'return_statement',
  EXPRESSION_STATEMENT: 'expression_statement',
  STRING: 'string',
  COMMENT: 'comment',
  NONE: 'none',
  IDENTIFIER: 'identifier',
  TYPED_PARAMETER: 'typed_parameter',
  DEFAULT_PARAMETER: 'default_parameter',
  TYPED_DEFAULT_PARAMETER: 'typed_default_parameter',
  ERROR: 'ERROR',
} as const;

const PARAMETER_TYPES = new Set<string>([
  PyNodes.IDENTIFIER,
  PyNodes.TYPED_PARAMETER,
  PyNodes.DEFAULT_PARAMETER,
  PyNodes.TYPED_DEFAULT_PARAMETER,
]);

/**
 * Creates a Python parser instance. Parsing never throws: malformed code
 * yields a tree with ERROR and missing nodes around the damage.
 *
 * The `as unknown as Parser.Language` assertion is needed because
 * tree-sitter-python's type definitions do not extend tree-sitter's Language
 * type, although the two are compatible at runtime.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python as unknown as Parser.Language);
  return parser;
}

export function getNodeText(node: SyntaxNode, source: string): string {
  return source.slice(node.startIndex, node.endIndex);
}

/** 1-based line of the node's first character */
export function getLine(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/**
 * Walks the tree depth-first, calling the callback for each node.
 * Returning false from the callback skips the node's children.
 */
export function walkTree(node: SyntaxNode, callback: (node: SyntaxNode) => boolean | void): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

export function findNodesOfType(root: SyntaxNode, types: readonly string[]): SyntaxNode[] {
  const results: SyntaxNode[] = [];
  const typeSet = new Set(types);
  walkTree(root, (node) => {
    if (typeSet.has(node.type)) results.push(node);
  });
  return results;
}

/**
 * Inserted tokens are zero-width leaves; the parser adds them to recover from
 * a missing closing bracket or colon.
 */
function isMissing(node: SyntaxNode): boolean {
  return node.childCount === 0 && node.startIndex === node.endIndex && node.type !== PyNodes.MODULE;
}

/**
 * First syntax error in document order, or null for a clean parse
 */
export function findSyntaxError(root: SyntaxNode): ParseError | null {
  let found: ParseError | null = null;
  walkTree(root, (node) => {
    if (found !== null) return false;
    if (node.type === PyNodes.ERROR) {
      found = new ParseError(`syntax error at line ${getLine(node)}`, getLine(node));
      return false;
    }
    if (isMissing(node)) {
      found = new ParseError(`missing '${node.type}' at line ${getLine(node)}`, getLine(node));
      return false;
    }
    return true;
  });
  return found;
}

/**
 * @throws ParseError if the tree contains a syntax error
 */
export function assertWellFormed(tree: Parser.Tree): void {
  const error = findSyntaxError(tree.rootNode);
  if (error !== null) throw error;
}

/**
 * Statements directly inside a function's body, comments excluded
 */
export function bodyStatements(fn: SyntaxNode): SyntaxNode[] {
  const body = fn.childForFieldName('body');
  if (body === null) return [];
  return body.namedChildren.filter((child) => child.type !== PyNodes.COMMENT);
}

export function functionName(fn: SyntaxNode, source: string): string {
  const name = fn.childForFieldName('name');
  return name === null ? '<anonymous>' : getNodeText(name, source);
}

/**
 * Positional parameter names, `self` included. Counting stops at `*`,
 * `*args` or `**kwargs`; the positional-only marker `/` is skipped.
 */
export function positionalParameters(fn: SyntaxNode, source: string): string[] {
  const parameters = fn.childForFieldName('parameters');
  if (parameters === null) return [];

  const names: string[] = [];
  for (const child of parameters.children) {
    const text = getNodeText(child, source);
    if (text.startsWith('*')) break;
    if (!PARAMETER_TYPES.has(child.type)) continue;

    const name =
      child.type === PyNodes.IDENTIFIER
        ? child
        : (child.childForFieldName('name') ?? child.namedChildren.find((n) => n.type === PyNodes.IDENTIFIER));
    if (name !== undefined && name !== null) names.push(getNodeText(name, source));
  }
  return names;
}

/**
 * Whether the first statement of the body is a string literal
 */
export function hasDocstring(fn: SyntaxNode): boolean {
  const first = bodyStatements(fn)[0];
  return (
    first !== undefined &&
    first.type === PyNodes.EXPRESSION_STATEMENT &&
    first.namedChildCount === 1 &&
    first.namedChildren[0].type === PyNodes.STRING
  );
}

const STRING_OPENING = /^[A-Za-z]*("""|'''|"|')/;

/**
 * Source lines with comments and string-literal contents replaced by spaces.
 * Columns are preserved and quotes are kept, so `"eval(x)"` becomes `"       "`.
 * Works on trees with syntax errors.
 */
export function maskedLines(tree: Parser.Tree, source: string): string[] {
  // node offsets are UTF-16 code units, matching string indexing
  const chars = source.split('');

  const blank = (from: number, to: number): void => {
    for (let i = from; i < to; i++) {
      if (chars[i] !== '\n' && chars[i] !== '\r') chars[i] = ' ';
    }
  };

  walkTree(tree.rootNode, (node) => {
    if (node.type === PyNodes.COMMENT) {
      blank(node.startIndex, node.endIndex);
      return false;
    }
    if (node.type === PyNodes.STRING) {
      const text = getNodeText(node, source);
      const opening = STRING_OPENING.exec(text);
      if (opening !== null) {
        const delimiter = opening[1];
        const closed = text.length >= opening[0].length + delimiter.length && text.endsWith(delimiter);
        blank(node.startIndex + opening[0].length, node.endIndex - (closed ? delimiter.length : 0));
      }
      return false;
    }
    return true;
  });

  return chars.join('').split(/\r?\n/);
}
