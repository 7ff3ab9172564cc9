import Parser from 'tree-sitter';
import { getErrorMessage } from '@sourcelens/core';
import type { TreeSitterLanguage } from './languages/types.js';

export interface ASTParseResult {
  tree: Parser.Tree | null;
  /** Set when the tree is missing or contains ERROR/MISSING nodes */
  error?: string;
}

/**
 * Parse source code into a syntax tree using Tree-sitter.
 *
 * A fresh parser is created for every call so that concurrent callers never
 * share parser state.
 *
 * **Known Limitation:** Tree-sitter may throw "Invalid argument" errors on very large
 * inputs. The error is returned, not thrown, and callers fall back to line-based
 * extraction.
 *
 * @param content - Source code to parse
 * @param grammar - Tree-sitter grammar object
 * @returns Parse result with tree or error
 */
export function parseAST(content: string, grammar: TreeSitterLanguage): ASTParseResult {
  try {
    const parser = new Parser();
    parser.setLanguage(grammar);
    const tree = parser.parse(content);

    // Check for parse errors (hasError is a property, not a method)
    if (tree.rootNode.hasError) {
      return { tree, error: describeFirstError(tree.rootNode) };
    }

    return { tree };
  } catch (error) {
    return {
      tree: null,
      error: `Could not build syntax tree: ${getErrorMessage(error)}`,
    };
  }
}

function findFirstError(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) return node;

  for (const child of node.children) {
    if (!child.hasError && !child.isMissing) continue;
    const found = findFirstError(child);
    if (found) return found;
  }
  return null;
}

function describeFirstError(root: Parser.SyntaxNode): string {
  const node = findFirstError(root);
  if (!node) return 'Syntax error';

  const { row, column } = node.startPosition;
  const where = `line ${row + 1}, column ${column + 1}`;
  return node.isMissing ? `Syntax error at ${where}: missing "${node.type}"` : `Syntax error at ${where}`;
}
