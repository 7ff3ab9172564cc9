import Python from 'tree-sitter-python';
import type Parser from 'tree-sitter';
import { silentLogger } from '@sourcelens/core';
import { parseAST } from '../parser.js';
import {
  createImport,
  createParseResult,
  type Declaration,
  type IdentifierReference,
  type Import,
  type ImportBinding,
  type ParseResult,
} from '../../types.js';
import type { LanguageDefinition, LanguageParser, ParseOptions } from './types.js';
import {
  findDeclarationsByPattern,
  findIdentifiersByPattern,
  findImportsByPattern,
} from './python-fallback.js';

type SyntaxNode = Parser.SyntaxNode;

function positionOf(node: SyntaxNode): { line: number; column: number } {
  return { line: node.startPosition.row + 1, column: node.startPosition.column + 1 };
}

// =============================================================================
// IMPORT EXTRACTOR
// =============================================================================

/**
 * Python import extractor
 *
 * Handles, anywhere in the file:
 * - import os
 * - import os.path as p, sys
 * - from ..utils.validate import validate_email, validate_phone as phone
 * - from typing import *
 */
export class PythonImportExtractor {
  readonly importNodeTypes = ['import_statement', 'import_from_statement', 'future_import_statement'];

  extractImports(rootNode: SyntaxNode): Import[] {
    const imports: Import[] = [];

    for (const node of rootNode.descendantsOfType(this.importNodeTypes)) {
      if (node.type === 'import_statement') {
        imports.push(...this.processPythonImport(node));
      } else {
        const imp = this.processPythonFromImport(node);
        if (imp) imports.push(imp);
      }
    }

    return imports;
  }

  /**
   * One plain import per listed module.
   * e.g., "import os, numpy as np"
   */
  private processPythonImport(node: SyntaxNode): Import[] {
    const imports: Import[] = [];

    for (const child of node.namedChildren) {
      const binding = this.readBinding(child);
      if (!binding) continue;
      imports.push(
        createImport({ kind: 'plain-import', source: binding.name, names: [binding], ...positionOf(node) }),
      );
    }

    return imports;
  }

  /**
   * `from x import a, b as c`; `from __future__ import ...` reads the same way.
   */
  private processPythonFromImport(node: SyntaxNode): Import | null {
    const isFuture = node.type === 'future_import_statement';
    const startIndex = isFuture ? -1 : this.findModulePathIndex(node);
    if (!isFuture && startIndex === -1) return null;

    const source = isFuture ? '__future__' : (node.namedChild(startIndex)?.text ?? '');
    const names: ImportBinding[] = [];

    for (let i = startIndex + 1; i < node.namedChildCount; i++) {
      const child = node.namedChild(i);
      if (!child) continue;
      if (child.type === 'wildcard_import') {
        names.push({ name: '*', alias: null });
        continue;
      }
      const binding = this.readBinding(child);
      if (binding) names.push(binding);
    }

    return createImport({ kind: 'from-import', source, names, ...positionOf(node) });
  }

  private findModulePathIndex(node: SyntaxNode): number {
    for (let i = 0; i < node.namedChildCount; i++) {
      const type = node.namedChild(i)?.type;
      if (type === 'relative_import' || type === 'dotted_name') {
        return i;
      }
    }
    return -1;
  }

  private readBinding(node: SyntaxNode): ImportBinding | null {
    if (node.type === 'dotted_name' || node.type === 'identifier') {
      return { name: node.text, alias: null };
    }
    if (node.type === 'aliased_import') {
      const name = node.childForFieldName('name')?.text;
      const alias = node.childForFieldName('alias')?.text;
      return name ? { name, alias: alias ?? null } : null;
    }
    return null;
  }
}

// =============================================================================
// DECLARATION EXTRACTOR
// =============================================================================

/** Compound statements whose blocks still run at module scope. */
const MODULE_SCOPE_BLOCKS = new Set([
  'if_statement',
  'elif_clause',
  'else_clause',
  'try_statement',
  'except_clause',
  'except_group_clause',
  'finally_clause',
  'with_statement',
  'for_statement',
  'while_statement',
  'block',
]);

const TARGET_PATTERNS = new Set(['pattern_list', 'tuple_pattern', 'list_pattern']);

/**
 * Python module-scope declaration extractor
 *
 * Handles:
 * - function_definition (def foo(), async def foo())
 * - class_definition (class Foo:)
 * - decorated_definition wrapping either of the above
 * - assignments (x = 1, x: int = 1, a = b = 1); the first one of a name wins
 */
export class PythonDeclarationExtractor {
  extractDeclarations(rootNode: SyntaxNode): Map<string, Declaration> {
    const declarations = new Map<string, Declaration>();
    const variables = new Set<string>();

    const add = (declaration: Declaration) => {
      if (declaration.kind === 'variable') {
        if (variables.has(declaration.name)) return;
        variables.add(declaration.name);
      }
      declarations.set(declaration.name, declaration);
    };

    for (const statement of this.moduleStatements(rootNode)) {
      for (const declaration of this.extractFromStatement(statement)) {
        add(declaration);
      }
    }

    return declarations;
  }

  private moduleStatements(container: SyntaxNode): SyntaxNode[] {
    const statements: SyntaxNode[] = [];
    for (const child of container.namedChildren) {
      if (MODULE_SCOPE_BLOCKS.has(child.type)) {
        statements.push(...this.moduleStatements(child));
      } else {
        statements.push(child);
      }
    }
    return statements;
  }

  private extractFromStatement(node: SyntaxNode): Declaration[] {
    switch (node.type) {
      case 'decorated_definition': {
        const definition = node.childForFieldName('definition');
        return definition ? this.extractFromStatement(definition) : [];
      }
      case 'function_definition':
        return this.extractFunctionInfo(node);
      case 'class_definition':
        return this.extractClassInfo(node);
      case 'expression_statement':
        return node.namedChildren
          .filter(child => child.type === 'assignment')
          .flatMap(child => this.extractAssignment(child));
      default:
        return [];
    }
  }

  private extractFunctionInfo(node: SyntaxNode): Declaration[] {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return [];

    const isAsync = node.child(0)?.type === 'async';
    return [
      {
        kind: 'function',
        name: nameNode.text,
        ...positionOf(nameNode),
        descriptor: isAsync ? 'async function' : 'function',
        exported: !nameNode.text.startsWith('_'),
        signature: this.buildSignature(node, nameNode.text, isAsync),
      },
    ];
  }

  private extractClassInfo(node: SyntaxNode): Declaration[] {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return [];

    return [
      {
        kind: 'class',
        name: nameNode.text,
        ...positionOf(nameNode),
        descriptor: 'class',
        exported: !nameNode.text.startsWith('_'),
      },
    ];
  }

  /** Targets of `a = b = value` and `x: T = value`, chained ones included. */
  private extractAssignment(node: SyntaxNode): Declaration[] {
    const left = node.childForFieldName('left');
    const right = node.childForFieldName('right');
    const descriptor = node.childForFieldName('type') ? 'annotated variable' : 'variable';

    const found = this.targetNames(left).map((nameNode): Declaration => ({
      kind: 'variable',
      name: nameNode.text,
      ...positionOf(nameNode),
      descriptor,
      exported: !nameNode.text.startsWith('_'),
    }));

    if (right?.type === 'assignment') {
      found.push(...this.extractAssignment(right));
    }
    return found;
  }

  private targetNames(node: SyntaxNode | null): SyntaxNode[] {
    if (!node) return [];
    if (node.type === 'identifier') return [node];
    if (TARGET_PATTERNS.has(node.type)) {
      return node.namedChildren.flatMap(child => this.targetNames(child));
    }
    return [];
  }

  /**
   * `[async ]def name(params)[ -> T]`. Only bare-name annotations are kept.
   */
  private buildSignature(node: SyntaxNode, name: string, isAsync: boolean): string {
    const parameters = node.childForFieldName('parameters');
    const params = parameters
      ? parameters.namedChildren.map(param => this.renderParameter(param)).filter(text => text !== '')
      : [];
    const returnType = this.simpleType(node.childForFieldName('return_type'));

    return `${isAsync ? 'async ' : ''}def ${name}(${params.join(', ')})${returnType ? ` -> ${returnType}` : ''}`;
  }

  private renderParameter(param: SyntaxNode): string {
    switch (param.type) {
      case 'identifier':
        return param.text;
      case 'list_splat_pattern':
        return `*${param.namedChildren[0]?.text ?? ''}`;
      case 'dictionary_splat_pattern':
        return `**${param.namedChildren[0]?.text ?? ''}`;
      case 'keyword_separator':
        return '*';
      case 'positional_separator':
        return '/';
      case 'default_parameter':
        return param.childForFieldName('name')?.text ?? '';
      case 'typed_parameter': {
        const inner = param.namedChildren[0];
        const base = inner ? this.renderParameter(inner) : '';
        return this.annotate(base, param.childForFieldName('type'));
      }
      case 'typed_default_parameter':
        return this.annotate(param.childForFieldName('name')?.text ?? '', param.childForFieldName('type'));
      default:
        return '';
    }
  }

  private annotate(base: string, typeNode: SyntaxNode | null): string {
    const type = this.simpleType(typeNode);
    return base && type ? `${base}: ${type}` : base;
  }

  private simpleType(node: SyntaxNode | null): string | null {
    if (!node) return null;
    const inner = node.type === 'type' ? node.namedChildren[0] : node;
    return inner?.type === 'identifier' ? inner.text : null;
  }
}

// =============================================================================
// REFERENCE COLLECTOR
// =============================================================================

/** Statements that only bind names. */
const BINDING_ONLY = new Set([
  'import_statement',
  'import_from_statement',
  'future_import_statement',
  'global_statement',
  'nonlocal_statement',
]);

const TARGET_CONTAINERS = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'tuple',
  'list',
  'list_splat_pattern',
  'parenthesized_expression',
]);

/**
 * Collects identifiers in load position, skipping every binding position:
 * definition names, parameters, assignment, loop, `with` and `except`
 * targets, keyword-argument names, attribute names and import clauses.
 */
export class PythonReferenceCollector {
  private readonly references: IdentifierReference[] = [];

  static collect(rootNode: SyntaxNode): IdentifierReference[] {
    const collector = new PythonReferenceCollector();
    collector.visit(rootNode);
    return collector.references;
  }

  private visitAll(nodes: readonly (SyntaxNode | null)[]): void {
    for (const node of nodes) {
      if (node) this.visit(node);
    }
  }

  private visit(node: SyntaxNode): void {
    if (BINDING_ONLY.has(node.type)) return;

    switch (node.type) {
      case 'identifier':
        this.references.push({ ...positionOf(node), name: node.text });
        return;

      case 'attribute':
        this.visitAll([node.childForFieldName('object')]);
        return;

      case 'keyword_argument':
        this.visitAll([node.childForFieldName('value')]);
        return;

      case 'function_definition':
        this.visitParameters(node.childForFieldName('parameters'));
        this.visitAll([node.childForFieldName('return_type'), node.childForFieldName('body')]);
        return;

      case 'lambda':
        this.visitParameters(node.childForFieldName('parameters'));
        this.visitAll([node.childForFieldName('body')]);
        return;

      case 'class_definition':
        this.visitAll([node.childForFieldName('superclasses'), node.childForFieldName('body')]);
        return;

      case 'assignment':
      case 'augmented_assignment':
        this.visitTarget(node.childForFieldName('left'));
        this.visitAll([node.childForFieldName('type'), node.childForFieldName('right')]);
        return;

      case 'for_statement':
      case 'for_in_clause': {
        const left = node.childForFieldName('left');
        this.visitTarget(left);
        this.visitAll(node.namedChildren.filter(child => !left || child.startIndex > left.startIndex));
        return;
      }

      case 'named_expression':
        this.visitAll([node.childForFieldName('value')]);
        return;

      case 'as_pattern':
        this.visitAll([node.namedChildren[0]]);
        this.visitTarget(node.childForFieldName('alias'));
        return;

      case 'except_clause':
        this.visitExceptClause(node);
        return;

      default:
        this.visitAll(node.namedChildren);
    }
  }

  /** Names being bound are skipped; what they are read through is visited. */
  private visitTarget(node: SyntaxNode | null): void {
    if (!node || node.type === 'identifier') return;

    if (TARGET_CONTAINERS.has(node.type)) {
      for (const child of node.namedChildren) this.visitTarget(child);
      return;
    }
    if (node.type === 'as_pattern_target') {
      this.visitTarget(node.namedChildren[0] ?? null);
      return;
    }
    this.visit(node);
  }

  /** Defaults and annotations are reads; the parameter names are not. */
  private visitParameters(parameters: SyntaxNode | null): void {
    if (!parameters) return;

    for (const param of parameters.namedChildren) {
      switch (param.type) {
        case 'default_parameter':
          this.visitAll([param.childForFieldName('value')]);
          break;
        case 'typed_parameter':
          this.visitAll([param.childForFieldName('type')]);
          break;
        case 'typed_default_parameter':
          this.visitAll([param.childForFieldName('type'), param.childForFieldName('value')]);
          break;
        default:
          break;
      }
    }
  }

  /** `except E as err:` binds `err` and reads `E`. */
  private visitExceptClause(node: SyntaxNode): void {
    let bindsNext = false;
    for (const child of node.children) {
      if (child.type === 'as') {
        bindsNext = true;
        continue;
      }
      if (!child.isNamed) continue;
      if (bindsNext) {
        this.visitTarget(child);
        bindsNext = false;
      } else {
        this.visit(child);
      }
    }
  }
}

// =============================================================================
// PARSER
// =============================================================================

/**
 * Python parser backed by tree-sitter-python. When the tree cannot be built
 * cleanly, the whole result comes from line-based patterns instead and is
 * flagged as syntactically invalid.
 */
export class PythonParser implements LanguageParser {
  private readonly importExtractor = new PythonImportExtractor();
  private readonly declarationExtractor = new PythonDeclarationExtractor();

  parse(content: string, filename?: string, options: ParseOptions = {}): ParseResult {
    const logger = options.logger ?? silentLogger;
    const { tree, error } = parseAST(content, Python);

    if (!tree || error) {
      const diagnostic = error ?? 'Syntax error';
      logger.warning(
        `${filename ?? '<source>'}: ${diagnostic}; falling back to line-based extraction`,
      );
      return createParseResult({
        language: 'python',
        imports: findImportsByPattern(content),
        declarations: findDeclarationsByPattern(content),
        identifiers: findIdentifiersByPattern(content),
        syntaxValid: false,
        errors: [diagnostic],
        raw: content,
      });
    }

    const root = tree.rootNode;
    return createParseResult({
      language: 'python',
      imports: this.importExtractor.extractImports(root),
      declarations: this.declarationExtractor.extractDeclarations(root),
      identifiers: PythonReferenceCollector.collect(root),
      raw: content,
    });
  }
}

// =============================================================================
// DEFINITION
// =============================================================================

export function scorePython(content: string): number {
  let score = 0;
  if (content.includes('def ')) score += 2;
  if (content.includes('class ') && content.includes(':')) score += 2;
  if (content.includes('import ') || content.includes('from ')) score += 2;
  if (content.includes(':') && content.includes('#')) score += 1;
  if (content.includes('self.')) score += 1;
  return score;
}

export const pythonDefinition: LanguageDefinition = {
  id: 'python',
  extensions: ['py', 'pyi'],
  parser: new PythonParser(),
  scoreContent: scorePython,
};
