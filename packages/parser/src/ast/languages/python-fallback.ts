import {
  createImport,
  type Declaration,
  type IdentifierReference,
  type Import,
  type ImportBinding,
} from '../../types.js';
import { createLineLocator } from '../../utils/line-locator.js';

/**
 * Line-based extraction for script sources whose syntax tree could not be
 * built. Only unindented definitions count as declarations.
 */

const IMPORT_PATTERN = /^[ \t]*import[ \t]+([\w. \t,]+)/gm;
const FROM_IMPORT_PATTERN = /^[ \t]*from[ \t]+(\.+[\w.]*|[\w.]+)[ \t]+import[ \t]+([^\n#]+)/gm;
const FUNCTION_PATTERN = /^(async[ \t]+)?def[ \t]+([A-Za-z_]\w*)[ \t]*\(/gm;
const CLASS_PATTERN = /^class[ \t]+([A-Za-z_]\w*)/gm;
const ASSIGNMENT_PATTERN = /^([A-Za-z_]\w*)[ \t]*(:[^=\n]+)?=(?!=)/gm;
const IMPORT_LINE = /^[ \t]*(?:import|from)[ \t]/;
const WORD = /\b[A-Za-z_]\w*\b/g;

const KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally',
  'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
  'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

/** `a as b` → binding; null for an empty or malformed part. */
function parseBinding(part: string): ImportBinding | null {
  const match = /^([\w.*]+)(?:\s+as\s+(\w+))?$/.exec(part.trim());
  return match ? { name: match[1], alias: match[2] ?? null } : null;
}

export function findImportsByPattern(content: string): Import[] {
  const positionOf = createLineLocator(content);
  const found: { index: number; imp: Import }[] = [];

  for (const match of content.matchAll(IMPORT_PATTERN)) {
    const index = (match.index ?? 0) + match[0].indexOf('import');
    for (const binding of match[1].split(',').map(parseBinding)) {
      if (!binding) continue;
      found.push({
        index,
        imp: createImport({
          kind: 'plain-import',
          source: binding.name,
          names: [binding],
          ...positionOf(index),
        }),
      });
    }
  }

  for (const match of content.matchAll(FROM_IMPORT_PATTERN)) {
    const index = (match.index ?? 0) + match[0].indexOf('from');
    const names = match[2]
      .replace(/[()\\]/g, '')
      .split(',')
      .map(parseBinding)
      .filter((binding): binding is ImportBinding => binding !== null);

    found.push({
      index,
      imp: createImport({ kind: 'from-import', source: match[1], names, ...positionOf(index) }),
    });
  }

  return found.sort((a, b) => a.index - b.index).map(entry => entry.imp);
}

export function findDeclarationsByPattern(content: string): Map<string, Declaration> {
  const positionOf = createLineLocator(content);
  const found: { index: number; declaration: Declaration }[] = [];

  for (const match of content.matchAll(FUNCTION_PATTERN)) {
    const index = (match.index ?? 0) + match[0].indexOf(match[2], match[0].indexOf('def') + 3);
    const name = match[2];
    found.push({
      index,
      declaration: {
        kind: 'function',
        name,
        descriptor: match[1] ? 'async function' : 'function',
        exported: !name.startsWith('_'),
        signature: '',
        ...positionOf(index),
      },
    });
  }

  for (const match of content.matchAll(CLASS_PATTERN)) {
    const index = (match.index ?? 0) + match[0].indexOf(match[1], 5);
    const name = match[1];
    found.push({
      index,
      declaration: {
        kind: 'class',
        name,
        descriptor: 'class',
        exported: !name.startsWith('_'),
        ...positionOf(index),
      },
    });
  }

  for (const match of content.matchAll(ASSIGNMENT_PATTERN)) {
    const name = match[1];
    if (KEYWORDS.has(name)) continue;
    found.push({
      index: match.index ?? 0,
      declaration: {
        kind: 'variable',
        name,
        descriptor: match[2] ? 'annotated variable' : 'variable',
        exported: !name.startsWith('_'),
        ...positionOf(match.index ?? 0),
      },
    });
  }

  const declarations = new Map<string, Declaration>();
  const variables = new Set<string>();
  for (const { declaration } of found.sort((a, b) => a.index - b.index)) {
    if (declaration.kind === 'variable') {
      if (variables.has(declaration.name)) continue;
      variables.add(declaration.name);
    }
    declarations.set(declaration.name, declaration);
  }
  return declarations;
}

/**
 * Every non-keyword word outside comments and import lines.
 */
export function findIdentifiersByPattern(content: string): IdentifierReference[] {
  const identifiers: IdentifierReference[] = [];

  content.split('\n').forEach((line, i) => {
    if (IMPORT_LINE.test(line)) return;
    const hash = line.indexOf('#');
    const code = hash === -1 ? line : line.slice(0, hash);

    for (const match of code.matchAll(WORD)) {
      if (KEYWORDS.has(match[0])) continue;
      identifiers.push({ line: i + 1, column: (match.index ?? 0) + 1, name: match[0] });
    }
  });

  return identifiers;
}
