import { extname } from 'path';
import { tokenize } from '../../tokenizer/tokenizer.js';
import type { Token } from '../../tokenizer/types.js';
import { BUILTIN_NAMES, CONTEXTUAL_KEYWORDS } from '../../tokenizer/vocabulary.js';
import {
  createImport,
  createParseResult,
  type Declaration,
  type IdentifierReference,
  type Import,
  type ImportBinding,
  type ParseResult,
} from '../../types.js';
import { createLineLocator } from '../../utils/line-locator.js';
import type { LanguageParser } from './types.js';

type EcmaScriptVariant = 'javascript' | 'typescript';

function isWord(token: Token | undefined): boolean {
  return token?.kind === 'keyword' || token?.kind === 'identifier';
}

/** A keyword, or a contextual word such as `from` scanned as an identifier. */
function isKeyword(token: Token | undefined, text: string): boolean {
  return isWord(token) && token?.text === text;
}

function isPunctuation(token: Token | undefined, text: string): boolean {
  return token?.kind === 'punctuation' && token.text === text;
}

function isOperator(token: Token | undefined, text: string): boolean {
  return token?.kind === 'operator' && token.text === text;
}

/** Strip the surrounding quotes (or backticks) of a string token. */
function unquote(text: string): string {
  const quote = text[0];
  if (quote !== '"' && quote !== "'" && quote !== '`') return text;
  const end = text.length > 1 && text.endsWith(quote) ? -1 : undefined;
  return text.slice(1, end);
}

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

/**
 * Index just past the bracket that closes the one at `start`.
 * Runs to the end of the stream when unbalanced.
 */
function skipBalanced(tokens: readonly Token[], start: number): number {
  let depth = 0;
  for (let i = start; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== 'punctuation') continue;
    if (OPENERS.has(token.text)) depth++;
    else if (CLOSERS.has(token.text)) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return tokens.length;
}

/** Change in angle-bracket depth a token contributes (`>>` closes two). */
function angleDelta(token: Token): number {
  if (token.kind !== 'operator') return 0;
  switch (token.text) {
    case '<':
      return 1;
    case '>':
      return -1;
    case '>>':
      return -2;
    case '>>>':
      return -3;
    default:
      return 0;
  }
}

/** Index just past a `<...>` type parameter list starting at `start`. */
function skipAngles(tokens: readonly Token[], start: number): number {
  let depth = 0;
  for (let i = start; i < tokens.length; i++) {
    depth += angleDelta(tokens[i]);
    if (depth <= 0) return i + 1;
  }
  return tokens.length;
}

/** `<` written flush against a name, as in `Map<K, V>` but not `a < b`. */
function opensTypeArguments(tokens: readonly Token[], index: number): boolean {
  const token = tokens[index];
  const prev = tokens[index - 1];
  return (
    isOperator(token, '<') &&
    prev !== undefined &&
    prev.kind === 'identifier' &&
    prev.line === token.line &&
    prev.column + prev.text.length === token.column
  );
}

// =============================================================================
// IMPORT EXTRACTOR
// =============================================================================

const REQUIRE_PATTERN = /require\s*\(\s*['"]([^'"]+)['"]\s*\)/g;

interface BindingList {
  names: ImportBinding[];
  next: number;
}

/**
 * Import extractor for JavaScript and TypeScript.
 *
 * Reads every `import` keyword in the token stream, `require('m')` calls, and
 * then sweeps the raw text for `require` calls the token pass did not see.
 */
export class EcmaScriptImportExtractor {
  extractImports(tokens: readonly Token[], content: string): Import[] {
    const imports: Import[] = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (token.kind === 'keyword' && token.text === 'import') {
        const imp = this.readImport(tokens, i);
        if (imp) imports.push(imp);
      } else if (token.kind === 'identifier' && token.text === 'require') {
        const imp = this.readRequire(tokens, i);
        if (imp) imports.push(imp);
      }
    }

    for (const imp of this.scanRequireText(content)) {
      const seen = imports.some(
        existing => existing.kind === imp.kind && existing.source === imp.source,
      );
      if (!seen) imports.push(imp);
    }

    return imports;
  }

  private readImport(tokens: readonly Token[], at: number): Import | null {
    const keyword = tokens[at];
    const position = { line: keyword.line, column: keyword.column };
    let j = at + 1;
    const first = tokens[j];

    if (!first) return null;

    if (isPunctuation(first, '(')) {
      const arg = tokens[j + 1];
      const literal = arg?.kind === 'string' || (arg?.kind === 'template' && arg.interpolations.length === 0);
      if (!arg || !literal) return null;
      return createImport({ kind: 'dynamic', source: unquote(arg.text), ...position });
    }

    // import.meta
    if (isPunctuation(first, '.')) return null;

    if (isKeyword(first, 'type')) {
      const after = tokens[j + 1];
      // `import type from 'm'` binds a default named `type`
      const bindsType = isKeyword(after, 'from') && tokens[j + 2]?.kind === 'string';
      if (!bindsType && (after?.kind === 'identifier' || isPunctuation(after, '{') || isOperator(after, '*'))) {
        j++;
      }
    }

    const head = tokens[j];
    if (!head) return null;

    if (head.kind === 'string') {
      return createImport({ kind: 'side-effect', source: unquote(head.text), ...position });
    }

    let kind: 'namespace' | 'named' | 'default';
    const names: ImportBinding[] = [];

    if (isOperator(head, '*')) {
      const ns = this.readNamespace(tokens, j);
      if (!ns) return null;
      kind = 'namespace';
      names.push(...ns.names);
      j = ns.next;
    } else if (isPunctuation(head, '{')) {
      const list = this.readNamedList(tokens, j);
      kind = 'named';
      names.push(...list.names);
      j = list.next;
    } else if (head.kind === 'identifier') {
      // `import x = require('y')` is picked up as a require call
      if (isOperator(tokens[j + 1], '=')) return null;

      kind = 'default';
      names.push({ name: head.text, alias: null });
      j++;

      if (isPunctuation(tokens[j], ',')) {
        const rest = tokens[j + 1];
        const extra = isPunctuation(rest, '{')
          ? this.readNamedList(tokens, j + 1)
          : isOperator(rest, '*')
            ? this.readNamespace(tokens, j + 1)
            : null;
        if (extra) {
          kind = 'named';
          names.push(...extra.names);
          j = extra.next;
        }
      }
    } else {
      return null;
    }

    const source = this.findFromSource(tokens, j);
    if (source === null) return null;

    return createImport({ kind, source, names, ...position });
  }

  /** `* as ns` */
  private readNamespace(tokens: readonly Token[], star: number): BindingList | null {
    const alias = tokens[star + 2];
    if (!isKeyword(tokens[star + 1], 'as') || alias?.kind !== 'identifier') return null;
    return { names: [{ name: '*', alias: alias.text }], next: star + 3 };
  }

  /** `{ a, b as c, type D }` */
  private readNamedList(tokens: readonly Token[], open: number): BindingList {
    const names: ImportBinding[] = [];
    let j = open + 1;

    while (j < tokens.length) {
      const token = tokens[j];
      if (isPunctuation(token, '}')) return { names, next: j + 1 };
      // unclosed list: stop at `from 'm'`, but `{ of, from }` names `from`
      if (isPunctuation(token, ';') || isKeyword(token, 'import')) break;
      if (isKeyword(token, 'from') && tokens[j + 1]?.kind === 'string') break;
      if (isPunctuation(token, ',')) {
        j++;
        continue;
      }

      let nameToken = token;
      const next = tokens[j + 1];
      if (isKeyword(token, 'type') && next && !isPunctuation(next, ',') && !isPunctuation(next, '}') && !isKeyword(next, 'as')) {
        j++;
        nameToken = next;
      }

      if (nameToken.kind !== 'identifier' && nameToken.kind !== 'keyword' && nameToken.kind !== 'string') {
        j++;
        continue;
      }

      const aliasToken = tokens[j + 2];
      if (isKeyword(tokens[j + 1], 'as') && aliasToken && (aliasToken.kind === 'identifier' || aliasToken.kind === 'keyword')) {
        names.push({ name: unquote(nameToken.text), alias: aliasToken.text });
        j += 3;
      } else {
        names.push({ name: unquote(nameToken.text), alias: null });
        j++;
      }
    }

    return { names, next: j };
  }

  /** The string after the next `from`, unless the statement ends first. */
  private findFromSource(tokens: readonly Token[], start: number): string | null {
    for (let j = start; j < tokens.length; j++) {
      const token = tokens[j];
      if (isPunctuation(token, ';') || isKeyword(token, 'import')) return null;
      if (isKeyword(token, 'from')) {
        const source = tokens[j + 1];
        return source?.kind === 'string' ? unquote(source.text) : null;
      }
    }
    return null;
  }

  private readRequire(tokens: readonly Token[], at: number): Import | null {
    const arg = tokens[at + 2];
    if (!isPunctuation(tokens[at + 1], '(') || arg?.kind !== 'string') return null;
    const call = tokens[at];
    return createImport({
      kind: 'commonjs-require',
      source: unquote(arg.text),
      line: call.line,
      column: call.column,
    });
  }

  private scanRequireText(content: string): Import[] {
    const found: Import[] = [];
    const positionOf = createLineLocator(content);
    for (const match of content.matchAll(REQUIRE_PATTERN)) {
      found.push(
        createImport({ kind: 'commonjs-require', source: match[1], ...positionOf(match.index ?? 0) }),
      );
    }
    return found;
  }
}

// =============================================================================
// DECLARATION EXTRACTOR
// =============================================================================

/** Keywords that may sit between `export` and the declaring keyword. */
const DECLARATION_MODIFIERS = new Set(['export', 'default', 'declare', 'async', 'abstract', 'const']);

/** Keywords after which a `function`/`class` keyword starts an expression. */
const EXPRESSION_KEYWORDS = new Set([
  'return', 'yield', 'await', 'new', 'typeof', 'void', 'delete', 'throw',
  'in', 'instanceof', 'case', 'extends',
]);

/** Constructor parameter properties: `constructor(private readonly db: Db)`. */
const PARAMETER_MODIFIERS = new Set(['public', 'private', 'protected', 'readonly']);

const CONTINUING_PUNCTUATION = new Set(['(', '[', ',', ':', '.', '?.', '...']);

function isNameToken(token: Token | undefined): token is Token {
  return token?.kind === 'identifier' && !BUILTIN_NAMES.has(token.text);
}

/**
 * Top-level declaration extractor for JavaScript and TypeScript.
 *
 * Only tokens outside every bracket pair are considered, so members,
 * locals and parameters never surface as declarations.
 */
export class EcmaScriptDeclarationExtractor {
  extractDeclarations(tokens: readonly Token[]): Map<string, Declaration> {
    const declarations = new Map<string, Declaration>();
    let depth = 0;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      if (depth === 0 && isWord(token)) {
        for (const declaration of this.readDeclaration(tokens, i)) {
          declarations.set(declaration.name, declaration);
        }
      }

      if (token.kind === 'punctuation') {
        if (OPENERS.has(token.text)) depth++;
        else if (CLOSERS.has(token.text)) depth = Math.max(0, depth - 1);
      }
    }

    return declarations;
  }

  private readDeclaration(tokens: readonly Token[], at: number): Declaration[] {
    const keyword = tokens[at];
    const next = tokens[at + 1];
    const exported = this.isExported(tokens, at);

    switch (keyword.text) {
      case 'const':
      case 'let':
      case 'var':
        if (isKeyword(next, 'enum')) return [];
        return this.readVariables(tokens, at, exported);

      case 'function':
        return this.startsStatement(tokens, at) ? this.readFunction(tokens, at, exported) : [];

      case 'class': {
        if (!this.startsStatement(tokens, at) || !isNameToken(next)) return [];
        const descriptor = isKeyword(tokens[at - 1], 'abstract') ? 'abstract class' : 'class';
        return [this.binding('class', next, descriptor, exported)];
      }

      case 'interface':
        return isNameToken(next) ? [this.binding('interface', next, 'interface', exported)] : [];

      case 'type': {
        if (!isNameToken(next) || !this.startsStatement(tokens, at)) return [];
        let j = at + 2;
        if (isOperator(tokens[j], '<')) j = skipAngles(tokens, j);
        return isOperator(tokens[j], '=') ? [this.binding('type-alias', next, 'type', exported)] : [];
      }

      case 'enum': {
        if (!isNameToken(next)) return [];
        const descriptor = isKeyword(tokens[at - 1], 'const') ? 'const enum' : 'enum';
        return [this.binding('enum', next, descriptor, exported)];
      }

      default:
        return [];
    }
  }

  private binding(
    kind: Exclude<Declaration['kind'], 'function'>,
    name: Token,
    descriptor: string,
    exported: boolean,
  ): Declaration {
    return { kind, name: name.text, line: name.line, column: name.column, descriptor, exported };
  }

  /** Index of the first modifier keyword in front of `at`. */
  private modifierStart(tokens: readonly Token[], at: number): number {
    let k = at;
    while (k > 0) {
      const prev = tokens[k - 1];
      if (!isWord(prev) || !DECLARATION_MODIFIERS.has(prev.text)) break;
      k--;
    }
    return k;
  }

  private isExported(tokens: readonly Token[], at: number): boolean {
    for (let k = this.modifierStart(tokens, at); k < at; k++) {
      if (tokens[k].text === 'export') return true;
    }
    return false;
  }

  /**
   * Whether `function`/`class` at `at` begins a statement rather than an
   * expression such as `const f = function g() {}`.
   */
  private startsStatement(tokens: readonly Token[], at: number): boolean {
    const start = this.modifierStart(tokens, at);
    const prev = tokens[start - 1];
    if (!prev) return true;
    if (isPunctuation(prev, ';') || isPunctuation(prev, '}') || isPunctuation(prev, '{')) return true;
    if (prev.line === tokens[start].line) return false;
    if (prev.kind === 'operator') return false;
    if (prev.kind === 'punctuation' && CONTINUING_PUNCTUATION.has(prev.text)) return false;
    return !(prev.kind === 'keyword' && EXPRESSION_KEYWORDS.has(prev.text));
  }

  private readVariables(tokens: readonly Token[], at: number, exported: boolean): Declaration[] {
    const descriptor = tokens[at].text;
    const found: Declaration[] = [];
    let j = at + 1;

    while (j < tokens.length) {
      const target = tokens[j];
      let names: Token[];

      if (isPunctuation(target, '{') || isPunctuation(target, '[')) {
        const pattern = this.readPattern(tokens, j);
        names = pattern.names;
        j = pattern.next;
      } else if (target.kind === 'identifier') {
        names = [target];
        j++;
      } else {
        break;
      }

      for (const name of names) {
        if (isNameToken(name)) found.push(this.binding('variable', name, descriptor, exported));
      }

      // definite assignment `let a!: T`
      if (isOperator(tokens[j], '!')) j++;
      if (isPunctuation(tokens[j], ':')) j = this.skipTypeAnnotation(tokens, j + 1);
      if (isOperator(tokens[j], '=')) j = this.skipInitializer(tokens, j + 1);

      if (!isPunctuation(tokens[j], ',')) break;
      j++;
    }

    return found;
  }

  /**
   * Names bound by an object or array destructuring pattern, nested
   * patterns included.
   */
  private readPattern(tokens: readonly Token[], open: number): { names: Token[]; next: number } {
    const isObject = tokens[open].text === '{';
    const closer = isObject ? '}' : ']';
    const names: Token[] = [];
    let j = open + 1;

    const readTarget = () => {
      const target = tokens[j];
      if (isPunctuation(target, '{') || isPunctuation(target, '[')) {
        const nested = this.readPattern(tokens, j);
        names.push(...nested.names);
        j = nested.next;
      } else if (target?.kind === 'identifier') {
        names.push(target);
        j++;
      }
    };

    while (j < tokens.length && !isPunctuation(tokens[j], closer)) {
      const token = tokens[j];

      if (isPunctuation(token, ',')) {
        j++;
        continue;
      }

      if (isPunctuation(token, '...')) {
        j++;
        readTarget();
      } else if (isObject) {
        j = isPunctuation(token, '[') ? skipBalanced(tokens, j) : j + 1;
        if (isPunctuation(tokens[j], ':')) {
          j++;
          readTarget();
        } else if (token.kind === 'identifier') {
          names.push(token);
        }
      } else {
        const before = j;
        readTarget();
        if (j === before) j++;
      }

      if (isOperator(tokens[j], '=')) {
        j = this.skipUntil(tokens, j + 1, [',', closer]);
      }
    }

    return { names, next: j + 1 };
  }

  /** Advance to the first depth-0 punctuation in `stops`. */
  private skipUntil(tokens: readonly Token[], start: number, stops: readonly string[]): number {
    let depth = 0;
    for (let j = start; j < tokens.length; j++) {
      const token = tokens[j];
      if (token.kind !== 'punctuation') continue;
      if (depth === 0 && stops.includes(token.text)) return j;
      if (OPENERS.has(token.text)) depth++;
      else if (CLOSERS.has(token.text)) depth--;
      if (depth < 0) return j;
    }
    return tokens.length;
  }

  /** Skip `: Type` up to the `=`, `,` or `;` that follows it. */
  private skipTypeAnnotation(tokens: readonly Token[], start: number): number {
    let depth = 0;
    let angles = 0;
    for (let j = start; j < tokens.length; j++) {
      const token = tokens[j];
      if (token.kind === 'punctuation') {
        if (OPENERS.has(token.text)) depth++;
        else if (CLOSERS.has(token.text)) depth--;
        if (depth < 0) return j;
      }
      angles = Math.max(0, angles + angleDelta(token));
      if (depth > 0 || angles > 0) continue;
      if (isOperator(token, '=') || isPunctuation(token, ',') || isPunctuation(token, ';')) return j;
    }
    return tokens.length;
  }

  /**
   * Skip an initializer expression. Stops at a depth-0 `,` (another
   * declarator follows), `;`, or a line break that ends the statement.
   */
  private skipInitializer(tokens: readonly Token[], start: number): number {
    let depth = 0;
    let angles = 0;
    for (let j = start; j < tokens.length; j++) {
      const token = tokens[j];
      const prev = tokens[j - 1];

      if (depth === 0 && angles === 0 && j > start && token.line > prev.line && this.endsStatementAt(prev, token)) {
        return j;
      }

      if (token.kind === 'punctuation') {
        if (OPENERS.has(token.text)) depth++;
        else if (CLOSERS.has(token.text)) depth--;
        if (depth < 0) return j;
        if (depth === 0 && angles === 0 && (token.text === ',' || token.text === ';')) return j;
      }

      if (opensTypeArguments(tokens, j)) angles++;
      else if (angles > 0) angles = Math.max(0, angles + Math.min(0, angleDelta(token)));
    }
    return tokens.length;
  }

  private endsStatementAt(prev: Token, token: Token): boolean {
    if (prev.kind === 'operator' || token.kind === 'operator') return false;
    if (prev.kind === 'punctuation' && CONTINUING_PUNCTUATION.has(prev.text)) return false;
    if (token.kind === 'punctuation' && (token.text === '.' || token.text === '?.')) return false;
    return true;
  }

  private readFunction(tokens: readonly Token[], at: number, exported: boolean): Declaration[] {
    let j = at + 1;
    const generator = isOperator(tokens[j], '*');
    if (generator) j++;

    const name = tokens[j];
    if (!isNameToken(name)) return [];

    const isAsync = isKeyword(tokens[at - 1], 'async');
    const head = `${isAsync ? 'async ' : ''}function${generator ? '*' : ''}`;

    return [
      {
        kind: 'function',
        name: name.text,
        line: name.line,
        column: name.column,
        descriptor: head,
        exported,
        signature: `${head} ${name.text}${this.buildSignatureTail(tokens, j + 1)}`,
      },
    ];
  }

  /**
   * `(a: string, b?, ...rest): T` rebuilt from the parameter list. Only
   * single-name annotations are kept; anything more complex is omitted.
   */
  private buildSignatureTail(tokens: readonly Token[], start: number): string {
    let j = start;
    if (isOperator(tokens[j], '<')) j = skipAngles(tokens, j);
    if (!isPunctuation(tokens[j], '(')) return '';

    const close = skipBalanced(tokens, j) - 1;
    const params: string[] = [];
    let segment: Token[] = [];
    let depth = 0;
    let angles = 0;

    for (let k = j + 1; k < close; k++) {
      const token = tokens[k];
      if (token.kind === 'punctuation') {
        if (OPENERS.has(token.text)) depth++;
        else if (CLOSERS.has(token.text)) depth--;
      }
      angles = Math.max(0, angles + angleDelta(token));
      if (depth === 0 && angles === 0 && isPunctuation(token, ',')) {
        params.push(this.renderParameter(segment));
        segment = [];
      } else {
        segment.push(token);
      }
    }
    if (segment.length > 0) params.push(this.renderParameter(segment));

    let tail = `(${params.filter(p => p !== '').join(', ')})`;
    const returnType = this.simpleAnnotation(tokens, close + 1, ['{', ';']);
    if (returnType) tail += `: ${returnType}`;
    return tail;
  }

  private renderParameter(segment: readonly Token[]): string {
    let k = 0;
    while (
      isWord(segment[k]) &&
      PARAMETER_MODIFIERS.has(segment[k].text) &&
      (isWord(segment[k + 1]) || isPunctuation(segment[k + 1], '{') || isPunctuation(segment[k + 1], '['))
    ) {
      k++;
    }

    const rest = isPunctuation(segment[k], '...');
    if (rest) k++;

    const head = segment[k];
    if (!head) return '';
    if (isPunctuation(head, '{')) return `${rest ? '...' : ''}{}`;
    if (isPunctuation(head, '[')) return `${rest ? '...' : ''}[]`;
    if (head.kind !== 'identifier' && head.kind !== 'keyword') return '';

    let text = `${rest ? '...' : ''}${head.text}`;
    k++;
    if (isOperator(segment[k], '?')) {
      text += '?';
      k++;
    }

    const annotation = this.simpleAnnotation(segment, k, []);
    return annotation ? `${text}: ${annotation}` : text;
  }

  /**
   * The type after a `:` at `at` when it is a single name followed by the
   * end of input, `=`, or one of `terminators`; null otherwise.
   */
  private simpleAnnotation(tokens: readonly Token[], at: number, terminators: readonly string[]): string | null {
    const type = tokens[at + 1];
    if (!isPunctuation(tokens[at], ':') || !type) return null;
    if (type.kind !== 'identifier' && type.kind !== 'keyword') return null;

    const after = tokens[at + 2];
    if (!after || isOperator(after, '=')) return type.text;
    if (after.kind === 'punctuation' && terminators.includes(after.text)) return type.text;
    return null;
  }
}

// =============================================================================
// REFERENCE COLLECTOR
// =============================================================================

const DECLARING_KEYWORDS = new Set([
  'const', 'let', 'var', 'function', 'class', 'interface', 'type', 'enum', 'as', 'from',
]);

/**
 * A contextual word followed on its line by a name, a string, `{` or `*`
 * is a modifier (`type X`, `from 'm'`, `async function`, `declare module`),
 * not a reference. `get(obj)` or `type = 1` stay references.
 */
function actsAsKeyword(token: Token, next: Token | undefined): boolean {
  if (!CONTEXTUAL_KEYWORDS.has(token.text) || !next || next.line !== token.line) return false;
  return isWord(next) || next.kind === 'string' || isPunctuation(next, '{') || isOperator(next, '*');
}

/**
 * Identifier tokens in use position. Names inside an `import ... from '...'`
 * clause, right after a declaring keyword, or after `.`/`?.` are skipped;
 * template interpolations follow the same rules.
 */
export function collectReferences(tokens: readonly Token[]): IdentifierReference[] {
  const references: IdentifierReference[] = [];
  let inImport = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.kind === 'keyword' && token.text === 'import') {
      const next = tokens[i + 1];
      if (!isPunctuation(next, '(') && !isPunctuation(next, '.')) inImport = true;
      continue;
    }

    if (inImport) {
      if (token.kind === 'string' || isPunctuation(token, ';')) inImport = false;
      continue;
    }

    if (token.kind === 'template') {
      references.push(...collectReferences(token.interpolations));
      continue;
    }

    if (token.kind !== 'identifier' || BUILTIN_NAMES.has(token.text)) continue;

    const prev = tokens[i - 1];
    if (isWord(prev) && DECLARING_KEYWORDS.has(prev.text)) continue;
    if (actsAsKeyword(token, tokens[i + 1])) continue;
    if (isPunctuation(prev, '.') || isPunctuation(prev, '?.')) continue;

    references.push({ line: token.line, column: token.column, name: token.text });
  }

  return references;
}

// =============================================================================
// PARSER
// =============================================================================

const EXTENSION_VARIANTS: Readonly<Record<string, EcmaScriptVariant>> = {
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
};

const TYPESCRIPT_MARKERS = ['interface ', ': string', ': number', 'enum ', 'declare '];
const GENERIC_PATTERN = /\b[A-Za-z_$][\w$]*<[A-Za-z_$][\w$.]*(?:\[\])?(?:\s*,\s*[A-Za-z_$][\w$.]*(?:\[\])?)*>/;

/**
 * Which variant to tag a result with: the extension decides when it is
 * known, otherwise any TypeScript marker in the text makes it typescript.
 */
export function detectVariant(content: string, filename?: string): EcmaScriptVariant {
  if (filename) {
    const variant = EXTENSION_VARIANTS[extname(filename).toLowerCase()];
    if (variant) return variant;
  }
  const typed = TYPESCRIPT_MARKERS.some(marker => content.includes(marker)) || GENERIC_PATTERN.test(content);
  return typed ? 'typescript' : 'javascript';
}

/**
 * Hand-written parser for JavaScript and its typed variant.
 */
export class EcmaScriptParser implements LanguageParser {
  private readonly importExtractor = new EcmaScriptImportExtractor();
  private readonly declarationExtractor = new EcmaScriptDeclarationExtractor();

  parse(content: string, filename?: string): ParseResult {
    return this.parseTokens(tokenize(content), content, filename);
  }

  parseTokens(tokens: readonly Token[], content: string, filename?: string): ParseResult {
    return createParseResult({
      language: detectVariant(content, filename),
      imports: this.importExtractor.extractImports(tokens, content),
      declarations: this.declarationExtractor.extractDeclarations(tokens),
      identifiers: collectReferences(tokens),
      raw: content,
    });
  }
}
