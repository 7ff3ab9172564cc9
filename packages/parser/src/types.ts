/**
 * Unified symbol model shared by every language parser.
 *
 * Imports and declarations are tagged unions on `kind`; consumers switch on
 * `kind` so that adding a new variant is a compile error until handled.
 */

/** Languages with a registered parser. */
export type SupportedLanguage = 'python' | 'javascript' | 'typescript';

/** Tag on every ParseResult; `unknown` when no language could be detected. */
export type LanguageTag = SupportedLanguage | 'unknown';

// =============================================================================
// IMPORTS
// =============================================================================

export type ImportKind =
  | 'plain-import'
  | 'from-import'
  | 'namespace'
  | 'named'
  | 'default'
  | 'side-effect'
  | 'commonjs-require'
  | 'dynamic';

/** One bound name of an import clause; `alias` is null when not renamed. */
export interface ImportBinding {
  name: string;
  alias: string | null;
}

interface ImportBase {
  /** Module specifier as written */
  source: string;
  line: number;
  column: number;
  /** Derived from `source`, never supplied by callers */
  isRelative: boolean;
}

/** `import os`, `import os.path as p` */
export interface PlainImport extends ImportBase {
  kind: 'plain-import';
  names: readonly ImportBinding[];
}

/** `from pkg import a, b as c`, `from . import x` */
export interface FromImport extends ImportBase {
  kind: 'from-import';
  names: readonly ImportBinding[];
  /** Number of leading relative dots in `source` */
  level: number;
}

/** `import * as ns from 'm'` */
export interface NamespaceImport extends ImportBase {
  kind: 'namespace';
  names: readonly ImportBinding[];
}

/** `import { a, b as c } from 'm'`, `import d, { a } from 'm'` */
export interface NamedImport extends ImportBase {
  kind: 'named';
  names: readonly ImportBinding[];
}

/** `import d from 'm'` */
export interface DefaultImport extends ImportBase {
  kind: 'default';
  names: readonly ImportBinding[];
}

/** `import 'm'` */
export interface SideEffectImport extends ImportBase {
  kind: 'side-effect';
  names: readonly [];
}

/** `require('m')` */
export interface RequireImport extends ImportBase {
  kind: 'commonjs-require';
  names: readonly [];
}

/** `import('m')` */
export interface DynamicImport extends ImportBase {
  kind: 'dynamic';
  names: readonly [];
}

export type Import =
  | PlainImport
  | FromImport
  | NamespaceImport
  | NamedImport
  | DefaultImport
  | SideEffectImport
  | RequireImport
  | DynamicImport;

interface ImportInitBase {
  source: string;
  line: number;
  column?: number;
}

type BindingKind = 'plain-import' | 'namespace' | 'named' | 'default';
type BindinglessKind = 'side-effect' | 'commonjs-require' | 'dynamic';

/** Input accepted by {@link createImport}; note there is no `isRelative`. */
export type ImportInit =
  | (ImportInitBase & { kind: BindingKind; names: readonly ImportBinding[] })
  | (ImportInitBase & { kind: 'from-import'; names: readonly ImportBinding[] })
  | (ImportInitBase & { kind: BindinglessKind });

/**
 * Count leading relative dots (`..pkg` → 2, `./x` → 1, `os` → 0).
 */
export function relativeLevel(source: string): number {
  const match = /^\.+/.exec(source);
  return match ? match[0].length : 0;
}

/**
 * A specifier is relative when it starts with `./`, `../` or any run of
 * leading dots (`from . import x`, `from ..pkg import y`).
 */
export function isRelativeSpecifier(source: string): boolean {
  return relativeLevel(source) > 0;
}

/**
 * Build an Import, computing `isRelative` (and `level` for from-imports)
 * from the specifier.
 */
export function createImport(init: ImportInit): Import {
  const base: ImportBase = {
    source: init.source,
    line: init.line,
    column: init.column ?? 1,
    isRelative: isRelativeSpecifier(init.source),
  };

  switch (init.kind) {
    case 'from-import':
      return { ...base, kind: init.kind, names: init.names, level: relativeLevel(init.source) };
    case 'plain-import':
    case 'namespace':
    case 'named':
    case 'default':
      return { ...base, kind: init.kind, names: init.names };
    case 'side-effect':
    case 'commonjs-require':
    case 'dynamic': {
      const names: readonly [] = [];
      return { ...base, kind: init.kind, names };
    }
  }
}

// =============================================================================
// DECLARATIONS
// =============================================================================

export type DeclarationKind =
  | 'variable'
  | 'function'
  | 'class'
  | 'interface'
  | 'type-alias'
  | 'enum';

interface DeclarationBase {
  name: string;
  line: number;
  column: number;
  /** Free-text detail such as "const" or "async function" */
  descriptor: string;
  /** Part of the module's public surface */
  exported: boolean;
}

export interface FunctionDeclaration extends DeclarationBase {
  kind: 'function';
  /**
   * Best-effort reconstruction, e.g. `def f(a: int, *args) -> str`.
   * Empty when the parser could not see the parameter list.
   */
  signature: string;
}

export interface BindingDeclaration extends DeclarationBase {
  kind: Exclude<DeclarationKind, 'function'>;
}

export type Declaration = FunctionDeclaration | BindingDeclaration;

// =============================================================================
// PARSE RESULT
// =============================================================================

/** A free identifier in use position. */
export interface IdentifierReference {
  line: number;
  column: number;
  name: string;
}

export interface ParseResult {
  readonly language: LanguageTag;
  readonly imports: readonly Import[];
  /** Keyed by name; the latest top-level binding of a name wins */
  readonly declarations: ReadonlyMap<string, Declaration>;
  readonly identifiers: readonly IdentifierReference[];
  readonly syntaxValid: boolean;
  readonly errors: readonly string[];
  /** Original source text */
  readonly raw: string;
}

/** Fields a parser fills in; the rest have neutral defaults. */
export interface ParseResultInit {
  language: LanguageTag;
  raw: string;
  imports?: readonly Import[];
  declarations?: ReadonlyMap<string, Declaration>;
  identifiers?: readonly IdentifierReference[];
  syntaxValid?: boolean;
  errors?: readonly string[];
}

/**
 * Assemble a frozen ParseResult.
 */
export function createParseResult(init: ParseResultInit): ParseResult {
  return Object.freeze({
    language: init.language,
    imports: Object.freeze([...(init.imports ?? [])]),
    declarations: new Map<string, Declaration>(init.declarations ?? []),
    identifiers: Object.freeze([...(init.identifiers ?? [])]),
    syntaxValid: init.syntaxValid ?? true,
    errors: Object.freeze([...(init.errors ?? [])]),
    raw: init.raw,
  });
}
