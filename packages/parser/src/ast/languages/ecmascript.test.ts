import { describe, it, expect } from 'vitest';
import { EcmaScriptParser, detectVariant } from './ecmascript.js';
import type { Declaration } from '../../types.js';

describe('EcmaScript Language', () => {
  const parser = new EcmaScriptParser();

  describe('Import Extraction', () => {
    const source = [
      "import * as path from 'path';",
      "import { a, b as c } from './utils';",
      "import def from 'lib';",
      "import def2, { x } from 'lib2';",
      "import './side.css';",
      "const fs = require('fs');",
      "const mod = await import('./lazy.js');",
      "import type { T } from './types';",
    ].join('\n');

    it('should recognize every import form', () => {
      const { imports } = parser.parse(source);

      expect(imports.map(i => [i.kind, i.source])).toEqual([
        ['namespace', 'path'],
        ['named', './utils'],
        ['default', 'lib'],
        ['named', 'lib2'],
        ['side-effect', './side.css'],
        ['commonjs-require', 'fs'],
        ['dynamic', './lazy.js'],
        ['named', './types'],
      ]);
    });

    it('should record bindings with aliases', () => {
      const { imports } = parser.parse(source);

      expect(imports[0].names).toEqual([{ name: '*', alias: 'path' }]);
      expect(imports[1].names).toEqual([
        { name: 'a', alias: null },
        { name: 'b', alias: 'c' },
      ]);
      expect(imports[3].names).toEqual([
        { name: 'def2', alias: null },
        { name: 'x', alias: null },
      ]);
      expect(imports[4].names).toEqual([]);
    });

    it('should compute positions and relativity', () => {
      const { imports } = parser.parse(source);

      expect(imports[1]).toMatchObject({ line: 2, column: 1, isRelative: true });
      expect(imports[0].isRelative).toBe(false);
    });

    it('should accept keyword-spelled names in a named list', () => {
      const { imports } = parser.parse("import { get, default as main } from 'x';");

      expect(imports[0].names).toEqual([
        { name: 'get', alias: null },
        { name: 'default', alias: 'main' },
      ]);
    });

    it('should read contextual words as ordinary binding names', () => {
      const { imports } = parser.parse(
        [
          "import { of, from } from 'rxjs';",
          "import async from 'async';",
          "import type from './type-def';",
          "import type { Get } from './get';",
        ].join('\n'),
      );

      expect(imports.map(i => [i.kind, i.source])).toEqual([
        ['named', 'rxjs'],
        ['default', 'async'],
        ['default', './type-def'],
        ['named', './get'],
      ]);
      expect(imports[0].names).toEqual([
        { name: 'of', alias: null },
        { name: 'from', alias: null },
      ]);
      expect(imports[1].names).toEqual([{ name: 'async', alias: null }]);
      expect(imports[2].names).toEqual([{ name: 'type', alias: null }]);
      expect(imports[3].names).toEqual([{ name: 'Get', alias: null }]);
    });

    it('should add require calls only the text scan finds, without duplicates', () => {
      const { imports } = parser.parse("// require('hidden')\nconst a = require('x');");

      expect(imports).toEqual([
        { kind: 'commonjs-require', source: 'x', names: [], line: 2, column: 11, isRelative: false },
        { kind: 'commonjs-require', source: 'hidden', names: [], line: 1, column: 4, isRelative: false },
      ]);
    });

    it('should read import-equals as a require', () => {
      const { imports } = parser.parse("import x = require('y');");

      expect(imports.map(i => [i.kind, i.source])).toEqual([['commonjs-require', 'y']]);
    });

    it('should ignore import.meta', () => {
      expect(parser.parse('const u = import.meta.url;').imports).toEqual([]);
    });
  });

  describe('Declaration Extraction', () => {
    const source = [
      "export const API_URL = 'x';",
      'let { a, b: renamed, ...others } = obj, [first, , third] = list;',
      'export async function load(id: string, retries?: number): Promise<void> {',
      '  const inner = 1;',
      '}',
      'class Store {}',
      'export interface Props { name: string }',
      'type Pair<T> = [T, T];',
      'export const enum Color { Red }',
      'var counter = 0',
      'function* gen() {}',
    ].join('\n');

    it('should find top-level declarations only', () => {
      const { declarations } = parser.parse(source);

      expect([...declarations.keys()]).toEqual([
        'API_URL',
        'a',
        'renamed',
        'others',
        'first',
        'third',
        'load',
        'Store',
        'Props',
        'Pair',
        'Color',
        'counter',
        'gen',
      ]);
    });

    it('should tag kinds, descriptors and export status', () => {
      const { declarations } = parser.parse(source);
      const summary = (name: string) => {
        const decl = declarations.get(name);
        return decl && [decl.kind, decl.descriptor, decl.exported];
      };

      expect(summary('API_URL')).toEqual(['variable', 'const', true]);
      expect(summary('renamed')).toEqual(['variable', 'let', false]);
      expect(summary('load')).toEqual(['function', 'async function', true]);
      expect(summary('Store')).toEqual(['class', 'class', false]);
      expect(summary('Props')).toEqual(['interface', 'interface', true]);
      expect(summary('Pair')).toEqual(['type-alias', 'type', false]);
      expect(summary('Color')).toEqual(['enum', 'const enum', true]);
      expect(summary('counter')).toEqual(['variable', 'var', false]);
      expect(summary('gen')).toEqual(['function', 'function*', false]);
    });

    it('should position a declaration at its name', () => {
      const { declarations } = parser.parse(source);

      expect(declarations.get('API_URL')).toMatchObject({ line: 1, column: 14 });
    });

    it('should rebuild signatures from simple annotations', () => {
      const signature = (code: string, name: string) => {
        const decl: Declaration | undefined = parser.parse(code).declarations.get(name);
        return decl?.kind === 'function' ? decl.signature : undefined;
      };

      expect(signature(source, 'load')).toBe('async function load(id: string, retries?: number)');
      expect(signature(source, 'gen')).toBe('function* gen()');
      expect(signature('function f({ a }, b = 1, ...rest: string) {}', 'f')).toBe(
        'function f({}, b, ...rest: string)',
      );
      expect(signature('function g(): number {}', 'g')).toBe('function g(): number');
      expect(signature('declare function h(a: string): void;', 'h')).toBe(
        'function h(a: string): void',
      );
    });

    it('should not treat function or class expressions as declarations', () => {
      const { declarations } = parser.parse(
        'const handler = function named() {};\nexport default class {}',
      );

      expect([...declarations.keys()]).toEqual(['handler']);
    });

    it('should end an initializer at the line that starts the next statement', () => {
      const { declarations } = parser.parse(
        'const config = {\n  a: 1,\n  b: 2,\n}\nconst other = 3',
      );

      expect([...declarations.keys()]).toEqual(['config', 'other']);
    });

    it('should not split declarators on commas inside type arguments', () => {
      const { declarations } = parser.parse(
        'const cache = new Map<string, Entry>(), size = 0;',
      );

      expect([...declarations.keys()]).toEqual(['cache', 'size']);
    });

    it('should declare names spelled like contextual keywords', () => {
      const { declarations } = parser.parse('const type = 1;\nfunction get(key) {}\nexport type Alias = string;');

      expect([...declarations.keys()]).toEqual(['type', 'get', 'Alias']);
      expect(declarations.get('Alias')).toMatchObject({ kind: 'type-alias', exported: true });
    });

    it('should never declare a built-in name', () => {
      const { declarations } = parser.parse('let Promise = 1; let x = 2');

      expect([...declarations.keys()]).toEqual(['x']);
    });
  });

  describe('Reference Collection', () => {
    it('should collect identifiers in use position', () => {
      const { identifiers } = parser.parse(
        "import { used } from './m';\nconst value = used(1);\nconsole.log(value.length, obj?.prop);",
      );

      expect(identifiers).toEqual([
        { line: 2, column: 15, name: 'used' },
        { line: 3, column: 13, name: 'value' },
        { line: 3, column: 27, name: 'obj' },
      ]);
    });

    it('should look inside template interpolations', () => {
      const { identifiers } = parser.parse('const s = `hi ${name.first}`;');

      expect(identifiers.map(i => i.name)).toEqual(['name']);
    });

    it('should keep references after a dynamic import', () => {
      const { identifiers } = parser.parse("import('./x').then(run);");

      expect(identifiers.map(i => i.name)).toEqual(['run']);
    });

    it('should count calls to names spelled like contextual keywords', () => {
      const { identifiers } = parser.parse("import { get } from 'lodash';\nget(obj, 'a');");

      expect(identifiers).toEqual([
        { line: 2, column: 1, name: 'get' },
        { line: 2, column: 5, name: 'obj' },
      ]);
    });

    it('should not count contextual words used as modifiers', () => {
      const { identifiers } = parser.parse(
        'export type Id = Key;\nexport async function run() { return from(items); }',
      );

      expect(identifiers.map(i => i.name)).toEqual(['Key', 'from', 'items']);
    });

    it('should skip names right after as', () => {
      const { identifiers } = parser.parse('export { a as b };');

      expect(identifiers.map(i => i.name)).toEqual(['a']);
    });
  });

  describe('Language Tag', () => {
    it('should let a known extension decide', () => {
      expect(parser.parse('const a = 1', 'x.ts').language).toBe('typescript');
      expect(parser.parse('let x: string', 'x.mjs').language).toBe('javascript');
    });

    it('should fall back to type markers without a filename', () => {
      expect(parser.parse('interface A {}').language).toBe('typescript');
      expect(parser.parse('const a = 1').language).toBe('javascript');
      expect(detectVariant('const m = new Map<string, number>()')).toBe('typescript');
    });
  });

  describe('Parser', () => {
    it('should be idempotent', () => {
      const code = "import { a } from './a';\nexport function f(x) { return a(x); }";

      expect(parser.parse(code, 'f.js')).toEqual(parser.parse(code, 'f.js'));
    });

    it('should always report valid syntax and keep the raw text', () => {
      const result = parser.parse('}}} import { from ;;; function (');

      expect(result.syntaxValid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.raw).toBe('}}} import { from ;;; function (');
      expect(result.imports).toEqual([]);
    });
  });
});
