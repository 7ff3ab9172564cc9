import { describe, it, expect, vi } from 'vitest';
import { InvalidInputError } from '@sourcelens/core';
import { detectLanguage, parseFile } from './detector.js';

describe('detectLanguage', () => {
  it('should let a known extension decide', () => {
    expect(detectLanguage('x = 1', 'a.py')).toBe('python');
    expect(detectLanguage('def f(): pass', 'a.ts')).toBe('typescript');
    expect(detectLanguage('', 'a.mjs')).toBe('javascript');
  });

  it('should score content when there is no filename', () => {
    expect(detectLanguage('def main():\n    pass')).toBe('python');
    expect(detectLanguage("const a = require('x');")).toBe('javascript');
    expect(detectLanguage('interface A { b: string }')).toBe('typescript');
  });

  it('should score content when the extension is unknown', () => {
    expect(detectLanguage('def main():\n    pass', 'notes.txt')).toBe('python');
  });

  it('should break ties in favour of python, then javascript', () => {
    // python: import/from (2); javascript: const (2); typescript: 2
    expect(detectLanguage("import x from 'y'\nconst a = 1")).toBe('python');
  });

  it('should return unknown when nothing matches', () => {
    expect(detectLanguage('hello world')).toBe('unknown');
    expect(detectLanguage('')).toBe('unknown');
  });

  it('should reject non-string content', () => {
    expect(() => Reflect.apply(detectLanguage, undefined, [42])).toThrow(InvalidInputError);
  });
});

describe('parseFile', () => {
  it('should return an empty unknown result for unrecognised content', () => {
    const result = parseFile('hello world');

    expect(result.language).toBe('unknown');
    expect(result.imports).toEqual([]);
    expect(result.declarations.size).toBe(0);
    expect(result.identifiers).toEqual([]);
    expect(result.syntaxValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.raw).toBe('hello world');
  });

  it('should be idempotent', () => {
    const code = "import { a } from './a';\nexport const b = a + 1;";

    expect(parseFile(code, 'b.ts')).toEqual(parseFile(code, 'b.ts'));
  });

  it('should cover every import kind', () => {
    const { imports } = parseFile(
      [
        "import * as ns from 'm';",
        "import {a, b as c} from 'm';",
        "import d, {a2} from 'm';",
        "import 'm';",
        "const r = require('m');",
      ].join('\n'),
      'kinds.js',
    );

    expect(imports.map(i => i.kind)).toEqual([
      'namespace',
      'named',
      'named',
      'side-effect',
      'commonjs-require',
    ]);
    expect(imports[0].names).toHaveLength(1);
    expect(imports[1].names).toEqual([
      { name: 'a', alias: null },
      { name: 'b', alias: 'c' },
    ]);
    expect(imports[2].names).toEqual([
      { name: 'd', alias: null },
      { name: 'a2', alias: null },
    ]);
    expect(imports[3].names).toEqual([]);
  });

  it('should route python sources and keep fallback results', () => {
    const result = parseFile('import os\n\ndef broken(:\n    pass\n', 'broken.py');

    expect(result.language).toBe('python');
    expect(result.syntaxValid).toBe(false);
    expect(result.errors.length).toBeGreaterThan(0);
    expect(result.imports.map(i => i.source)).toEqual(['os']);
    expect([...result.declarations.keys()]).toEqual(['broken']);
  });

  it('should log the chosen language at debug level', () => {
    const logger = { info: vi.fn(), warning: vi.fn(), error: vi.fn(), debug: vi.fn() };

    parseFile('x = 1\n', 'a.py', { logger });

    expect(logger.debug).toHaveBeenCalledWith('a.py: parsing as python');
    expect(logger.warning).not.toHaveBeenCalled();
  });

  it('should reject non-string content', () => {
    expect(() => Reflect.apply(parseFile, undefined, [undefined, 'a.py'])).toThrow(
      'Source content must be a string',
    );
  });
});
