import { describe, it, expect, vi } from 'vitest';
import { PythonParser, scorePython } from './python.js';
import type { Declaration } from '../../types.js';

function createMockLogger() {
  return {
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe('Python Language', () => {
  const parser = new PythonParser();

  describe('Import Extraction', () => {
    const code = `import os
import os.path as osp, sys
from ..utils.validate import validate_email, validate_phone as phone
from . import sibling
from typing import *
def f():
    import json
`;

    it('should extract plain, from, relative and wildcard imports', () => {
      const { imports } = parser.parse(code);

      expect(imports.map(i => [i.kind, i.source])).toEqual([
        ['plain-import', 'os'],
        ['plain-import', 'os.path'],
        ['plain-import', 'sys'],
        ['from-import', '..utils.validate'],
        ['from-import', '.'],
        ['from-import', 'typing'],
        ['plain-import', 'json'],
      ]);
    });

    it('should record bindings and aliases', () => {
      const { imports } = parser.parse(code);

      expect(imports[1].names).toEqual([{ name: 'os.path', alias: 'osp' }]);
      expect(imports[3].names).toEqual([
        { name: 'validate_email', alias: null },
        { name: 'validate_phone', alias: 'phone' },
      ]);
      expect(imports[5].names).toEqual([{ name: '*', alias: null }]);
    });

    it('should derive relativity and level from the specifier', () => {
      const { imports } = parser.parse(code);

      expect(imports[3]).toMatchObject({ isRelative: true, level: 2 });
      expect(imports[4]).toMatchObject({ isRelative: true, level: 1 });
      expect(imports[5]).toMatchObject({ isRelative: false, level: 0 });
    });

    it('should position imports at their statement', () => {
      const { imports } = parser.parse(code);

      expect(imports[0]).toMatchObject({ line: 1, column: 1 });
      expect(imports[6].line).toBe(7);
    });
  });

  describe('Declaration Extraction', () => {
    const code = `import os

MAX = 10
MAX = 20
name: str = 'x'
a = b = 1

@decorator
def handler(request):
    local = 1

async def fetch(url: str, retries: int = 3, *args, timeout=None, **kwargs) -> dict:
    pass

class _Private(Base):
    attr = 1

if os.name == 'nt':
    WINDOWS = True
else:
    def fallback(): pass

try:
    import ujson as json
except ImportError:
    json = None
`;

    it('should find module-scope declarations, including inside module-level blocks', () => {
      const { declarations } = parser.parse(code);

      expect([...declarations.keys()]).toEqual([
        'MAX',
        'name',
        'a',
        'b',
        'handler',
        'fetch',
        '_Private',
        'WINDOWS',
        'fallback',
        'json',
      ]);
    });

    it('should keep the first assignment of a variable', () => {
      const { declarations } = parser.parse(code);

      expect(declarations.get('MAX')?.line).toBe(3);
    });

    it('should describe each declaration', () => {
      const { declarations } = parser.parse(code);
      const summary = (key: string) => {
        const decl = declarations.get(key);
        return decl && [decl.kind, decl.descriptor, decl.exported];
      };

      expect(summary('name')).toEqual(['variable', 'annotated variable', true]);
      expect(summary('handler')).toEqual(['function', 'function', true]);
      expect(summary('fetch')).toEqual(['function', 'async function', true]);
      expect(summary('_Private')).toEqual(['class', 'class', false]);
    });

    it('should rebuild signatures with simple annotations only', () => {
      const { declarations } = parser.parse(code);
      const signature = (key: string) => {
        const decl: Declaration | undefined = declarations.get(key);
        return decl?.kind === 'function' ? decl.signature : undefined;
      };

      expect(signature('fetch')).toBe(
        'async def fetch(url: str, retries: int, *args, timeout, **kwargs) -> dict',
      );
      expect(signature('handler')).toBe('def handler(request)');
    });
  });

  describe('Reference Collection', () => {
    it('should collect loads and skip binding positions', () => {
      const code = `import os
from x import helper as h

def run(path, flag=DEFAULT):
    result = h(path)
    os.environ.get('A')
    for item in items:
        print(item, key=value)
    return result
`;
      const { identifiers } = parser.parse(code);

      expect(identifiers.map(i => [i.line, i.name])).toEqual([
        [4, 'DEFAULT'],
        [5, 'h'],
        [5, 'path'],
        [6, 'os'],
        [7, 'items'],
        [8, 'print'],
        [8, 'item'],
        [8, 'value'],
        [9, 'result'],
      ]);
    });

    it('should count a use of an imported name', () => {
      const { identifiers } = parser.parse('import os\nos.getcwd()\n');

      expect(identifiers.map(i => i.name)).toEqual(['os']);
    });
  });

  describe('Fallback', () => {
    const broken = `import os
from .pkg import a as b

def broken(:
    pass

class Kept:
    pass
`;

    it('should flag invalid syntax with one diagnostic', () => {
      const result = parser.parse(broken);

      expect(result.syntaxValid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^Syntax error/);
      expect(result.language).toBe('python');
    });

    it('should still recover imports and declarations', () => {
      const result = parser.parse(broken);

      expect(result.imports.map(i => [i.kind, i.source])).toEqual([
        ['plain-import', 'os'],
        ['from-import', '.pkg'],
      ]);
      expect(result.imports[1].names).toEqual([{ name: 'a', alias: 'b' }]);
      expect([...result.declarations.keys()]).toEqual(['broken', 'Kept']);
      expect(result.identifiers.map(i => i.name)).toEqual(['broken', 'Kept']);
    });

    it('should warn through the given logger', () => {
      const logger = createMockLogger();

      parser.parse(broken, 'mod.py', { logger });

      expect(logger.warning).toHaveBeenCalledTimes(1);
      expect(logger.warning).toHaveBeenCalledWith(expect.stringContaining('mod.py: Syntax error'));
    });

    it('should not warn for valid source', () => {
      const logger = createMockLogger();

      const result = parser.parse('x = 1\n', 'ok.py', { logger });

      expect(result.syntaxValid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(logger.warning).not.toHaveBeenCalled();
    });

    it('should judge validity by the grammar, which still accepts print statements', () => {
      const result = parser.parse('print "x"\n', 'legacy.py');

      expect(result.syntaxValid).toBe(true);
      expect(result.errors).toEqual([]);
    });
  });

  describe('Parser', () => {
    it('should be idempotent', () => {
      const code = 'import os\n\ndef main():\n    return os.getcwd()\n';

      expect(parser.parse(code, 'main.py')).toEqual(parser.parse(code, 'main.py'));
    });
  });

  describe('Detection score', () => {
    it('should weight python markers', () => {
      expect(scorePython('def f(self):\n    self.x = 1  # note')).toBe(2 + 1 + 1);
      expect(scorePython('class A:\n    pass\nimport os')).toBe(2 + 2);
      expect(scorePython('plain text')).toBe(0);
    });
  });
});
