import { describe, it, expect } from 'vitest';
import { createLineLocator } from './line-locator.js';

describe('createLineLocator', () => {
  it('should report 1-based lines and columns', () => {
    const locate = createLineLocator('ab\ncd\n\nef');

    expect(locate(0)).toEqual({ line: 1, column: 1 });
    expect(locate(1)).toEqual({ line: 1, column: 2 });
    expect(locate(3)).toEqual({ line: 2, column: 1 });
    expect(locate(7)).toEqual({ line: 4, column: 1 });
  });

  it('should keep a newline on the line it ends', () => {
    expect(createLineLocator('ab\ncd')(2)).toEqual({ line: 1, column: 3 });
  });

  it('should place many matches in a large file', () => {
    const content = Array.from({ length: 5000 }, (_, i) => `import mod${i}`).join('\n');
    const locate = createLineLocator(content);

    expect(locate(content.lastIndexOf('import'))).toEqual({ line: 5000, column: 1 });
  });
});
