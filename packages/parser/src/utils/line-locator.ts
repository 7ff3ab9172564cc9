export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Map string offsets to 1-based line/column positions.
 *
 * Line starts are collected in one pass; each lookup is a binary search, so
 * locating every regex match in a file stays linear-logarithmic.
 */
export function createLineLocator(content: string): (index: number) => SourcePosition {
  const lineStarts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content[i] === '\n') lineStarts.push(i + 1);
  }

  return (index: number) => {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (lineStarts[mid] <= index) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: index - lineStarts[low] + 1 };
  };
}
