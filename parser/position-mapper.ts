import type { PositionMapper } from './parser-interfaces.js';

/**
 * Compute line starts for position mapping.
 * Only '\n' starts a new line; a '\r' stays part of the line it ends.
 */
export function computeLineStarts(text: string): number[] {
  const lineStarts = [0];

  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 0x0A) {
      lineStarts.push(i + 1);
    }
  }

  return lineStarts;
}

export function createPositionMapper(text: string): PositionMapper {
  const lineStarts = computeLineStarts(text);

  // index of the last line start <= offset
  function findLineIndex(offset: number): number {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return low;
  }

  function offsetToPosition(offset: number): { line: number; column: number } {
    const clamped = Math.max(0, Math.min(offset, text.length));
    const lineIndex = findLineIndex(clamped);
    return {
      line: lineIndex + 1,
      column: clamped - lineStarts[lineIndex] + 1
    };
  }

  function positionToOffset(line: number, column: number): number {
    if (line < 1 || line > lineStarts.length) {
      throw new RangeError(`Line ${line} is outside 1..${lineStarts.length}`);
    }
    const lineStart = lineStarts[line - 1];
    const lineEnd = line < lineStarts.length ? lineStarts[line] - 1 : text.length;
    return Math.min(lineStart + Math.max(column, 1) - 1, lineEnd);
  }

  return {
    offsetToPosition,
    positionToOffset,
    getLineStarts: () => lineStarts,
    getLineCount: () => lineStarts.length
  };
}
