/**
 * Include operators
 *
 * `\line`, `\skipline`, `\skip` and `\until` walk the text of the last
 * `\dontinclude` file. Each operator matches whole lines against a pattern
 * and moves the shared read offset forward.
 */

import { IncOperatorType } from './ast-types.js';

export interface IncludeBuffer {
  /** File text named by `\dontinclude` */
  readonly text: string;

  /** Start of the next unread line */
  offset: number;
}

export function createIncludeBuffer(text: string): IncludeBuffer {
  return { text, offset: 0 };
}

interface LineScan {
  lineStart: number;
  lineEnd: number;
}

/**
 * Advance past empty lines until the end of the next non-empty one.
 * Once a non-empty line was seen the flag stays set for later calls.
 */
function scanLine(text: string, from: number, state: { nonEmpty: boolean }): LineScan {
  let o = from;
  let lineStart = from;
  while (o < text.length) {
    const c = text.charAt(o);
    if (c === '\n') {
      if (state.nonEmpty) break;
      lineStart = o + 1;
    } else if (!/\s/.test(c)) {
      state.nonEmpty = true;
    }
    o++;
  }
  return { lineStart, lineEnd: o };
}

/**
 * Apply one operator to the buffer, returning the text it contributes
 */
export function applyIncludeOperator(buffer: IncludeBuffer, opType: IncOperatorType, pattern: string): string {
  const text = buffer.text;
  const length = text.length;
  const state = { nonEmpty: false };
  let o = buffer.offset;
  let result = '';

  switch (opType) {
    case IncOperatorType.Line: {
      const line = scanLine(text, o, state);
      o = line.lineEnd;
      const candidate = text.slice(line.lineStart, line.lineEnd);
      if (candidate.includes(pattern)) result = candidate;
      buffer.offset = Math.min(length, o + 1);
      break;
    }

    case IncOperatorType.SkipLine: {
      while (o < length) {
        const line = scanLine(text, o, state);
        o = line.lineEnd;
        const candidate = text.slice(line.lineStart, line.lineEnd);
        if (candidate.includes(pattern)) {
          result = candidate;
          break;
        }
        o++;
      }
      buffer.offset = Math.min(length, o + 1);
      break;
    }

    case IncOperatorType.Skip: {
      let lineStart = o;
      while (o < length) {
        const line = scanLine(text, o, state);
        lineStart = line.lineStart;
        o = line.lineEnd;
        if (text.slice(line.lineStart, line.lineEnd).includes(pattern)) break;
        o++;
      }
      buffer.offset = Math.min(length, lineStart);
      break;
    }

    case IncOperatorType.Until: {
      const blockStart = o;
      while (o < length) {
        const line = scanLine(text, o, state);
        o = line.lineEnd;
        if (text.slice(line.lineStart, line.lineEnd).includes(pattern)) {
          result = text.slice(blockStart, line.lineEnd);
          break;
        }
        o++;
      }
      buffer.offset = Math.min(length, o + 1);
      break;
    }
  }

  return result;
}
