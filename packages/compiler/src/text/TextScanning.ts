const CLOSERS: Record<string, string> = { "{": "}", "[": "]" };

export type BalancedScan =
  | { status: "closed"; end: number }
  | { status: "open" }
  | { status: "mismatch"; at: number };

/**
 * Scans the JSON-like object or array opening at `start`, ignoring brackets
 * inside double-quoted strings. `open` means the text ended first.
 */
export const scanBalanced = (text: string, start: number): BalancedScan => {
  const first = text[start];
  if (first !== "{" && first !== "[") return { status: "mismatch", at: start };
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (let index = start; index < text.length; index += 1) {
    const ch = text[index];
    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }
    if (ch === "\"") {
      inString = true;
      continue;
    }
    const closer = CLOSERS[ch];
    if (closer) {
      stack.push(closer);
      continue;
    }
    if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) return { status: "mismatch", at: index };
      if (stack.length === 0) return { status: "closed", end: index + 1 };
    }
  }
  return { status: "open" };
};

/**
 * One pass from `start` that records, for every bracket opened outside a
 * string, what `scanBalanced` reports for it. Brackets still open at the end
 * of the text are `open`.
 */
export const scanAllBalanced = (text: string, start: number): Map<number, BalancedScan> => {
  const results = new Map<number, BalancedScan>();
  const stack: Array<{ offset: number; closer: string }> = [];
  let inString = false;
  let escape = false;
  for (let index = start; index < text.length; index += 1) {
    const ch = text[index];
    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }
    if (ch === "\"") {
      inString = true;
      continue;
    }
    const closer = CLOSERS[ch];
    if (closer) {
      stack.push({ offset: index, closer });
      continue;
    }
    if (ch === "}" || ch === "]") {
      const top = stack.pop();
      if (!top) continue;
      results.set(
        top.offset,
        top.closer === ch ? { status: "closed", end: index + 1 } : { status: "mismatch", at: index },
      );
    }
  }
  for (const open of stack) results.set(open.offset, { status: "open" });
  return results;
};

/**
 * Offset of the first blank line in `[start, end)` that sits outside a
 * double-quoted string, or -1.
 */
export const findBlankLineOutsideStrings = (text: string, start: number, end = text.length): number => {
  let inString = false;
  let escape = false;
  for (let index = start; index < end; index += 1) {
    const ch = text[index];
    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === "\"") {
        inString = false;
      }
      // JSON strings never hold a raw newline.
      if (ch !== "\n") continue;
      inString = false;
      escape = false;
    }
    if (ch === "\"") {
      inString = true;
    } else if (ch === "\n" && /^\n[ \t]*\n/.test(text.slice(index, index + 64))) {
      return index;
    }
  }
  return -1;
};

export interface LineColumn {
  line: number;
  column: number;
}

/** Maps offsets to 1-based line and column numbers. */
export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(text: string) {
    for (let index = 0; index < text.length; index += 1) {
      if (text[index] === "\n") this.lineStarts.push(index + 1);
    }
  }

  locate(offset: number): LineColumn {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }
}

export interface Range {
  start: number;
  end: number;
}

export const overlaps = (left: Range, right: Range): boolean =>
  left.start < right.end && right.start < left.end;

export const overlapsAny = (range: Range, ranges: readonly Range[]): boolean =>
  ranges.some((entry) => overlaps(range, entry));
