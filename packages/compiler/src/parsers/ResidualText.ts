import type { SourceSpan } from "../ast/ResponseNodes.js";

export interface Projection {
  text: string;
  /** `offsets[i]` is the source offset of `text[i]`. */
  offsets: number[];
}

const isSpace = (ch: string): boolean => /\s/.test(ch);

/**
 * The part of a response that no structural node has claimed. Removals are
 * tracked per source offset, so spans found in the projected text map back
 * to the original response.
 */
export class ResidualText {
  readonly source: string;
  private readonly removed: Uint8Array;

  constructor(source: string) {
    this.source = source;
    this.removed = new Uint8Array(source.length);
  }

  remove(start: number, end: number): void {
    const from = Math.max(0, start);
    const to = Math.min(this.source.length, end);
    if (to > from) this.removed.fill(1, from, to);
  }

  isRemoved(offset: number): boolean {
    return this.removed[offset] === 1;
  }

  /** Removes projected range `[start, end)` from the source. */
  removeProjected(projection: Projection, start: number, end: number): void {
    for (let index = start; index < end && index < projection.offsets.length; index += 1) {
      this.removed[projection.offsets[index]] = 1;
    }
  }

  /**
   * Kept characters in order. A single space stands in for a removed gap
   * when the characters on both sides of it are not whitespace.
   */
  project(): Projection {
    const chars: string[] = [];
    const offsets: number[] = [];
    let gapStart = -1;
    for (let index = 0; index < this.source.length; index += 1) {
      if (this.removed[index] === 1) {
        if (gapStart < 0) gapStart = index;
        continue;
      }
      const ch = this.source[index];
      if (gapStart >= 0) {
        const previous = chars.length > 0 ? chars[chars.length - 1] : "";
        if (previous && !isSpace(previous) && !isSpace(ch)) {
          chars.push(" ");
          offsets.push(gapStart);
        }
        gapStart = -1;
      }
      chars.push(ch);
      offsets.push(index);
    }
    return { text: chars.join(""), offsets };
  }
}

/** Source span of projected range `[start, end)`. */
export const toSourceSpan = (projection: Projection, start: number, end: number): SourceSpan => {
  const count = projection.offsets.length;
  if (count === 0) return { start: 0, end: 0 };
  if (end <= start) {
    const at = projection.offsets[Math.min(start, count - 1)];
    return { start: at, end: at };
  }
  const last = Math.min(end, count) - 1;
  return { start: projection.offsets[start], end: projection.offsets[last] + 1 };
};
