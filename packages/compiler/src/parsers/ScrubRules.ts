import type { Projection, ResidualText } from "./ResidualText.js";

/** A named, deterministic removal applied to residual text. */
export interface ScrubRule {
  readonly name: string;
  readonly pattern: RegExp;
}

const rule = (name: string, pattern: RegExp): ScrubRule => ({ name, pattern });

export const controlCharacters = rule(
  "control_characters",
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u200B-\u200F\uFEFF]+/g,
);

/** Lines left holding nothing but JSON punctuation or a dangling key. */
export const orphanedJsonFragments = rule(
  "orphaned_json_fragments",
  /^[ \t]*(?:[{}[\],]+|"(?:contents|recursive|parameters|arguments)"[ \t]*:[ \t]*[[{]?)[ \t]*,?[ \t]*$/gm,
);

/** "Let me…" style narration a tag-dialect model emits before a call. */
export const toolPreamble = rule(
  "tool_preamble",
  /^[ \t]*(?:Let me|I'll|I will|I need to|Now I'll|I'm going to)\b[^.!?\n]*[.!?:]*[ \t]*/gim,
);

export const trailingWhitespace = rule("trailing_whitespace", /[ \t]+$/gm);

export const excessBlankLines = rule("excess_blank_lines", /(?<=\n\n)\n+/g);

export const repeatedSpaces = rule("repeated_spaces", /(?<=\S ) +/g);

export const GENERIC_SCRUB_RULES: readonly ScrubRule[] = [
  controlCharacters,
  trailingWhitespace,
  excessBlankLines,
  repeatedSpaces,
];

export const TAG_DIALECT_SCRUB_RULES: readonly ScrubRule[] = [
  controlCharacters,
  orphanedJsonFragments,
  toolPreamble,
  trailingWhitespace,
  excessBlankLines,
  repeatedSpaces,
];

/** Matches of one rule against a projection, as projected ranges. */
export const matchScrubRule = (scrub: ScrubRule, text: string): Array<[number, number]> => {
  const ranges: Array<[number, number]> = [];
  const pattern = new RegExp(scrub.pattern.source, scrub.pattern.flags);
  for (const match of text.matchAll(pattern)) {
    if (match[0].length === 0 || match.index === undefined) continue;
    ranges.push([match.index, match.index + match[0].length]);
  }
  return ranges;
};

/**
 * Applies rules in order, re-projecting between rules. Returns the number
 * of removals per rule name.
 */
export const applyScrubRules = (
  residual: ResidualText,
  rules: readonly ScrubRule[],
): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const scrub of rules) {
    const projection: Projection = residual.project();
    const ranges = matchScrubRule(scrub, projection.text);
    for (const [start, end] of ranges) {
      residual.removeProjected(projection, start, end);
    }
    if (ranges.length > 0) counts[scrub.name] = ranges.length;
  }
  return counts;
};
