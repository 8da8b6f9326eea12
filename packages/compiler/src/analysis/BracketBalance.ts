const PAIRS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSING = new Set([")", "]", "}"]);

export interface BracketReport {
  balanced: boolean;
  /** Closers that had no opener, then openers left unclosed. */
  unmatched: string[];
}

/**
 * Checks (), [] and {} nesting outside string and character literals.
 * Single- and double-quoted literals end at a newline; backtick literals
 * may span lines.
 */
export const checkBracketBalance = (code: string): BracketReport => {
  const stack: string[] = [];
  const unmatched: string[] = [];
  let quote = "";
  let escape = false;
  for (const ch of code) {
    if (quote) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === quote || (ch === "\n" && quote !== "`")) {
        quote = "";
      }
      continue;
    }
    if (ch === "\"" || ch === "'" || ch === "`") {
      quote = ch;
      continue;
    }
    const closer = PAIRS[ch];
    if (closer) {
      stack.push(closer);
      continue;
    }
    if (CLOSING.has(ch)) {
      if (stack[stack.length - 1] === ch) {
        stack.pop();
      } else {
        unmatched.push(ch);
      }
    }
  }
  const open = stack.reverse().map((closer) => Object.keys(PAIRS).find((key) => PAIRS[key] === closer) ?? closer);
  unmatched.push(...open);
  return { balanced: unmatched.length === 0, unmatched };
};
