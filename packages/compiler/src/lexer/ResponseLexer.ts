import type { DiagnosticSeverity } from "../diagnostics/Diagnostic.js";
import { LineIndex, scanAllBalanced, scanBalanced, type BalancedScan } from "../text/TextScanning.js";
import {
  isWrapperTag,
  type LexResult,
  type LexicalError,
  type Token,
  type TokenKind,
  type TokenMetadata,
} from "./Token.js";

const FENCE_OPEN = /^[ \t]{0,3}(`{3,}|~{3,})[ \t]*([^`\n]*?)[ \t]*\r?$/;
const FENCE_CLOSE = /^[ \t]{0,3}(`{3,}|~{3,})[ \t]*\r?$/;
const HEADING = /^#{1,6}(?=[ \t])/;
const RULE = /^[ \t]{0,3}(?:(?:-[ \t]*){3,}|(?:\*[ \t]*){3,}|(?:_[ \t]*){3,})\r?$/;
const LIST_MARKER = /^([ \t]*)(?:[-*+]|\d{1,9}[.)])(?=[ \t])/;
const BLOCKQUOTE = /^[ \t]{0,3}>/;
const TAG = /^<(\/?)([A-Za-z_]+)>/;
const JSON_OBJECT_START = /^\{\s*"/;
const CONTROL_CHAR = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\uFFFD]/;
const TAG_LOOKAHEAD = 40;

export interface FenceInfo {
  language: string;
  fileName?: string;
}

/** Splits a fence info string such as `ts src/a.ts` or `python:main.py`. */
export const parseFenceInfo = (info: string): FenceInfo => {
  const trimmed = info.trim();
  if (!trimmed) return { language: "" };
  const [head, ...rest] = trimmed.split(/\s+/);
  const colon = head.indexOf(":");
  if (colon > 0) {
    const language = head.slice(0, colon).toLowerCase();
    const fileName = head.slice(colon + 1);
    return fileName ? { language, fileName } : { language };
  }
  const fileName = rest
    .map((part) => part.replace(/^(?:file(?:name)?)[:=]/i, ""))
    .find((part) => part.includes(".") || part.includes("/"));
  return fileName ? { language: head.toLowerCase(), fileName } : { language: head.toLowerCase() };
};

const describeChar = (ch: string): string =>
  `U+${ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, "0")}`;

class LexerRun {
  private readonly text: string;
  private readonly lines: LineIndex;
  private readonly tokens: Token[] = [];
  private readonly errors: LexicalError[] = [];
  private readonly openTags: Array<{ tag: string; offset: number }> = [];
  private textStart = -1;
  private inControlRun = false;
  private inUnclosedRun = false;
  private bracesAfterOpen?: Map<number, BalancedScan>;

  constructor(text: string) {
    this.text = text;
    this.lines = new LineIndex(text);
  }

  run(): LexResult {
    const text = this.text;
    let index = 0;
    let atLineStart = true;
    while (index < text.length) {
      if (atLineStart) {
        atLineStart = false;
        const next = this.scanLineStart(index);
        if (next !== index) {
          index = next;
          continue;
        }
      }
      const ch = text[index];
      const isControl = CONTROL_CHAR.test(ch);
      if (!isControl) this.inControlRun = false;

      if (ch === "\n") {
        this.flushText(index);
        this.push("newline", index, index + 1);
        index += 1;
        atLineStart = true;
        continue;
      }
      if (ch === "`") {
        const close = text.indexOf("`", index + 1);
        if (close > index + 1 && close < this.lineEnd(index)) {
          this.flushText(index);
          this.push("inline_code", index, close + 1);
          index = close + 1;
          continue;
        }
      }
      if (ch === "<") {
        const match = TAG.exec(text.slice(index, index + TAG_LOOKAHEAD));
        const tag = match ? match[2].toLowerCase() : "";
        if (match && isWrapperTag(tag)) {
          this.flushText(index);
          this.handleTag(match[1] === "/", tag, index, index + match[0].length);
          index += match[0].length;
          continue;
        }
      }
      if (ch === "{") {
        const next = this.scanJson(index);
        if (next !== index) {
          index = next;
          continue;
        }
      }
      if (isControl && !this.inControlRun) {
        this.inControlRun = true;
        const message =
          ch === "\uFFFD"
            ? "Replacement character U+FFFD in text; the response may have been decoded incorrectly"
            : `Control character ${describeChar(ch)} in text`;
        this.report("info", message, index);
      }
      if (this.textStart < 0) this.textStart = index;
      index += 1;
    }
    this.flushText(text.length);
    for (const open of this.openTags) {
      this.report("warning", `Unclosed <${open.tag}> tag`, open.offset);
    }
    this.push("eof", text.length, text.length);
    return { tokens: this.tokens, errors: this.errors };
  }

  private scanLineStart(index: number): number {
    const end = this.lineEnd(index);
    const line = this.text.slice(index, end);
    const fence = FENCE_OPEN.exec(line);
    if (fence) return this.scanFence(index, end, fence[1], fence[2]);
    if (RULE.test(line)) {
      this.push("markdown_rule", index, end);
      return end;
    }
    const heading = HEADING.exec(line);
    if (heading) {
      this.push("markdown_heading", index, index + heading[0].length, { level: heading[0].length });
      return index + heading[0].length;
    }
    const list = LIST_MARKER.exec(line);
    if (list) {
      const indent = list[1].replace(/\t/g, "  ").length;
      this.push("markdown_list_marker", index, index + list[0].length, {
        level: Math.floor(indent / 2) + 1,
      });
      return index + list[0].length;
    }
    const quote = BLOCKQUOTE.exec(line);
    if (quote) {
      this.push("markdown_blockquote", index, index + quote[0].length, { level: 1 });
      return index + quote[0].length;
    }
    return index;
  }

  private scanFence(openStart: number, openEnd: number, marker: string, info: string): number {
    const text = this.text;
    this.push("code_fence_open", openStart, openEnd, parseFenceInfo(info));
    const contentStart = Math.min(openEnd + 1, text.length);
    let lineStart = contentStart;
    while (lineStart < text.length) {
      const lineEnd = this.lineEnd(lineStart);
      const close = FENCE_CLOSE.exec(text.slice(lineStart, lineEnd));
      if (close && close[1][0] === marker[0] && close[1].length >= marker.length) {
        const contentEnd = Math.max(contentStart, lineStart - 1);
        if (contentEnd > contentStart) this.push("code_content", contentStart, contentEnd);
        this.push("code_fence_close", lineStart, lineEnd);
        return lineEnd;
      }
      lineStart = lineEnd + 1;
    }
    if (text.length > contentStart) this.push("code_content", contentStart, text.length);
    this.report("error", "Unterminated code fence; the block runs to the end of the response", openStart);
    return text.length;
  }

  /**
   * Scans brace by brace until one fails to close; from then on every later
   * brace is looked up in a single pass over the rest.
   */
  private braceScan(index: number): BalancedScan {
    if (this.bracesAfterOpen === undefined) {
      const scan = scanBalanced(this.text, index);
      if (scan.status !== "closed") this.bracesAfterOpen = scanAllBalanced(this.text, index);
      return scan;
    }
    return this.bracesAfterOpen.get(index) ?? { status: "mismatch", at: index };
  }

  private scanJson(index: number): number {
    const scan = this.braceScan(index);
    if (scan.status === "closed") {
      this.inUnclosedRun = false;
      this.flushText(index);
      this.push("json_span", index, scan.end, { complete: true });
      return scan.end;
    }
    if (!this.inUnclosedRun) {
      this.inUnclosedRun = true;
      this.report("warning", "Opening '{' is never closed", index);
    }
    if (scan.status === "open" && JSON_OBJECT_START.test(this.text.slice(index, index + TAG_LOOKAHEAD))) {
      this.flushText(index);
      this.push("json_span", index, this.text.length, { complete: false });
      return this.text.length;
    }
    return index;
  }

  private handleTag(closing: boolean, tag: string, start: number, end: number): void {
    if (!closing) {
      this.openTags.push({ tag, offset: start });
      this.push("tag_open", start, end, { tag });
      return;
    }
    let match = -1;
    for (let index = this.openTags.length - 1; index >= 0; index -= 1) {
      if (this.openTags[index].tag === tag) {
        match = index;
        break;
      }
    }
    if (match === -1) {
      this.report("info", `Closing tag </${tag}> has no matching opener`, start);
    } else {
      for (const unclosed of this.openTags.slice(match + 1)) {
        this.report("warning", `Unclosed <${unclosed.tag}> tag`, unclosed.offset);
      }
      this.openTags.length = match;
    }
    this.push("tag_close", start, end, { tag });
  }

  private lineEnd(index: number): number {
    const newline = this.text.indexOf("\n", index);
    return newline === -1 ? this.text.length : newline;
  }

  private flushText(end: number): void {
    if (this.textStart < 0) return;
    if (end > this.textStart) this.push("text", this.textStart, end);
    this.textStart = -1;
  }

  private push(kind: TokenKind, start: number, end: number, metadata?: TokenMetadata): void {
    const { line, column } = this.lines.locate(start);
    const token: Token = metadata
      ? { kind, text: this.text.slice(start, end), start, end, line, column, metadata }
      : { kind, text: this.text.slice(start, end), start, end, line, column };
    this.tokens.push(token);
  }

  private report(severity: DiagnosticSeverity, message: string, offset: number): void {
    const { line, column } = this.lines.locate(offset);
    this.errors.push({ severity, message, offset, line, column });
  }
}

/**
 * Splits raw response text into tokens. Total: any input yields a token
 * stream ending in `eof`, problems are returned as lexical errors.
 */
export class ResponseLexer {
  tokenize(text: string): LexResult {
    return new LexerRun(text).run();
  }
}
