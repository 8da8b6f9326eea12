import type { DiagnosticSeverity } from "../diagnostics/Diagnostic.js";

export type TokenKind =
  | "text"
  | "newline"
  | "code_fence_open"
  | "code_content"
  | "code_fence_close"
  | "inline_code"
  | "json_span"
  | "tag_open"
  | "tag_close"
  | "markdown_heading"
  | "markdown_list_marker"
  | "markdown_blockquote"
  | "markdown_rule"
  | "eof";

export interface TokenMetadata {
  /** code_fence_open */
  language?: string;
  fileName?: string;
  /** json_span: false when the braces never balance */
  complete?: boolean;
  /** tag_open, tag_close */
  tag?: string;
  /** markdown_heading, markdown_list_marker */
  level?: number;
}

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
  readonly metadata?: Readonly<TokenMetadata>;
}

export interface LexicalError {
  severity: DiagnosticSeverity;
  message: string;
  offset: number;
  line: number;
  column: number;
}

export interface LexResult {
  tokens: Token[];
  errors: LexicalError[];
}

/** Wrapper tags models use around thoughts, tool calls and tool output. */
export const WRAPPER_TAGS = [
  "thinking",
  "thought",
  "think",
  "internal",
  "scratchpad",
  "tool_call",
  "tool_response",
  "tool_result",
  "function_call",
] as const;

export type WrapperTag = (typeof WRAPPER_TAGS)[number];

export const isWrapperTag = (value: string): value is WrapperTag =>
  WRAPPER_TAGS.some((tag) => tag === value);
