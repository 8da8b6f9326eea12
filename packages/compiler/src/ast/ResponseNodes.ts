import { canonicalStringify, type JsonObject, type JsonValue } from "@respc/shared";

export interface SourceSpan {
  start: number;
  end: number;
}

export type TextFormat = "plain" | "markdown" | "json";

export type FileReferenceType =
  | "read"
  | "write"
  | "create"
  | "delete"
  | "modify"
  | "navigate"
  | "mention";

export type QuestionType =
  | "yes_no"
  | "multiple_choice"
  | "confirmation"
  | "clarification"
  | "open_ended";

export type ErrorNodeSeverity = "info" | "warning" | "error" | "critical";

export type MarkdownElement = "heading" | "list_item" | "block_quote" | "horizontal_rule";

export type ToolArguments = JsonObject;

export interface TextNode {
  kind: "text";
  span: SourceSpan;
  content: string;
  format: TextFormat;
}

export interface ToolCallNode {
  kind: "tool_call";
  span: SourceSpan;
  callId: string;
  toolName: string;
  arguments: ToolArguments;
  /** Name of the extraction rule that produced the call. */
  rule: string;
}

export interface ToolResultNode {
  kind: "tool_result";
  span: SourceSpan;
  callId?: string;
  toolName: string;
  success: boolean;
  result?: JsonValue;
  errorMessage?: string;
}

export interface CodeNode {
  kind: "code";
  span: SourceSpan;
  language: string;
  code: string;
  fileName?: string;
  isExecutable: boolean;
  /** False when the closing fence never arrived. */
  complete: boolean;
}

export interface FileReferenceNode {
  kind: "file_reference";
  span: SourceSpan;
  path: string;
  referenceType: FileReferenceType;
  isAbsolute: boolean;
  lineReference?: string;
}

export interface QuestionNode {
  kind: "question";
  span: SourceSpan;
  question: string;
  questionType: QuestionType;
  suggestedOptions?: string[];
}

export interface ThoughtNode {
  kind: "thought";
  span: SourceSpan;
  content: string;
  /** Source text of the whole marked span, wrappers included. */
  original: string;
}

export interface ErrorNode {
  kind: "error";
  span: SourceSpan;
  message: string;
  severity: ErrorNodeSeverity;
}

export interface CommandNode {
  kind: "command";
  span: SourceSpan;
  command: string;
}

export interface MarkdownNode {
  kind: "markdown";
  span: SourceSpan;
  element: MarkdownElement;
  level: number;
  marker: string;
  text: string;
}

export type ResponseChild =
  | TextNode
  | ToolCallNode
  | ToolResultNode
  | CodeNode
  | FileReferenceNode
  | QuestionNode
  | ThoughtNode
  | ErrorNode
  | CommandNode
  | MarkdownNode;

export type NodeKind = ResponseChild["kind"];

export const NODE_KINDS: readonly NodeKind[] = [
  "text",
  "tool_call",
  "tool_result",
  "code",
  "file_reference",
  "question",
  "thought",
  "error",
  "command",
  "markdown",
];

export interface ResponseMetadata {
  /** False while the tail of the input still looks truncated. */
  isComplete: boolean;
  /** A tool call whose JSON has not finished arriving. */
  pendingToolCall: boolean;
}

export interface ResponseNode {
  kind: "response";
  span: SourceSpan;
  modelProvider: string;
  modelName: string;
  children: ResponseChild[];
  metadata: ResponseMetadata;
}

export type ChildOfKind<K extends NodeKind> = Extract<ResponseChild, { kind: K }>;

export const createResponse = (
  input: Pick<ResponseNode, "modelProvider" | "modelName"> & {
    length: number;
    children?: ResponseChild[];
    metadata?: Partial<ResponseMetadata>;
  },
): ResponseNode => ({
  kind: "response",
  span: { start: 0, end: input.length },
  modelProvider: input.modelProvider,
  modelName: input.modelName,
  children: input.children ?? [],
  metadata: {
    isComplete: input.metadata?.isComplete ?? true,
    pendingToolCall: input.metadata?.pendingToolCall ?? false,
  },
});

export const childrenOfKind = <K extends NodeKind>(
  root: ResponseNode,
  kind: K,
): ChildOfKind<K>[] => {
  const isKind = (child: ResponseChild): child is ChildOfKind<K> => child.kind === kind;
  return root.children.filter(isKind);
};

/** `name:canonical-arguments`; two calls with the same signature are duplicates. */
export const toolCallSignature = (call: Pick<ToolCallNode, "toolName" | "arguments">): string =>
  `${call.toolName}:${canonicalStringify(call.arguments)}`;

/** The response node itself plus every child. */
export const countNodes = (root: ResponseNode): number => 1 + root.children.length;

const KIND_ORDER: Record<NodeKind, number> = {
  tool_call: 0,
  tool_result: 1,
  thought: 2,
  code: 3,
  error: 4,
  command: 5,
  question: 6,
  file_reference: 7,
  markdown: 8,
  text: 9,
};

/**
 * Source order. On equal start offsets structural nodes come first and the
 * residual text node last; the sort is stable for everything else.
 */
export const compareChildren = (left: ResponseChild, right: ResponseChild): number => {
  if (left.span.start !== right.span.start) return left.span.start - right.span.start;
  return KIND_ORDER[left.kind] - KIND_ORDER[right.kind];
};
