import type {
  CodeNode,
  CommandNode,
  ErrorNode,
  ErrorNodeSeverity,
  FileReferenceNode,
  FileReferenceType,
  MarkdownNode,
  QuestionNode,
  QuestionType,
  TextFormat,
} from "../ast/ResponseNodes.js";
import type { Token } from "../lexer/Token.js";

// Extractors below read residual text and return nodes whose spans are
// offsets into that same text; callers map them back to the source.

const PATH_PATTERN =
  /(?<![\w./\\:-])((?:[A-Za-z]:)?(?:[/\\][\w\-.]+)+|\.{1,2}\/[\w\-./]*[\w-]|[\w-]+(?:\/[\w\-.]+)+)(?::(\d+)(?:-(\d+))?)?/g;

const REFERENCE_KEYWORDS: ReadonlyArray<[FileReferenceType, RegExp]> = [
  ["delete", /\b(?:delete|deleting|deleted|remove|removing|removed|rm)\b/gi],
  ["create", /\b(?:create|creating|created|new file|touch|mkdir)\b/gi],
  ["write", /\b(?:write|writing|wrote|written|save|saving|saved|overwrite)\b/gi],
  [
    "modify",
    /\b(?:modify|modifying|modified|update|updating|updated|edit|editing|edited|change|changing|changed|patch|refactor)\b/gi,
  ],
  [
    "read",
    /\b(?:read|reading|open|opening|view|viewing|cat|show|showing|inspect|look at|looking at|check|checking|examine)\b/gi,
  ],
  ["navigate", /\b(?:cd|navigate|navigating|go to|switch to)\b/gi],
];

const KEYWORD_WINDOW = 60;

/** Type implied by the last intent keyword before the path on its line. */
export const classifyReference = (prefix: string): FileReferenceType => {
  const window = prefix.slice(-KEYWORD_WINDOW);
  let best: FileReferenceType = "mention";
  let bestIndex = -1;
  for (const [type, pattern] of REFERENCE_KEYWORDS) {
    for (const match of window.matchAll(pattern)) {
      if (match.index !== undefined && match.index > bestIndex) {
        bestIndex = match.index;
        best = type;
      }
    }
  }
  return best;
};

const isAbsolutePath = (value: string): boolean => /^(?:[A-Za-z]:)?[/\\]/.test(value);

export const extractFileReferences = (text: string): FileReferenceNode[] => {
  const references: FileReferenceNode[] = [];
  for (const match of text.matchAll(PATH_PATTERN)) {
    if (match.index === undefined) continue;
    const raw = match[1];
    const path = raw.replace(/\.+$/, "");
    const absolute = isAbsolutePath(path);
    const relativeWithPrefix = path.startsWith("./") || path.startsWith("../");
    if (!absolute && !relativeWithPrefix) {
      const last = path.slice(path.lastIndexOf("/") + 1);
      if (!/\.\w+$/.test(last)) continue;
    }
    if (path.length < 2) continue;
    const lineStart = text.lastIndexOf("\n", match.index) + 1;
    const trimmedRaw = path.length !== raw.length;
    const lineReference = !trimmedRaw && match[2] ? (match[3] ? `${match[2]}-${match[3]}` : match[2]) : undefined;
    const end = trimmedRaw ? match.index + path.length : match.index + match[0].length;
    const node: FileReferenceNode = {
      kind: "file_reference",
      span: { start: match.index, end },
      path,
      referenceType: classifyReference(text.slice(lineStart, match.index)),
      isAbsolute: absolute,
    };
    if (lineReference) node.lineReference = lineReference;
    references.push(node);
  }
  return references;
};

const QUESTION_PATTERN =
  /^[ \t]*(?:[-*+][ \t]+|\d+[.)][ \t]+|>[ \t]*)?((?:what|how|why|when|where|who|which|would|should|shall|can|could|do|does|did|is|are|will|may|might|have|has)\b[^?\n]*\?)/gim;

export const classifyQuestion = (question: string): QuestionType => {
  if (/\b(?:proceed|continue|go ahead|confirm)\b/i.test(question)) return "confirmation";
  if (/\b(?:yes|no)\b/i.test(question)) return "yes_no";
  if (/\bor\b/i.test(question)) return "multiple_choice";
  if (/\b(?:mean|clarify|specify|which one|more details?)\b/i.test(question)) return "clarification";
  if (/^(?:do|does|did|is|are|can|could|would|should|shall|will|may|might|have|has)\b/i.test(question)) {
    return "yes_no";
  }
  return "open_ended";
};

export const extractQuestions = (text: string): QuestionNode[] => {
  const questions: QuestionNode[] = [];
  for (const match of text.matchAll(QUESTION_PATTERN)) {
    if (match.index === undefined) continue;
    const question = match[1];
    const start = match.index + match[0].length - question.length;
    questions.push({
      kind: "question",
      span: { start, end: start + question.length },
      question,
      questionType: classifyQuestion(question),
    });
  }
  return questions;
};

const COMMAND_PATTERN = /^[ \t]*\$[ \t]+(\S[^\n]*?)[ \t]*$/gm;

export const extractCommands = (text: string): CommandNode[] => {
  const commands: CommandNode[] = [];
  for (const match of text.matchAll(COMMAND_PATTERN)) {
    if (match.index === undefined) continue;
    commands.push({
      kind: "command",
      span: { start: match.index, end: match.index + match[0].length },
      command: match[1],
    });
  }
  return commands;
};

const HEADING_LINE = /^(#{1,6})[ \t]+(.+?)[ \t]*#*[ \t]*$/;
const RULE_LINE = /^[ \t]{0,3}(?:(?:-[ \t]*){3,}|(?:\*[ \t]*){3,}|(?:_[ \t]*){3,})$/;
const LIST_LINE = /^([ \t]*)([-*+]|\d{1,9}[.)])[ \t]+(.+)$/;
const QUOTE_LINE = /^[ \t]{0,3}>[ \t]?(.*)$/;

export const extractMarkdown = (text: string): MarkdownNode[] => {
  const nodes: MarkdownNode[] = [];
  let offset = 0;
  for (const line of text.split("\n")) {
    const span = { start: offset, end: offset + line.length };
    offset += line.length + 1;
    const heading = HEADING_LINE.exec(line);
    if (heading) {
      nodes.push({
        kind: "markdown",
        span,
        element: "heading",
        level: heading[1].length,
        marker: heading[1],
        text: heading[2],
      });
      continue;
    }
    if (RULE_LINE.test(line)) {
      nodes.push({ kind: "markdown", span, element: "horizontal_rule", level: 0, marker: line.trim(), text: "" });
      continue;
    }
    const item = LIST_LINE.exec(line);
    if (item) {
      const indent = item[1].replace(/\t/g, "  ").length;
      nodes.push({
        kind: "markdown",
        span,
        element: "list_item",
        level: Math.floor(indent / 2) + 1,
        marker: item[2],
        text: item[3].trim(),
      });
      continue;
    }
    const quote = QUOTE_LINE.exec(line);
    if (quote) {
      nodes.push({ kind: "markdown", span, element: "block_quote", level: 1, marker: ">", text: quote[1].trim() });
    }
  }
  return nodes;
};

const ERROR_LINE = /^[ \t]*(error|warning|fatal|critical)[ \t]*:[ \t]*(\S.*?)[ \t]*$/gim;

const ERROR_SEVERITY: Record<string, ErrorNodeSeverity> = {
  error: "error",
  warning: "warning",
  fatal: "critical",
  critical: "critical",
};

export const extractErrorMarkers = (text: string): ErrorNode[] => {
  const nodes: ErrorNode[] = [];
  for (const match of text.matchAll(ERROR_LINE)) {
    if (match.index === undefined) continue;
    nodes.push({
      kind: "error",
      span: { start: match.index, end: match.index + match[0].length },
      message: match[2],
      severity: ERROR_SEVERITY[match[1].toLowerCase()] ?? "error",
    });
  }
  return nodes;
};

const EXECUTABLE_LANGUAGES = new Set([
  "bash",
  "sh",
  "shell",
  "zsh",
  "fish",
  "console",
  "powershell",
  "pwsh",
  "ps1",
  "cmd",
  "bat",
]);

export interface CodeBlock {
  node: CodeNode;
  start: number;
  end: number;
}

/** Fenced blocks as the lexer saw them; spans are source offsets. */
export const collectCodeBlocks = (tokens: readonly Token[], textLength: number): CodeBlock[] => {
  const blocks: CodeBlock[] = [];
  tokens.forEach((token, index) => {
    if (token.kind !== "code_fence_open") return;
    let next = index + 1;
    const content = tokens.at(next)?.kind === "code_content" ? tokens.at(next) : undefined;
    if (content) next += 1;
    const close = tokens.at(next)?.kind === "code_fence_close" ? tokens.at(next) : undefined;
    const language = token.metadata?.language ?? "";
    const end = close ? close.end : textLength;
    const node: CodeNode = {
      kind: "code",
      span: { start: token.start, end },
      language,
      code: content?.text ?? "",
      isExecutable: EXECUTABLE_LANGUAGES.has(language),
      complete: close !== undefined,
    };
    if (token.metadata?.fileName) node.fileName = token.metadata.fileName;
    blocks.push({ node, start: token.start, end });
  });
  return blocks;
};

const MARKDOWN_HINT = /^#{1,6}\s|^\s*(?:[-*+]|\d+\.)\s|^>\s?|\*\*[^*\n]+\*\*|^\|.+\|\s*$|`[^`\n]+`/m;

const parsesAsJson = (text: string): boolean => {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
};

export const detectTextFormat = (content: string): TextFormat => {
  const trimmed = content.trim();
  if ((trimmed.startsWith("{") || trimmed.startsWith("[")) && parsesAsJson(trimmed)) return "json";
  return MARKDOWN_HINT.test(trimmed) ? "markdown" : "plain";
};
