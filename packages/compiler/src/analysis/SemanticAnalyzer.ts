import { jsonTypeOf, type JsonValue } from "@respc/shared";
import {
  countNodes,
  toolCallSignature,
  type FileReferenceType,
  type NodeKind,
  type ResponseChild,
  type ResponseNode,
  type ToolCallNode,
} from "../ast/ResponseNodes.js";
import type { Diagnostic, DiagnosticSeverity } from "../diagnostics/Diagnostic.js";
import { checkBracketBalance } from "./BracketBalance.js";
import { defaultToolSchemaCatalog, type ToolSchemaCatalog } from "./ToolSchemas.js";

export type PrimaryIntent =
  | "ToolExecution"
  | "CodeGeneration"
  | "Clarification"
  | "ErrorReporting"
  | "CommandExecution"
  | "Explanation"
  | "Unknown";

export interface SemanticSummary {
  hasToolCalls: boolean;
  hasCode: boolean;
  hasQuestions: boolean;
  hasErrors: boolean;
  nodeCount: number;
  filesReferenced: string[];
  toolsUsed: string[];
  primaryIntent: PrimaryIntent;
}

export interface AnalysisResult {
  diagnostics: Diagnostic[];
  summary: SemanticSummary;
  /** Copy of the input with questions normalized; the input is not touched. */
  tree: ResponseNode;
}

export interface AnalyzeOptions {
  strictMode?: boolean;
}

export interface SemanticAnalyzerOptions {
  schemas?: ToolSchemaCatalog;
}

export const createEmptySummary = (): SemanticSummary => ({
  hasToolCalls: false,
  hasCode: false,
  hasQuestions: false,
  hasErrors: false,
  nodeCount: 1,
  filesReferenced: [],
  toolsUsed: [],
  primaryIntent: "Unknown",
});

const INTENT_BY_KIND: Partial<Record<NodeKind, PrimaryIntent>> = {
  tool_call: "ToolExecution",
  code: "CodeGeneration",
  question: "Clarification",
  error: "ErrorReporting",
  command: "CommandExecution",
  text: "Explanation",
};

const PATH_ARGUMENTS = ["path", "file_path", "directory"];
const MAX_QUESTIONS = 3;
const DEFAULT_YES_NO_OPTIONS = ["Yes", "No"];
const TRAILING_ELLIPSIS = /(?:\.\.\.|\u2026)\s*(?:\*\/)?$/;
const TODO_MARKER = /\b(?:TODO|FIXME)\b/;
const RELATIVE_ARGUMENT = /(?:^|\s)\.{1,2}\//;

export class SemanticAnalyzer {
  private readonly schemas: ToolSchemaCatalog;

  constructor(options: SemanticAnalyzerOptions = {}) {
    this.schemas = options.schemas ?? defaultToolSchemaCatalog;
  }

  analyze(tree: ResponseNode, options: AnalyzeOptions = {}): AnalysisResult {
    const strict = options.strictMode ?? false;
    const diagnostics: Diagnostic[] = [];
    const report = (severity: DiagnosticSeverity, message: string, node?: ResponseChild): void => {
      diagnostics.push(node ? { severity, message, phase: "semantic", node } : { severity, message, phase: "semantic" });
    };

    this.checkDuplicateCalls(tree, report);
    this.checkToolParameters(tree, strict, report);
    this.checkFileConflicts(tree, report);
    this.checkQuestionPlacement(tree, report);
    this.checkCodeBlocks(tree, report);
    this.checkToolResults(tree, report);
    this.checkDirectoryChanges(tree, report);

    const normalized = this.normalizeQuestions(tree);
    return { diagnostics, summary: this.summarize(normalized), tree: normalized };
  }

  private checkDuplicateCalls(tree: ResponseNode, report: Reporter): void {
    const seen = new Set<string>();
    for (const node of tree.children) {
      if (node.kind !== "tool_call") continue;
      const signature = toolCallSignature(node);
      if (seen.has(signature)) {
        report("warning", `Duplicate tool call: ${node.toolName} with identical arguments`, node);
      }
      seen.add(signature);
    }
  }

  private checkToolParameters(tree: ResponseNode, strict: boolean, report: Reporter): void {
    for (const node of tree.children) {
      if (node.kind !== "tool_call") continue;
      const schema = this.schemas.get(node.toolName);
      if (!schema) {
        report(strict ? "warning" : "info", `Unknown tool: ${node.toolName}`, node);
        continue;
      }
      for (const [name, parameter] of Object.entries(schema.parameters)) {
        const value = readArgument(node, name, parameter.aliases ?? []);
        if (value === undefined) {
          if (parameter.required) {
            report("error", `Tool ${node.toolName} is missing required parameter '${name}'`, node);
          }
          continue;
        }
        const expected = Array.isArray(parameter.type) ? parameter.type : [parameter.type];
        const actual = jsonTypeOf(value);
        if (!expected.includes(actual)) {
          report(
            strict ? "error" : "warning",
            `Parameter '${name}' of ${node.toolName} should be ${expected.join(" or ")}, got ${actual}`,
            node,
          );
        }
      }
    }
  }

  private checkFileConflicts(tree: ResponseNode, report: Reporter): void {
    const byPath = new Map<string, { types: FileReferenceType[]; first: ResponseChild }>();
    for (const node of tree.children) {
      if (node.kind !== "file_reference") continue;
      const entry = byPath.get(node.path);
      if (entry) {
        entry.types.push(node.referenceType);
      } else {
        byPath.set(node.path, { types: [node.referenceType], first: node });
      }
    }
    for (const [path, { types, first }] of byPath) {
      const deletes = types.includes("delete");
      const writes = types.filter((type) => type === "write" || type === "create");
      if (deletes && writes.length > 0) {
        report("warning", `Conflicting operations on ${path}: delete and ${writes[0]}`, first);
      }
      const creates = types.filter((type) => type === "create").length;
      if (creates > 1) {
        report("warning", `${path} is created ${creates} times`, first);
      }
    }
  }

  private checkQuestionPlacement(tree: ResponseNode, report: Reporter): void {
    let previous: ResponseChild | undefined;
    let questions = 0;
    for (const node of tree.children) {
      if (node.kind === "text") continue;
      if (node.kind === "question") {
        questions += 1;
        if (previous?.kind === "tool_call") {
          report("info", `Question follows tool call ${previous.toolName}; the answer may be delayed`, node);
        } else if (previous?.kind === "command") {
          report("info", "Question follows a command; the answer may be delayed", node);
        }
      }
      previous = node;
    }
    if (questions > MAX_QUESTIONS) {
      report("info", `Response asks ${questions} questions; consider asking fewer`);
    }
  }

  private checkCodeBlocks(tree: ResponseNode, report: Reporter): void {
    for (const node of tree.children) {
      if (node.kind !== "code") continue;
      if (!node.complete) {
        report("warning", "Code block is incomplete: the closing fence is missing", node);
        continue;
      }
      const lines = node.code.split("\n").filter((line) => line.trim());
      const last = lines.length > 0 ? lines[lines.length - 1].trim() : "";
      if (TRAILING_ELLIPSIS.test(last)) {
        report("info", "Code block ends with an ellipsis and may be truncated", node);
      }
      if (TODO_MARKER.test(node.code)) {
        report("info", "Code block contains TODO markers", node);
      }
      const balance = checkBracketBalance(node.code);
      if (!balance.balanced) {
        report("warning", `Code block has unbalanced brackets: ${balance.unmatched.join(" ")}`, node);
      }
    }
  }

  private checkToolResults(tree: ResponseNode, report: Reporter): void {
    const calls = tree.children.filter((node): node is ToolCallNode => node.kind === "tool_call");
    for (const node of tree.children) {
      if (node.kind !== "tool_result") continue;
      const matched = calls.some(
        (call) => (node.callId !== undefined && call.callId === node.callId) || call.toolName === node.toolName,
      );
      if (!matched) {
        report("info", `Tool result for ${node.toolName} has no matching tool call`, node);
      }
    }
  }

  private checkDirectoryChanges(tree: ResponseNode, report: Reporter): void {
    let changedDirectory = false;
    for (const node of tree.children) {
      if (node.kind !== "command") continue;
      if (/^cd(?:\s|$)/.test(node.command)) {
        changedDirectory = true;
        continue;
      }
      if (changedDirectory && RELATIVE_ARGUMENT.test(node.command)) {
        report("info", `Command '${node.command}' uses relative paths after a directory change`, node);
      }
    }
  }

  private normalizeQuestions(tree: ResponseNode): ResponseNode {
    return {
      ...tree,
      metadata: { ...tree.metadata },
      children: tree.children.map((node) =>
        node.kind === "question" && node.questionType === "yes_no" && !node.suggestedOptions?.length
          ? { ...node, suggestedOptions: [...DEFAULT_YES_NO_OPTIONS] }
          : node,
      ),
    };
  }

  private summarize(tree: ResponseNode): SemanticSummary {
    const files: string[] = [];
    const tools: string[] = [];
    const votes = new Map<PrimaryIntent, number>();
    const addUnique = (list: string[], value: string): void => {
      if (!list.includes(value)) list.push(value);
    };

    for (const node of tree.children) {
      const intent = INTENT_BY_KIND[node.kind];
      if (intent) votes.set(intent, (votes.get(intent) ?? 0) + 1);
      if (node.kind === "file_reference") addUnique(files, node.path);
      if (node.kind === "tool_call") {
        addUnique(tools, node.toolName);
        for (const key of PATH_ARGUMENTS) {
          const value = node.arguments[key];
          if (typeof value === "string" && value) addUnique(files, value);
        }
      }
    }

    let primaryIntent: PrimaryIntent = "Unknown";
    let best = 0;
    for (const [intent, count] of votes) {
      if (count > best) {
        best = count;
        primaryIntent = intent;
      }
    }

    const has = (kind: NodeKind): boolean => tree.children.some((node) => node.kind === kind);
    return {
      hasToolCalls: has("tool_call"),
      hasCode: has("code"),
      hasQuestions: has("question"),
      hasErrors: has("error"),
      nodeCount: countNodes(tree),
      filesReferenced: files,
      toolsUsed: tools,
      primaryIntent,
    };
  }
}

type Reporter = (severity: DiagnosticSeverity, message: string, node?: ResponseChild) => void;

const readArgument = (node: ToolCallNode, name: string, aliases: string[]): JsonValue | undefined => {
  for (const key of [name, ...aliases]) {
    if (Object.prototype.hasOwnProperty.call(node.arguments, key)) return node.arguments[key];
  }
  return undefined;
};
