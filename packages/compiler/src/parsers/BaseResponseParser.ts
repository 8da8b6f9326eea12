import { createHash } from "node:crypto";
import {
  isJsonObject,
  JsonRepairService,
  noopLogger,
  type EventLogger,
  type JsonRepair,
} from "@respc/shared";
import {
  compareChildren,
  createResponse,
  toolCallSignature,
  type ResponseChild,
  type ResponseNode,
  type TextNode,
  type ThoughtNode,
  type ToolCallNode,
  type ToolResultNode,
} from "../ast/ResponseNodes.js";
import { createExtractionFailure, errorMessage } from "../errors/CompilerErrors.js";
import { ResponseLexer } from "../lexer/ResponseLexer.js";
import { overlapsAny, type Range } from "../text/TextScanning.js";
import { ResidualText, toSourceSpan, type Projection } from "./ResidualText.js";
import type {
  ParserCapabilities,
  ParserContext,
  ParserDependencies,
  ResponseParser,
  ValidationIssue,
  ValidationOptions,
  ValidationResult,
} from "./ResponseParser.js";
import { applyScrubRules, type ScrubRule } from "./ScrubRules.js";
import {
  collectCodeBlocks,
  detectTextFormat,
  extractCommands,
  extractErrorMarkers,
  extractFileReferences,
  extractMarkdown,
  extractQuestions,
} from "./SemanticExtraction.js";
import type { ExtractedToolCall, InterpretOutcome, ToolCallCandidate, ToolCallRule } from "./ToolCallRules.js";

const THOUGHT_PATTERN = /<(thinking|thought|think|internal|scratchpad)>([\s\S]*?)(<\/\1>|$)/gi;

/** `call_<sha1(signature)[0..12]>`, suffixed with the occurrence number from the second repeat on. */
export const createCallId = (signature: string, occurrence: number): string => {
  const digest = createHash("sha1").update(signature).digest("hex").slice(0, 12);
  return occurrence > 1 ? `call_${digest}_${occurrence}` : `call_${digest}`;
};

const containsOffset = (range: Range, offset: number): boolean =>
  offset >= range.start && offset < range.end;

/** The parts of `range` not covered by any of `cuts`. */
const subtractRanges = (range: Range, cuts: readonly Range[]): Range[] => {
  const parts: Range[] = [];
  let cursor = range.start;
  const inside = cuts
    .filter((cut) => cut.end > range.start && cut.start < range.end)
    .sort((left, right) => left.start - right.start);
  for (const cut of inside) {
    if (cut.start > cursor) parts.push({ start: cursor, end: cut.start });
    cursor = Math.max(cursor, cut.end);
  }
  if (cursor < range.end) parts.push({ start: cursor, end: range.end });
  return parts;
};

/**
 * An unclosed thought ends where the next tool call begins; only a thought
 * with nothing after it runs to the end of the input.
 */
const clipThought = (text: string, thought: FoundThought, calls: readonly Range[]): FoundThought => {
  const next = calls
    .filter((call) => call.start > thought.start && call.start < thought.end)
    .reduce((lowest, call) => Math.min(lowest, call.start), thought.end);
  if (next === thought.end) return thought;
  const contentStart = text.indexOf(">", thought.start) + 1;
  const original = text.slice(thought.start, next);
  return {
    start: thought.start,
    end: next,
    complete: true,
    node: {
      kind: "thought",
      span: { start: thought.start, end: next },
      content: text.slice(contentStart, next).trim(),
      original,
    },
  };
};

export type OffsetPredicate = (offset: number) => boolean;

interface FoundThought extends Range {
  complete: boolean;
  node: ThoughtNode;
}

interface FoundCall extends Range {
  rule: string;
  call: ExtractedToolCall;
}

export abstract class BaseResponseParser implements ResponseParser {
  abstract readonly name: string;
  protected abstract readonly toolCallRules: readonly ToolCallRule[];
  protected abstract readonly scrubRules: readonly ScrubRule[];
  protected readonly repair: JsonRepair;
  protected readonly logger: EventLogger;
  private readonly lexer = new ResponseLexer();

  constructor(deps: Partial<ParserDependencies> = {}) {
    this.logger = deps.logger ?? noopLogger;
    this.repair = deps.repair ?? new JsonRepairService(this.logger);
  }

  parse(text: string, context: ParserContext): ResponseNode {
    try {
      return this.parseResponse(text, context);
    } catch (error) {
      this.logger.log("parser_fallback", { parser: this.name, error: errorMessage(error) });
      return this.fallbackTree(text, context);
    }
  }

  validate(tree: ResponseNode, options: ValidationOptions = {}): ValidationResult {
    const issues: ValidationIssue[] = [];
    for (const node of tree.children) {
      if (node.kind === "tool_call") {
        if (!node.toolName.trim()) {
          issues.push({ severity: "error", message: "Tool call is missing a tool name", node });
        }
        if (!node.callId) {
          issues.push({ severity: "warning", message: `Tool call ${node.toolName} has no call id`, node });
        }
      } else if (node.kind === "code" && !node.language) {
        issues.push({
          severity: options.strictMode ? "warning" : "info",
          message: "Code block has no language tag",
          node,
        });
      }
    }
    return { isValid: !issues.some((issue) => issue.severity === "error"), issues };
  }

  capabilities(): ParserCapabilities {
    return {
      dialect: this.name,
      toolCallRules: this.toolCallRules.map((rule) => rule.name),
      scrubRules: this.scrubRules.map((rule) => rule.name),
      toolResults: this.supportsToolResults(),
      thoughts: true,
      codeBlocks: true,
      semanticElements: true,
    };
  }

  protected supportsToolResults(): boolean {
    return false;
  }

  /** Claims tool output spans; dialects without them return nothing. */
  protected extractToolResults(
    _text: string,
    _insideCode: OffsetPredicate,
    _claimed: Range[],
  ): ToolResultNode[] {
    return [];
  }

  protected parseResponse(text: string, context: ParserContext): ResponseNode {
    const tokens = context.tokens ?? this.lexer.tokenize(text).tokens;
    const residual = new ResidualText(text);
    const children: ResponseChild[] = [];
    const codeBlocks = collectCodeBlocks(tokens, text.length);
    const insideCode: OffsetPredicate = (offset) =>
      codeBlocks.some((block) => offset >= block.start && offset < block.end);
    const claimed: Range[] = [];
    let isComplete = true;

    children.push(...this.extractToolResults(text, insideCode, claimed));
    const extraction = this.extractToolCalls(text, insideCode, claimed);
    children.push(...extraction.calls);

    // Thoughts go last: an opener quoted inside a call argument is not a thought.
    const callRanges = [...claimed];
    for (const found of this.findThoughts(text)) {
      if (insideCode(found.start) || callRanges.some((range) => containsOffset(range, found.start))) continue;
      if (overlapsAny(found, claimed.slice(callRanges.length))) continue;
      const thought = found.complete ? found : clipThought(text, found, callRanges);
      claimed.push(...subtractRanges(thought, callRanges));
      if (!thought.complete) isComplete = false;
      if (context.preserveThoughts) children.push(thought.node);
    }

    for (const block of codeBlocks) {
      if (overlapsAny(block, claimed)) continue;
      children.push(block.node);
      residual.remove(block.start, block.end);
      if (!block.node.complete) isComplete = false;
    }
    for (const range of claimed) {
      residual.remove(range.start, range.end);
    }

    const scrubbed = applyScrubRules(residual, this.scrubRules);
    if (Object.keys(scrubbed).length > 0) {
      this.logger.log("scrub_applied", { parser: this.name, rules: scrubbed });
    }

    const projection = residual.project();
    if (context.extractSemantics) children.push(...this.extractSemantics(projection));
    const textNode = this.buildTextNode(projection);
    if (textNode) children.push(textNode);
    children.sort(compareChildren);

    return createResponse({
      modelProvider: context.modelProvider,
      modelName: context.modelName,
      length: text.length,
      children,
      metadata: {
        isComplete: isComplete && !extraction.pending,
        pendingToolCall: extraction.pending,
      },
    });
  }

  protected extractToolCalls(
    text: string,
    insideCode: OffsetPredicate,
    claimed: Range[],
  ): { calls: ToolCallNode[]; pending: boolean } {
    const found: FoundCall[] = [];
    let pending = false;
    for (const rule of this.toolCallRules) {
      for (const candidate of rule.find(text)) {
        if (insideCode(candidate.start) || overlapsAny(candidate, claimed)) continue;
        claimed.push({ start: candidate.start, end: candidate.end });
        if (!candidate.complete) {
          pending = true;
          continue;
        }
        const payload = rule.prepare ? rule.prepare(candidate.payload) : candidate.payload;
        const value = this.repair.safeParse(payload, isJsonObject);
        const outcome: InterpretOutcome = value
          ? rule.interpret(value, this.repair)
          : { ok: false, reason: "payload is not a JSON object" };
        if (!outcome.ok) {
          this.reportExtractionFailure(rule.name, candidate, outcome.reason);
          continue;
        }
        found.push({ start: candidate.start, end: candidate.end, rule: rule.name, call: outcome.call });
      }
    }

    found.sort((left, right) => left.start - right.start);
    const occurrences = new Map<string, number>();
    const calls = found.map((entry): ToolCallNode => {
      const signature = toolCallSignature(entry.call);
      const occurrence = (occurrences.get(signature) ?? 0) + 1;
      occurrences.set(signature, occurrence);
      return {
        kind: "tool_call",
        span: { start: entry.start, end: entry.end },
        callId: createCallId(signature, occurrence),
        toolName: entry.call.toolName,
        arguments: entry.call.arguments,
        rule: entry.rule,
      };
    });
    return { calls, pending };
  }

  private findThoughts(text: string): FoundThought[] {
    const thoughts: FoundThought[] = [];
    for (const match of text.matchAll(THOUGHT_PATTERN)) {
      if (match.index === undefined) continue;
      const start = match.index;
      const end = start + match[0].length;
      thoughts.push({
        start,
        end,
        complete: match[3] !== "",
        node: { kind: "thought", span: { start, end }, content: match[2].trim(), original: match[0] },
      });
    }
    return thoughts;
  }

  private extractSemantics(projection: Projection): ResponseChild[] {
    const nodes: ResponseChild[] = [
      ...extractFileReferences(projection.text),
      ...extractQuestions(projection.text),
      ...extractCommands(projection.text),
      ...extractMarkdown(projection.text),
      ...extractErrorMarkers(projection.text),
    ];
    return nodes.map((node) => ({
      ...node,
      span: toSourceSpan(projection, node.span.start, node.span.end),
    }));
  }

  private buildTextNode(projection: Projection): TextNode | undefined {
    const text = projection.text;
    const start = text.search(/\S/);
    if (start === -1) return undefined;
    let end = text.length;
    while (end > start && /\s/.test(text[end - 1])) end -= 1;
    const content = text.slice(start, end);
    return {
      kind: "text",
      span: toSourceSpan(projection, start, end),
      content,
      format: detectTextFormat(content),
    };
  }

  private reportExtractionFailure(rule: string, candidate: ToolCallCandidate, reason: string): void {
    const failure = createExtractionFailure({ rule, start: candidate.start, end: candidate.end, reason });
    this.logger.log("extraction_failure", {
      parser: this.name,
      message: failure.message,
      ...failure.details,
    });
  }

  private fallbackTree(text: string, context: ParserContext): ResponseNode {
    const content = text.trim();
    const start = content ? text.indexOf(content) : 0;
    const children: ResponseChild[] = content
      ? [{ kind: "text", span: { start, end: start + content.length }, content, format: "plain" }]
      : [];
    return createResponse({
      modelProvider: context.modelProvider,
      modelName: context.modelName,
      length: text.length,
      children,
    });
  }
}
