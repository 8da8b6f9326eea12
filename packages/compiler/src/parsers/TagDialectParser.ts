import { type JsonObject, type JsonValue, isJsonObject } from "@respc/shared";
import type { ToolResultNode } from "../ast/ResponseNodes.js";
import { overlapsAny, type Range } from "../text/TextScanning.js";
import { BaseResponseParser, type OffsetPredicate } from "./BaseResponseParser.js";
import { TAG_DIALECT_SCRUB_RULES } from "./ScrubRules.js";
import { bareTool, nestedToolCall, taggedToolCall } from "./ToolCallRules.js";

const TOOL_RESULT_PATTERN = /<(tool_response|tool_result)>([\s\S]*?)<\/\1>/gi;

const stringField = (value: JsonObject, ...keys: string[]): string | undefined => {
  for (const key of keys) {
    const entry = value[key];
    if (typeof entry === "string" && entry.trim()) return entry.trim();
  }
  return undefined;
};

/**
 * Models that wrap calls in `<tool_call>` tags and answer with tool output
 * inside `<tool_response>` (Qwen, QwQ and similar chat templates).
 */
export class TagDialectParser extends BaseResponseParser {
  readonly name = "tag";
  protected readonly toolCallRules = [taggedToolCall, nestedToolCall, bareTool];
  protected readonly scrubRules = TAG_DIALECT_SCRUB_RULES;

  protected supportsToolResults(): boolean {
    return true;
  }

  protected extractToolResults(text: string, insideCode: OffsetPredicate, claimed: Range[]): ToolResultNode[] {
    const results: ToolResultNode[] = [];
    for (const match of text.matchAll(TOOL_RESULT_PATTERN)) {
      if (match.index === undefined) continue;
      const range = { start: match.index, end: match.index + match[0].length };
      if (insideCode(range.start) || overlapsAny(range, claimed)) continue;
      claimed.push(range);
      results.push(this.readToolResult(match[2].trim(), range));
    }
    return results;
  }

  private readToolResult(body: string, span: Range): ToolResultNode {
    const parsed: JsonValue | undefined =
      body.startsWith("{") || body.startsWith("[") ? this.repair.safeParse(body) : undefined;
    if (!isJsonObject(parsed)) {
      return {
        kind: "tool_result",
        span,
        toolName: "unknown",
        success: true,
        result: parsed ?? body,
      };
    }
    const errorMessage = stringField(parsed, "error", "error_message");
    const success = typeof parsed.success === "boolean" ? parsed.success : errorMessage === undefined;
    const node: ToolResultNode = {
      kind: "tool_result",
      span,
      toolName: stringField(parsed, "name", "tool", "tool_name") ?? "unknown",
      success,
    };
    const callId = stringField(parsed, "call_id", "tool_call_id", "id");
    if (callId) node.callId = callId;
    const result = parsed.result ?? parsed.output ?? parsed.content;
    if (result !== undefined) node.result = result;
    if (errorMessage) node.errorMessage = errorMessage;
    return node;
  }
}
