import { isJsonObject, type JsonObject, type JsonRepair, type JsonValue } from "@respc/shared";
import type { ToolArguments } from "../ast/ResponseNodes.js";
import {
  findBlankLineOutsideStrings,
  scanAllBalanced,
  scanBalanced,
  type BalancedScan,
} from "../text/TextScanning.js";

export interface ToolCallCandidate {
  start: number;
  end: number;
  /** JSON text handed to repair. */
  payload: string;
  /** False while the candidate is still being streamed. */
  complete: boolean;
}

export interface ExtractedToolCall {
  toolName: string;
  arguments: ToolArguments;
}

export type InterpretOutcome =
  | { ok: true; call: ExtractedToolCall }
  | { ok: false; reason: string };

/**
 * One way a model writes a tool call. Rules are independent: each finds its
 * own candidates and turns a parsed payload into a call.
 */
export interface ToolCallRule {
  readonly name: string;
  find(text: string): ToolCallCandidate[];
  /** Textual fix applied before repair. */
  prepare?(payload: string): string;
  interpret(value: JsonObject, repair: JsonRepair): InterpretOutcome;
}

const KEY_LOOKAHEAD = 64;

const nextKeyedBrace = (text: string, from: number, keyPattern: RegExp): number => {
  let index = text.indexOf("{", from);
  while (index !== -1 && !keyPattern.test(text.slice(index, index + KEY_LOOKAHEAD))) {
    index = text.indexOf("{", index + 1);
  }
  return index;
};

const trimEndOffset = (text: string, start: number, end: number): number => {
  let trimmed = end;
  while (trimmed > start && /\s/.test(text[trimmed - 1])) trimmed -= 1;
  return trimmed;
};

/**
 * Where an unclosed object stops being a candidate: a blank line outside
 * strings, or the next object with a matching key. -1 when neither follows,
 * which means the object is still streaming.
 */
const openCandidateBoundary = (text: string, start: number, keyPattern: RegExp): number => {
  const next = nextKeyedBrace(text, start + 1, keyPattern);
  const blank = findBlankLineOutsideStrings(text, start, next === -1 ? text.length : next);
  return blank === -1 ? next : blank;
};

/** Balanced `{…}` candidates whose first key matches `keyPattern`. */
export const findJsonCandidates = (text: string, keyPattern: RegExp): ToolCallCandidate[] => {
  const candidates: ToolCallCandidate[] = [];
  // After the first object that fails to close, one pass answers for the rest.
  let rest: Map<number, BalancedScan> | undefined;
  const scanAt = (offset: number): BalancedScan => {
    if (rest) return rest.get(offset) ?? { status: "mismatch", at: offset };
    const scan = scanBalanced(text, offset);
    if (scan.status !== "closed") rest = scanAllBalanced(text, offset);
    return scan;
  };
  let index = nextKeyedBrace(text, 0, keyPattern);
  while (index !== -1) {
    const scan = scanAt(index);
    if (scan.status === "open") {
      const boundary = openCandidateBoundary(text, index, keyPattern);
      if (boundary === -1) {
        candidates.push({ start: index, end: text.length, payload: text.slice(index), complete: false });
        break;
      }
      // Malformed mid-response: hand what is there to repair and move on.
      const end = trimEndOffset(text, index, boundary);
      candidates.push({ start: index, end, payload: text.slice(index, end), complete: true });
      index = nextKeyedBrace(text, boundary, keyPattern);
      continue;
    }
    const end = scan.status === "closed" ? scan.end : scan.at + 1;
    candidates.push({ start: index, end, payload: text.slice(index, end), complete: true });
    index = nextKeyedBrace(text, end, keyPattern);
  }
  return candidates;
};

const asName = (value: JsonValue | undefined): string | undefined =>
  typeof value === "string" && value.trim() ? value.trim() : undefined;

/**
 * Reads `name`/`tool` plus `arguments`/`parameters` from a call object.
 * Arguments given as a JSON string are parsed through repair.
 */
export const readToolPayload = (value: JsonObject, repair: JsonRepair): InterpretOutcome => {
  const toolName = asName(value.name) ?? asName(value.tool) ?? asName(value.function);
  if (!toolName) return { ok: false, reason: "missing tool name" };
  const raw = value.arguments ?? value.parameters ?? value.args ?? value.input;
  if (raw === undefined || raw === null) return { ok: true, call: { toolName, arguments: {} } };
  const args = typeof raw === "string" ? repair.safeParse(raw, isJsonObject) : raw;
  if (!isJsonObject(args)) return { ok: false, reason: `arguments for ${toolName} are not an object` };
  return { ok: true, call: { toolName, arguments: args } };
};

/** Unwraps `{"tool_call": {...}}` and `{"function_call": {...}}` envelopes. */
const readEnvelope = (value: JsonObject, repair: JsonRepair): InterpretOutcome => {
  const inner = value.tool_call ?? value.function_call;
  if (inner !== undefined) {
    return isJsonObject(inner)
      ? readToolPayload(inner, repair)
      : { ok: false, reason: "call envelope is not an object" };
  }
  return readToolPayload(value, repair);
};

const FENCED_PAYLOAD = /^```[\w-]*\s*\n?([\s\S]*?)\n?```$/;

/**
 * A `<tool_call>` that never closes. Its JSON body decides: a closed object
 * ends the candidate there, anything else is still streaming.
 */
const unclosedTaggedCall = (text: string, start: number, bodyStart: number): ToolCallCandidate => {
  const open = bodyStart + (text.slice(bodyStart).length - text.slice(bodyStart).trimStart().length);
  const scan = text[open] === "{" ? scanBalanced(text, open) : undefined;
  if (scan?.status === "closed") {
    return { start, end: scan.end, payload: text.slice(open, scan.end), complete: true };
  }
  return { start, end: text.length, payload: text.slice(bodyStart).trim(), complete: false };
};

export const taggedToolCall: ToolCallRule = {
  name: "tagged_tool_call",
  find(text) {
    const candidates: ToolCallCandidate[] = [];
    for (const match of text.matchAll(/<tool_call>([\s\S]*?)(<\/tool_call>|$)/gi)) {
      if (match.index === undefined) continue;
      if (match[2] === "") {
        candidates.push(unclosedTaggedCall(text, match.index, match.index + match[0].length - match[1].length));
        continue;
      }
      const body = match[1].trim();
      const fenced = FENCED_PAYLOAD.exec(body);
      candidates.push({
        start: match.index,
        end: match.index + match[0].length,
        payload: fenced ? fenced[1].trim() : body,
        complete: true,
      });
    }
    return candidates;
  },
  interpret: readEnvelope,
};

export const nestedToolCall: ToolCallRule = {
  name: "nested_tool_call",
  find: (text) => findJsonCandidates(text, /^\{\s*"tool_call"\s*:/),
  interpret: readEnvelope,
};

const MISSING_PARAM_NAME = /,\s*(true|false)\s*\}/g;

/** `{"path":"/a",false}` → `{"path":"/a","recursive":false}` for directory listings. */
export const restoreMissingParameterName = (payload: string): string => {
  if (!/list_directory|"path"/.test(payload)) return payload;
  return payload.replace(MISSING_PARAM_NAME, ', "recursive": $1}');
};

export const bareTool: ToolCallRule = {
  name: "bare_tool",
  find: (text) => findJsonCandidates(text, /^\{\s*"tool"\s*:/),
  prepare: restoreMissingParameterName,
  interpret: readToolPayload,
};

export const functionCall: ToolCallRule = {
  name: "function_call",
  find: (text) => findJsonCandidates(text, /^\{\s*"function_call"\s*:/),
  interpret: readEnvelope,
};

export const TOOL_CALL_RULES: readonly ToolCallRule[] = [
  taggedToolCall,
  nestedToolCall,
  bareTool,
  functionCall,
];
