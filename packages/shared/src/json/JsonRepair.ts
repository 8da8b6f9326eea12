import { jsonrepair } from "jsonrepair";
import { noopLogger, type EventLogger } from "../logging/EventLogger.js";
import { toJsonValue, type JsonValue } from "./JsonValue.js";

export interface RepairOutcome {
  ok: boolean;
  repaired: string;
}

/**
 * Best-effort JSON parsing for model output. Implementations never throw.
 */
export interface JsonRepair {
  safeParse(json: string): JsonValue | undefined;
  safeParse<T extends JsonValue>(json: string, guard: (value: JsonValue) => value is T): T | undefined;
  tryRepair(raw: string): RepairOutcome;
  isCompleteJson(text: string): boolean;
}

const SNIPPET_LIMIT = 200;

const snippet = (value: string): string =>
  value.length > SNIPPET_LIMIT ? `${value.slice(0, SNIPPET_LIMIT)}...` : value;

const parseStrict = (json: string): JsonValue | undefined => {
  try {
    return toJsonValue(JSON.parse(json));
  } catch {
    return undefined;
  }
};

/**
 * True when the text is a single JSON object or array whose braces and brackets
 * all close outside of string literals. Says nothing about validity otherwise.
 */
export const isCompleteJson = (text: string): boolean => {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) return false;
  let depth = 0;
  let inString = false;
  let escape = false;
  for (const ch of trimmed) {
    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }
    if (ch === "\"") {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      depth += 1;
    } else if (ch === "}" || ch === "]") {
      depth -= 1;
      if (depth < 0) return false;
    }
  }
  return depth === 0 && !inString;
};

export class JsonRepairService implements JsonRepair {
  private logger: EventLogger;

  constructor(logger: EventLogger = noopLogger) {
    this.logger = logger;
  }

  safeParse(json: string): JsonValue | undefined;
  safeParse<T extends JsonValue>(json: string, guard: (value: JsonValue) => value is T): T | undefined;
  safeParse(json: string, guard?: (value: JsonValue) => boolean): JsonValue | undefined {
    if (!json.trim()) return undefined;
    const accept = (value: JsonValue | undefined): JsonValue | undefined => {
      if (value === undefined) return undefined;
      return !guard || guard(value) ? value : undefined;
    };

    const direct = parseStrict(json);
    if (direct !== undefined) return accept(direct);

    const outcome = this.tryRepair(json);
    if (!outcome.ok) {
      this.logger.log("json_repair_failed", { snippet: snippet(json) });
      return undefined;
    }
    return accept(parseStrict(outcome.repaired));
  }

  tryRepair(raw: string): RepairOutcome {
    if (!raw.trim()) return { ok: false, repaired: raw };
    try {
      const repaired = jsonrepair(raw);
      if (parseStrict(repaired) === undefined) {
        return { ok: false, repaired: raw };
      }
      if (repaired !== raw) {
        this.logger.log("json_repaired", {
          originalLength: raw.length,
          repairedLength: repaired.length,
        });
      }
      return { ok: true, repaired };
    } catch (error) {
      this.logger.log("json_repair_error", {
        error: error instanceof Error ? error.message : String(error),
        snippet: snippet(raw),
      });
      return { ok: false, repaired: raw };
    }
  }

  isCompleteJson(text: string): boolean {
    return isCompleteJson(text);
  }
}
