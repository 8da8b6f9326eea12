import { BaseResponseParser } from "./BaseResponseParser.js";
import { GENERIC_SCRUB_RULES } from "./ScrubRules.js";
import { bareTool, functionCall, nestedToolCall } from "./ToolCallRules.js";

/** Plain-text models that write tool calls as bare JSON objects. */
export class GenericParser extends BaseResponseParser {
  readonly name = "generic";
  protected readonly toolCallRules = [nestedToolCall, bareTool, functionCall];
  protected readonly scrubRules = GENERIC_SCRUB_RULES;
}
