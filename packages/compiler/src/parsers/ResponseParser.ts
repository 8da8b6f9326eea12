import type { JsonRepair, EventLogger } from "@respc/shared";
import type { ResponseChild, ResponseNode } from "../ast/ResponseNodes.js";
import type { DiagnosticSeverity } from "../diagnostics/Diagnostic.js";
import type { Token } from "../lexer/Token.js";

export interface ParserContext {
  modelProvider: string;
  modelName: string;
  preserveThoughts: boolean;
  extractSemantics: boolean;
  /** Tokens from the lexer; parsers lex the text themselves when absent. */
  tokens?: readonly Token[];
}

export interface ParserCapabilities {
  dialect: string;
  toolCallRules: string[];
  scrubRules: string[];
  toolResults: boolean;
  thoughts: boolean;
  codeBlocks: boolean;
  semanticElements: boolean;
}

export interface ValidationIssue {
  severity: DiagnosticSeverity;
  message: string;
  node?: ResponseChild;
}

export interface ValidationResult {
  isValid: boolean;
  issues: ValidationIssue[];
}

export interface ValidationOptions {
  strictMode?: boolean;
}

/** One model family's way of reading a response. Never throws. */
export interface ResponseParser {
  readonly name: string;
  parse(text: string, context: ParserContext): ResponseNode;
  validate(tree: ResponseNode, options?: ValidationOptions): ValidationResult;
  capabilities(): ParserCapabilities;
}

export interface ParserDependencies {
  repair: JsonRepair;
  logger: EventLogger;
}
