import type { CompilationPhase, Diagnostic } from "../diagnostics/Diagnostic.js";

export type ResponseCompilerErrorCode =
  | "lexical_error"
  | "extraction_failure"
  | "semantic_violation"
  | "internal_fault";

export type ResponseCompilerErrorDetails = Record<string, unknown>;

type ResponseCompilerErrorInput = {
  code: ResponseCompilerErrorCode;
  message: string;
  details?: ResponseCompilerErrorDetails;
  cause?: unknown;
  name?: string;
};

export class ResponseCompilerError extends Error {
  readonly code: ResponseCompilerErrorCode;
  readonly details?: ResponseCompilerErrorDetails;

  constructor({ code, message, details, cause, name }: ResponseCompilerErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = name ?? "ResponseCompilerError";
    this.code = code;
    this.details = details;
  }
}

export const isResponseCompilerError = (value: unknown): value is ResponseCompilerError =>
  value instanceof ResponseCompilerError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Wraps whatever escaped a phase; the orchestrator reports it as one diagnostic. */
export const createInternalFault = (error: unknown, phase?: string): ResponseCompilerError => {
  if (isResponseCompilerError(error) && error.code === "internal_fault") return error;
  return new ResponseCompilerError({
    code: "internal_fault",
    message: errorMessage(error),
    details: phase ? { phase } : undefined,
    cause: error,
    name: "InternalCompilerFault",
  });
};

export const createExtractionFailure = (input: {
  rule: string;
  start: number;
  end: number;
  reason: string;
}): ResponseCompilerError =>
  new ResponseCompilerError({
    code: "extraction_failure",
    message: `Tool call candidate rejected by ${input.rule}: ${input.reason}`,
    details: { rule: input.rule, start: input.start, end: input.end, reason: input.reason },
    name: "ExtractionFailure",
  });

const CODE_BY_PHASE: Record<CompilationPhase, ResponseCompilerErrorCode> = {
  lexical: "lexical_error",
  parsing: "internal_fault",
  semantic: "semantic_violation",
  optimization: "internal_fault",
  validation: "semantic_violation",
};

/**
 * The error a host raises for a failed compilation, coded by the phase of the
 * first error diagnostic. Undefined when nothing failed.
 */
export const createCompilationFailure = (diagnostics: readonly Diagnostic[]): ResponseCompilerError | undefined => {
  const errors = diagnostics.filter((diagnostic) => diagnostic.severity === "error");
  if (errors.length === 0) return undefined;
  const [first] = errors;
  const location = first.line !== undefined ? ` (line ${first.line})` : "";
  return new ResponseCompilerError({
    code: CODE_BY_PHASE[first.phase],
    message: `Compilation failed with ${errors.length} error(s): ${first.message}${location}`,
    details: { phase: first.phase, errors: errors.length },
    name: "CompilationFailure",
  });
};
