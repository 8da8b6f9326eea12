import type { ResponseChild } from "../ast/ResponseNodes.js";

export type DiagnosticSeverity = "info" | "warning" | "error";

export type CompilationPhase = "lexical" | "parsing" | "semantic" | "optimization" | "validation";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  phase: CompilationPhase;
  line?: number;
  column?: number;
  node?: ResponseChild;
}

export const SEVERITY_RANK: Record<DiagnosticSeverity, number> = {
  info: 0,
  warning: 1,
  error: 2,
};

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((diagnostic) => diagnostic.severity === "error");

export const countBySeverity = (
  diagnostics: readonly Diagnostic[],
): Record<DiagnosticSeverity, number> => {
  const counts: Record<DiagnosticSeverity, number> = { info: 0, warning: 0, error: 0 };
  for (const diagnostic of diagnostics) {
    counts[diagnostic.severity] += 1;
  }
  return counts;
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const location =
    diagnostic.line !== undefined
      ? `:${diagnostic.line}${diagnostic.column !== undefined ? `:${diagnostic.column}` : ""}`
      : "";
  return `[${diagnostic.phase}${location}] ${diagnostic.severity}: ${diagnostic.message}`;
};
