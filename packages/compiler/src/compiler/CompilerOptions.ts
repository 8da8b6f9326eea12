export interface CompilerOptions {
  modelProvider: string;
  modelName: string;
  strictMode: boolean;
  preserveThoughts: boolean;
  enableOptimizations: boolean;
  normalizeFilePaths: boolean;
  stopOnLexicalErrors: boolean;
  extractSemantics: boolean;
  detectHallucinations: boolean;
}

export const DEFAULT_COMPILER_OPTIONS: CompilerOptions = {
  modelProvider: "generic",
  modelName: "unknown",
  strictMode: false,
  preserveThoughts: false,
  enableOptimizations: true,
  normalizeFilePaths: true,
  stopOnLexicalErrors: false,
  extractSemantics: true,
  detectHallucinations: false,
};

/** Fills every option `overrides` leaves undefined from `base`. */
export const resolveCompilerOptions = (
  overrides: Partial<CompilerOptions> = {},
  base: CompilerOptions = DEFAULT_COMPILER_OPTIONS,
): CompilerOptions => ({
  modelProvider: overrides.modelProvider ?? base.modelProvider,
  modelName: overrides.modelName ?? base.modelName,
  strictMode: overrides.strictMode ?? base.strictMode,
  preserveThoughts: overrides.preserveThoughts ?? base.preserveThoughts,
  enableOptimizations: overrides.enableOptimizations ?? base.enableOptimizations,
  normalizeFilePaths: overrides.normalizeFilePaths ?? base.normalizeFilePaths,
  stopOnLexicalErrors: overrides.stopOnLexicalErrors ?? base.stopOnLexicalErrors,
  extractSemantics: overrides.extractSemantics ?? base.extractSemantics,
  detectHallucinations: overrides.detectHallucinations ?? base.detectHallucinations,
});
