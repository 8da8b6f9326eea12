export * from "./ast/ResponseNodes.js";
export * from "./diagnostics/Diagnostic.js";
export * from "./errors/CompilerErrors.js";
export * from "./lexer/Token.js";
export * from "./lexer/ResponseLexer.js";
export * from "./parsers/ResponseParser.js";
export * from "./parsers/ResidualText.js";
export * from "./parsers/ScrubRules.js";
export * from "./parsers/ToolCallRules.js";
export * from "./parsers/SemanticExtraction.js";
export * from "./parsers/BaseResponseParser.js";
export * from "./parsers/GenericParser.js";
export * from "./parsers/TagDialectParser.js";
export * from "./parsers/ParserRegistry.js";
export * from "./analysis/ToolSchemas.js";
export * from "./analysis/BracketBalance.js";
export * from "./analysis/SemanticAnalyzer.js";
export * from "./optimizer/AstOptimizer.js";
export * from "./rendering/AstRenderer.js";
export * from "./validation/HallucinationDetector.js";
export * from "./compiler/CompilerOptions.js";
export * from "./compiler/ResponseCompiler.js";
export * from "./runtime/CompilationTrace.js";
