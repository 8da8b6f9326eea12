import { noopLogger, type EventLogger, type JsonRepair } from "@respc/shared";
import { createResponse, type ResponseNode } from "../ast/ResponseNodes.js";
import { createEmptySummary, SemanticAnalyzer, type SemanticSummary } from "../analysis/SemanticAnalyzer.js";
import type { ToolSchemaCatalog } from "../analysis/ToolSchemas.js";
import { countBySeverity, hasErrors, type CompilationPhase, type Diagnostic } from "../diagnostics/Diagnostic.js";
import { createInternalFault } from "../errors/CompilerErrors.js";
import { ResponseLexer } from "../lexer/ResponseLexer.js";
import type { Token } from "../lexer/Token.js";
import { AstOptimizer } from "../optimizer/AstOptimizer.js";
import { defaultParserRegistry, type ParserRegistry } from "../parsers/ParserRegistry.js";
import type { ResponseParser } from "../parsers/ResponseParser.js";
import { HallucinationDetector } from "../validation/HallucinationDetector.js";
import { resolveCompilerOptions, type CompilerOptions } from "./CompilerOptions.js";

export interface CompilationResult {
  success: boolean;
  tokens: Token[];
  tree: ResponseNode;
  summary: SemanticSummary;
  diagnostics: Diagnostic[];
  /** Wall-clock milliseconds; the only field that differs between identical compiles. */
  compilationTimeMs: number;
  parser: string;
}

/** Per-call options. The parser is chosen at construction, so provider and model are fixed. */
export type CompileOverrides = Partial<Omit<CompilerOptions, "modelProvider" | "modelName">>;

export interface IncrementalUpdate {
  chunkIndex: number;
  bufferLength: number;
  /** Tokens and diagnostics past the counts of the previous update. */
  newTokens: Token[];
  newDiagnostics: Diagnostic[];
  result: CompilationResult;
}

export interface IncrementalOptions {
  signal?: AbortSignal;
  onUpdate?: (update: IncrementalUpdate) => void;
}

export interface ResponseCompilerDependencies {
  registry?: ParserRegistry;
  schemas?: ToolSchemaCatalog;
  repair?: JsonRepair;
  logger?: EventLogger;
  clock?: () => number;
}

/**
 * Runs lex, parse, analyze, optimize and validate over one response. Not
 * safe for concurrent use: it keeps the last result and incremental state
 * per call.
 */
export class ResponseCompiler {
  readonly options: CompilerOptions;
  private readonly lexer = new ResponseLexer();
  private readonly parser: ResponseParser;
  private readonly analyzer: SemanticAnalyzer;
  private readonly optimizer = new AstOptimizer();
  private readonly detector: HallucinationDetector;
  private readonly logger: EventLogger;
  private readonly clock: () => number;
  private last?: CompilationResult;

  constructor(options: Partial<CompilerOptions> = {}, deps: ResponseCompilerDependencies = {}) {
    this.options = resolveCompilerOptions(options);
    this.logger = deps.logger ?? noopLogger;
    this.clock = deps.clock ?? (() => performance.now());
    const registry = deps.registry ?? defaultParserRegistry;
    this.parser = registry.create(
      { provider: this.options.modelProvider, model: this.options.modelName },
      deps.repair ? { repair: deps.repair, logger: this.logger } : { logger: this.logger },
    );
    this.analyzer = new SemanticAnalyzer(deps.schemas ? { schemas: deps.schemas } : {});
    this.detector = new HallucinationDetector(this.logger);
  }

  get parserName(): string {
    return this.parser.name;
  }

  get lastResult(): CompilationResult | undefined {
    return this.last;
  }

  compile(text: string, overrides: CompileOverrides = {}): CompilationResult {
    const options = resolveCompilerOptions(overrides, this.options);
    const started = this.clock();
    const diagnostics: Diagnostic[] = [];
    let tokens: Token[] = [];
    let tree = createResponse({
      modelProvider: options.modelProvider,
      modelName: options.modelName,
      length: text.length,
    });
    let summary = createEmptySummary();
    let phase: CompilationPhase = "lexical";

    const finish = (): CompilationResult => {
      const result: CompilationResult = {
        success: !hasErrors(diagnostics),
        tokens,
        tree,
        summary,
        diagnostics,
        compilationTimeMs: this.clock() - started,
        parser: this.parser.name,
      };
      this.logger.log("compile_complete", {
        parser: this.parser.name,
        success: result.success,
        length: text.length,
        nodes: tree.children.length,
        ...countBySeverity(diagnostics),
      });
      this.last = result;
      return result;
    };

    try {
      this.logger.log("phase_start", { phase });
      const lexed = this.lexer.tokenize(text);
      tokens = lexed.tokens;
      for (const error of lexed.errors) {
        diagnostics.push({
          severity: error.severity,
          message: error.message,
          phase: "lexical",
          line: error.line,
          column: error.column,
        });
      }
      this.logger.log("phase_end", { phase, tokens: tokens.length, errors: lexed.errors.length });
      if (options.stopOnLexicalErrors && hasErrors(diagnostics)) {
        return finish();
      }

      phase = "parsing";
      this.logger.log("phase_start", { phase, parser: this.parser.name });
      tree = this.parser.parse(text, {
        modelProvider: options.modelProvider,
        modelName: options.modelName,
        preserveThoughts: options.preserveThoughts,
        extractSemantics: options.extractSemantics,
        tokens,
      });
      if (tree.metadata.pendingToolCall) {
        diagnostics.push({
          severity: "info",
          message: "Tool call still streaming; waiting for the rest of the response",
          phase: "parsing",
        });
      }
      this.logger.log("phase_end", { phase, nodes: tree.children.length });

      phase = "semantic";
      this.logger.log("phase_start", { phase });
      const analysis = this.analyzer.analyze(tree, { strictMode: options.strictMode });
      diagnostics.push(...analysis.diagnostics);
      tree = analysis.tree;
      summary = analysis.summary;
      this.logger.log("phase_end", { phase, diagnostics: analysis.diagnostics.length });

      if (options.enableOptimizations) {
        phase = "optimization";
        this.logger.log("phase_start", { phase });
        const optimized = this.optimizer.optimize(tree, { normalizeFilePaths: options.normalizeFilePaths });
        for (const diagnostic of optimized.diagnostics) {
          this.logger.log("duplicate_dropped", { message: diagnostic.message });
        }
        diagnostics.push(...optimized.diagnostics);
        tree = optimized.tree;
        this.logger.log("phase_end", { phase, nodes: tree.children.length });
      }

      phase = "validation";
      this.logger.log("phase_start", { phase });
      const validation = this.parser.validate(tree, { strictMode: options.strictMode });
      for (const issue of validation.issues) {
        diagnostics.push(
          issue.node
            ? { severity: issue.severity, message: issue.message, phase, node: issue.node }
            : { severity: issue.severity, message: issue.message, phase },
        );
      }
      if (options.detectHallucinations) {
        const hadToolCalls = tree.children.some((node) => node.kind === "tool_call");
        const report = this.detector.check(text, hadToolCalls);
        for (const issue of report.issues) {
          diagnostics.push({ severity: "warning", message: issue, phase });
        }
      }
      this.logger.log("phase_end", { phase, issues: validation.issues.length });
    } catch (error) {
      const fault = createInternalFault(error, phase);
      this.logger.log("internal_fault", { phase, message: fault.message });
      diagnostics.push({ severity: "error", message: `Internal compiler error: ${fault.message}`, phase });
    }
    return finish();
  }

  /**
   * Recompiles the growing buffer after every chunk. The returned result is
   * the compilation of everything received before the source ended or the
   * signal aborted.
   */
  async compileIncremental(
    chunks: AsyncIterable<string> | Iterable<string>,
    overrides: CompileOverrides = {},
    incremental: IncrementalOptions = {},
  ): Promise<CompilationResult> {
    let buffer = "";
    let lastTokenCount = 0;
    let lastDiagnosticCount = 0;
    let chunkIndex = 0;
    let result: CompilationResult | undefined;

    for await (const chunk of chunks) {
      if (incremental.signal?.aborted) break;
      buffer += chunk;
      result = this.compile(buffer, overrides);
      const update: IncrementalUpdate = {
        chunkIndex,
        bufferLength: buffer.length,
        newTokens: result.tokens.slice(lastTokenCount),
        newDiagnostics: result.diagnostics.slice(lastDiagnosticCount),
        result,
      };
      lastTokenCount = result.tokens.length;
      lastDiagnosticCount = result.diagnostics.length;
      chunkIndex += 1;
      this.logger.log("incremental_update", {
        chunkIndex: update.chunkIndex,
        bufferLength: update.bufferLength,
        newTokens: update.newTokens.length,
        newDiagnostics: update.newDiagnostics.length,
      });
      incremental.onUpdate?.(update);
      if (incremental.signal?.aborted) break;
    }
    return result ?? this.compile(buffer, overrides);
  }
}
