import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { text as readStream } from "node:stream/consumers";
import {
  AstRenderer,
  CompilationTrace,
  createCompilationFailure,
  formatDiagnostic,
  ResponseCompiler,
  type CompilationResult,
  type Diagnostic,
  type IncrementalUpdate,
} from "@respc/compiler";
import { toCompilerOptions, toRenderOptions, type ConfigSource, type OutputFormat } from "../config/Config.js";
import { loadConfig } from "../config/ConfigLoader.js";
import { RunLogger } from "../runtime/RunLogger.js";

export interface ParsedArgs {
  file?: string;
  configPath?: string;
  provider?: string;
  model?: string;
  strict?: boolean;
  preserveThoughts?: boolean;
  optimize?: boolean;
  normalizePaths?: boolean;
  stopOnLexicalErrors?: boolean;
  detectHallucinations?: boolean;
  chunkSize?: number;
  format?: OutputFormat;
  logDir?: string;
  allowErrors: boolean;
}

export interface CompileCommandIo {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  readStdin?: () => Promise<string>;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  runId?: string;
}

const VALUE_FLAGS = ["--provider", "--model", "--config", "--chunk-size", "--format", "--log-dir"];

export const parseArgs = (argv: string[]): ParsedArgs => {
  const parsed: ParsedArgs = { allowErrors: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (VALUE_FLAGS.includes(arg)) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Missing value for ${arg}`);
      }
      i += 1;
      if (arg === "--provider") parsed.provider = next;
      else if (arg === "--model") parsed.model = next;
      else if (arg === "--config") parsed.configPath = next;
      else if (arg === "--log-dir") parsed.logDir = next;
      else if (arg === "--format") {
        if (next !== "text" && next !== "json") throw new Error(`Invalid --format: expected text or json.`);
        parsed.format = next;
      } else {
        const size = Number(next);
        if (!Number.isFinite(size)) throw new Error("Invalid --chunk-size: expected number.");
        parsed.chunkSize = size;
      }
      continue;
    }
    if (arg === "--strict") {
      parsed.strict = true;
      continue;
    }
    if (arg === "--preserve-thoughts") {
      parsed.preserveThoughts = true;
      continue;
    }
    if (arg === "--no-optimize") {
      parsed.optimize = false;
      continue;
    }
    if (arg === "--no-normalize-paths") {
      parsed.normalizePaths = false;
      continue;
    }
    if (arg === "--stop-on-lexical-errors") {
      parsed.stopOnLexicalErrors = true;
      continue;
    }
    if (arg === "--detect-hallucinations") {
      parsed.detectHallucinations = true;
      continue;
    }
    if (arg === "--allow-errors") {
      parsed.allowErrors = true;
      continue;
    }
    if (arg.startsWith("-") && arg !== "-") {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (parsed.file !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    parsed.file = arg;
  }
  return parsed;
};

const toConfigSource = (parsed: ParsedArgs): ConfigSource => {
  const source: ConfigSource = {};
  if (parsed.provider !== undefined) source.provider = parsed.provider;
  if (parsed.model !== undefined) source.model = parsed.model;
  if (parsed.strict !== undefined) source.strict = parsed.strict;
  if (parsed.preserveThoughts !== undefined) source.preserveThoughts = parsed.preserveThoughts;
  if (parsed.optimize !== undefined) source.optimize = parsed.optimize;
  if (parsed.normalizePaths !== undefined) source.normalizePaths = parsed.normalizePaths;
  if (parsed.stopOnLexicalErrors !== undefined) source.stopOnLexicalErrors = parsed.stopOnLexicalErrors;
  if (parsed.detectHallucinations !== undefined) source.detectHallucinations = parsed.detectHallucinations;
  if (parsed.chunkSize !== undefined) source.chunkSize = parsed.chunkSize;
  if (parsed.format !== undefined) source.format = parsed.format;
  if (parsed.logDir !== undefined) source.logDir = parsed.logDir;
  return source;
};

export function* chunkText(input: string, size: number): Generator<string> {
  for (let offset = 0; offset < input.length; offset += size) {
    yield input.slice(offset, offset + size);
  }
}

const describeUpdate = (update: IncrementalUpdate): string =>
  `[chunk ${update.chunkIndex + 1}] ${update.bufferLength} chars, ` +
  `+${update.newTokens.length} tokens, +${update.newDiagnostics.length} diagnostics`;

const plainDiagnostic = (diagnostic: Diagnostic) => ({
  severity: diagnostic.severity,
  message: diagnostic.message,
  phase: diagnostic.phase,
  line: diagnostic.line,
  column: diagnostic.column,
});

export class CompileCommand {
  static async run(argv: string[], io: CompileCommandIo = {}): Promise<number> {
    const parsed = parseArgs(argv);
    const cwd = io.cwd ?? process.cwd();
    const stdout = io.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
    const stderr = io.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));
    const config = await loadConfig({
      cwd,
      env: io.env,
      configPath: parsed.configPath,
      cli: toConfigSource(parsed),
    });

    const input =
      parsed.file !== undefined && parsed.file !== "-"
        ? await readFile(path.resolve(cwd, parsed.file), "utf8")
        : await (io.readStdin ?? (() => readStream(process.stdin)))();

    const trace = new CompilationTrace();
    const compiler = new ResponseCompiler(toCompilerOptions(config), { logger: trace });
    let result: CompilationResult;
    if (config.chunkSize !== undefined) {
      result = await compiler.compileIncremental(chunkText(input, config.chunkSize), {}, {
        onUpdate: (update) => stderr(describeUpdate(update)),
      });
    } else {
      result = compiler.compile(input);
    }

    const rendered = new AstRenderer().render(result.tree, toRenderOptions(config));
    if (config.format === "json") {
      stdout(
        JSON.stringify(
          {
            success: result.success,
            parser: result.parser,
            text: rendered.text,
            toolInvocations: rendered.toolInvocations,
            summary: result.summary,
            diagnostics: result.diagnostics.map(plainDiagnostic),
          },
          null,
          2,
        ),
      );
    } else {
      if (rendered.text) stdout(rendered.text);
      for (const invocation of rendered.toolInvocations) {
        stdout(`-> ${invocation.toolName} ${JSON.stringify(invocation.arguments)}`);
      }
      for (const diagnostic of result.diagnostics) {
        stderr(formatDiagnostic(diagnostic));
      }
    }

    if (config.logDir) {
      const logger = new RunLogger(cwd, config.logDir, io.runId ?? randomUUID());
      await logger.append(trace.drain());
      await logger.log("run_complete", {
        success: result.success,
        parser: result.parser,
        inputLength: input.length,
        chunkSize: config.chunkSize ?? null,
        diagnostics: result.diagnostics.length,
        toolCalls: rendered.toolInvocations.length,
      });
    }

    const failure = createCompilationFailure(result.diagnostics);
    if (failure && !parsed.allowErrors) {
      stderr(failure.message);
      return 1;
    }
    return 0;
  }
}
