import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { NODE_KINDS, type NodeKind, type Visibility } from "@respc/compiler";
import { isJsonObject, toJsonValue, type JsonObject } from "@respc/shared";
import {
  DEFAULT_CONFIG,
  type ConfigSource,
  type OutputFormat,
  type RenderConfig,
  type RespcConfig,
} from "./Config.js";

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

const CONFIG_CANDIDATES = ["respc.config.yaml", "respc.config.yml", "respc.config.json"];

const VISIBILITIES: readonly Visibility[] = ["hidden", "summary", "full"];

const isNodeKind = (value: string): value is NodeKind => NODE_KINDS.some((kind) => kind === value);

const isVisibility = (value: string): value is Visibility =>
  VISIBILITIES.some((visibility) => visibility === value);

const isOutputFormat = (value: string): value is OutputFormat => value === "text" || value === "json";

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`Invalid ${label}: expected boolean.`);
};

const readString = (source: JsonObject, key: string): string | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new Error(`Invalid ${key}: expected string.`);
  return value;
};

const readBoolean = (source: JsonObject, key: string): boolean | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new Error(`Invalid ${key}: expected boolean.`);
  return value;
};

const readNumber = (source: JsonObject, key: string): number | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") throw new Error(`Invalid ${key}: expected number.`);
  return value;
};

const parseFormat = (value: string | undefined, label: string): OutputFormat | undefined => {
  if (value === undefined) return undefined;
  if (!isOutputFormat(value)) throw new Error(`Invalid ${label}: expected text or json.`);
  return value;
};

const parseVisibility = (value: JsonObject): Partial<Record<NodeKind, Visibility>> => {
  const visibility: Partial<Record<NodeKind, Visibility>> = {};
  for (const [kind, mode] of Object.entries(value)) {
    if (!isNodeKind(kind)) throw new Error(`Invalid render.visibility: unknown node kind ${kind}.`);
    if (typeof mode !== "string" || !isVisibility(mode)) {
      throw new Error(`Invalid render.visibility.${kind}: expected hidden, summary or full.`);
    }
    visibility[kind] = mode;
  }
  return visibility;
};

const parseRender = (value: JsonObject): Partial<RenderConfig> => {
  const render: Partial<RenderConfig> = {};
  const visibility = value.visibility;
  if (visibility !== undefined && visibility !== null) {
    if (!isJsonObject(visibility)) throw new Error("Invalid render.visibility: expected object.");
    render.visibility = parseVisibility(visibility);
  }
  const separator = readString(value, "separator");
  if (separator !== undefined) render.separator = separator;
  const jsonIndent = readNumber(value, "jsonIndent");
  if (jsonIndent !== undefined) render.jsonIndent = jsonIndent;
  return render;
};

/** Validates a parsed config document field by field. */
export const parseConfigSource = (raw: unknown): ConfigSource => {
  if (raw === undefined || raw === null) return {};
  const value = toJsonValue(raw);
  if (!isJsonObject(value)) throw new Error("Invalid config: expected an object at the top level.");

  const source: ConfigSource = {};
  const provider = readString(value, "provider");
  if (provider !== undefined) source.provider = provider;
  const model = readString(value, "model");
  if (model !== undefined) source.model = model;
  const strict = readBoolean(value, "strict");
  if (strict !== undefined) source.strict = strict;
  const preserveThoughts = readBoolean(value, "preserveThoughts");
  if (preserveThoughts !== undefined) source.preserveThoughts = preserveThoughts;
  const optimize = readBoolean(value, "optimize");
  if (optimize !== undefined) source.optimize = optimize;
  const normalizePaths = readBoolean(value, "normalizePaths");
  if (normalizePaths !== undefined) source.normalizePaths = normalizePaths;
  const stopOnLexicalErrors = readBoolean(value, "stopOnLexicalErrors");
  if (stopOnLexicalErrors !== undefined) source.stopOnLexicalErrors = stopOnLexicalErrors;
  const detectHallucinations = readBoolean(value, "detectHallucinations");
  if (detectHallucinations !== undefined) source.detectHallucinations = detectHallucinations;
  const chunkSize = readNumber(value, "chunkSize");
  if (chunkSize !== undefined) source.chunkSize = chunkSize;
  const format = parseFormat(readString(value, "format"), "format");
  if (format !== undefined) source.format = format;
  const logDir = readString(value, "logDir");
  if (logDir !== undefined) source.logDir = logDir;

  const render = value.render;
  if (render !== undefined && render !== null) {
    if (!isJsonObject(render)) throw new Error("Invalid render: expected object.");
    source.render = parseRender(render);
  }
  return source;
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_CANDIDATES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath: string): Promise<ConfigSource> => {
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return {};
  const raw: unknown = configPath.endsWith(".json") ? JSON.parse(content) : YAML.parse(content);
  return parseConfigSource(raw);
};

export const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const source: ConfigSource = {};
  if (env.RESPC_PROVIDER) source.provider = env.RESPC_PROVIDER;
  if (env.RESPC_MODEL) source.model = env.RESPC_MODEL;
  const strict = parseBooleanStrict(env.RESPC_STRICT, "RESPC_STRICT");
  if (strict !== undefined) source.strict = strict;
  const preserveThoughts = parseBooleanStrict(env.RESPC_PRESERVE_THOUGHTS, "RESPC_PRESERVE_THOUGHTS");
  if (preserveThoughts !== undefined) source.preserveThoughts = preserveThoughts;
  const optimize = parseBooleanStrict(env.RESPC_OPTIMIZE, "RESPC_OPTIMIZE");
  if (optimize !== undefined) source.optimize = optimize;
  const normalizePaths = parseBooleanStrict(env.RESPC_NORMALIZE_PATHS, "RESPC_NORMALIZE_PATHS");
  if (normalizePaths !== undefined) source.normalizePaths = normalizePaths;
  const stopOnLexicalErrors = parseBooleanStrict(
    env.RESPC_STOP_ON_LEXICAL_ERRORS,
    "RESPC_STOP_ON_LEXICAL_ERRORS",
  );
  if (stopOnLexicalErrors !== undefined) source.stopOnLexicalErrors = stopOnLexicalErrors;
  const detectHallucinations = parseBooleanStrict(
    env.RESPC_DETECT_HALLUCINATIONS,
    "RESPC_DETECT_HALLUCINATIONS",
  );
  if (detectHallucinations !== undefined) source.detectHallucinations = detectHallucinations;
  const chunkSize = parseNumberStrict(env.RESPC_CHUNK_SIZE, "RESPC_CHUNK_SIZE");
  if (chunkSize !== undefined) source.chunkSize = chunkSize;
  if (env.RESPC_LOG_DIR) source.logDir = env.RESPC_LOG_DIR;
  return source;
};

const pick = <K extends keyof ConfigSource>(
  key: K,
  sources: ConfigSource[],
): ConfigSource[K] | undefined => {
  for (const source of sources) {
    const value = source[key];
    if (value !== undefined) return value;
  }
  return undefined;
};

/** Merges defaults < config file < environment < command line. */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<RespcConfig> => {
  const cwd = options.cwd ?? process.cwd();
  let configPath: string | undefined;
  if (options.configPath) {
    configPath = path.resolve(cwd, options.configPath);
    if (!existsSync(configPath)) throw new Error(`Config file not found: ${configPath}`);
  } else {
    configPath = findConfigFile(cwd);
  }

  const file = configPath ? await readConfigFile(configPath) : {};
  const env = loadEnvConfig(options.env ?? process.env);
  const cli = options.cli ?? {};
  // Highest precedence first.
  const sources = [cli, env, file];

  const chunkSize = pick("chunkSize", sources);
  if (chunkSize !== undefined && (!Number.isInteger(chunkSize) || chunkSize <= 0)) {
    throw new Error("Invalid chunkSize: expected a positive integer.");
  }
  const jsonIndent = cli.render?.jsonIndent ?? file.render?.jsonIndent ?? DEFAULT_CONFIG.render.jsonIndent;
  if (!Number.isInteger(jsonIndent) || jsonIndent < 0) {
    throw new Error("Invalid render.jsonIndent: expected a non-negative integer.");
  }
  const logDir = pick("logDir", sources);

  return {
    provider: pick("provider", sources) ?? DEFAULT_CONFIG.provider,
    model: pick("model", sources) ?? DEFAULT_CONFIG.model,
    strict: pick("strict", sources) ?? DEFAULT_CONFIG.strict,
    preserveThoughts: pick("preserveThoughts", sources) ?? DEFAULT_CONFIG.preserveThoughts,
    optimize: pick("optimize", sources) ?? DEFAULT_CONFIG.optimize,
    normalizePaths: pick("normalizePaths", sources) ?? DEFAULT_CONFIG.normalizePaths,
    stopOnLexicalErrors: pick("stopOnLexicalErrors", sources) ?? DEFAULT_CONFIG.stopOnLexicalErrors,
    detectHallucinations: pick("detectHallucinations", sources) ?? DEFAULT_CONFIG.detectHallucinations,
    chunkSize,
    format: pick("format", sources) ?? DEFAULT_CONFIG.format,
    logDir: logDir ? path.resolve(cwd, logDir) : undefined,
    render: {
      visibility: {
        ...DEFAULT_CONFIG.render.visibility,
        ...file.render?.visibility,
        ...cli.render?.visibility,
      },
      separator: cli.render?.separator ?? file.render?.separator ?? DEFAULT_CONFIG.render.separator,
      jsonIndent,
    },
  };
};
