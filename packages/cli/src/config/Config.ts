import type { CompilerOptions, NodeKind, RenderOptions, Visibility } from "@respc/compiler";

export type OutputFormat = "text" | "json";

export interface RenderConfig {
  visibility: Partial<Record<NodeKind, Visibility>>;
  separator: string;
  jsonIndent: number;
}

export interface RespcConfig {
  provider: string;
  model: string;
  strict: boolean;
  preserveThoughts: boolean;
  optimize: boolean;
  normalizePaths: boolean;
  stopOnLexicalErrors: boolean;
  detectHallucinations: boolean;
  /** Characters per chunk; set to feed the input through incremental compilation. */
  chunkSize?: number;
  format: OutputFormat;
  logDir?: string;
  render: RenderConfig;
}

export type ConfigSource = Partial<Omit<RespcConfig, "render">> & {
  render?: Partial<RenderConfig>;
};

export const DEFAULT_CONFIG: RespcConfig = {
  provider: "generic",
  model: "unknown",
  strict: false,
  preserveThoughts: false,
  optimize: true,
  normalizePaths: true,
  stopOnLexicalErrors: false,
  detectHallucinations: false,
  format: "text",
  render: {
    visibility: {},
    separator: "\n\n",
    jsonIndent: 2,
  },
};

export const toCompilerOptions = (config: RespcConfig): CompilerOptions => ({
  modelProvider: config.provider,
  modelName: config.model,
  strictMode: config.strict,
  preserveThoughts: config.preserveThoughts,
  enableOptimizations: config.optimize,
  normalizeFilePaths: config.normalizePaths,
  stopOnLexicalErrors: config.stopOnLexicalErrors,
  extractSemantics: true,
  detectHallucinations: config.detectHallucinations,
});

export const toRenderOptions = (config: RespcConfig): RenderOptions => ({
  visibility: config.render.visibility,
  separator: config.render.separator,
  jsonIndent: config.render.jsonIndent,
});
