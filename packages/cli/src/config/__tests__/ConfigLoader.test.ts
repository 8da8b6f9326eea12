import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG, toCompilerOptions } from "../Config.js";
import { loadConfig, loadEnvConfig, parseConfigSource } from "../ConfigLoader.js";

const tempDir = (): string => mkdtempSync(path.join(os.tmpdir(), "respc-config-"));

test("loadConfig falls back to defaults without a file", { concurrency: false }, async () => {
  const config = await loadConfig({ cwd: tempDir(), env: {} });
  assert.deepEqual(config, { ...DEFAULT_CONFIG, chunkSize: undefined, logDir: undefined });
  assert.deepEqual(toCompilerOptions(config), {
    modelProvider: "generic",
    modelName: "unknown",
    strictMode: false,
    preserveThoughts: false,
    enableOptimizations: true,
    normalizeFilePaths: true,
    stopOnLexicalErrors: false,
    extractSemantics: true,
    detectHallucinations: false,
  });
});

test("loadConfig merges cli over env over a yaml file", { concurrency: false }, async () => {
  const tmpDir = tempDir();
  writeFileSync(
    path.join(tmpDir, "respc.config.yaml"),
    [
      "provider: file-provider",
      "model: file-model",
      "strict: true",
      "chunkSize: 16",
      "logDir: logs",
      "render:",
      "  separator: \"\\n\"",
      "  visibility:",
      "    tool_call: full",
      "    code: summary",
    ].join("\n"),
  );

  const config = await loadConfig({
    cwd: tmpDir,
    env: { RESPC_MODEL: "env-model", RESPC_STRICT: "off", RESPC_CHUNK_SIZE: "32" },
    cli: { model: "cli-model", render: { visibility: { code: "full" } } },
  });

  assert.equal(config.provider, "file-provider");
  assert.equal(config.model, "cli-model");
  assert.equal(config.strict, false);
  assert.equal(config.chunkSize, 32);
  assert.equal(config.logDir, path.join(tmpDir, "logs"));
  assert.deepEqual(config.render, {
    visibility: { tool_call: "full", code: "full" },
    separator: "\n",
    jsonIndent: 2,
  });
});

test("an explicit json config path is read relative to cwd", { concurrency: false }, async () => {
  const tmpDir = tempDir();
  writeFileSync(path.join(tmpDir, "custom.json"), JSON.stringify({ format: "json", optimize: false }));
  const config = await loadConfig({ cwd: tmpDir, env: {}, configPath: "custom.json" });
  assert.equal(config.format, "json");
  assert.equal(config.optimize, false);

  await assert.rejects(
    loadConfig({ cwd: tmpDir, env: {}, configPath: "missing.yaml" }),
    /Config file not found: .*missing\.yaml/,
  );
});

test("environment values are parsed strictly", { concurrency: false }, () => {
  assert.deepEqual(
    loadEnvConfig({
      RESPC_PROVIDER: "qwen",
      RESPC_DETECT_HALLUCINATIONS: "yes",
      RESPC_NORMALIZE_PATHS: "0",
      RESPC_LOG_DIR: "/tmp/respc",
    }),
    { provider: "qwen", normalizePaths: false, detectHallucinations: true, logDir: "/tmp/respc" },
  );
  assert.throws(() => loadEnvConfig({ RESPC_STRICT: "maybe" }), /Invalid RESPC_STRICT: expected boolean\./);
  assert.throws(() => loadEnvConfig({ RESPC_CHUNK_SIZE: "big" }), /Invalid RESPC_CHUNK_SIZE: expected number\./);
});

test("invalid config values name the field", { concurrency: false }, async () => {
  assert.throws(() => parseConfigSource(["a"]), /Invalid config: expected an object/);
  assert.throws(() => parseConfigSource({ strict: "yes" }), /Invalid strict: expected boolean\./);
  assert.throws(() => parseConfigSource({ format: "xml" }), /Invalid format: expected text or json\./);
  assert.throws(
    () => parseConfigSource({ render: { visibility: { code: "loud" } } }),
    /Invalid render\.visibility\.code: expected hidden, summary or full\./,
  );
  assert.throws(
    () => parseConfigSource({ render: { visibility: { widget: "full" } } }),
    /unknown node kind widget/,
  );
  assert.deepEqual(parseConfigSource(null), {});

  await assert.rejects(
    loadConfig({ cwd: tempDir(), env: {}, cli: { chunkSize: 0 } }),
    /Invalid chunkSize: expected a positive integer\./,
  );
});
