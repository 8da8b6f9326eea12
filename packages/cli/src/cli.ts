#!/usr/bin/env -S node --import tsx
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { isJsonObject, toJsonValue } from "@respc/shared";
import { CompileCommand } from "./cli/CompileCommand.js";

const HELP_TEXT =
  "Usage: respc compile [file] [options]\n" +
  "\n" +
  "Reads a model response from <file> (or stdin) and prints the rendered output.\n" +
  "\n" +
  "Commands:\n" +
  "  compile   Compile one response.\n" +
  "\n" +
  "Options:\n" +
  "  --provider <name>         Model provider used to pick the parser\n" +
  "  --model <name>            Model name used to pick the parser\n" +
  "  --config <path>           Config file (default respc.config.{yaml,yml,json})\n" +
  "  --strict                  Treat parameter type mismatches as errors\n" +
  "  --preserve-thoughts       Keep thought blocks in the tree\n" +
  "  --no-optimize             Skip the optimizer\n" +
  "  --no-normalize-paths      Keep file paths as written\n" +
  "  --stop-on-lexical-errors  Stop after a lexical error\n" +
  "  --detect-hallucinations   Run the hallucination checks\n" +
  "  --chunk-size <n>          Compile incrementally, <n> characters at a time\n" +
  "  --format <text|json>      Output format (default text)\n" +
  "  --log-dir <dir>           Append a JSONL run log under <dir>\n" +
  "  --allow-errors            Exit 0 even when compilation fails\n" +
  "  --help, -h                Show help\n" +
  "  --version, -v             Show version\n";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

const readVersion = (): string => {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  if (!fs.existsSync(pkgPath)) return "dev";
  const pkg = toJsonValue(JSON.parse(fs.readFileSync(pkgPath, "utf8")));
  return isJsonObject(pkg) && typeof pkg.version === "string" ? pkg.version : "dev";
};

export const runCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  if (argv.includes("--help") || argv.includes("-h") || argv.length === 0) {
    // eslint-disable-next-line no-console
    console.log(HELP_TEXT);
    return;
  }

  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    // eslint-disable-next-line no-console
    console.log(readVersion());
    return;
  }

  if (command === "compile") {
    process.exitCode = await CompileCommand.run(rest);
    return;
  }

  throw new Error(HELP_TEXT);
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
