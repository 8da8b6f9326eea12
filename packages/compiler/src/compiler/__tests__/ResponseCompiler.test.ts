import test from "node:test";
import assert from "node:assert/strict";
import { childrenOfKind } from "../../ast/ResponseNodes.js";
import { ParserRegistry } from "../../parsers/ParserRegistry.js";
import type { ResponseParser } from "../../parsers/ResponseParser.js";
import { CompilationTrace } from "../../runtime/CompilationTrace.js";
import { ResponseCompiler, type CompilationResult } from "../ResponseCompiler.js";

const READ_CALL = '{"tool_call":{"name":"read_file","arguments":{"path":"a"}}}';

const STREAMED_RESPONSE = [
  "<thinking>check files</thinking>",
  "I'll read the config first.",
  '<tool_call>{"name":"read_file","arguments":{"path":"/etc/app.json"}}</tool_call>',
  "```ts",
  'const answer = { value: "}" };',
  "```",
  "Edit ./src/main.ts:3 next.",
  "Should I continue?",
].join("\n");

const stable = (result: CompilationResult): Omit<CompilationResult, "compilationTimeMs"> => {
  const { compilationTimeMs: _elapsed, ...rest } = result;
  return rest;
};

const splitEvery = (text: string, size: number): string[] => {
  const chunks: string[] = [];
  for (let index = 0; index < text.length; index += size) {
    chunks.push(text.slice(index, index + size));
  }
  return chunks;
};

test("plain text compiles to a single text node", { concurrency: false }, () => {
  const text = "Hello, this is just a regular response with no tools.";
  const result = new ResponseCompiler().compile(text);
  assert.equal(result.success, true);
  assert.equal(result.parser, "generic");
  assert.deepEqual(
    result.tree.children.map((node) => (node.kind === "text" ? node.content : node.kind)),
    [text],
  );
  assert.deepEqual(result.diagnostics, []);
  assert.equal(result.summary.primaryIntent, "Explanation");
});

test("tag dialect models get their calls extracted", { concurrency: false }, () => {
  const compiler = new ResponseCompiler({ modelProvider: "qwen", modelName: "qwen2.5-coder" });
  assert.equal(compiler.parserName, "tag");
  const result = compiler.compile(
    '<tool_call>\n{"name":"read_file","arguments":{"file_path":"/test/file.txt"}}\n</tool_call>',
  );
  const calls = childrenOfKind(result.tree, "tool_call");
  assert.equal(calls.length, 1);
  assert.equal(calls[0].toolName, "read_file");
  assert.deepEqual(calls[0].arguments, { file_path: "/test/file.txt" });
  assert.equal(result.success, true);
  assert.deepEqual(result.summary.toolsUsed, ["read_file"]);
  assert.deepEqual(result.summary.filesReferenced, ["/test/file.txt"]);
});

test("duplicate calls are removed after analysis", { concurrency: false }, () => {
  const result = new ResponseCompiler().compile(`${READ_CALL}\n${READ_CALL}`);
  assert.equal(childrenOfKind(result.tree, "tool_call").length, 1);
  assert.deepEqual(
    result.diagnostics.map((diagnostic) => [diagnostic.phase, diagnostic.severity, diagnostic.message]),
    [
      ["semantic", "warning", "Duplicate tool call: read_file with identical arguments"],
      ["optimization", "info", "Removed duplicate tool call: read_file"],
    ],
  );
  assert.equal(result.success, true);
});

test("a call matched by two rules is extracted once", { concurrency: false }, () => {
  const result = new ResponseCompiler({ modelProvider: "qwen" }).compile(`<tool_call>${READ_CALL}</tool_call>`);
  const calls = childrenOfKind(result.tree, "tool_call");
  assert.equal(calls.length, 1);
  assert.equal(calls[0].rule, "tagged_tool_call");
  assert.deepEqual(result.diagnostics, []);
});

test("missing required parameters fail the compilation", { concurrency: false }, () => {
  const result = new ResponseCompiler().compile('{"tool_call":{"name":"write_file","arguments":{"path":"a"}}}');
  assert.equal(result.success, false);
  const errors = result.diagnostics.filter((diagnostic) => diagnostic.severity === "error");
  assert.equal(errors.length, 1);
  assert.match(errors[0].message, /write_file/);
  assert.match(errors[0].message, /content/);
});

test("conflicting file operations produce a warning", { concurrency: false }, () => {
  const result = new ResponseCompiler().compile("Delete /x now.\nThen write /x again.");
  assert.deepEqual(
    result.diagnostics.map((diagnostic) => [diagnostic.severity, diagnostic.message]),
    [["warning", "Conflicting operations on /x: delete and write"]],
  );
  assert.equal(result.success, true);
});

test("braces inside string literals do not unbalance code", { concurrency: false }, () => {
  const result = new ResponseCompiler().compile('```js\nconst s = "{";\n```');
  assert.equal(
    result.diagnostics.some((diagnostic) => /unbalanced/.test(diagnostic.message)),
    false,
  );
});

test("compilation is total over hostile input", { concurrency: false }, () => {
  const alphabet = '{}[]"\\<>/`#-*$:?\n abcXYZ_.\u0000\uFFFD';
  let seed = 42;
  const random = (): number => {
    seed = (seed * 16807) % 2147483647;
    return seed / 2147483647;
  };
  const samples = [
    "",
    "   \n\t",
    '{"tool_call":{"name":"read_file","arguments":{"path":',
    "\u0000\uFFFD{{[[<tool_call>```",
    "<tool_call><thinking>```\n</tool_call>",
  ];
  for (let count = 0; count < 40; count += 1) {
    const length = Math.floor(random() * 160);
    let sample = "";
    for (let index = 0; index < length; index += 1) {
      sample += alphabet[Math.floor(random() * alphabet.length)];
    }
    samples.push(sample);
  }
  for (const provider of ["generic", "qwen"]) {
    const compiler = new ResponseCompiler({ modelProvider: provider });
    for (const sample of samples) {
      const result = compiler.compile(sample);
      assert.equal(result.tree.kind, "response");
      assert.equal(result.tokens[result.tokens.length - 1].kind, "eof");
      assert.equal(
        result.success,
        result.diagnostics.every((diagnostic) => diagnostic.severity !== "error"),
      );
    }
  }
});

test("compiling the same text twice gives the same result", { concurrency: false }, () => {
  const compiler = new ResponseCompiler({ modelProvider: "qwen" });
  const first = compiler.compile(STREAMED_RESPONSE);
  const second = compiler.compile(STREAMED_RESPONSE);
  assert.deepEqual(stable(second), stable(first));
  assert.equal(compiler.lastResult, second);
});

test("incremental compilation ends where batch compilation does", { concurrency: false }, async () => {
  const batch = new ResponseCompiler({ modelProvider: "qwen" }).compile(STREAMED_RESPONSE);
  for (const size of [1, 3, 7, 50, STREAMED_RESPONSE.length]) {
    const compiler = new ResponseCompiler({ modelProvider: "qwen" });
    const updates: number[] = [];
    const result = await compiler.compileIncremental(splitEvery(STREAMED_RESPONSE, size), {}, {
      onUpdate: (update) => updates.push(update.bufferLength),
    });
    assert.deepEqual(stable(result), stable(batch), `chunk size ${size}`);
    assert.equal(updates.length, Math.ceil(STREAMED_RESPONSE.length / size));
    assert.equal(updates[updates.length - 1], STREAMED_RESPONSE.length);
  }
});

test("incremental updates carry the tokens past the previous count", { concurrency: false }, async () => {
  const compiler = new ResponseCompiler();
  async function* chunks(): AsyncGenerator<string> {
    yield "Hello";
    yield " world";
  }
  const seen: Array<{ index: number; tokens: string[] }> = [];
  await compiler.compileIncremental(chunks(), {}, {
    onUpdate: (update) =>
      seen.push({ index: update.chunkIndex, tokens: update.newTokens.map((token) => token.kind) }),
  });
  assert.deepEqual(seen, [
    { index: 0, tokens: ["text", "eof"] },
    { index: 1, tokens: [] },
  ]);
});

test("an empty stream compiles the empty response", { concurrency: false }, async () => {
  const result = await new ResponseCompiler().compileIncremental([]);
  assert.deepEqual(result.tree.children, []);
  assert.equal(result.success, true);
});

test("aborting stops after the current chunk", { concurrency: false }, async () => {
  const controller = new AbortController();
  let updates = 0;
  const result = await new ResponseCompiler().compileIncremental(["a", "b", "c"], {}, {
    signal: controller.signal,
    onUpdate: () => {
      updates += 1;
      controller.abort();
    },
  });
  assert.equal(updates, 1);
  assert.deepEqual(
    childrenOfKind(result.tree, "text").map((node) => node.content),
    ["a"],
  );
});

test("stopOnLexicalErrors returns before parsing", { concurrency: false }, () => {
  const text = "```py\nprint(1)";
  const stopped = new ResponseCompiler({ stopOnLexicalErrors: true }).compile(text);
  assert.equal(stopped.success, false);
  assert.deepEqual(stopped.tree.children, []);
  assert.deepEqual(
    stopped.diagnostics.map((diagnostic) => [diagnostic.phase, diagnostic.line, diagnostic.column]),
    [["lexical", 1, 1]],
  );

  const continued = new ResponseCompiler().compile(text);
  assert.equal(childrenOfKind(continued.tree, "code").length, 1);
  assert.equal(continued.tree.metadata.isComplete, false);
});

test("a streaming tool call is reported as pending", { concurrency: false }, () => {
  const result = new ResponseCompiler({ modelProvider: "qwen" }).compile('<tool_call>{"name":"read');
  assert.equal(result.success, true);
  assert.equal(result.tree.metadata.pendingToolCall, true);
  assert.ok(
    result.diagnostics.some(
      (diagnostic) =>
        diagnostic.phase === "parsing" &&
        diagnostic.message === "Tool call still streaming; waiting for the rest of the response",
    ),
  );
});

test("per-call overrides change strictness", { concurrency: false }, () => {
  const compiler = new ResponseCompiler();
  const text = '{"tool_call":{"name":"deploy","arguments":{}}}';
  assert.equal(compiler.compile(text).diagnostics[0].severity, "info");
  assert.equal(compiler.compile(text, { strictMode: true }).diagnostics[0].severity, "warning");
});

test("disabling optimizations keeps duplicates", { concurrency: false }, () => {
  const result = new ResponseCompiler({ enableOptimizations: false }).compile(`${READ_CALL} ${READ_CALL}`);
  assert.equal(childrenOfKind(result.tree, "tool_call").length, 2);
});

test("hallucination checks add validation warnings", { concurrency: false }, () => {
  const result = new ResponseCompiler({ detectHallucinations: true }).compile("[Tool Results]\nDone.");
  assert.deepEqual(
    result.diagnostics.map((diagnostic) => [diagnostic.phase, diagnostic.severity, diagnostic.message]),
    [["validation", "warning", "Response contains fake tool result markers such as [Tool Results]"]],
  );
});

test("a failing parser becomes an internal compiler error", { concurrency: false }, () => {
  const broken: ResponseParser = {
    name: "broken",
    parse: () => {
      throw new Error("kaboom");
    },
    validate: () => ({ isValid: true, issues: [] }),
    capabilities: () => ({
      dialect: "broken",
      toolCallRules: [],
      scrubRules: [],
      toolResults: false,
      thoughts: false,
      codeBlocks: false,
      semanticElements: false,
    }),
  };
  const registry = new ParserRegistry();
  registry.register({ name: "broken", matches: () => true, create: () => broken });
  const trace = new CompilationTrace();
  const result = new ResponseCompiler({}, { registry, logger: trace }).compile("text");
  assert.equal(result.success, false);
  assert.deepEqual(
    result.diagnostics.map((diagnostic) => [diagnostic.phase, diagnostic.severity, diagnostic.message]),
    [["parsing", "error", "Internal compiler error: kaboom"]],
  );
  assert.equal(trace.ofType("internal_fault").length, 1);
});

test("every phase is traced", { concurrency: false }, () => {
  const trace = new CompilationTrace(() => new Date("2026-01-01T00:00:00.000Z"));
  new ResponseCompiler({}, { logger: trace }).compile("Hello");
  assert.deepEqual(
    trace.ofType("phase_start").map((event) => event.data.phase),
    ["lexical", "parsing", "semantic", "optimization", "validation"],
  );
  const events = trace.drain();
  assert.equal(events[events.length - 1].type, "compile_complete");
  assert.equal(events[0].timestamp, "2026-01-01T00:00:00.000Z");
  assert.deepEqual(trace.list(), []);
});
