import test from "node:test";
import assert from "node:assert/strict";
import { createResponse, type ResponseChild, type ResponseNode } from "../../ast/ResponseNodes.js";
import { AstOptimizer, normalizeFilePath } from "../AstOptimizer.js";

const tree = (children: ResponseChild[]): ResponseNode =>
  createResponse({ modelProvider: "test", modelName: "test-model", length: 100, children });

const readCall = (callId: string, start: number): ResponseChild => ({
  kind: "tool_call",
  span: { start, end: start + 5 },
  callId,
  toolName: "read_file",
  arguments: { path: "a" },
  rule: "nested_tool_call",
});

test("later duplicate calls are dropped with an info diagnostic", { concurrency: false }, () => {
  const input = tree([
    readCall("c1", 0),
    readCall("c2", 10),
    { kind: "text", span: { start: 20, end: 24 }, content: "done", format: "plain" },
  ]);
  const { tree: output, diagnostics } = new AstOptimizer().optimize(input);
  assert.deepEqual(
    output.children.map((node) => (node.kind === "tool_call" ? node.callId : node.kind)),
    ["c1", "text"],
  );
  assert.deepEqual(
    diagnostics.map((diagnostic) => [diagnostic.severity, diagnostic.phase, diagnostic.message]),
    [["info", "optimization", "Removed duplicate tool call: read_file"]],
  );
  assert.equal(input.children.length, 3);
});

test("adjacent text nodes merge and blank text disappears", { concurrency: false }, () => {
  const { tree: output } = new AstOptimizer().optimize(
    tree([
      { kind: "text", span: { start: 0, end: 3 }, content: "one", format: "plain" },
      { kind: "text", span: { start: 5, end: 8 }, content: "two", format: "plain" },
      readCall("c1", 10),
      { kind: "text", span: { start: 20, end: 22 }, content: "  ", format: "plain" },
    ]),
  );
  assert.deepEqual(output.children, [
    { kind: "text", span: { start: 0, end: 8 }, content: "one two", format: "plain" },
    readCall("c1", 10),
  ]);
});

test("file reference paths are normalized unless disabled", { concurrency: false }, () => {
  const input = tree([
    { kind: "file_reference", span: { start: 0, end: 8 }, path: "src\\a.ts", referenceType: "read", isAbsolute: false },
  ]);
  const optimizer = new AstOptimizer();
  const [normalized] = optimizer.optimize(input).tree.children;
  assert.equal(normalized.kind === "file_reference" ? normalized.path : "", "./src/a.ts");
  const [untouched] = optimizer.optimize(input, { normalizeFilePaths: false }).tree.children;
  assert.equal(untouched.kind === "file_reference" ? untouched.path : "", "src\\a.ts");
});

test("normalizeFilePath keeps absolute and parent-relative paths", { concurrency: false }, () => {
  assert.equal(normalizeFilePath("/abs/x"), "/abs/x");
  assert.equal(normalizeFilePath("../up.ts"), "../up.ts");
  assert.equal(normalizeFilePath("C:\\x\\y"), "C:/x/y");
  assert.equal(normalizeFilePath("lib/b.ts"), "./lib/b.ts");
});
