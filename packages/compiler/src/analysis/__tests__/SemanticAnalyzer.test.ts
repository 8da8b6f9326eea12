import test from "node:test";
import assert from "node:assert/strict";
import {
  createResponse,
  type CodeNode,
  type FileReferenceType,
  type ResponseChild,
  type ResponseNode,
  type ToolArguments,
  type ToolCallNode,
} from "../../ast/ResponseNodes.js";
import { SemanticAnalyzer } from "../SemanticAnalyzer.js";
import { StaticToolSchemaCatalog } from "../ToolSchemas.js";

let offset = 0;
const nextSpan = () => {
  offset += 10;
  return { start: offset, end: offset + 5 };
};

const tree = (children: ResponseChild[]): ResponseNode =>
  createResponse({ modelProvider: "test", modelName: "test-model", length: 1000, children });

const call = (toolName: string, args: ToolArguments, callId = `call_${toolName}`): ToolCallNode => ({
  kind: "tool_call",
  span: nextSpan(),
  callId,
  toolName,
  arguments: args,
  rule: "nested_tool_call",
});

const fileRef = (path: string, referenceType: FileReferenceType): ResponseChild => ({
  kind: "file_reference",
  span: nextSpan(),
  path,
  referenceType,
  isAbsolute: path.startsWith("/"),
});

const code = (source: string, complete = true): CodeNode => ({
  kind: "code",
  span: nextSpan(),
  language: "ts",
  code: source,
  isExecutable: false,
  complete,
});

const messages = (root: ResponseNode, strictMode = false): Array<[string, string]> =>
  new SemanticAnalyzer().analyze(root, { strictMode }).diagnostics.map((diagnostic) => [
    diagnostic.severity,
    diagnostic.message,
  ]);

test("missing required parameters are errors", { concurrency: false }, () => {
  assert.deepEqual(messages(tree([call("write_file", { path: "a.txt" })])), [
    ["error", "Tool write_file is missing required parameter 'content'"],
  ]);
});

test("parameter aliases satisfy required parameters", { concurrency: false }, () => {
  assert.deepEqual(messages(tree([call("read_file", { file_path: "/test/file.txt" })])), []);
});

test("type mismatches escalate in strict mode", { concurrency: false }, () => {
  const root = tree([call("list_directory", { path: "/src", recursive: "yes" })]);
  const expected = "Parameter 'recursive' of list_directory should be boolean, got string";
  assert.deepEqual(messages(root), [["warning", expected]]);
  assert.deepEqual(messages(root, true), [["error", expected]]);
});

test("unknown tools are informational unless strict", { concurrency: false }, () => {
  const root = tree([call("deploy", {})]);
  assert.deepEqual(messages(root), [["info", "Unknown tool: deploy"]]);
  assert.deepEqual(messages(root, true), [["warning", "Unknown tool: deploy"]]);
});

test("an injected catalog replaces the built-in tools", { concurrency: false }, () => {
  const schemas = new StaticToolSchemaCatalog([
    { name: "deploy", parameters: { target: { type: "string", required: true } } },
  ]);
  const result = new SemanticAnalyzer({ schemas }).analyze(tree([call("deploy", { target: "prod" })]));
  assert.deepEqual(result.diagnostics, []);
});

test("identical calls are reported as duplicates", { concurrency: false }, () => {
  const root = tree([call("read_file", { path: "a" }, "c1"), call("read_file", { path: "a" }, "c2")]);
  assert.deepEqual(messages(root), [["warning", "Duplicate tool call: read_file with identical arguments"]]);
});

test("delete and write on one path conflict", { concurrency: false }, () => {
  const root = tree([fileRef("/x", "delete"), fileRef("/x", "write"), fileRef("/y", "create"), fileRef("/y", "create")]);
  assert.deepEqual(messages(root), [
    ["warning", "Conflicting operations on /x: delete and write"],
    ["warning", "/y is created 2 times"],
  ]);
});

test("questions after tool calls are noted and yes/no options filled in", { concurrency: false }, () => {
  const question: ResponseChild = {
    kind: "question",
    span: nextSpan(),
    question: "Do you want tests?",
    questionType: "yes_no",
  };
  const root = tree([
    call("read_file", { path: "a" }),
    { kind: "text", span: nextSpan(), content: "Done.", format: "plain" },
    question,
  ]);
  const result = new SemanticAnalyzer().analyze(root);
  assert.deepEqual(
    result.diagnostics.map((diagnostic) => diagnostic.message),
    ["Question follows tool call read_file; the answer may be delayed"],
  );
  const normalized = result.tree.children[2];
  assert.equal(normalized.kind, "question");
  assert.deepEqual(normalized.kind === "question" ? normalized.suggestedOptions : undefined, ["Yes", "No"]);
  assert.equal(question.suggestedOptions, undefined);
});

test("more than three questions are noted", { concurrency: false }, () => {
  const questions: ResponseChild[] = ["A?", "B?", "C?", "D?"].map((text): ResponseChild => ({
    kind: "question",
    span: nextSpan(),
    question: text,
    questionType: "open_ended",
  }));
  assert.deepEqual(messages(tree(questions)), [["info", "Response asks 4 questions; consider asking fewer"]]);
});

test("code block checks", { concurrency: false }, () => {
  assert.deepEqual(messages(tree([code('const s = "{";')])), []);
  assert.deepEqual(messages(tree([code("function f() {\n  return 1;")])), [
    ["warning", "Code block has unbalanced brackets: {"],
  ]);
  assert.deepEqual(messages(tree([code("foo();\n...")])), [
    ["info", "Code block ends with an ellipsis and may be truncated"],
  ]);
  assert.deepEqual(messages(tree([code("// TODO: handle errors\nrun();")])), [
    ["info", "Code block contains TODO markers"],
  ]);
  assert.deepEqual(messages(tree([code("function f() {", false)])), [
    ["warning", "Code block is incomplete: the closing fence is missing"],
  ]);
});

test("tool results without calls and relative paths after cd are noted", { concurrency: false }, () => {
  const root = tree([
    { kind: "tool_result", span: nextSpan(), toolName: "run", success: true },
    { kind: "command", span: nextSpan(), command: "cd build" },
    { kind: "command", span: nextSpan(), command: "cat ./out.log" },
  ]);
  assert.deepEqual(messages(root), [
    ["info", "Tool result for run has no matching tool call"],
    ["info", "Command 'cat ./out.log' uses relative paths after a directory change"],
  ]);
});

test("summary collects tools, files and the primary intent", { concurrency: false }, () => {
  const root = tree([
    call("read_file", { path: "src/a.ts" }),
    fileRef("/etc/hosts", "read"),
    { kind: "text", span: nextSpan(), content: "Reading.", format: "plain" },
  ]);
  const { summary } = new SemanticAnalyzer().analyze(root);
  assert.deepEqual(summary, {
    hasToolCalls: true,
    hasCode: false,
    hasQuestions: false,
    hasErrors: false,
    nodeCount: 4,
    filesReferenced: ["src/a.ts", "/etc/hosts"],
    toolsUsed: ["read_file"],
    primaryIntent: "ToolExecution",
  });
  assert.equal(new SemanticAnalyzer().analyze(tree([])).summary.primaryIntent, "Unknown");
  assert.equal(
    new SemanticAnalyzer().analyze(tree([code("a"), code("b"), { kind: "text", span: nextSpan(), content: "x", format: "plain" }]))
      .summary.primaryIntent,
    "CodeGeneration",
  );
});
