import test from "node:test";
import assert from "node:assert/strict";
import {
  createCompilationFailure,
  createExtractionFailure,
  createInternalFault,
  isResponseCompilerError,
  ResponseCompilerError,
} from "../CompilerErrors.js";

test("createInternalFault wraps thrown values once", { concurrency: false }, () => {
  const fault = createInternalFault(new Error("boom"), "parsing");
  assert.equal(fault.code, "internal_fault");
  assert.equal(fault.message, "boom");
  assert.deepEqual(fault.details, { phase: "parsing" });
  assert.equal(createInternalFault(fault), fault);
  assert.equal(createInternalFault("plain").message, "plain");
});

test("createExtractionFailure names the rule and reason", { concurrency: false }, () => {
  const failure = createExtractionFailure({ rule: "bare_tool", start: 3, end: 9, reason: "missing tool name" });
  assert.ok(isResponseCompilerError(failure));
  assert.equal(failure.code, "extraction_failure");
  assert.equal(failure.message, "Tool call candidate rejected by bare_tool: missing tool name");
  assert.deepEqual(failure.details, { rule: "bare_tool", start: 3, end: 9, reason: "missing tool name" });
});

test("createCompilationFailure codes by the first failing phase", { concurrency: false }, () => {
  assert.equal(createCompilationFailure([{ severity: "warning", message: "w", phase: "semantic" }]), undefined);

  const lexical = createCompilationFailure([
    { severity: "info", message: "i", phase: "lexical" },
    { severity: "error", message: "Unterminated code fence", phase: "lexical", line: 4, column: 1 },
    { severity: "error", message: "missing", phase: "semantic" },
  ]);
  assert.ok(lexical instanceof ResponseCompilerError);
  assert.equal(lexical.code, "lexical_error");
  assert.equal(lexical.message, "Compilation failed with 2 error(s): Unterminated code fence (line 4)");

  const semantic = createCompilationFailure([{ severity: "error", message: "bad call", phase: "semantic" }]);
  assert.equal(semantic?.code, "semantic_violation");
  assert.equal(semantic?.message, "Compilation failed with 1 error(s): bad call");
});
