import test from "node:test";
import assert from "node:assert/strict";
import { ResidualText, toSourceSpan } from "../ResidualText.js";
import { applyScrubRules, GENERIC_SCRUB_RULES, TAG_DIALECT_SCRUB_RULES } from "../ScrubRules.js";

test("ResidualText drops removed ranges and keeps source offsets", { concurrency: false }, () => {
  const residual = new ResidualText("Hello <x>world</x> there");
  residual.remove(6, 18);
  const projection = residual.project();
  assert.equal(projection.text, "Hello  there");
  assert.deepEqual(projection.offsets, [0, 1, 2, 3, 4, 5, 18, 19, 20, 21, 22, 23]);
  assert.equal(residual.isRemoved(6), true);
  assert.equal(residual.isRemoved(18), false);
});

test("ResidualText joins words across a gap with one space", { concurrency: false }, () => {
  const residual = new ResidualText("ab<c>de");
  residual.remove(2, 5);
  const projection = residual.project();
  assert.equal(projection.text, "ab de");
  assert.deepEqual(projection.offsets, [0, 1, 2, 5, 6]);
  assert.deepEqual(toSourceSpan(projection, 3, 5), { start: 5, end: 7 });
});

test("toSourceSpan handles empty projections and empty ranges", { concurrency: false }, () => {
  const empty = new ResidualText("").project();
  assert.deepEqual(toSourceSpan(empty, 0, 0), { start: 0, end: 0 });
  const projection = new ResidualText("abc").project();
  assert.deepEqual(toSourceSpan(projection, 1, 1), { start: 1, end: 1 });
});

test("removeProjected maps projected ranges back to the source", { concurrency: false }, () => {
  const residual = new ResidualText("one [x] two");
  residual.remove(4, 7);
  const first = residual.project();
  assert.equal(first.text, "one  two");
  residual.removeProjected(first, 4, 5);
  assert.equal(residual.project().text, "one two");
});

test("applyScrubRules runs tag dialect rules in order and counts them", { concurrency: false }, () => {
  const residual = new ResidualText("Let me check.\nResult   here  \n\n\n\nEnd");
  const counts = applyScrubRules(residual, TAG_DIALECT_SCRUB_RULES);
  assert.equal(residual.project().text, "\nResult here\n\nEnd");
  assert.deepEqual(counts, {
    tool_preamble: 1,
    trailing_whitespace: 1,
    excess_blank_lines: 1,
    repeated_spaces: 1,
  });
});

test("generic scrub rules leave narration alone", { concurrency: false }, () => {
  const residual = new ResidualText("Let me check.\u200B");
  const counts = applyScrubRules(residual, GENERIC_SCRUB_RULES);
  assert.equal(residual.project().text, "Let me check.");
  assert.deepEqual(counts, { control_characters: 1 });
});

test("orphaned JSON fragments are removed in the tag dialect", { concurrency: false }, () => {
  const residual = new ResidualText('Done\n  },\n"parameters": {\nNext');
  applyScrubRules(residual, TAG_DIALECT_SCRUB_RULES);
  assert.equal(residual.project().text, "Done\n\nNext");
});
