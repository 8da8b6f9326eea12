import test from "node:test";
import assert from "node:assert/strict";
import { HallucinationDetector } from "../HallucinationDetector.js";

test("fake tool result markers are always flagged", { concurrency: false }, () => {
  const events: string[] = [];
  const detector = new HallucinationDetector({ log: (type) => events.push(type) });
  const report = detector.check("[Tool Results]\nfile.txt: 12 bytes", true);
  assert.equal(report.hasFakeToolResults, true);
  assert.equal(report.isHallucinating, true);
  assert.deepEqual(report.issues, ["Response contains fake tool result markers such as [Tool Results]"]);
  assert.deepEqual(events, ["hallucination_detected"]);
});

test("a single unsupported claim is not enough on its own", { concurrency: false }, () => {
  const detector = new HallucinationDetector();
  const report = detector.check("I have read the file and it looks fine.", false);
  assert.equal(report.hasUnsubstantiatedClaims, true);
  assert.deepEqual(report.issues, ["Response claims 1 action(s) without tool calls"]);
  assert.equal(report.isHallucinating, false);
  assert.equal(report.suggestedAction, undefined);
});

test("claims are not checked when the response made tool calls", { concurrency: false }, () => {
  const report = new HallucinationDetector().check("I have read the file.", true);
  assert.deepEqual(report.issues, []);
});

test("directory drawings without a listing call are flagged", { concurrency: false }, () => {
  const report = new HallucinationDetector().check("src\n├── a.ts\n└── b.ts", false);
  assert.equal(report.hasFakeDirectoryListing, true);
  assert.equal(report.isHallucinating, true);
});

test("clean strips markers and tree lines", { concurrency: false }, () => {
  const detector = new HallucinationDetector();
  assert.equal(
    detector.clean("Intro\n[Tool Results]\nfake\n\nKeep this\n├── a\n└── b\n"),
    "Intro\n\nfake\n\nKeep this",
  );
  assert.equal(detector.clean("   "), "   ");
});
