import test from "node:test";
import assert from "node:assert/strict";
import { JsonRepairService, isCompleteJson } from "../JsonRepair.js";
import { isJsonObject } from "../JsonValue.js";

test("safeParse returns valid JSON without repair", { concurrency: false }, () => {
  const events: string[] = [];
  const repair = new JsonRepairService({ log: (type) => events.push(type) });
  assert.deepEqual(repair.safeParse('{"path":"a","depth":2}'), { path: "a", depth: 2 });
  assert.deepEqual(events, []);
});

test("safeParse repairs trailing commas and smart quotes", { concurrency: false }, () => {
  const repair = new JsonRepairService();
  assert.deepEqual(repair.safeParse('{"path": "a",}'), { path: "a" });
  assert.deepEqual(repair.safeParse("{“path”: “b”}"), { path: "b" });
});

test("safeParse applies the guard", { concurrency: false }, () => {
  const repair = new JsonRepairService();
  assert.deepEqual(repair.safeParse('{"a":1}', isJsonObject), { a: 1 });
  assert.equal(repair.safeParse("[1,2]", isJsonObject), undefined);
});

test("safeParse returns undefined for blank input", { concurrency: false }, () => {
  const repair = new JsonRepairService();
  assert.equal(repair.safeParse(""), undefined);
  assert.equal(repair.safeParse("   \n"), undefined);
});

test("tryRepair reports failure without throwing", { concurrency: false }, () => {
  const events: string[] = [];
  const repair = new JsonRepairService({ log: (type) => events.push(type) });
  const outcome = repair.tryRepair("");
  assert.deepEqual(outcome, { ok: false, repaired: "" });
  const fixed = repair.tryRepair("{'a': 1}");
  assert.equal(fixed.ok, true);
  assert.deepEqual(JSON.parse(fixed.repaired), { a: 1 });
  assert.deepEqual(events, ["json_repaired"]);
});

test("isCompleteJson checks balance outside strings", { concurrency: false }, () => {
  assert.equal(isCompleteJson('{"a":"}"}'), true);
  assert.equal(isCompleteJson('{"a":{"b":1}'), false);
  assert.equal(isCompleteJson('{"a":"\\"}'), false);
  assert.equal(isCompleteJson("[1, 2]"), true);
  assert.equal(isCompleteJson("hello"), false);
  assert.equal(isCompleteJson("}{"), false);
});
