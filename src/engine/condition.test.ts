/**
 * Condition evaluation tests.
 *
 * Run: node --import tsx src/engine/condition.test.ts
 */

import { strict as assert } from "node:assert";

import { compareValues, evaluateCondition, splitComparison } from "./condition.js";
import type { Scope } from "./context.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function check(expr: string, scope: Scope, expected: boolean): void {
  assert.equal(evaluateCondition(expr, scope), expected, `"${expr}" should be ${expected}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// LITERALS
// ═══════════════════════════════════════════════════════════════════════════

section("Literals");

test("true and false in any case", () => {
  check("true", {}, true);
  check("FALSE", {}, false);
  check("  True ", {}, true);
});

test("literal wins over a context key of the same name", () => {
  check("false", { false: "yes" }, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// OPERATOR SCAN
// ═══════════════════════════════════════════════════════════════════════════

section("splitComparison");

test("two-character operators are found before their prefixes", () => {
  assert.deepEqual(splitComparison("a>=b"), { operator: ">=", left: "a", right: "b" });
  assert.deepEqual(splitComparison("a <= b"), { operator: "<=", left: "a", right: "b" });
});

test("== is checked before !=", () => {
  assert.deepEqual(splitComparison("x != y == z"), {
    operator: "==",
    left: "x != y",
    right: "z",
  });
});

test("expressions without an operator", () => {
  assert.equal(splitComparison("user.admin"), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// COMPARISONS
// ═══════════════════════════════════════════════════════════════════════════

section("Comparisons");

test('"5" == 5 compares numerically', () => {
  check('"5" == 5', {}, true);
});

test('"abc" == "ABC" compares case-insensitively', () => {
  check('"abc" == "ABC"', {}, true);
});

test('"abc" > "abd" is false for non-numeric operands', () => {
  check('"abc" > "abd"', {}, false);
  check('"abd" > "abc"', {}, false);
});

test("paths compare against unquoted number literals", () => {
  const scope = { x: 2 };
  check("x==1", scope, false);
  check("x==2", scope, true);
  check("x != 2", scope, false);
});

test("every order operator on numbers", () => {
  const scope = { count: 3 };
  check("count >= 3", scope, true);
  check("count > 3", scope, false);
  check("count <= 2", scope, false);
  check("count < 10", scope, true);
});

test("numeric strings in the context compare as numbers", () => {
  check("v > 9", { v: "10" }, true);
});

test("quoted string literals", () => {
  check("name == 'Ada'", { name: "ada" }, true);
  check("name != 'Ada'", { name: "Bob" }, true);
  check("name > 'Ada'", { name: "Bob" }, false);
});

test("both operands may be paths", () => {
  check("a == b", { a: "same", b: "SAME" }, true);
  check("a < b", { a: 1, b: 2 }, true);
});

test("quotes are stripped from a resolved right operand", () => {
  check("name == q", { name: "x", q: "'x'" }, true);
});

test("empty string is not the number zero", () => {
  check("e == 0", { e: "" }, false);
});

test("only decimal notation reads as a number", () => {
  check("v == 16", { v: "0x10" }, false);
  check("v == 16", { v: "16.0" }, true);
  assert.equal(compareValues("1e3", "==", 1000), true);
  assert.equal(compareValues(" 2.50 ", "==", 2.5), true);
  assert.equal(compareValues("Infinity", ">", 5), false);
  assert.equal(compareValues("0b1", "==", 1), false);
});

test("operands honour defaults", () => {
  check("missing | default:'7' == 7", {}, true);
});

test("booleans compare as their text", () => {
  assert.equal(compareValues(true, "==", "TRUE"), true);
  assert.equal(compareValues(false, "<", "true"), false);
  check("flag == 1", { flag: true }, false);
  check("flag == true", { flag: true }, true);
});

// ═══════════════════════════════════════════════════════════════════════════
// TRUTHINESS
// ═══════════════════════════════════════════════════════════════════════════

section("Truthiness");

test("missing paths are false", () => {
  check("user.avatar", { user: {} }, false);
});

test("empty containers are false, non-empty are true", () => {
  check("items", { items: [] }, false);
  check("items", { items: [1] }, true);
  check("meta", { meta: {} }, false);
});

test("scalars follow their value", () => {
  check("flag", { flag: false }, false);
  check("zero", { zero: 0 }, false);
  check("text", { text: "0" }, true);
  check("nothing", { nothing: null }, false);
});

test("a default makes a missing path truthy", () => {
  check("missing | default:'on'", {}, true);
});

test("empty expression is false", () => {
  check("", {}, false);
  check("   ", { a: 1 }, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
