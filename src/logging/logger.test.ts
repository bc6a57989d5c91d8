/**
 * Logger tests.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";

import { createLogger, createNullLogger, formatLogEntry } from "./logger.js";
import { generateRunId } from "./run-id.js";

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

/**
 * Run fn with console.* replaced by a recorder; returns the lines written.
 */
function captureConsole(fn: () => void): string[] {
  const lines: string[] = [];
  const original = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };
  const record = (...args: unknown[]): void => {
    lines.push(args.map(String).join(" "));
  };
  console.debug = record;
  console.info = record;
  console.warn = record;
  console.error = record;
  try {
    fn();
  } finally {
    Object.assign(console, original);
  }
  return lines;
}

const ENTRY_PREFIX = /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] /;

section("Formatting");

test("entries carry level, run ID, component and context", () => {
  const entry = formatLogEntry("warn", "engine", "Partial missing", { partial: "nav.html" });
  assert.match(entry, ENTRY_PREFIX);
  assert.equal(
    entry.replace(ENTRY_PREFIX, ""),
    '[WARN ] [no-run-id] [engine] Partial missing {"partial":"nav.html"}'
  );
});

test("empty context is omitted", () => {
  const entry = formatLogEntry("info", "cli", "Done", {});
  assert.equal(entry.replace(ENTRY_PREFIX, ""), "[INFO ] [no-run-id] [cli] Done");
});

test("run IDs are date plus six hex digits", () => {
  assert.match(generateRunId(new Date("2025-03-09T12:00:00Z")), /^20250309-[0-9a-f]{6}$/);
});

section("Logger");

test("messages below the level are dropped", () => {
  const lines = captureConsole(() => {
    const logger = createLogger({ level: "warn", component: "t" });
    logger.info("hidden");
    logger.warn("shown");
  });
  assert.equal(lines.length, 1);
  assert.equal(lines[0].replace(ENTRY_PREFIX, ""), "[WARN ] [no-run-id] [t] shown");
});

test("child loggers keep the level and change the component", () => {
  const lines = captureConsole(() => {
    const child = createLogger({ level: "error", component: "root" }).child("sub");
    child.warn("hidden");
    child.error("boom");
  });
  assert.deepEqual(
    lines.map((l) => l.replace(ENTRY_PREFIX, "")),
    ["[ERROR] [no-run-id] [sub] boom"]
  );
});

test("console output can be disabled", () => {
  const lines = captureConsole(() => {
    createLogger({ console: false }).error("quiet");
  });
  assert.deepEqual(lines, []);
});

test("null logger writes nothing", () => {
  const lines = captureConsole(() => {
    const logger = createNullLogger();
    logger.error("nothing");
    logger.child("x").info("nothing");
  });
  assert.deepEqual(lines, []);
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
