/**
 * Site configuration loader tests.
 *
 * Run: node --import tsx src/config/site/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { loadSiteConfig, readSiteConfigFile, SiteConfigError } from "./loader.js";

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

function expectConfigError(fn: () => unknown, check: (err: SiteConfigError) => void): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof SiteConfigError);
    check(err);
    return true;
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("loadSiteConfig");

test("fills in generation defaults", () => {
  const { settings, context } = loadSiteConfig({ title: "T" });
  assert.deepEqual(settings, {
    outpath: "output",
    render: "render.html",
    template_path: "templates",
    template: "base.html",
  });
  assert.deepEqual(context, { title: "T" });
});

test("settings stay visible in the context", () => {
  const { settings, context } = loadSiteConfig({ template: "page.html", posts: [{ n: 1 }] });
  assert.equal(settings.template, "page.html");
  assert.deepEqual(context, { template: "page.html", posts: [{ n: 1 }] });
});

test("context is deeply frozen", () => {
  const { context } = loadSiteConfig({ nested: { list: [1, 2] } });
  assert.ok(Object.isFrozen(context));
  const nested = context.nested;
  assert.ok(nested !== null && typeof nested === "object" && Object.isFrozen(nested));
});

test("wrongly typed setting is reported with its path", () => {
  expectConfigError(
    () => loadSiteConfig({ outpath: 5 }),
    (err) => {
      assert.deepEqual(err.issues.map((i) => i.path), [["outpath"]]);
      assert.equal(err.issues[0].code, "invalid_type");
      assert.equal(
        err.format(),
        "Site configuration (inline) is invalid:\n  - outpath: Expected string, received number"
      );
    }
  );
});

test("empty configuration is rejected", () => {
  expectConfigError(
    () => loadSiteConfig({}, "empty.json"),
    (err) => {
      assert.equal(err.source, "empty.json");
      assert.equal(err.issues[0].message, "Site configuration is empty");
    }
  );
});

test("non-object configuration is rejected", () => {
  expectConfigError(
    () => loadSiteConfig([1, 2]),
    (err) => assert.equal(err.issues[0].code, "invalid_type")
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

section("readSiteConfigFile");

const CONFIG_DIR = join(tmpdir(), `sitesmith-config-test-${Date.now()}`);

function setupConfigDir(): void {
  mkdirSync(CONFIG_DIR, { recursive: true });
  writeFileSync(
    join(CONFIG_DIR, "site.json"),
    JSON.stringify({ title: "Docs", render: "index.html" })
  );
  writeFileSync(join(CONFIG_DIR, "broken.json"), "{ title: ");
}

function cleanupConfigDir(): void {
  try {
    rmSync(CONFIG_DIR, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

setupConfigDir();

test("reads and validates a JSON file", () => {
  const { settings, context } = readSiteConfigFile(join(CONFIG_DIR, "site.json"));
  assert.equal(settings.render, "index.html");
  assert.equal(context.title, "Docs");
});

test("missing file", () => {
  const path = join(CONFIG_DIR, "nope.json");
  expectConfigError(
    () => readSiteConfigFile(path),
    (err) => {
      assert.equal(err.source, path);
      assert.deepEqual(err.issues, [{ path: [], message: "file not found", code: "io" }]);
    }
  );
});

test("invalid JSON", () => {
  expectConfigError(
    () => readSiteConfigFile(join(CONFIG_DIR, "broken.json")),
    (err) => assert.equal(err.issues[0].code, "json")
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

cleanupConfigDir();


console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
