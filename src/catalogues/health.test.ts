/**
 * Catalogue Health Overview Tests
 *
 * Run: node --import tsx src/catalogues/health.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { formatHealthReport, summariseCatalogues } from "./health.js";
import { CatalogueRegistry } from "./registry.js";

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

const tempDir = mkdtempSync(join(tmpdir(), "crt-health-"));
writeFileSync(
  join(tempDir, "CRT-C.csv"),
  "control_id,control_name,group_id\nCRT-C-0001,Data Classification Framework,CRT-G-01\nCRT-C-0002,Privileged Access Separation,CRT-G-02\n"
);
writeFileSync(join(tempDir, "CRT-D.csv"), "d_id,classification\n");
writeFileSync(join(tempDir, "CRT-F.csv"), "failure_id\nCRT-F-0001\nCRT-F-0001\n");

const overview = summariseCatalogues(CatalogueRegistry.create({ directory: tempDir }).loadAll());

console.log("\n── summariseCatalogues ──");

test("counts kinds, empty and failed catalogues", () => {
  assert.equal(overview.backbone, 6);
  assert.equal(overview.appendOnly, 7);
  assert.equal(overview.empty, 1);
  assert.equal(overview.failed, 11);
});

test("backbone catalogues come first, then by name", () => {
  assert.deepEqual(
    overview.summaries.slice(0, 6).map((s) => s.catalogue),
    ["CRT-C", "CRT-F", "CRT-G", "CRT-N", "CRT-POL", "CRT-STD"]
  );
  assert.ok(overview.summaries.slice(6).every((s) => s.kind === "append-only"));
});

test("loaded catalogues carry their size and source", () => {
  const controls = overview.summaries.find((s) => s.catalogue === "CRT-C");
  assert.deepEqual(controls, {
    catalogue: "CRT-C",
    label: "Controls",
    kind: "backbone",
    primaryIdColumn: "control_id",
    loaded: true,
    rows: 2,
    columns: 3,
    empty: false,
    source: join(tempDir, "CRT-C.csv"),
  });
});

test("failed catalogues carry the load error", () => {
  const failures = overview.summaries.find((s) => s.catalogue === "CRT-F");
  assert.equal(failures?.loaded, false);
  assert.equal(
    failures?.error,
    'Failed to load catalogue CRT-F: Duplicate failure_id "CRT-F-0001" (first seen at row 1, duplicate at row 2)'
  );
});

console.log("\n── formatHealthReport ──");

const report = formatHealthReport(overview).split("\n");

test("prints the counters", () => {
  assert.ok(report.includes("Backbone catalogues:    6"));
  assert.ok(report.includes("Append-only catalogues: 7"));
  assert.ok(report.includes("Empty catalogues:       1"));
  assert.ok(report.includes("Failed to load:         11"));
});

test("prints one aligned line per catalogue", () => {
  assert.ok(report.includes("✓ CRT-C    backbone    2 rows, 3 columns (id: control_id)"));
  assert.ok(report.includes("✓ CRT-D    append-only 0 rows, 2 columns (id: d_id)"));
  assert.ok(report.includes("✗ CRT-G    backbone    not loaded (id: group_id)"));
});

test("the error follows its catalogue line", () => {
  const index = report.indexOf("✗ CRT-F    backbone    not loaded (id: failure_id)");
  assert.ok(index >= 0);
  assert.equal(
    report[index + 1],
    '    Failed to load catalogue CRT-F: Duplicate failure_id "CRT-F-0001" (first seen at row 1, duplicate at row 2)'
  );
});

test("the footer reflects failures", () => {
  assert.ok(report.includes(" ✗ 11 catalogue(s) failed to load"));
  const clean = formatHealthReport({ summaries: [], backbone: 0, appendOnly: 0, empty: 0, failed: 0 });
  assert.ok(clean.split("\n").includes(" ✓ All catalogues loaded"));
});

rmSync(tempDir, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
