/**
 * Catalogue Definition Tests
 *
 * Run: node --import tsx src/catalogues/definitions.test.ts
 */

import { strict as assert } from "node:assert";
import { ZodError } from "zod";

import {
  CatalogueName,
  getCatalogueDefinition,
  isBackbone,
  isCatalogueName,
  listCatalogueNames,
  parseCatalogueDefinitions,
  relationshipsTargeting,
} from "./definitions.js";

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

function minimalTable(): Record<string, unknown>[] {
  return CatalogueName.options.map((name) => ({
    name,
    label: name,
    kind: "append-only",
    primaryIdColumn: "id",
    relationships: [],
  }));
}

// ═══════════════════════════════════════════════════════════════════════════
// CLOSED SET
// ═══════════════════════════════════════════════════════════════════════════

section("Closed catalogue set");

test("backbone catalogues in canonical order", () => {
  assert.deepEqual(listCatalogueNames("backbone"), [
    "CRT-C",
    "CRT-F",
    "CRT-N",
    "CRT-POL",
    "CRT-STD",
    "CRT-G",
  ]);
});

test("append-only catalogues in canonical order", () => {
  assert.deepEqual(listCatalogueNames("append-only"), [
    "CRT-REQ",
    "CRT-LR",
    "CRT-D",
    "CRT-AS",
    "CRT-I",
    "CRT-SC",
    "CRT-T",
  ]);
  assert.equal(listCatalogueNames().length, 13);
});

test("isCatalogueName is exact", () => {
  assert.equal(isCatalogueName("CRT-C"), true);
  assert.equal(isCatalogueName("crt-c"), false);
  assert.equal(isCatalogueName("CRT-X"), false);
  assert.equal(isCatalogueName(""), false);
});

test("definitions carry primary id columns and kinds", () => {
  assert.equal(getCatalogueDefinition("CRT-C").primaryIdColumn, "control_id");
  assert.equal(getCatalogueDefinition("CRT-N").primaryIdColumn, "n_id");
  assert.equal(getCatalogueDefinition("CRT-T").primaryIdColumn, "telemetry_id");
  assert.equal(isBackbone("CRT-G"), true);
  assert.equal(isBackbone("CRT-AS"), false);
});

test("definitions are frozen", () => {
  const def = getCatalogueDefinition("CRT-C");
  assert.ok(Object.isFrozen(def));
  assert.ok(Object.isFrozen(def.relationships));
});

// ═══════════════════════════════════════════════════════════════════════════
// RELATIONSHIP FIELDS
// ═══════════════════════════════════════════════════════════════════════════

section("Relationship fields");

test("controls point at failures, compensations and policies", () => {
  assert.deepEqual(
    getCatalogueDefinition("CRT-C").relationships.map((r) => [r.field, r.target]),
    [
      ["mapped_failure_ids", "CRT-F"],
      ["mapped_compensation_ids", "CRT-N"],
      ["mapped_policy_ids", "CRT-POL"],
    ]
  );
});

test("relationshipsTargeting lists every catalogue that references controls", () => {
  assert.deepEqual(
    relationshipsTargeting("CRT-C").map((r) => r.source),
    ["CRT-F", "CRT-N", "CRT-REQ", "CRT-LR", "CRT-AS", "CRT-I", "CRT-SC", "CRT-T"]
  );
});

test("relationshipsTargeting is empty for unreferenced catalogues", () => {
  assert.deepEqual(relationshipsTargeting("CRT-G"), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// TABLE VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("Definition table validation");

test("a complete table parses", () => {
  const map = parseCatalogueDefinitions(minimalTable());
  assert.equal(map.size, 13);
});

test("a table missing a catalogue is rejected", () => {
  const table = minimalTable().filter((d) => d["name"] !== "CRT-T");
  assert.throws(
    () => parseCatalogueDefinitions(table),
    (err: unknown) =>
      err instanceof ZodError &&
      err.issues.some((issue) => issue.message === 'Missing definition for catalogue "CRT-T"')
  );
});

test("a catalogue defined twice is rejected", () => {
  const table = [...minimalTable(), minimalTable()[0]];
  assert.throws(() => parseCatalogueDefinitions(table), ZodError);
});

test("a relationship on the primary id column is rejected", () => {
  const table = minimalTable();
  table[0] = {
    ...table[0],
    relationships: [{ field: "id", target: "CRT-F", relation: "self" }],
  };
  assert.throws(() => parseCatalogueDefinitions(table), ZodError);
});

test("an unknown relationship target is rejected", () => {
  const table = minimalTable();
  table[0] = {
    ...table[0],
    relationships: [{ field: "mapped_ids", target: "CRT-X", relation: "points_to" }],
  };
  assert.throws(() => parseCatalogueDefinitions(table), ZodError);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
