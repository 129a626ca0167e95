/**
 * Configuration Tests
 *
 * Run: node --import tsx src/config/env.test.ts
 */

import { strict as assert } from "node:assert";

import {
  ConfigError,
  loadConfig,
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
  optionalEnvInt,
  requireEnv,
  validateConfig,
} from "./index.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// ENV HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Environment helpers");

test("requireEnv returns the trimmed value", () => {
  assert.equal(requireEnv("KEY", { KEY: "  value " }), "value");
});

test("requireEnv rejects missing and blank values", () => {
  assert.throws(() => requireEnv("KEY", {}), ConfigError);
  assert.throws(() => requireEnv("KEY", { KEY: "   " }), /Missing required environment variable: KEY/);
});

test("optionalEnv falls back on blank values", () => {
  assert.equal(optionalEnv("KEY", "fallback", { KEY: "" }), "fallback");
  assert.equal(optionalEnv("KEY", "fallback", { KEY: "set" }), "set");
});

test("optionalEnvInt parses whole numbers only", () => {
  assert.equal(optionalEnvInt("N", 5, {}), 5);
  assert.equal(optionalEnvInt("N", 5, { N: "12" }), 12);
  assert.equal(optionalEnvInt("N", 5, { N: "-3" }), -3);
  assert.throws(() => optionalEnvInt("N", 5, { N: "1.5" }), ConfigError);
  assert.throws(() => optionalEnvInt("N", 5, { N: "12abc" }), ConfigError);
});

test("optionalEnvBool recognises the usual spellings", () => {
  assert.equal(optionalEnvBool("B", false, { B: "YES" }), true);
  assert.equal(optionalEnvBool("B", true, { B: "0" }), false);
  assert.equal(optionalEnvBool("B", true, {}), true);
  assert.throws(() => optionalEnvBool("B", true, { B: "maybe" }), ConfigError);
});

test("optionalEnvEnum accepts only listed values", () => {
  const levels = ["low", "high"] as const;
  assert.equal(optionalEnvEnum("L", levels, "low", {}), "low");
  assert.equal(optionalEnvEnum("L", levels, "low", { L: "high" }), "high");
  assert.throws(
    () => optionalEnvEnum("L", levels, "low", { L: "HIGH" }),
    /Invalid L: HIGH\. Must be one of low, high\./
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// APP CONFIG
// ═══════════════════════════════════════════════════════════════════════════

section("Application config");

test("loadConfig applies defaults", () => {
  const config = loadConfig({});
  assert.deepEqual(config, {
    env: "development",
    debug: false,
    logLevel: "info",
    logDir: "output/logs",
    logToFile: true,
    appName: "crt-catalogue-hub",
    catalogueDir: "data/catalogues",
    runId: undefined,
  });
  assert.ok(Object.isFrozen(config));
});

test("DEBUG lowers the default log level", () => {
  assert.equal(loadConfig({ DEBUG: "true" }).logLevel, "debug");
  assert.equal(loadConfig({ DEBUG: "true", LOG_LEVEL: "warn" }).logLevel, "warn");
});

test("loadConfig reads catalogue directory and run id", () => {
  const config = loadConfig({ CRT_CATALOGUE_DIR: "/srv/crt", CRT_RUN_ID: "nightly-1", LOG_TO_FILE: "no" });
  assert.equal(config.catalogueDir, "/srv/crt");
  assert.equal(config.runId, "nightly-1");
  assert.equal(config.logToFile, false);
});

test("loadConfig rejects unknown NODE_ENV and LOG_LEVEL", () => {
  assert.throws(() => loadConfig({ NODE_ENV: "staging" }), ConfigError);
  assert.throws(() => loadConfig({ LOG_LEVEL: "verbose" }), ConfigError);
});

test("validateConfig rejects unsafe run ids", () => {
  const config = loadConfig({ CRT_RUN_ID: "run 1" });
  assert.throws(() => validateConfig(config), /Invalid CRT_RUN_ID: run 1/);
});

test("validateConfig rejects debug logging in production", () => {
  const config = loadConfig({ NODE_ENV: "production", LOG_LEVEL: "debug" });
  assert.throws(() => validateConfig(config), ConfigError);
  assert.doesNotThrow(() => validateConfig(loadConfig({ NODE_ENV: "production" })));
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
