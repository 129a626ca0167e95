#!/usr/bin/env node
/**
 * CLI command to validate the CRT catalogue directory.
 *
 * Loads every catalogue through the registry and reports:
 * - Backbone vs append-only counts
 * - Row and column counts per catalogue
 * - Load failures with their issues
 *
 * Optionally probes one entity and prints its structural relationships.
 *
 * Usage:
 *   npx tsx src/cli/validate-catalogues.ts [options]
 *   npm run validate-catalogues
 *
 * Options:
 *   --dir <path>         Catalogue directory (default: CRT_CATALOGUE_DIR or data/catalogues)
 *   --catalogue <name>   Catalogue of the entity to probe (e.g. CRT-C)
 *   --entity <id>        Entity id to probe (requires --catalogue)
 *   --json               Output the report as JSON (for CI parsing)
 *   --verbose            Show every load issue, not only the first
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - All catalogues loaded (and the probed entity, if any, was found)
 *   1 - One or more catalogues failed, or the probed entity was not found
 *   2 - Invalid usage
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";

import { loadConfig, validateConfig, ConfigError, type AppConfig } from "../config/index.js";
import {
  CatalogueError,
  CatalogueRegistry,
  formatHealthReport,
  summariseCatalogues,
  type Entity,
  type HealthOverview,
  type LoadIssue,
  type RelationshipEdge,
} from "../catalogues/index.js";
import { createLogger, generateRunId, initRunId, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface EntityProbe {
  catalogue: string;
  id: string;
  found: boolean;
  entity?: Entity;
  relationships?: RelationshipEdge[];
  error?: string;
}

export interface ValidationReport {
  timestamp: string;
  runId: string;
  directory: string;
  overview: HealthOverview;
  issues: Array<{ catalogue: string; issues: LoadIssue[] }>;
  probe?: EntityProbe;
  success: boolean;
}

export interface ValidationOptions {
  catalogue?: string;
  entity?: string;
}

export interface CliContext {
  runId: string;
  logger: Logger;
  registry: CatalogueRegistry;
}

// ============================================================
// Setup
// ============================================================

/**
 * Validate the configuration, start the run and build the registry.
 * `directory` (from --dir) overrides CRT_CATALOGUE_DIR.
 *
 * @throws ConfigError
 */
export function createCliContext(config: AppConfig, directory?: string): CliContext {
  validateConfig(config);

  const runId = initRunId(config.runId);
  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
    console: false,
    scope: "validate-catalogues",
  });
  const registry = CatalogueRegistry.create({
    directory: resolve(directory ?? config.catalogueDir),
    logger,
  });

  return { runId, logger, registry };
}

// ============================================================
// Report building
// ============================================================

function probeEntity(registry: CatalogueRegistry, catalogue: string, id: string): EntityProbe {
  try {
    const entity = registry.resolveEntity(catalogue, id);
    const relationships = registry.buildStructuralRelationships(catalogue, id);
    return { catalogue, id, found: true, entity, relationships };
  } catch (err) {
    if (err instanceof CatalogueError) {
      return { catalogue, id, found: false, error: err.message };
    }
    throw err;
  }
}

/**
 * Load every catalogue and assemble the validation report.
 */
export function buildValidationReport(
  registry: CatalogueRegistry,
  options: ValidationOptions = {},
  runId: string = generateRunId()
): ValidationReport {
  const loadReport = registry.loadAll();
  const overview = summariseCatalogues(loadReport);

  const issues = loadReport.statuses.flatMap((status) =>
    status.ok ? [] : [{ catalogue: status.name, issues: [...status.error.issues] }]
  );

  const probe =
    options.catalogue !== undefined && options.entity !== undefined
      ? probeEntity(registry, options.catalogue, options.entity)
      : undefined;

  return {
    timestamp: new Date().toISOString(),
    runId,
    directory: registry.catalogueDirectory,
    overview,
    issues,
    probe,
    success: overview.failed === 0 && (probe === undefined || probe.found),
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env["NO_COLOR"];

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * Render the probe section as plain text lines.
 */
export function formatProbe(probe: EntityProbe): string[] {
  const lines: string[] = ["", `Entity ${probe.catalogue} / ${probe.id}`];

  if (!probe.found || probe.entity === undefined) {
    lines.push(`  not found: ${probe.error ?? "unknown reason"}`);
    return lines;
  }

  for (const [column, value] of Object.entries(probe.entity)) {
    lines.push(`  ${column}: ${value}`);
  }

  const edges = probe.relationships ?? [];
  lines.push("", `Relationships (${edges.length})`);
  for (const edge of edges) {
    const arrow = edge.direction === "outgoing" ? "→" : "←";
    const other =
      edge.direction === "outgoing"
        ? `${edge.toCatalogue} ${edge.toId}`
        : `${edge.fromCatalogue} ${edge.fromId}`;
    lines.push(`  ${arrow} ${edge.relation} ${other} (via ${edge.field})`);
  }
  return lines;
}

function printTextReport(report: ValidationReport, verbose: boolean): void {
  console.log("");
  console.log(c("dim", `Directory: ${report.directory}`));
  console.log(c("dim", `Run:       ${report.runId}`));
  console.log(formatHealthReport(report.overview));

  if (verbose) {
    for (const { catalogue, issues } of report.issues) {
      console.log("");
      console.log(c("bold", `${catalogue} issues:`));
      for (const issue of issues) {
        console.log(`  ${c("red", "•")} [${issue.type}] ${issue.message}`);
      }
    }
  }

  if (report.probe) {
    for (const line of formatProbe(report.probe)) {
      console.log(line);
    }
  }

  console.log("");
  console.log(report.success ? c("green", "✓ Validation passed") : c("red", "✗ Validation failed"));
}

// ============================================================
// CLI Parsing
// ============================================================

function printHelp(): void {
  console.log(`
Usage: validate-catalogues [options]

Options:
  --dir <path>         Catalogue directory (default: CRT_CATALOGUE_DIR or data/catalogues)
  --catalogue <name>   Catalogue of the entity to probe (e.g. CRT-C)
  --entity <id>        Entity id to probe (requires --catalogue)
  --json               Output the report as JSON (for CI parsing)
  --verbose            Show every load issue, not only the first
  -h, --help           Show this help message
`);
}

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      dir: { type: "string" },
      catalogue: { type: "string" },
      entity: { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

function main(): void {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    printHelp();
    process.exit(2);
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.entity !== undefined && args.catalogue === undefined) {
    console.error("--entity requires --catalogue");
    process.exit(2);
  }

  let context: CliContext;
  try {
    context = createCliContext(loadConfig(), args.dir);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(2);
    }
    throw err;
  }

  const report = buildValidationReport(
    context.registry,
    { catalogue: args.catalogue, entity: args.entity },
    context.runId
  );

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printTextReport(report, args.verbose);
  }

  process.exit(report.success ? 0 : 1);
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main();
}
