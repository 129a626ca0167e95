/**
 * Entry point for the CRT catalogue hub.
 *
 * Initialises the run ID, configuration and logger, builds the process-wide
 * registry and loads every catalogue once so problems surface at startup.
 */

import { pathToFileURL } from "node:url";

import { loadConfig, validateConfig, ConfigError, type AppConfig } from "./config/index.js";
import { initRunId, createLogger, type Logger } from "./logging/index.js";
import { CatalogueRegistry } from "./catalogues/index.js";

export interface HubContext {
  config: AppConfig;
  logger: Logger;
  registry: CatalogueRegistry;
}

/**
 * Build the shared context consumers receive by reference.
 */
export function startHub(config: AppConfig = loadConfig()): HubContext {
  validateConfig(config);

  const runId = initRunId(config.runId);
  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
    scope: config.appName,
  });

  logger.info("Application starting", { runId, env: config.env });
  logger.debug("Configuration loaded", {
    debug: config.debug,
    logLevel: config.logLevel,
    catalogueDir: config.catalogueDir,
  });

  const registry = CatalogueRegistry.create({ directory: config.catalogueDir, logger });
  const report = registry.loadAll();

  if (report.failed > 0) {
    logger.warn("Some catalogues failed to load", {
      failed: report.statuses.filter((s) => !s.ok).map((s) => s.name),
    });
  }
  logger.info("Catalogue hub ready", { loaded: report.loaded, failed: report.failed });

  return { config, logger, registry };
}

function main(): void {
  try {
    startHub();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main();
}
