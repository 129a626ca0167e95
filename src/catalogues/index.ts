/**
 * CRT catalogue hub.
 *
 * Loads the closed set of CRT catalogues from a directory, validates them and
 * serves catalogues, entity lookups and cross-catalogue relationships.
 *
 *   import { CatalogueRegistry } from "./catalogues/index.js";
 *
 *   const registry = CatalogueRegistry.create({ directory: config.catalogueDir, logger });
 *   const control = registry.resolveEntity("CRT-C", "CRT-C-0001");
 *   const failures = registry.buildRelationships(control, "CRT-F", "mapped_failure_ids");
 */

// Definitions
export {
  CatalogueName,
  CatalogueKind,
  CatalogueDefinitionSchema,
  RelationshipFieldSchema,
  parseCatalogueDefinitions,
  getCatalogueDefinition,
  isCatalogueName,
  isBackbone,
  listCatalogueNames,
  relationshipsTargeting,
  type CatalogueDefinition,
  type RelationshipField,
  type IncomingRelationship,
} from "./definitions.js";

// Types
export {
  RelationshipDirection,
  RelationshipEdgeSchema,
  type Catalogue,
  type CatalogueFormat,
  type CatalogueSource,
  type Entity,
  type RelationshipEdge,
} from "./schema.js";

// Errors
export {
  CatalogueError,
  UnknownCatalogueError,
  LoadError,
  NotFoundError,
  type LoadIssue,
  type LoadIssueType,
} from "./errors.js";

// Reading and loading
export {
  findCatalogueSources,
  decodeCatalogueBytes,
  parseCsvTable,
  parseYamlTable,
  parseCatalogueTable,
  readCatalogueText,
  type RawTable,
} from "./reader.js";
export { validateCatalogueTable, buildCatalogue, loadCatalogueFromDirectory } from "./loader.js";

// Relationships
export {
  parseIdList,
  idListContains,
  readRelationshipField,
  RELATIONSHIP_DELIMITER,
  type ParsedIdList,
} from "./relationships.js";

// Registry
export {
  CatalogueRegistry,
  type CatalogueRegistryOptions,
  type CatalogueLoadStatus,
  type LoadReport,
} from "./registry.js";

// Health
export {
  summariseCatalogues,
  formatHealthReport,
  type CatalogueSummary,
  type HealthOverview,
} from "./health.js";
