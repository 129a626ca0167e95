/**
 * Catalogue registry: the single read-only access point for CRT catalogues.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Construct one registry per process and pass it to consumers. Each catalogue
 * moves from "unloaded" to "loaded" the first time it is requested; the loaded
 * catalogue is frozen and the same object is returned on every later request.
 * A failed load is not remembered, so asking again retries the read.
 *
 * The registry never writes, merges or rewrites catalogue files. Append-only
 * catalogues that gain rows on disk are picked up by the next process.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONSUMPTION PATTERNS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   const registry = CatalogueRegistry.create({ directory: "data/catalogues" });
 *
 *   const control = registry.resolveEntity("CRT-C", "CRT-C-0001");
 *   const failures = registry.buildRelationships(control, "CRT-F", "mapped_failure_ids");
 *   const edges = registry.buildStructuralRelationships("CRT-C", "CRT-C-0001");
 */

import {
  getCatalogueDefinition,
  isCatalogueName,
  listCatalogueNames,
  relationshipsTargeting,
  type CatalogueDefinition,
  type CatalogueName,
} from "./definitions.js";
import { LoadError, NotFoundError, UnknownCatalogueError } from "./errors.js";
import { loadCatalogueFromDirectory } from "./loader.js";
import { idListContains, parseIdList, readRelationshipField } from "./relationships.js";
import type { Catalogue, Entity, RelationshipEdge } from "./schema.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

export interface CatalogueRegistryOptions {
  /** Directory holding the catalogue files */
  directory: string;
  /** Defaults to a logger that discards everything */
  logger?: Logger;
}

/**
 * Outcome of attempting to load one catalogue.
 */
export type CatalogueLoadStatus =
  | { name: CatalogueName; definition: CatalogueDefinition; ok: true; catalogue: Catalogue }
  | { name: CatalogueName; definition: CatalogueDefinition; ok: false; error: LoadError };

/**
 * Outcome of loading every catalogue, in canonical order.
 */
export interface LoadReport {
  statuses: CatalogueLoadStatus[];
  loaded: number;
  failed: number;
}

export class CatalogueRegistry {
  private readonly directory: string;
  private readonly logger: Logger;
  private readonly loaded = new Map<CatalogueName, Catalogue>();

  private constructor(options: CatalogueRegistryOptions) {
    this.directory = options.directory;
    this.logger = (options.logger ?? createSilentLogger()).child("registry");
  }

  /**
   * Create a registry over a catalogue directory. Nothing is read until a
   * catalogue is first requested (or loadAll() is called).
   */
  static create(options: CatalogueRegistryOptions): CatalogueRegistry {
    return new CatalogueRegistry(options);
  }

  get catalogueDirectory(): string {
    return this.directory;
  }

  // ============================================================
  // Catalogue access
  // ============================================================

  /**
   * Narrow a caller-supplied name to the closed catalogue set.
   *
   * @throws UnknownCatalogueError
   */
  private requireName(name: string): CatalogueName {
    if (!isCatalogueName(name)) {
      throw new UnknownCatalogueError(name);
    }
    return name;
  }

  /**
   * Definition (kind, primary id column, relationship fields) of a catalogue.
   *
   * @throws UnknownCatalogueError
   */
  getDefinition(name: string): CatalogueDefinition {
    return getCatalogueDefinition(this.requireName(name));
  }

  /**
   * Whether the catalogue has already been loaded by this registry.
   */
  isLoaded(name: string): boolean {
    return isCatalogueName(name) && this.loaded.has(name);
  }

  /**
   * Get a loaded catalogue, reading it on first request.
   *
   * @throws UnknownCatalogueError if the name is outside the closed set
   * @throws LoadError if the backing file is missing or malformed
   */
  getCatalogue(name: string): Catalogue {
    const catalogueName = this.requireName(name);

    const cached = this.loaded.get(catalogueName);
    if (cached !== undefined) {
      return cached;
    }

    let catalogue: Catalogue;
    try {
      catalogue = loadCatalogueFromDirectory(
        getCatalogueDefinition(catalogueName),
        this.directory,
        this.logger
      );
    } catch (err) {
      if (err instanceof LoadError) {
        this.logger.error("Catalogue failed to load", {
          catalogue: catalogueName,
          issues: err.issues.map((issue) => issue.message),
        });
      }
      throw err;
    }

    this.loaded.set(catalogueName, catalogue);
    this.logger.info("Catalogue loaded", {
      catalogue: catalogueName,
      kind: catalogue.kind,
      rows: catalogue.rows.length,
      source: catalogue.source.path,
    });
    return catalogue;
  }

  /**
   * All rows of a catalogue, in file order.
   */
  getAllEntities(name: string): ReadonlyArray<Entity> {
    return this.getCatalogue(name).rows;
  }

  /**
   * Look up an entity by exact, case-sensitive primary id.
   *
   * @throws NotFoundError when no row has that id
   */
  resolveEntity(name: string, id: string): Entity {
    const catalogue = this.getCatalogue(name);
    const entity = catalogue.byId.get(id);
    if (entity === undefined) {
      throw new NotFoundError(catalogue.name, id);
    }
    return entity;
  }

  /**
   * Non-throwing variant of resolveEntity for absent ids.
   * Unknown catalogue names and load failures still throw.
   */
  findEntity(name: string, id: string): Entity | undefined {
    return this.getCatalogue(name).byId.get(id);
  }

  // ============================================================
  // Relationships
  // ============================================================

  /**
   * Resolve the ids listed in one of an entity's relationship fields.
   *
   * Ids that do not (yet) exist in the target catalogue are skipped rather
   * than failing the whole lookup. An absent, empty or whitespace-only field
   * yields an empty array.
   *
   * @param entity - Row holding the relationship field
   * @param targetName - Catalogue the ids point into
   * @param relationshipField - Column holding the semicolon-delimited ids
   * @returns Resolved entities in field order
   * @throws UnknownCatalogueError / LoadError for the target catalogue
   */
  buildRelationships(
    entity: Entity,
    targetName: string,
    relationshipField: string
  ): Entity[] {
    const target = this.getCatalogue(targetName);
    const { ids, nonCanonical } = parseIdList(
      readRelationshipField(entity, relationshipField)
    );

    if (nonCanonical.length > 0) {
      this.logger.warn("Relationship field uses a non-canonical delimiter", {
        field: relationshipField,
        target: target.name,
        tokens: nonCanonical,
      });
    }

    const resolved: Entity[] = [];
    for (const id of ids) {
      const related = target.byId.get(id);
      if (related === undefined) {
        this.logger.debug("Skipping unresolved relationship id", {
          field: relationshipField,
          target: target.name,
          id,
        });
        continue;
      }
      resolved.push(related);
    }
    return resolved;
  }

  /**
   * Every structural link of an entity through the declared relationship
   * fields: outgoing links from its own fields, and incoming links from rows
   * of other catalogues that list its id.
   *
   * Links to ids that do not resolve are left out. Catalogues that fail to
   * load are logged and skipped so one broken file does not hide the rest.
   *
   * @throws UnknownCatalogueError / LoadError / NotFoundError for the
   *   entity's own catalogue and id
   */
  buildStructuralRelationships(name: string, id: string): RelationshipEdge[] {
    const entity = this.resolveEntity(name, id);
    const catalogueName = this.requireName(name);
    const edges: RelationshipEdge[] = [];

    for (const rel of getCatalogueDefinition(catalogueName).relationships) {
      const target = this.tryGetCatalogue(rel.target);
      if (target === undefined) {
        continue;
      }
      for (const related of this.buildRelationships(entity, rel.target, rel.field)) {
        const toId = related[target.primaryIdColumn];
        if (toId === undefined) {
          continue;
        }
        edges.push({
          fromCatalogue: catalogueName,
          fromId: id,
          relation: rel.relation,
          field: rel.field,
          toCatalogue: rel.target,
          toId,
          direction: "outgoing",
        });
      }
    }

    for (const rel of relationshipsTargeting(catalogueName)) {
      const source = this.tryGetCatalogue(rel.source);
      if (source === undefined) {
        continue;
      }
      for (const row of source.rows) {
        const fromId = row[source.primaryIdColumn];
        if (fromId === undefined || !idListContains(readRelationshipField(row, rel.field), id)) {
          continue;
        }
        edges.push({
          fromCatalogue: rel.source,
          fromId,
          relation: rel.relation,
          field: rel.field,
          toCatalogue: catalogueName,
          toId: id,
          direction: "incoming",
        });
      }
    }

    return edges;
  }

  private tryGetCatalogue(name: CatalogueName): Catalogue | undefined {
    try {
      return this.getCatalogue(name);
    } catch (err) {
      if (err instanceof LoadError) {
        this.logger.warn("Skipping catalogue that failed to load", { catalogue: name });
        return undefined;
      }
      throw err;
    }
  }

  // ============================================================
  // Bulk loading
  // ============================================================

  /**
   * Attempt to load every catalogue, collecting failures instead of
   * throwing. Already-loaded catalogues are not read again.
   */
  loadAll(): LoadReport {
    const statuses = listCatalogueNames().map((name): CatalogueLoadStatus => {
      const definition = getCatalogueDefinition(name);
      try {
        return { name, definition, ok: true, catalogue: this.getCatalogue(name) };
      } catch (err) {
        if (err instanceof LoadError) {
          return { name, definition, ok: false, error: err };
        }
        throw err;
      }
    });

    const loaded = statuses.filter((s) => s.ok).length;
    return { statuses, loaded, failed: statuses.length - loaded };
  }
}
