/**
 * Catalogue loader and validator.
 *
 * Responsible for:
 * - Locating the backing file of a catalogue (CSV, else YAML)
 * - Reading and parsing it into a raw table
 * - Validating the catalogue rules:
 *     the primary id column exists
 *     every row has a non-blank primary id
 *     primary ids are unique within the catalogue
 * - Freezing the result into an immutable Catalogue with an id index
 *
 * Every failure surfaces as a LoadError carrying the catalogue name, the
 * individual issues and, where one exists, the underlying cause.
 */

import type { CatalogueDefinition } from "./definitions.js";
import { LoadError, type LoadIssue } from "./errors.js";
import {
  findCatalogueSources,
  parseCatalogueTable,
  readCatalogueText,
  type RawTable,
} from "./reader.js";
import type { Catalogue, CatalogueSource, Entity } from "./schema.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

/**
 * Check a raw table against a catalogue definition.
 * Returns every issue found; an empty array means the table is loadable.
 */
export function validateCatalogueTable(
  definition: CatalogueDefinition,
  table: RawTable
): LoadIssue[] {
  const issues: LoadIssue[] = [...table.issues];
  const idColumn = definition.primaryIdColumn;

  if (!table.columns.includes(idColumn)) {
    issues.push({
      type: "missing_column",
      column: idColumn,
      message: `Primary id column "${idColumn}" is missing. Found: ${
        table.columns.length > 0 ? table.columns.join(", ") : "(no columns)"
      }`,
    });
    return issues;
  }

  const firstSeen = new Map<string, number>();
  table.records.forEach((record, index) => {
    const row = index + 1;
    const id = record[idColumn] ?? "";

    if (id.trim() === "") {
      issues.push({
        type: "blank_id",
        row,
        column: idColumn,
        message: `Row ${row} has no ${idColumn}`,
      });
      return;
    }

    const previous = firstSeen.get(id);
    if (previous !== undefined) {
      issues.push({
        type: "duplicate_id",
        row,
        column: idColumn,
        message: `Duplicate ${idColumn} "${id}" (first seen at row ${previous}, duplicate at row ${row})`,
      });
    } else {
      firstSeen.set(id, row);
    }
  });

  return issues;
}

/**
 * Frozen id index with no mutators.
 */
class EntityIndex implements ReadonlyMap<string, Entity> {
  private readonly index: Map<string, Entity>;

  constructor(entries: Iterable<readonly [string, Entity]>) {
    this.index = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.index.size;
  }

  get(id: string): Entity | undefined {
    return this.index.get(id);
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  forEach(
    callback: (value: Entity, key: string, map: ReadonlyMap<string, Entity>) => void,
    thisArg?: unknown
  ): void {
    this.index.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  keys() {
    return this.index.keys();
  }

  values() {
    return this.index.values();
  }

  entries() {
    return this.index.entries();
  }

  [Symbol.iterator]() {
    return this.index[Symbol.iterator]();
  }
}

/**
 * Build an immutable catalogue from a raw table.
 *
 * @throws LoadError if the table breaks a catalogue rule
 */
export function buildCatalogue(
  definition: CatalogueDefinition,
  table: RawTable,
  source: CatalogueSource
): Catalogue {
  const issues = validateCatalogueTable(definition, table);
  if (issues.length > 0) {
    throw new LoadError(definition.name, issues);
  }

  const rows: ReadonlyArray<Entity> = Object.freeze(
    table.records.map((record) => Object.freeze({ ...record }))
  );

  const byId = new EntityIndex(
    rows.flatMap((row): Array<[string, Entity]> => {
      const id = row[definition.primaryIdColumn];
      return id === undefined ? [] : [[id, row]];
    })
  );

  return Object.freeze({
    name: definition.name,
    kind: definition.kind,
    label: definition.label,
    primaryIdColumn: definition.primaryIdColumn,
    columns: Object.freeze([...table.columns]),
    rows,
    byId,
    source: Object.freeze({ ...source }),
  });
}

function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Load one catalogue from a directory.
 *
 * @param definition - Definition of the catalogue to load
 * @param directory - Directory holding the catalogue files
 * @param logger - Receives notes about ignored alternative files
 * @returns Validated, frozen catalogue
 * @throws LoadError when the file is missing, unreadable, malformed or
 *   breaks a catalogue rule
 */
export function loadCatalogueFromDirectory(
  definition: CatalogueDefinition,
  directory: string,
  logger: Logger = createSilentLogger()
): Catalogue {
  const [source, ...ignored] = findCatalogueSources(directory, definition.name);

  if (source === undefined) {
    throw new LoadError(definition.name, [
      {
        type: "missing_file",
        message: `No ${definition.name}.csv, ${definition.name}.yaml or ${definition.name}.yml in ${directory}`,
      },
    ]);
  }

  if (ignored.length > 0) {
    logger.debug("Using highest-priority catalogue file", {
      catalogue: definition.name,
      path: source.path,
      ignored: ignored.map((s) => s.path),
    });
  }

  let text: string;
  try {
    text = readCatalogueText(source);
  } catch (err) {
    throw new LoadError(
      definition.name,
      [{ type: "unreadable", message: `Cannot read ${source.path}: ${describeCause(err)}` }],
      { cause: err }
    );
  }

  let table: RawTable;
  try {
    table = parseCatalogueTable(text, source.format);
  } catch (err) {
    throw new LoadError(
      definition.name,
      [
        {
          type: "malformed",
          message: `Cannot parse ${source.path} as ${source.format.toUpperCase()}: ${describeCause(err)}`,
        },
      ],
      { cause: err }
    );
  }

  return buildCatalogue(definition, table, source);
}
