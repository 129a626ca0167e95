/**
 * Catalogue file reading.
 *
 * Turns a CSV or YAML file into a raw table: column names plus one record per
 * data row. No catalogue rules are applied here (see loader.ts).
 *
 * CSV handling follows what spreadsheet exports produce:
 *   - UTF-8, with a Latin-1 fallback when the bytes are not valid UTF-8
 *   - a leading byte-order mark is ignored
 *   - blank headers and "Unnamed: N" headers are export artefacts and dropped
 *   - records whose cells are all empty are skipped
 *   - short records are padded with ""
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { TextDecoder } from "node:util";
import { parse as parseCsv } from "csv-parse/sync";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { CatalogueFormat, CatalogueSource } from "./schema.js";
import type { LoadIssue } from "./errors.js";

/**
 * Columns and records read from a file, before catalogue validation.
 */
export interface RawTable {
  columns: string[];
  records: Record<string, string>[];
  /** Structural problems found while reading (e.g. duplicate headers) */
  issues: LoadIssue[];
}

/**
 * Candidate file names for a catalogue, in priority order. CSV is the
 * authoritative format when several exist.
 */
const SOURCE_CANDIDATES: ReadonlyArray<{ extension: string; format: CatalogueFormat }> = [
  { extension: ".csv", format: "csv" },
  { extension: ".yaml", format: "yaml" },
  { extension: ".yml", format: "yaml" },
];

/**
 * All existing files for a catalogue in a directory, highest priority first.
 */
export function findCatalogueSources(directory: string, name: string): CatalogueSource[] {
  return SOURCE_CANDIDATES.map(({ extension, format }) => ({
    path: join(directory, `${name}${extension}`),
    format,
  })).filter((source) => existsSync(source.path));
}

const utf8 = new TextDecoder("utf-8", { fatal: true });
const latin1 = new TextDecoder("latin1");

/**
 * Decode file bytes as UTF-8, falling back to Latin-1.
 */
export function decodeCatalogueBytes(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    return latin1.decode(bytes);
  }
}

function isArtefactColumn(header: string): boolean {
  return header === "" || header.startsWith("Unnamed:");
}

const CsvMatrix = z.array(z.array(z.string()));

/**
 * Parse CSV text into a raw table.
 *
 * @throws Error (from csv-parse) when the text is not well-formed CSV
 */
export function parseCsvTable(text: string): RawTable {
  const matrix = CsvMatrix.parse(
    parseCsv(text, {
      bom: true,
      skip_empty_lines: true,
      skip_records_with_empty_values: true,
      relax_column_count: true,
    })
  );

  const [header, ...body] = matrix;
  if (header === undefined) {
    return { columns: [], records: [], issues: [] };
  }

  const issues: LoadIssue[] = [];
  const kept: Array<{ index: number; name: string }> = [];
  const seen = new Set<string>();

  header.forEach((raw, index) => {
    const name = raw.trim();
    if (isArtefactColumn(name)) {
      return;
    }
    if (seen.has(name)) {
      issues.push({
        type: "duplicate_header",
        column: name,
        message: `Column "${name}" appears more than once in the header`,
      });
      return;
    }
    seen.add(name);
    kept.push({ index, name });
  });

  const records = body.map((cells) =>
    Object.fromEntries(
      kept.map(({ index, name }): [string, string] => [name, cells[index] ?? ""])
    )
  );

  return { columns: kept.map((c) => c.name), records, issues };
}

const YamlRecord = z.record(z.string(), z.string().nullable());
const YamlCatalogue = z.union([
  z.array(YamlRecord),
  z.object({ records: z.array(YamlRecord) }).passthrough(),
]);

/** Plain scalars that YAML 1.2 reads as null */
const YAML_NULLS: ReadonlySet<string> = new Set(["", "~", "null", "Null", "NULL"]);

function scalarToCell(value: string | null): string {
  return value === null || YAML_NULLS.has(value) ? "" : value;
}

/**
 * Parse YAML text into a raw table. Accepts a sequence of mappings, or a
 * mapping whose `records` key holds that sequence.
 *
 * Scalars are read with the failsafe schema, so cells keep their source text
 * ("0010" stays "0010"); only null literals become "".
 *
 * @throws Error (from yaml) on syntax errors
 * @throws ZodError when the document is not a list of flat records
 */
export function parseYamlTable(text: string): RawTable {
  const document = YamlCatalogue.parse(parseYaml(text, { schema: "failsafe" }));
  const rawRecords = Array.isArray(document) ? document : document.records;

  const columns: string[] = [];
  const known = new Set<string>();
  for (const record of rawRecords) {
    for (const key of Object.keys(record)) {
      if (!known.has(key)) {
        known.add(key);
        columns.push(key);
      }
    }
  }

  const records = rawRecords.map((record) =>
    Object.fromEntries(
      columns.map((column): [string, string] => {
        const value = record[column];
        return [column, value === undefined ? "" : scalarToCell(value)];
      })
    )
  );

  return { columns, records, issues: [] };
}

/**
 * Read a catalogue file as text.
 *
 * @throws NodeJS.ErrnoException when the file cannot be read
 */
export function readCatalogueText(source: CatalogueSource): string {
  return decodeCatalogueBytes(readFileSync(source.path));
}

/**
 * Parse catalogue text in the source's format.
 */
export function parseCatalogueTable(text: string, format: CatalogueFormat): RawTable {
  return format === "csv" ? parseCsvTable(text) : parseYamlTable(text);
}
