/**
 * Loaded catalogue and relationship types.
 *
 * Column sets differ per catalogue, so an entity is a generic record of
 * column name to cell text rather than one record type per catalogue.
 * Absent cells are the empty string.
 */

import { z } from "zod";
import { CatalogueName, type CatalogueKind } from "./definitions.js";

export type Entity = Readonly<Record<string, string>>;

export type CatalogueFormat = "csv" | "yaml";

/**
 * File a catalogue was read from.
 */
export interface CatalogueSource {
  readonly path: string;
  readonly format: CatalogueFormat;
}

/**
 * An immutable, loaded catalogue.
 */
export interface Catalogue {
  readonly name: CatalogueName;
  readonly kind: CatalogueKind;
  readonly label: string;
  readonly primaryIdColumn: string;
  /** Column names in file order */
  readonly columns: ReadonlyArray<string>;
  /** Rows in file order */
  readonly rows: ReadonlyArray<Entity>;
  /** Index: primary id -> row. Read-only at run time, not only in its type */
  readonly byId: ReadonlyMap<string, Entity>;
  readonly source: CatalogueSource;
}

export const RelationshipDirection = z.enum(["outgoing", "incoming"]);
export type RelationshipDirection = z.infer<typeof RelationshipDirection>;

/**
 * One resolved structural link between two entities.
 */
export const RelationshipEdgeSchema = z.object({
  fromCatalogue: CatalogueName,
  fromId: z.string().min(1),
  relation: z.string().min(1),
  /** Relationship field on the source catalogue that carries the link */
  field: z.string().min(1),
  toCatalogue: CatalogueName,
  toId: z.string().min(1),
  /** Direction relative to the entity the edges were built for */
  direction: RelationshipDirection,
});
export type RelationshipEdge = z.infer<typeof RelationshipEdgeSchema>;
