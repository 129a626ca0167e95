/**
 * Relationship field parsing.
 *
 * A relationship field holds identifiers of entities in another catalogue,
 * separated by semicolons: "CRT-C-0001; CRT-C-0004".
 *
 * Semicolon is the only delimiter. Some hand-edited rows use commas
 * ("CRT-C-0001, CRT-C-0004"); such tokens are NOT split. They are reported
 * as non-canonical so the data can be fixed at source, and resolve like any
 * other token (normally to nothing).
 */

import type { Entity } from "./schema.js";

export const RELATIONSHIP_DELIMITER = ";";

export interface ParsedIdList {
  /** Trimmed, non-empty identifiers in field order, first occurrence kept */
  ids: string[];
  /** Tokens that look comma-delimited */
  nonCanonical: string[];
}

/**
 * Split a relationship field value into identifiers.
 *
 * @example
 *   parseIdList(" CRT-F-0002 ;;CRT-F-0007 ")
 *   // { ids: ["CRT-F-0002", "CRT-F-0007"], nonCanonical: [] }
 */
export function parseIdList(value: string | undefined): ParsedIdList {
  const ids: string[] = [];
  const nonCanonical: string[] = [];

  if (value === undefined) {
    return { ids, nonCanonical };
  }

  const seen = new Set<string>();
  for (const raw of value.split(RELATIONSHIP_DELIMITER)) {
    const token = raw.trim();
    if (token === "" || seen.has(token)) {
      continue;
    }
    seen.add(token);
    ids.push(token);
    if (token.includes(",")) {
      nonCanonical.push(token);
    }
  }

  return { ids, nonCanonical };
}

/**
 * Whether a relationship field value references the given identifier.
 * Exact token match, so "CRT-C-0001" does not match "CRT-C-00011".
 */
export function idListContains(value: string | undefined, id: string): boolean {
  return parseIdList(value).ids.includes(id);
}

/**
 * Value of a relationship field on an entity, or undefined when the entity
 * has no such column. Inherited properties ("constructor", "toString") are
 * not columns.
 */
export function readRelationshipField(entity: Entity, field: string): string | undefined {
  return Object.hasOwn(entity, field) ? entity[field] : undefined;
}
