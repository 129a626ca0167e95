/**
 * Errors raised by the catalogue hub.
 *
 * UnknownCatalogueError  Name outside the closed set. A programming error.
 * LoadError              Backing file missing, unreadable or malformed.
 * NotFoundError          Identifier absent from the catalogue. Callers are
 *                        expected to handle this by treating the entity as absent.
 */

import type { CatalogueName } from "./definitions.js";

export abstract class CatalogueError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Format the error for display.
   */
  format(): string {
    return `${this.name}: ${this.message}`;
  }
}

export class UnknownCatalogueError extends CatalogueError {
  public readonly catalogueName: string;

  constructor(catalogueName: string) {
    super(`Unknown catalogue "${catalogueName}"`);
    this.catalogueName = catalogueName;
  }
}

export type LoadIssueType =
  | "missing_file"
  | "unreadable"
  | "malformed"
  | "missing_column"
  | "duplicate_header"
  | "blank_id"
  | "duplicate_id";

/**
 * Individual problem found while loading a catalogue.
 */
export interface LoadIssue {
  type: LoadIssueType;
  /** Human-readable error message */
  message: string;
  /** 1-based data row number (header excluded) */
  row?: number;
  /** Column the issue concerns */
  column?: string;
}

export class LoadError extends CatalogueError {
  public readonly catalogueName: CatalogueName;
  public readonly issues: readonly LoadIssue[];

  constructor(
    catalogueName: CatalogueName,
    issues: readonly LoadIssue[],
    options?: { cause?: unknown }
  ) {
    const first = issues[0]?.message ?? "unknown problem";
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : "";
    super(`Failed to load catalogue ${catalogueName}: ${first}${more}`, options);
    this.catalogueName = catalogueName;
    this.issues = Object.freeze([...issues]);
  }

  override format(): string {
    const lines = [`Catalogue ${this.catalogueName} failed to load:`];
    for (const issue of this.issues) {
      const location = [
        issue.row !== undefined ? `row ${issue.row}` : undefined,
        issue.column !== undefined ? `column ${issue.column}` : undefined,
      ]
        .filter((part): part is string => part !== undefined)
        .join(", ");
      lines.push(`  - [${issue.type}]${location ? ` ${location}:` : ""} ${issue.message}`);
    }
    if (this.cause instanceof Error) {
      lines.push(`  cause: ${this.cause.message}`);
    }
    return lines.join("\n");
  }
}

export class NotFoundError extends CatalogueError {
  public readonly catalogueName: CatalogueName;
  public readonly entityId: string;

  constructor(catalogueName: CatalogueName, entityId: string) {
    super(`No entity "${entityId}" in catalogue ${catalogueName}`);
    this.catalogueName = catalogueName;
    this.entityId = entityId;
  }
}
