/**
 * Catalogue health overview.
 *
 * Summarises a LoadReport per catalogue (kind, size, primary id column,
 * load error) and renders it as a text report, backbone catalogues first.
 */

import type { CatalogueKind, CatalogueName } from "./definitions.js";
import type { LoadReport } from "./registry.js";

export interface CatalogueSummary {
  catalogue: CatalogueName;
  label: string;
  kind: CatalogueKind;
  primaryIdColumn: string;
  loaded: boolean;
  rows: number;
  columns: number;
  empty: boolean;
  /** Relative or absolute path the rows came from */
  source?: string;
  /** First line of the load error when loading failed */
  error?: string;
}

export interface HealthOverview {
  summaries: CatalogueSummary[];
  backbone: number;
  appendOnly: number;
  empty: number;
  failed: number;
}

const KIND_ORDER: Record<CatalogueKind, number> = {
  backbone: 0,
  "append-only": 1,
};

/**
 * Build per-catalogue summaries ordered by kind (backbone first), then name.
 */
export function summariseCatalogues(report: LoadReport): HealthOverview {
  const summaries = report.statuses.map((status): CatalogueSummary => {
    const base = {
      catalogue: status.name,
      label: status.definition.label,
      kind: status.definition.kind,
      primaryIdColumn: status.definition.primaryIdColumn,
    };

    if (!status.ok) {
      return { ...base, loaded: false, rows: 0, columns: 0, empty: true, error: status.error.message };
    }

    const { catalogue } = status;
    return {
      ...base,
      loaded: true,
      rows: catalogue.rows.length,
      columns: catalogue.columns.length,
      empty: catalogue.rows.length === 0,
      source: catalogue.source.path,
    };
  });

  summaries.sort(
    (a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || a.catalogue.localeCompare(b.catalogue)
  );

  return {
    summaries,
    backbone: summaries.filter((s) => s.kind === "backbone").length,
    appendOnly: summaries.filter((s) => s.kind === "append-only").length,
    empty: summaries.filter((s) => s.loaded && s.empty).length,
    failed: summaries.filter((s) => !s.loaded).length,
  };
}

/**
 * Render the overview as a fixed-width text report.
 */
export function formatHealthReport(overview: HealthOverview): string {
  const lines: string[] = [];

  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(" Catalogue Health Overview");
  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push("");
  lines.push(`Backbone catalogues:    ${overview.backbone}`);
  lines.push(`Append-only catalogues: ${overview.appendOnly}`);
  lines.push(`Empty catalogues:       ${overview.empty}`);
  lines.push(`Failed to load:         ${overview.failed}`);
  lines.push("");
  lines.push("───────────────────────────────────────────────────────────────");

  for (const s of overview.summaries) {
    const status = s.loaded ? "✓" : "✗";
    const size = s.loaded ? `${s.rows} rows, ${s.columns} columns` : "not loaded";
    lines.push(`${status} ${s.catalogue.padEnd(8)} ${s.kind.padEnd(11)} ${size} (id: ${s.primaryIdColumn})`);
    if (s.error !== undefined) {
      lines.push(`    ${s.error}`);
    }
  }

  lines.push("");
  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(overview.failed === 0 ? " ✓ All catalogues loaded" : ` ✗ ${overview.failed} catalogue(s) failed to load`);
  lines.push("═══════════════════════════════════════════════════════════════");

  return lines.join("\n");
}
