/**
 * Catalogue definitions for the CRT catalogue set.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CLOSED CATALOGUE SET
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The hub serves exactly these catalogues. Each one is either:
 *
 *   BACKBONE     Authoritative, never edited by the toolkit.
 *   APPEND-ONLY  May gain organisation-specific rows between runs through an
 *                external editing action; existing rows are never altered.
 *
 * Both kinds are read as an immutable snapshot once loaded.
 *
 * Each definition names the column holding the row identifier and the
 * relationship fields: columns whose value is a semicolon-delimited list of
 * identifiers in another catalogue.
 */

import { z } from "zod";

export const CatalogueName = z.enum([
  // Backbone
  "CRT-C", // Controls
  "CRT-F", // Failure modes
  "CRT-N", // Compensations
  "CRT-POL", // Policies
  "CRT-STD", // Standards
  "CRT-G", // Control groups / domains
  // Append-only
  "CRT-REQ", // Requirements
  "CRT-LR", // Legal / regulatory obligations
  "CRT-D", // Data classification
  "CRT-AS", // Asset surface
  "CRT-I", // Identity zones / trust anchors
  "CRT-SC", // Supply chain / vendors
  "CRT-T", // Telemetry sources
]);
export type CatalogueName = z.infer<typeof CatalogueName>;

export const CatalogueKind = z.enum(["backbone", "append-only"]);
export type CatalogueKind = z.infer<typeof CatalogueKind>;

const ColumnName = z
  .string()
  .regex(/^[a-z][a-z0-9_]*$/, "Column names are lower snake_case");

export const RelationshipFieldSchema = z.object({
  /** Column on the source catalogue holding the id list */
  field: ColumnName,
  /** Catalogue the ids point into */
  target: CatalogueName,
  /** Edge label used in structural relationship output */
  relation: z.string().regex(/^[a-z][a-z_]*$/),
});
export type RelationshipField = z.infer<typeof RelationshipFieldSchema>;

export const CatalogueDefinitionSchema = z
  .object({
    name: CatalogueName,
    label: z.string().min(1),
    kind: CatalogueKind,
    primaryIdColumn: ColumnName,
    relationships: z.array(RelationshipFieldSchema),
  })
  .superRefine((def, ctx) => {
    const seen = new Set<string>();
    def.relationships.forEach((rel, index) => {
      if (rel.field === def.primaryIdColumn) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["relationships", index, "field"],
          message: `Relationship field cannot be the primary id column "${def.primaryIdColumn}"`,
        });
      }
      if (seen.has(rel.field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["relationships", index, "field"],
          message: `Relationship field "${rel.field}" is declared twice`,
        });
      }
      seen.add(rel.field);
    });
  });

/**
 * Validated, frozen catalogue definition.
 */
export type CatalogueDefinition = Readonly<
  Omit<z.infer<typeof CatalogueDefinitionSchema>, "relationships">
> & {
  readonly relationships: ReadonlyArray<Readonly<RelationshipField>>;
};

const RAW_DEFINITIONS: unknown = [
  {
    name: "CRT-C",
    label: "Controls",
    kind: "backbone",
    primaryIdColumn: "control_id",
    relationships: [
      { field: "mapped_failure_ids", target: "CRT-F", relation: "failure_implication" },
      { field: "mapped_compensation_ids", target: "CRT-N", relation: "compensated_by" },
      { field: "mapped_policy_ids", target: "CRT-POL", relation: "governed_by" },
    ],
  },
  {
    name: "CRT-F",
    label: "Failure modes",
    kind: "backbone",
    primaryIdColumn: "failure_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "implicates_control" },
    ],
  },
  {
    name: "CRT-N",
    label: "Compensations",
    kind: "backbone",
    primaryIdColumn: "n_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "compensates_control" },
    ],
  },
  {
    name: "CRT-POL",
    label: "Policies",
    kind: "backbone",
    primaryIdColumn: "policy_id",
    relationships: [
      { field: "mapped_standard_ids", target: "CRT-STD", relation: "aligned_to_standard" },
    ],
  },
  {
    name: "CRT-STD",
    label: "Standards",
    kind: "backbone",
    primaryIdColumn: "standard_id",
    relationships: [],
  },
  {
    name: "CRT-G",
    label: "Control groups / domains",
    kind: "backbone",
    primaryIdColumn: "group_id",
    relationships: [],
  },
  {
    name: "CRT-REQ",
    label: "Requirements",
    kind: "append-only",
    primaryIdColumn: "requirement_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "satisfied_by" },
    ],
  },
  {
    name: "CRT-LR",
    label: "Legal / regulatory obligations",
    kind: "append-only",
    primaryIdColumn: "lr_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "satisfied_by" },
    ],
  },
  {
    name: "CRT-D",
    label: "Data classification",
    kind: "append-only",
    primaryIdColumn: "d_id",
    relationships: [],
  },
  {
    name: "CRT-AS",
    label: "Asset surface",
    kind: "append-only",
    primaryIdColumn: "as_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "protected_by" },
      { field: "mapped_data_class_ids", target: "CRT-D", relation: "handles_data" },
    ],
  },
  {
    name: "CRT-I",
    label: "Identity zones",
    kind: "append-only",
    primaryIdColumn: "i_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "protected_by" },
    ],
  },
  {
    name: "CRT-SC",
    label: "Supply chain / vendors",
    kind: "append-only",
    primaryIdColumn: "sc_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "protected_by" },
    ],
  },
  {
    name: "CRT-T",
    label: "Telemetry sources",
    kind: "append-only",
    primaryIdColumn: "telemetry_id",
    relationships: [
      { field: "mapped_control_ids", target: "CRT-C", relation: "observes_control" },
    ],
  },
];

/**
 * Validate a definition table: schema-correct, and exactly one definition
 * per catalogue name.
 *
 * @throws ZodError when the table is malformed
 */
export function parseCatalogueDefinitions(
  input: unknown
): ReadonlyMap<CatalogueName, CatalogueDefinition> {
  const definitions = z
    .array(CatalogueDefinitionSchema)
    .superRefine((defs, ctx) => {
      const names = new Set(defs.map((d) => d.name));
      for (const name of CatalogueName.options) {
        if (!names.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Missing definition for catalogue "${name}"`,
          });
        }
      }
      if (names.size !== defs.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Each catalogue may be defined only once",
        });
      }
    })
    .parse(input);

  const map = new Map<CatalogueName, CatalogueDefinition>();
  for (const def of definitions) {
    map.set(
      def.name,
      Object.freeze({
        ...def,
        relationships: Object.freeze(def.relationships.map((r) => Object.freeze(r))),
      })
    );
  }
  return map;
}

const DEFINITIONS = parseCatalogueDefinitions(RAW_DEFINITIONS);

/**
 * Narrow an arbitrary string to a known catalogue name.
 */
export function isCatalogueName(value: string): value is CatalogueName {
  return CatalogueName.safeParse(value).success;
}

/**
 * Definition for a catalogue in the closed set.
 */
export function getCatalogueDefinition(name: CatalogueName): CatalogueDefinition {
  const def = DEFINITIONS.get(name);
  if (def === undefined) {
    // parseCatalogueDefinitions guarantees every name is present
    throw new Error(`No definition registered for catalogue "${name}"`);
  }
  return def;
}

/**
 * Catalogue names in canonical order (backbone first), optionally by kind.
 */
export function listCatalogueNames(kind?: CatalogueKind): CatalogueName[] {
  return CatalogueName.options.filter(
    (name) => kind === undefined || getCatalogueDefinition(name).kind === kind
  );
}

export function isBackbone(name: CatalogueName): boolean {
  return getCatalogueDefinition(name).kind === "backbone";
}

/**
 * A declared relationship field seen from the catalogue it points into.
 */
export interface IncomingRelationship extends RelationshipField {
  source: CatalogueName;
}

/**
 * Every declared relationship field whose target is the given catalogue,
 * in canonical catalogue order.
 */
export function relationshipsTargeting(target: CatalogueName): IncomingRelationship[] {
  const incoming: IncomingRelationship[] = [];
  for (const source of CatalogueName.options) {
    for (const rel of getCatalogueDefinition(source).relationships) {
      if (rel.target === target) {
        incoming.push({ ...rel, source });
      }
    }
  }
  return incoming;
}
