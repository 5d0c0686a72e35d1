/**
 * @module graph/schema/introspection
 *
 * Read-only introspection of a Neo4j 5.x database into a {@link SchemaSnapshot}.
 */

import { z } from "zod";
import { GraphSchemaError } from "../errors.js";
import type { GraphRow, QueryParameters } from "../types.js";
import { buildSchemaSnapshot } from "./snapshot.js";
import type {
  IntrospectionOptions,
  NodeLabelSchema,
  PropertySchema,
  RelationshipPattern,
  RelationshipTypeSchema,
  SchemaSnapshot,
} from "./types.js";

export const NODE_PROPERTIES_QUERY =
  "CALL db.schema.nodeTypeProperties() YIELD nodeLabels, propertyName, propertyTypes " +
  "RETURN nodeLabels, propertyName, propertyTypes";

export const RELATIONSHIP_PROPERTIES_QUERY =
  "CALL db.schema.relTypeProperties() YIELD relType, propertyName, propertyTypes " +
  "RETURN relType, propertyName, propertyTypes";

export const LABEL_COUNTS_QUERY =
  "MATCH (n) UNWIND labels(n) AS label RETURN label, count(*) AS count";

export const RELATIONSHIP_PATTERNS_QUERY =
  "MATCH (a)-[r]->(b) " +
  "RETURN type(r) AS type, head(labels(a)) AS from, head(labels(b)) AS to, count(*) AS count";

/**
 * Distinct values of one string property, at most `limit` of them
 */
export function enumValuesQuery(label: string, property: string, limit: number): string {
  const l = quoteIdentifier(label);
  const p = quoteIdentifier(property);
  return (
    `MATCH (n:${l}) WHERE n.${p} IS NOT NULL ` +
    `WITH DISTINCT n.${p} AS value LIMIT ${Math.trunc(limit)} RETURN collect(value) AS values`
  );
}

export function quoteIdentifier(name: string): string {
  return "`" + name.replace(/`/g, "``") + "`";
}

const nodePropertyRow = z.object({
  nodeLabels: z.array(z.string()),
  propertyName: z.string().nullable(),
  propertyTypes: z.array(z.string()).nullable(),
});

const relationshipPropertyRow = z.object({
  relType: z.string(),
  propertyName: z.string().nullable(),
  propertyTypes: z.array(z.string()).nullable(),
});

const labelCountRow = z.object({ label: z.string(), count: z.number() });

const patternRow = z.object({
  type: z.string(),
  from: z.string().nullable(),
  to: z.string().nullable(),
  count: z.number(),
});

const enumRow = z.object({ values: z.array(z.unknown()) });

/**
 * Runs a read-only statement and returns every row
 */
export type IntrospectionRunner = (cypher: string, params?: QueryParameters) => Promise<GraphRow[]>;

function parseRows<T>(rows: GraphRow[], schema: z.ZodType<T>, element: string): T[] {
  return rows.map((row) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new GraphSchemaError(
        `Unexpected introspection row for ${element}: ${parsed.error.errors
          .map((e) => `${e.path.join(".")}: ${e.message}`)
          .join(", ")}`,
        element
      );
    }
    return parsed.data;
  });
}

/** ":`WORKS_IN`" → "WORKS_IN" */
function stripRelType(relType: string): string {
  return relType.replace(/^:/, "").replace(/^`(.*)`$/, "$1");
}

function addProperty(
  target: Map<string, Map<string, Set<string>>>,
  owner: string,
  name: string | null,
  types: string[] | null,
  hidden: ReadonlySet<string>
): void {
  const properties = target.get(owner) ?? new Map<string, Set<string>>();
  target.set(owner, properties);
  if (name === null || hidden.has(name)) {
    return;
  }
  const known = properties.get(name) ?? new Set<string>();
  (types ?? []).forEach((t) => known.add(t.replace(/NotNull$/, "")));
  properties.set(name, known);
}

/**
 * Introspect the store and build a frozen snapshot
 *
 * @throws {GraphSchemaError} when a result does not have the expected shape
 */
export async function introspectSchema(
  run: IntrospectionRunner,
  options: IntrospectionOptions
): Promise<SchemaSnapshot> {
  const hidden = new Set(options.hiddenProperties);

  const [nodeRows, relRows, countRows, patternRows] = await Promise.all([
    run(NODE_PROPERTIES_QUERY).then((r) => parseRows(r, nodePropertyRow, "node properties")),
    run(RELATIONSHIP_PROPERTIES_QUERY).then((r) =>
      parseRows(r, relationshipPropertyRow, "relationship properties")
    ),
    run(LABEL_COUNTS_QUERY).then((r) => parseRows(r, labelCountRow, "label counts")),
    run(RELATIONSHIP_PATTERNS_QUERY).then((r) => parseRows(r, patternRow, "relationship patterns")),
  ]);

  const labelProps = new Map<string, Map<string, Set<string>>>();
  for (const row of nodeRows) {
    for (const label of row.nodeLabels) {
      addProperty(labelProps, label, row.propertyName, row.propertyTypes, hidden);
    }
  }
  const labelCounts = new Map(countRows.map((r) => [r.label, r.count]));
  for (const label of labelCounts.keys()) {
    if (!labelProps.has(label)) labelProps.set(label, new Map());
  }

  const relProps = new Map<string, Map<string, Set<string>>>();
  for (const row of relRows) {
    addProperty(relProps, stripRelType(row.relType), row.propertyName, row.propertyTypes, hidden);
  }
  const relCounts = new Map<string, number>();
  const relPatterns = new Map<string, RelationshipPattern[]>();
  for (const row of patternRows) {
    relCounts.set(row.type, (relCounts.get(row.type) ?? 0) + row.count);
    if (row.from !== null && row.to !== null) {
      const patterns = relPatterns.get(row.type) ?? [];
      patterns.push({ from: row.from, to: row.to });
      relPatterns.set(row.type, patterns);
    }
    if (!relProps.has(row.type)) relProps.set(row.type, new Map());
  }

  const nodeLabels: NodeLabelSchema[] = [];
  for (const [label, properties] of labelProps) {
    const described: PropertySchema[] = [];
    for (const [name, types] of properties) {
      const values = types.has("String")
        ? await enumerateValues(run, label, name, options.enumLimit)
        : undefined;
      described.push({ name, types: [...types], ...(values !== undefined && { values }) });
    }
    nodeLabels.push({ label, count: labelCounts.get(label) ?? 0, properties: described });
  }

  const relationshipTypes: RelationshipTypeSchema[] = [...relProps].map(([type, properties]) => ({
    type,
    count: relCounts.get(type) ?? 0,
    properties: [...properties].map(([name, types]) => ({ name, types: [...types] })),
    patterns: relPatterns.get(type) ?? [],
  }));

  return buildSchemaSnapshot({ nodeLabels, relationshipTypes });
}

/**
 * The full value domain of a string property, or undefined when it has more
 * than `limit` distinct values
 */
async function enumerateValues(
  run: IntrospectionRunner,
  label: string,
  property: string,
  limit: number
): Promise<string[] | undefined> {
  if (limit <= 0) {
    return undefined;
  }
  const rows = parseRows(
    await run(enumValuesQuery(label, property, limit + 1)),
    enumRow,
    `${label}.${property} values`
  );
  const values = (rows[0]?.values ?? []).filter((v): v is string => typeof v === "string");
  return values.length > 0 && values.length <= limit ? values : undefined;
}
