/**
 * @module graph/schema/format
 *
 * Plain-text rendering of a snapshot for language-model prompts.
 */

import type { PropertySchema, SchemaSnapshot } from "./types.js";

function formatProperty(property: PropertySchema): string {
  const base = `${property.name}: ${property.types.join(" | ") || "Any"}`;
  if (property.values === undefined || property.values.length === 0) {
    return base;
  }
  return `${base} one of [${property.values.map((v) => JSON.stringify(v)).join(", ")}]`;
}

function formatProperties(properties: readonly PropertySchema[]): string {
  return properties.length === 0 ? "(no properties)" : properties.map(formatProperty).join(", ");
}

/**
 * Render a snapshot as prompt text
 *
 * @example
 * ```text
 * Node labels:
 * - Department: name: String one of ["Engineering", "Sales"]
 * Relationship types:
 * - (:Employee)-[:WORKS_IN]->(:Department): (no properties)
 * ```
 */
export function formatSchemaForPrompt(snapshot: SchemaSnapshot): string {
  const lines: string[] = ["Node labels:"];

  if (snapshot.nodeLabels.length === 0) {
    lines.push("- (none)");
  }
  for (const node of snapshot.nodeLabels) {
    lines.push(`- ${node.label}: ${formatProperties(node.properties)}`);
  }

  lines.push("Relationship types:");
  if (snapshot.relationshipTypes.length === 0) {
    lines.push("- (none)");
  }
  for (const rel of snapshot.relationshipTypes) {
    const patterns =
      rel.patterns.length > 0
        ? rel.patterns.map((p) => `(:${p.from})-[:${rel.type}]->(:${p.to})`).join(", ")
        : `[:${rel.type}]`;
    lines.push(`- ${patterns}: ${formatProperties(rel.properties)}`);
  }

  return lines.join("\n");
}
