/**
 * @module graph/schema/snapshot
 *
 * Building, versioning and querying schema snapshots.
 */

import { createHash } from "node:crypto";
import type {
  NodeLabelSchema,
  PropertySchema,
  RawSchema,
  RelationshipTypeSchema,
  SchemaSnapshot,
} from "./types.js";

const byName = (a: PropertySchema, b: PropertySchema): number => a.name.localeCompare(b.name);

function normalizeProperties(properties: readonly PropertySchema[]): PropertySchema[] {
  return [...properties].sort(byName).map((p) => ({
    name: p.name,
    types: [...p.types].sort(),
    ...(p.values !== undefined && { values: [...p.values].sort() }),
  }));
}

/**
 * Compute a stable version string for a vocabulary
 *
 * Labels, types, properties and enumerated values contribute. Counts do not,
 * so adding data of an existing shape keeps the version.
 */
export function computeSchemaVersion(raw: RawSchema): string {
  const canonical = JSON.stringify({
    nodes: raw.nodeLabels.map((n) => [n.label, normalizeProperties(n.properties)]).sort(),
    rels: raw.relationshipTypes
      .map((r) => [
        r.type,
        normalizeProperties(r.properties),
        r.patterns.map((p) => `${p.from}->${p.to}`).sort(),
      ])
      .sort(),
  });
  return createHash("sha256").update(canonical).digest("hex").slice(0, 12);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build an immutable snapshot from introspected vocabulary
 */
export function buildSchemaSnapshot(raw: RawSchema, capturedAt: Date = new Date()): SchemaSnapshot {
  const nodeLabels: NodeLabelSchema[] = [...raw.nodeLabels]
    .sort((a, b) => a.label.localeCompare(b.label))
    .map((n) => ({ label: n.label, count: n.count, properties: normalizeProperties(n.properties) }));

  const relationshipTypes: RelationshipTypeSchema[] = [...raw.relationshipTypes]
    .sort((a, b) => a.type.localeCompare(b.type))
    .map((r) => ({
      type: r.type,
      count: r.count,
      properties: normalizeProperties(r.properties),
      patterns: [...r.patterns].sort((a, b) =>
        `${a.from}->${a.to}`.localeCompare(`${b.from}->${b.to}`)
      ),
    }));

  return deepFreeze({
    version: computeSchemaVersion(raw),
    capturedAt: capturedAt.toISOString(),
    nodeLabels,
    relationshipTypes,
    totals: {
      nodes: nodeLabels.reduce((sum, n) => sum + n.count, 0),
      relationships: relationshipTypes.reduce((sum, r) => sum + r.count, 0),
    },
  });
}

/**
 * Lookup view over one snapshot
 */
export class SchemaVocabulary {
  private readonly labelProperties = new Map<string, Set<string>>();
  private readonly relationshipProperties = new Map<string, Set<string>>();
  private readonly allProperties = new Set<string>();

  constructor(readonly snapshot: SchemaSnapshot) {
    for (const node of snapshot.nodeLabels) {
      const names = new Set(node.properties.map((p) => p.name));
      this.labelProperties.set(node.label, names);
      names.forEach((n) => this.allProperties.add(n));
    }
    for (const rel of snapshot.relationshipTypes) {
      const names = new Set(rel.properties.map((p) => p.name));
      this.relationshipProperties.set(rel.type, names);
      names.forEach((n) => this.allProperties.add(n));
    }
  }

  hasLabel(label: string): boolean {
    return this.labelProperties.has(label);
  }

  hasRelationshipType(type: string): boolean {
    return this.relationshipProperties.has(type);
  }

  /**
   * Whether `property` exists on any of the given owners, or anywhere in the
   * vocabulary when no owner is known
   */
  hasProperty(property: string, owners: { labels: Iterable<string>; types: Iterable<string> }): boolean {
    let ownerCount = 0;
    for (const label of owners.labels) {
      ownerCount++;
      if (this.labelProperties.get(label)?.has(property)) return true;
    }
    for (const type of owners.types) {
      ownerCount++;
      if (this.relationshipProperties.get(type)?.has(property)) return true;
    }
    return ownerCount === 0 && this.allProperties.has(property);
  }
}
