/**
 * @module graph/schema/types
 *
 * Schema snapshot model. Snapshots are frozen once built and replaced, never
 * edited.
 */

export interface PropertySchema {
  readonly name: string;
  /** Neo4j type names as reported by db.schema procedures (e.g. "String", "Long") */
  readonly types: readonly string[];
  /** Complete value domain, present only for low-cardinality string properties */
  readonly values?: readonly string[];
}

export interface NodeLabelSchema {
  readonly label: string;
  readonly count: number;
  readonly properties: readonly PropertySchema[];
}

export interface RelationshipPattern {
  readonly from: string;
  readonly to: string;
}

export interface RelationshipTypeSchema {
  readonly type: string;
  readonly count: number;
  readonly properties: readonly PropertySchema[];
  readonly patterns: readonly RelationshipPattern[];
}

export interface SchemaSnapshot {
  /** Content hash of the vocabulary; counts do not contribute */
  readonly version: string;
  readonly capturedAt: string;
  readonly nodeLabels: readonly NodeLabelSchema[];
  readonly relationshipTypes: readonly RelationshipTypeSchema[];
  readonly totals: {
    readonly nodes: number;
    readonly relationships: number;
  };
}

/**
 * Vocabulary gathered from the store before versioning and freezing
 */
export interface RawSchema {
  nodeLabels: NodeLabelSchema[];
  relationshipTypes: RelationshipTypeSchema[];
}

export interface IntrospectionOptions {
  /** Largest distinct-value count still listed as an enumerated domain */
  enumLimit: number;
  /** Property names left out of the snapshot */
  hiddenProperties: readonly string[];
}

export const DEFAULT_INTROSPECTION_OPTIONS: IntrospectionOptions = {
  enumLimit: 10,
  hiddenProperties: ["embedding"],
};
