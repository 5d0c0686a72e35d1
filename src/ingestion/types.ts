/**
 * Ingestion type definitions.
 *
 * @module ingestion/types
 */

export const DOCUMENT_CATEGORIES = ["contract", "policy", "general"] as const;

/**
 * Closed set of document categories; "general" is the least structured
 */
export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

/**
 * Caller-supplied metadata. Used to skip classification and to build
 * fallback records when extraction fails.
 */
export interface IngestionHints {
  /** Skips classification when set */
  docType?: DocumentCategory;
  title?: string;
  filename?: string;
  clientName?: string;
  departments?: string[];
}

export interface ContractRecord {
  title: string;
  clientName: string | null;
  contractType: string;
  /** YYYY-MM-DD */
  startDate: string | null;
  /** YYYY-MM-DD */
  endDate: string | null;
  value: number | null;
  keyTerms: string[];
  signatories: string[];
}

export interface PolicyRecord {
  title: string;
  policyType: string;
  departments: string[];
  /** YYYY-MM-DD */
  effectiveDate: string | null;
  keyRules: string[];
}

export interface ExtractedNode {
  /** Entity name, the MERGE key together with the label */
  name: string;
  label: string;
  properties: Record<string, string | number | boolean>;
}

export interface ExtractedRelationship {
  source: string;
  target: string;
  type: string;
}

export interface GraphExtraction {
  nodes: ExtractedNode[];
  relationships: ExtractedRelationship[];
}

/**
 * Summary of an open-ended extraction
 */
export interface GeneralRecord {
  title: string;
  nodesWritten: number;
  relationshipsWritten: number;
  labels: string[];
  relationshipTypes: string[];
}

/**
 * Why a local recovery happened
 */
export interface IngestionDegradation {
  kind: "classification_fallback" | "extraction_fallback";
  reason: string;
}

interface IngestionResultBase {
  document_id: string;
  /** Best linked entity name, null when nothing matched */
  linked_entity: string | null;
  linked_entities: string[];
  degradations: IngestionDegradation[];
  /** The schema cache was invalidated by this ingestion */
  schema_refreshed: boolean;
}

export type IngestionResult =
  | (IngestionResultBase & { category: "contract"; record: ContractRecord })
  | (IngestionResultBase & { category: "policy"; record: PolicyRecord })
  | (IngestionResultBase & { category: "general"; record: GeneralRecord });
