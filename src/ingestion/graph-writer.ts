/**
 * @module ingestion/graph-writer
 *
 * Writes ingested documents and their records to the graph. Every statement
 * is parameterised; the only interpolated identifiers are labels and
 * relationship types that already passed sanitization.
 */

import type pino from "pino";
import type { GraphStore, GraphRow, QueryParameters } from "../graph/types.js";
import { GraphError } from "../graph/errors.js";
import { quoteIdentifier } from "../graph/schema/introspection.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";
import { IngestionWriteError } from "./errors.js";
import { SAFE_IDENTIFIER } from "./general-extractor.js";
import type { ContractRecord, DocumentCategory, GraphExtraction, PolicyRecord } from "./types.js";

const CREATE_DOCUMENT = `
CREATE (d:Document {id: $id, title: $title, category: $category, text: $text, created_at: datetime()})`;

const CREATE_CONTRACT = `
MATCH (d:Document {id: $documentId})
CREATE (c:Contract {
  id: $id, title: $title, type: $type,
  start_date: date($startDate), end_date: date($endDate),
  value: $value, status: 'active', terms: $terms, signatories: $signatories,
  created_at: datetime()
})
CREATE (d)-[:SOURCE_OF]->(c)`;

const LINK_CLIENT = `
MATCH (c:Contract {id: $contractId})
MATCH (cl:Client) WHERE toLower(cl.name) CONTAINS toLower($clientName)
WITH c, cl ORDER BY size(cl.name) ASC LIMIT 1
MERGE (c)-[:FOR_CLIENT]->(cl)
RETURN cl.name AS name`;

const CREATE_POLICY = `
MATCH (d:Document {id: $documentId})
CREATE (p:Policy {
  id: $id, title: $title, type: $type,
  effective_date: date($effectiveDate), rules: $rules,
  created_at: datetime()
})
CREATE (d)-[:SOURCE_OF]->(p)`;

const LINK_DEPARTMENTS = `
MATCH (p:Policy {id: $policyId})
MATCH (dep:Department) WHERE toLower(dep.name) CONTAINS toLower($department)
MERGE (p)-[:APPLIES_TO]->(dep)
RETURN dep.name AS name`;

export interface DocumentNode {
  id: string;
  title: string;
  category: DocumentCategory;
  text: string;
}

export interface ContractWrite {
  contractId: string;
  /** Name of the linked client, null when no client matched */
  clientName: string | null;
}

export interface PolicyWrite {
  policyId: string;
  departments: string[];
}

export interface GeneralWrite {
  nodesWritten: number;
  relationshipsWritten: number;
}

function mergeNodeStatement(label: string): string {
  return `
MATCH (d:Document {id: $documentId})
MERGE (n:${quoteIdentifier(label)} {name: $name})
SET n += $properties
MERGE (d)-[:SOURCE_OF]->(n)`;
}

function mergeRelationshipStatement(sourceLabel: string, type: string, targetLabel: string): string {
  return `
MATCH (a:${quoteIdentifier(sourceLabel)} {name: $source})
MATCH (b:${quoteIdentifier(targetLabel)} {name: $target})
MERGE (a)-[:${quoteIdentifier(type)}]->(b)`;
}

function names(rows: GraphRow[]): string[] {
  return rows.map((row) => row["name"]).filter((name): name is string => typeof name === "string");
}

/**
 * Runs one named statement inside the document's transaction
 */
type StepRunner = (step: string, cypher: string, params: QueryParameters) => Promise<GraphRow[]>;

/**
 * Writes a document and everything extracted from it in a single
 * transaction, so a failed statement leaves nothing of the document behind.
 */
export class IngestionGraphWriter {
  private _logger: pino.Logger | null = null;

  constructor(
    private readonly store: GraphStore,
    private readonly generateId: () => string
  ) {}

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("ingestion:writer");
    }
    return this._logger;
  }

  /**
   * Create the document and its contract, then link the first client
   * matching any of `clientNames`, tried in order
   */
  async writeContract(
    document: DocumentNode,
    record: ContractRecord,
    clientNames: readonly string[]
  ): Promise<ContractWrite> {
    const contractId = this.generateId();
    const clientName = await this.transaction(document.id, async (run) => {
      await run("document", CREATE_DOCUMENT, { ...document });
      await run("contract", CREATE_CONTRACT, {
        documentId: document.id,
        id: contractId,
        title: record.title,
        type: record.contractType,
        startDate: record.startDate,
        endDate: record.endDate,
        value: record.value,
        terms: record.keyTerms,
        signatories: record.signatories,
      });
      for (const candidate of clientNames) {
        const linked = names(await run("client link", LINK_CLIENT, { contractId, clientName: candidate }))[0];
        if (linked !== undefined) {
          return linked;
        }
      }
      return null;
    });

    if (clientName === null) {
      this.logger.info({ documentId: document.id, contractId, candidates: clientNames }, "No client matched the contract");
    }
    return { contractId, clientName };
  }

  async writePolicy(document: DocumentNode, record: PolicyRecord): Promise<PolicyWrite> {
    const policyId = this.generateId();
    const departments = await this.transaction(document.id, async (run) => {
      await run("document", CREATE_DOCUMENT, { ...document });
      await run("policy", CREATE_POLICY, {
        documentId: document.id,
        id: policyId,
        title: record.title,
        type: record.policyType,
        effectiveDate: record.effectiveDate,
        rules: record.keyRules,
      });
      const linked = new Set<string>();
      for (const department of record.departments) {
        for (const name of names(await run("department link", LINK_DEPARTMENTS, { policyId, department }))) {
          linked.add(name);
        }
      }
      return [...linked];
    });

    if (departments.length === 0 && record.departments.length > 0) {
      this.logger.info(
        { documentId: document.id, policyId, candidates: record.departments },
        "No department matched the policy"
      );
    }
    return { policyId, departments };
  }

  /**
   * Create the document, merge the extracted entities under it and connect
   * them. Relationships with an endpoint that is not among the nodes are
   * skipped.
   */
  async writeGeneral(document: DocumentNode, extraction: GraphExtraction): Promise<GeneralWrite> {
    for (const node of extraction.nodes) {
      this.assertIdentifier(document.id, node.label);
    }
    for (const rel of extraction.relationships) {
      this.assertIdentifier(document.id, rel.type);
    }

    const labels = new Map(extraction.nodes.map((node) => [node.name, node.label]));
    const relationships = extraction.relationships.flatMap((rel) => {
      const sourceLabel = labels.get(rel.source);
      const targetLabel = labels.get(rel.target);
      return sourceLabel === undefined || targetLabel === undefined ? [] : [{ ...rel, sourceLabel, targetLabel }];
    });

    await this.transaction(document.id, async (run) => {
      await run("document", CREATE_DOCUMENT, { ...document });
      for (const node of extraction.nodes) {
        await run("entity", mergeNodeStatement(node.label), {
          documentId: document.id,
          name: node.name,
          properties: node.properties,
        });
      }
      for (const rel of relationships) {
        await run("relationship", mergeRelationshipStatement(rel.sourceLabel, rel.type, rel.targetLabel), {
          source: rel.source,
          target: rel.target,
        });
      }
    });
    return { nodesWritten: labels.size, relationshipsWritten: relationships.length };
  }

  private assertIdentifier(documentId: string, identifier: string): void {
    if (!SAFE_IDENTIFIER.test(identifier)) {
      throw new IngestionWriteError(`Refusing to write unsafe identifier '${identifier}'`, documentId);
    }
  }

  private async transaction<T>(documentId: string, work: (run: StepRunner) => Promise<T>): Promise<T> {
    let step = "document";
    try {
      return await this.store.executeWrite((tx) =>
        work((name, cypher, params) => {
          step = name;
          return tx.run(cypher.trim(), params);
        })
      );
    } catch (error) {
      const cause = toError(error);
      this.logger.error({ documentId, step, err: cause }, "Graph write rolled back");
      throw new IngestionWriteError(
        `Writing ${step} failed: ${cause.message}`,
        documentId,
        cause,
        error instanceof GraphError && error.retryable
      );
    }
  }
}
