/**
 * @module ingestion/document-ingestion-service
 *
 * Classify, extract, write, and keep the schema cache honest about what was
 * written. Runs beside the query path and shares only the graph store and
 * the schema cache with it.
 */

import { randomUUID } from "crypto";
import type pino from "pino";
import type { GraphStore } from "../graph/types.js";
import type { SchemaSnapshot } from "../graph/schema/types.js";
import type { LanguageModel } from "../llm/types.js";
import type { SchemaCache } from "../query/schema-cache.js";
import { getComponentLogger } from "../logging/index.js";
import { unwrapOrElse } from "../utils/result.js";
import { DocumentClassifier } from "./document-classifier.js";
import { IngestionValidationError } from "./errors.js";
import { GeneralExtractor } from "./general-extractor.js";
import { IngestionGraphWriter, type GeneralWrite } from "./graph-writer.js";
import { RecordExtractor, fallbackContract, fallbackPolicy } from "./record-extractor.js";
import type {
  DocumentCategory,
  GraphExtraction,
  IngestionDegradation,
  IngestionHints,
  IngestionResult,
} from "./types.js";

export interface DocumentIngestionOptions {
  /** Id source for documents and records */
  generateId?: () => string;
}

interface WrittenSchema {
  labels: string[];
  relationshipTypes: string[];
}

/**
 * Whether `snapshot` already names every label and relationship type written
 */
function snapshotCovers(snapshot: SchemaSnapshot, written: WrittenSchema): boolean {
  const labels = new Set(snapshot.nodeLabels.map((l) => l.label));
  const types = new Set(snapshot.relationshipTypes.map((r) => r.type));
  return written.labels.every((l) => labels.has(l)) && written.relationshipTypes.every((t) => types.has(t));
}

function untitled(hints: IngestionHints): string {
  return hints.title?.trim() || hints.filename?.trim() || "Untitled Document";
}

export class DocumentIngestionService {
  private readonly classifier: DocumentClassifier;
  private readonly extractor: RecordExtractor;
  private readonly generalExtractor: GeneralExtractor;
  private readonly writer: IngestionGraphWriter;
  private readonly generateId: () => string;
  private _logger: pino.Logger | null = null;

  constructor(
    store: GraphStore,
    llm: LanguageModel,
    private readonly schemaCache: SchemaCache,
    options: DocumentIngestionOptions = {}
  ) {
    this.generateId = options.generateId ?? randomUUID;
    this.classifier = new DocumentClassifier(llm);
    this.extractor = new RecordExtractor(llm);
    this.generalExtractor = new GeneralExtractor(llm);
    this.writer = new IngestionGraphWriter(store, this.generateId);
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("ingestion:service");
    }
    return this._logger;
  }

  /**
   * Ingest one document
   *
   * Classification and extraction never fail the call; their fallbacks are
   * listed in `degradations`.
   *
   * @throws {IngestionValidationError} when the text is empty
   * @throws {IngestionWriteError} when a graph write fails
   */
  async ingest(text: string, hints: IngestionHints = {}): Promise<IngestionResult> {
    if (text.trim().length === 0) {
      throw new IngestionValidationError("Document text is empty", "text");
    }
    const startTime = Date.now();
    const degradations: IngestionDegradation[] = [];

    let category: DocumentCategory;
    if (hints.docType) {
      category = hints.docType;
    } else {
      const classification = await this.classifier.classify(text);
      category = classification.category;
      if (classification.degradation) {
        degradations.push(classification.degradation);
      }
    }

    const documentId = this.generateId();
    const result = await this.ingestAs(category, documentId, text, hints, degradations);

    this.logger.info(
      {
        metric: "ingestion.total_ms",
        value: Date.now() - startTime,
        documentId,
        category,
        linked: result.linked_entities.length,
        degradations: degradations.map((d) => d.kind),
        schemaRefreshed: result.schema_refreshed,
      },
      "Document ingested"
    );
    return result;
  }

  private async ingestAs(
    category: DocumentCategory,
    documentId: string,
    text: string,
    hints: IngestionHints,
    degradations: IngestionDegradation[]
  ): Promise<IngestionResult> {
    const fallback = (reason: string): void => {
      degradations.push({ kind: "extraction_fallback", reason });
    };

    switch (category) {
      case "contract": {
        const record = unwrapOrElse(await this.extractor.extractContract(text, hints), (failure) => {
          fallback(failure.reason);
          return fallbackContract(hints);
        });
        const candidates = [...new Set([record.clientName, hints.clientName?.trim()])].filter(
          (name): name is string => typeof name === "string" && name.length > 0
        );
        const { clientName } = await this.writer.writeContract(
          { id: documentId, title: record.title, category, text },
          record,
          candidates
        );
        const schemaRefreshed = this.invalidateIfUncovered({
          labels: ["Document", "Contract"],
          relationshipTypes: clientName ? ["SOURCE_OF", "FOR_CLIENT"] : ["SOURCE_OF"],
        });
        return {
          category,
          document_id: documentId,
          record,
          linked_entity: clientName,
          linked_entities: clientName ? [clientName] : [],
          degradations,
          schema_refreshed: schemaRefreshed,
        };
      }

      case "policy": {
        const record = unwrapOrElse(await this.extractor.extractPolicy(text, hints), (failure) => {
          fallback(failure.reason);
          return fallbackPolicy(hints);
        });
        const { departments } = await this.writer.writePolicy(
          { id: documentId, title: record.title, category, text },
          record
        );
        const schemaRefreshed = this.invalidateIfUncovered({
          labels: ["Document", "Policy"],
          relationshipTypes: departments.length > 0 ? ["SOURCE_OF", "APPLIES_TO"] : ["SOURCE_OF"],
        });
        return {
          category,
          document_id: documentId,
          record,
          linked_entity: departments[0] ?? null,
          linked_entities: departments,
          degradations,
          schema_refreshed: schemaRefreshed,
        };
      }

      case "general": {
        const extraction = unwrapOrElse<GraphExtraction, { reason: string }>(
          await this.generalExtractor.extract(text),
          (failure) => {
            fallback(failure.reason);
            return { nodes: [], relationships: [] };
          }
        );
        const title = untitled(hints);
        let written: GeneralWrite;
        try {
          written = await this.writer.writeGeneral({ id: documentId, title, category, text }, extraction);
        } finally {
          // Also on failure: a commit can succeed before its acknowledgement is lost
          this.schemaCache.invalidate();
        }
        return {
          category,
          document_id: documentId,
          record: {
            title,
            nodesWritten: written.nodesWritten,
            relationshipsWritten: written.relationshipsWritten,
            labels: [...new Set(extraction.nodes.map((n) => n.label))].sort(),
            relationshipTypes: [...new Set(extraction.relationships.map((r) => r.type))].sort(),
          },
          linked_entity: null,
          linked_entities: [],
          degradations,
          schema_refreshed: true,
        };
      }
    }
  }

  private invalidateIfUncovered(written: WrittenSchema): boolean {
    const snapshot = this.schemaCache.peek();
    if (snapshot === null || snapshotCovers(snapshot, written)) {
      return false;
    }
    this.logger.info({ ...written, version: snapshot.version }, "Ingestion introduced schema elements");
    this.schemaCache.invalidate();
    return true;
  }
}
