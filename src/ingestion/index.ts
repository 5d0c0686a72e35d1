/**
 * Document ingestion: classification, extraction and graph writes
 *
 * @module ingestion
 */

export type {
  DocumentCategory,
  IngestionHints,
  ContractRecord,
  PolicyRecord,
  GeneralRecord,
  ExtractedNode,
  ExtractedRelationship,
  GraphExtraction,
  IngestionDegradation,
  IngestionResult,
} from "./types.js";
export { DOCUMENT_CATEGORIES } from "./types.js";

export { IngestionError, IngestionValidationError, IngestionWriteError } from "./errors.js";

export {
  CLASSIFICATION_PREFIX_CHARS,
  EXTRACTION_PREFIX_CHARS,
  buildClassificationPrompt,
  buildContractExtractionPrompt,
  buildPolicyExtractionPrompt,
  buildGraphExtractionPrompt,
} from "./prompts.js";

export { DocumentClassifier, parseCategory, type Classification } from "./document-classifier.js";
export {
  RecordExtractor,
  fallbackContract,
  fallbackPolicy,
  normalizeDate,
  normalizeAmount,
  type ExtractionFallback,
} from "./record-extractor.js";
export {
  GeneralExtractor,
  SAFE_IDENTIFIER,
  sanitizeLabel,
  sanitizeRelationshipType,
  normalizeGraphExtraction,
} from "./general-extractor.js";
export {
  IngestionGraphWriter,
  type DocumentNode,
  type ContractWrite,
  type PolicyWrite,
  type GeneralWrite,
} from "./graph-writer.js";
export { DocumentIngestionService, type DocumentIngestionOptions } from "./document-ingestion-service.js";
