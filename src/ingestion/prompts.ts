/**
 * @module ingestion/prompts
 *
 * Prompt text for document classification and extraction.
 */

import type { ChatPrompt } from "../llm/types.js";
import { DOCUMENT_CATEGORIES } from "./types.js";

/** Characters of the document shown to the classifier */
export const CLASSIFICATION_PREFIX_CHARS = 2000;

/** Characters of the document shown to the extractors */
export const EXTRACTION_PREFIX_CHARS = 4000;

export function buildClassificationPrompt(text: string): ChatPrompt {
  return {
    system: [
      "You classify company documents.",
      "Categories:",
      "- contract: agreements with a client, with parties, dates, value or terms",
      "- policy: internal rules or procedures that apply to departments or staff",
      "- general: anything else",
      `Reply with one word: ${DOCUMENT_CATEGORIES.join(", ")}.`,
    ].join("\n"),
    user: `Document:\n${text.slice(0, CLASSIFICATION_PREFIX_CHARS)}`,
  };
}

export function buildContractExtractionPrompt(text: string): ChatPrompt {
  return {
    system: [
      "Extract contract details from the document and reply with a single JSON object:",
      "{",
      '  "title": string or null,',
      '  "client_name": string or null,',
      '  "contract_type": string or null,',
      '  "start_date": "YYYY-MM-DD" or null,',
      '  "end_date": "YYYY-MM-DD" or null,',
      '  "value": number or null,',
      '  "key_terms": [string],',
      '  "signatories": [string]',
      "}",
      "title is the contract's own name as the document states it.",
      "Use null for anything the document does not state. Reply with JSON only.",
    ].join("\n"),
    user: text.slice(0, EXTRACTION_PREFIX_CHARS),
  };
}

export function buildPolicyExtractionPrompt(text: string): ChatPrompt {
  return {
    system: [
      "Extract policy details from the document and reply with a single JSON object:",
      "{",
      '  "title": string or null,',
      '  "policy_type": string or null,',
      '  "departments": [string],',
      '  "effective_date": "YYYY-MM-DD" or null,',
      '  "key_rules": [string]',
      "}",
      "title is the policy's own name as the document states it.",
      "departments lists the departments the policy applies to. Reply with JSON only.",
    ].join("\n"),
    user: text.slice(0, EXTRACTION_PREFIX_CHARS),
  };
}

export function buildGraphExtractionPrompt(text: string): ChatPrompt {
  return {
    system: [
      "Extract the entities and relationships mentioned in the document and reply with a single JSON object:",
      "{",
      '  "nodes": [{ "id": "entity name", "type": "EntityType", "properties": { "key": "value" } }],',
      '  "relationships": [{ "source": "entity name", "target": "entity name", "type": "RELATIONSHIP_TYPE" }]',
      "}",
      "Node types are singular nouns in PascalCase. Relationship types are uppercase verbs with underscores.",
      "Every relationship source and target must be the id of a listed node. Reply with JSON only.",
    ].join("\n"),
    user: text.slice(0, EXTRACTION_PREFIX_CHARS),
  };
}
