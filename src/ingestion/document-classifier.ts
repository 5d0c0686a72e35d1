/**
 * @module ingestion/document-classifier
 *
 * Picks a category for a document. Always resolves: anything the model
 * cannot place, or a model failure, yields "general".
 */

import type pino from "pino";
import type { LanguageModel } from "../llm/types.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";
import { buildClassificationPrompt } from "./prompts.js";
import { DOCUMENT_CATEGORIES, type DocumentCategory, type IngestionDegradation } from "./types.js";

export interface Classification {
  category: DocumentCategory;
  /** Set when the category is the default rather than the model's answer */
  degradation?: IngestionDegradation;
}

function isCategory(value: string): value is DocumentCategory {
  return DOCUMENT_CATEGORIES.some((c) => c === value);
}

/**
 * Category named by a classifier reply, tolerating punctuation and a
 * sentence around the word
 */
export function parseCategory(reply: string): DocumentCategory | null {
  const normalized = reply.trim().toLowerCase().replace(/[^a-z]+/g, " ").trim();
  if (isCategory(normalized)) {
    return normalized;
  }
  const found = DOCUMENT_CATEGORIES.filter((c) => normalized.split(" ").includes(c));
  return found.length === 1 ? (found[0] ?? null) : null;
}

export class DocumentClassifier {
  private _logger: pino.Logger | null = null;

  constructor(private readonly llm: LanguageModel) {}

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("ingestion:classifier");
    }
    return this._logger;
  }

  async classify(text: string): Promise<Classification> {
    let reply: string;
    try {
      reply = await this.llm.generate(buildClassificationPrompt(text), { maxTokens: 10 });
    } catch (error) {
      const cause = toError(error);
      this.logger.warn({ err: cause }, "Classification failed, defaulting to general");
      return {
        category: "general",
        degradation: { kind: "classification_fallback", reason: `Classifier failed: ${cause.message}` },
      };
    }

    const category = parseCategory(reply);
    if (category === null) {
      this.logger.warn({ reply }, "Unrecognised classification, defaulting to general");
      return {
        category: "general",
        degradation: { kind: "classification_fallback", reason: `Unrecognised category '${reply.trim()}'` },
      };
    }
    this.logger.debug({ category }, "Document classified");
    return { category };
  }
}
