/**
 * Input checks shared by the embedding providers
 */

import { EmbeddingValidationError } from "./errors.js";
import type { EmbeddingProviderConfig } from "./types.js";

export function validateProviderConfig(config: EmbeddingProviderConfig, maxBatchSize: number): void {
  if (config.dimensions <= 0) {
    throw new EmbeddingValidationError("Dimensions must be positive", "dimensions");
  }
  if (config.batchSize <= 0 || config.batchSize > maxBatchSize) {
    throw new EmbeddingValidationError(`Batch size must be between 1 and ${maxBatchSize}`, "batchSize");
  }
  if (config.maxRetries < 0) {
    throw new EmbeddingValidationError("Max retries must be non-negative", "maxRetries");
  }
  if (config.timeoutMs <= 0) {
    throw new EmbeddingValidationError("Timeout must be positive", "timeoutMs");
  }
}

export function validateEmbeddingInputs(texts: string[]): void {
  if (texts.length === 0) {
    throw new EmbeddingValidationError("Input array cannot be empty");
  }
  texts.forEach((text, i) => {
    if (text.trim().length === 0) {
      throw new EmbeddingValidationError(
        `Input at index ${i} cannot be empty or whitespace only`,
        `texts[${i}]`
      );
    }
  });
}

export function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
