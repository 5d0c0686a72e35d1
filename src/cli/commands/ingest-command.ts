/**
 * Ingest Command - Classify a document and write it into the graph
 *
 * Reads plain text or markdown from disk.
 */

/* eslint-disable no-console */

import { readFile } from "fs/promises";
import { basename, extname } from "path";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { IngestCommandOptions } from "../utils/validation.js";
import { IngestionValidationError } from "../../ingestion/errors.js";
import type { IngestionHints, IngestionResult } from "../../ingestion/types.js";
import { formatIngestionResult, formatJson } from "../output/formatters.js";
import { startSpinner } from "../output/progress.js";

export const SUPPORTED_EXTENSIONS = [".txt", ".md", ".markdown"];

export async function ingestCommand(file: string, options: IngestCommandOptions, deps: CliDependencies): Promise<void> {
  const extension = extname(file).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(extension)) {
    throw new IngestionValidationError(
      `Unsupported file type '${extension || "(none)"}'. Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`,
      "file"
    );
  }
  const text = await readFile(file, "utf8");

  const hints: IngestionHints = {
    docType: options.type,
    title: options.title,
    filename: basename(file),
    clientName: options.client,
    departments: options.departments,
  };

  const spinner = startSpinner(`Ingesting ${basename(file)}...`, options.json ?? false);
  let result: IngestionResult;
  try {
    result = await deps.ingestion.ingest(text, hints);
  } catch (error) {
    spinner.stop();
    throw error;
  }
  spinner.stop();

  console.log(options.json ? formatJson(result) : formatIngestionResult(result));
}
