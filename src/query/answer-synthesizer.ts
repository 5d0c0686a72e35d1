/**
 * @module query/answer-synthesizer
 *
 * Combines structured rows and retrieved passages into one answer. Never
 * throws: a failed synthesis falls back to the structured summary.
 */

import type pino from "pino";
import type { GraphRow } from "../graph/types.js";
import type { LanguageModel } from "../llm/types.js";
import { SynthesisError } from "./errors.js";
import { buildSynthesisPrompt } from "./prompts.js";
import type { Degradation, RetrievedPassage, StructuredResult } from "./types.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";

export const NO_DATA_FOUND = "No data found.";

/** Rows written into a summary before the rest are counted */
const SUMMARY_ROW_LIMIT = 50;

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "null";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatValue).join(", ")}]`;
  }
  return JSON.stringify(value);
}

function formatRow(row: GraphRow): string {
  return Object.entries(row)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(", ");
}

/**
 * Plain-text rendering of a structured result
 *
 * @example
 * ```text
 * 1. employee: Ada Lovelace, title: Engineer
 * 2. employee: Alan Turing, title: Engineer
 * (Result truncated to the first 2 rows)
 * ```
 */
export function summarizeStructuredResult(result: StructuredResult, rowLimit: number = SUMMARY_ROW_LIMIT): string {
  if (result.rows.length === 0) {
    return NO_DATA_FOUND;
  }
  const lines = result.rows.slice(0, rowLimit).map((row, i) => `${i + 1}. ${formatRow(row)}`);
  if (result.rows.length > rowLimit) {
    lines.push(`... ${result.rows.length - rowLimit} more rows`);
  }
  if (result.truncated) {
    lines.push(`(Result truncated to the first ${result.rows.length} rows)`);
  }
  return lines.join("\n");
}

export interface SynthesisOutcome {
  answer: string;
  /** Set when the answer is the structured fallback */
  degradation?: Degradation;
}

export class AnswerSynthesizer {
  private _logger: pino.Logger | null = null;

  constructor(
    private readonly llm: LanguageModel,
    private readonly options: { timeoutMs?: number } = {}
  ) {}

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("query:synthesizer");
    }
    return this._logger;
  }

  async synthesize(
    question: string,
    structuredSummary: string,
    passages: readonly RetrievedPassage[]
  ): Promise<SynthesisOutcome> {
    const prompt = buildSynthesisPrompt({ question, structuredSummary, passages });
    const startTime = Date.now();

    let failure: SynthesisError;
    try {
      const answer = (await this.llm.generate(prompt, { timeoutMs: this.options.timeoutMs })).trim();
      if (answer.length > 0) {
        this.logger.debug(
          { metric: "query.synthesis_ms", value: Date.now() - startTime, passages: passages.length },
          "Answer synthesized"
        );
        return { answer };
      }
      failure = new SynthesisError("Language model returned an empty answer", question);
    } catch (error) {
      const cause = toError(error);
      failure = new SynthesisError(cause.message, question, cause);
    }

    this.logger.warn({ err: failure }, "Answer synthesis degraded to structured summary");
    return {
      answer: `${structuredSummary}\n\n[Answer synthesis unavailable: ${failure.message}]`,
      degradation: { kind: "synthesis_degraded", reason: failure.message },
    };
  }
}
