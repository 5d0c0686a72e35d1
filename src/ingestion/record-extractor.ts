/**
 * @module ingestion/record-extractor
 *
 * Category-specific extraction for contracts and policies. The model is
 * asked for JSON; anything it gets wrong is normalised leniently, and an
 * unusable reply is reported as an `ExtractionFallback` for the caller to
 * replace with a record built from hints.
 */

import { z } from "zod";
import type pino from "pino";
import type { LanguageModel } from "../llm/types.js";
import { parseStructuredOutput } from "../llm/structured-output.js";
import { getComponentLogger } from "../logging/index.js";
import { Err, Ok, type Result } from "../utils/result.js";
import { toError } from "../utils/retry.js";
import { buildContractExtractionPrompt, buildPolicyExtractionPrompt } from "./prompts.js";
import type { ContractRecord, IngestionHints, PolicyRecord } from "./types.js";

export interface ExtractionFallback {
  reason: string;
}

/**
 * YYYY-MM-DD for a real calendar date, otherwise null
 */
export function normalizeDate(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(value.trim());
  if (!match) {
    return null;
  }
  const iso = `${match[1]}-${match[2]}-${match[3]}`;
  const date = new Date(`${iso}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== iso) {
    return null;
  }
  return iso;
}

/**
 * Numeric value from a number or a currency string such as "$1,250,000.00"
 */
export function normalizeAmount(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const cleaned = value.replace(/[$,\s]/g, "");
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

function normalizeText(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function normalizeList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items.map(normalizeText).filter((item): item is string => item !== null);
}

const text = z.unknown().transform(normalizeText);
const list = z.unknown().transform(normalizeList);
const date = z.unknown().transform(normalizeDate);

const ContractExtractionSchema = z.object({
  title: text,
  client_name: text,
  contract_type: text,
  start_date: date,
  end_date: date,
  value: z.unknown().transform(normalizeAmount),
  key_terms: list,
  signatories: list,
});

const PolicyExtractionSchema = z.object({
  title: text,
  policy_type: text,
  departments: list,
  effective_date: date,
  key_rules: list,
});

function hintedTitle(hints: IngestionHints, fallback: string): string {
  return normalizeText(hints.title) ?? normalizeText(hints.filename) ?? fallback;
}

/**
 * Contract record built from caller metadata alone
 */
export function fallbackContract(hints: IngestionHints): ContractRecord {
  return {
    title: hintedTitle(hints, "Untitled Contract"),
    clientName: normalizeText(hints.clientName),
    contractType: "General",
    startDate: null,
    endDate: null,
    value: null,
    keyTerms: [],
    signatories: [],
  };
}

/**
 * Policy record built from caller metadata alone
 */
export function fallbackPolicy(hints: IngestionHints): PolicyRecord {
  return {
    title: hintedTitle(hints, "Untitled Policy"),
    policyType: "General",
    departments: normalizeList(hints.departments ?? []),
    effectiveDate: null,
    keyRules: [],
  };
}

export class RecordExtractor {
  private _logger: pino.Logger | null = null;

  constructor(private readonly llm: LanguageModel) {}

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("ingestion:extractor");
    }
    return this._logger;
  }

  async extractContract(text: string, hints: IngestionHints): Promise<Result<ContractRecord, ExtractionFallback>> {
    const reply = await this.complete(buildContractExtractionPrompt(text));
    if (!reply.ok) {
      return reply;
    }
    const parsed = parseStructuredOutput(reply.value, ContractExtractionSchema);
    if (!parsed.ok) {
      this.logger.warn({ reason: parsed.error.reason, message: parsed.error.message }, "Contract extraction unusable");
      return Err({ reason: `Contract extraction unusable (${parsed.error.reason}): ${parsed.error.message}` });
    }
    const data = parsed.value;
    return Ok({
      title: data.title ?? hintedTitle(hints, data.client_name ? `Contract with ${data.client_name}` : "Untitled Contract"),
      clientName: data.client_name ?? normalizeText(hints.clientName),
      contractType: data.contract_type ?? "General",
      startDate: data.start_date,
      endDate: data.end_date,
      value: data.value,
      keyTerms: data.key_terms,
      signatories: data.signatories,
    });
  }

  async extractPolicy(text: string, hints: IngestionHints): Promise<Result<PolicyRecord, ExtractionFallback>> {
    const reply = await this.complete(buildPolicyExtractionPrompt(text));
    if (!reply.ok) {
      return reply;
    }
    const parsed = parseStructuredOutput(reply.value, PolicyExtractionSchema);
    if (!parsed.ok) {
      this.logger.warn({ reason: parsed.error.reason, message: parsed.error.message }, "Policy extraction unusable");
      return Err({ reason: `Policy extraction unusable (${parsed.error.reason}): ${parsed.error.message}` });
    }
    const data = parsed.value;
    return Ok({
      title: data.title ?? hintedTitle(hints, "Untitled Policy"),
      policyType: data.policy_type ?? "General",
      departments: data.departments.length > 0 ? data.departments : normalizeList(hints.departments ?? []),
      effectiveDate: data.effective_date,
      keyRules: data.key_rules,
    });
  }

  private async complete(prompt: Parameters<LanguageModel["generate"]>[0]): Promise<Result<string, ExtractionFallback>> {
    try {
      return Ok(await this.llm.generate(prompt));
    } catch (error) {
      const cause = toError(error);
      this.logger.warn({ err: cause }, "Extraction request failed");
      return Err({ reason: `Extraction request failed: ${cause.message}` });
    }
  }
}
