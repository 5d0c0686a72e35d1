/**
 * @module ingestion/general-extractor
 *
 * Open-ended entity and relationship extraction. Labels and relationship
 * types come from the model, so they are reduced to safe identifiers here
 * before anything reaches a query.
 */

import { z } from "zod";
import type pino from "pino";
import type { LanguageModel } from "../llm/types.js";
import { parseStructuredOutput } from "../llm/structured-output.js";
import { getComponentLogger } from "../logging/index.js";
import { Err, Ok, type Result } from "../utils/result.js";
import { toError } from "../utils/retry.js";
import { buildGraphExtractionPrompt } from "./prompts.js";
import type { ExtractionFallback } from "./record-extractor.js";
import type { ExtractedNode, ExtractedRelationship, GraphExtraction } from "./types.js";

export const SAFE_IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

/** Labels the ingestion path writes itself; extracted nodes may not claim them */
const RESERVED_LABELS = new Set(["Document"]);

/**
 * PascalCase-ish label reduced to letters, digits and underscores, starting
 * with a letter. Null when nothing usable remains.
 */
export function sanitizeLabel(raw: string): string | null {
  const label = raw
    .trim()
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .replace(/^[^A-Za-z]+/, "");
  return SAFE_IDENTIFIER.test(label) ? label : null;
}

/**
 * Relationship type in UPPER_SNAKE_CASE, or null
 */
export function sanitizeRelationshipType(raw: string): string | null {
  const type = raw
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "")
    .replace(/^[^A-Z]+/, "");
  return SAFE_IDENTIFIER.test(type) ? type : null;
}

const PropertyValue = z.union([z.string(), z.number(), z.boolean()]);

const GraphExtractionSchema = z.object({
  nodes: z
    .array(
      z.object({
        id: z.coerce.string(),
        type: z.string(),
        properties: z.record(z.unknown()).optional(),
      })
    )
    .default([]),
  relationships: z
    .array(
      z.object({
        source: z.coerce.string(),
        target: z.coerce.string(),
        type: z.string(),
      })
    )
    .default([]),
});

type RawGraphExtraction = z.infer<typeof GraphExtractionSchema>;

function scalarProperties(raw: Record<string, unknown> | undefined): Record<string, string | number | boolean> {
  const properties: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    const parsed = PropertyValue.safeParse(value);
    // name is the MERGE key and is set from the node id
    if (parsed.success && key !== "name" && SAFE_IDENTIFIER.test(key)) {
      properties[key] = parsed.data;
    }
  }
  return properties;
}

/**
 * Sanitize labels and types, merge duplicate nodes and drop relationships
 * whose endpoints were not extracted
 */
export function normalizeGraphExtraction(raw: RawGraphExtraction): GraphExtraction {
  const nodes = new Map<string, ExtractedNode>();
  for (const node of raw.nodes) {
    const name = node.id.trim();
    const label = sanitizeLabel(node.type);
    if (name.length === 0 || label === null || RESERVED_LABELS.has(label)) {
      continue;
    }
    const existing = nodes.get(name);
    if (existing) {
      existing.properties = { ...existing.properties, ...scalarProperties(node.properties) };
      continue;
    }
    nodes.set(name, { name, label, properties: scalarProperties(node.properties) });
  }

  const seen = new Set<string>();
  const relationships: ExtractedRelationship[] = [];
  for (const rel of raw.relationships) {
    const source = rel.source.trim();
    const target = rel.target.trim();
    const type = sanitizeRelationshipType(rel.type);
    if (type === null || !nodes.has(source) || !nodes.has(target)) {
      continue;
    }
    const key = `${source}\u0000${type}\u0000${target}`;
    if (!seen.has(key)) {
      seen.add(key);
      relationships.push({ source, target, type });
    }
  }

  return { nodes: [...nodes.values()], relationships };
}

export class GeneralExtractor {
  private _logger: pino.Logger | null = null;

  constructor(private readonly llm: LanguageModel) {}

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("ingestion:extractor");
    }
    return this._logger;
  }

  async extract(text: string): Promise<Result<GraphExtraction, ExtractionFallback>> {
    let reply: string;
    try {
      reply = await this.llm.generate(buildGraphExtractionPrompt(text), { maxTokens: 2048 });
    } catch (error) {
      const cause = toError(error);
      this.logger.warn({ err: cause }, "Graph extraction request failed");
      return Err({ reason: `Extraction request failed: ${cause.message}` });
    }

    const parsed = parseStructuredOutput(reply, GraphExtractionSchema);
    if (!parsed.ok) {
      this.logger.warn({ reason: parsed.error.reason, message: parsed.error.message }, "Graph extraction unusable");
      return Err({ reason: `Graph extraction unusable (${parsed.error.reason}): ${parsed.error.message}` });
    }

    const extraction = normalizeGraphExtraction(parsed.value);
    this.logger.debug(
      { nodes: extraction.nodes.length, relationships: extraction.relationships.length },
      "Graph extracted"
    );
    return Ok(extraction);
  }
}
