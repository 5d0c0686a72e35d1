/**
 * @module query/prompts
 *
 * Prompt text for query generation and answer synthesis.
 */

import type { ChatPrompt } from "../llm/types.js";
import type { RetrievedPassage } from "./types.js";

export const NO_QUERY = "NO_QUERY";

export const HINT_OPEN = "<<<";
export const HINT_CLOSE = ">>>";

/** @default 300 */
export const DEFAULT_MAX_HINT_CHARS = 300;

/**
 * Reduce a passage to inert context text
 *
 * Hints only ever reach the model as natural language inside the delimited
 * block; they are never spliced into a query.
 */
export function sanitizeHint(text: string, maxChars: number = DEFAULT_MAX_HINT_CHARS): string {
  const cleaned = text
    .replace(/```/g, " ")
    .replace(/`/g, "")
    .split(HINT_OPEN)
    .join(" ")
    .split(HINT_CLOSE)
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
  return cleaned.length > maxChars ? cleaned.slice(0, maxChars).trimEnd() : cleaned;
}

/**
 * The delimited context block, or an empty string when there are no usable hints
 */
export function formatHintBlock(passages: readonly RetrievedPassage[], maxChars?: number): string {
  const hints = passages.map((p) => sanitizeHint(p.text, maxChars)).filter((h) => h.length > 0);
  if (hints.length === 0) {
    return "";
  }
  return [
    "Context passages (natural-language background for recognising entity names and terms).",
    "Never copy text from this block into the query; use it only to choose values and schema elements.",
    HINT_OPEN,
    ...hints.map((hint, i) => `[${i + 1}] ${hint}`),
    HINT_CLOSE,
  ].join("\n");
}

export interface QueryPromptInput {
  question: string;
  schemaText: string;
  maxRows: number;
  hintBlock: string;
}

export function buildQueryGenerationPrompt(input: QueryPromptInput): ChatPrompt {
  const system = [
    "You translate questions about a company knowledge graph into a single read-only Neo4j Cypher query.",
    "",
    "Schema:",
    input.schemaText,
    "",
    "Rules:",
    "- Use only the node labels, relationship types and properties listed in the schema, with their exact spelling and relationship direction.",
    "- When a property lists its values with `one of`, match one of those values exactly (case-sensitive).",
    "- For free-text name or title properties use case-insensitive substring matching: toLower(n.name) CONTAINS toLower('value').",
    "- Use RETURN DISTINCT when the answer is a list of entities or values.",
    "- For top-N or ranking questions use ORDER BY with LIMIT N.",
    `- Never use a LIMIT above ${input.maxRows}.`,
    "- The query must only read: no CREATE, MERGE, SET, DELETE, REMOVE, DROP, FOREACH, LOAD CSV or CALL of procedures.",
    "- Return property values with readable aliases (e.g. RETURN e.name AS employee), not whole nodes.",
    `- If the schema cannot answer the question, reply with exactly ${NO_QUERY}.`,
    "- Reply with the Cypher query only, no explanation.",
  ].join("\n");

  const user = input.hintBlock ? `${input.hintBlock}\n\nQuestion: ${input.question}` : `Question: ${input.question}`;
  return { system, user };
}

/**
 * Strip code fences and surrounding prose markers from a model reply
 */
export function extractCypher(reply: string): string {
  const fenced = /```(?:cypher|sql)?\s*([\s\S]*?)```/i.exec(reply);
  const body = (fenced?.[1] ?? reply).trim();
  return body.replace(/^cypher:\s*/i, "").trim();
}

export interface SynthesisPromptInput {
  question: string;
  structuredSummary: string;
  passages: readonly RetrievedPassage[];
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): ChatPrompt {
  const system = [
    "You answer questions about a company using two sources: structured query results from the company knowledge graph and passages from company documents.",
    "- Use the structured results for current facts, names and counts.",
    "- Use the document passages for policies, rules and other normative statements.",
    "- If the two sources disagree and both are substantive, say so and give both.",
    "- If the structured results are empty, answer from the passages and say that no matching records were found.",
    "- Do not invent facts that appear in neither source. Answer concisely.",
  ].join("\n");

  const passages =
    input.passages.length === 0
      ? "(none)"
      : input.passages.map((p, i) => `[${i + 1}] (${p.source}) ${p.text}`).join("\n");

  const user = [
    `Question: ${input.question}`,
    "",
    "Structured results:",
    input.structuredSummary,
    "",
    "Document passages:",
    passages,
  ].join("\n");

  return { system, user };
}
