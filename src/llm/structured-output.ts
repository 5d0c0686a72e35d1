/**
 * Parse JSON out of a model completion and validate it against a zod schema
 *
 * Models wrap JSON in prose or code fences often enough that the first
 * balanced object or array in the text is taken as the payload.
 */

import type { z } from "zod";
import { Err, Ok, type Result } from "../utils/result.js";

export interface StructuredOutputFailure {
  reason: "no_json" | "invalid_json" | "schema_mismatch";
  message: string;
  raw: string;
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Locate the first balanced JSON object or array in `text`
 */
export function extractJsonCandidate(text: string): string | null {
  const fenced = FENCE_PATTERN.exec(text);
  const source = fenced?.[1] ?? text;

  const start = source.search(/[[{]/);
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) {
        return source.slice(start, i + 1);
      }
    }
  }
  return null;
}

export function parseStructuredOutput<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, StructuredOutputFailure> {
  const candidate = extractJsonCandidate(text);
  if (candidate === null) {
    return Err({ reason: "no_json", message: "Completion contained no JSON value", raw: text });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err({ reason: "invalid_json", message, raw: text });
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const message = validated.error.errors
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return Err({ reason: "schema_mismatch", message, raw: text });
  }
  return Ok(validated.data);
}
