/**
 * Runtime validation schemas for CLI command options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options.
 */

import { z } from "zod";
import { DOCUMENT_CATEGORIES } from "../../ingestion/types.js";

/**
 * Question argument of the ask command
 */
export const QuestionSchema = z
  .string()
  .trim()
  .min(3, "Question must be at least 3 characters")
  .max(500, "Question must be at most 500 characters");

/**
 * Schema for ask command options
 */
export const AskCommandOptionsSchema = z.object({
  k: z
    .string()
    .optional()
    .transform((val) => (val === undefined ? undefined : Number(val)))
    .pipe(
      z
        .number({ invalid_type_error: "k must be a number" })
        .int("k must be a whole number")
        .min(0, "k must be between 0 and 20")
        .max(20, "k must be between 0 and 20")
        .optional()
    ),
  collection: z.string().min(1).optional(),
  // commander turns --no-query and --no-hints into `false`
  query: z.boolean().default(true),
  hints: z.boolean().default(true),
  json: z.boolean().optional(),
});

export type AskCommandOptions = z.infer<typeof AskCommandOptionsSchema>;

/**
 * Schema for ingest command options
 */
export const IngestCommandOptionsSchema = z.object({
  type: z.enum(DOCUMENT_CATEGORIES).optional(),
  title: z.string().min(1).optional(),
  client: z.string().min(1).optional(),
  departments: z
    .string()
    .optional()
    .transform((val) =>
      val === undefined
        ? undefined
        : val
            .split(",")
            .map((d) => d.trim())
            .filter((d) => d.length > 0)
    ),
  json: z.boolean().optional(),
});

export type IngestCommandOptions = z.infer<typeof IngestCommandOptionsSchema>;

/**
 * Schema for rebuild-index command options
 */
export const RebuildIndexCommandOptionsSchema = z.object({
  collection: z.string().min(1).optional(),
  json: z.boolean().optional(),
});

export type RebuildIndexCommandOptions = z.infer<typeof RebuildIndexCommandOptionsSchema>;

/**
 * Schema for commands whose only option is --json
 */
export const JsonOutputOptionsSchema = z.object({
  json: z.boolean().optional(),
});

export type JsonOutputOptions = z.infer<typeof JsonOutputOptionsSchema>;

/**
 * Schema for samples command options
 */
export const SamplesCommandOptionsSchema = z.object({
  category: z.string().min(1).optional(),
  json: z.boolean().optional(),
});

export type SamplesCommandOptions = z.infer<typeof SamplesCommandOptionsSchema>;

/**
 * Skill, email or project id argument of the directory commands
 */
export const DirectoryKeySchema = z.string().trim().min(1, "Value must not be empty");

export const EmployeesCommandOptionsSchema = z.object({
  department: z.string().trim().min(1).optional(),
  json: z.boolean().optional(),
});

export type EmployeesCommandOptions = z.infer<typeof EmployeesCommandOptionsSchema>;

export const ProjectsCommandOptionsSchema = z.object({
  status: z.string().trim().min(1).optional(),
  json: z.boolean().optional(),
});

export type ProjectsCommandOptions = z.infer<typeof ProjectsCommandOptionsSchema>;
