/**
 * Samples Command - List example questions
 */

/* eslint-disable no-console */

import { readFile } from "fs/promises";
import { z } from "zod";
import type { SamplesCommandOptions } from "../utils/validation.js";
import { createSamplesTable, formatJson, type SampleQuestion } from "../output/formatters.js";

/** Same relative path from src/cli/commands and dist/cli/commands */
export const SAMPLE_QUESTIONS_URL = new URL("../../../data/sample-questions.json", import.meta.url);

const SampleQuestionsSchema = z.array(
  z.object({
    category: z.string().min(1),
    question: z.string().min(1),
  })
);

export async function loadSampleQuestions(source: URL | string = SAMPLE_QUESTIONS_URL): Promise<SampleQuestion[]> {
  const raw: unknown = JSON.parse(await readFile(source, "utf8"));
  return SampleQuestionsSchema.parse(raw);
}

export async function samplesCommand(options: SamplesCommandOptions, source?: URL | string): Promise<void> {
  const all = await loadSampleQuestions(source);
  const category = options.category?.toLowerCase();
  const samples = category ? all.filter((s) => s.category.toLowerCase() === category) : all;
  console.log(options.json ? formatJson(samples) : createSamplesTable(samples));
}
