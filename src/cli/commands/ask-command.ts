/**
 * Ask Command - Answer a natural-language question
 *
 * Runs the full pipeline: structured query against Neo4j, semantic passages
 * from ChromaDB, and a synthesized answer.
 */

/* eslint-disable no-console */

import type { CompositeAnswer } from "../../query/types.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { AskCommandOptions } from "../utils/validation.js";
import { formatAnswer, formatJson } from "../output/formatters.js";
import { createAskSpinner } from "../output/progress.js";

export async function askCommand(question: string, options: AskCommandOptions, deps: CliDependencies): Promise<void> {
  const json = options.json ?? false;
  const spinner = createAskSpinner(question, json);

  let answer: CompositeAnswer;
  try {
    answer = await deps.orchestrator.process(question, {
      includeQuery: options.query,
      k: options.k,
      collection: options.collection,
      useHints: options.hints,
    });
  } catch (error) {
    spinner.stop();
    throw error;
  }
  spinner.stop();

  if (json) {
    console.log(formatJson(answer));
    return;
  }
  console.log(formatAnswer(answer));
  console.log();
}
