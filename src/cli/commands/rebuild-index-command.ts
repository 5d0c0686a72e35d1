/**
 * Rebuild Index Command - Re-embed a semantic collection from the graph
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { IndexRebuildResult } from "../../query/types.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { RebuildIndexCommandOptions } from "../utils/validation.js";
import { formatJson, formatRebuildResult } from "../output/formatters.js";
import { startSpinner } from "../output/progress.js";

export async function rebuildIndexCommand(options: RebuildIndexCommandOptions, deps: CliDependencies): Promise<void> {
  const collection = options.collection ?? deps.retriever.defaultCollection;
  const spinner = startSpinner(`Rebuilding ${chalk.cyan(collection)}...`, options.json ?? false);

  let result: IndexRebuildResult;
  try {
    result = await deps.orchestrator.rebuildSemanticIndex(collection);
  } catch (error) {
    spinner.fail(chalk.red(`Rebuilding ${collection} failed`));
    throw error;
  }
  spinner.stop();

  console.log(options.json ? formatJson(result) : formatRebuildResult(result));
}
