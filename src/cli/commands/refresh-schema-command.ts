/**
 * Refresh Schema Command - Re-introspect the graph schema
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { SchemaSnapshot } from "../../graph/schema/types.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { JsonOutputOptions } from "../utils/validation.js";
import { formatJson } from "../output/formatters.js";
import { completeSpinner, startSpinner } from "../output/progress.js";

export async function refreshSchemaCommand(options: JsonOutputOptions, deps: CliDependencies): Promise<void> {
  const spinner = startSpinner("Introspecting graph schema...", options.json ?? false);
  let snapshot: SchemaSnapshot;
  try {
    snapshot = await deps.orchestrator.refreshSchema();
  } catch (error) {
    completeSpinner(spinner, false, "Schema refresh failed");
    throw error;
  }

  if (options.json) {
    spinner.stop();
    console.log(
      formatJson({
        version: snapshot.version,
        captured_at: snapshot.capturedAt,
        labels: snapshot.nodeLabels.length,
        relationship_types: snapshot.relationshipTypes.length,
      })
    );
    return;
  }
  completeSpinner(
    spinner,
    true,
    `Schema refreshed: ${snapshot.nodeLabels.length} labels, ${snapshot.relationshipTypes.length} relationship types`
  );
  console.log(chalk.gray(`  Version: ${snapshot.version}`));
}
