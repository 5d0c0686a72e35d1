/**
 * Schema Command - Show the graph schema the query generator sees
 */

/* eslint-disable no-console */

import type { CliDependencies } from "../utils/dependency-init.js";
import type { JsonOutputOptions } from "../utils/validation.js";
import { createSchemaTable, formatJson } from "../output/formatters.js";

export async function schemaCommand(options: JsonOutputOptions, deps: CliDependencies): Promise<void> {
  const snapshot = await deps.orchestrator.describeSchema();
  console.log(options.json ? formatJson(snapshot) : createSchemaTable(snapshot));
}
