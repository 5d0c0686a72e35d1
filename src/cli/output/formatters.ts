/**
 * Output Formatters for CLI
 *
 * Functions for formatting output as tables or JSON.
 */

import Table from "cli-table3";
import chalk from "chalk";
import type { SchemaSnapshot } from "../../graph/schema/types.js";
import type { CompositeAnswer, IndexRebuildResult } from "../../query/types.js";
import type { IngestionResult } from "../../ingestion/types.js";

/**
 * A sample question shipped with the CLI
 */
export interface SampleQuestion {
  category: string;
  question: string;
}

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated
 */
export function truncate(str: string, maxLength: number): string {
  if (maxLength < 4) return str.substring(0, maxLength);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength - 3) + "...";
}

/**
 * Format duration in milliseconds to human readable string
 *
 * @example
 * formatDuration(500) // "500ms"
 * formatDuration(2340) // "2.3s"
 * formatDuration(75000) // "1m 15s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function tableStyle(): { head: string[]; border: string[] } {
  return { head: [], border: ["gray"] };
}

/**
 * Human-readable answer with the generated query, passages and degradations
 */
export function formatAnswer(answer: CompositeAnswer): string {
  const { metadata } = answer;
  const sections: string[] = [chalk.bold("\nAnswer"), answer.answer];

  if (answer.generated_query) {
    sections.push("", chalk.bold("Query"), chalk.gray(answer.generated_query));
  }

  if (metadata.passages_used.length > 0) {
    const table = new Table({
      head: [chalk.cyan("#"), chalk.cyan("Source"), chalk.cyan("Excerpt"), chalk.cyan("Score")],
      colAligns: ["right", "left", "left", "right"],
      style: tableStyle(),
    });
    metadata.passages_used.forEach((passage, i) => {
      table.push([
        (i + 1).toString(),
        truncate(passage.source, 30),
        truncate(passage.excerpt.replace(/\s+/g, " "), 60),
        chalk.green(`${(passage.score * 100).toFixed(0)}%`),
      ]);
    });
    sections.push("", chalk.bold("Passages"), table.toString());
  }

  for (const degradation of metadata.degradations) {
    sections.push(chalk.yellow(`! ${degradation.kind}: ${degradation.reason}`));
  }

  const rows = `${plural(metadata.row_count, "row")}${metadata.truncated ? " (truncated)" : ""}`;
  sections.push(
    "",
    chalk.gray(
      `${rows}, ${plural(metadata.passages_used.length, "passage")}, ${metadata.provider}/${metadata.model}, ` +
        formatDuration(metadata.execution_time_ms)
    )
  );
  return sections.join("\n");
}

/**
 * Format any result as pretty-printed JSON
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Labels and relationship types with their counts
 */
export function createSchemaTable(snapshot: SchemaSnapshot): string {
  const labels = new Table({
    head: [chalk.cyan("Label"), chalk.cyan("Nodes"), chalk.cyan("Properties")],
    colAligns: ["left", "right", "left"],
    style: tableStyle(),
  });
  for (const label of snapshot.nodeLabels) {
    labels.push([label.label, label.count.toString(), truncate(label.properties.map((p) => p.name).join(", "), 60)]);
  }

  const relationships = new Table({
    head: [chalk.cyan("Relationship"), chalk.cyan("Count"), chalk.cyan("Patterns")],
    colAligns: ["left", "right", "left"],
    style: tableStyle(),
  });
  for (const rel of snapshot.relationshipTypes) {
    relationships.push([
      rel.type,
      rel.count.toString(),
      truncate(rel.patterns.map((p) => `(${p.from})->(${p.to})`).join(", "), 60),
    ]);
  }

  return [
    chalk.bold(`\nSchema ${snapshot.version}`) + chalk.gray(` captured ${snapshot.capturedAt}`),
    labels.toString(),
    relationships.toString(),
    chalk.gray(
      `${plural(snapshot.totals.nodes, "node")}, ${plural(snapshot.totals.relationships, "relationship")}`
    ),
  ].join("\n");
}

export function formatIngestionResult(result: IngestionResult): string {
  const lines: string[] = [
    chalk.bold(`\nIngested ${result.category} document`),
    `  Document id: ${chalk.cyan(result.document_id)}`,
    `  Title: ${chalk.cyan(result.record.title)}`,
  ];

  switch (result.category) {
    case "contract":
      lines.push(`  Client: ${result.linked_entity ? chalk.cyan(result.linked_entity) : chalk.yellow("no match")}`);
      break;
    case "policy":
      lines.push(
        `  Departments: ${result.linked_entities.length > 0 ? chalk.cyan(result.linked_entities.join(", ")) : chalk.yellow("no match")}`
      );
      break;
    case "general":
      lines.push(
        `  Entities: ${chalk.cyan(result.record.nodesWritten.toString())}, relationships: ${chalk.cyan(
          result.record.relationshipsWritten.toString()
        )}`
      );
      break;
  }

  for (const degradation of result.degradations) {
    lines.push(chalk.yellow(`  ! ${degradation.kind}: ${degradation.reason}`));
  }
  if (result.schema_refreshed) {
    lines.push(chalk.gray("  Schema cache invalidated"));
  }
  return lines.join("\n");
}

export function formatRebuildResult(result: IndexRebuildResult): string {
  return [
    chalk.green(`Rebuilt '${result.collection}' from ${result.label} nodes`),
    `  Indexed: ${chalk.cyan(result.indexed.toString())}`,
    `  Skipped (no text): ${chalk.cyan(result.skipped.toString())}`,
    `  Duration: ${chalk.cyan(formatDuration(result.duration_ms))}`,
  ].join("\n");
}

export function createSamplesTable(samples: readonly SampleQuestion[]): string {
  if (samples.length === 0) {
    return chalk.yellow("No sample questions match.");
  }
  const table = new Table({
    head: [chalk.cyan("#"), chalk.cyan("Category"), chalk.cyan("Question")],
    colAligns: ["right", "left", "left"],
    style: tableStyle(),
  });
  samples.forEach((sample, i) => {
    table.push([(i + 1).toString(), sample.category, sample.question]);
  });
  return table.toString();
}
