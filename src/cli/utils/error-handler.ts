/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps service errors to a headline, the error message and next steps.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { Ora } from "ora";
import { ZodError } from "zod";
import { ConfigurationError } from "../../config/index.js";
import { GraphAuthenticationError, GraphConnectionError, GraphNodeNotFoundError } from "../../graph/errors.js";
import { LanguageModelAuthenticationError } from "../../llm/errors.js";
import { EmbeddingAuthenticationError } from "../../providers/errors.js";
import {
  QueryExecutionError,
  QueryGenerationError,
  QueryValidationError,
  SchemaUnavailableError,
  SemanticRetrievalError,
} from "../../query/errors.js";
import { IngestionValidationError, IngestionWriteError } from "../../ingestion/errors.js";

function printNextSteps(steps: string[]): void {
  console.error("\n" + chalk.bold("Next steps:"));
  for (const step of steps) {
    console.error(`  • ${step}`);
  }
}

function printRetryHint(retryable: boolean): void {
  if (retryable) {
    console.error("\n" + chalk.yellow("This error may be transient. You can try again."));
  }
}

function printGeneratedQuery(query: string | undefined): void {
  if (query) {
    console.error("\n" + chalk.bold("Generated query:"));
    console.error(chalk.gray(query));
  }
}

/**
 * Handle command errors and exit with status 1
 *
 * Stops any active spinner first so the message is not overwritten.
 */
export function handleCommandError(error: unknown, spinner?: Ora): never {
  if (spinner && spinner.isSpinning) {
    spinner.stop();
  }

  console.error();

  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Options"));
    for (const issue of error.errors) {
      console.error(`  • ${issue.path.join(".") || "options"}: ${issue.message}`);
    }
    printNextSteps(["Show usage: " + chalk.gray("kgqa <command> --help")]);
    process.exit(1);
  }

  if (error instanceof ConfigurationError) {
    console.error(chalk.red("✗ Invalid Configuration"));
    for (const issue of error.issues) {
      console.error(`  • ${issue}`);
    }
    printNextSteps(["Check the .env file against .env.example"]);
    process.exit(1);
  }

  if (error instanceof GraphAuthenticationError) {
    console.error(chalk.red("✗ Neo4j Authentication Failed"));
    console.error(`\n${error.message}`);
    printNextSteps(["Check NEO4J_USER and NEO4J_PASSWORD in .env"]);
    process.exit(1);
  }

  if (error instanceof GraphConnectionError) {
    console.error(chalk.red("✗ Neo4j Unavailable"));
    console.error(`\n${error.message}`);
    printRetryHint(error.retryable);
    printNextSteps([
      "Verify Neo4j is running: " + chalk.gray("docker compose up -d neo4j"),
      "Check NEO4J_HOST and NEO4J_BOLT_PORT in .env",
      "Run " + chalk.gray("kgqa health"),
    ]);
    process.exit(1);
  }

  if (error instanceof GraphNodeNotFoundError) {
    console.error(chalk.red("✗ Not Found"));
    console.error(`\n${error.message}`);
    printNextSteps([
      "Check the spelling; names are matched exactly",
      "List what exists: " + chalk.gray("kgqa directory employees") + " or " + chalk.gray("kgqa directory projects"),
    ]);
    process.exit(1);
  }

  if (error instanceof LanguageModelAuthenticationError || error instanceof EmbeddingAuthenticationError) {
    console.error(chalk.red("✗ API Authentication Failed"));
    console.error(`\n${error.message}`);
    printNextSteps(["Check OPENAI_API_KEY or GROQ_API_KEY in .env"]);
    process.exit(1);
  }

  if (error instanceof SchemaUnavailableError) {
    console.error(chalk.red("✗ Graph Schema Unavailable"));
    console.error(`\n${error.message}`);
    printRetryHint(error.retryable);
    printNextSteps(["Run " + chalk.gray("kgqa health"), "Retry with " + chalk.gray("kgqa refresh-schema")]);
    process.exit(1);
  }

  if (error instanceof QueryGenerationError) {
    console.error(chalk.red("✗ Could Not Translate the Question"));
    console.error(`\n${error.message}`);
    printGeneratedQuery(error.query);
    printRetryHint(error.retryable);
    printNextSteps([
      "Rephrase the question using names from " + chalk.gray("kgqa schema"),
      "If the graph changed recently, run " + chalk.gray("kgqa refresh-schema"),
    ]);
    process.exit(1);
  }

  if (error instanceof QueryValidationError) {
    console.error(chalk.red("✗ Generated Query Rejected"));
    console.error(`\n${error.message}`);
    printGeneratedQuery(error.query);
    printNextSteps(["Rephrase the question", "Try one of " + chalk.gray("kgqa samples")]);
    process.exit(1);
  }

  if (error instanceof QueryExecutionError) {
    console.error(chalk.red(error.timedOut ? "✗ Query Timed Out" : "✗ Query Execution Failed"));
    console.error(`\n${error.message}`);
    printGeneratedQuery(error.query);
    printRetryHint(error.retryable);
    printNextSteps(
      error.timedOut
        ? ["Ask a narrower question", "Raise QUERY_TIMEOUT_MS in .env"]
        : ["Run " + chalk.gray("kgqa health"), "Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug kgqa ask ...")]
    );
    process.exit(1);
  }

  if (error instanceof SemanticRetrievalError) {
    console.error(chalk.red("✗ Semantic Index Error"));
    console.error(`\n${error.message}`);
    printRetryHint(error.retryable);
    printNextSteps([
      "Verify ChromaDB is running: " + chalk.gray("docker compose up -d chromadb"),
      "Check CHROMADB_HOST and CHROMADB_PORT in .env",
    ]);
    process.exit(1);
  }

  if (error instanceof IngestionValidationError) {
    console.error(chalk.red("✗ Invalid Document"));
    console.error(`\n${error.message}`);
    process.exit(1);
  }

  if (error instanceof IngestionWriteError) {
    console.error(chalk.red("✗ Graph Write Failed"));
    console.error(`\n${error.message}`);
    console.error(chalk.gray(`Document id: ${error.documentId}`));
    printRetryHint(error.retryable);
    printNextSteps(["Run " + chalk.gray("kgqa health"), "Re-run the ingest command once Neo4j is reachable"]);
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(chalk.red("✗ Error"));
    console.error(`\n${error.message}`);

    if (process.env["LOG_LEVEL"] === "debug" || process.env["LOG_LEVEL"] === "trace") {
      console.error("\n" + chalk.gray(error.stack || "No stack trace available"));
    }

    printNextSteps([
      "Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug kgqa <command>"),
      "Check configuration in .env file",
    ]);
    process.exit(1);
  }

  console.error(chalk.red("✗ Unknown Error"));
  console.error(`\n${String(error)}`);
  printNextSteps(["Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug kgqa <command>")]);
  process.exit(1);
}
