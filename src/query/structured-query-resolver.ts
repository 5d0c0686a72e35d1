/**
 * @module query/structured-query-resolver
 *
 * Turns a question into a validated Cypher query and its rows. A resolver is
 * bound to exactly one schema snapshot for its whole life; a new snapshot
 * means a new resolver.
 */

import type pino from "pino";
import type { GraphStore } from "../graph/types.js";
import type { SchemaSnapshot } from "../graph/schema/types.js";
import { SchemaVocabulary } from "../graph/schema/snapshot.js";
import { formatSchemaForPrompt } from "../graph/schema/format.js";
import { GraphError, GraphQueryTimeoutError, GraphSyntaxError } from "../graph/errors.js";
import type { LanguageModel } from "../llm/types.js";
import { LanguageModelError } from "../llm/errors.js";
import { QueryExecutionError, QueryGenerationError, QueryValidationError } from "./errors.js";
import { validateCypher } from "./cypher-validator.js";
import { NO_QUERY, buildQueryGenerationPrompt, extractCypher, formatHintBlock } from "./prompts.js";
import type { ResolvedQuery, RetrievedPassage } from "./types.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";

export interface ResolverOptions {
  /** Execution timeout for the generated query */
  timeoutMs: number;
  /** Row cap; rows beyond it are dropped and flagged */
  maxRows: number;
  maxHintChars?: number;
}

export class StructuredQueryResolver {
  readonly snapshot: SchemaSnapshot;

  private readonly vocabulary: SchemaVocabulary;
  private readonly schemaText: string;
  private _logger: pino.Logger | null = null;

  constructor(
    snapshot: SchemaSnapshot,
    private readonly store: GraphStore,
    private readonly llm: LanguageModel,
    private readonly options: ResolverOptions
  ) {
    this.snapshot = snapshot;
    this.vocabulary = new SchemaVocabulary(snapshot);
    this.schemaText = formatSchemaForPrompt(snapshot);
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("query:resolver");
    }
    return this._logger;
  }

  /**
   * Generate, validate and execute a query for `question`
   *
   * @param hints - Passages offered to the model as disambiguation context only
   * @throws {QueryGenerationError} no usable query, or one naming unknown schema elements
   * @throws {QueryValidationError} the query is malformed or not read-only; nothing ran
   * @throws {QueryExecutionError} the store failed or timed out
   */
  async resolve(question: string, hints: readonly RetrievedPassage[] = []): Promise<ResolvedQuery> {
    const query = await this.generate(question, hints);
    await this.validate(question, query);

    const startTime = Date.now();
    try {
      const result = await this.store.executeRead(
        query,
        {},
        { timeoutMs: this.options.timeoutMs, maxRows: this.options.maxRows }
      );
      this.logger.info(
        {
          metric: "query.structured_ms",
          value: Date.now() - startTime,
          rows: result.rows.length,
          truncated: result.truncated,
          schemaVersion: this.snapshot.version,
        },
        "Structured query executed"
      );
      return { query, schemaVersion: this.snapshot.version, result };
    } catch (error) {
      throw this.toExecutionError(error, question, query);
    }
  }

  private async generate(question: string, hints: readonly RetrievedPassage[]): Promise<string> {
    const prompt = buildQueryGenerationPrompt({
      question,
      schemaText: this.schemaText,
      maxRows: this.options.maxRows,
      hintBlock: formatHintBlock(hints, this.options.maxHintChars),
    });

    let reply: string;
    try {
      reply = await this.llm.generate(prompt);
    } catch (error) {
      const cause = toError(error);
      throw new QueryGenerationError(`Query generation failed: ${cause.message}`, question, {
        cause,
        retryable: error instanceof LanguageModelError && error.retryable,
      });
    }

    const query = extractCypher(reply);
    if (query.length === 0 || query.toUpperCase().startsWith(NO_QUERY)) {
      throw new QueryGenerationError("The graph schema cannot answer this question", question);
    }
    this.logger.debug({ query, hints: hints.length }, "Query generated");
    return query;
  }

  private async validate(question: string, query: string): Promise<void> {
    const check = validateCypher(query, this.vocabulary);

    if (check.issues.length > 0) {
      this.logger.warn({ query, issues: check.issues }, "Generated query rejected");
      throw new QueryValidationError(`Generated query is invalid: ${check.issues.join("; ")}`, question, query, check.issues);
    }
    if (check.unknownElements.length > 0) {
      const names = check.unknownElements.map((e) => `${e.kind} '${e.name}'`).join(", ");
      this.logger.warn({ query, unknownElements: check.unknownElements }, "Generated query references unknown schema");
      throw new QueryGenerationError(`Generated query references unknown schema elements: ${names}`, question, {
        query,
        unknownElements: check.unknownElements,
      });
    }

    try {
      await this.store.explain(query);
    } catch (error) {
      if (error instanceof GraphSyntaxError) {
        throw new QueryValidationError(
          `Generated query does not compile: ${error.message}`,
          question,
          query,
          [error.message],
          error
        );
      }
      throw this.toExecutionError(error, question, query);
    }
  }

  private toExecutionError(error: unknown, question: string, query: string): QueryExecutionError {
    if (error instanceof GraphQueryTimeoutError) {
      return new QueryExecutionError(
        `Query exceeded the ${error.timeoutMs}ms execution timeout`,
        question,
        { query, timedOut: true, cause: error }
      );
    }
    const cause = toError(error);
    return new QueryExecutionError(`Query execution failed: ${cause.message}`, question, {
      query,
      cause,
      retryable: error instanceof GraphError && error.retryable,
    });
  }
}
