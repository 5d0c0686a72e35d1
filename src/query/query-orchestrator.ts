/**
 * @module query/query-orchestrator
 *
 * Coordinates one question end to end: bind a resolver to the current
 * schema, run structured and semantic retrieval, synthesize, and stamp the
 * response metadata.
 *
 * The orchestrator owns the only long-lived shared state on the query path:
 * the pair of schema snapshot and resolver built from it. The pair lives in
 * one promise slot; a request captures the slot once and uses that pair to
 * the end, and a refresh empties the slot synchronously, so no request can
 * combine a resolver from one snapshot with another snapshot.
 */

import type pino from "pino";
import type { GraphStore } from "../graph/types.js";
import type { SchemaSnapshot } from "../graph/schema/types.js";
import type { LanguageModel } from "../llm/types.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";
import { withTimeout, TimeoutError } from "../utils/timeout.js";
import { AnswerSynthesizer, summarizeStructuredResult } from "./answer-synthesizer.js";
import { QueryExecutionError, SchemaUnavailableError, isFatalQueryError, type FatalQueryError } from "./errors.js";
import { joinRetrievals, settle, type JoinedRetrieval } from "./retrieval-join.js";
import type { SchemaCache } from "./schema-cache.js";
import type { SemanticRetriever } from "./semantic-retriever.js";
import { StructuredQueryResolver } from "./structured-query-resolver.js";
import type {
  CompositeAnswer,
  Degradation,
  IndexRebuildResult,
  OrchestratorState,
  ProcessOptions,
  ResolvedQuery,
  RetrievedPassage,
  StateTransition,
} from "./types.js";

/** Characters of each passage echoed back in metadata */
const EXCERPT_CHARS = 200;

export interface OrchestratorOptions {
  queryTimeoutMs: number;
  maxRows: number;
  /** @default 3 */
  semanticTopK?: number;
  semanticTimeoutMs: number;
  /** @default true */
  useHints?: boolean;
  maxHintChars?: number;
  synthesisTimeoutMs?: number;
  onTransition?: (transition: StateTransition) => void;
}

export interface OrchestratorDependencies {
  store: GraphStore;
  schemaCache: SchemaCache;
  llm: LanguageModel;
  retriever: SemanticRetriever;
}

interface ResolverBinding {
  snapshot: SchemaSnapshot;
  resolver: StructuredQueryResolver;
}

const ALLOWED_TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  IDLE: ["RESOLVING_SCHEMA"],
  RESOLVING_SCHEMA: ["RETRIEVING", "ERROR"],
  RETRIEVING: ["SYNTHESIZING", "ERROR"],
  SYNTHESIZING: ["DONE"],
  DONE: [],
  ERROR: [],
};

/**
 * Per-request state machine
 */
class RequestStateTracker {
  private state: OrchestratorState = "IDLE";

  constructor(
    private readonly question: string,
    private readonly startTime: number,
    private readonly logger: pino.Logger,
    private readonly listener?: (transition: StateTransition) => void
  ) {}

  to(next: OrchestratorState): void {
    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal orchestrator transition ${this.state} -> ${next}`);
    }
    const transition: StateTransition = {
      from: this.state,
      to: next,
      question: this.question,
      elapsedMs: Date.now() - this.startTime,
    };
    this.state = next;
    this.logger.debug({ from: transition.from, to: transition.to, elapsedMs: transition.elapsedMs }, "State transition");
    this.listener?.(transition);
  }
}

export class QueryOrchestrator {
  private binding: Promise<ResolverBinding> | null = null;
  private readonly synthesizer: AnswerSynthesizer;
  private readonly unsubscribe: () => void;
  private _logger: pino.Logger | null = null;

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly options: OrchestratorOptions
  ) {
    this.synthesizer = new AnswerSynthesizer(deps.llm, { timeoutMs: options.synthesisTimeoutMs });
    // Invalidation from any holder of the cache (ingestion included) drops the pair
    this.unsubscribe = deps.schemaCache.onInvalidate(() => {
      this.binding = null;
    });
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("query:orchestrator");
    }
    return this._logger;
  }

  /**
   * Answer a question
   *
   * Semantic retrieval failures degrade the answer; structured failures end
   * the request.
   *
   * @throws {SchemaUnavailableError} when no schema snapshot can be obtained
   * @throws {QueryGenerationError | QueryValidationError | QueryExecutionError} when the structured path fails
   */
  async process(question: string, options: ProcessOptions = {}): Promise<CompositeAnswer> {
    const startTime = Date.now();
    const includeQuery = options.includeQuery ?? true;
    const k = options.k ?? this.options.semanticTopK ?? 3;
    const useHints = options.useHints ?? this.options.useHints ?? true;
    const collection = options.collection ?? this.deps.retriever.defaultCollection;
    const tracker = new RequestStateTracker(question, startTime, this.logger, this.options.onTransition);
    const degradations: Degradation[] = [];

    tracker.to("RESOLVING_SCHEMA");
    let binding: ResolverBinding;
    try {
      binding = await this.bind();
    } catch (error) {
      tracker.to("ERROR");
      throw this.asFatal(error, question);
    }

    const { resolver } = binding;

    tracker.to("RETRIEVING");
    const semantic = k > 0 ? this.retrievePassages(question, k, collection) : null;
    const structured =
      useHints && semantic
        ? settle(semantic).then((outcome) =>
            resolver.resolve(question, outcome.status === "fulfilled" ? outcome.value : [])
          )
        : resolver.resolve(question, []);

    let joined: JoinedRetrieval<ResolvedQuery, RetrievedPassage[]>;
    try {
      joined = await joinRetrievals(structured, semantic);
    } catch (error) {
      tracker.to("ERROR");
      const fatal = this.asFatal(error, question);
      this.logger.warn(
        { err: fatal, code: fatal.code, durationMs: Date.now() - startTime },
        "Question failed on the structured path"
      );
      throw fatal;
    }

    const resolved = joined.mandatory;
    let passages: RetrievedPassage[] = [];
    const semanticOutcome = joined.optional;
    if (semanticOutcome?.status === "fulfilled") {
      passages = semanticOutcome.value;
      if (passages.length === 0) {
        degradations.push({ kind: "retrieval_degraded", reason: "No passages matched the question" });
      }
    } else if (semanticOutcome?.status === "rejected") {
      const reason = semanticOutcome.reason;
      degradations.push({
        kind: "retrieval_degraded",
        reason: reason instanceof TimeoutError ? `Semantic retrieval timed out after ${reason.timeoutMs}ms` : reason.message,
      });
      this.logger.warn({ err: reason, collection }, "Semantic retrieval degraded");
    }

    tracker.to("SYNTHESIZING");
    const structuredSummary = summarizeStructuredResult(resolved.result);
    const synthesis = await this.synthesizer.synthesize(question, structuredSummary, passages);
    if (synthesis.degradation) {
      degradations.push(synthesis.degradation);
    }

    const executionTimeMs = Date.now() - startTime;
    tracker.to("DONE");
    this.logger.info(
      {
        metric: "query.total_ms",
        value: executionTimeMs,
        rows: resolved.result.rows.length,
        passages: passages.length,
        degradations: degradations.map((d) => d.kind),
      },
      "Question answered"
    );

    return {
      question,
      answer: synthesis.answer,
      ...(includeQuery ? { generated_query: resolved.query } : {}),
      metadata: {
        provider: this.deps.llm.providerId,
        model: this.deps.llm.modelId,
        passages_used: passages.map((p) => ({
          source: p.source,
          score: p.score,
          excerpt: p.text.length > EXCERPT_CHARS ? `${p.text.slice(0, EXCERPT_CHARS)}...` : p.text,
        })),
        execution_time_ms: executionTimeMs,
        structured_summary: structuredSummary,
        structured_rows: resolved.result.rows,
        row_count: resolved.result.rows.length,
        truncated: resolved.result.truncated,
        schema_version: resolved.schemaVersion,
        degradations,
      },
    };
  }

  /**
   * Drop the cached snapshot and resolver together, then load a fresh pair
   *
   * @returns the new snapshot
   * @throws {SchemaUnavailableError} when introspection fails
   */
  async refreshSchema(): Promise<SchemaSnapshot> {
    this.binding = null;
    this.deps.schemaCache.invalidate();
    const { snapshot } = await this.bind();
    this.logger.info({ version: snapshot.version }, "Schema refreshed");
    return snapshot;
  }

  /**
   * Current snapshot, loading it if none is cached
   */
  async describeSchema(): Promise<SchemaSnapshot> {
    const { snapshot } = await this.bind();
    return snapshot;
  }

  rebuildSemanticIndex(collection?: string): Promise<IndexRebuildResult> {
    return this.deps.retriever.rebuildIndex(collection);
  }

  /**
   * Stop listening for cache invalidations
   */
  dispose(): void {
    this.unsubscribe();
    this.binding = null;
  }

  private bind(): Promise<ResolverBinding> {
    if (this.binding) {
      return this.binding;
    }
    const pending: Promise<ResolverBinding> = this.deps.schemaCache.getSchema().then(
      (snapshot) => ({
        snapshot,
        resolver: new StructuredQueryResolver(snapshot, this.deps.store, this.deps.llm, {
          timeoutMs: this.options.queryTimeoutMs,
          maxRows: this.options.maxRows,
          maxHintChars: this.options.maxHintChars,
        }),
      }),
      (error: unknown) => {
        // A failed build is not cached, unless a refresh already replaced it
        if (this.binding === pending) {
          this.binding = null;
        }
        throw error;
      }
    );
    this.binding = pending;
    return pending;
  }

  private retrievePassages(question: string, k: number, collection: string): Promise<RetrievedPassage[]> {
    return withTimeout(
      this.deps.retriever.retrieve(question, k, collection),
      this.options.semanticTimeoutMs,
      "semantic retrieval"
    );
  }

  private asFatal(error: unknown, question: string): FatalQueryError {
    if (error instanceof SchemaUnavailableError && error.question === undefined) {
      return new SchemaUnavailableError(error.message, error.cause, question);
    }
    if (isFatalQueryError(error)) {
      return error;
    }
    const cause = toError(error);
    return new QueryExecutionError(`Query failed: ${cause.message}`, question, { cause });
  }
}
