/**
 * Unit tests for StructuredQueryResolver
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { StructuredQueryResolver } from "../../../src/query/structured-query-resolver.js";
import { QueryExecutionError, QueryGenerationError, QueryValidationError } from "../../../src/query/errors.js";
import { GraphConnectionError, GraphQueryTimeoutError, GraphSyntaxError } from "../../../src/graph/errors.js";
import { LanguageModelTimeoutError } from "../../../src/llm/errors.js";
import type { RetrievedPassage } from "../../../src/query/types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { FakeGraphStore, ScriptedLanguageModel, companySchema } from "../../helpers/fakes.js";

const ENGINEERS_QUERY =
  "MATCH (e:Employee)-[:WORKS_IN]->(d:Department {name: 'Engineering'}) RETURN e.name AS employee ORDER BY employee";

const OPTIONS = { timeoutMs: 30000, maxRows: 100 };

let store: FakeGraphStore;
let llm: ScriptedLanguageModel;

function resolver(options = OPTIONS): StructuredQueryResolver {
  return new StructuredQueryResolver(companySchema(), store, llm, options);
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => new Error("expected a rejection"),
    (error: unknown) => error
  );
}

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
  store = new FakeGraphStore();
  llm = new ScriptedLanguageModel({ query: `\`\`\`cypher\n${ENGINEERS_QUERY}\n\`\`\`` });
  store.readHandler = () => [{ employee: "Ada" }, { employee: "Alan" }];
});

afterEach(() => {
  resetLogger();
});

describe("StructuredQueryResolver", () => {
  test("generates, checks and executes a query", async () => {
    const resolved = await resolver().resolve("Who works in Engineering?");

    expect(resolved).toEqual({
      query: ENGINEERS_QUERY,
      schemaVersion: companySchema().version,
      result: { rows: [{ employee: "Ada" }, { employee: "Alan" }], truncated: false },
    });
    expect(store.explained).toEqual([ENGINEERS_QUERY]);
    expect(store.reads).toEqual([{ cypher: ENGINEERS_QUERY, params: {}, limits: { timeoutMs: 30000, maxRows: 100 } }]);
  });

  test("prompts with the bound schema and no hints", async () => {
    await resolver().resolve("Who works in Engineering?");

    const [prompt] = llm.promptsOf("query");
    expect(prompt?.system).toContain('- Department: budget: Long, name: String one of ["Engineering", "Sales"]');
    expect(prompt?.user).toBe("Question: Who works in Engineering?");
    expect(llm.prompts[0]?.options).toBeUndefined();
  });

  test("passes hints as a delimited context block", async () => {
    const hint: RetrievedPassage = {
      text: "Engineering is led by Grace.",
      source: "Org Chart",
      score: 0.8,
      label: "Document",
      nodeId: "4:d:7",
    };

    await resolver().resolve("Who works in Engineering?", [hint]);

    expect(llm.promptsOf("query")[0]?.user).toContain("<<<\n[1] Engineering is led by Grace.\n>>>\n\nQuestion:");
  });

  test("flags rows beyond the cap", async () => {
    store.readHandler = () => ["Ada", "Alan", "Grace", "Linus", "Barbara"].map((employee) => ({ employee }));

    const resolved = await resolver({ timeoutMs: 30000, maxRows: 2 }).resolve("Who works in Engineering?");

    expect(resolved.result).toEqual({
      rows: [{ employee: "Ada" }, { employee: "Alan" }],
      truncated: true,
    });
  });

  describe("failures", () => {
    test("a NO_QUERY reply ends generation before anything runs", async () => {
      llm.reply("query", "NO_QUERY");

      const error = await failure(resolver().resolve("What is the weather?"));

      expect(error).toBeInstanceOf(QueryGenerationError);
      expect(error instanceof QueryGenerationError && error.message).toBe(
        "The graph schema cannot answer this question"
      );
      expect(error instanceof QueryGenerationError && error.question).toBe("What is the weather?");
      expect(store.explained).toEqual([]);
      expect(store.reads).toEqual([]);
    });

    test("write statements are rejected without reaching the store", async () => {
      llm.reply("query", "MATCH (e:Employee) DETACH DELETE e RETURN count(e)");

      const error = await failure(resolver().resolve("Remove everyone"));

      expect(error).toBeInstanceOf(QueryValidationError);
      expect(error instanceof QueryValidationError && error.message).toBe(
        "Generated query is invalid: Write clause not allowed: DETACH; Write clause not allowed: DELETE"
      );
      expect(error instanceof QueryValidationError && error.query).toBe(
        "MATCH (e:Employee) DETACH DELETE e RETURN count(e)"
      );
      expect(store.explained).toEqual([]);
    });

    test("unknown schema elements fail generation", async () => {
      llm.reply("query", "MATCH (m:Manager) RETURN m.name");

      const error = await failure(resolver().resolve("Who are the managers?"));

      expect(error).toBeInstanceOf(QueryGenerationError);
      expect(error instanceof QueryGenerationError && error.message).toBe(
        "Generated query references unknown schema elements: label 'Manager'"
      );
      expect(error instanceof QueryGenerationError && error.unknownElements).toEqual([
        { kind: "label", name: "Manager", owner: "m" },
      ]);
    });

    test("a compile failure is a validation error", async () => {
      store.explainError = new GraphSyntaxError("Invalid Cypher: Variable `x` not defined", ENGINEERS_QUERY);

      const error = await failure(resolver().resolve("Who works in Engineering?"));

      expect(error).toBeInstanceOf(QueryValidationError);
      expect(error instanceof QueryValidationError && error.message).toBe(
        "Generated query does not compile: Invalid Cypher: Variable `x` not defined"
      );
      expect(store.reads).toEqual([]);
    });

    test("a store timeout is reported with the budget", async () => {
      store.readHandler = () => {
        throw new GraphQueryTimeoutError("Query exceeded timeout of 30000ms", 30000);
      };

      const error = await failure(resolver().resolve("Who works in Engineering?"));

      expect(error).toBeInstanceOf(QueryExecutionError);
      expect(error).toMatchObject({
        code: "QUERY_TIMEOUT",
        timedOut: true,
        message: "Query exceeded the 30000ms execution timeout",
        query: ENGINEERS_QUERY,
        question: "Who works in Engineering?",
      });
    });

    test("other store failures keep their retryability", async () => {
      store.readHandler = () => {
        throw new GraphConnectionError("Neo4j unavailable: connection reset");
      };

      const error = await failure(resolver().resolve("Who works in Engineering?"));

      expect(error).toMatchObject({
        code: "QUERY_EXECUTION_ERROR",
        message: "Query execution failed: Neo4j unavailable: connection reset",
        retryable: true,
      });
    });

    test("a model failure is a generation error", async () => {
      llm.reply("query", new LanguageModelTimeoutError("Request timeout"));

      const error = await failure(resolver().resolve("Who works in Engineering?"));

      expect(error).toBeInstanceOf(QueryGenerationError);
      expect(error).toMatchObject({ message: "Query generation failed: Request timeout", retryable: true });
    });
  });
});
