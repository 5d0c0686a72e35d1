/**
 * Unit tests for SemanticRetriever
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import {
  SemanticRetriever,
  buildPassageText,
  vectorCollectionName,
} from "../../../src/query/semantic-retriever.js";
import { SemanticRetrievalError } from "../../../src/query/errors.js";
import { EmbeddingRateLimitError } from "../../../src/providers/errors.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import {
  FakeEmbeddingProvider,
  FakeGraphStore,
  FakeVectorIndex,
  letterVector,
  vectorMatch,
} from "../../helpers/fakes.js";

let index: FakeVectorIndex;
let embeddings: FakeEmbeddingProvider;
let store: FakeGraphStore;
let retriever: SemanticRetriever;

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => new Error("expected a rejection"),
    (error: unknown) => error
  );
}

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
  index = new FakeVectorIndex();
  embeddings = new FakeEmbeddingProvider();
  store = new FakeGraphStore();
  retriever = new SemanticRetriever(index, embeddings, store, { similarityThreshold: 0.3 });
});

afterEach(() => {
  resetLogger();
});

describe("buildPassageText", () => {
  test("writes one line per text property that has content", () => {
    expect(
      buildPassageText({ title: " Leave Policy ", text: "", tags: ["hr", "leave"], owner: null }, [
        "title",
        "text",
        "tags",
        "owner",
      ])
    ).toBe("title: Leave Policy\ntags: hr, leave");
  });
});

describe("SemanticRetriever", () => {
  test("names vector collections with a prefix", () => {
    expect(vectorCollectionName("documents")).toBe("kg_documents");
    expect(retriever.collections).toEqual(["documents", "employees"]);
    expect(retriever.defaultCollection).toBe("documents");
  });

  describe("retrieve", () => {
    test("returns passages above the threshold", async () => {
      index.matches.set("kg_documents", [
        vectorMatch("4:d:1", "Engineers receive 25 vacation days.", "Leave Policy", 0.82),
        vectorMatch("4:d:2", "Travel is booked through the portal.", "Travel Policy", 0.1),
      ]);

      const passages = await retriever.retrieve("vacation days for engineers", 3);

      expect(passages).toEqual([
        {
          text: "Engineers receive 25 vacation days.",
          source: "Leave Policy",
          score: 0.82,
          label: "Document",
          nodeId: "4:d:1",
        },
      ]);
      expect(index.searches).toEqual([{ collection: "kg_documents", options: { limit: 3, threshold: 0.3 } }]);
      expect(embeddings.embedded).toEqual(["vacation days for engineers"]);
    });

    test("skips everything for k = 0", async () => {
      await expect(retriever.retrieve("anything", 0)).resolves.toEqual([]);
      expect(embeddings.embedded).toEqual([]);
      expect(index.searches).toEqual([]);
    });

    test("rejects an unconfigured collection", async () => {
      await expect(retriever.retrieve("anything", 3, "contracts")).rejects.toThrow(
        "Unknown collection 'contracts'. Configured: documents, employees"
      );
    });

    test("wraps embedding failures with their retryability", async () => {
      embeddings.failure = new EmbeddingRateLimitError("Rate limit exceeded");

      const error = await failure(retriever.retrieve("anything", 3));

      expect(error).toBeInstanceOf(SemanticRetrievalError);
      expect(error).toMatchObject({
        message: "Question embedding failed: Rate limit exceeded",
        collection: "documents",
        retryable: true,
      });
    });

    test("wraps search failures", async () => {
      index.searchFailure = new Error("vector store down");

      await expect(retriever.retrieve("anything", 3, "employees")).rejects.toMatchObject({
        message: "Semantic search failed: vector store down",
        collection: "employees",
        retryable: false,
      });
    });
  });

  describe("rebuildIndex", () => {
    test("embeds the text of every source node and replaces the collection", async () => {
      store.readHandler = () => [
        { id: "4:d:1", props: { title: "Leave Policy", text: "Employees get 25 days.", category: "policy" } },
        { id: "4:d:2", props: { category: "general" } },
        { id: "4:d:3", props: { text: ["a", "b"] } },
      ];

      const result = await retriever.rebuildIndex();

      expect(result).toMatchObject({ collection: "documents", label: "Document", indexed: 2, skipped: 1 });
      expect(store.reads[0]).toEqual({
        cypher: "MATCH (n:`Document`) RETURN elementId(n) AS id, properties(n) AS props",
        params: {},
        limits: { timeoutMs: 120000, maxRows: Number.MAX_SAFE_INTEGER },
      });
      expect(index.replaced.get("kg_documents")).toEqual([
        {
          id: "4:d:1",
          text: "title: Leave Policy\ntext: Employees get 25 days.",
          embedding: letterVector("title: Leave Policy\ntext: Employees get 25 days."),
          metadata: { source: "Leave Policy", label: "Document", node_id: "4:d:1" },
        },
        {
          id: "4:d:3",
          text: "text: a, b",
          embedding: letterVector("text: a, b"),
          metadata: { source: "4:d:3", label: "Document", node_id: "4:d:3" },
        },
      ]);
    });

    test("cites employees by name", async () => {
      store.readHandler = () => [{ id: "4:e:1", props: { name: "Ada Lovelace", title: "Staff Engineer" } }];

      await retriever.rebuildIndex("employees");

      expect(index.replaced.get("kg_employees")?.[0]?.metadata.source).toBe("Ada Lovelace");
      expect(index.replaced.get("kg_employees")?.[0]?.text).toBe("name: Ada Lovelace\ntitle: Staff Engineer");
    });

    test("empties the collection when no node has text", async () => {
      const result = await retriever.rebuildIndex();

      expect(result.indexed).toBe(0);
      expect(index.replaced.get("kg_documents")).toEqual([]);
      expect(embeddings.embedded).toEqual([]);
    });

    test("wraps failures", async () => {
      store.readHandler = () => [{ id: "4:d:1", props: { title: "Leave Policy" } }];
      embeddings.failure = new Error("provider offline");

      await expect(retriever.rebuildIndex()).rejects.toThrow("Rebuilding 'documents' failed: provider offline");
    });
  });
});
