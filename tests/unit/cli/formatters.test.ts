import { describe, test, expect } from "vitest";
import { stripVTControlCharacters } from "node:util";
import {
  createSamplesTable,
  formatDuration,
  formatIngestionResult,
  formatRebuildResult,
  truncate,
} from "../../../src/cli/output/formatters.js";
import type { IngestionResult } from "../../../src/ingestion/types.js";

const plain = (text: string): string => stripVTControlCharacters(text);

describe("truncate", () => {
  test("keeps short strings", () => {
    expect(truncate("Leave Policy", 20)).toBe("Leave Policy");
  });

  test("ends long strings with an ellipsis", () => {
    expect(truncate("Engineers receive 25 vacation days", 12)).toBe("Engineer...");
  });
});

describe("formatDuration", () => {
  test.each([
    [500, "500ms"],
    [2340, "2.3s"],
    [75000, "1m 15s"],
  ])("%d ms", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe("formatIngestionResult", () => {
  test("shows the linked client and the cache refresh", () => {
    const result: IngestionResult = {
      category: "contract",
      document_id: "id-1",
      record: {
        title: "Contract with Acme Corp",
        clientName: "Acme Corp",
        contractType: "General",
        startDate: null,
        endDate: null,
        value: null,
        keyTerms: [],
        signatories: [],
      },
      linked_entity: "Acme Corp",
      linked_entities: ["Acme Corp"],
      degradations: [],
      schema_refreshed: true,
    };

    expect(plain(formatIngestionResult(result))).toBe(
      [
        "\nIngested contract document",
        "  Document id: id-1",
        "  Title: Contract with Acme Corp",
        "  Client: Acme Corp",
        "  Schema cache invalidated",
      ].join("\n")
    );
  });

  test("lists degradations and unmatched departments", () => {
    const result: IngestionResult = {
      category: "policy",
      document_id: "id-2",
      record: { title: "Untitled Policy", policyType: "General", departments: [], effectiveDate: null, keyRules: [] },
      linked_entity: null,
      linked_entities: [],
      degradations: [{ kind: "extraction_fallback", reason: "Extraction request failed: Request timeout" }],
      schema_refreshed: false,
    };

    expect(plain(formatIngestionResult(result))).toBe(
      [
        "\nIngested policy document",
        "  Document id: id-2",
        "  Title: Untitled Policy",
        "  Departments: no match",
        "  ! extraction_fallback: Extraction request failed: Request timeout",
      ].join("\n")
    );
  });
});

test("formatRebuildResult", () => {
  expect(
    plain(formatRebuildResult({ collection: "documents", label: "Document", indexed: 12, skipped: 1, duration_ms: 1500 }))
  ).toBe(
    [
      "Rebuilt 'documents' from Document nodes",
      "  Indexed: 12",
      "  Skipped (no text): 1",
      "  Duration: 1.5s",
    ].join("\n")
  );
});

describe("createSamplesTable", () => {
  test("says when nothing matches", () => {
    expect(plain(createSamplesTable([]))).toBe("No sample questions match.");
  });

  test("lists each question", () => {
    const table = plain(createSamplesTable([{ category: "policies", question: "Which policies apply to Sales?" }]));

    expect(table).toContain("Which policies apply to Sales?");
    expect(table).toContain("policies");
  });
});
