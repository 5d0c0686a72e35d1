import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { AnswerSynthesizer, summarizeStructuredResult } from "../../../src/query/answer-synthesizer.js";
import type { RetrievedPassage } from "../../../src/query/types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { ScriptedLanguageModel } from "../../helpers/fakes.js";

const PASSAGE: RetrievedPassage = {
  text: "Engineers receive 25 vacation days per year.",
  source: "Leave Policy",
  score: 0.82,
  label: "Document",
  nodeId: "4:d:1",
};

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterEach(() => {
  resetLogger();
});

describe("summarizeStructuredResult", () => {
  test("reports an empty result", () => {
    expect(summarizeStructuredResult({ rows: [], truncated: false })).toBe("No data found.");
  });

  test("numbers rows and renders nested values", () => {
    const summary = summarizeStructuredResult({
      rows: [
        { employee: "Ada", skills: ["go", "ts"], manager: null },
        { employee: "Alan", skills: [], manager: { name: "Grace" } },
      ],
      truncated: false,
    });

    expect(summary).toBe(
      '1. employee: Ada, skills: [go, ts], manager: null\n2. employee: Alan, skills: [], manager: {"name":"Grace"}'
    );
  });

  test("counts rows past the limit and notes truncation", () => {
    const summary = summarizeStructuredResult({ rows: [{ n: 1 }, { n: 2 }], truncated: true }, 1);

    expect(summary).toBe("1. n: 1\n... 1 more rows\n(Result truncated to the first 2 rows)");
  });
});

describe("AnswerSynthesizer", () => {
  test("returns the trimmed model answer under the synthesis timeout", async () => {
    const llm = new ScriptedLanguageModel({ synthesis: "  Engineers get 25 vacation days.  " });
    const synthesizer = new AnswerSynthesizer(llm, { timeoutMs: 5000 });

    const outcome = await synthesizer.synthesize("How many vacation days?", "No data found.", [PASSAGE]);

    expect(outcome).toEqual({ answer: "Engineers get 25 vacation days." });
    expect(llm.prompts[0]?.options).toEqual({ timeoutMs: 5000 });
    expect(llm.promptsOf("synthesis")[0]?.user).toContain(
      "[1] (Leave Policy) Engineers receive 25 vacation days per year."
    );
  });

  test("falls back to the summary on an empty answer", async () => {
    const synthesizer = new AnswerSynthesizer(new ScriptedLanguageModel({ synthesis: "   " }));

    const outcome = await synthesizer.synthesize("Who?", "1. employee: Ada", []);

    expect(outcome).toEqual({
      answer: "1. employee: Ada\n\n[Answer synthesis unavailable: Language model returned an empty answer]",
      degradation: { kind: "synthesis_degraded", reason: "Language model returned an empty answer" },
    });
  });

  test("falls back to the summary when the model fails", async () => {
    const synthesizer = new AnswerSynthesizer(new ScriptedLanguageModel({ synthesis: new Error("Request timeout") }));

    const outcome = await synthesizer.synthesize("Who?", "No data found.", []);

    expect(outcome.answer).toBe("No data found.\n\n[Answer synthesis unavailable: Request timeout]");
    expect(outcome.degradation).toEqual({ kind: "synthesis_degraded", reason: "Request timeout" });
  });
});
