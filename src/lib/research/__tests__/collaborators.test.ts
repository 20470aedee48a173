/**
 * Default research collaborators with fake service clients.
 */

import { describe, it, expect, vi } from "vitest";
import { CredentialPool } from "../../credentials/credentialPool.js";
import { ExecutionGuard } from "../../execution/executionGuard.js";
import { runBatch } from "../../execution/runBatch.js";
import type { CollaboratorContext, StageInput } from "../../pipeline/collaborators.js";
import { LlmClient } from "../../services/llm/llmClient.js";
import type { LlmExecutor } from "../../services/llm/types.js";
import type { MaterialEntry } from "../../services/materialsClient.js";
import { MaterialsClient } from "../../services/materialsClient.js";
import { PapersClient } from "../../services/papersClient.js";
import { analyzePapers } from "../analyzePapers.js";
import { buildPaperQuery, collectPapers } from "../collectPapers.js";
import { evaluateResults, selectDiscoveries } from "../evaluateResults.js";
import { generateHypotheses, topGaps } from "../generateHypotheses.js";
import { judgeHypothesis, testHypotheses } from "../testHypotheses.js";
import type { Discovery, Hypothesis, Paper, PaperAnalysis, TestResult } from "../types.js";

function context(): CollaboratorContext & { logged: string[] } {
  const pool = CredentialPool.fromConfig({ llm: ["test-llm"], papers: ["test-papers"], materials: ["test-mp"] });
  const logged: string[] = [];
  return {
    sessionId: "session_test",
    iteration: 1,
    guard: new ExecutionGuard(pool, { sleep: async () => {}, maxAttempts: 1 }),
    logged,
    log: async (m) => void logged.push(m),
    batch: (items, itemId, fn) => runBatch(items, { concurrency: 2, itemId }, fn),
  };
}

function input<X>(data: X, over: Partial<StageInput<X, Discovery>> = {}): StageInput<X, Discovery> {
  return { topic: "sodium-ion cathodes", params: {}, iteration: 1, totalIterations: 1, previousDiscoveries: [], data, ...over };
}

function llmReturning(byPrompt: (prompt: string) => string): LlmClient {
  const executor: LlmExecutor = { execute: async (req) => ({ outputText: byPrompt(req.prompt) }) };
  return new LlmClient({ provider: "openai", model: "test-model", maxTokens: 512 }, () => executor);
}

const paper = (id: string): Paper => ({ id, title: `Paper ${id}`, abstract: "abstract", year: 2024, authors: [], url: null });

const entry = (formula: string, eah: number | null): MaterialEntry => ({
  materialId: `mp-${formula}`,
  formula,
  energyAboveHull: eah,
  formationEnergyPerAtom: null,
  bandGap: null,
});

describe("collectPapers", () => {
  it("widens later queries with discovered formulas", () => {
    const prev: Discovery[] = [
      { hypothesisId: "H1-1", statement: "s", confidence: 1, formulas: ["NaFePO4", "Na2MnO3"], iteration: 1 },
      { hypothesisId: "H1-2", statement: "t", confidence: 1, formulas: ["NaFePO4"], iteration: 1 },
    ];
    expect(buildPaperQuery("cathodes", [])).toBe("cathodes");
    expect(buildPaperQuery("cathodes", prev)).toBe("cathodes NaFePO4 Na2MnO3");
  });

  it("is fatal when the search finds nothing", async () => {
    const client = new PapersClient("https://papers.example.test");
    vi.spyOn(client, "search").mockResolvedValue([]);
    const outcome = await collectPapers(client).invoke(input(null), context());
    expect(outcome).toEqual({ status: "fatal", reason: 'No papers found for "sodium-ion cathodes"' });
  });

  it("passes maxPapers to the search", async () => {
    const client = new PapersClient("https://papers.example.test");
    const search = vi.spyOn(client, "search").mockResolvedValue([paper("a"), paper("b")]);
    const outcome = await collectPapers(client).invoke(input(null, { params: { maxPapers: 7 } }), context());
    expect(outcome).toEqual({ status: "ok", value: [paper("a"), paper("b")] });
    expect(search.mock.calls[0][1]).toBe("sodium-ion cathodes");
    expect(search.mock.calls[0][2]).toBe(7);
  });
});

describe("analyzePapers", () => {
  it("ranks by relevance and reports unparseable papers as item failures", async () => {
    const llm = llmReturning((prompt) => {
      if (prompt.includes("Paper b")) return "I cannot help with that.";
      const relevance = prompt.includes("Paper a") ? 0.3 : 0.9;
      return JSON.stringify({ summary: "ok", researchGaps: ["gap"], relevance });
    });
    const outcome = await analyzePapers(llm).invoke(input([paper("a"), paper("b"), paper("c")]), context());
    expect(outcome.status).toBe("partial");
    if (outcome.status !== "partial") return;
    expect(outcome.value.map((a) => [a.paperId, a.relevance])).toEqual([
      ["c", 0.9],
      ["a", 0.3],
    ]);
    expect(outcome.itemFailures).toHaveLength(1);
    expect(outcome.itemFailures[0]).toMatchObject({ itemId: "b", code: "VALIDATION_ERROR" });
  });

  it("is fatal when nothing could be analyzed", async () => {
    const llm = llmReturning(() => "nope");
    const outcome = await analyzePapers(llm).invoke(input([paper("a")]), context());
    expect(outcome).toEqual({ status: "fatal", reason: "None of 1 papers could be analyzed" });
  });
});

describe("generateHypotheses", () => {
  const analyses: PaperAnalysis[] = [
    { paperId: "1", title: "t1", summary: "s", researchGaps: ["Low conductivity", "Cycle life"], relevance: 0.9 },
    { paperId: "2", title: "t2", summary: "s", researchGaps: ["low conductivity ", "Cost"], relevance: 0.5 },
  ];

  it("deduplicates gaps in relevance order", () => {
    expect(topGaps(analyses)).toEqual(["Low conductivity", "Cycle life", "Cost"]);
    expect(topGaps(analyses, 2)).toEqual(["Low conductivity", "Cycle life"]);
  });

  it("caps the count at maxHypotheses and assigns ids", async () => {
    const llm = llmReturning(() =>
      JSON.stringify({
        hypotheses: [
          { statement: "A", candidateFormulas: [" NaFePO4 "], rationale: "r" },
          { statement: "B", candidateFormulas: ["NaCoO2"] },
          { statement: "C", candidateFormulas: ["NaNiO2"] },
        ],
      })
    );
    const ctx = context();
    const outcome = await generateHypotheses(llm).invoke(input(analyses, { params: { maxHypotheses: 2 }, iteration: 2 }), ctx);
    expect(outcome).toEqual({
      status: "ok",
      value: [
        { id: "H2-1", statement: "A", candidateFormulas: ["NaFePO4"], rationale: "r" },
        { id: "H2-2", statement: "B", candidateFormulas: ["NaCoO2"], rationale: "" },
      ],
    });
    expect(ctx.logged).toEqual(["Generating hypotheses from 3 research gaps"]);
  });

  it("is fatal without research gaps", async () => {
    const outcome = await generateHypotheses(llmReturning(() => "{}")).invoke(
      input([{ ...analyses[0], researchGaps: [] }]),
      context()
    );
    expect(outcome).toEqual({ status: "fatal", reason: "No research gaps identified" });
  });
});

describe("testHypotheses", () => {
  const h: Hypothesis = { id: "H1-1", statement: "s", candidateFormulas: ["A", "B", "C"], rationale: "" };

  it("passes when a candidate has a stable entry; confidence is the supported share", () => {
    const result = judgeHypothesis(
      h,
      new Map([
        ["A", [entry("A", 0.0), entry("A", 0.2)]],
        ["B", [entry("B", 0.06)]],
        ["C", [entry("C", 0.05)]],
      ])
    );
    expect(result.verdict).toBe("PASS");
    expect(result.supportedFormulas).toEqual(["A", "C"]);
    expect(result.confidence).toBeCloseTo(2 / 3);
    expect(result.evidence.map((e) => e.energyAboveHull)).toEqual([0.0, 0.05]);
  });

  it("fails without stable entries", () => {
    const result = judgeHypothesis(h, new Map([["A", [entry("A", null)]]]));
    expect(result).toMatchObject({ verdict: "FAIL", confidence: 0, supportedFormulas: [] });
  });

  it("turns a failed lookup into an item failure", async () => {
    const materials = new MaterialsClient("https://mp.example.test");
    vi.spyOn(materials, "searchByFormula").mockImplementation(async (_guard, formula) => {
      if (formula === "BAD") throw new Error("lookup failed");
      return [entry(formula, 0.01)];
    });
    const hs: Hypothesis[] = [
      { id: "H1-1", statement: "ok", candidateFormulas: ["NaCl"], rationale: "" },
      { id: "H1-2", statement: "bad", candidateFormulas: ["BAD"], rationale: "" },
    ];
    const outcome = await testHypotheses(materials).invoke(input(hs), context());
    expect(outcome.status).toBe("partial");
    if (outcome.status !== "partial") return;
    expect(outcome.value.map((r) => [r.hypothesisId, r.verdict, r.confidence])).toEqual([["H1-1", "PASS", 1]]);
    expect(outcome.itemFailures).toEqual([{ itemId: "H1-2", error: "lookup failed" }]);
  });

  it("is fatal when every lookup fails", async () => {
    const materials = new MaterialsClient("https://mp.example.test");
    vi.spyOn(materials, "searchByFormula").mockRejectedValue(new Error("lookup failed"));
    const hs: Hypothesis[] = [
      { id: "H1-1", statement: "a", candidateFormulas: ["NaCl"], rationale: "" },
      { id: "H1-2", statement: "b", candidateFormulas: ["KCl"], rationale: "" },
    ];
    const outcome = await testHypotheses(materials).invoke(input(hs), context());
    expect(outcome).toEqual({ status: "fatal", reason: "None of 2 hypotheses could be tested" });
  });
});

describe("evaluateResults", () => {
  const result = (id: string, verdict: "PASS" | "FAIL", confidence: number): TestResult => ({
    hypothesisId: id,
    statement: id,
    verdict,
    confidence,
    supportedFormulas: [id],
    evidence: [],
  });

  it("keeps PASS results above 0.6 confidence, best first", async () => {
    const results = [result("a", "PASS", 0.6), result("b", "PASS", 0.7), result("c", "FAIL", 0.9), result("d", "PASS", 1)];
    expect(selectDiscoveries(results, 3).map((d) => [d.hypothesisId, d.iteration])).toEqual([
      ["d", 3],
      ["b", 3],
    ]);
    const outcome = await evaluateResults().invoke(input(results), context());
    expect(outcome.status === "ok" && outcome.value.length).toBe(2);
  });
});
