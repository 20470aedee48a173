import type { Collaborator, StageInput } from "../pipeline/collaborators.js";
import { fatal, fromBatch } from "../pipeline/collaborators.js";
import type { MaterialEntry, MaterialsClient } from "../services/materialsClient.js";
import type { Discovery, Hypothesis, TestResult } from "./types.js";

/** eV/atom above the convex hull still counted as stable. */
export const STABILITY_THRESHOLD = 0.05;

export function isStable(entry: MaterialEntry): boolean {
  return entry.energyAboveHull !== null && entry.energyAboveHull <= STABILITY_THRESHOLD;
}

export function judgeHypothesis(h: Hypothesis, lookups: ReadonlyMap<string, MaterialEntry[]>): TestResult {
  const evidence: MaterialEntry[] = [];
  const supportedFormulas: string[] = [];
  for (const formula of h.candidateFormulas) {
    const stable = (lookups.get(formula) ?? []).filter(isStable);
    if (stable.length > 0) {
      supportedFormulas.push(formula);
      evidence.push(...stable);
    }
  }
  const confidence = h.candidateFormulas.length > 0 ? supportedFormulas.length / h.candidateFormulas.length : 0;
  return {
    hypothesisId: h.id,
    statement: h.statement,
    verdict: supportedFormulas.length > 0 ? "PASS" : "FAIL",
    confidence,
    supportedFormulas,
    evidence,
  };
}

/**
 * One item per hypothesis; a failed lookup fails only that hypothesis.
 * The stage is fatal when no hypothesis could be tested.
 */
export function testHypotheses(materials: MaterialsClient): Collaborator<StageInput<Hypothesis[], Discovery>, TestResult[]> {
  return {
    name: "testHypotheses",
    async invoke(input, ctx) {
      const { results, failures } = await ctx.batch(
        input.data,
        (h) => h.id,
        async (h) => {
          const lookups = new Map<string, MaterialEntry[]>();
          for (const formula of new Set(h.candidateFormulas)) {
            lookups.set(formula, await materials.searchByFormula(ctx.guard, formula));
          }
          return judgeHypothesis(h, lookups);
        }
      );
      if (results.length === 0) return fatal(`None of ${input.data.length} hypotheses could be tested`);
      return fromBatch(results, failures);
    },
  };
}
