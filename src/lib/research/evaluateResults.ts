import type { Collaborator, StageInput } from "../pipeline/collaborators.js";
import { ok } from "../pipeline/collaborators.js";
import type { Discovery, TestResult } from "./types.js";

export const MIN_DISCOVERY_CONFIDENCE = 0.6;

export function selectDiscoveries(results: readonly TestResult[], iteration: number): Discovery[] {
  return results
    .filter((r) => r.verdict === "PASS" && r.confidence > MIN_DISCOVERY_CONFIDENCE)
    .sort((a, b) => b.confidence - a.confidence)
    .map((r) => ({
      hypothesisId: r.hypothesisId,
      statement: r.statement,
      confidence: r.confidence,
      formulas: r.supportedFormulas,
      iteration,
    }));
}

/** Local; no outbound calls. Zero discoveries is a valid outcome. */
export function evaluateResults(): Collaborator<StageInput<TestResult[], Discovery>, Discovery[]> {
  return {
    name: "evaluateResults",
    async invoke(input) {
      return ok(selectDiscoveries(input.data, input.iteration));
    },
  };
}
