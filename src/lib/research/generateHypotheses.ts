import { z } from "zod";
import type { Collaborator, StageInput } from "../pipeline/collaborators.js";
import { fatal, ok } from "../pipeline/collaborators.js";
import { parseRunParams } from "../pipeline/runParams.js";
import type { LlmClient } from "../services/llm/llmClient.js";
import type { Discovery, Hypothesis, PaperAnalysis } from "./types.js";

const TOP_GAPS = 10;

const HypothesesSchema = z.object({
  hypotheses: z.array(
    z.object({
      statement: z.string().min(1),
      candidateFormulas: z.array(z.string().min(1)).min(1),
      rationale: z.string().default(""),
    })
  ),
});

/** Gaps in analysis order (most relevant first), deduplicated. */
export function topGaps(analyses: readonly PaperAnalysis[], limit = TOP_GAPS): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const a of analyses) {
    for (const gap of a.researchGaps) {
      const key = gap.trim().toLowerCase();
      if (key === "" || seen.has(key)) continue;
      seen.add(key);
      out.push(gap.trim());
      if (out.length >= limit) return out;
    }
  }
  return out;
}

export function hypothesisPrompt(
  topic: string,
  gaps: readonly string[],
  count: number,
  previous: readonly Discovery[]
): string {
  const lines = [
    `Research topic: ${topic}`,
    "Open research gaps:",
    ...gaps.map((g, i) => `${i + 1}. ${g}`),
  ];
  if (previous.length > 0) {
    lines.push("Already confirmed (do not repeat):", ...previous.map((d) => `- ${d.statement}`));
  }
  lines.push(
    "",
    `Propose up to ${count} testable materials hypotheses. Return a JSON object {"hypotheses": [...]} where each item has`,
    '"statement", "candidateFormulas" (chemical formulas such as "LiFePO4") and "rationale".'
  );
  return lines.join("\n");
}

export function generateHypotheses(llm: LlmClient): Collaborator<StageInput<PaperAnalysis[], Discovery>, Hypothesis[]> {
  return {
    name: "generateHypotheses",
    async invoke(input, ctx) {
      const { maxHypotheses } = parseRunParams(input.params);
      const gaps = topGaps(input.data);
      if (gaps.length === 0) return fatal("No research gaps identified");
      await ctx.log(`Generating hypotheses from ${gaps.length} research gaps`);
      const out = await llm.completeJson(ctx.guard, {
        prompt: hypothesisPrompt(input.topic, gaps, maxHypotheses, input.previousDiscoveries),
        schema: HypothesesSchema,
        label: "generate hypotheses",
        temperature: 0.7,
      });
      const hypotheses = out.hypotheses.slice(0, maxHypotheses).map((h, i) => ({
        id: `H${input.iteration}-${i + 1}`,
        statement: h.statement,
        candidateFormulas: h.candidateFormulas.map((f) => f.trim()),
        rationale: h.rationale,
      }));
      if (hypotheses.length === 0) return fatal("No hypotheses generated");
      return ok(hypotheses);
    },
  };
}
