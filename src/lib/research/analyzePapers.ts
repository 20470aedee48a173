import { z } from "zod";
import type { Collaborator, StageInput } from "../pipeline/collaborators.js";
import { fatal, fromBatch } from "../pipeline/collaborators.js";
import type { LlmClient } from "../services/llm/llmClient.js";
import type { Discovery, Paper, PaperAnalysis } from "./types.js";

const AnalysisSchema = z.object({
  summary: z.string().min(1),
  researchGaps: z.array(z.string()).default([]),
  relevance: z.number().min(0).max(1),
});

export function analysisPrompt(topic: string, paper: Paper): string {
  return [
    `Research topic: ${topic}`,
    `Paper title: ${paper.title}`,
    `Abstract: ${paper.abstract}`,
    "",
    "Return a JSON object with:",
    '- "summary": two sentences on the paper\'s findings',
    '- "researchGaps": open problems the paper leaves (strings)',
    '- "relevance": a number from 0 to 1 for relevance to the topic',
  ].join("\n");
}

/** Per-paper analysis; a failed paper is an item failure. Results are ordered by relevance. */
export function analyzePapers(llm: LlmClient): Collaborator<StageInput<Paper[], Discovery>, PaperAnalysis[]> {
  return {
    name: "analyzePapers",
    async invoke(input, ctx) {
      const { results, failures } = await ctx.batch(
        input.data,
        (paper) => paper.id,
        async (paper): Promise<PaperAnalysis> => {
          const out = await llm.completeJson(ctx.guard, {
            prompt: analysisPrompt(input.topic, paper),
            schema: AnalysisSchema,
            label: `analyze ${paper.id}`,
          });
          return { paperId: paper.id, title: paper.title, ...out };
        }
      );
      if (results.length === 0) return fatal(`None of ${input.data.length} papers could be analyzed`);
      const ranked = [...results].sort((a, b) => b.relevance - a.relevance);
      return fromBatch(ranked, failures);
    },
  };
}
