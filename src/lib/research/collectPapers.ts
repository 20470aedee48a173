import type { Collaborator, StageInput } from "../pipeline/collaborators.js";
import { fatal, ok } from "../pipeline/collaborators.js";
import { parseRunParams } from "../pipeline/runParams.js";
import type { PapersClient } from "../services/papersClient.js";
import type { Discovery, Paper } from "./types.js";

/** Later iterations widen the query with formulas from earlier discoveries. */
export function buildPaperQuery(topic: string, previous: readonly Discovery[]): string {
  const formulas = [...new Set(previous.flatMap((d) => d.formulas))].slice(0, 3);
  return formulas.length > 0 ? `${topic} ${formulas.join(" ")}` : topic;
}

export function collectPapers(client: PapersClient): Collaborator<StageInput<null, Discovery>, Paper[]> {
  return {
    name: "collectPapers",
    async invoke(input, ctx) {
      const { maxPapers } = parseRunParams(input.params);
      const query = buildPaperQuery(input.topic, input.previousDiscoveries);
      const papers = await client.search(ctx.guard, query, maxPapers);
      if (papers.length === 0) return fatal(`No papers found for "${query}"`);
      return ok(papers.slice(0, maxPapers));
    },
  };
}
