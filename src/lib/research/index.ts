/**
 * Default research collaborators wired to the service clients.
 */

import type { PipelineCollaborators } from "../pipeline/collaborators.js";
import type { LlmClient } from "../services/llm/llmClient.js";
import type { MaterialsClient } from "../services/materialsClient.js";
import type { PapersClient } from "../services/papersClient.js";
import { analyzePapers } from "./analyzePapers.js";
import { collectPapers } from "./collectPapers.js";
import { evaluateResults } from "./evaluateResults.js";
import { generateHypotheses } from "./generateHypotheses.js";
import { testHypotheses } from "./testHypotheses.js";
import type { Discovery, Hypothesis, Paper, PaperAnalysis, TestResult } from "./types.js";

export type ResearchCollaborators = PipelineCollaborators<Paper, PaperAnalysis, Hypothesis, TestResult, Discovery>;

export function createResearchCollaborators(clients: {
  papers: PapersClient;
  llm: LlmClient;
  materials: MaterialsClient;
}): ResearchCollaborators {
  return {
    papers: collectPapers(clients.papers),
    analysis: analyzePapers(clients.llm),
    hypotheses: generateHypotheses(clients.llm),
    testing: testHypotheses(clients.materials),
    evaluation: evaluateResults(),
  };
}

export type { Discovery, Hypothesis, Paper, PaperAnalysis, TestResult } from "./types.js";
