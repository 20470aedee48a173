/**
 * Stage payloads for the default research pipeline.
 */

import type { MaterialEntry } from "../services/materialsClient.js";
import type { Paper } from "../services/papersClient.js";

export type { Paper };

export interface PaperAnalysis {
  paperId: string;
  title: string;
  summary: string;
  researchGaps: string[];
  /** 0..1, how relevant the paper is to the topic. */
  relevance: number;
}

export interface Hypothesis {
  id: string;
  statement: string;
  candidateFormulas: string[];
  rationale: string;
}

export type Verdict = "PASS" | "FAIL";

export interface TestResult {
  hypothesisId: string;
  statement: string;
  verdict: Verdict;
  /** Share of candidate formulas with a stable entry. */
  confidence: number;
  supportedFormulas: string[];
  evidence: MaterialEntry[];
}

export interface Discovery {
  hypothesisId: string;
  statement: string;
  confidence: number;
  formulas: string[];
  iteration: number;
}
