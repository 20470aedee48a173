/**
 * Pipeline phases in run order, each with its progress floor.
 */

export const PHASES = [
  "Starting",
  "CollectingPapers",
  "PapersCollected",
  "AnalyzingPapers",
  "AnalysisComplete",
  "GeneratingHypotheses",
  "HypothesesGenerated",
  "TestingHypotheses",
  "TestingComplete",
  "EvaluatingResults",
  "DiscoveriesFound",
  "Completed",
] as const;

export type Phase = (typeof PHASES)[number];

export const PHASE_PROGRESS: Readonly<Record<Phase, number>> = {
  Starting: 0,
  CollectingPapers: 10,
  PapersCollected: 20,
  AnalyzingPapers: 30,
  AnalysisComplete: 45,
  GeneratingHypotheses: 55,
  HypothesesGenerated: 65,
  TestingHypotheses: 75,
  TestingComplete: 85,
  EvaluatingResults: 90,
  DiscoveriesFound: 95,
  Completed: 100,
};

/** Working phases and the milestone each one reaches on success. */
export const STAGES = [
  { stage: "papers", working: "CollectingPapers", done: "PapersCollected" },
  { stage: "analysis", working: "AnalyzingPapers", done: "AnalysisComplete" },
  { stage: "hypotheses", working: "GeneratingHypotheses", done: "HypothesesGenerated" },
  { stage: "testing", working: "TestingHypotheses", done: "TestingComplete" },
  { stage: "evaluation", working: "EvaluatingResults", done: "DiscoveriesFound" },
] as const satisfies ReadonlyArray<{ stage: string; working: Phase; done: Phase }>;

export type StageName = (typeof STAGES)[number]["stage"];
