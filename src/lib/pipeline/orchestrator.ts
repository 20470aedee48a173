/**
 * Orchestrator: runs the fixed phase sequence for one session.
 *
 * Each stage is announced at its working phase's floor, its collaborator runs
 * (outbound calls go through the ExecutionGuard), item failures are logged one
 * entry each, and progress moves to the stage's milestone floor. Any fatal
 * outcome or error escaping a collaborator marks the session failed and stops
 * the run. Store errors for unknown or terminal sessions propagate unchanged.
 */

// ─── src/lib/pipeline/orchestrator.ts ───────────────────────────────────────

import {
  FatalPhaseError,
  InvalidSessionStateError,
  PipelineError,
  SessionNotFoundError,
  describeError,
} from "../errors.js";
import type { ExecutionGuard } from "../execution/executionGuard.js";
import { runBatch, type ItemFailure } from "../execution/runBatch.js";
import type { SessionStore } from "../sessions/types.js";
import { createLogger } from "../../utils/log.js";
import type {
  Collaborator,
  CollaboratorContext,
  CollaboratorOutcome,
  PipelineCollaborators,
} from "./collaborators.js";
import { PHASE_PROGRESS, STAGES, type Phase, type StageName } from "./phases.js";
import { parseRunParams } from "./runParams.js";

const log = createLogger("Orchestrator");

export interface StageFailure extends ItemFailure {
  phase: Phase;
  iteration: number;
}

export interface RunResult<D> {
  sessionId: string;
  topic: string;
  iterations: number;
  /** Totals across iterations. */
  counts: Record<StageName, number>;
  discoveries: D[];
  itemFailures: StageFailure[];
  finishedAt: string;
}

export type RunOutcome<D> =
  | { status: "completed"; result: RunResult<D>; resultLocation?: string }
  | { status: "failed"; error: string };

/** Persists the final result; returns where it was written. */
export interface ResultWriter<D> {
  write(result: RunResult<D>): Promise<string>;
}

export interface OrchestratorOptions<D> {
  store: SessionStore;
  guard: ExecutionGuard;
  /** Max in-flight items per batch. Default 3. */
  concurrency?: number;
  resultWriter?: ResultWriter<D>;
  now?: () => Date;
}

export interface RunOptions {
  /** Polled between stages; an aborted run is marked failed. */
  signal?: AbortSignal;
}

const STAGE_LABELS: Record<StageName, { start: string; unit: string }> = {
  papers: { start: "Collecting papers", unit: "papers collected" },
  analysis: { start: "Analyzing papers", unit: "papers analyzed" },
  hypotheses: { start: "Generating hypotheses", unit: "hypotheses generated" },
  testing: { start: "Testing hypotheses", unit: "hypotheses tested" },
  evaluation: { start: "Evaluating results", unit: "discoveries found" },
};

function isProgrammingError(err: unknown): boolean {
  return err instanceof SessionNotFoundError || err instanceof InvalidSessionStateError;
}

export class Orchestrator<P, A, H, T, D> {
  private readonly store: SessionStore;
  private readonly guard: ExecutionGuard;
  private readonly concurrency: number;
  private readonly resultWriter?: ResultWriter<D>;
  private readonly now: () => Date;

  constructor(
    private readonly collaborators: PipelineCollaborators<P, A, H, T, D>,
    options: OrchestratorOptions<D>
  ) {
    this.store = options.store;
    this.guard = options.guard;
    this.concurrency = Math.max(1, options.concurrency ?? 3);
    this.resultWriter = options.resultWriter;
    this.now = options.now ?? (() => new Date());
  }

  async run(sessionId: string, options: RunOptions = {}): Promise<RunOutcome<D>> {
    const session = await this.store.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    await this.store.setStatus(sessionId, "running", `Research started: ${session.topic}`);
    log.info(`Running session ${sessionId}: ${session.topic}`);

    const counts: Record<StageName, number> = { papers: 0, analysis: 0, hypotheses: 0, testing: 0, evaluation: 0 };
    const itemFailures: StageFailure[] = [];
    const discoveries: D[] = [];

    try {
      const params = this.parseParams(session.params);
      const iterations = params.iterations;

      for (let iteration = 1; iteration <= iterations; iteration++) {
        const base = {
          topic: session.topic,
          params: session.params,
          iteration,
          totalIterations: iterations,
          previousDiscoveries: [...discoveries],
        };
        const tag = iterations > 1 ? `[${iteration}/${iterations}] ` : "";
        const run = <I, O>(stage: (typeof STAGES)[number], collaborator: Collaborator<I, O[]>, input: I) =>
          this.runStage(sessionId, stage, collaborator, input, { iteration, tag, counts, itemFailures, signal: options.signal });

        const papers = await run(STAGES[0], this.collaborators.papers, { ...base, data: null });
        const analyses = await run(STAGES[1], this.collaborators.analysis, { ...base, data: papers });
        const hypotheses = await run(STAGES[2], this.collaborators.hypotheses, { ...base, data: analyses });
        const tested = await run(STAGES[3], this.collaborators.testing, { ...base, data: hypotheses });
        const found = await run(STAGES[4], this.collaborators.evaluation, { ...base, data: tested });
        discoveries.push(...found);
      }

      const result: RunResult<D> = {
        sessionId,
        topic: session.topic,
        iterations,
        counts,
        discoveries,
        itemFailures,
        finishedAt: this.now().toISOString(),
      };
      let resultLocation: string | undefined;
      if (this.resultWriter) {
        resultLocation = await this.resultWriter.write(result);
        await this.store.setResultLocation(sessionId, resultLocation);
      }
      const summary = `Research complete: ${discoveries.length} discoveries from ${counts.papers} papers`;
      await this.store.updateProgress(sessionId, PHASE_PROGRESS.Completed, "Completed", summary);
      await this.store.setStatus(sessionId, "completed", summary);
      log.info(`Session ${sessionId} completed: ${summary}`);
      return { status: "completed", result, ...(resultLocation ? { resultLocation } : {}) };
    } catch (err) {
      if (isProgrammingError(err)) throw err;
      const message = err instanceof FatalPhaseError ? err.message : `Unexpected failure: ${describeError(err)}`;
      log.error(`Session ${sessionId} failed: ${message}`);
      await this.store.setStatus(sessionId, "failed", message);
      return { status: "failed", error: message };
    }
  }

  private parseParams(params: Record<string, unknown>) {
    try {
      return parseRunParams(params);
    } catch (err) {
      throw new FatalPhaseError("Starting", `Starting failed: ${describeError(err)}`, { cause: err });
    }
  }

  private async runStage<I, O>(
    sessionId: string,
    stage: (typeof STAGES)[number],
    collaborator: Collaborator<I, O[]>,
    input: I,
    run: {
      iteration: number;
      tag: string;
      counts: Record<StageName, number>;
      itemFailures: StageFailure[];
      signal?: AbortSignal;
    }
  ): Promise<O[]> {
    const phase: Phase = stage.working;
    if (run.signal?.aborted) {
      throw new FatalPhaseError(phase, `${phase} failed: Cancelled by operator`);
    }
    const floor = PHASE_PROGRESS[phase];
    const labels = STAGE_LABELS[stage.stage];
    await this.store.updateProgress(sessionId, floor, phase, `${run.tag}${labels.start}...`);

    const ctx = this.context(sessionId, run.iteration, phase, run.signal);
    let outcome: CollaboratorOutcome<O[]>;
    try {
      outcome = await collaborator.invoke(input, ctx);
    } catch (err) {
      if (isProgrammingError(err)) throw err;
      const detail = err instanceof PipelineError ? `${err.code}: ${err.message}` : describeError(err);
      throw new FatalPhaseError(phase, `${phase} failed: ${detail}`, { cause: err });
    }
    if (outcome.status === "fatal") {
      throw new FatalPhaseError(phase, `${phase} failed: ${outcome.reason}`);
    }

    const failures = outcome.status === "partial" ? outcome.itemFailures : [];
    for (const f of failures) {
      run.itemFailures.push({ ...f, phase, iteration: run.iteration });
      await this.store.updateProgress(sessionId, floor, phase, `${run.tag}Item failed (${f.itemId}): ${f.error}`);
    }

    const value = outcome.value;
    run.counts[stage.stage] += value.length;
    const failedNote = failures.length > 0 ? ` (${failures.length} failed)` : "";
    await this.store.updateProgress(
      sessionId,
      PHASE_PROGRESS[stage.done],
      stage.done,
      `${run.tag}${value.length} ${labels.unit}${failedNote}`
    );
    log.debug(`Session ${sessionId} ${stage.done}: ${value.length}${failedNote}`);
    return value;
  }

  private context(sessionId: string, iteration: number, phase: Phase, signal?: AbortSignal): CollaboratorContext {
    const floor = PHASE_PROGRESS[phase];
    return {
      sessionId,
      iteration,
      guard: this.guard,
      signal,
      log: async (message) => {
        await this.store.updateProgress(sessionId, floor, phase, message);
      },
      batch: (items, itemId, fn) => runBatch(items, { concurrency: this.concurrency, itemId }, fn),
    };
  }
}
