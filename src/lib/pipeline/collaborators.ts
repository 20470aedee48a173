/**
 * Collaborator contract: the only shape the orchestrator depends on.
 * A collaborator returns ok, partial (value plus item failures) or fatal;
 * it makes its outbound calls through ctx.guard.
 */

import type { ExecutionGuard } from "../execution/executionGuard.js";
import type { BatchResult, ItemFailure } from "../execution/runBatch.js";
import type { SessionParams } from "../sessions/types.js";

export type CollaboratorOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "partial"; value: T; itemFailures: ItemFailure[] }
  | { status: "fatal"; reason: string };

export interface CollaboratorContext {
  sessionId: string;
  iteration: number;
  guard: ExecutionGuard;
  signal?: AbortSignal;
  /** Appends a line to the session log under the current phase. */
  log(message: string): Promise<void>;
  /** Bounded-parallel batch with the pipeline's concurrency. */
  batch<T, R>(
    items: readonly T[],
    itemId: (item: T, index: number) => string,
    fn: (item: T, index: number) => Promise<R>
  ): Promise<BatchResult<R>>;
}

/** What every stage sees: the run request plus the previous stage's output. */
export interface StageInput<X, D> {
  topic: string;
  params: SessionParams;
  iteration: number;
  totalIterations: number;
  /** Discoveries from earlier iterations; empty on the first. */
  previousDiscoveries: readonly D[];
  data: X;
}

export interface Collaborator<I, O> {
  readonly name: string;
  invoke(input: I, ctx: CollaboratorContext): Promise<CollaboratorOutcome<O>>;
}

/**
 * The five stages. Each stage's output array feeds the next; the last stage's
 * discoveries feed the next iteration's paper collection.
 */
export interface PipelineCollaborators<P, A, H, T, D> {
  papers: Collaborator<StageInput<null, D>, P[]>;
  analysis: Collaborator<StageInput<P[], D>, A[]>;
  hypotheses: Collaborator<StageInput<A[], D>, H[]>;
  testing: Collaborator<StageInput<H[], D>, T[]>;
  evaluation: Collaborator<StageInput<T[], D>, D[]>;
}

export function ok<T>(value: T): CollaboratorOutcome<T> {
  return { status: "ok", value };
}

export function fatal<T>(reason: string): CollaboratorOutcome<T> {
  return { status: "fatal", reason };
}

/** ok when nothing failed, partial otherwise. */
export function fromBatch<T>(value: T, failures: ItemFailure[]): CollaboratorOutcome<T> {
  return failures.length > 0 ? { status: "partial", value, itemFailures: failures } : { status: "ok", value };
}
