/**
 * Tracks orchestrator runs started in the background (HTTP launch surface).
 * At most one active run per session; each run can be cancelled through its AbortSignal.
 */

import { InvalidSessionStateError, describeError } from "../errors.js";
import { createLogger } from "../../utils/log.js";
import type { RunOptions, RunOutcome } from "./orchestrator.js";

const log = createLogger("BackgroundRuns");

export interface SessionRunner<D> {
  run(sessionId: string, options?: RunOptions): Promise<RunOutcome<D>>;
}

export class BackgroundRuns<D> {
  private readonly active = new Map<string, { controller: AbortController; done: Promise<void> }>();

  constructor(private readonly runner: SessionRunner<D>) {}

  /** Throws InvalidSessionStateError when the session already has an active run. */
  start(sessionId: string): void {
    if (this.active.has(sessionId)) {
      throw new InvalidSessionStateError(`Session ${sessionId} is already running`);
    }
    const controller = new AbortController();
    const done = this.runner
      .run(sessionId, { signal: controller.signal })
      .then((outcome) => {
        if (outcome.status === "failed") log.warn(`Session ${sessionId} failed: ${outcome.error}`);
      })
      .catch((err) => {
        log.error(`Session ${sessionId} run aborted:`, describeError(err));
      })
      .finally(() => {
        this.active.delete(sessionId);
      });
    this.active.set(sessionId, { controller, done });
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  /** Requests cancellation; the run stops at the next phase boundary. */
  cancel(sessionId: string): boolean {
    const entry = this.active.get(sessionId);
    if (!entry) return false;
    entry.controller.abort();
    return true;
  }

  async settled(): Promise<void> {
    await Promise.all([...this.active.values()].map((e) => e.done));
  }
}
