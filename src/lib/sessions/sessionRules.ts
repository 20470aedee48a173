/**
 * Pure session transitions shared by every store backend.
 * Each returns the next row plus the log entry to append, so a backend can
 * apply both in one atomic step (map swap, serialized write, or transaction).
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import { InvalidSessionStateError, ValidationError } from "../errors.js";
import type { Session, SessionLogEntry, SessionParams, SessionStatus } from "./types.js";

export const INITIAL_PHASE = "Starting";

const ALLOWED_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  pending: ["running"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function isTerminal(status: SessionStatus): boolean {
  return status === "completed" || status === "failed";
}

const CreateSessionSchema = z.object({
  topic: z.string().trim().min(1, "topic is required"),
  params: z.record(z.unknown()),
});

const ProgressUpdateSchema = z.object({
  progress: z.number().finite().min(0).max(100),
  phase: z.string().trim().min(1, "phase is required"),
  message: z.string(),
});

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** session_YYYYMMDD_HHMMSS_mmm_<8 hex>: sorts by creation time, unique via the suffix. */
export function newSessionId(now: Date): string {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}` +
    `_${pad(now.getUTCMilliseconds(), 3)}`;
  return `session_${stamp}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

export function buildSession(topic: string, params: SessionParams, now: Date): Session {
  const parsed = CreateSessionSchema.safeParse({ topic, params });
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid session request");
  }
  const ts = now.toISOString();
  return {
    id: newSessionId(now),
    topic: parsed.data.topic,
    params: parsed.data.params,
    status: "pending",
    progress: 0,
    phase: INITIAL_PHASE,
    message: "Session created",
    createdAt: ts,
    updatedAt: ts,
    completedAt: null,
    resultLocation: null,
  };
}

export function applyProgress(
  session: Session,
  update: { progress: number; phase: string; message: string },
  now: Date
): { session: Session; entry: SessionLogEntry } {
  const parsed = ProgressUpdateSchema.safeParse(update);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid progress update");
  }
  if (isTerminal(session.status)) {
    throw new InvalidSessionStateError(
      `Session ${session.id} is ${session.status}; progress can no longer change`
    );
  }
  const ts = now.toISOString();
  const { progress, phase, message } = parsed.data;
  return {
    session: {
      ...session,
      progress: Math.max(session.progress, progress),
      phase,
      message,
      updatedAt: ts,
    },
    entry: { sessionId: session.id, timestamp: ts, phase, message },
  };
}

export function applyStatus(
  session: Session,
  status: SessionStatus,
  message: string | undefined,
  now: Date
): { session: Session; entry: SessionLogEntry } {
  if (!ALLOWED_TRANSITIONS[session.status].includes(status)) {
    throw new InvalidSessionStateError(
      `Session ${session.id} cannot move from ${session.status} to ${status}`
    );
  }
  const ts = now.toISOString();
  const text = message ?? `Status changed to ${status}`;
  return {
    session: {
      ...session,
      status,
      message: text,
      progress: status === "completed" ? 100 : session.progress,
      updatedAt: ts,
      completedAt: isTerminal(status) ? ts : session.completedAt,
    },
    entry: { sessionId: session.id, timestamp: ts, phase: session.phase, message: text },
  };
}

/** Only a pending session can be started; a finished or running one is never re-run. */
export function assertLaunchable(session: Session): void {
  if (session.status !== "pending") {
    throw new InvalidSessionStateError(`Session ${session.id} is ${session.status}; only pending sessions can be started`);
  }
}

export function applyResultLocation(session: Session, location: string, now: Date): Session {
  if (location.trim() === "") throw new ValidationError("result location is required");
  return { ...session, resultLocation: location, updatedAt: now.toISOString() };
}

/** createdAt descending; equal timestamps keep newest-inserted first when input is oldest-first. */
export function sortNewestFirst(sessions: Session[]): Session[] {
  return [...sessions].reverse().sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}
