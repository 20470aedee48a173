/**
 * Session and session log types.
 */

export const SESSION_STATUSES = ["pending", "running", "completed", "failed"] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

export type TerminalStatus = Extract<SessionStatus, "completed" | "failed">;

/** Run parameters. Opaque to the store; the pipeline parses what it needs. */
export type SessionParams = Record<string, unknown>;

export interface Session {
  id: string;
  topic: string;
  params: SessionParams;
  status: SessionStatus;
  /** 0–100, never decreases. */
  progress: number;
  phase: string;
  message: string;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  resultLocation: string | null;
}

export interface SessionLogEntry {
  sessionId: string;
  timestamp: string;
  phase: string;
  message: string;
}

export interface ListSessionsFilter {
  status?: SessionStatus;
}

/**
 * Durable record of pipeline runs. One writer per session; any number of readers.
 * Reads return copies, so a reader never observes a partially-applied update.
 */
export interface SessionStore {
  create(topic: string, params?: SessionParams): Promise<string>;
  /** Clamps: stored progress = max(stored, progress). Appends a log entry. */
  updateProgress(sessionId: string, progress: number, phase: string, message: string): Promise<Session>;
  setStatus(sessionId: string, status: SessionStatus, message?: string): Promise<Session>;
  setResultLocation(sessionId: string, location: string): Promise<Session>;
  get(sessionId: string): Promise<Session | undefined>;
  /** Newest first. */
  list(filter?: ListSessionsFilter): Promise<Session[]>;
  /** Deletes the session and its logs. */
  remove(sessionId: string): Promise<void>;
  /** Oldest first. */
  logs(sessionId: string): Promise<SessionLogEntry[]>;
}
