/**
 * Session stores: in-memory (tests, ephemeral runs) and file-backed (default driver).
 * Updates swap whole rows in a single synchronous step; readers get clones.
 */

// ─── src/lib/sessions/sessionStore.ts ──────────────────────────────────────

import { join } from "path";
import { z } from "zod";
import { SessionNotFoundError } from "../errors.js";
import {
  appendJsonl,
  readJsonIfExists,
  readJsonl,
  writeJsonAtomic,
  writeTextAtomic,
} from "../persistence/jsonFiles.js";
import { createLogger } from "../../utils/log.js";
import {
  applyProgress,
  applyResultLocation,
  applyStatus,
  buildSession,
  sortNewestFirst,
} from "./sessionRules.js";
import {
  SESSION_STATUSES,
  type ListSessionsFilter,
  type Session,
  type SessionLogEntry,
  type SessionParams,
  type SessionStatus,
  type SessionStore,
} from "./types.js";

const log = createLogger("SessionStore");

export type SessionChange =
  | { type: "upsert"; session: Session; entry?: SessionLogEntry }
  | { type: "remove"; sessionId: string };

export interface SessionStoreOptions {
  now?: () => Date;
}

export class InMemorySessionStore implements SessionStore {
  protected readonly sessions = new Map<string, Session>();
  protected readonly sessionLogs = new Map<string, SessionLogEntry[]>();
  protected readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(topic: string, params: SessionParams = {}): Promise<string> {
    const session = buildSession(topic, params, this.now());
    this.sessions.set(session.id, session);
    this.sessionLogs.set(session.id, []);
    await this.persist({ type: "upsert", session });
    log.info(`Created session ${session.id} for topic: ${session.topic}`);
    return session.id;
  }

  async updateProgress(sessionId: string, progress: number, phase: string, message: string): Promise<Session> {
    const next = applyProgress(this.require(sessionId), { progress, phase, message }, this.now());
    this.commit(next.session, next.entry);
    await this.persist({ type: "upsert", ...next });
    log.debug(`Session ${sessionId} progress: ${next.session.progress}% - ${phase}`);
    return structuredClone(next.session);
  }

  async setStatus(sessionId: string, status: SessionStatus, message?: string): Promise<Session> {
    const next = applyStatus(this.require(sessionId), status, message, this.now());
    this.commit(next.session, next.entry);
    await this.persist({ type: "upsert", ...next });
    log.info(`Session ${sessionId} status updated to: ${status}`);
    return structuredClone(next.session);
  }

  async setResultLocation(sessionId: string, location: string): Promise<Session> {
    const session = applyResultLocation(this.require(sessionId), location, this.now());
    this.commit(session);
    await this.persist({ type: "upsert", session });
    return structuredClone(session);
  }

  async get(sessionId: string): Promise<Session | undefined> {
    const s = this.sessions.get(sessionId);
    return s ? structuredClone(s) : undefined;
  }

  async list(filter: ListSessionsFilter = {}): Promise<Session[]> {
    const all = [...this.sessions.values()].filter((s) => !filter.status || s.status === filter.status);
    return sortNewestFirst(all).map((s) => structuredClone(s));
  }

  async remove(sessionId: string): Promise<void> {
    this.require(sessionId);
    this.sessions.delete(sessionId);
    this.sessionLogs.delete(sessionId);
    await this.persist({ type: "remove", sessionId });
    log.info(`Deleted session ${sessionId}`);
  }

  async logs(sessionId: string): Promise<SessionLogEntry[]> {
    this.require(sessionId);
    return (this.sessionLogs.get(sessionId) ?? []).map((e) => ({ ...e }));
  }

  /** Hook for durable backends; called after the in-memory state is updated. */
  protected async persist(_change: SessionChange): Promise<void> {}

  protected require(sessionId: string): Session {
    const s = this.sessions.get(sessionId);
    if (!s) throw new SessionNotFoundError(sessionId);
    return s;
  }

  private commit(session: Session, entry?: SessionLogEntry): void {
    this.sessions.set(session.id, session);
    if (entry) {
      const entries = this.sessionLogs.get(session.id) ?? [];
      entries.push(entry);
      this.sessionLogs.set(session.id, entries);
    }
  }
}

const SessionRowSchema = z.object({
  id: z.string(),
  topic: z.string(),
  params: z.record(z.unknown()),
  status: z.enum(SESSION_STATUSES),
  progress: z.number(),
  phase: z.string(),
  message: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  resultLocation: z.string().nullable(),
});

const LogEntrySchema = z.object({
  sessionId: z.string(),
  timestamp: z.string(),
  phase: z.string(),
  message: z.string(),
});

/**
 * File-backed store: sessions.json (full snapshot, atomic rename) and
 * session-logs.jsonl (append-only). Writes are serialized through one queue.
 */
export class FileSessionStore extends InMemorySessionStore {
  private writes: Promise<void> = Promise.resolve();

  private constructor(
    private readonly dir: string,
    options: SessionStoreOptions
  ) {
    super(options);
  }

  static async open(dir: string, options: SessionStoreOptions = {}): Promise<FileSessionStore> {
    const store = new FileSessionStore(dir, options);
    await store.load();
    return store;
  }

  get sessionsPath(): string {
    return join(this.dir, "sessions.json");
  }

  get logsPath(): string {
    return join(this.dir, "session-logs.jsonl");
  }

  protected override persist(change: SessionChange): Promise<void> {
    const run = this.writes.then(() => this.write(change));
    // keep the queue alive after a failed write; the caller still sees the error
    this.writes = run.catch((err) => log.error("Persist failed:", err instanceof Error ? err.message : err));
    return run;
  }

  private async write(change: SessionChange): Promise<void> {
    if (change.type === "upsert" && change.entry) {
      await appendJsonl(this.logsPath, change.entry);
    }
    if (change.type === "remove") {
      const remaining = [...this.sessionLogs.values()].flat();
      await writeTextAtomic(this.logsPath, remaining.map((e) => JSON.stringify(e) + "\n").join(""));
    }
    await writeJsonAtomic(this.sessionsPath, [...this.sessions.values()]);
  }

  private async load(): Promise<void> {
    const rawSessions = await readJsonIfExists(this.sessionsPath);
    const rows = Array.isArray(rawSessions) ? rawSessions : [];
    for (const row of rows) {
      const parsed = SessionRowSchema.safeParse(row);
      if (!parsed.success) {
        log.warn(`Skipping invalid session row in ${this.sessionsPath}: ${parsed.error.issues[0]?.message}`);
        continue;
      }
      this.sessions.set(parsed.data.id, parsed.data);
      this.sessionLogs.set(parsed.data.id, []);
    }
    for (const raw of await readJsonl(this.logsPath)) {
      const parsed = LogEntrySchema.safeParse(raw);
      if (!parsed.success) continue;
      this.sessionLogs.get(parsed.data.sessionId)?.push(parsed.data);
    }
  }
}
