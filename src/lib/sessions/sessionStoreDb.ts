/**
 * DB-backed session store. Used when PERSISTENCE_DRIVER=db.
 * Every mutation runs in one transaction holding a row lock on the session,
 * so the row update and its log entry land together.
 */

import { asc, desc, eq } from "drizzle-orm";
import { z } from "zod";
import type { Db } from "../db/index.js";
import { researchSessionLogs, researchSessions } from "../db/schema.js";
import { SessionNotFoundError } from "../errors.js";
import {
  applyProgress,
  applyResultLocation,
  applyStatus,
  buildSession,
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
import type { SessionStoreOptions } from "./sessionStore.js";

type SessionRow = typeof researchSessions.$inferSelect;

const ParamsSchema = z.record(z.unknown());
const StatusSchema = z.enum(SESSION_STATUSES);

function toSession(row: SessionRow): Session {
  const params = ParamsSchema.safeParse(row.params);
  const status = StatusSchema.safeParse(row.status);
  if (!status.success) {
    throw new Error(`[SessionStoreDb] Unknown status '${row.status}' on session ${row.id}`);
  }
  return {
    id: row.id,
    topic: row.topic,
    params: params.success ? params.data : {},
    status: status.data,
    progress: row.progress,
    phase: row.phase,
    message: row.message,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    completedAt: row.completedAt ? row.completedAt.toISOString() : null,
    resultLocation: row.resultLocation,
  };
}

function toRow(s: Session): typeof researchSessions.$inferInsert {
  return {
    id: s.id,
    topic: s.topic,
    params: s.params,
    status: s.status,
    progress: Math.round(s.progress),
    phase: s.phase,
    message: s.message,
    createdAt: new Date(s.createdAt),
    updatedAt: new Date(s.updatedAt),
    completedAt: s.completedAt ? new Date(s.completedAt) : null,
    resultLocation: s.resultLocation,
  };
}

export class DbSessionStore implements SessionStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: Db,
    options: SessionStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async create(topic: string, params: SessionParams = {}): Promise<string> {
    const session = buildSession(topic, params, this.now());
    await this.db.insert(researchSessions).values(toRow(session));
    return session.id;
  }

  async updateProgress(sessionId: string, progress: number, phase: string, message: string): Promise<Session> {
    return this.mutate(sessionId, (current) => applyProgress(current, { progress, phase, message }, this.now()));
  }

  async setStatus(sessionId: string, status: SessionStatus, message?: string): Promise<Session> {
    return this.mutate(sessionId, (current) => applyStatus(current, status, message, this.now()));
  }

  async setResultLocation(sessionId: string, location: string): Promise<Session> {
    return this.mutate(sessionId, (current) => ({ session: applyResultLocation(current, location, this.now()) }));
  }

  async get(sessionId: string): Promise<Session | undefined> {
    const rows = await this.db.select().from(researchSessions).where(eq(researchSessions.id, sessionId));
    return rows.length > 0 ? toSession(rows[0]) : undefined;
  }

  async list(filter: ListSessionsFilter = {}): Promise<Session[]> {
    const query = this.db.select().from(researchSessions);
    const rows = filter.status
      ? await query.where(eq(researchSessions.status, filter.status)).orderBy(desc(researchSessions.createdAt), desc(researchSessions.id))
      : await query.orderBy(desc(researchSessions.createdAt), desc(researchSessions.id));
    return rows.map(toSession);
  }

  async remove(sessionId: string): Promise<void> {
    const deleted = await this.db
      .delete(researchSessions)
      .where(eq(researchSessions.id, sessionId))
      .returning({ id: researchSessions.id });
    if (deleted.length === 0) throw new SessionNotFoundError(sessionId);
  }

  async logs(sessionId: string): Promise<SessionLogEntry[]> {
    if (!(await this.get(sessionId))) throw new SessionNotFoundError(sessionId);
    const rows = await this.db
      .select()
      .from(researchSessionLogs)
      .where(eq(researchSessionLogs.sessionId, sessionId))
      .orderBy(asc(researchSessionLogs.ts), asc(researchSessionLogs.id));
    return rows.map((r) => ({
      sessionId: r.sessionId,
      timestamp: r.ts.toISOString(),
      phase: r.phase,
      message: r.message,
    }));
  }

  private async mutate(
    sessionId: string,
    apply: (current: Session) => { session: Session; entry?: SessionLogEntry }
  ): Promise<Session> {
    return this.db.transaction(async (tx) => {
      const rows = await tx
        .select()
        .from(researchSessions)
        .where(eq(researchSessions.id, sessionId))
        .for("update");
      if (rows.length === 0) throw new SessionNotFoundError(sessionId);
      const next = apply(toSession(rows[0]));
      const { id: _id, ...changes } = toRow(next.session);
      await tx.update(researchSessions).set(changes).where(eq(researchSessions.id, sessionId));
      if (next.entry) {
        await tx.insert(researchSessionLogs).values({
          sessionId,
          ts: new Date(next.entry.timestamp),
          phase: next.entry.phase,
          message: next.entry.message,
        });
      }
      return next.session;
    });
  }
}
