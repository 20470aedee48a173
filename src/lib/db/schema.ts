/**
 * Drizzle schema for session persistence (PERSISTENCE_DRIVER=db).
 * Matching SQL lives in drizzle/0001_research_sessions.sql.
 */

import { pgTable, text, timestamp, jsonb, serial, integer, index } from "drizzle-orm/pg-core";

/** One row per pipeline run. */
export const researchSessions = pgTable(
  "research_sessions",
  {
    id: text("id").primaryKey(),
    topic: text("topic").notNull(),
    params: jsonb("params").notNull(),
    status: text("status").notNull(),
    progress: integer("progress").notNull().default(0),
    phase: text("phase").notNull(),
    message: text("message").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    resultLocation: text("result_location"),
  },
  (table) => ({
    statusIdx: index("idx_research_sessions_status").on(table.status),
    createdIdx: index("idx_research_sessions_created_at").on(table.createdAt),
  })
);

/** Append-only progress log. Deleted with its session. */
export const researchSessionLogs = pgTable(
  "research_session_logs",
  {
    id: serial("id").primaryKey(),
    sessionId: text("session_id")
      .notNull()
      .references(() => researchSessions.id, { onDelete: "cascade" }),
    ts: timestamp("ts", { withTimezone: true }).notNull(),
    phase: text("phase").notNull(),
    message: text("message").notNull(),
  },
  (table) => ({
    sessionTsIdx: index("idx_research_session_logs_session_ts").on(table.sessionId, table.ts),
  })
);
