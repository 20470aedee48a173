/**
 * Session routes: launch, list, inspect, logs, cancel and delete.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import { SessionNotFoundError, ValidationError } from "../../src/lib/errors.js";
import type { BackgroundRuns } from "../../src/lib/pipeline/backgroundRuns.js";
import { parseRunParams } from "../../src/lib/pipeline/runParams.js";
import { assertLaunchable } from "../../src/lib/sessions/sessionRules.js";
import { SESSION_STATUSES, type SessionStore } from "../../src/lib/sessions/types.js";
import { paramId, sendData, sendError } from "./respond.js";

export interface SessionRouteDeps {
  store: SessionStore;
  runs: BackgroundRuns<unknown>;
}

const CreateBodySchema = z.union([
  z.object({ sessionId: z.string().min(1) }).strict(),
  z.object({ topic: z.string().min(1), params: z.record(z.unknown()).optional() }),
]);

const ListQuerySchema = z.object({ status: z.enum(SESSION_STATUSES).optional() });

export function sessionHandlers({ store, runs }: SessionRouteDeps) {
  async function requireSession(id: string) {
    const session = await store.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  return {
    /** Creates a session and runs it in the background, or runs an existing pending one (409 otherwise). */
    async createPost(req: Request, res: Response): Promise<void> {
      try {
        const body = CreateBodySchema.safeParse(req.body ?? {});
        if (!body.success) {
          throw new ValidationError(`Expected { topic, params? } or { sessionId }: ${body.error.issues[0]?.message ?? "invalid"}`);
        }
        let sessionId: string;
        if ("sessionId" in body.data) {
          sessionId = body.data.sessionId;
          assertLaunchable(await requireSession(sessionId));
        } else {
          const params = body.data.params ?? {};
          parseRunParams(params);
          sessionId = await store.create(body.data.topic, params);
        }
        runs.start(sessionId);
        sendData(res, await requireSession(sessionId), 202);
      } catch (e) {
        sendError(res, e);
      }
    },

    async listGet(req: Request, res: Response): Promise<void> {
      try {
        const query = ListQuerySchema.safeParse(req.query);
        if (!query.success) throw new ValidationError(`Unknown status filter: ${String(req.query.status)}`);
        sendData(res, await store.list(query.data));
      } catch (e) {
        sendError(res, e);
      }
    },

    async sessionGet(req: Request, res: Response): Promise<void> {
      try {
        const session = await requireSession(paramId(req, "id"));
        sendData(res, { ...session, active: runs.isActive(session.id) });
      } catch (e) {
        sendError(res, e);
      }
    },

    async logsGet(req: Request, res: Response): Promise<void> {
      try {
        sendData(res, await store.logs(paramId(req, "id")));
      } catch (e) {
        sendError(res, e);
      }
    },

    async cancelPost(req: Request, res: Response): Promise<void> {
      try {
        const id = paramId(req, "id");
        await requireSession(id);
        sendData(res, { sessionId: id, cancelled: runs.cancel(id) });
      } catch (e) {
        sendError(res, e);
      }
    },

    /** Cancels an active run first; its remaining store writes then fail as not found. */
    async sessionDelete(req: Request, res: Response): Promise<void> {
      try {
        const id = paramId(req, "id");
        runs.cancel(id);
        await store.remove(id);
        sendData(res, { sessionId: id, deleted: true });
      } catch (e) {
        sendError(res, e);
      }
    },
  };
}
