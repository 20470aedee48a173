/**
 * API route registration for Express. Mounts all routes under /api.
 */

import express, { type Express } from "express";
import type { CredentialPool } from "../../src/lib/credentials/credentialPool.js";
import { credentialHandlers } from "./credentials.js";
import { sessionHandlers, type SessionRouteDeps } from "./sessions.js";

export interface ApiDeps extends SessionRouteDeps {
  pool: CredentialPool;
}

export function registerApiRoutes(app: Express, deps: ApiDeps): void {
  const api = express.Router();
  const sessions = sessionHandlers(deps);
  const credentials = credentialHandlers(deps.pool);

  // Sessions
  api.post("/sessions", sessions.createPost);
  api.get("/sessions", sessions.listGet);
  api.get("/sessions/:id", sessions.sessionGet);
  api.get("/sessions/:id/logs", sessions.logsGet);
  api.post("/sessions/:id/cancel", sessions.cancelPost);
  api.delete("/sessions/:id", sessions.sessionDelete);

  // Credentials
  api.get("/credentials", credentials.statusGet);
  api.post("/credentials/:service/reset", credentials.resetPost);

  api.get("/health", (_req, res) => {
    res.json({ success: true, data: { status: "ok" } });
  });

  app.use("/api", api);
}
