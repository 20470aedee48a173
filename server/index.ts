/**
 * Express server: session launch and monitoring API.
 */

import express from "express";
import cors from "cors";
import { loadAppConfig } from "../src/lib/config.js";
import { closeDb } from "../src/lib/db/index.js";
import { BackgroundRuns } from "../src/lib/pipeline/backgroundRuns.js";
import { createRuntime } from "../src/lib/runtime.js";
import { registerApiRoutes } from "./routes/index.js";

const PORT = parseInt(process.env.PORT ?? "3000", 10);

async function start() {
  const config = loadAppConfig();
  const runtime = await createRuntime(config);
  const runs = new BackgroundRuns<unknown>(runtime.orchestrator);

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  registerApiRoutes(app, { store: runtime.store, runs, pool: runtime.pool });

  const server = app.listen(PORT, "0.0.0.0", () => {
    console.log(`[Server] Running at http://0.0.0.0:${PORT} (persistence: ${config.persistenceDriver})`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close();
    runs
      .settled()
      .then(() => closeDb())
      .then(() => process.exit(0))
      .catch((e) => {
        console.error("[Server] Shutdown failed:", e);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((e) => {
  console.error("[Server] Failed to start:", e instanceof Error ? e.message : e);
  process.exit(1);
});
