/**
 * Picks the session store for the configured persistence driver.
 */

import { join } from "path";
import type { AppConfig } from "../config.js";
import { getDb } from "../db/index.js";
import { FileSessionStore, InMemorySessionStore } from "./sessionStore.js";
import { DbSessionStore } from "./sessionStoreDb.js";
import type { SessionStore } from "./types.js";

export async function createSessionStore(
  config: Pick<AppConfig, "persistenceDriver" | "dataDir" | "databaseUrl">
): Promise<SessionStore> {
  switch (config.persistenceDriver) {
    case "db":
      return new DbSessionStore(getDb(config.databaseUrl));
    case "memory":
      return new InMemorySessionStore();
    case "file":
      return FileSessionStore.open(join(config.dataDir, "sessions"));
  }
}
