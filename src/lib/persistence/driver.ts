/**
 * Persistence driver: db | file | memory.
 * PERSISTENCE_DRIVER=db uses PostgreSQL; default is file under the data directory.
 */

export type PersistenceDriver = "db" | "file" | "memory";

export function parsePersistenceDriver(raw: string | undefined): PersistenceDriver {
  const v = raw?.trim().toLowerCase();
  if (v === "db") return "db";
  if (v === "memory") return "memory";
  return "file";
}
