/**
 * JSON / JSONL file helpers for the file persistence driver.
 */

import { mkdir, appendFile, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";

/** Ensures the directory exists (mkdir -p), then appends one JSON line. */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n");
}

/** Reads every JSON line; a missing file reads as empty. Unparseable lines are skipped. */
export async function readJsonl(path: string): Promise<unknown[]> {
  const raw = await readTextIfExists(path);
  if (raw == null) return [];
  const out: unknown[] = [];
  for (const line of raw.split("\n")) {
    if (!line.trim()) continue;
    try {
      out.push(JSON.parse(line));
    } catch {
      console.warn(`[jsonFiles] Skipping malformed line in ${path}`);
    }
  }
  return out;
}

export async function readJsonIfExists(path: string): Promise<unknown> {
  const raw = await readTextIfExists(path);
  return raw == null ? undefined : JSON.parse(raw);
}

/** Writes through a temp file and rename so readers never see a half-written file. */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeTextAtomic(path, JSON.stringify(value, null, 2));
}

export async function writeTextAtomic(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, text, "utf-8");
  await rename(tmp, path);
}

async function readTextIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
