/**
 * Writes a finished run to <dataDir>/sessions/<sessionId>/:
 * summary.json (counts, failures) and discoveries.json.
 */

import { join } from "path";
import { writeJsonAtomic } from "../persistence/jsonFiles.js";
import type { ResultWriter, RunResult } from "./orchestrator.js";

export class FileResultWriter<D> implements ResultWriter<D> {
  constructor(private readonly dataDir: string) {}

  async write(result: RunResult<D>): Promise<string> {
    const dir = join(this.dataDir, "sessions", result.sessionId);
    const { discoveries, ...rest } = result;
    await writeJsonAtomic(join(dir, "discoveries.json"), discoveries);
    await writeJsonAtomic(join(dir, "summary.json"), { ...rest, discoveryCount: discoveries.length });
    return dir;
  }
}
