#!/usr/bin/env node
/**
 * Runs one research session in the foreground.
 *
 * Usage:
 *   tsx scripts/runSession.ts <sessionId>
 *   tsx scripts/runSession.ts --topic "solid-state electrolytes" [--maxPapers 20] [--maxHypotheses 10] [--iterations 1]
 *
 * Ctrl-C cancels at the next phase boundary; the session is marked failed.
 */

import { loadAppConfig } from "../src/lib/config.js";
import { closeDb } from "../src/lib/db/index.js";
import { SessionNotFoundError } from "../src/lib/errors.js";
import { createRuntime } from "../src/lib/runtime.js";
import { assertLaunchable } from "../src/lib/sessions/sessionRules.js";

interface Args {
  sessionId?: string;
  topic?: string;
  params: Record<string, number>;
}

const NUMERIC_FLAGS = ["--maxPapers", "--maxHypotheses", "--iterations"];

function parseArgs(): Args {
  const args = process.argv.slice(2);
  const out: Args = { params: {} };
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === "--topic" && args[i + 1]) out.topic = args[++i];
    else if (NUMERIC_FLAGS.includes(a) && args[i + 1]) {
      const n = parseInt(args[++i], 10);
      if (!isNaN(n)) out.params[a.slice(2)] = n;
    } else if (!a.startsWith("--") && !out.sessionId) out.sessionId = a;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs();
  if (!args.sessionId && !args.topic) {
    console.error('Usage: tsx scripts/runSession.ts <sessionId> | --topic "..." [--maxPapers N] [--maxHypotheses N] [--iterations N]');
    process.exit(2);
  }

  const config = loadAppConfig();
  const { store, orchestrator } = await createRuntime(config);
  let sessionId: string;
  if (args.sessionId) {
    const existing = await store.get(args.sessionId);
    if (!existing) throw new SessionNotFoundError(args.sessionId);
    assertLaunchable(existing);
    sessionId = existing.id;
  } else {
    sessionId = await store.create(args.topic ?? "", args.params);
  }
  console.log(`[runSession] Session ${sessionId}`);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("[runSession] Cancelling at next phase boundary...");
    controller.abort();
  });

  const outcome = await orchestrator.run(sessionId, { signal: controller.signal });
  if (outcome.status === "completed") {
    const { counts, discoveries, itemFailures } = outcome.result;
    console.log(
      `[runSession] Completed: ${counts.papers} papers, ${counts.hypotheses} hypotheses, ${discoveries.length} discoveries, ${itemFailures.length} item failures`
    );
    for (const d of discoveries) {
      console.log(`  ${d.hypothesisId} (${(d.confidence * 100).toFixed(0)}%): ${d.statement} [${d.formulas.join(", ")}]`);
    }
    if (outcome.resultLocation) console.log(`[runSession] Results: ${outcome.resultLocation}`);
  } else {
    console.error(`[runSession] Failed: ${outcome.error}`);
    process.exitCode = 1;
  }
  await closeDb();
}

main().catch((err) => {
  console.error("[runSession]", err instanceof Error ? err.message : err);
  process.exit(1);
});
