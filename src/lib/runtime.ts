/**
 * Builds the process-wide pipeline objects from one AppConfig:
 * credential pool, guard, session store, collaborators and orchestrator.
 */

import { requireCredentials, type AppConfig } from "./config.js";
import { CredentialPool } from "./credentials/credentialPool.js";
import { ExecutionGuard } from "./execution/executionGuard.js";
import { Orchestrator } from "./pipeline/orchestrator.js";
import { FileResultWriter } from "./pipeline/resultWriter.js";
import { createResearchCollaborators, type Discovery, type Hypothesis, type Paper, type PaperAnalysis, type TestResult } from "./research/index.js";
import { createLlmExecutorFactory } from "./services/llm/index.js";
import { LlmClient } from "./services/llm/llmClient.js";
import { MaterialsClient } from "./services/materialsClient.js";
import { PapersClient } from "./services/papersClient.js";
import { createSessionStore } from "./sessions/storeFactory.js";
import type { SessionStore } from "./sessions/types.js";

export type ResearchOrchestrator = Orchestrator<Paper, PaperAnalysis, Hypothesis, TestResult, Discovery>;

export interface Runtime {
  config: AppConfig;
  pool: CredentialPool;
  guard: ExecutionGuard;
  store: SessionStore;
  orchestrator: ResearchOrchestrator;
}

/** Throws ConfigurationError when a required service has no credentials. */
export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const credentials = requireCredentials(config);
  const pool = CredentialPool.fromConfig(credentials, { cooldownMinutes: config.cooldownMinutes });
  const guard = new ExecutionGuard(pool, { ...config.retry, requestsPerSecond: config.requestsPerSecond });
  const store = await createSessionStore(config);

  const collaborators = createResearchCollaborators({
    papers: new PapersClient(config.endpoints.papersBaseURL),
    llm: new LlmClient(config.llm, createLlmExecutorFactory(config.llm)),
    materials: new MaterialsClient(config.endpoints.materialsBaseURL),
  });
  const orchestrator: ResearchOrchestrator = new Orchestrator(collaborators, {
    store,
    guard,
    concurrency: config.batchConcurrency,
    resultWriter: new FileResultWriter<Discovery>(config.dataDir),
  });

  return { config, pool, guard, store, orchestrator };
}
