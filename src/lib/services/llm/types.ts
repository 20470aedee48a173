/**
 * Language-model execution abstraction. Executors throw on failure so the
 * ExecutionGuard can classify the error (SDK errors carry an HTTP status).
 */

export interface LlmRequest {
  model: string;
  prompt: string;
  system?: string;
  maxTokens: number;
  temperature?: number;
}

export interface LlmResult {
  outputText: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
  };
}

export interface LlmExecutor {
  execute(req: LlmRequest, signal?: AbortSignal): Promise<LlmResult>;
}

/** Builds an executor bound to one credential secret. */
export type LlmExecutorFactory = (apiKey: string) => LlmExecutor;
