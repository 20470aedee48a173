/**
 * Executor factory: one cached executor per credential secret for the configured provider.
 */

import type { LlmConfig } from "../../config.js";
import { AnthropicExecutor } from "./anthropicExecutor.js";
import { OpenAIExecutor } from "./openaiExecutor.js";
import type { LlmExecutor, LlmExecutorFactory } from "./types.js";

export function createLlmExecutorFactory(config: LlmConfig): LlmExecutorFactory {
  const cache = new Map<string, LlmExecutor>();
  return (apiKey) => {
    let executor = cache.get(apiKey);
    if (!executor) {
      executor = config.provider === "anthropic" ? new AnthropicExecutor(apiKey) : new OpenAIExecutor(apiKey, config.baseURL);
      cache.set(apiKey, executor);
    }
    return executor;
  };
}

export type { LlmExecutor, LlmExecutorFactory, LlmRequest, LlmResult } from "./types.js";
