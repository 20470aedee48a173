/**
 * Guarded model calls. Each attempt builds (or reuses) the executor for the
 * credential the guard selected; output parsing happens after the guarded call,
 * so malformed output never counts against a credential.
 */

import type { z } from "zod";
import type { LlmConfig } from "../../config.js";
import type { ExecutionGuard } from "../../execution/executionGuard.js";
import { JSON_ONLY_SYSTEM, parseJsonOutput } from "./jsonOutput.js";
import type { LlmExecutorFactory } from "./types.js";

export const LLM_SERVICE = "llm";

export interface CompleteArgs {
  prompt: string;
  system?: string;
  label?: string;
  temperature?: number;
}

export class LlmClient {
  constructor(
    private readonly config: LlmConfig,
    private readonly executorFor: LlmExecutorFactory
  ) {}

  async complete(guard: ExecutionGuard, args: CompleteArgs): Promise<string> {
    const result = await guard.execute(
      LLM_SERVICE,
      (credential, signal) =>
        this.executorFor(credential.secret).execute(
          {
            model: this.config.model,
            prompt: args.prompt,
            system: args.system,
            maxTokens: this.config.maxTokens,
            temperature: args.temperature,
          },
          signal
        ),
      { label: args.label }
    );
    return result.outputText;
  }

  /** Throws ValidationError when the output is not JSON matching schema. */
  async completeJson<S extends z.ZodTypeAny>(guard: ExecutionGuard, args: CompleteArgs & { schema: S }): Promise<z.infer<S>> {
    const system = args.system ? `${JSON_ONLY_SYSTEM}\n\n${args.system}` : JSON_ONLY_SYSTEM;
    const text = await this.complete(guard, { ...args, system });
    return parseJsonOutput(text, args.schema);
  }
}
