/**
 * Anthropic executor using the Messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { LlmExecutor, LlmRequest, LlmResult } from "./types.js";

export class AnthropicExecutor implements LlmExecutor {
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    if (!apiKey || apiKey.trim() === "") {
      throw new Error("An API key is required for AnthropicExecutor.");
    }
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async execute(req: LlmRequest, signal?: AbortSignal): Promise<LlmResult> {
    const response = await this.client.messages.create(
      {
        model: req.model,
        max_tokens: req.maxTokens,
        temperature: req.temperature ?? 0.2,
        ...(req.system ? { system: req.system } : {}),
        messages: [{ role: "user", content: req.prompt }],
      },
      { signal }
    );

    const outputText = response.content
      .filter((block) => block.type === "text")
      .map((block) => ("text" in block ? block.text : ""))
      .join("");

    return {
      outputText,
      usage: {
        inputTokens: response.usage?.input_tokens,
        outputTokens: response.usage?.output_tokens,
      },
    };
  }
}
