/**
 * OpenAI-compatible executor (OpenAI, Groq) using the Chat Completions API.
 * SDK retries are off: the ExecutionGuard owns retry and key rotation.
 */

import OpenAI from "openai";
import type { LlmExecutor, LlmRequest, LlmResult } from "./types.js";

export class OpenAIExecutor implements LlmExecutor {
  private readonly client: OpenAI;

  constructor(apiKey: string, baseURL?: string) {
    if (!apiKey || apiKey.trim() === "") {
      throw new Error("An API key is required for OpenAIExecutor.");
    }
    this.client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
  }

  async execute(req: LlmRequest, signal?: AbortSignal): Promise<LlmResult> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (req.system) messages.push({ role: "system", content: req.system });
    messages.push({ role: "user", content: req.prompt });

    const response = await this.client.chat.completions.create(
      {
        model: req.model,
        messages,
        temperature: req.temperature ?? 0.2,
        max_tokens: req.maxTokens,
      },
      { signal }
    );

    return {
      outputText: response.choices[0]?.message?.content ?? "",
      usage: {
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
      },
    };
  }
}
