/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import { ProviderError } from "../../gateway";
import { KeyRotatingLLM, type KeyRotatingLlmConfig } from "./key-rotating";
import type { Message } from "./types";

function toProviderError(err: unknown): unknown {
  if (err instanceof Anthropic.APIUserAbortError || err instanceof Anthropic.APIConnectionError) {
    return new ProviderError(err.message, "transport_error");
  }
  if (err instanceof Anthropic.APIError && typeof err.status === "number") {
    return ProviderError.fromStatus(err.status, err.message);
  }
  return err;
}

export class AnthropicLLM extends KeyRotatingLLM {
  constructor(cfg: KeyRotatingLlmConfig) {
    super("anthropic", cfg);
  }

  protected async complete(
    apiKey: string,
    model: string,
    messages: Message[],
    maxTokens: number | undefined,
    signal: AbortSignal
  ): Promise<string> {
    const client = new Anthropic({ apiKey, maxRetries: 0 });
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const msgs: Anthropic.MessageParam[] = [];
    for (const m of messages) {
      if (m.role === "user" || m.role === "assistant") msgs.push({ role: m.role, content: m.content });
    }
    try {
      const response = await client.messages.create(
        {
          model,
          max_tokens: maxTokens ?? 512,
          system: system || undefined,
          messages: msgs,
        },
        { signal }
      );
      const textBlock = response.content.find((b) => b.type === "text");
      return textBlock && textBlock.type === "text" ? textBlock.text : "";
    } catch (err) {
      throw toProviderError(err);
    }
  }
}
