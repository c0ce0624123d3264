/**
 * OpenAI Chat Completions LLM adapter.
 * A client is built per key; SDK retries are off so the gateway owns failover.
 */

import OpenAI from "openai";
import { ProviderError } from "../../gateway";
import { KeyRotatingLLM, type KeyRotatingLlmConfig } from "./key-rotating";
import type { Message } from "./types";

export interface OpenAILlmConfig extends KeyRotatingLlmConfig {
  /** Optional OpenAI-compatible endpoint. */
  baseURL?: string;
}

function toProviderError(err: unknown): unknown {
  if (err instanceof OpenAI.APIUserAbortError || err instanceof OpenAI.APIConnectionError) {
    return new ProviderError(err.message, "transport_error");
  }
  if (err instanceof OpenAI.APIError && typeof err.status === "number") {
    return ProviderError.fromStatus(err.status, err.message);
  }
  return err;
}

export class OpenAILLM extends KeyRotatingLLM {
  constructor(private readonly openaiCfg: OpenAILlmConfig) {
    super("openai", openaiCfg);
  }

  protected async complete(
    apiKey: string,
    model: string,
    messages: Message[],
    maxTokens: number | undefined,
    signal: AbortSignal
  ): Promise<string> {
    const client = new OpenAI({ apiKey, baseURL: this.openaiCfg.baseURL, maxRetries: 0 });
    try {
      const response = await client.chat.completions.create(
        {
          model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: maxTokens ?? 512,
          stream: false,
        },
        { signal }
      );
      return response.choices[0]?.message?.content ?? "";
    } catch (err) {
      throw toProviderError(err);
    }
  }
}
