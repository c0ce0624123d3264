/**
 * Ollama chat API adapter (hosted or self-hosted), bearer-key authenticated.
 * POST {apiUrl} { model, messages, stream: false }
 */

import { z } from "zod";
import { ProviderError } from "../../gateway";
import { KeyRotatingLLM, type KeyRotatingLlmConfig } from "./key-rotating";
import type { Message } from "./types";

export const DEFAULT_OLLAMA_API_URL = "https://ollama.com/api/chat";

export interface OllamaLlmConfig extends KeyRotatingLlmConfig {
  apiUrl?: string;
}

const contentField = z.object({ content: z.string() });

const replySchema = z.union([
  z.object({ message: contentField }),
  contentField,
  z.object({ choices: z.array(z.object({ message: contentField })).nonempty() }),
]);

/** Reply text from the native schema, a flat { content }, or an OpenAI-style choices list. */
export function extractReplyContent(data: unknown): string {
  const parsed = replySchema.safeParse(data);
  if (!parsed.success) return "";
  const body = parsed.data;
  if ("message" in body) return body.message.content;
  if ("choices" in body) return body.choices[0].message.content;
  return body.content;
}

export class OllamaLLM extends KeyRotatingLLM {
  private readonly apiUrl: string;

  constructor(cfg: OllamaLlmConfig) {
    super("ollama", cfg);
    this.apiUrl = cfg.apiUrl ?? DEFAULT_OLLAMA_API_URL;
  }

  protected async complete(
    apiKey: string,
    model: string,
    messages: Message[],
    maxTokens: number | undefined,
    signal: AbortSignal
  ): Promise<string> {
    const body: Record<string, unknown> = {
      model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      stream: false,
    };
    if (maxTokens !== undefined) body.options = { num_predict: maxTokens };

    const res = await fetch(this.apiUrl, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal,
    });
    if (!res.ok) {
      throw ProviderError.fromStatus(res.status, await res.text());
    }
    const data: unknown = await res.json();
    return extractReplyContent(data);
  }
}
