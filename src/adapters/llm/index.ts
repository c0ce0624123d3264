/**
 * LLM adapter factory: returns implementation based on config.
 */

import type { Logger } from "pino";
import type { AppConfig } from "../../config";
import type { ModelOverrideSource } from "../../runtime/context";
import type { ILLM, KeySource } from "./types";
import { StubLLM } from "./stub";
import { OllamaLLM } from "./ollama";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, MessageRole, ChatOptions, ChatResponse, KeySource } from "./types";
export { StubLLM } from "./stub";
export { OllamaLLM, extractReplyContent, DEFAULT_OLLAMA_API_URL } from "./ollama";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

export interface LlmDeps {
  /** Keys for the selected provider; defaults to the env keys from config. */
  keys?: KeySource;
  modelOverride?: ModelOverrideSource;
  logger?: Logger;
}

export function createLLM(config: AppConfig, deps: LlmDeps = {}): ILLM {
  const { provider, model, ollamaApiUrl, openaiBaseUrl, envKeys, timeoutMs, maxTokens } = config.llm;
  const base = {
    keys: deps.keys ?? (async () => envKeys),
    model,
    modelOverride: deps.modelOverride,
    timeoutMs,
    maxTokens,
    logger: deps.logger,
  };
  switch (provider) {
    case "ollama":
      return new OllamaLLM({ ...base, apiUrl: ollamaApiUrl });
    case "openai":
      return new OpenAILLM({ ...base, baseURL: openaiBaseUrl });
    case "anthropic":
      return new AnthropicLLM(base);
    case "stub":
      return new StubLLM();
  }
}
