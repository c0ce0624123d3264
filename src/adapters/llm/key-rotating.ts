/**
 * Shared plumbing for remote LLM adapters: fresh keys and model per call,
 * key rotation through the gateway, and call logging.
 */

import type { Logger } from "pino";
import { executeWithKeyRotation, GenerationError } from "../../gateway";
import { logger as rootLogger, logLlmCall } from "../../logging";
import type { ModelOverrideSource } from "../../runtime/context";
import type { ChatOptions, ChatResponse, ILLM, KeySource, Message } from "./types";

export interface KeyRotatingLlmConfig {
  keys: KeySource;
  /** Default model when neither the call nor the runtime override names one. */
  model: string;
  modelOverride?: ModelOverrideSource;
  timeoutMs?: number;
  /** Default max tokens per reply. */
  maxTokens?: number;
  logger?: Logger;
}

export abstract class KeyRotatingLLM implements ILLM {
  protected readonly log: Logger;

  protected constructor(
    protected readonly provider: string,
    protected readonly cfg: KeyRotatingLlmConfig
  ) {
    this.log = cfg.logger ?? rootLogger;
  }

  /** One provider call with one key. Throws ProviderError (or the SDK's error) on failure. */
  protected abstract complete(
    apiKey: string,
    model: string,
    messages: Message[],
    maxTokens: number | undefined,
    signal: AbortSignal
  ): Promise<string>;

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const start = Date.now();
    const model = options?.model ?? (await this.resolveModel());
    const maxTokens = options?.maxTokens ?? this.cfg.maxTokens;
    const keys = await this.cfg.keys();
    const result = await executeWithKeyRotation(
      keys,
      (apiKey, signal) => this.complete(apiKey, model, messages, maxTokens, signal),
      { provider: this.provider, timeoutMs: this.cfg.timeoutMs, logger: this.log }
    );
    if (!result.ok) {
      throw new GenerationError(result.failure);
    }
    const text = result.value.trim();
    logLlmCall(this.log, this.provider, messages.length, text.length, Date.now() - start, result.attempts);
    return { text, model, attempts: result.attempts };
  }

  private async resolveModel(): Promise<string> {
    if (!this.cfg.modelOverride) return this.cfg.model;
    try {
      const override = await this.cfg.modelOverride.getModelOverride();
      return override?.trim() || this.cfg.model;
    } catch (err) {
      this.log.warn(
        { event: "MODEL_OVERRIDE_READ_FAILED", provider: this.provider, err: err instanceof Error ? err.message : String(err) },
        "Model override unavailable; using default model"
      );
      return this.cfg.model;
    }
  }
}
