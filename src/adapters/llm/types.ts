/**
 * LLM (text generation) adapter types.
 * Implementations can be swapped via config (Ollama chat API, OpenAI, Anthropic, stub).
 */

export type MessageRole = "system" | "user" | "assistant";

export interface Message {
  role: MessageRole;
  content: string;
}

export interface ChatOptions {
  /** Upper bound on generated tokens (provider-specific default when unset). */
  maxTokens?: number;
  /** Model for this call; wins over the runtime override and the configured default. */
  model?: string;
}

export interface ChatResponse {
  text: string;
  /** Model that produced the reply. */
  model?: string;
  /** Number of keys tried, including the successful one. */
  attempts?: number;
}

/**
 * Chat completion. Adapters backed by a remote provider throw GenerationError
 * once every configured key has failed or the request was rejected.
 */
export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

/** Ordered credentials, read fresh on every call. */
export type KeySource = () => Promise<string[]>;
