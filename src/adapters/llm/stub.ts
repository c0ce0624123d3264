/**
 * Stub LLM adapter for tests and local runs without a provider.
 * Replies with a fixed line, or echoes the last user message when no line is set.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  constructor(private readonly reply?: string) {}

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    if (this.reply !== undefined) return { text: this.reply, model: options?.model ?? "stub", attempts: 1 };
    const lastUser = [...messages].reverse().find((m) => m.role === "user");
    return { text: lastUser ? `(stub) ${lastUser.content}` : "", model: options?.model ?? "stub", attempts: 1 };
  }
}
