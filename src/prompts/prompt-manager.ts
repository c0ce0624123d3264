import type { Message } from "../adapters/llm";
import { toChatMessages, type AssembledContext } from "../context/assembler";
import type { Turn } from "../memory/types";
import type { Persona } from "./persona";

export interface BuildPromptArgs {
  context: AssembledContext;
  trigger: Turn;
}

/**
 * PromptManager
 *
 * Centralizes how reply requests are built (persona, long-term summary, prior turns,
 * the message being answered) so the orchestrator only deals in context.
 */
export class PromptManager {
  constructor(private readonly persona: Persona) {}

  get characterName(): string {
    return this.persona.characterName;
  }

  buildMessages(args: BuildPromptArgs): Message[] {
    const system: Message[] = [{ role: "system", content: this.persona.systemPrompt }];
    const summary = args.context.summary.trim();
    if (summary) {
      system.push({
        role: "system",
        content: `Long-term memory of this conversation (background facts, do not recite):\n${summary}`,
      });
    }
    if (args.context.deepHistory) {
      system.push({
        role: "system",
        content: "The user is asking about earlier messages. Answer from the conversation history when it covers the question.",
      });
    }
    return [...system, ...toChatMessages(args.context.turns), ...toChatMessages([args.trigger])];
  }
}
