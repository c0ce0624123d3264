/**
 * When a bot answers: it is mentioned, the message replies to one of its messages,
 * or the message is nothing but its name ("Lynae!", "  lynae? ").
 */

export interface TriggerInput {
  content: string;
  mentionsBot: boolean;
  repliesToBot: boolean;
}

export type TriggerReason = "mention" | "reply" | "name";

/** Lowercase, strip surrounding punctuation and whitespace, collapse inner whitespace. */
export function normalizeNameTrigger(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/^[\s\W_]+|[\s\W_]+$/g, "")
    .replace(/\s+/g, " ");
}

export function replyTrigger(input: TriggerInput, names: readonly string[]): TriggerReason | undefined {
  if (input.mentionsBot) return "mention";
  if (input.repliesToBot) return "reply";
  const content = normalizeNameTrigger(input.content);
  if (content && names.some((n) => normalizeNameTrigger(n) === content)) return "name";
  return undefined;
}
