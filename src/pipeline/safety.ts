/**
 * SafetyGate: lightweight guardrails for inbound messages and model replies.
 *
 * - keep replies under the platform message limit (1800 chars, ellipsis appended)
 * - reduce prompt-injection patterns ("ignore previous instructions", "reveal prompt")
 *   in the text handed to the model
 * - drop empty replies so the caller can substitute a fallback line
 */

export interface SafetyGateConfig {
  /** Max characters of user text passed to the model (truncate beyond). */
  maxUserChars?: number;
  /** Max characters of a reply (truncate beyond, ellipsis appended). */
  maxAssistantChars?: number;
}

export interface SafetyResult {
  allowed: boolean;
  text: string;
  reason?: "empty" | "prompt_injection_redacted" | "truncated";
}

export const DEFAULT_MAX_USER_CHARS = 2000;
export const DEFAULT_MAX_ASSISTANT_CHARS = 1800;
export const ELLIPSIS = "…";

const INJECTION_PATTERNS = [
  /ignore (all )?(previous|prior|earlier|above) instructions/gi,
  /reveal (the |your )?(system prompt|prompt|instructions)/gi,
  /you are not an ai/gi,
];

export class SafetyGate {
  private readonly maxUserChars: number;
  private readonly maxAssistantChars: number;

  constructor(cfg: SafetyGateConfig = {}) {
    this.maxUserChars = cfg.maxUserChars ?? DEFAULT_MAX_USER_CHARS;
    this.maxAssistantChars = cfg.maxAssistantChars ?? DEFAULT_MAX_ASSISTANT_CHARS;
  }

  sanitizeUserMessage(text: string): SafetyResult {
    const trimmed = text.trim();
    if (!trimmed) return { allowed: false, text: "", reason: "empty" };

    const truncated = trimmed.length > this.maxUserChars ? trimmed.slice(0, this.maxUserChars) : trimmed;
    const cleaned = INJECTION_PATTERNS.reduce((acc, re) => acc.replace(re, "[redacted]"), truncated);
    if (cleaned !== truncated) {
      // Keep the rest of the message; only the injection phrase goes.
      return { allowed: true, text: cleaned, reason: "prompt_injection_redacted" };
    }
    return { allowed: true, text: truncated };
  }

  sanitizeAssistantReply(text: string): SafetyResult {
    const trimmed = text.trim();
    if (!trimmed) return { allowed: false, text: "", reason: "empty" };
    if (trimmed.length <= this.maxAssistantChars) return { allowed: true, text: trimmed };
    return {
      allowed: true,
      text: trimmed.slice(0, this.maxAssistantChars).trimEnd() + ELLIPSIS,
      reason: "truncated",
    };
  }
}
