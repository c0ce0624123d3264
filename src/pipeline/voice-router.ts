/**
 * Decides whether a reply goes out as text or as a short voice clip.
 * Guardrails first (enabled, voice configured, short, no code or links), then:
 * explicit text request → text; explicit voice request → voice;
 * otherwise voice only outside the cooldown and when the random roll falls under
 * the fun probability.
 */

import type { Clock } from "../runtime/context";

export type SendMode = "text" | "voice";

export type VoiceReason =
  | "voice_disabled"
  | "no_voice_model"
  | "empty_reply"
  | "too_long"
  | "code_or_link"
  | "user_requested_text"
  | "user_requested_voice"
  | "cooldown"
  | "fun_roll"
  | "default_text";

export interface VoiceDecision {
  mode: SendMode;
  reason: VoiceReason;
}

export interface VoiceRouterConfig {
  enabled: boolean;
  voiceConfigured: boolean;
  maxChars: number;
  cooldownMs: number;
  funProbability: number;
  clock?: Clock;
  /** Uniform in [0, 1). */
  random?: () => number;
}

const TEXT_REQUESTS = ["text", "type it", "write it", "no voice", "don't use voice", "dont use voice", "no audio"];
const VOICE_REQUESTS = [
  "voice",
  "say it",
  "say this",
  "read this",
  "read it",
  "speak",
  "talk",
  "send a voice",
  "voice message",
];

function wordsMatch(text: string, phrases: readonly string[]): boolean {
  const t = text.toLowerCase().replace(/[‘’]/g, "'");
  return phrases.some((p) => new RegExp(`\\b${p.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\b`).test(t));
}

export function wantsText(userMessage: string): boolean {
  return wordsMatch(userMessage, TEXT_REQUESTS);
}

export function wantsVoice(userMessage: string): boolean {
  return wordsMatch(userMessage, VOICE_REQUESTS);
}

export function containsCodeOrLinks(text: string): boolean {
  return text.includes("```") || /https?:\/\/\S+/i.test(text);
}

export class VoiceRouter {
  private readonly clock: Clock;
  private readonly random: () => number;
  /** Last voice reply per channel. */
  private readonly lastVoiceAt = new Map<string, number>();

  constructor(private readonly cfg: VoiceRouterConfig) {
    this.clock = cfg.clock ?? Date.now;
    this.random = cfg.random ?? Math.random;
  }

  decide(channelId: string, userMessage: string, reply: string): VoiceDecision {
    const guard = this.guardrail(reply);
    if (guard) return { mode: "text", reason: guard };
    if (wantsText(userMessage)) return { mode: "text", reason: "user_requested_text" };
    if (wantsVoice(userMessage)) return { mode: "voice", reason: "user_requested_voice" };

    const last = this.lastVoiceAt.get(channelId);
    if (last !== undefined && this.clock() - last < this.cfg.cooldownMs) return { mode: "text", reason: "cooldown" };
    if (this.random() < this.cfg.funProbability) return { mode: "voice", reason: "fun_roll" };
    return { mode: "text", reason: "default_text" };
  }

  /** Record a voice reply that was actually sent (starts the cooldown). */
  markVoiceSent(channelId: string): void {
    this.lastVoiceAt.set(channelId, this.clock());
  }

  private guardrail(reply: string): VoiceReason | undefined {
    if (!this.cfg.enabled) return "voice_disabled";
    if (!this.cfg.voiceConfigured) return "no_voice_model";
    const t = reply.trim();
    if (!t) return "empty_reply";
    if (t.length > this.cfg.maxChars) return "too_long";
    if (containsCodeOrLinks(t)) return "code_or_link";
    return undefined;
  }
}
