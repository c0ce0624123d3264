/**
 * Orchestrator: coordinates inbound message -> memory -> context -> LLM -> (TTS) -> reply.
 * Messages are handled one at a time per scope and concurrently across scopes.
 * Memory failures never fail a reply; only a total generation failure is reported,
 * and only on the diagnostics side channel.
 */

import type { ILLM } from "../adapters/llm";
import type { ITTS, VoiceSettings } from "../adapters/tts";
import type { ContextAssembler } from "../context/assembler";
import { GenerationError } from "../gateway";
import type { CompactionScheduler } from "../memory/compaction";
import type { PersistentMemoryStore } from "../memory/persistent-store";
import type { RollingContextBuffer } from "../memory/rolling-buffer";
import { createScope, scopeKey } from "../memory/scope";
import type { ConversationScope, Turn, TurnRole } from "../memory/types";
import { incrementCounter, recordReplyMetrics } from "../metrics";
import type { ChatPlatform, InboundMessage, OutboundAudio, OutboundReply } from "../platform/types";
import type { PromptManager } from "../prompts/prompt-manager";
import type { RuntimeContext } from "../runtime/context";
import { replyTrigger } from "./reply-trigger";
import { SafetyGate } from "./safety";
import type { VoiceDecision, VoiceRouter } from "./voice-router";

export const EMPTY_REPLY_FALLBACK = "Hmm, I lost my train of thought there. Say that again?";
export const FORGET_COMMAND = "/forget";

export type HandleOutcome =
  | "ignored"
  | "recorded"
  | "replied"
  | "generation_failed"
  | "send_failed"
  | "cleared";

export interface VoiceProfile {
  voiceId: string;
  modelId?: string;
  outputFormat?: string;
  voiceSettings?: VoiceSettings;
}

export interface OrchestratorConfig {
  /** Channels to answer in; empty = all. */
  channelIds?: string[];
  /** Names that trigger a reply when sent alone (bot and character name). */
  triggerNames: string[];
  characterName: string;
  voice?: VoiceProfile;
  maxReplyTokens?: number;
}

export interface OrchestratorDeps {
  platform: ChatPlatform;
  llm: ILLM;
  tts: ITTS;
  buffer: RollingContextBuffer;
  memory: PersistentMemoryStore;
  assembler: ContextAssembler;
  prompts: PromptManager;
  runtime: RuntimeContext;
  compaction?: CompactionScheduler;
  voiceRouter?: VoiceRouter;
  safety?: SafetyGate;
}

export class Orchestrator {
  private readonly chains = new Map<string, Promise<HandleOutcome>>();
  private readonly safety: SafetyGate;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly config: OrchestratorConfig
  ) {
    this.safety = deps.safety ?? new SafetyGate();
  }

  /** Queue a message behind earlier ones from the same scope. */
  handleMessage(message: InboundMessage): Promise<HandleOutcome> {
    const scope = this.scopeFor(message);
    const key = scopeKey(scope);
    const previous = this.chains.get(key) ?? Promise.resolve<HandleOutcome>("ignored");
    const next = previous.then(
      () => this.process(message, scope),
      () => this.process(message, scope)
    );
    this.chains.set(key, next);
    const cleanup = (): void => {
      if (this.chains.get(key) === next) this.chains.delete(key);
    };
    void next.then(cleanup, cleanup);
    return next;
  }

  /** Resolves once every queued message has been handled. */
  async idle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.allSettled([...this.chains.values()]);
    }
  }

  private scopeFor(message: InboundMessage): ConversationScope {
    return createScope({
      botName: this.deps.runtime.botName,
      guildId: message.guildId,
      channelId: message.channelId,
      userId: message.authorId,
    });
  }

  private async process(message: InboundMessage, scope: ConversationScope): Promise<HandleOutcome> {
    const { platform, runtime } = this.deps;
    if (message.authorId === platform.selfId) return "ignored";
    const channels = this.config.channelIds ?? [];
    if (channels.length > 0 && !channels.includes(message.channelId)) return "ignored";

    if (!message.authorIsBot && message.content.trim().toLowerCase() === FORGET_COMMAND) {
      return this.forget(message, scope);
    }

    const userSafe = this.safety.sanitizeUserMessage(message.content);
    if (!userSafe.allowed) return "ignored";
    const role: TurnRole = message.authorIsBot ? "other_bot" : "user";
    const trigger: Turn = {
      turnId: message.id,
      role,
      speakerName: message.authorName,
      speakerId: message.authorId,
      content: userSafe.text,
      createdAt: message.createdAt,
    };
    await this.recordTurn(scope, trigger);

    if (message.authorIsBot) return "recorded";
    const reason = replyTrigger(message, this.config.triggerNames);
    if (!reason) return "recorded";

    const start = runtime.clock();
    const context = await this.deps.assembler.buildContext(scope, trigger, this.deps.buffer);
    const messages = this.deps.prompts.buildMessages({ context, trigger });

    const llmStart = Date.now();
    let replyText: string;
    let llmAttempts: number | undefined;
    try {
      const response = await this.deps.llm.chat(messages, { maxTokens: this.config.maxReplyTokens });
      replyText = response.text;
      llmAttempts = response.attempts;
    } catch (err) {
      incrementCounter("generationFailures");
      const detail = err instanceof GenerationError ? err.failure.kind : err instanceof Error ? err.name : "unknown";
      runtime.logger.error(
        { event: "LLM_FAILED", turnId: message.id, kind: detail, err: err instanceof Error ? err.message : String(err) },
        "Reply generation failed"
      );
      await this.reportDiagnostic(`[${runtime.botName}] Cannot generate replies right now (${detail}).`);
      return "generation_failed";
    }
    const llmLatencyMs = Date.now() - llmStart;

    const safe = this.safety.sanitizeAssistantReply(replyText);
    const text = safe.allowed ? safe.text : EMPTY_REPLY_FALLBACK;
    if (!safe.allowed) {
      runtime.logger.warn({ event: "EMPTY_REPLY", turnId: message.id }, "Model returned no usable text; using fallback");
    }

    const decision: VoiceDecision = this.deps.voiceRouter
      ? this.deps.voiceRouter.decide(message.channelId, message.content, text)
      : { mode: "text", reason: "voice_disabled" };
    const ttsStart = Date.now();
    const audio = decision.mode === "voice" ? await this.synthesize(text, message.id) : undefined;
    const ttsLatencyMs = decision.mode === "voice" ? Date.now() - ttsStart : undefined;

    const sentId = await this.trySend({ channelId: message.channelId, text, audio, replyToId: message.id });
    if (sentId === undefined) return "send_failed";
    if (audio) this.deps.voiceRouter?.markVoiceSent(message.channelId);

    await this.recordTurn(scope, {
      turnId: sentId,
      role: "assistant",
      speakerName: this.config.characterName,
      speakerId: platform.selfId,
      content: text,
      createdAt: runtime.clock(),
    });

    recordReplyMetrics({
      contextTurns: context.turns.length,
      deepHistory: context.deepHistory,
      llmLatencyMs,
      llmAttempts,
      ttsLatencyMs,
      totalLatencyMs: runtime.clock() - start,
      sendMode: audio ? "voice" : "text",
      sendReason: audio ? decision.reason : decision.mode === "voice" ? "speech_failed" : decision.reason,
      turnId: message.id,
      replyChars: text.length,
    });
    return "replied";
  }

  /** Buffer, then store (best-effort), then let compaction decide. */
  private async recordTurn(scope: ConversationScope, turn: Turn): Promise<void> {
    const { buffer, memory, compaction, runtime } = this.deps;
    buffer.append(scope, turn);
    const stored = await memory.append(scope, turn);
    if (!stored.ok) {
      incrementCounter("appendFailures");
      runtime.logger.warn(
        { event: "MEMORY_APPEND_FAILED", turnId: turn.turnId, err: stored.error.message },
        "Turn not persisted; continuing"
      );
      return;
    }
    if (compaction?.notifyAppend(scope) === "queued") incrementCounter("compactionsQueued");
  }

  private async synthesize(text: string, turnId: string): Promise<OutboundAudio | undefined> {
    const voice = this.config.voice;
    if (!voice) return undefined;
    try {
      const data = await this.deps.tts.synthesize({
        voiceId: voice.voiceId,
        text,
        modelId: voice.modelId,
        outputFormat: voice.outputFormat,
        voiceSettings: voice.voiceSettings,
      });
      if (data.length === 0) return undefined;
      const ext = (voice.outputFormat ?? "mp3").split("_")[0] || "mp3";
      return { data, filename: `reply-${turnId}.${ext}` };
    } catch (err) {
      this.deps.runtime.logger.warn(
        { event: "TTS_FAILED", turnId, err: err instanceof Error ? err.message : String(err) },
        "Speech synthesis failed; sending text"
      );
      return undefined;
    }
  }

  private async forget(message: InboundMessage, scope: ConversationScope): Promise<HandleOutcome> {
    const { buffer, memory, runtime } = this.deps;
    buffer.clear(scope);
    const cleared = await memory.clearMemory(scope, message.id);
    if (!cleared.ok) {
      runtime.logger.warn({ event: "MEMORY_CLEAR_FAILED", err: cleared.error.message }, "Scope clear failed");
      await this.reportDiagnostic(`[${runtime.botName}] Memory clear failed for channel ${message.channelId}.`);
    }
    const sentId = await this.trySend({
      channelId: message.channelId,
      text: cleared.ok ? "Okay, I've forgotten our conversation so far." : "I couldn't clear my memory just now.",
      replyToId: message.id,
    });
    return sentId === undefined ? "send_failed" : "cleared";
  }

  /** Resolves undefined when the platform could not deliver the reply. */
  private async trySend(reply: OutboundReply): Promise<string | undefined> {
    try {
      return await this.deps.platform.send(reply);
    } catch (err) {
      const { runtime } = this.deps;
      runtime.logger.error(
        { event: "SEND_FAILED", turnId: reply.replyToId, err: err instanceof Error ? err.message : String(err) },
        "Reply not delivered"
      );
      await this.reportDiagnostic(`[${runtime.botName}] Reply to ${reply.replyToId ?? "?"} not delivered in channel ${reply.channelId}.`);
      return undefined;
    }
  }

  private async reportDiagnostic(text: string): Promise<void> {
    try {
      await this.deps.platform.sendDiagnostic(text);
    } catch (err) {
      this.deps.runtime.logger.error(
        { event: "DIAGNOSTIC_SEND_FAILED", err: err instanceof Error ? err.message : String(err) },
        "Diagnostic message not delivered"
      );
    }
  }
}
