/**
 * Memory compaction: once a scope holds too many persisted turns, summarize them
 * into the scope summary and keep only the newest tail.
 *
 * Runs on the background queue so it never blocks a reply. One pass per scope at a
 * time (in-flight marker), and at most one attempt per debounce window.
 */

import type { ILLM, Message } from "../adapters/llm";
import { logCompaction } from "../logging";
import type { RuntimeContext } from "../runtime/context";
import type { PersistentMemoryStore } from "./persistent-store";
import { scopeKey } from "./scope";
import type { BackgroundTaskQueue } from "./task-queue";
import { isAfterCutoff } from "./turn-id";
import type { ConversationScope, Turn } from "./types";

export const COMPACTION_DEBOUNCE_MS = 75_000;
export const SUMMARY_TRIGGER = 220;
export const ID_SCAN_LIMIT = 500;
export const SUMMARIZE_LIMIT = 220;
export const KEEP_LAST = 60;
export const SUMMARY_MAX_CHARS = 2500;

const SUMMARIZER_SYSTEM_PROMPT = [
  "You maintain a long-term memory summary of a chat conversation.",
  "Write a factual, concise summary: who is involved, topics discussed, facts and preferences people stated, open questions and commitments.",
  "Do not imitate any character, persona or writing style. Plain neutral prose or short bullets.",
  "Leave out sensitive data: passwords, keys, tokens, addresses, phone numbers, payment details.",
  `Keep the whole summary under ${SUMMARY_MAX_CHARS} characters. No preamble.`,
].join("\n");

export type CompactionDecision = "queued" | "debounced" | "in_flight" | "rejected";

export type CompactionStage = "evaluating" | "summarizing" | "compacting";

export type CompactionOutcome =
  | { status: "skipped"; turnCount: number }
  | { status: "compacted"; kept: number; deleted: number; failedDeletes: number; summaryLength: number }
  | { status: "failed"; stage: CompactionStage; reason: string };

export interface CompactionConfig {
  debounceMs?: number;
  summaryTrigger?: number;
  keepLast?: number;
  summaryMaxChars?: number;
}

function clampSummary(text: string, maxChars: number): string {
  const t = text.trim();
  return t.length > maxChars ? t.slice(0, maxChars).trimEnd() : t;
}

function transcriptLine(turn: Turn, botName: string): string {
  const speaker = turn.role === "assistant" ? botName : turn.speakerName || turn.role;
  return `${speaker}: ${turn.content}`;
}

/** Summarizer request: existing summary plus the turns to fold in. */
export function buildSummaryMessages(existingSummary: string, turns: Turn[], botName: string): Message[] {
  const transcript = turns.map((t) => transcriptLine(t, botName)).join("\n");
  const user = existingSummary.trim()
    ? `Existing summary:\n${existingSummary.trim()}\n\nNew messages:\n${transcript}\n\nUpdate the summary.`
    : `Messages:\n${transcript}\n\nWrite the summary.`;
  return [
    { role: "system", content: SUMMARIZER_SYSTEM_PROMPT },
    { role: "user", content: user },
  ];
}

export class CompactionScheduler {
  private readonly debounceMs: number;
  private readonly summaryTrigger: number;
  private readonly keepLast: number;
  private readonly summaryMaxChars: number;

  constructor(
    private readonly memory: PersistentMemoryStore,
    private readonly llm: ILLM,
    private readonly queue: BackgroundTaskQueue,
    private readonly runtime: RuntimeContext,
    config: CompactionConfig = {}
  ) {
    this.debounceMs = config.debounceMs ?? COMPACTION_DEBOUNCE_MS;
    this.summaryTrigger = config.summaryTrigger ?? SUMMARY_TRIGGER;
    this.keepLast = config.keepLast ?? KEEP_LAST;
    this.summaryMaxChars = config.summaryMaxChars ?? SUMMARY_MAX_CHARS;
  }

  /** Called after every append. Never blocks on the pass itself. */
  notifyAppend(scope: ConversationScope): CompactionDecision {
    const key = scopeKey(scope);
    const { lastAttemptAt, inFlight } = this.runtime.compaction;
    if (inFlight.has(key)) return "in_flight";
    const now = this.runtime.clock();
    const last = lastAttemptAt.get(key);
    if (last !== undefined && now - last < this.debounceMs) return "debounced";

    this.pruneAttempts(now);
    lastAttemptAt.set(key, now);
    inFlight.add(key);
    const accepted = this.queue.enqueue(`compaction:${key}`, async () => {
      try {
        await this.evaluate(scope);
      } finally {
        inFlight.delete(key);
      }
    });
    if (!accepted) {
      inFlight.delete(key);
      return "rejected";
    }
    return "queued";
  }

  /** Drop debounce stamps that no longer hold anything back. */
  private pruneAttempts(now: number): void {
    const { lastAttemptAt, inFlight } = this.runtime.compaction;
    for (const [key, at] of lastAttemptAt) {
      if (now - at >= this.debounceMs && !inFlight.has(key)) lastAttemptAt.delete(key);
    }
  }

  /** One full pass for a scope. Never throws; every failure becomes a "failed" outcome. */
  async evaluate(scope: ConversationScope): Promise<CompactionOutcome> {
    const outcome = await this.runPass(scope);
    const details: Record<string, unknown> =
      outcome.status === "failed"
        ? { stage: outcome.stage, reason: outcome.reason }
        : outcome.status === "skipped"
          ? { turnCount: outcome.turnCount }
          : { kept: outcome.kept, deleted: outcome.deleted, failedDeletes: outcome.failedDeletes };
    const log = this.runtime.logger;
    if (outcome.status === "failed") {
      log.warn({ event: "COMPACTION_FAILED", scopeId: this.memory.docIdFor(scope), ...details }, "Compaction failed");
    } else {
      logCompaction(log, this.memory.docIdFor(scope), outcome.status, details);
    }
    return outcome;
  }

  private async runPass(scope: ConversationScope): Promise<CompactionOutcome> {
    const ids = await this.memory.listRecentTurnIds(scope, ID_SCAN_LIMIT);
    if (!ids.ok) return { status: "failed", stage: "evaluating", reason: ids.error.message };
    if (ids.value.length < this.summaryTrigger) return { status: "skipped", turnCount: ids.value.length };

    const mem = await this.memory.getMemory(scope, SUMMARIZE_LIMIT);
    if (!mem.ok) return { status: "failed", stage: "summarizing", reason: mem.error.message };
    if (!mem.value) return { status: "failed", stage: "summarizing", reason: "scope document missing" };
    const cutoff = mem.value.cutoffTurnId;
    const turns = mem.value.recentTurns.filter((t) => isAfterCutoff(t.turnId, cutoff));
    if (turns.length === 0) return { status: "skipped", turnCount: 0 };

    let summary: string;
    try {
      const response = await this.llm.chat(buildSummaryMessages(mem.value.summary, turns, this.runtime.botName), {
        maxTokens: 900,
      });
      summary = clampSummary(response.text, this.summaryMaxChars);
    } catch (err) {
      return { status: "failed", stage: "summarizing", reason: err instanceof Error ? err.message : String(err) };
    }
    if (!summary) return { status: "failed", stage: "summarizing", reason: "empty summary" };

    const keep = ids.value.slice(-this.keepLast);
    const result = await this.memory.setSummaryAndCompact(scope, summary, keep);
    if (!result.ok) return { status: "failed", stage: "compacting", reason: result.error.message };
    return {
      status: "compacted",
      kept: keep.length,
      deleted: result.value.deleted,
      failedDeletes: result.value.failedDeletes,
      summaryLength: summary.length,
    };
  }
}
