/**
 * ContextAssembler: the ordered prior turns sent with a reply request.
 *
 * Sources, in order of authority: persisted window (store), in-process buffer,
 * platform history. Deep-history requests widen the persisted and platform
 * reads and pull in older turns that share keywords with the trigger.
 * Turns at or below the scope's cutoff are never returned.
 */

import type { Logger } from "pino";
import type { Message } from "../adapters/llm";
import type { PersistentMemoryStore } from "../memory/persistent-store";
import type { RollingContextBuffer } from "../memory/rolling-buffer";
import { compareTurnIds, isAfterCutoff } from "../memory/turn-id";
import type { ConversationScope, Turn, TurnId } from "../memory/types";
import type { RuntimeContext } from "../runtime/context";
import { extractKeywords, isDeepHistoryRequest, keywordScore } from "./keywords";

export const MAX_CONTEXT = 60;
export const DESIRED_DEPTH = 20;
export const STORE_LIMIT = 40;
export const DEEP_STORE_LIMIT = 160;
export const HISTORY_LIMIT = 60;
export const DEEP_HISTORY_LIMIT = 200;
export const MIN_RANKED = 10;

/** Platform history, ascending by id. Best-effort: may return fewer turns or throw. */
export interface HistoryFetcher {
  fetchHistory(channelId: string, beforeTurnId: TurnId, limit: number): Promise<Turn[]>;
}

export interface AssembledContext {
  /** Oldest to newest, at most MAX_CONTEXT. */
  turns: Turn[];
  summary: string;
  deepHistory: boolean;
  cutoffTurnId?: TurnId;
}

export interface ContextAssemblerOptions {
  history?: HistoryFetcher;
  maxContext?: number;
  desiredDepth?: number;
}

function chronological(turns: Turn[]): Turn[] {
  return [...turns].sort((a, b) => compareTurnIds(a.turnId, b.turnId));
}

/** Keep the first occurrence of each (role, content) pair and of each turn id. */
export function dedupeTurns(turns: Turn[]): Turn[] {
  const seenPairs = new Set<string>();
  const seenIds = new Set<string>();
  const out: Turn[] = [];
  for (const t of turns) {
    const pair = `${t.role}\u0000${t.content}`;
    if (seenPairs.has(pair) || seenIds.has(t.turnId)) continue;
    seenPairs.add(pair);
    seenIds.add(t.turnId);
    out.push(t);
  }
  return out;
}

/**
 * Own turns become assistant messages; everything else is user-side.
 * Other bots are labelled with their name so personas stay apart.
 */
export function toChatMessages(turns: Turn[]): Message[] {
  return turns.map((t): Message => {
    if (t.role === "assistant") return { role: "assistant", content: t.content };
    if (t.role === "other_bot") return { role: "user", content: `${t.speakerName || "Another bot"}: ${t.content}` };
    return { role: "user", content: t.content };
  });
}

export class ContextAssembler {
  private readonly history?: HistoryFetcher;
  private readonly maxContext: number;
  private readonly desiredDepth: number;
  private readonly log: Logger;

  constructor(
    private readonly memory: PersistentMemoryStore,
    runtime: RuntimeContext,
    options: ContextAssemblerOptions = {}
  ) {
    this.history = options.history;
    this.maxContext = options.maxContext ?? MAX_CONTEXT;
    this.desiredDepth = options.desiredDepth ?? DESIRED_DEPTH;
    this.log = runtime.logger;
  }

  async buildContext(scope: ConversationScope, trigger: Turn, buffer: RollingContextBuffer): Promise<AssembledContext> {
    const deep = isDeepHistoryRequest(trigger.content);
    const depth = this.desiredDepth;
    const beforeTrigger = (t: Turn): boolean => compareTurnIds(t.turnId, trigger.turnId) < 0;

    let context = buffer.snapshot(scope, { excludeLatest: true }).filter(beforeTrigger).slice(-depth);
    let summary = "";
    let cutoff: TurnId | undefined;

    const mem = await this.memory.getMemory(scope, deep ? DEEP_STORE_LIMIT : STORE_LIMIT);
    if (!mem.ok) {
      this.log.warn({ event: "CONTEXT_STORE_UNAVAILABLE", err: mem.error.message }, "Using in-process context only");
    } else if (mem.value) {
      summary = mem.value.summary;
      cutoff = mem.value.cutoffTurnId;
      const persisted = mem.value.recentTurns.filter((t) => beforeTrigger(t) && isAfterCutoff(t.turnId, cutoff));
      context = persisted.length > 0 ? persisted : context.filter((t) => isAfterCutoff(t.turnId, cutoff));
    }

    let pool = context;
    if (this.history && (deep || context.length < depth)) {
      const fetched = await this.fetchHistory(scope, trigger, deep ? DEEP_HISTORY_LIMIT : HISTORY_LIMIT);
      const usable = fetched.filter((t) => beforeTrigger(t) && isAfterCutoff(t.turnId, cutoff) && t.content.trim() !== "");
      pool = dedupeTurns(chronological([...context, ...usable]));
    }

    const merged = deep ? this.rankWithRecent(dedupeTurns(chronological(pool)), trigger, depth) : pool;
    const turns = dedupeTurns(merged).slice(-this.maxContext);

    this.log.debug(
      { event: "CONTEXT_BUILT", deepHistory: deep, turns: turns.length, hasSummary: summary.length > 0 },
      "Context assembled"
    );
    return { turns, summary, deepHistory: deep, cutoffTurnId: cutoff };
  }

  /**
   * Most recent `depth` turns, preceded by the best-matching older turns
   * (score > 0, ties to the earlier turn), all in chronological order.
   */
  private rankWithRecent(pool: Turn[], trigger: Turn, depth: number): Turn[] {
    const recentStart = Math.max(0, pool.length - depth);
    const older = pool.slice(0, recentStart);
    const recent = pool.slice(recentStart);
    const keywords = extractKeywords(trigger.content);
    const picked = older
      .map((turn, index) => ({ turn, index, score: keywordScore(turn.content, keywords) }))
      .filter((r) => r.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, Math.max(MIN_RANKED, depth))
      .sort((a, b) => a.index - b.index)
      .map((r) => r.turn);
    return [...picked, ...recent];
  }

  private async fetchHistory(scope: ConversationScope, trigger: Turn, limit: number): Promise<Turn[]> {
    if (!this.history) return [];
    try {
      return await this.history.fetchHistory(scope.channelId, trigger.turnId, limit);
    } catch (err) {
      this.log.warn(
        { event: "HISTORY_FETCH_FAILED", err: err instanceof Error ? err.message : String(err) },
        "Platform history unavailable"
      );
      return [];
    }
  }
}
