/**
 * High-signal reply metrics. Logged per reply; the last values are kept for the
 * health server and tests.
 */

import { logger } from "../logging";

/** Last reply timing and shape. */
export interface ReplyMetrics {
  /** Prior turns sent with the request. */
  contextTurns?: number;
  deepHistory?: boolean;
  llmLatencyMs?: number;
  /** Keys tried for the successful generation call. */
  llmAttempts?: number;
  ttsLatencyMs?: number;
  /** Inbound message to reply sent (primary KPI). */
  totalLatencyMs?: number;
  sendMode?: "text" | "voice";
  /** Why the send mode was chosen. */
  sendReason?: string;
  /** Triggering message id for correlation. */
  turnId?: string;
  /** Approximate reply size. */
  replyChars?: number;
}

export interface MemoryCounters {
  appendFailures: number;
  compactionsQueued: number;
  generationFailures: number;
}

let lastReplyMetrics: ReplyMetrics = {};
const counters: MemoryCounters = { appendFailures: 0, compactionsQueued: 0, generationFailures: 0 };

export function recordReplyMetrics(metrics: ReplyMetrics): void {
  lastReplyMetrics = { ...lastReplyMetrics, ...metrics };
  logger.info(
    {
      event: "REPLY_METRICS",
      context_turns: metrics.contextTurns,
      deep_history: metrics.deepHistory,
      llm_latency_ms: metrics.llmLatencyMs,
      llm_attempts: metrics.llmAttempts,
      tts_latency_ms: metrics.ttsLatencyMs,
      total_latency_ms: metrics.totalLatencyMs,
      send_mode: metrics.sendMode,
      send_reason: metrics.sendReason,
      turn_id: metrics.turnId,
      reply_chars: metrics.replyChars,
    },
    "Reply latency"
  );
}

export function incrementCounter(name: keyof MemoryCounters, by = 1): void {
  counters[name] += by;
}

export function getLastReplyMetrics(): ReplyMetrics {
  return { ...lastReplyMetrics };
}

export function getCounters(): MemoryCounters {
  return { ...counters };
}

/** Test helper. */
export function resetMetrics(): void {
  lastReplyMetrics = {};
  counters.appendFailures = 0;
  counters.compactionsQueued = 0;
  counters.generationFailures = 0;
}
