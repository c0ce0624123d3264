/**
 * Per-process runtime state, created once in main and passed to every component.
 * Tests build a fresh context per case instead of resetting module globals.
 */

import type { Logger } from "pino";
import { logger as rootLogger } from "../logging";

/** Epoch milliseconds. */
export type Clock = () => number;

/** Source of the process-wide model override; read on every generation call. */
export interface ModelOverrideSource {
  getModelOverride(): Promise<string | undefined>;
}

/** Per-scope compaction bookkeeping, keyed by scopeKey(). */
export interface CompactionState {
  lastAttemptAt: Map<string, number>;
  inFlight: Set<string>;
}

export interface RuntimeContext {
  botName: string;
  clock: Clock;
  logger: Logger;
  compaction: CompactionState;
  modelOverride?: ModelOverrideSource;
}

export function createRuntimeContext(args: {
  botName: string;
  clock?: Clock;
  logger?: Logger;
  modelOverride?: ModelOverrideSource;
}): RuntimeContext {
  return {
    botName: args.botName,
    clock: args.clock ?? Date.now,
    logger: args.logger ?? rootLogger.child({ bot: args.botName }),
    compaction: { lastAttemptAt: new Map(), inFlight: new Set() },
    modelOverride: args.modelOverride,
  };
}
