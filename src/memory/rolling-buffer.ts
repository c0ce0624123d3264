/**
 * In-process recency buffer: per-scope rolling transcript with a fixed capacity.
 * Volatile; the persistent store is the system of record.
 */

import type { ConversationScope, Turn, TurnId } from "./types";
import { scopeKey } from "./scope";
import { compareTurnIds } from "./turn-id";

export const DEFAULT_BUFFER_CAPACITY = 30;
export const DEFAULT_MAX_SCOPES = 1000;

export interface RollingBufferConfig {
  /** Max number of turns kept per scope. */
  capacity?: number;
  /** Scopes kept at once; the least recently written one is dropped first. */
  maxScopes?: number;
}

export interface SnapshotOptions {
  /** Leave out the most recently appended turn (usually the message being answered). */
  excludeLatest?: boolean;
  /** Return at most this many of the newest turns. */
  limit?: number;
}

export class RollingContextBuffer {
  private readonly scopes = new Map<string, Turn[]>();
  private readonly latest = new Map<string, TurnId>();
  readonly capacity: number;
  readonly maxScopes: number;

  constructor(config: RollingBufferConfig = {}) {
    this.capacity = Math.max(1, config.capacity ?? DEFAULT_BUFFER_CAPACITY);
    this.maxScopes = Math.max(1, config.maxScopes ?? DEFAULT_MAX_SCOPES);
  }

  append(scope: ConversationScope, turn: Turn): void {
    const content = turn.content.trim();
    if (!content) return;
    const key = scopeKey(scope);
    const turns = this.scopes.get(key) ?? [];
    const entry: Turn = { ...turn, content };
    const idx = turns.findIndex((t) => compareTurnIds(t.turnId, turn.turnId) === 0);
    if (idx >= 0) {
      turns[idx] = entry;
    } else {
      turns.push(entry);
      while (turns.length > this.capacity) {
        turns.shift();
      }
    }
    // Re-insert so map order runs from least to most recently written.
    this.scopes.delete(key);
    this.scopes.set(key, turns);
    this.latest.set(key, turn.turnId);
    for (const oldest of this.scopes.keys()) {
      if (this.scopes.size <= this.maxScopes) break;
      this.scopes.delete(oldest);
      this.latest.delete(oldest);
    }
  }

  snapshot(scope: ConversationScope, options: SnapshotOptions = {}): Turn[] {
    const key = scopeKey(scope);
    let turns = [...(this.scopes.get(key) ?? [])];
    const latestId = this.latest.get(key);
    if (options.excludeLatest && latestId !== undefined) {
      turns = turns.filter((t) => compareTurnIds(t.turnId, latestId) !== 0);
    }
    if (options.limit !== undefined) {
      turns = options.limit > 0 ? turns.slice(-options.limit) : [];
    }
    return turns;
  }

  clear(scope: ConversationScope): void {
    const key = scopeKey(scope);
    this.scopes.delete(key);
    this.latest.delete(key);
  }

  size(scope: ConversationScope): number {
    return this.scopes.get(scopeKey(scope))?.length ?? 0;
  }
}
