/**
 * Scope identity: deterministic document ids namespaced by bot so no two bots' scopes collide.
 * Format: {prefix}{botKey}_{guildId}_{channelId}_{userId}
 */

import type { ConversationScope } from "./types";

export const DEFAULT_MEMORY_PREFIX = "channel_memory_";

export function sanitizeBotKey(value: string): string {
  const t = value
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_-]/g, "");
  return t || "bot";
}

export function createScope(args: { botName: string; guildId?: string; channelId: string; userId: string }): ConversationScope {
  return {
    botKey: sanitizeBotKey(args.botName),
    guildId: args.guildId?.trim() || "0",
    channelId: args.channelId,
    userId: args.userId,
  };
}

/** In-process key for per-scope maps (buffer, debounce, in-flight markers). */
export function scopeKey(scope: ConversationScope): string {
  return `${scope.botKey}_${scope.guildId}_${scope.channelId}_${scope.userId}`;
}

export function scopeDocId(scope: ConversationScope, prefix: string = DEFAULT_MEMORY_PREFIX): string {
  return `${prefix}${scopeKey(scope)}`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface ScopeFilter {
  botName?: string;
  guildId?: string;
  channelId?: string;
  userId?: string;
}

/**
 * Predicate over scope document ids. Unset filters match any value;
 * the bot key may itself contain underscores or hyphens.
 */
export function buildScopeMatcher(prefix: string, filter: ScopeFilter = {}): (docId: string) => boolean {
  const idPart = (v: string | undefined): string => (v && /^\d+$/.test(v) ? escapeRegExp(v) : "\\d+");
  const botPat = filter.botName ? escapeRegExp(sanitizeBotKey(filter.botName)) : "[-a-z0-9_]+";
  const rx = new RegExp(
    `^${escapeRegExp(prefix)}${botPat}_${idPart(filter.guildId)}_${idPart(filter.channelId)}_${idPart(filter.userId)}$`
  );
  return (docId) => rx.test(docId);
}
