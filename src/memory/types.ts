/**
 * Conversation memory types.
 * A scope is one isolated memory stream; turns are the messages stored in it.
 */

/** Platform message id: non-negative decimal integer carried as a string (ids exceed 2^53). */
export type TurnId = string;

/**
 * assistant = this bot's own messages; other_bot = any other bot identity;
 * user = everyone else.
 */
export type TurnRole = "user" | "assistant" | "other_bot";

export interface Turn {
  turnId: TurnId;
  role: TurnRole;
  speakerName: string;
  speakerId?: string;
  /** Non-empty, trimmed. */
  content: string;
  /** Epoch ms. */
  createdAt: number;
}

export interface ConversationScope {
  /** Sanitized bot identity (see sanitizeBotKey). */
  botKey: string;
  /** "0" for direct messages. */
  guildId: string;
  channelId: string;
  userId: string;
}

export interface ScopeMemory {
  summary: string;
  /** Oldest to newest. */
  recentTurns: Turn[];
  /** Number of persisted turn records for the scope. */
  recentCount: number;
  /** Turns at or below this id are never valid context. */
  cutoffTurnId?: TurnId;
  /** Epoch ms of the last write to the scope, 0 when unknown. */
  updatedAt: number;
}

export interface CompactionResult {
  deleted: number;
  failedDeletes: number;
}

/** Store failure; the store never throws it, it is returned inside StoreResult. */
export class StoreUnavailableError extends Error {
  constructor(readonly operation: string, cause?: unknown) {
    super(`Memory store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "StoreUnavailableError";
  }
}

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StoreUnavailableError };

export function storeOk<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function storeFailed<T>(operation: string, cause: unknown): StoreResult<T> {
  return { ok: false, error: new StoreUnavailableError(operation, cause) };
}
