/**
 * Durable per-scope memory: a summary document plus a sub-collection of turn records.
 *
 *   {collection}/{prefix}{botKey}_{guild}_{channel}_{user}
 *     summary, recent_count, cutoff_turn_id, updated_at, ...
 *   {collection}/{scopeDocId}/recent_messages/{turnId}
 *     v, turn_id, order_key, role, speaker_name, content, created_at
 *
 * Every operation returns a StoreResult; store I/O errors never escape.
 */

import type { Logger } from "pino";
import { logger as rootLogger } from "../logging";
import type { Clock } from "../runtime/context";
import { docPath, type DocumentData, type DocumentStore } from "../store/types";
import { decodeScopeRecord, decodeTurn, encodeTurn, scopeFields, turnIdFromDoc } from "./records";
import { DEFAULT_MEMORY_PREFIX, buildScopeMatcher, scopeDocId, type ScopeFilter } from "./scope";
import { compareTurnIds, isAfterCutoff, isTurnId, normalizeTurnId } from "./turn-id";
import {
  storeFailed,
  storeOk,
  type CompactionResult,
  type ConversationScope,
  type ScopeMemory,
  type StoreResult,
  type Turn,
  type TurnId,
} from "./types";

export const DEFAULT_MEMORY_COLLECTION = "bot_memory";
export const TURNS_SUBCOLLECTION = "recent_messages";

export interface PersistentMemoryStoreOptions {
  collection?: string;
  prefix?: string;
  clock?: Clock;
  logger?: Logger;
}

export interface AppendResult {
  /** False when a record with the same turn id was overwritten. */
  created: boolean;
}

export interface ClearResult {
  deleted: number;
}

export class PersistentMemoryStore {
  readonly collection: string;
  readonly prefix: string;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly store: DocumentStore, options: PersistentMemoryStoreOptions = {}) {
    this.collection = options.collection ?? DEFAULT_MEMORY_COLLECTION;
    this.prefix = options.prefix ?? DEFAULT_MEMORY_PREFIX;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? rootLogger;
  }

  docIdFor(scope: ConversationScope): string {
    return scopeDocId(scope, this.prefix);
  }

  async append(scope: ConversationScope, turn: Turn): Promise<StoreResult<AppendResult>> {
    if (!isTurnId(turn.turnId)) return storeFailed("append", new Error(`invalid turn id "${turn.turnId}"`));
    if (!turn.content.trim()) return storeFailed("append", new Error("turn content is empty"));
    const docId = this.docIdFor(scope);
    const turnPath = docPath(this.turnsPath(docId), normalizeTurnId(turn.turnId));
    try {
      const record = encodeTurn(turn);
      const created = await this.store.create(turnPath, record);
      if (!created) await this.store.set(turnPath, record);

      const meta: DocumentData = { ...scopeFields(scope), updated_at: this.clock() };
      if (created) {
        meta.last_turn_id = normalizeTurnId(turn.turnId);
        await this.store.increment(this.scopePath(docId), "recent_count", 1, meta);
      } else {
        await this.store.set(this.scopePath(docId), meta, { merge: true });
      }
      return storeOk({ created });
    } catch (err) {
      return storeFailed("append", err);
    }
  }

  /** Newest `limit` turns, oldest first. Resolves undefined when the scope was never written. */
  async getMemory(scope: ConversationScope, limit: number): Promise<StoreResult<ScopeMemory | undefined>> {
    const docId = this.docIdFor(scope);
    try {
      const data = await this.store.get(this.scopePath(docId));
      if (!data) return storeOk(undefined);
      const meta = decodeScopeRecord(data);
      const turns = await this.newestTurns(docId, limit);
      return storeOk({
        summary: meta.summary,
        recentTurns: turns,
        recentCount: meta.recent_count,
        cutoffTurnId: meta.cutoff_turn_id,
        updatedAt: meta.updated_at,
      });
    } catch (err) {
      return storeFailed("getMemory", err);
    }
  }

  async listRecentTurnIds(scope: ConversationScope, limit: number): Promise<StoreResult<TurnId[]>> {
    const docId = this.docIdFor(scope);
    try {
      if (limit <= 0) return storeOk([]);
      const docs = await this.store.query(this.turnsPath(docId), { orderBy: "order_key", direction: "desc", limit });
      const ids: TurnId[] = [];
      for (const doc of docs) {
        const id = turnIdFromDoc(doc.id, doc.data);
        if (id !== undefined) ids.push(id);
      }
      return storeOk(ids.sort(compareTurnIds));
    } catch (err) {
      return storeFailed("listRecentTurnIds", err);
    }
  }

  /**
   * Summary and counter are written first; turn deletion follows item by item.
   * A failed summary write deletes nothing.
   */
  async setSummaryAndCompact(
    scope: ConversationScope,
    summary: string,
    keepTurnIds: TurnId[]
  ): Promise<StoreResult<CompactionResult>> {
    const docId = this.docIdFor(scope);
    const keep = new Set(keepTurnIds.filter(isTurnId).map(normalizeTurnId));
    const now = this.clock();
    try {
      await this.store.set(
        this.scopePath(docId),
        { ...scopeFields(scope), summary, recent_count: keep.size, summary_updated_at: now, updated_at: now },
        { merge: true }
      );
    } catch (err) {
      return storeFailed("setSummaryAndCompact", err);
    }

    let deleted = 0;
    let failedDeletes = 0;
    try {
      for await (const doc of this.store.stream(this.turnsPath(docId))) {
        const id = turnIdFromDoc(doc.id, doc.data);
        if (id !== undefined && keep.has(id)) continue;
        try {
          await this.store.delete(docPath(this.turnsPath(docId), doc.id));
          deleted++;
        } catch (err) {
          failedDeletes++;
          this.log.warn(
            { event: "MEMORY_DELETE_FAILED", scopeId: docId, turnId: doc.id, err: err instanceof Error ? err.message : String(err) },
            "Turn delete failed during compaction"
          );
        }
      }
    } catch (err) {
      return storeFailed("setSummaryAndCompact", err);
    }
    return storeOk({ deleted, failedDeletes });
  }

  async clearMemory(scope: ConversationScope, cutoffTurnId?: TurnId): Promise<StoreResult<ClearResult>> {
    return this.clearScopeDocument(this.docIdFor(scope), cutoffTurnId, scopeFields(scope));
  }

  /**
   * Clear one scope by document id. The cutoff marker only moves forward:
   * an older cutoff than the stored one leaves the stored one in place.
   */
  async clearScopeDocument(docId: string, cutoffTurnId?: TurnId, fields: DocumentData = {}): Promise<StoreResult<ClearResult>> {
    if (cutoffTurnId !== undefined && !isTurnId(cutoffTurnId)) {
      return storeFailed("clearMemory", new Error(`invalid cutoff turn id "${cutoffTurnId}"`));
    }
    try {
      let deleted = 0;
      for await (const doc of this.store.stream(this.turnsPath(docId))) {
        await this.store.delete(docPath(this.turnsPath(docId), doc.id));
        deleted++;
      }
      const existing = await this.store.get(this.scopePath(docId));
      const storedCutoff = existing ? decodeScopeRecord(existing).cutoff_turn_id : undefined;
      const requested = cutoffTurnId !== undefined ? normalizeTurnId(cutoffTurnId) : undefined;
      const cutoff =
        requested === undefined ? storedCutoff : isAfterCutoff(requested, storedCutoff) ? requested : storedCutoff;

      const now = this.clock();
      const update: DocumentData = { ...fields, summary: "", recent_count: 0, summary_updated_at: now, updated_at: now };
      if (cutoff !== undefined) update.cutoff_turn_id = cutoff;
      await this.store.set(this.scopePath(docId), update, { merge: true });
      return storeOk({ deleted });
    } catch (err) {
      return storeFailed("clearMemory", err);
    }
  }

  /** Scope document ids in the memory collection matching the filter. */
  async findScopes(filter: ScopeFilter = {}): Promise<StoreResult<string[]>> {
    const matches = buildScopeMatcher(this.prefix, filter);
    try {
      const ids: string[] = [];
      for await (const doc of this.store.stream(this.collection)) {
        if (matches(doc.id)) ids.push(doc.id);
      }
      return storeOk(ids);
    } catch (err) {
      return storeFailed("findScopes", err);
    }
  }

  /** Clear every scope of one bot. Per-scope failures are logged and still counted. */
  async clearAllScopesUnderPrefix(botKey: string, cutoffTurnId?: TurnId): Promise<StoreResult<number>> {
    const found = await this.findScopes({ botName: botKey });
    if (!found.ok) return found;
    let processed = 0;
    for (const docId of found.value) {
      const result = await this.clearScopeDocument(docId, cutoffTurnId);
      if (!result.ok) {
        this.log.warn({ event: "MEMORY_CLEAR_FAILED", scopeId: docId, err: result.error.message }, "Scope clear failed");
      }
      processed++;
    }
    return storeOk(processed);
  }

  private scopePath(docId: string): string {
    return docPath(this.collection, docId);
  }

  private turnsPath(docId: string): string {
    return docPath(this.collection, docId, TURNS_SUBCOLLECTION);
  }

  private async newestTurns(docId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    const docs = await this.store.query(this.turnsPath(docId), { orderBy: "order_key", direction: "desc", limit });
    const turns: Turn[] = [];
    for (const doc of docs) {
      const turn = decodeTurn(doc.id, doc.data);
      if (turn) turns.push(turn);
    }
    return turns.sort((a, b) => compareTurnIds(a.turnId, b.turnId));
  }
}
