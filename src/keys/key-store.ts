/**
 * Provider keys and the runtime model override, kept in one admin document
 * ({collection}/admin_keys) next to the memory scopes. Memory clearing never
 * matches this document.
 *
 *   keys.{keyId}            generation provider keys
 *   elevenlabs_keys.{keyId} speech provider keys
 *   runtime.model           model override (null when cleared)
 */

import { createHash } from "crypto";
import type { Logger } from "pino";
import { z } from "zod";
import { normalizeKeys } from "../gateway";
import { logger as rootLogger } from "../logging";
import { storeFailed, storeOk, type StoreResult } from "../memory/types";
import type { Clock, ModelOverrideSource } from "../runtime/context";
import { docPath, type DocumentData, type DocumentStore } from "../store/types";

export const ADMIN_KEYS_DOC = "admin_keys";

export type KeyProvider = "generation" | "speech";

const KEY_FIELDS: Record<KeyProvider, string> = {
  generation: "keys",
  speech: "elevenlabs_keys",
};

export interface KeyActor {
  id: string;
  name: string;
}

export interface StoredKey {
  apiKey: string;
  keyId: string;
  addedBy?: KeyActor;
  addedAt: number;
  source: string;
}

export interface AddKeysResult {
  added: string[];
  skipped: string[];
  total: number;
}

const storedKeySchema = z.object({
  api_key: z.string().trim().min(1),
  key_id: z.string().catch(""),
  added_by: z.object({ id: z.string(), name: z.string() }).optional().catch(undefined),
  added_at: z.number().catch(0),
  source: z.string().catch("unknown"),
});

const adminDocSchema = z.object({
  keys: z.record(z.unknown()).catch({}),
  elevenlabs_keys: z.record(z.unknown()).catch({}),
  runtime: z
    .object({ model: z.string().nullable().optional().catch(undefined) })
    .optional()
    .catch(undefined),
});

/** Stable, non-reversible key id: first 24 hex chars of SHA-256. */
export function keyId(apiKey: string): string {
  return createHash("sha256").update(apiKey.trim(), "utf8").digest("hex").slice(0, 24);
}

export interface KeyStoreOptions {
  collection: string;
  clock?: Clock;
  logger?: Logger;
}

export class KeyStore implements ModelOverrideSource {
  private readonly path: string;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly store: DocumentStore, options: KeyStoreOptions) {
    this.path = docPath(options.collection, ADMIN_KEYS_DOC);
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? rootLogger;
  }

  /** Stored keys for a provider, oldest first, de-duplicated by key text. */
  async listKeys(provider: KeyProvider): Promise<StoreResult<StoredKey[]>> {
    try {
      const doc = adminDocSchema.parse((await this.store.get(this.path)) ?? {});
      const entries = provider === "generation" ? doc.keys : doc.elevenlabs_keys;
      const seen = new Set<string>();
      const keys: StoredKey[] = [];
      for (const [id, raw] of Object.entries(entries)) {
        const parsed = storedKeySchema.safeParse(raw);
        if (!parsed.success || seen.has(parsed.data.api_key)) continue;
        seen.add(parsed.data.api_key);
        keys.push({
          apiKey: parsed.data.api_key,
          keyId: parsed.data.key_id || id,
          addedBy: parsed.data.added_by,
          addedAt: parsed.data.added_at,
          source: parsed.data.source,
        });
      }
      keys.sort((a, b) => a.addedAt - b.addedAt || (a.keyId < b.keyId ? -1 : a.keyId > b.keyId ? 1 : 0));
      return storeOk(keys);
    } catch (err) {
      return storeFailed("listKeys", err);
    }
  }

  /** Idempotent add: keys whose id is already stored are reported as skipped. */
  async addKeys(
    provider: KeyProvider,
    apiKeys: readonly string[],
    meta: { addedBy?: KeyActor; source: string }
  ): Promise<StoreResult<AddKeysResult>> {
    const existing = await this.listKeys(provider);
    if (!existing.ok) return existing;
    const known = new Set(existing.value.map((k) => k.keyId));
    const added: string[] = [];
    const skipped: string[] = [];
    const entries: DocumentData = {};
    for (const apiKey of normalizeKeys(apiKeys)) {
      const id = keyId(apiKey);
      if (known.has(id)) {
        skipped.push(id);
        continue;
      }
      known.add(id);
      added.push(id);
      const entry: DocumentData = { api_key: apiKey, key_id: id, added_at: this.clock(), source: meta.source };
      if (meta.addedBy) entry.added_by = { id: meta.addedBy.id, name: meta.addedBy.name };
      entries[id] = entry;
    }
    if (added.length > 0) {
      try {
        await this.store.set(this.path, { [KEY_FIELDS[provider]]: entries }, { merge: true });
      } catch (err) {
        return storeFailed("addKeys", err);
      }
      this.log.info({ event: "KEYS_ADDED", provider, added: added.length, skipped: skipped.length }, "Provider keys added");
    }
    return storeOk({ added, skipped, total: existing.value.length + added.length });
  }

  /**
   * Ordered key source for an adapter: configured keys first, then stored keys.
   * A store failure leaves only the configured keys.
   */
  keySource(provider: KeyProvider, configured: readonly string[]): () => Promise<string[]> {
    return async () => {
      const keys = normalizeKeys(configured);
      const stored = await this.listKeys(provider);
      if (!stored.ok) {
        this.log.warn({ event: "KEY_STORE_UNAVAILABLE", provider, err: stored.error.message }, "Stored keys unavailable");
        return [...new Set(keys)];
      }
      return [...new Set([...keys, ...stored.value.map((k) => k.apiKey)])];
    };
  }

  async readModelOverride(): Promise<StoreResult<string | undefined>> {
    try {
      const doc = adminDocSchema.parse((await this.store.get(this.path)) ?? {});
      const model = doc.runtime?.model?.trim();
      return storeOk(model ? model : undefined);
    } catch (err) {
      return storeFailed("readModelOverride", err);
    }
  }

  async getModelOverride(): Promise<string | undefined> {
    const result = await this.readModelOverride();
    if (!result.ok) {
      this.log.warn({ event: "MODEL_OVERRIDE_READ_FAILED", err: result.error.message }, "Model override unavailable");
      return undefined;
    }
    return result.value;
  }

  async setModelOverride(model: string, updatedBy?: KeyActor): Promise<StoreResult<string>> {
    const cleaned = model.trim();
    if (!cleaned) return storeFailed("setModelOverride", new Error("model must be a non-empty string"));
    try {
      const runtime: DocumentData = { model: cleaned, updated_at: this.clock() };
      if (updatedBy) runtime.updated_by = { id: updatedBy.id, name: updatedBy.name };
      await this.store.set(this.path, { runtime }, { merge: true });
      return storeOk(cleaned);
    } catch (err) {
      return storeFailed("setModelOverride", err);
    }
  }

  async clearModelOverride(clearedBy?: KeyActor): Promise<StoreResult<void>> {
    try {
      const runtime: DocumentData = { model: null, updated_at: this.clock() };
      if (clearedBy) runtime.updated_by = { id: clearedBy.id, name: clearedBy.name };
      await this.store.set(this.path, { runtime }, { merge: true });
      return storeOk(undefined);
    } catch (err) {
      return storeFailed("clearModelOverride", err);
    }
  }
}
