/**
 * In-process document store. Used for local runs without credentials and as the
 * store stand-in in tests. Values are deep-copied on the way in and out.
 */

import { DEFAULT_PAGE_SIZE, type DocumentData, type DocumentStore, type QueryOptions, type SetOptions, type StoredDocument } from "./types";

function isPlainObject(v: unknown): v is DocumentData {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function deepMerge(target: DocumentData, patch: DocumentData): DocumentData {
  const out: DocumentData = { ...target };
  for (const [k, v] of Object.entries(patch)) {
    const existing = out[k];
    out[k] = isPlainObject(existing) && isPlainObject(v) ? deepMerge(existing, v) : v;
  }
  return out;
}

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  const x = String(a);
  const y = String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

export class InMemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<string, DocumentData>();

  async get(path: string): Promise<DocumentData | undefined> {
    const doc = this.docs.get(path);
    return doc ? structuredClone(doc) : undefined;
  }

  async create(path: string, data: DocumentData): Promise<boolean> {
    if (this.docs.has(path)) return false;
    this.docs.set(path, structuredClone(data));
    return true;
  }

  async set(path: string, data: DocumentData, options?: SetOptions): Promise<void> {
    const existing = this.docs.get(path);
    const next = options?.merge && existing ? deepMerge(existing, data) : data;
    this.docs.set(path, structuredClone(next));
  }

  async increment(path: string, field: string, by: number, fields: DocumentData = {}): Promise<void> {
    const merged = deepMerge(this.docs.get(path) ?? {}, structuredClone(fields));
    const current = merged[field];
    merged[field] = (typeof current === "number" ? current : 0) + by;
    this.docs.set(path, merged);
  }

  async delete(path: string): Promise<void> {
    this.docs.delete(path);
  }

  async query(collectionPath: string, options: QueryOptions): Promise<StoredDocument[]> {
    const sign = options.direction === "desc" ? -1 : 1;
    const rows = this.collection(collectionPath).sort(
      (a, b) => sign * compareValues(a.data[options.orderBy], b.data[options.orderBy])
    );
    return options.limit !== undefined ? rows.slice(0, options.limit) : rows;
  }

  async *stream(collectionPath: string, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<StoredDocument> {
    let after: string | undefined;
    for (;;) {
      const page = this.collection(collectionPath)
        .sort((a, b) => compareValues(a.id, b.id))
        .filter((d) => after === undefined || d.id > after)
        .slice(0, Math.max(1, pageSize));
      if (page.length === 0) return;
      for (const doc of page) yield doc;
      after = page[page.length - 1].id;
    }
  }

  /** Number of documents stored (all collections). */
  get size(): number {
    return this.docs.size;
  }

  private collection(collectionPath: string): StoredDocument[] {
    const prefix = `${collectionPath}/`;
    const out: StoredDocument[] = [];
    for (const [path, data] of this.docs) {
      if (!path.startsWith(prefix)) continue;
      const id = path.slice(prefix.length);
      if (id.includes("/")) continue;
      out.push({ id, data: structuredClone(data) });
    }
    return out;
  }
}
