/**
 * Document store contract used by the memory and key stores.
 * Paths are slash-separated: "collection/docId" or "collection/docId/sub/subId".
 * Implementations can be swapped via config (Firestore, in-process).
 */

export type DocumentData = Record<string, unknown>;

export interface StoredDocument {
  id: string;
  data: DocumentData;
}

export interface QueryOptions {
  orderBy: string;
  direction?: "asc" | "desc";
  limit?: number;
}

export interface SetOptions {
  /** Deep-merge into the existing document instead of replacing it. */
  merge?: boolean;
}

export interface DocumentStore {
  get(path: string): Promise<DocumentData | undefined>;

  /** Create the document; resolves false (and writes nothing) if it already exists. */
  create(path: string, data: DocumentData): Promise<boolean>;

  set(path: string, data: DocumentData, options?: SetOptions): Promise<void>;

  /** Atomically add `by` to a numeric field, merging `fields` in the same write. */
  increment(path: string, field: string, by: number, fields?: DocumentData): Promise<void>;

  delete(path: string): Promise<void>;

  /** Ordered, limited read of one collection. */
  query(collectionPath: string, options: QueryOptions): Promise<StoredDocument[]>;

  /** Enumerate a collection page by page in document-id order. */
  stream(collectionPath: string, pageSize?: number): AsyncIterable<StoredDocument>;
}

export function docPath(...segments: string[]): string {
  return segments.join("/");
}

export const DEFAULT_PAGE_SIZE = 200;
