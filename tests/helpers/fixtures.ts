/**
 * Shared test fixtures: turns, a settable clock and a document store that can be made to fail.
 */

import { Writable } from "stream";
import type { Turn, TurnRole } from "../../src/memory/types";
import { InMemoryDocumentStore } from "../../src/store/in-memory";
import type { DocumentData, QueryOptions, SetOptions, StoredDocument } from "../../src/store/types";

export function makeTurn(id: number | string, content: string, role: TurnRole = "user", speakerName = "Sam"): Turn {
  return { turnId: String(id), role, speakerName, content, createdAt: Number(id) };
}

export class FakeClock {
  constructor(public now = 1_000_000) {}

  readonly clock = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export type StoreOperation = "get" | "create" | "set" | "increment" | "delete" | "query" | "stream";

/** In-memory store whose operations can be switched to throw. */
export class FlakyDocumentStore extends InMemoryDocumentStore {
  readonly failing = new Set<StoreOperation>();
  /** Delete calls fail only for paths ending with one of these ids. */
  readonly failingDeleteIds = new Set<string>();

  private check(op: StoreOperation): void {
    if (this.failing.has(op)) throw new Error(`${op} unavailable`);
  }

  override async get(path: string): Promise<DocumentData | undefined> {
    this.check("get");
    return super.get(path);
  }

  override async create(path: string, data: DocumentData): Promise<boolean> {
    this.check("create");
    return super.create(path, data);
  }

  override async set(path: string, data: DocumentData, options?: SetOptions): Promise<void> {
    this.check("set");
    return super.set(path, data, options);
  }

  override async increment(path: string, field: string, by: number, fields?: DocumentData): Promise<void> {
    this.check("increment");
    return super.increment(path, field, by, fields);
  }

  override async delete(path: string): Promise<void> {
    this.check("delete");
    const id = path.split("/").pop() ?? "";
    if (this.failingDeleteIds.has(id)) throw new Error(`delete of ${id} unavailable`);
    return super.delete(path);
  }

  override async query(collectionPath: string, options: QueryOptions): Promise<StoredDocument[]> {
    this.check("query");
    return super.query(collectionPath, options);
  }

  override async *stream(collectionPath: string, pageSize?: number): AsyncIterable<StoredDocument> {
    this.check("stream");
    yield* super.stream(collectionPath, pageSize);
  }
}

/** Writable that keeps everything written to it as text. */
export class TextSink extends Writable {
  text = "";

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}
