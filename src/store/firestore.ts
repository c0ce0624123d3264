/**
 * Firestore document store.
 * - With FIRESTORE_CREDENTIALS_PATH: service account key file.
 * - Without it: Application Default Credentials (GOOGLE_APPLICATION_CREDENTIALS).
 */

import { FieldPath, FieldValue, Firestore } from "@google-cloud/firestore";
import { DEFAULT_PAGE_SIZE, type DocumentData, type DocumentStore, type QueryOptions, type SetOptions, type StoredDocument } from "./types";

export interface FirestoreStoreConfig {
  projectId?: string;
  credentialsPath?: string;
}

/** gRPC ALREADY_EXISTS, raised by DocumentReference.create(). */
const ALREADY_EXISTS = 6;

function isAlreadyExists(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === ALREADY_EXISTS;
}

export class FirestoreDocumentStore implements DocumentStore {
  private readonly db: Firestore;

  constructor(config: FirestoreStoreConfig = {}) {
    this.db = new Firestore({
      projectId: config.projectId,
      keyFilename: config.credentialsPath,
      ignoreUndefinedProperties: true,
    });
  }

  async get(path: string): Promise<DocumentData | undefined> {
    const snap = await this.db.doc(path).get();
    return snap.exists ? snap.data() : undefined;
  }

  async create(path: string, data: DocumentData): Promise<boolean> {
    try {
      await this.db.doc(path).create(data);
      return true;
    } catch (err) {
      if (isAlreadyExists(err)) return false;
      throw err;
    }
  }

  async set(path: string, data: DocumentData, options?: SetOptions): Promise<void> {
    if (options?.merge) {
      await this.db.doc(path).set(data, { merge: true });
    } else {
      await this.db.doc(path).set(data);
    }
  }

  async increment(path: string, field: string, by: number, fields: DocumentData = {}): Promise<void> {
    await this.db.doc(path).set({ ...fields, [field]: FieldValue.increment(by) }, { merge: true });
  }

  async delete(path: string): Promise<void> {
    await this.db.doc(path).delete();
  }

  async query(collectionPath: string, options: QueryOptions): Promise<StoredDocument[]> {
    let q = this.db.collection(collectionPath).orderBy(options.orderBy, options.direction ?? "asc");
    if (options.limit !== undefined) q = q.limit(options.limit);
    const snap = await q.get();
    return snap.docs.map((d) => ({ id: d.id, data: d.data() }));
  }

  async *stream(collectionPath: string, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<StoredDocument> {
    const base = this.db.collection(collectionPath).orderBy(FieldPath.documentId()).limit(Math.max(1, pageSize));
    let after: string | undefined;
    for (;;) {
      const snap = await (after === undefined ? base : base.startAfter(after)).get();
      if (snap.empty) return;
      for (const d of snap.docs) yield { id: d.id, data: d.data() };
      after = snap.docs[snap.docs.length - 1].id;
    }
  }
}
