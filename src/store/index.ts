/**
 * Document store factory: returns implementation based on config.
 */

import type { AppConfig } from "../config";
import type { DocumentStore } from "./types";
import { InMemoryDocumentStore } from "./in-memory";
import { FirestoreDocumentStore } from "./firestore";

export type { DocumentStore, DocumentData, StoredDocument, QueryOptions, SetOptions } from "./types";
export { docPath, DEFAULT_PAGE_SIZE } from "./types";
export { InMemoryDocumentStore } from "./in-memory";
export { FirestoreDocumentStore } from "./firestore";

export function createDocumentStore(config: AppConfig): DocumentStore {
  const { backend, projectId, credentialsPath } = config.store;
  if (backend === "firestore") {
    return new FirestoreDocumentStore({ projectId, credentialsPath });
  }
  return new InMemoryDocumentStore();
}
