/**
 * Sink writing documents into storage under `index/`.
 */
import type { StorageBackend } from "../storage/backend.js";
import type { IndexDocument, IndexSink } from "./backend.js";

export function indexKey(id: string): string {
  return `index/${encodeURIComponent(id)}.json`;
}

export class StorageIndexSink implements IndexSink {
  private storage: StorageBackend;

  constructor(storage: StorageBackend) {
    this.storage = storage;
  }

  async publish(doc: IndexDocument): Promise<void> {
    await this.storage.write(indexKey(doc.id), JSON.stringify(doc, null, 2));
  }
}
