/**
 * Storage backend interface. Keys are `/`-separated paths.
 */
import type { Readable } from "node:stream";

export interface StorageBackend {
  /** Write data to the given key, creating parents as needed. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** Open a readable stream for the given key. */
  readStream(key: string): Readable;

  /** List all keys under the given prefix. */
  list(prefix: string): Promise<string[]>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;

  /** Delete the given key; a missing key is not an error. */
  delete(key: string): Promise<void>;
}
