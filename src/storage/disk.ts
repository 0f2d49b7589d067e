/**
 * Local filesystem storage backend.
 */
import { createReadStream } from "node:fs";
import { access, mkdir, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import type { Readable } from "node:stream";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(key: string): string {
    const full = resolve(this.basePath, key);
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new Error(`Storage key escapes base path: ${key}`);
    }
    return full;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async read(key: string): Promise<Uint8Array> {
    const buf = await readFile(this.resolve(key));
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  readStream(key: string): Readable {
    return createReadStream(this.resolve(key));
  }

  async list(prefix: string): Promise<string[]> {
    const prefixPath = this.resolve(prefix);
    let isFile: boolean;
    try {
      isFile = (await stat(prefixPath)).isFile();
    } catch {
      return [];
    }
    if (isFile) return [prefix];

    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          // Keys are relative to basePath and always use "/"
          keys.push(relative(this.basePath, full).split(sep).join("/"));
        }
      }
    };

    await walk(prefixPath);
    return keys.sort();
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.resolve(key));
      return true;
    } catch {
      return false;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.resolve(key), { force: true });
  }
}
