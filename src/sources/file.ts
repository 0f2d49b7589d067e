/**
 * Uploaded-file source: data already on local disk.
 */
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import { describeError } from "../logger.js";
import { SourceUnavailableError } from "../core/exceptions.js";
import type { HarvestSource, HarvestedData } from "./backend.js";

export const FileSettingsSchema = z.object({
  source: z.literal("file"),
  path: z.string().min(1),
  /** File to use when the upload is a ZIP archive. */
  entry: z.string().min(1).optional(),
});

export type FileSettings = z.infer<typeof FileSettingsSchema>;

export class FileSource implements HarvestSource<FileSettings> {
  async fetch(settings: FileSettings): Promise<HarvestedData> {
    let buf: Buffer;
    try {
      buf = await readFile(settings.path);
    } catch (err) {
      throw new SourceUnavailableError(`${settings.path}: ${describeError(err)}`);
    }
    return {
      data: new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength),
      filename: basename(settings.path),
    };
  }
}
