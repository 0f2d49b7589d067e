/**
 * Harvest provider: pull raw vocabulary data from a source into storage.
 */
import { unzipSync } from "fflate";
import { posix } from "node:path";
import { z } from "zod";

import { DataFormatError } from "../../core/exceptions.js";
import { BaseProvider, type StepResult } from "../../core/provider.js";
import type { StepContext } from "../../core/run-context.js";
import { ProviderKind } from "../../core/types.js";
import { describeError } from "../../logger.js";
import type { HarvestSource, HarvestedData } from "../../sources/backend.js";
import { FileSettingsSchema, type FileSettings } from "../../sources/file.js";
import { PoolPartySettingsSchema, type PoolPartySettings } from "../../sources/poolparty.js";
import { SparqlSettingsSchema, type SparqlSettings } from "../../sources/sparql.js";
import type { StorageBackend } from "../../storage/backend.js";

export const HARVEST_DIR = "harvest_dir";
export const HARVEST_PATH = "harvest_path";
export const HARVEST_ARCHIVE = "harvest_archive";

export interface HarvestSources {
  sparql: HarvestSource<SparqlSettings>;
  poolparty: HarvestSource<PoolPartySettings>;
  file: HarvestSource<FileSettings>;
}

const HarvestConfigSchema = z.discriminatedUnion("source", [
  SparqlSettingsSchema,
  PoolPartySettingsSchema,
  FileSettingsSchema,
]);

type HarvestConfig = z.infer<typeof HarvestConfigSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** ZIP local file header signature "PK\x03\x04". */
export function isZip(data: Uint8Array): boolean {
  return (
    data.length >= 4 &&
    data[0] === 0x50 &&
    data[1] === 0x4b &&
    data[2] === 0x03 &&
    data[3] === 0x04
  );
}

/**
 * Unpack a ZIP archive into relative paths → contents. Directory entries
 * are skipped; an entry escaping the target directory is a DataFormatError.
 */
export function unzipArchive(data: Uint8Array): Map<string, Uint8Array> {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(data);
  } catch (err) {
    throw new DataFormatError(`unreadable ZIP archive: ${describeError(err)}`);
  }

  const out = new Map<string, Uint8Array>();
  for (const [name, contents] of Object.entries(files)) {
    if (name.endsWith("/") && contents.length === 0) continue;
    const normalised = posix.normalize(name);
    if (normalised.startsWith("../") || posix.isAbsolute(normalised)) {
      throw new DataFormatError(`archive entry escapes harvest directory: ${name}`);
    }
    out.set(normalised, contents);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class HarvestProvider extends BaseProvider<HarvestConfig> {
  readonly kind = ProviderKind.Harvest;
  protected readonly configSchema = HarvestConfigSchema;
  private storage: StorageBackend;
  private sources: HarvestSources;

  constructor(storage: StorageBackend, sources: HarvestSources) {
    super();
    this.storage = storage;
    this.sources = sources;
  }

  private fetchFrom(config: HarvestConfig): Promise<HarvestedData> {
    switch (config.source) {
      case "sparql":
        return this.sources.sparql.fetch(config);
      case "poolparty":
        return this.sources.poolparty.fetch(config);
      case "file":
        return this.sources.file.fetch(config);
    }
  }

  protected async run(config: HarvestConfig, context: StepContext): Promise<StepResult> {
    const harvested = await this.fetchFrom(config);
    const dir = `${context.versionPrefix}/harvest`;

    if (!isZip(harvested.data)) {
      const key = `${dir}/${posix.basename(harvested.filename)}`;
      await this.storage.write(key, harvested.data);
      return {
        message: `harvested ${harvested.data.length} bytes from ${config.source}`,
        artifacts: { [HARVEST_DIR]: dir, [HARVEST_PATH]: key },
      };
    }

    const archiveKey = `${context.scratchPrefix}/${posix.basename(harvested.filename)}`;
    await this.storage.write(archiveKey, harvested.data);

    const files = unzipArchive(harvested.data);
    for (const [name, contents] of files) {
      await this.storage.write(`${dir}/${name}`, contents);
    }

    const entry = config.source === "file" ? config.entry : undefined;
    const chosen = entry ?? [...files.keys()].sort().find((name) => name.endsWith(".json"));
    if (chosen === undefined) {
      throw new DataFormatError("archive contains no .json file");
    }
    if (!files.has(posix.normalize(chosen))) {
      throw new DataFormatError(`archive has no entry ${chosen}`);
    }
    context.logger.debug("Archive unpacked", { files: files.size, entry: chosen });

    return {
      message: `harvested ${files.size} files from ${config.source} archive`,
      artifacts: {
        [HARVEST_DIR]: dir,
        [HARVEST_PATH]: `${dir}/${posix.normalize(chosen)}`,
        [HARVEST_ARCHIVE]: archiveKey,
      },
    };
  }
}
