/**
 * Cleanup provider: release a run's temporary files.
 */
import { z } from "zod";

import { BaseProvider, type StepResult } from "../../core/provider.js";
import type { StepContext } from "../../core/run-context.js";
import { ProviderKind } from "../../core/types.js";
import type { StorageBackend } from "../../storage/backend.js";

const CleanupConfigSchema = z.object({
  /** Also remove the version's harvested files. */
  purgeHarvest: z.boolean().default(false),
});

type CleanupConfig = z.infer<typeof CleanupConfigSchema>;

export class CleanupProvider extends BaseProvider<CleanupConfig> {
  readonly kind = ProviderKind.Cleanup;
  protected readonly configSchema = CleanupConfigSchema;
  private storage: StorageBackend;

  constructor(storage: StorageBackend) {
    super();
    this.storage = storage;
  }

  protected async run(config: CleanupConfig, context: StepContext): Promise<StepResult> {
    const prefixes = [context.scratchPrefix];
    if (config.purgeHarvest) prefixes.push(`${context.versionPrefix}/harvest`);

    let removed = 0;
    for (const prefix of prefixes) {
      for (const key of await this.storage.list(prefix)) {
        await this.storage.delete(key);
        removed++;
      }
    }
    return { message: `removed ${removed} temporary files` };
  }
}
