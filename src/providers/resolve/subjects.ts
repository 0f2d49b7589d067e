/**
 * Subject resolution: map free-text subjects to canonical subject IRIs.
 */
import { z } from "zod";

import { BaseProvider, type StepResult } from "../../core/provider.js";
import type { StepContext } from "../../core/run-context.js";
import { ProviderKind } from "../../core/types.js";
import type { ResolvedSubject, SubjectResolver } from "../../resolvers/backend.js";
import type { StorageBackend } from "../../storage/backend.js";

export const RESOLVED_SUBJECTS = "resolved_subjects";

const SubjectResolveConfigSchema = z
  .object({
    subjects: z
      .array(z.object({ source: z.string().min(1), label: z.string().min(1) }))
      .min(1),
    /** Subject source name → resolver endpoint URL. */
    resolvers: z.record(z.string().url()),
    timeoutMs: z.number().int().positive().optional(),
  })
  .superRefine((config, ctx) => {
    config.subjects.forEach((subject, i) => {
      if (!Object.hasOwn(config.resolvers, subject.source)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["subjects", i, "source"],
          message: `no resolver configured for source "${subject.source}"`,
        });
      }
    });
  });

type SubjectResolveConfig = z.infer<typeof SubjectResolveConfigSchema>;

export const ResolvedSubjectsSchema = z.array(
  z.object({
    source: z.string(),
    label: z.string(),
    iri: z.string().nullable(),
  }),
);

export class SubjectResolveProvider extends BaseProvider<SubjectResolveConfig> {
  readonly kind = ProviderKind.SubjectResolve;
  protected readonly configSchema = SubjectResolveConfigSchema;
  private storage: StorageBackend;
  private resolver: SubjectResolver;

  constructor(storage: StorageBackend, resolver: SubjectResolver) {
    super();
    this.storage = storage;
    this.resolver = resolver;
  }

  protected async run(config: SubjectResolveConfig, context: StepContext): Promise<StepResult> {
    const resolved: ResolvedSubject[] = [];
    for (const subject of config.subjects) {
      const iri = await this.resolver.resolve({
        endpoint: config.resolvers[subject.source],
        label: subject.label,
        timeoutMs: config.timeoutMs,
      });
      if (iri === null) {
        context.logger.info("Subject not resolved", { ...subject });
      }
      resolved.push({ source: subject.source, label: subject.label, iri });
    }

    const key = `${context.versionPrefix}/subjects.json`;
    await this.storage.write(key, JSON.stringify(resolved));

    const found = resolved.filter((s) => s.iri !== null).length;
    return {
      message: `resolved ${found} of ${resolved.length} subjects`,
      artifacts: { [RESOLVED_SUBJECTS]: key },
    };
  }
}
