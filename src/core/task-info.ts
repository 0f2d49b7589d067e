/**
 * TaskInfo construction: validates a raw request, fills in labels and
 * criticality, and freezes the result.
 */
import { z } from "zod";
import { ConfigurationError } from "./exceptions.js";
import { ProviderKind, type JsonValue, type SubtaskSpec, type TaskInfo } from "./types.js";

/** Kinds whose failure aborts the run unless a subtask says otherwise. */
export const DEFAULT_CRITICAL: Record<ProviderKind, boolean> = {
  [ProviderKind.Harvest]: true,
  [ProviderKind.Transform]: false,
  [ProviderKind.Import]: true,
  [ProviderKind.SubjectResolve]: false,
  [ProviderKind.Cleanup]: false,
};

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const SubtaskInputSchema = z.object({
  kind: z.nativeEnum(ProviderKind),
  label: z.string().min(1).optional(),
  critical: z.boolean().optional(),
  config: z.record(JsonValueSchema).default({}),
});

/** Ids become storage path segments; "." and ".." would leave the version's directory. */
const IdSchema = z
  .string()
  .min(1)
  .refine((id) => id !== "." && id !== "..", { message: "must not be a relative path segment" });

export const TaskInfoInputSchema = z.object({
  vocabularyId: IdSchema,
  versionId: IdSchema,
  subtasks: z.array(SubtaskInputSchema).min(1),
});

export type TaskInfoInput = z.input<typeof TaskInfoInputSchema>;

/** Shape of a TaskInfo once labels and criticality are resolved. */
export const TaskInfoSchema = z.object({
  vocabularyId: z.string().min(1),
  versionId: z.string().min(1),
  subtasks: z
    .array(
      z.object({
        kind: z.nativeEnum(ProviderKind),
        label: z.string().min(1),
        critical: z.boolean(),
        config: z.record(JsonValueSchema),
      }),
    )
    .min(1),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Build an immutable TaskInfo. Throws ConfigurationError when the request
 * is malformed or two subtasks share an explicit label.
 */
export function createTaskInfo(input: unknown): TaskInfo {
  const parsed = TaskInfoInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid task: ${formatIssues(parsed.error)}`);
  }

  const explicit = new Set<string>();
  for (const sub of parsed.data.subtasks) {
    if (sub.label === undefined) continue;
    if (explicit.has(sub.label)) {
      throw new ConfigurationError(`Duplicate subtask label: ${sub.label}`);
    }
    explicit.add(sub.label);
  }

  const used = new Set(explicit);
  const subtasks: SubtaskSpec[] = parsed.data.subtasks.map((sub) => {
    let label = sub.label;
    if (label === undefined) {
      const base = sub.kind.toLowerCase();
      label = base;
      for (let n = 2; used.has(label); n++) label = `${base}#${n}`;
      used.add(label);
    }
    return deepFreeze({
      kind: sub.kind,
      label,
      critical: sub.critical ?? DEFAULT_CRITICAL[sub.kind],
      config: sub.config,
    });
  });

  return deepFreeze({
    vocabularyId: parsed.data.vocabularyId,
    versionId: parsed.data.versionId,
    subtasks,
  });
}

/** Re-validate a TaskInfo read back from storage. */
export function parseStoredTaskInfo(raw: unknown): TaskInfo {
  return deepFreeze(TaskInfoSchema.parse(raw));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
