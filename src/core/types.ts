/**
 * Task pipeline types.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** The closed set of processing step kinds. */
export enum ProviderKind {
  Harvest = "HARVEST",
  Transform = "TRANSFORM",
  Import = "IMPORT",
  SubjectResolve = "SUBJECT_RESOLVE",
  Cleanup = "CLEANUP",
}

export type SubtaskConfig = Readonly<Record<string, JsonValue>>;

/** One configured invocation of a provider within a task. */
export interface SubtaskSpec {
  readonly kind: ProviderKind;
  readonly label: string;
  /** A failed critical subtask aborts the rest of the run (cleanup excepted). */
  readonly critical: boolean;
  readonly config: SubtaskConfig;
}

/** What to run, against which vocabulary version. Frozen once built. */
export interface TaskInfo {
  readonly vocabularyId: string;
  readonly versionId: string;
  readonly subtasks: readonly SubtaskSpec[];
}

/** Context keys → values (storage keys, document ids). */
export type Artifacts = Record<string, string>;

export interface StepOutcome {
  succeeded: boolean;
  message: string;
  producedArtifacts: Artifacts;
  /** Error class name when the step failed, e.g. "DataFormatError". */
  error?: string;
}

export type TaskStatus = "success" | "partial" | "error";

export interface ResultEntry {
  label: string;
  kind: ProviderKind;
  critical: boolean;
  succeeded: boolean;
  message: string;
  error?: string;
  artifacts: Artifacts;
  durationMs: number;
}

export interface TaskResults {
  entries: ResultEntry[];
  status: TaskStatus;
}

export type VersionStatus = "draft" | "processing" | "published" | "error";

/** A task as kept by the task store. */
export interface TaskRecord {
  taskId: string;
  info: TaskInfo;
  status: "running" | TaskStatus;
  results: TaskResults | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}
