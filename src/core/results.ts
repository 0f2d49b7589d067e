/**
 * Results model: append-only entries plus one terminal status.
 */
import { z } from "zod";
import { ProviderKind, type ResultEntry, type TaskResults, type TaskStatus } from "./types.js";

/**
 * Derive the terminal status from the executed entries: a failed critical
 * step means "error", any other failure "partial".
 */
export function aggregateStatus(entries: readonly ResultEntry[]): TaskStatus {
  let failed = false;
  for (const entry of entries) {
    if (entry.succeeded) continue;
    if (entry.critical) return "error";
    failed = true;
  }
  return failed ? "partial" : "success";
}

export class ResultsBuilder {
  private entries: ResultEntry[] = [];
  private finalized: TaskResults | null = null;

  append(entry: ResultEntry): void {
    if (this.finalized) {
      throw new Error("Results already finalized");
    }
    this.entries.push(Object.freeze({ ...entry, artifacts: { ...entry.artifacts } }));
  }

  get size(): number {
    return this.entries.length;
  }

  /** Compute the status and seal the record. Callable once. */
  finalize(): TaskResults {
    if (this.finalized) {
      throw new Error("Results already finalized");
    }
    const entries = [...this.entries];
    Object.freeze(entries);
    this.finalized = Object.freeze({
      entries,
      status: aggregateStatus(entries),
    });
    return this.finalized;
  }
}

/** Ordered label → outcome strings, ending with "status". */
export function flattenResults(results: TaskResults): Map<string, string> {
  const flat = new Map<string, string>();
  for (const entry of results.entries) {
    flat.set(entry.label, entry.succeeded ? "success" : `failure: ${entry.message}`);
  }
  flat.set("status", results.status);
  return flat;
}

export const ResultEntrySchema = z.object({
  label: z.string(),
  kind: z.nativeEnum(ProviderKind),
  critical: z.boolean(),
  succeeded: z.boolean(),
  message: z.string(),
  error: z.string().optional(),
  artifacts: z.record(z.string()),
  durationMs: z.number(),
});

export const TaskResultsSchema = z.object({
  entries: z.array(ResultEntrySchema),
  status: z.enum(["success", "partial", "error"]),
});
