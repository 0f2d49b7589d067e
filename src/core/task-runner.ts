/**
 * TaskRunner – drives one TaskInfo through its subtasks.
 *
 *   pending → running(i) → completed(success | partial) | aborted
 *
 * A failed critical subtask aborts the run: later subtasks are skipped,
 * except CLEANUP subtasks, which always run.
 */
import { createLogger, describeError, type Logger } from "../logger.js";
import { createProvider, type ProviderEnv, type ProviderRegistry } from "../providers/registry.js";
import { ConfigurationError } from "./exceptions.js";
import { failed, type Provider } from "./provider.js";
import { ResultsBuilder } from "./results.js";
import { RunContext } from "./run-context.js";
import {
  ProviderKind,
  type Artifacts,
  type ResultEntry,
  type StepOutcome,
  type SubtaskSpec,
  type TaskInfo,
  type TaskResults,
} from "./types.js";

export type RunState =
  | { phase: "pending" }
  | { phase: "running"; index: number }
  | { phase: "completed"; status: "success" | "partial" }
  | { phase: "aborted" };

export interface TaskRunnerOptions {
  registry?: ProviderRegistry;
  logger?: Logger;
  /** Providers already built by planSubtasks(); `registry` is then unused. */
  plan?: PlannedSubtask[];
}

export interface PlannedSubtask {
  spec: SubtaskSpec;
  provider: Provider;
}

/** Build the provider for every subtask of `info`. */
export function planSubtasks(
  info: TaskInfo,
  env: ProviderEnv,
  registry?: ProviderRegistry,
): PlannedSubtask[] {
  return info.subtasks.map((spec) => ({
    spec,
    provider: createProvider(spec.kind, env, registry),
  }));
}

/** Throw ConfigurationError for the first subtask whose config its provider rejects. */
export function validatePlan(plan: PlannedSubtask[]): void {
  for (const { spec, provider } of plan) {
    const problem = provider.validate(spec.config);
    if (problem !== null) {
      throw new ConfigurationError(`Invalid task: subtask ${spec.label}: ${problem}`);
    }
  }
}

export class TaskRunner {
  readonly taskId: string;
  readonly info: TaskInfo;
  private plan: PlannedSubtask[];
  private context: RunContext;
  private results = new ResultsBuilder();
  private current: RunState = { phase: "pending" };
  private log: Logger;

  constructor(taskId: string, info: TaskInfo, env: ProviderEnv, opts: TaskRunnerOptions = {}) {
    this.taskId = taskId;
    this.info = info;
    // Providers are resolved up front so a run never starts half-planned
    this.plan = opts.plan ?? planSubtasks(info, env, opts.registry);
    this.context = new RunContext({
      taskId,
      vocabularyId: info.vocabularyId,
      versionId: info.versionId,
    });
    this.log = (opts.logger ?? createLogger({ component: "task-runner" })).child({
      taskId,
      vocabularyId: info.vocabularyId,
      versionId: info.versionId,
    });
  }

  get state(): RunState {
    return this.current;
  }

  /** Artifacts committed so far. */
  get artifacts(): Artifacts {
    return this.context.snapshot();
  }

  async run(): Promise<TaskResults> {
    if (this.current.phase !== "pending") {
      throw new Error(`Task ${this.taskId} has already been run`);
    }
    this.log.info("Task started", { subtasks: this.plan.length });

    let aborted = false;
    for (const [index, { spec, provider }] of this.plan.entries()) {
      if (aborted && spec.kind !== ProviderKind.Cleanup) {
        this.log.debug("Subtask skipped", { subtask: spec.label });
        continue;
      }
      this.current = { phase: "running", index };

      const entry = await this.runSubtask(spec, provider);
      this.results.append(entry);

      if (!entry.succeeded && spec.critical && !aborted) {
        aborted = true;
        this.log.warn("Critical subtask failed, aborting", { subtask: spec.label });
      }
    }

    const results = this.results.finalize();
    this.current =
      results.status === "error"
        ? { phase: "aborted" }
        : { phase: "completed", status: results.status };
    this.log.info("Task finished", { status: results.status, entries: results.entries.length });
    return results;
  }

  private async runSubtask(spec: SubtaskSpec, provider: Provider): Promise<ResultEntry> {
    const stepLog = this.log.child({ subtask: spec.label, kind: spec.kind });
    const step = this.context.stage(stepLog);
    const started = Date.now();

    let outcome: StepOutcome;
    try {
      outcome = await provider.execute(spec.config, step);
    } catch (err) {
      // Providers should not throw; treat it as a failed step anyway
      stepLog.error("Provider threw", { error: describeError(err) });
      outcome = failed(err);
    }

    let artifacts: Artifacts = {};
    if (outcome.succeeded) {
      artifacts = { ...step.stagedWrites(), ...outcome.producedArtifacts };
      this.context.merge(artifacts);
      stepLog.info("Subtask succeeded", { message: outcome.message });
    } else {
      stepLog.warn("Subtask failed", { message: outcome.message, error: outcome.error });
    }

    const entry: ResultEntry = {
      label: spec.label,
      kind: spec.kind,
      critical: spec.critical,
      succeeded: outcome.succeeded,
      message: outcome.message,
      artifacts,
      durationMs: Date.now() - started,
    };
    if (outcome.error !== undefined) entry.error = outcome.error;
    return entry;
  }
}
