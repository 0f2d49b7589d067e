/**
 * vocabtoolkit – task pipeline for harvesting, transforming and publishing
 * controlled vocabularies.
 */
import { parseConfig } from "./config.js";
import { PersistenceError, TaskNotFoundError } from "./core/exceptions.js";
import { VersionRunGuard } from "./core/run-guard.js";
import { createTaskInfo } from "./core/task-info.js";
import { TaskRunner, planSubtasks, validatePlan } from "./core/task-runner.js";
import type { TaskRecord, TaskResults, VersionStatus } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { SqlTaskRepository, type TaskRepository } from "./db/tasks.js";
import { describeError, logger, setLogLevel, type Logger } from "./logger.js";
import type { ProviderEnv, ProviderRegistry } from "./providers/registry.js";

export * from "./core/exceptions.js";
export * from "./core/types.js";
export { aggregateStatus, flattenResults } from "./core/results.js";
export { createTaskInfo } from "./core/task-info.js";
export { TaskRunner, type RunState } from "./core/task-runner.js";
export { BaseProvider, type Provider, type StepResult } from "./core/provider.js";
export type { StepContext } from "./core/run-context.js";
export { parseConfig, type Config } from "./config.js";
export { SqlTaskRepository, type TaskRepository } from "./db/tasks.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { PostgresBackend } from "./db/postgres.js";
export { DiskStorage } from "./storage/disk.js";
export type { StorageBackend } from "./storage/backend.js";
export { PROVIDER_REGISTRY, type ProviderEnv, type ProviderRegistry } from "./providers/registry.js";
export { LogLevel, setLogHandler, setLogLevel, type LogEntry } from "./logger.js";

export interface ToolkitOptions {
  registry?: ProviderRegistry;
  logger?: Logger;
  /** Closed by close() when given. */
  db?: DatabaseBackend;
}

export interface TaskRun {
  taskId: string;
  results: TaskResults;
}

export class VocabToolkit {
  private repository: TaskRepository;
  private env: ProviderEnv;
  private registry: ProviderRegistry | undefined;
  private db: DatabaseBackend | undefined;
  private log: Logger;
  private guard = new VersionRunGuard();
  private inflight = new Map<string, Promise<TaskResults>>();
  /** Results computed but not yet written to the repository. */
  private unrecorded = new Map<string, TaskResults>();

  constructor(repository: TaskRepository, env: ProviderEnv, opts: ToolkitOptions = {}) {
    this.repository = repository;
    this.env = env;
    this.registry = opts.registry;
    this.db = opts.db;
    this.log = opts.logger ?? logger;
  }

  /** Construct from a configuration object (validates with Zod). */
  static async fromConfig(config: unknown, opts: ToolkitOptions = {}): Promise<VocabToolkit> {
    const { db, env, logLevel } = parseConfig(config);
    setLogLevel(logLevel);
    await db.initialize();
    return new VocabToolkit(new SqlTaskRepository(db), env, { ...opts, db });
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Accept a task and run it in the background. Resolves to its id. */
  async submitTask(input: unknown): Promise<string> {
    const { taskId, execution } = await this.accept(input);
    void execution.catch((err: unknown) => {
      this.log.error("Background task failed", { taskId, error: describeError(err) });
    });
    return taskId;
  }

  /** Accept a task and wait for its results. */
  async runTask(input: unknown): Promise<TaskRun> {
    const { taskId, execution } = await this.accept(input);
    return { taskId, results: await execution };
  }

  /** Results of a task started by this instance, once it has finished. */
  async waitForTask(taskId: string): Promise<TaskResults> {
    const execution = this.inflight.get(taskId);
    if (execution) return execution;
    const results = await this.getResults(taskId);
    if (results === null) {
      throw new Error(`Task ${taskId} is not running in this process`);
    }
    return results;
  }

  /** Null while the task is still running. */
  async getResults(taskId: string): Promise<TaskResults | null> {
    const held = this.unrecorded.get(taskId);
    if (held) return held;
    const record = await this.getTask(taskId);
    return record.results;
  }

  async getTask(taskId: string): Promise<TaskRecord> {
    const record = await this.store("read task", () => this.repository.getTask(taskId));
    if (!record) throw new TaskNotFoundError(taskId);
    return record;
  }

  getAllTasks(): Promise<TaskRecord[]> {
    return this.store("list tasks", () => this.repository.getAllTasks());
  }

  getVersionStatus(vocabularyId: string, versionId: string): Promise<VersionStatus | null> {
    return this.store("read version status", () =>
      this.repository.getVersionStatus(vocabularyId, versionId),
    );
  }

  /** Retry writing results that failed to record. Returns the ids written. */
  async flushUnrecorded(): Promise<string[]> {
    const written: string[] = [];
    for (const [taskId, results] of [...this.unrecorded]) {
      try {
        await this.repository.completeTask(taskId, results);
      } catch (err) {
        this.log.warn("Results still not recorded", { taskId, error: describeError(err) });
        continue;
      }
      this.unrecorded.delete(taskId);
      written.push(taskId);
    }
    return written;
  }

  /**
   * Mark tasks that were left running by a previous process as failed.
   * Returns the ids recovered.
   */
  async recoverOrphanedTasks(): Promise<string[]> {
    const incomplete = await this.store("list incomplete tasks", () =>
      this.repository.listIncompleteTasks(),
    );
    const recovered: string[] = [];
    for (const record of incomplete) {
      const { vocabularyId, versionId } = record.info;
      // A claimed version may have a task between createTask and its start
      if (this.guard.isRunning(vocabularyId, versionId)) continue;
      if (this.inflight.has(record.taskId) || this.unrecorded.has(record.taskId)) continue;
      await this.store("recover task", () =>
        this.repository.completeTask(record.taskId, { entries: [], status: "error" }),
      );
      this.log.warn("Recovered orphaned task", { taskId: record.taskId, vocabularyId, versionId });
      recovered.push(record.taskId);
    }
    return recovered;
  }

  /** Wait for running tasks, then close the database if owned. */
  async close(): Promise<void> {
    await Promise.allSettled([...this.inflight.values()]);
    if (this.db) await this.db.close();
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async accept(
    input: unknown,
  ): Promise<{ taskId: string; execution: Promise<TaskResults> }> {
    const info = createTaskInfo(input);
    const plan = planSubtasks(info, this.env, this.registry);
    validatePlan(plan);

    const { vocabularyId, versionId } = info;
    // Claimed before the first await so two submissions cannot both pass
    this.guard.acquire(vocabularyId, versionId);

    let taskId: string;
    try {
      taskId = await this.repository.createTask(info);
    } catch (err) {
      this.guard.release(vocabularyId, versionId);
      throw new PersistenceError(`could not record task: ${describeError(err)}`, {
        cause: err,
      });
    }

    const runner = new TaskRunner(taskId, info, this.env, { plan, logger: this.log });
    const execution = this.execute(runner);
    this.inflight.set(taskId, execution);
    void execution.then(
      () => this.inflight.delete(taskId),
      () => this.inflight.delete(taskId),
    );
    return { taskId, execution };
  }

  private async execute(runner: TaskRunner): Promise<TaskResults> {
    const { taskId } = runner;
    const { vocabularyId, versionId } = runner.info;
    try {
      const results = await runner.run();
      try {
        await this.repository.completeTask(taskId, results);
      } catch (err) {
        this.unrecorded.set(taskId, results);
        this.log.error("Could not record task results", { taskId, error: describeError(err) });
        throw new PersistenceError(
          `could not record results of task ${taskId}: ${describeError(err)}`,
          { taskId, results, cause: err },
        );
      }
      return results;
    } finally {
      this.guard.release(vocabularyId, versionId);
    }
  }

  private async store<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new PersistenceError(`could not ${what}: ${describeError(err)}`, { cause: err });
    }
  }
}
