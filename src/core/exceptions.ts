/**
 * Error taxonomy for the task pipeline.
 *
 * Provider-level errors (source, data, sink) are caught inside a provider
 * and recorded in its step outcome. Only configuration, concurrency,
 * persistence and lookup errors reach a caller.
 */
import type { TaskResults } from "./types.js";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SourceUnavailableError extends Error {
  constructor(message?: string) {
    super(message ? `Source unavailable: ${message}` : "Source unavailable");
    this.name = "SourceUnavailableError";
  }
}

export class DataFormatError extends Error {
  constructor(message?: string) {
    super(message ? `Malformed data: ${message}` : "Malformed data");
    this.name = "DataFormatError";
  }
}

export class SinkRejectedError extends Error {
  constructor(message?: string) {
    super(message ? `Sink rejected document: ${message}` : "Sink rejected document");
    this.name = "SinkRejectedError";
  }
}

/**
 * The task store could not be written. When thrown after a run, `results`
 * holds the outcome that was computed but not recorded.
 */
export class PersistenceError extends Error {
  taskId?: string;
  results?: TaskResults;

  constructor(
    message: string,
    opts: { taskId?: string; results?: TaskResults; cause?: unknown } = {},
  ) {
    super(`Persistence failed: ${message}`, { cause: opts.cause });
    this.name = "PersistenceError";
    this.taskId = opts.taskId;
    this.results = opts.results;
  }
}

export class ConcurrencyConflictError extends Error {
  vocabularyId: string;
  versionId: string;

  constructor(vocabularyId: string, versionId: string) {
    super(
      `A task is already running for vocabulary ${vocabularyId} version ${versionId}`,
    );
    this.name = "ConcurrencyConflictError";
    this.vocabularyId = vocabularyId;
    this.versionId = versionId;
  }
}

export class TaskNotFoundError extends Error {
  taskId: string;

  constructor(taskId: string) {
    super(`No task with id ${taskId}`);
    this.name = "TaskNotFoundError";
    this.taskId = taskId;
  }
}
