/**
 * Per-run scratch space carrying artifacts between subtasks.
 */
import { ConfigurationError } from "./exceptions.js";
import type { Artifacts } from "./types.js";
import type { Logger } from "../logger.js";

export interface RunIdentity {
  readonly taskId: string;
  readonly vocabularyId: string;
  readonly versionId: string;
}

/**
 * What a provider sees while it runs. Reads fall through to the artifacts
 * committed by earlier steps; writes stay staged until the step succeeds.
 */
export interface StepContext extends RunIdentity {
  /** Storage prefix for temporary files, removed by cleanup. */
  readonly scratchPrefix: string;
  /** Storage prefix for this version's durable files. */
  readonly versionPrefix: string;
  readonly logger: Logger;
  get(key: string): string | undefined;
  /** Like get(), but a missing artifact is a ConfigurationError. */
  require(key: string): string;
  has(key: string): boolean;
  set(key: string, value: string): void;
}

export class RunContext {
  readonly identity: RunIdentity;
  private artifacts = new Map<string, string>();

  constructor(identity: RunIdentity) {
    this.identity = identity;
  }

  get scratchPrefix(): string {
    return `tmp/${this.identity.taskId}`;
  }

  /** Each id is one path segment, so distinct versions never share a prefix. */
  get versionPrefix(): string {
    const { vocabularyId, versionId } = this.identity;
    return `${encodeURIComponent(vocabularyId)}/${encodeURIComponent(versionId)}`;
  }

  get(key: string): string | undefined {
    return this.artifacts.get(key);
  }

  /** Open a staged view for one step. */
  stage(logger: Logger): StagedStep {
    return new StagedStep(this, logger);
  }

  /** Merge artifacts in; later values overwrite earlier ones. */
  merge(artifacts: Artifacts): void {
    for (const [key, value] of Object.entries(artifacts)) {
      this.artifacts.set(key, value);
    }
  }

  snapshot(): Artifacts {
    return Object.fromEntries(this.artifacts);
  }
}

export class StagedStep implements StepContext {
  readonly logger: Logger;
  private run: RunContext;
  private staged = new Map<string, string>();

  constructor(run: RunContext, logger: Logger) {
    this.run = run;
    this.logger = logger;
  }

  get taskId(): string {
    return this.run.identity.taskId;
  }

  get vocabularyId(): string {
    return this.run.identity.vocabularyId;
  }

  get versionId(): string {
    return this.run.identity.versionId;
  }

  get scratchPrefix(): string {
    return this.run.scratchPrefix;
  }

  get versionPrefix(): string {
    return this.run.versionPrefix;
  }

  get(key: string): string | undefined {
    return this.staged.get(key) ?? this.run.get(key);
  }

  require(key: string): string {
    const value = this.get(key);
    if (value === undefined) {
      throw new ConfigurationError(`Run context has no "${key}" artifact`);
    }
    return value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: string): void {
    this.staged.set(key, value);
  }

  /** Writes made through set(), in the order they were made. */
  stagedWrites(): Artifacts {
    return Object.fromEntries(this.staged);
  }
}
