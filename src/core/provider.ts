/**
 * Provider contract – one category of work run against a vocabulary version.
 */
import type { z } from "zod";
import { describeError } from "../logger.js";
import { ConfigurationError } from "./exceptions.js";
import type { StepContext } from "./run-context.js";
import type { Artifacts, ProviderKind, StepOutcome, SubtaskConfig } from "./types.js";

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

/**
 * A pluggable processing step. Stateless across runs: everything a run
 * needs flows through `context`. Implementations must not throw; failures
 * are reported with `succeeded: false`.
 */
export interface Provider {
  readonly kind: ProviderKind;
  /** Describe what is wrong with `config`, or null when it is usable. */
  validate(config: SubtaskConfig): string | null;
  execute(config: SubtaskConfig, context: StepContext): Promise<StepOutcome>;
}

/** What a provider's run() hands back on success. */
export interface StepResult {
  message: string;
  artifacts?: Artifacts;
}

export function succeeded(message: string, artifacts: Artifacts = {}): StepOutcome {
  return { succeeded: true, message, producedArtifacts: artifacts };
}

export function failed(err: unknown): StepOutcome {
  return {
    succeeded: false,
    message: describeError(err),
    producedArtifacts: {},
    error: err instanceof Error ? err.name : "Error",
  };
}

// ---------------------------------------------------------------------------
// Base class – config validation and error conversion
// ---------------------------------------------------------------------------

export abstract class BaseProvider<C> implements Provider {
  abstract readonly kind: ProviderKind;
  protected abstract readonly configSchema: z.ZodType<C, z.ZodTypeDef, unknown>;

  /** Do the work. Throw to fail the step. */
  protected abstract run(config: C, context: StepContext): Promise<StepResult>;

  validate(config: SubtaskConfig): string | null {
    const parsed = this.configSchema.safeParse(config);
    return parsed.success ? null : this.describeIssues(parsed.error);
  }

  async execute(config: SubtaskConfig, context: StepContext): Promise<StepOutcome> {
    const parsed = this.configSchema.safeParse(config);
    if (!parsed.success) {
      return failed(new ConfigurationError(this.describeIssues(parsed.error)));
    }

    try {
      const result = await this.run(parsed.data, context);
      return succeeded(result.message, result.artifacts);
    } catch (err) {
      context.logger.warn("Step failed", { error: describeError(err) });
      return failed(err);
    }
  }

  private describeIssues(error: z.ZodError): string {
    const detail = error.issues
      .map((issue) => `${issue.path.join(".") || "(config)"}: ${issue.message}`)
      .join("; ");
    return `Invalid ${this.kind} configuration: ${detail}`;
  }
}
