/**
 * TaskRunner state machine tests, driven by scripted providers.
 */
import { describe, test, expect } from "vitest";
import { DataFormatError } from "../src/core/exceptions.js";
import { failed, succeeded, type Provider } from "../src/core/provider.js";
import type { StepContext } from "../src/core/run-context.js";
import { createTaskInfo } from "../src/core/task-info.js";
import { TaskRunner, planSubtasks, validatePlan } from "../src/core/task-runner.js";
import {
  ProviderKind,
  type StepOutcome,
  type SubtaskConfig,
} from "../src/core/types.js";
import type { ProviderRegistry } from "../src/providers/registry.js";
import { makeEnv, makeTmpDir } from "./fixtures.js";

/**
 * Behaves as its config says: `outcome` "fail" or "throw", `stage` sets
 * an artifact through the context, `produce` returns one, `read` records
 * what the context holds.
 */
class ScriptedProvider implements Provider {
  readonly kind: ProviderKind;
  private calls: string[];

  constructor(kind: ProviderKind, calls: string[]) {
    this.kind = kind;
    this.calls = calls;
  }

  validate(config: SubtaskConfig): string | null {
    return config.outcome === "invalid" ? `Invalid ${this.kind} configuration: outcome` : null;
  }

  async execute(config: SubtaskConfig, context: StepContext): Promise<StepOutcome> {
    this.calls.push(
      typeof config.read === "string"
        ? `${this.kind}:${context.get(config.read) ?? "-"}`
        : this.kind,
    );
    if (typeof config.stage === "string") context.set(config.stage, `${this.kind} staged`);
    if (config.outcome === "throw") throw new Error("boom");
    if (config.outcome === "fail") return failed(new DataFormatError("bad rows"));
    const produced =
      typeof config.produce === "string" ? { [config.produce]: `${this.kind} produced` } : {};
    return succeeded(`${this.kind} done`, produced);
  }
}

function scriptedRegistry(calls: string[]): ProviderRegistry {
  const make = (kind: ProviderKind) => () => new ScriptedProvider(kind, calls);
  return {
    [ProviderKind.Harvest]: make(ProviderKind.Harvest),
    [ProviderKind.Transform]: make(ProviderKind.Transform),
    [ProviderKind.Import]: make(ProviderKind.Import),
    [ProviderKind.SubjectResolve]: make(ProviderKind.SubjectResolve),
    [ProviderKind.Cleanup]: make(ProviderKind.Cleanup),
  };
}

function makeRunner(subtasks: unknown[], calls: string[] = []): TaskRunner {
  const info = createTaskInfo({ vocabularyId: "animals", versionId: "v1", subtasks });
  return new TaskRunner("task-1", info, makeEnv(makeTmpDir()), {
    registry: scriptedRegistry(calls),
  });
}

describe("TaskRunner", () => {
  test("all subtasks succeed", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [{ kind: "HARVEST" }, { kind: "TRANSFORM" }, { kind: "IMPORT" }],
      calls,
    );
    expect(runner.state).toEqual({ phase: "pending" });

    const results = await runner.run();

    expect(results.status).toBe("success");
    expect(results.entries.map((e) => [e.label, e.succeeded, e.message])).toEqual([
      ["harvest", true, "HARVEST done"],
      ["transform", true, "TRANSFORM done"],
      ["import", true, "IMPORT done"],
    ]);
    expect(calls).toEqual(["HARVEST", "TRANSFORM", "IMPORT"]);
    expect(runner.state).toEqual({ phase: "completed", status: "success" });
  });

  test("critical failure stops the run at that step", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [{ kind: "HARVEST", config: { outcome: "fail" } }, { kind: "TRANSFORM" }, { kind: "IMPORT" }],
      calls,
    );

    const results = await runner.run();

    expect(calls).toEqual(["HARVEST"]);
    expect(results.entries.map((e) => e.label)).toEqual(["harvest"]);
    expect(results.status).toBe("error");
  });

  test("critical failure aborts but cleanup still runs", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [
        { kind: "HARVEST", config: { outcome: "fail" } },
        { kind: "TRANSFORM" },
        { kind: "IMPORT" },
        { kind: "CLEANUP" },
      ],
      calls,
    );

    const results = await runner.run();

    expect(calls).toEqual(["HARVEST", "CLEANUP"]);
    expect(results.entries.map((e) => e.label)).toEqual(["harvest", "cleanup"]);
    expect(results.entries[0]).toMatchObject({
      succeeded: false,
      critical: true,
      message: "Malformed data: bad rows",
      error: "DataFormatError",
    });
    expect(results.status).toBe("error");
    expect(runner.state).toEqual({ phase: "aborted" });
  });

  test("every cleanup subtask runs after an abort", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [
        { kind: "CLEANUP" },
        { kind: "IMPORT", config: { outcome: "fail" } },
        { kind: "SUBJECT_RESOLVE" },
        { kind: "CLEANUP" },
        { kind: "CLEANUP" },
      ],
      calls,
    );

    const results = await runner.run();

    expect(calls).toEqual(["CLEANUP", "IMPORT", "CLEANUP", "CLEANUP"]);
    expect(results.entries.map((e) => e.label)).toEqual(["cleanup", "import", "cleanup#2", "cleanup#3"]);
    expect(results.status).toBe("error");
  });

  test("non-critical failure continues and yields partial", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [{ kind: "HARVEST" }, { kind: "TRANSFORM", config: { outcome: "fail" } }, { kind: "IMPORT" }],
      calls,
    );

    const results = await runner.run();

    expect(calls).toEqual(["HARVEST", "TRANSFORM", "IMPORT"]);
    expect(results.entries.map((e) => e.succeeded)).toEqual([true, false, true]);
    expect(results.status).toBe("partial");
    expect(runner.state).toEqual({ phase: "completed", status: "partial" });
  });

  test("failed cleanup after an abort keeps the error status", async () => {
    const runner = makeRunner([
      { kind: "HARVEST", config: { outcome: "fail" } },
      { kind: "CLEANUP", config: { outcome: "fail" } },
    ]);
    const results = await runner.run();
    expect(results.entries.map((e) => e.succeeded)).toEqual([false, false]);
    expect(results.status).toBe("error");
  });

  test("a non-critical step marked critical aborts the run", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [{ kind: "TRANSFORM", critical: true, config: { outcome: "fail" } }, { kind: "IMPORT" }],
      calls,
    );
    const results = await runner.run();
    expect(calls).toEqual(["TRANSFORM"]);
    expect(results.status).toBe("error");
  });

  test("a critical step marked non-critical does not abort", async () => {
    const runner = makeRunner([
      { kind: "HARVEST", critical: false, config: { outcome: "fail" } },
      { kind: "IMPORT" },
    ]);
    const results = await runner.run();
    expect(results.entries).toHaveLength(2);
    expect(results.status).toBe("partial");
  });

  test("a provider that throws becomes a failed entry", async () => {
    const runner = makeRunner([{ kind: "HARVEST" }, { kind: "TRANSFORM", config: { outcome: "throw" } }]);
    const results = await runner.run();
    expect(results.entries[1]).toMatchObject({
      label: "transform",
      succeeded: false,
      message: "boom",
      error: "Error",
    });
    expect(results.status).toBe("partial");
  });

  test("successful steps commit staged and produced artifacts", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [
        { kind: "HARVEST", config: { stage: "harvest_dir", produce: "harvest_path" } },
        { kind: "TRANSFORM", config: { read: "harvest_path" } },
      ],
      calls,
    );

    const results = await runner.run();

    expect(results.entries[0]?.artifacts).toEqual({
      harvest_dir: "HARVEST staged",
      harvest_path: "HARVEST produced",
    });
    expect(calls).toEqual(["HARVEST", "TRANSFORM:HARVEST produced"]);
    expect(runner.artifacts).toEqual({
      harvest_dir: "HARVEST staged",
      harvest_path: "HARVEST produced",
    });
  });

  test("a failed step's staged writes are discarded", async () => {
    const calls: string[] = [];
    const runner = makeRunner(
      [
        { kind: "TRANSFORM", config: { stage: "concepts_tree", outcome: "fail" } },
        { kind: "IMPORT", config: { read: "concepts_tree" } },
      ],
      calls,
    );

    const results = await runner.run();

    expect(results.entries[0]?.artifacts).toEqual({});
    expect(calls).toEqual(["TRANSFORM", "IMPORT:-"]);
    expect(runner.artifacts).toEqual({});
  });

  test("a runner runs once", async () => {
    const runner = makeRunner([{ kind: "HARVEST" }]);
    await runner.run();
    await expect(runner.run()).rejects.toThrow("Task task-1 has already been run");
  });

  test("real providers report bad configuration as a failed step", async () => {
    const info = createTaskInfo({
      vocabularyId: "animals",
      versionId: "v1",
      subtasks: [{ kind: "HARVEST", config: { source: "ftp" } }, { kind: "CLEANUP" }],
    });
    const runner = new TaskRunner("task-2", info, makeEnv(makeTmpDir()));

    const results = await runner.run();

    expect(results.entries.map((e) => [e.label, e.succeeded, e.error])).toEqual([
      ["harvest", false, "ConfigurationError"],
      ["cleanup", true, undefined],
    ]);
    expect(results.entries[0]?.message).toMatch(/^Invalid HARVEST configuration: source: /);
    expect(results.status).toBe("error");
  });

  test("validatePlan names the first subtask its provider rejects", () => {
    const info = createTaskInfo({
      vocabularyId: "animals",
      versionId: "v1",
      subtasks: [
        { kind: "HARVEST" },
        { kind: "TRANSFORM", config: { outcome: "invalid" } },
        { kind: "IMPORT", config: { outcome: "invalid" } },
      ],
    });
    const plan = planSubtasks(info, makeEnv(makeTmpDir()), scriptedRegistry([]));
    expect(() => validatePlan(plan)).toThrow(
      "Invalid task: subtask transform: Invalid TRANSFORM configuration: outcome",
    );
  });

  test("a runner given a plan uses its providers", async () => {
    const calls: string[] = [];
    const info = createTaskInfo({ vocabularyId: "animals", versionId: "v1", subtasks: [{ kind: "CLEANUP" }] });
    const plan = planSubtasks(info, makeEnv(makeTmpDir()), scriptedRegistry(calls));
    const runner = new TaskRunner("task-4", info, makeEnv(makeTmpDir()), { plan });

    const results = await runner.run();

    expect(calls).toEqual(["CLEANUP"]);
    expect(results.entries[0]?.message).toBe("CLEANUP done");
  });

  test("real providers validate their configuration", () => {
    const info = createTaskInfo({
      vocabularyId: "animals",
      versionId: "v1",
      subtasks: [{ kind: "CLEANUP", config: { purgeHarvest: "yes" } }],
    });
    const plan = planSubtasks(info, makeEnv(makeTmpDir()));
    expect(() => validatePlan(plan)).toThrow(
      "Invalid task: subtask cleanup: Invalid CLEANUP configuration: purgeHarvest: Expected boolean, received string",
    );
  });

  test("registry entries must build the kind they are filed under", () => {
    const calls: string[] = [];
    const registry = scriptedRegistry(calls);
    registry[ProviderKind.Import] = () => new ScriptedProvider(ProviderKind.Cleanup, calls);
    const info = createTaskInfo({ vocabularyId: "a", versionId: "b", subtasks: [{ kind: "IMPORT" }] });
    expect(() => new TaskRunner("task-3", info, makeEnv(makeTmpDir()), { registry })).toThrow(
      "Registry entry for IMPORT built a CLEANUP provider",
    );
  });
});
