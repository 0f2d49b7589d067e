/**
 * Task persistence – the store a run is recorded in.
 */
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { TaskResultsSchema } from "../core/results.js";
import { parseStoredTaskInfo } from "../core/task-info.js";
import type {
  TaskInfo,
  TaskRecord,
  TaskResults,
  TaskStatus,
  VersionStatus,
} from "../core/types.js";
import type { DatabaseBackend, Row } from "./backend.js";

export interface TaskRepository {
  /** Record an accepted run and mark its version "processing". */
  createTask(info: TaskInfo): Promise<string>;

  /** Record a run's results and its version's terminal status. Fails unless the task is running. */
  completeTask(taskId: string, results: TaskResults): Promise<void>;

  getTask(taskId: string): Promise<TaskRecord | null>;

  getAllTasks(): Promise<TaskRecord[]>;

  /** Tasks created but never completed. */
  listIncompleteTasks(): Promise<TaskRecord[]>;

  getVersionStatus(vocabularyId: string, versionId: string): Promise<VersionStatus | null>;
}

export function versionStatusFor(status: TaskStatus): VersionStatus {
  return status === "error" ? "error" : "published";
}

const TaskRowSchema = z.object({
  id: z.string(),
  status: z.enum(["running", "success", "partial", "error"]),
  params: z.string(),
  response: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  completed_at: z.string().nullable(),
});

const VersionStatusSchema = z.enum(["draft", "processing", "published", "error"]);

const UPSERT_VERSION = `INSERT INTO versions (vocabulary_id, version_id, status, updated_at) VALUES (?, ?, ?, ?)
  ON CONFLICT (vocabulary_id, version_id) DO UPDATE SET status = excluded.status, updated_at = excluded.updated_at`;

// ---------------------------------------------------------------------------
// Raw SQL implementation
// ---------------------------------------------------------------------------

export class SqlTaskRepository implements TaskRepository {
  private db: DatabaseBackend;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  async createTask(info: TaskInfo): Promise<string> {
    const id = randomUUID();
    const now = new Date().toISOString();
    await this.db.transaction(async () => {
      await this.db.execute(
        `INSERT INTO tasks (id, vocabulary_id, version_id, status, params, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [id, info.vocabularyId, info.versionId, "running", JSON.stringify(info), now, now],
      );
      await this.db.execute(UPSERT_VERSION, [
        info.vocabularyId,
        info.versionId,
        "processing",
        now,
      ]);
    });
    return id;
  }

  async completeTask(taskId: string, results: TaskResults): Promise<void> {
    const now = new Date().toISOString();
    await this.db.transaction(async () => {
      const row = await this.db.queryOne(
        `SELECT vocabulary_id, version_id, status FROM tasks WHERE id = ?`,
        [taskId],
      );
      const task = z
        .object({ vocabulary_id: z.string(), version_id: z.string(), status: z.string() })
        .safeParse(row);
      if (!task.success) throw new Error(`No task with id ${taskId}`);
      // A task's results are written once
      if (task.data.status !== "running") {
        throw new Error(`Task ${taskId} is already complete (${task.data.status})`);
      }

      await this.db.execute(
        `UPDATE tasks SET status = ?, response = ?, updated_at = ?, completed_at = ? WHERE id = ? AND status = ?`,
        [results.status, JSON.stringify(results), now, now, taskId, "running"],
      );
      await this.db.execute(UPSERT_VERSION, [
        task.data.vocabulary_id,
        task.data.version_id,
        versionStatusFor(results.status),
        now,
      ]);
    });
  }

  async getTask(taskId: string): Promise<TaskRecord | null> {
    const row = await this.db.queryOne(`SELECT * FROM tasks WHERE id = ?`, [taskId]);
    return row ? toRecord(row) : null;
  }

  async getAllTasks(): Promise<TaskRecord[]> {
    const rows = await this.db.query(`SELECT * FROM tasks ORDER BY created_at, id`);
    return rows.map(toRecord);
  }

  async listIncompleteTasks(): Promise<TaskRecord[]> {
    const rows = await this.db.query(
      `SELECT * FROM tasks WHERE status = ? ORDER BY created_at, id`,
      ["running"],
    );
    return rows.map(toRecord);
  }

  async getVersionStatus(
    vocabularyId: string,
    versionId: string,
  ): Promise<VersionStatus | null> {
    const row = await this.db.queryOne(
      `SELECT status FROM versions WHERE vocabulary_id = ? AND version_id = ?`,
      [vocabularyId, versionId],
    );
    return row ? VersionStatusSchema.parse(row.status) : null;
  }
}

function toRecord(raw: Row): TaskRecord {
  const row = TaskRowSchema.parse(raw);
  return {
    taskId: row.id,
    info: parseStoredTaskInfo(JSON.parse(row.params)),
    status: row.status,
    results: row.response === null ? null : TaskResultsSchema.parse(JSON.parse(row.response)),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
  };
}
