/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import { isRow, type DatabaseBackend, type Row, type SqlValue } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

export class SQLiteBackend implements DatabaseBackend {
  private db: Database.Database;
  // One connection: transactions must not interleave
  private txQueue: Promise<void> = Promise.resolve();

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.db.exec(SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    this.db.prepare(sql).run(...params);
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    const rows: unknown[] = this.db.prepare(sql).all(...params);
    return rows.filter(isRow);
  }

  async queryOne(sql: string, params: SqlValue[] = []): Promise<Row | null> {
    const row: unknown = this.db.prepare(sql).get(...params);
    return isRow(row) ? row : null;
  }

  transaction(fn: () => Promise<void>): Promise<void> {
    const run = this.txQueue.then(async () => {
      this.db.exec("BEGIN");
      try {
        await fn();
        this.db.exec("COMMIT");
      } catch (err) {
        this.db.exec("ROLLBACK");
        throw err;
      }
    });
    this.txQueue = run.catch(() => undefined);
    return run;
  }

  async close(): Promise<void> {
    await this.txQueue;
    this.db.close();
  }
}
