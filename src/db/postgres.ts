/**
 * PostgreSQL database backend using postgres-js.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import postgres from "postgres";
import type { DatabaseBackend, Row, SqlValue } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

/** Rewrite `?` placeholders as `$1, $2, …`. */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

export class PostgresBackend implements DatabaseBackend {
  private sql: postgres.Sql;
  // Statements issued inside transaction() go to its connection
  private tx = new AsyncLocalStorage<postgres.TransactionSql>();

  constructor(connectionString: string) {
    this.sql = postgres(connectionString);
  }

  private get conn(): postgres.ISql {
    return this.tx.getStore() ?? this.sql;
  }

  async initialize(): Promise<void> {
    await this.sql.unsafe(SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    await this.conn.unsafe(toPositional(sql), params);
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    const rows = await this.conn.unsafe(toPositional(sql), params);
    return [...rows];
  }

  async queryOne(sql: string, params: SqlValue[] = []): Promise<Row | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async transaction(fn: () => Promise<void>): Promise<void> {
    await this.sql.begin(async (tx) => {
      await this.tx.run(tx, fn);
    });
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
