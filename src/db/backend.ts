/**
 * Database backend interface.
 *
 * All implementations use raw SQL, no ORM. Statements use `?` placeholders.
 */
export type SqlValue = string | number | null;

export type Row = Record<string, unknown>;

export interface DatabaseBackend {
  /** Create tables / indexes from SCHEMA_SQL. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlValue[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query(sql: string, params?: SqlValue[]): Promise<Row[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne(sql: string, params?: SqlValue[]): Promise<Row | null>;

  /** Execute `fn` inside a transaction; a rejection rolls it back. */
  transaction(fn: () => Promise<void>): Promise<void>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
