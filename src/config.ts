/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigurationError } from "./core/exceptions.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { LogLevel } from "./logger.js";
import type { ProviderEnv } from "./providers/registry.js";
import { HttpSubjectResolver } from "./resolvers/http.js";
import type { IndexSink } from "./sinks/backend.js";
import { HttpIndexSink } from "./sinks/http.js";
import { StorageIndexSink } from "./sinks/storage.js";
import { FileSource } from "./sources/file.js";
import { DEFAULT_HTTP_TIMEOUT_MS } from "./sources/http.js";
import { PoolPartySource } from "./sources/poolparty.js";
import { SparqlSource } from "./sources/sparql.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const TimeoutSchema = z.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS);

const StorageConfigSchema = z.object({
  provider: z.literal("disk").default("disk"),
  config: z.object({ basePath: z.string().min(1).default("./data") }).default({}),
});

const DbConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("sqlite"),
    config: z.object({ path: z.string().min(1).default(":memory:") }).default({}),
  }),
  z.object({
    provider: z.literal("postgres"),
    config: z.object({ connectionString: z.string().min(1) }),
  }),
]);

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  db: DbConfigSchema.default({ provider: "sqlite" }),
  /** Search index update URL; without one, documents go to storage. */
  index: z
    .object({ url: z.string().url().optional(), timeoutMs: TimeoutSchema })
    .default({}),
  /** Bound on harvest and resolver calls. */
  http: z.object({ timeoutMs: TimeoutSchema }).default({}),
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.Info),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface Backends {
  storage: StorageBackend;
  db: DatabaseBackend;
  env: ProviderEnv;
  logLevel: LogLevel;
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function buildStorage(config: Config["storage"]): StorageBackend {
  return new DiskStorage(config.config.basePath);
}

function buildDb(config: Config["db"]): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.config.path);
    case "postgres":
      return new PostgresBackend(config.config.connectionString);
  }
}

function buildSink(config: Config["index"], storage: StorageBackend): IndexSink {
  return config.url
    ? new HttpIndexSink(config.url, config.timeoutMs)
    : new StorageIndexSink(storage);
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): Backends {
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  const config = parsed.data;

  const storage = buildStorage(config.storage);
  const timeoutMs = config.http.timeoutMs;
  return {
    storage,
    db: buildDb(config.db),
    env: {
      storage,
      sources: {
        sparql: new SparqlSource(timeoutMs),
        poolparty: new PoolPartySource(timeoutMs),
        file: new FileSource(),
      },
      sink: buildSink(config.index, storage),
      resolver: new HttpSubjectResolver(timeoutMs),
    },
    logLevel: config.logLevel,
  };
}
