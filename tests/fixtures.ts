/**
 * Shared test fixtures: mini SPARQL results, zip builder, in-process
 * stand-ins for sources, sinks and resolvers, pre-configured toolkit.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { zipSync, strToU8 } from "fflate";

import { VocabToolkit, type ToolkitOptions } from "../src/index.js";
import { RunContext, type StagedStep } from "../src/core/run-context.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { SqlTaskRepository } from "../src/db/tasks.js";
import { createLogger, type Logger } from "../src/logger.js";
import type { ProviderEnv } from "../src/providers/registry.js";
import type { SubjectLookup, SubjectResolver } from "../src/resolvers/backend.js";
import type { IndexDocument, IndexSink } from "../src/sinks/backend.js";
import type { HarvestSource, HarvestedData } from "../src/sources/backend.js";
import { FileSource } from "../src/sources/file.js";
import { DiskStorage } from "../src/storage/disk.js";

// ---------------------------------------------------------------------------
// Mini SKOS vocabulary as SPARQL JSON results
// ---------------------------------------------------------------------------

export const EX = "http://example.org/vocab/";

function uri(local: string) {
  return { type: "uri", value: `${EX}${local}` };
}

function label(value: string, lang: string) {
  return { type: "literal", value, "xml:lang": lang };
}

/** animals > (birds, mammals > dogs); plants. "animals" is labelled fr then en. */
export const ANIMAL_BINDINGS = [
  { concept: uri("animals"), prefLabel: label("Animaux", "fr") },
  { concept: uri("animals"), prefLabel: label("Animals", "en") },
  { concept: uri("mammals"), prefLabel: label("Mammals", "en"), broader: uri("animals") },
  { concept: uri("birds"), prefLabel: label("Birds", "en"), broader: uri("animals") },
  { concept: uri("dogs"), prefLabel: label("Dogs", "en"), broader: uri("mammals") },
  { concept: uri("plants"), prefLabel: label("Plants", "en") },
];

export function sparqlJson(bindings: unknown[] = ANIMAL_BINDINGS): string {
  return JSON.stringify({
    head: { vars: ["concept", "prefLabel", "broader"] },
    results: { bindings },
  });
}

// ---------------------------------------------------------------------------
// Zip builder helper
// ---------------------------------------------------------------------------

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] = typeof data === "string" ? strToU8(data) : data;
  }
  return zipSync(zipFiles);
}

// ---------------------------------------------------------------------------
// Temp dir helper
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "vocabtoolkit-test-"));
}

// ---------------------------------------------------------------------------
// In-process stand-ins
// ---------------------------------------------------------------------------

/** Returns the same payload for every fetch, or throws `error` when set. */
export class StaticSource<S> implements HarvestSource<S> {
  calls: S[] = [];
  error: Error | null = null;
  private harvested: HarvestedData;

  constructor(data: string | Uint8Array, filename = "harvest.json") {
    this.harvested = { data: typeof data === "string" ? strToU8(data) : data, filename };
  }

  async fetch(settings: S): Promise<HarvestedData> {
    this.calls.push(settings);
    if (this.error) throw this.error;
    return this.harvested;
  }
}

export class MemorySink implements IndexSink {
  published: IndexDocument[] = [];
  error: Error | null = null;

  async publish(doc: IndexDocument): Promise<void> {
    if (this.error) throw this.error;
    this.published.push(doc);
  }
}

/**
 * Answers lookups from a label → IRI table; unknown labels resolve to null.
 * Throws `error` when set.
 */
export class TableResolver implements SubjectResolver {
  lookups: SubjectLookup[] = [];
  error: Error | null = null;
  private table: Record<string, string>;

  constructor(table: Record<string, string> = {}) {
    this.table = table;
  }

  async resolve(lookup: SubjectLookup): Promise<string | null> {
    this.lookups.push(lookup);
    if (this.error) throw this.error;
    return this.table[lookup.label] ?? null;
  }
}

export interface TestEnv extends ProviderEnv {
  storage: DiskStorage;
  sink: MemorySink;
  resolver: TableResolver;
  sparql: StaticSource<unknown>;
}

export function makeEnv(dir: string, harvest: string | Uint8Array = sparqlJson()): TestEnv {
  const sparql = new StaticSource<unknown>(harvest);
  return {
    storage: new DiskStorage(join(dir, "storage")),
    sources: { sparql, poolparty: sparql, file: new FileSource() },
    sink: new MemorySink(),
    resolver: new TableResolver(),
    sparql,
  };
}

/** Logger for steps built outside a runner. */
export const testLogger: Logger = createLogger({ test: true });

export function makeStep(
  identity = { taskId: "task-1", vocabularyId: "animals", versionId: "v1" },
): { run: RunContext; step: StagedStep } {
  const run = new RunContext(identity);
  return { run, step: run.stage(testLogger) };
}

// ---------------------------------------------------------------------------
// Pre-configured toolkit
// ---------------------------------------------------------------------------

export async function makeToolkit(
  dir: string,
  opts: ToolkitOptions = {},
): Promise<{ toolkit: VocabToolkit; env: TestEnv; db: SQLiteBackend }> {
  const env = makeEnv(dir);
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  const toolkit = new VocabToolkit(new SqlTaskRepository(db), env, { db, ...opts });
  return { toolkit, env, db };
}

export const SPARQL_HARVEST = {
  kind: "HARVEST",
  config: { source: "sparql", apiUrl: "http://sparql.test/query" },
};

/** Holds every fetch until open() is called. */
export class GatedSource implements HarvestSource<unknown> {
  private opened: Promise<void>;
  private release: () => void = () => undefined;
  private data: Uint8Array;

  constructor(data: string = sparqlJson()) {
    this.data = strToU8(data);
    this.opened = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release();
  }

  async fetch(): Promise<HarvestedData> {
    await this.opened;
    return { data: this.data, filename: "harvest.json" };
  }
}
