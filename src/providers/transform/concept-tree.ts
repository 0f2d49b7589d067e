/**
 * Concept tree transform: SPARQL JSON results → broader/narrower hierarchy.
 */
import type { Readable } from "node:stream";
import Parser from "stream-json/Parser.js";
import Pick from "stream-json/filters/Pick.js";
import StreamArray from "stream-json/streamers/StreamArray.js";
import { z } from "zod";

import { DataFormatError } from "../../core/exceptions.js";
import { BaseProvider, type StepResult } from "../../core/provider.js";
import type { StepContext } from "../../core/run-context.js";
import { ProviderKind } from "../../core/types.js";
import type { StorageBackend } from "../../storage/backend.js";
import { HARVEST_PATH } from "../harvest/harvest.js";
import { ConceptBindingSchema, type ConceptBinding, type ConceptNode } from "./schemas.js";

export const CONCEPTS_TREE = "concepts_tree";

const TransformConfigSchema = z.object({
  sort: z.boolean().default(true),
  /** Preferred language when a concept has several labels. */
  language: z.string().min(1).default("en"),
});

type TransformConfig = z.infer<typeof TransformConfigSchema>;

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

/** Stream `results.bindings` out of a SPARQL JSON document. */
export function readBindings(input: Readable): Promise<ConceptBinding[]> {
  return new Promise<ConceptBinding[]>((resolve, reject) => {
    const bindings: ConceptBinding[] = [];
    let settled = false;
    const fail = (err: Error) => {
      if (!settled) {
        settled = true;
        reject(err);
      }
    };
    const malformed = (err: Error) =>
      fail(err instanceof DataFormatError ? err : new DataFormatError(err.message));

    const jsonParser = new Parser();
    const pick = new Pick({ filter: "results.bindings" });
    const items = new StreamArray();

    input.on("error", fail);
    jsonParser.on("error", malformed);
    pick.on("error", malformed);
    items.on("error", malformed);

    const pipeline = input.pipe(jsonParser).pipe(pick).pipe(items);

    pipeline.on("data", ({ key, value }: { key: number; value: unknown }) => {
      if (settled) return;
      const parsed = ConceptBindingSchema.safeParse(value);
      if (!parsed.success) {
        malformed(
          new DataFormatError(`binding ${key}: ${parsed.error.issues[0]?.message ?? "invalid"}`),
        );
        input.destroy();
        return;
      }
      bindings.push(parsed.data);
    });

    pipeline.on("end", () => {
      if (!settled) {
        settled = true;
        resolve(bindings);
      }
    });
  });
}

// ---------------------------------------------------------------------------
// Building
// ---------------------------------------------------------------------------

interface ConceptEntry {
  label: string | null;
  labelLang: string | undefined;
  broader: Set<string>;
}

export interface ConceptTree {
  roots: ConceptNode[];
  conceptCount: number;
}

function compareNodes(a: ConceptNode, b: ConceptNode): number {
  const ka = a.label ?? a.iri;
  const kb = b.label ?? b.iri;
  if (ka !== kb) return ka < kb ? -1 : 1;
  if (a.iri === b.iri) return 0;
  return a.iri < b.iri ? -1 : 1;
}

/**
 * Build the hierarchy. A concept with several broader concepts appears
 * under each of them; concepts with no known broader concept are roots.
 */
export function buildConceptTree(
  bindings: readonly ConceptBinding[],
  opts: { sort?: boolean; language?: string } = {},
): ConceptTree {
  const sort = opts.sort ?? true;
  const language = opts.language ?? "en";
  const concepts = new Map<string, ConceptEntry>();

  for (const b of bindings) {
    const iri = b.concept.value;
    let entry = concepts.get(iri);
    if (!entry) {
      entry = { label: null, labelLang: undefined, broader: new Set() };
      concepts.set(iri, entry);
    }
    if (b.prefLabel) {
      const lang = b.prefLabel["xml:lang"];
      if (entry.label === null || (lang === language && entry.labelLang !== language)) {
        entry.label = b.prefLabel.value;
        entry.labelLang = lang;
      }
    }
    if (b.broader && b.broader.value !== iri) entry.broader.add(b.broader.value);
  }

  if (concepts.size === 0) {
    throw new DataFormatError("no concepts found in harvested data");
  }

  const narrower = new Map<string, string[]>();
  const rootIris: string[] = [];
  for (const [iri, entry] of concepts) {
    const known = [...entry.broader].filter((b) => concepts.has(b));
    if (known.length === 0) rootIris.push(iri);
    for (const parent of known) {
      const list = narrower.get(parent) ?? [];
      list.push(iri);
      narrower.set(parent, list);
    }
  }

  const reached = new Set<string>();
  const build = (iri: string, path: Set<string>): ConceptNode => {
    reached.add(iri);
    path.add(iri);
    const children = (narrower.get(iri) ?? [])
      .filter((child) => !path.has(child))
      .map((child) => build(child, path));
    path.delete(iri);
    if (sort) children.sort(compareNodes);
    return { iri, label: concepts.get(iri)?.label ?? null, children };
  };

  const roots = rootIris.map((iri) => build(iri, new Set()));
  if (sort) roots.sort(compareNodes);

  for (const iri of concepts.keys()) {
    if (!reached.has(iri)) {
      throw new DataFormatError(
        `concept hierarchy has a cycle: ${iri} is not reachable from any top concept`,
      );
    }
  }

  return { roots, conceptCount: concepts.size };
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class ConceptTreeTransformProvider extends BaseProvider<TransformConfig> {
  readonly kind = ProviderKind.Transform;
  protected readonly configSchema = TransformConfigSchema;
  private storage: StorageBackend;

  constructor(storage: StorageBackend) {
    super();
    this.storage = storage;
  }

  protected async run(config: TransformConfig, context: StepContext): Promise<StepResult> {
    const input = context.require(HARVEST_PATH);
    if (!(await this.storage.exists(input))) {
      throw new DataFormatError(`harvested file ${input} is missing`);
    }
    const bindings = await readBindings(this.storage.readStream(input));
    const tree = buildConceptTree(bindings, config);

    const key = `${context.versionPrefix}/concepts_tree.json`;
    await this.storage.write(key, JSON.stringify(tree.roots));
    context.logger.debug("Concept tree written", { key, concepts: tree.conceptCount });

    return {
      message: `built tree of ${tree.conceptCount} concepts (${tree.roots.length} top concepts)`,
      artifacts: { [CONCEPTS_TREE]: key },
    };
  }
}
