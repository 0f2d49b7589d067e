/**
 * Import provider: publish a version's canonical representation to the index.
 */
import { z } from "zod";

import { DataFormatError } from "../../core/exceptions.js";
import { BaseProvider, type StepResult } from "../../core/provider.js";
import type { StepContext } from "../../core/run-context.js";
import { ProviderKind } from "../../core/types.js";
import type { ResolvedSubject } from "../../resolvers/backend.js";
import type { IndexDocument, IndexSink } from "../../sinks/backend.js";
import type { StorageBackend } from "../../storage/backend.js";
import { HARVEST_PATH } from "../harvest/harvest.js";
import { RESOLVED_SUBJECTS, ResolvedSubjectsSchema } from "../resolve/subjects.js";
import { CONCEPTS_TREE } from "../transform/concept-tree.js";
import { ConceptTreeSchema, type ConceptNode } from "../transform/schemas.js";

export const INDEX_DOCUMENT_ID = "index_document_id";

const ImportConfigSchema = z.object({
  documentId: z.string().min(1).optional(),
});

type ImportConfig = z.infer<typeof ImportConfigSchema>;

export class IndexImportProvider extends BaseProvider<ImportConfig> {
  readonly kind = ProviderKind.Import;
  protected readonly configSchema = ImportConfigSchema;
  private storage: StorageBackend;
  private sink: IndexSink;

  constructor(storage: StorageBackend, sink: IndexSink) {
    super();
    this.storage = storage;
    this.sink = sink;
  }

  private async readJson<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw = new TextDecoder().decode(await this.storage.read(key));
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new DataFormatError(`${key} is not valid JSON`);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) throw new DataFormatError(`${key} has an unexpected shape`);
    return parsed.data;
  }

  protected async run(config: ImportConfig, context: StepContext): Promise<StepResult> {
    const harvestPath = context.require(HARVEST_PATH);

    const treeKey = context.get(CONCEPTS_TREE);
    const concepts: ConceptNode[] | null = treeKey
      ? await this.readJson(treeKey, ConceptTreeSchema)
      : null;

    const subjectsKey = context.get(RESOLVED_SUBJECTS);
    const subjects: ResolvedSubject[] = subjectsKey
      ? await this.readJson(subjectsKey, ResolvedSubjectsSchema)
      : [];

    const doc: IndexDocument = {
      id: config.documentId ?? `${context.vocabularyId}:${context.versionId}`,
      vocabularyId: context.vocabularyId,
      versionId: context.versionId,
      harvestPath,
      concepts,
      subjects,
    };
    await this.sink.publish(doc);

    return {
      message: `published ${doc.id}`,
      artifacts: { [INDEX_DOCUMENT_ID]: doc.id },
    };
  }
}
