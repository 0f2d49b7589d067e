/**
 * Index sink interface – where imported vocabulary versions are published.
 */
import type { ResolvedSubject } from "../resolvers/backend.js";
import type { ConceptNode } from "../providers/transform/schemas.js";

export interface IndexDocument {
  id: string;
  vocabularyId: string;
  versionId: string;
  harvestPath: string;
  /** Concept tree, when a transform step produced one. */
  concepts: ConceptNode[] | null;
  subjects: ResolvedSubject[];
}

export interface IndexSink {
  publish(doc: IndexDocument): Promise<void>;
}
