/**
 * Subject resolver interface – maps a free-text subject to a canonical IRI.
 */

export interface SubjectLookup {
  endpoint: string;
  label: string;
  timeoutMs?: number;
}

export interface SubjectResolver {
  /** The subject's IRI, or null when the source does not know the label. */
  resolve(lookup: SubjectLookup): Promise<string | null>;
}

export interface ResolvedSubject {
  source: string;
  label: string;
  iri: string | null;
}
