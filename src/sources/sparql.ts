/**
 * SPARQL endpoint source.
 */
import { z } from "zod";
import type { HarvestSource, HarvestedData } from "./backend.js";
import { DEFAULT_HTTP_TIMEOUT_MS, fetchBytes } from "./http.js";

/** Every concept with its preferred label and broader concepts. */
export const DEFAULT_CONCEPT_QUERY = `PREFIX skos: <http://www.w3.org/2004/02/skos/core#>
SELECT ?concept ?prefLabel ?broader WHERE {
  ?concept a skos:Concept .
  OPTIONAL { ?concept skos:prefLabel ?prefLabel }
  OPTIONAL { ?concept skos:broader ?broader }
}`;

export const SparqlSettingsSchema = z.object({
  source: z.literal("sparql"),
  apiUrl: z.string().url(),
  query: z.string().min(1).optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type SparqlSettings = z.infer<typeof SparqlSettingsSchema>;

export interface SparqlQuery {
  endpoint: string;
  query: string;
  username?: string;
  password?: string;
  timeoutMs: number;
}

export async function runSparqlQuery(q: SparqlQuery): Promise<Uint8Array> {
  return fetchBytes(q.endpoint, {
    method: "POST",
    headers: {
      Accept: "application/sparql-results+json",
      "Content-Type": "application/x-www-form-urlencoded",
    },
    body: new URLSearchParams({ query: q.query }).toString(),
    username: q.username,
    password: q.password,
    timeoutMs: q.timeoutMs,
  });
}

export class SparqlSource implements HarvestSource<SparqlSettings> {
  private timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  async fetch(settings: SparqlSettings): Promise<HarvestedData> {
    const data = await runSparqlQuery({
      endpoint: settings.apiUrl,
      query: settings.query ?? DEFAULT_CONCEPT_QUERY,
      username: settings.username,
      password: settings.password,
      timeoutMs: settings.timeoutMs ?? this.timeoutMs,
    });
    return { data, filename: "harvest.json" };
  }
}
