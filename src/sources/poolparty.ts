/**
 * PoolParty project source, harvested through the project's SPARQL endpoint.
 */
import { z } from "zod";
import type { HarvestSource, HarvestedData } from "./backend.js";
import { DEFAULT_HTTP_TIMEOUT_MS } from "./http.js";
import { DEFAULT_CONCEPT_QUERY, runSparqlQuery } from "./sparql.js";

export const PoolPartySettingsSchema = z.object({
  source: z.literal("poolparty"),
  apiUrl: z.string().url(),
  project: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type PoolPartySettings = z.infer<typeof PoolPartySettingsSchema>;

export function poolPartyEndpoint(apiUrl: string, project: string): string {
  return `${apiUrl.replace(/\/+$/, "")}/PoolParty/sparql/${encodeURIComponent(project)}`;
}

export class PoolPartySource implements HarvestSource<PoolPartySettings> {
  private timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  async fetch(settings: PoolPartySettings): Promise<HarvestedData> {
    const data = await runSparqlQuery({
      endpoint: poolPartyEndpoint(settings.apiUrl, settings.project),
      query: DEFAULT_CONCEPT_QUERY,
      username: settings.username,
      password: settings.password,
      timeoutMs: settings.timeoutMs ?? this.timeoutMs,
    });
    return { data, filename: `${settings.project}.json` };
  }
}
