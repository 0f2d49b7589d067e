/**
 * Resolver for lookup services answering `GET <endpoint>?label=…` with
 * `{"iri": "…" | null}`.
 */
import { z } from "zod";
import { DataFormatError, SourceUnavailableError } from "../core/exceptions.js";
import { DEFAULT_HTTP_TIMEOUT_MS, send } from "../sources/http.js";
import type { SubjectLookup, SubjectResolver } from "./backend.js";

const LookupResponseSchema = z.object({
  iri: z.string().url().nullable(),
});

export class HttpSubjectResolver implements SubjectResolver {
  private timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  async resolve(lookup: SubjectLookup): Promise<string | null> {
    const url = new URL(lookup.endpoint);
    url.searchParams.set("label", lookup.label);

    const response = await send(url.toString(), {
      headers: { Accept: "application/json" },
      timeoutMs: lookup.timeoutMs ?? this.timeoutMs,
    });
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new SourceUnavailableError(`${url} responded ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new DataFormatError(`${url} returned invalid JSON`);
    }
    const parsed = LookupResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DataFormatError(`${url} returned an unexpected lookup response`);
    }
    return parsed.data.iri;
  }
}
