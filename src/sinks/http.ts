/**
 * Sink posting documents as JSON to a search index update URL.
 */
import { SinkRejectedError, SourceUnavailableError } from "../core/exceptions.js";
import { DEFAULT_HTTP_TIMEOUT_MS, send } from "../sources/http.js";
import type { IndexDocument, IndexSink } from "./backend.js";

export class HttpIndexSink implements IndexSink {
  private url: string;
  private timeoutMs: number;

  constructor(url: string, timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS) {
    this.url = url;
    this.timeoutMs = timeoutMs;
  }

  async publish(doc: IndexDocument): Promise<void> {
    const response = await send(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify([doc]),
      timeoutMs: this.timeoutMs,
    });
    if (response.ok) return;

    const detail = `${this.url} responded ${response.status} for ${doc.id}`;
    if (response.status >= 500) throw new SourceUnavailableError(detail);
    throw new SinkRejectedError(detail);
  }
}
