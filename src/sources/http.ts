/**
 * Bounded HTTP calls over the global fetch.
 */
import { describeError } from "../logger.js";
import { SourceUnavailableError } from "../core/exceptions.js";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export interface HttpOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
}

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

/**
 * Send a request. Network errors and timeouts become SourceUnavailableError;
 * the status is left to the caller.
 */
export async function send(url: string, opts: HttpOptions = {}): Promise<Response> {
  const headers: Record<string, string> = { ...opts.headers };
  if (opts.username !== undefined) {
    headers.Authorization = basicAuth(opts.username, opts.password ?? "");
  }
  const timeoutMs = opts.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  try {
    return await fetch(url, {
      method: opts.method ?? "GET",
      headers,
      body: opts.body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && err.name === "TimeoutError") {
      throw new SourceUnavailableError(`${url} did not respond within ${timeoutMs} ms`);
    }
    throw new SourceUnavailableError(`${url}: ${describeError(err)}`);
  }
}

/** GET/POST and return the body; any non-2xx status is SourceUnavailableError. */
export async function fetchBytes(url: string, opts: HttpOptions = {}): Promise<Uint8Array> {
  const response = await send(url, opts);
  if (!response.ok) {
    throw new SourceUnavailableError(
      `${url} responded ${response.status} ${response.statusText}`.trim(),
    );
  }
  return new Uint8Array(await response.arrayBuffer());
}
