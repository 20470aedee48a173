/**
 * Minimal JSON-over-HTTP helper on global fetch. Non-2xx responses throw
 * HttpError carrying the status so the guard can classify them.
 */

import { snippet } from "./llm/jsonOutput.js";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string
  ) {
    super(`HTTP ${status} from ${url}${body ? `: ${snippet(body)}` : ""}`);
    this.name = "HttpError";
  }
}

export interface GetJsonOptions {
  query?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export function buildUrl(base: string, path: string, query: GetJsonOptions["query"] = {}): string {
  const url = new URL(`${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`);
  for (const [k, v] of Object.entries(query)) {
    if (v !== undefined) url.searchParams.set(k, String(v));
  }
  return url.toString();
}

export async function getJson(base: string, path: string, options: GetJsonOptions = {}): Promise<unknown> {
  const url = buildUrl(base, path, options.query);
  const res = await fetch(url, {
    method: "GET",
    headers: { Accept: "application/json", ...options.headers },
    signal: options.signal,
  });
  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new HttpError(res.status, url, body);
  }
  return res.json();
}
