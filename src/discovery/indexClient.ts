import type { Dispatcher } from "undici";
import { DiscoveryConfig, DiscoveryQuery } from "../config";
import { HttpClientError, TransientNetworkError } from "../core/errors";
import { FetchFn, defaultFetch, isTransientStatus } from "../core/fetch";

export interface IndexDoc {
  bibcode: string;
  title: string;
  year: string;
  doi: string;
}

export interface IndexSearchResult {
  numFound: number;
  docs: IndexDoc[];
}

export interface IndexClientOptions {
  /** Bearer token for the index API. Never logged. */
  token: string;
  discovery: Pick<DiscoveryConfig, "apiUrl" | "fields">;
  userAgent: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

function firstString(value: unknown): string {
  if (Array.isArray(value)) {
    return firstString(value[0]);
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return "";
}

function toIndexDoc(value: unknown): IndexDoc | undefined {
  if (!value || typeof value !== "object") {
    return undefined;
  }
  return {
    bibcode: firstString(Reflect.get(value, "bibcode")).trim(),
    title: firstString(Reflect.get(value, "title")).trim() || "Untitled",
    year: firstString(Reflect.get(value, "year")).trim(),
    doi: firstString(Reflect.get(value, "doi")).trim(),
  };
}

/** Reads `{ response: { numFound, docs } }`, tolerating missing parts. */
export function parseSearchResponse(body: unknown): IndexSearchResult {
  const response: unknown = body && typeof body === "object" ? Reflect.get(body, "response") : undefined;
  if (!response || typeof response !== "object") {
    return { numFound: 0, docs: [] };
  }
  const numFound: unknown = Reflect.get(response, "numFound");
  const docs: unknown = Reflect.get(response, "docs");
  return {
    numFound: typeof numFound === "number" ? numFound : 0,
    docs: Array.isArray(docs)
      ? docs.flatMap((doc: unknown) => {
          const parsed = toIndexDoc(doc);
          return parsed ? [parsed] : [];
        })
      : [],
  };
}

export async function searchIndex(query: DiscoveryQuery, options: IndexClientOptions): Promise<IndexSearchResult> {
  const url = new URL(options.discovery.apiUrl);
  url.searchParams.set("q", query.q);
  url.searchParams.set("rows", String(query.rows));
  url.searchParams.set("fl", options.discovery.fields);
  url.searchParams.set("wt", "json");

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const onAbort = (): void => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });
  try {
    const fetchFn = options.fetchFn ?? defaultFetch;
    const response = await fetchFn(url.toString(), {
      method: "GET",
      headers: {
        authorization: `Bearer ${options.token}`,
        accept: "application/json",
        "user-agent": options.userAgent,
      },
      signal: controller.signal,
      ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
    });

    if (response.status !== 200) {
      const detail = (await response.text()).slice(0, 300);
      const message = `index query failed (${response.status}): ${detail}`;
      if (isTransientStatus(response.status)) {
        throw new TransientNetworkError(message, response.status);
      }
      throw new HttpClientError(response.status, message);
    }

    const body: unknown = await response.json();
    return parseSearchResponse(body);
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", onAbort);
  }
}
