import { fetch as undiciFetch, type Dispatcher } from "undici";
import { getFetchDispatcher } from "../core/fetch";

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  body: { cancel(): Promise<void> } | null;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  redirect: "follow";
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
}

export type FetchOutcome = { ok: true; content: Buffer } | { ok: false; error: string };

const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

/**
 * One GET request. Never throws: transport failures, timeouts and non-2xx
 * statuses all come back as `{ ok: false, error }`.
 */
export async function fetchResource(url: string, options: FetchOptions): Promise<FetchOutcome> {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": options.userAgent,
      },
      redirect: "follow",
      signal: controller.signal,
      dispatcher: getFetchDispatcher(options.ignoreHttpsErrors ?? false),
    });

    if (!response.ok) {
      await response.body?.cancel().catch(() => undefined);
      return { ok: false, error: `HTTP Error ${response.status}: ${response.statusText}` };
    }

    const content = Buffer.from(await response.arrayBuffer());
    return { ok: true, content };
  } catch (error) {
    if (controller.signal.aborted) {
      return { ok: false, error: `Request timed out after ${options.timeoutMs}ms` };
    }
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Up to `retries + 1` sequential attempts with no backoff. Every error is
 * retried; the last attempt's error is the one reported.
 */
export async function fetchWithRetry(url: string, options: FetchOptions, retries: number): Promise<FetchOutcome> {
  let outcome: FetchOutcome = { ok: false, error: "No fetch attempted" };
  for (let attempt = 0; attempt <= retries; attempt += 1) {
    outcome = await fetchResource(url, options);
    if (outcome.ok) {
      return outcome;
    }
  }
  return outcome;
}
