/**
 * Claims page HTTP client
 *
 * Single GET against a backend URL with a hard timeout. Retries, pacing and
 * backend fallback are the orchestrator's job; this layer only turns a
 * non-2xx response into a ClaimsFetchError carrying the status.
 *
 * @module claims-http
 */

export class ClaimsFetchError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "ClaimsFetchError";
  }
}

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
}

export type FetchPage = (url: string, options: FetchPageOptions) => Promise<string>;

export const fetchClaimsPage: FetchPage = async (url, options) => {
  const startTime = Date.now();
  const res = await fetch(url, {
    headers: {
      "User-Agent": options.userAgent,
      Accept: "text/html,application/xhtml+xml",
    },
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  const elapsed = Date.now() - startTime;

  if (!res.ok) {
    let errorBody = "";
    try {
      errorBody = await res.text();
    } catch (err) {
      errorBody = `(unreadable body: ${err instanceof Error ? err.message : String(err)})`;
    }
    console.warn(`[Claims-HTTP] ${res.status} ${res.statusText} from ${url} (${elapsed}ms)`);
    throw new ClaimsFetchError(
      url,
      res.status,
      `HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
    );
  }

  return await res.text();
};
