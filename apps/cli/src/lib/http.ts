/**
 * HTTP helpers — thin wrappers around native fetch for the coordinator.
 *
 * Multi-endpoint support:
 *   fetchWithRotation() tries each base URL in order, rotating on network
 *   errors (connection refused, timeout, DNS failure). 4xx/5xx responses
 *   from a reachable server are NOT retried (the request was delivered).
 */

/** Timeout for each individual fetch attempt (ms). */
const FETCH_TIMEOUT_MS = 30_000;

/** Is this an error that means the server is unreachable? */
function isNetworkError(err: unknown): boolean {
  if (err instanceof TypeError) return true; // fetch() network errors are TypeError
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    return (
      msg.includes("econnrefused") ||
      msg.includes("enotfound") ||
      msg.includes("etimedout") ||
      msg.includes("econnreset") ||
      msg.includes("fetch failed") ||
      msg.includes("abort")
    );
  }
  return false;
}

/** Non-2xx answer from a reachable coordinator. */
export class HttpError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${method} ${path} → ${status}: ${body}`);
    this.name = "HttpError";
  }
}

/**
 * Try a fetch against multiple base URLs with rotation.
 * On network error, the next endpoint is tried.
 */
export async function fetchWithRotation(
  baseUrls: string[],
  buildRequest: (baseUrl: string) => { url: string; init?: RequestInit },
): Promise<Response> {
  if (baseUrls.length === 0) {
    throw new Error("No endpoints configured");
  }

  const errors: Array<{ url: string; error: string }> = [];

  for (const base of baseUrls) {
    const { url, init } = buildRequest(base);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (err) {
      if (isNetworkError(err)) {
        errors.push({ url, error: err instanceof Error ? err.message : String(err) });
        continue;
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }

  const detail = errors.map((e) => `  ${e.url}: ${e.error}`).join("\n");
  throw new Error(`All ${baseUrls.length} endpoint(s) unreachable:\n${detail}`);
}

async function readJson<T>(res: Response, method: string, path: string): Promise<T> {
  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new HttpError(method, path, res.status, body);
  }
  return res.json() as Promise<T>;
}

/** JSON GET with multi-endpoint rotation. Throws HttpError on non-2xx. */
export async function httpGetRotate<T>(baseUrls: string[], path: string): Promise<T> {
  const res = await fetchWithRotation(baseUrls, (base) => ({ url: `${base}${path}` }));
  return readJson<T>(res, "GET", path);
}

/** JSON POST with multi-endpoint rotation. Throws HttpError on non-2xx. */
export async function httpPostRotate<T>(
  baseUrls: string[],
  path: string,
  body: unknown,
): Promise<T> {
  const res = await fetchWithRotation(baseUrls, (base) => ({
    url: `${base}${path}`,
    init: {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    },
  }));
  return readJson<T>(res, "POST", path);
}
