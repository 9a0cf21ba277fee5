export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
export const DEFAULT_TIMEOUT_MS = 30000;

export type FetchFailureReason = "http" | "timeout" | "network";

export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;
  readonly reason: FetchFailureReason;

  constructor(url: string, reason: FetchFailureReason, status: number | null, detail: string) {
    super(`GET ${url} failed (${status ?? reason}): ${detail}`);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
    this.reason = reason;
  }
}

export type FetchResult<T> =
  | { ok: true; url: string; status: number; body: T }
  | { ok: false; error: FetchError };

export interface Fetcher {
  fetchText(url: string): Promise<FetchResult<string>>;
  fetchBinary(url: string): Promise<FetchResult<Buffer>>;
}

export interface HttpClientOptions {
  userAgent?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export class HttpClient implements Fetcher {
  readonly userAgent: string;
  readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpClientOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  fetchText(url: string): Promise<FetchResult<string>> {
    return this.get(url, (response) => response.text());
  }

  fetchBinary(url: string): Promise<FetchResult<Buffer>> {
    return this.get(url, async (response) => Buffer.from(await response.arrayBuffer()));
  }

  private async get<T>(url: string, read: (response: Response) => Promise<T>): Promise<FetchResult<T>> {
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { "User-Agent": this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      if (!response.ok) {
        return {
          ok: false,
          error: new FetchError(url, "http", response.status, response.statusText || "unexpected status")
        };
      }
      const body = await read(response);
      return { ok: true, url: response.url || url, status: response.status, body };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      const reason = isTimeout(error) ? "timeout" : "network";
      return { ok: false, error: new FetchError(url, reason, null, detail) };
    }
  }
}
