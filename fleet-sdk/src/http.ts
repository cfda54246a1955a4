type FetchLike = typeof fetch;

/** Non-2xx response; `body` is the raw response text. */
export class FleetApiError extends Error {
  constructor(readonly method: string, readonly path: string, readonly status: number, readonly body: string) {
    super(`${method} ${path} ${status} ${body}`.trim());
    this.name = "FleetApiError";
  }
}

export class Http {
  constructor(private baseURL: string, private fetcher: FetchLike = fetch) {}

  async get<T>(path: string): Promise<T> {
    const r = await this.fetcher(this.baseURL + path, { method: "GET" });
    if (!r.ok) throw new FleetApiError("GET", path, r.status, await r.text().catch(() => ""));
    return r.json() as Promise<T>;
  }

  async postJSON<T>(path: string, body: unknown, headers?: Record<string, string>): Promise<T> {
    const r = await this.fetcher(this.baseURL + path, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...(headers || {}) },
      body: JSON.stringify(body)
    });
    if (!r.ok) throw new FleetApiError("POST", path, r.status, await r.text().catch(() => ""));
    return r.json() as Promise<T>;
  }

  base() { return this.baseURL; }
}
