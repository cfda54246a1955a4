import { Http } from "./http.js";
import type { HealthResponse, LatestResponse, PostReadingResponse, ReadingIn } from "./types.js";

export type FleetClientOpts = {
  baseURL?: string;                 // e.g. http://localhost:8000
  fetch?: typeof fetch;             // override for tests
};

export class FleetTelemetryClient {
  private http: Http;

  constructor(opts: FleetClientOpts = {}) {
    const base = opts.baseURL || process.env.API_BASE || "http://localhost:8000";
    this.http = new Http(base.replace(/\/+$/, ""), opts.fetch || fetch);
  }

  /** Stores one reading; the server assigns id and recorded_at. */
  async postReading(reading: ReadingIn): Promise<PostReadingResponse> {
    return this.http.postJSON<PostReadingResponse>("/telemetry", reading);
  }

  /** Latest `limit` readings (most recent first) and the risk computed over them. */
  async getLatest(assetId: string, limit?: number): Promise<LatestResponse> {
    const q = new URLSearchParams({ asset_id: assetId });
    if (limit !== undefined) q.set("limit", String(limit));
    return this.http.get<LatestResponse>(`/telemetry/latest?${q.toString()}`);
  }

  async health(): Promise<HealthResponse> {
    return this.http.get<HealthResponse>("/health");
  }

  baseURL() { return this.http.base(); }
}

export { FleetApiError } from "./http.js";
export { makeReading, runSimulator, type SimulatorOpts } from "./simulator.js";
export { loadSimulatorEnv, type SimulatorEnv } from "./env.js";
export type * from "./types.js";
