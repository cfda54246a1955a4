import { test } from "node:test";
import assert from "node:assert/strict";
import { FleetApiError, FleetTelemetryClient } from "./index.js";

type Seen = { url: string; method: string; headers: Headers; body: string | null };

function fakeFetch(status: number, body: unknown) {
  const seen: Seen[] = [];
  const fetcher: typeof fetch = async (input, init) => {
    seen.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : null,
    });
    return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
  };
  return { fetcher, seen };
}

test("postReading posts JSON to /telemetry", async () => {
  const { fetcher, seen } = fakeFetch(201, { ok: true, id: 4, recorded_at: "2026-03-01T10:00:00.000Z" });
  const client = new FleetTelemetryClient({ baseURL: "http://api.test/", fetch: fetcher });
  const reading = { asset_id: "pump-7", temperature_c: 88.5, vibration_rms: 2.1, pressure_psi: 47 };

  const out = await client.postReading(reading);

  assert.deepEqual(out, { ok: true, id: 4, recorded_at: "2026-03-01T10:00:00.000Z" });
  assert.equal(seen[0].url, "http://api.test/telemetry");
  assert.equal(seen[0].method, "POST");
  assert.equal(seen[0].headers.get("content-type"), "application/json");
  assert.deepEqual(JSON.parse(seen[0].body ?? ""), reading);
});

test("getLatest encodes asset_id and limit", async () => {
  const latest = {
    ok: true,
    asset_id: "pump 7",
    window_requested: 5,
    window_used: 0,
    count: 0,
    readings: [],
    risk: null,
  };
  const { fetcher, seen } = fakeFetch(200, latest);
  const client = new FleetTelemetryClient({ baseURL: "http://api.test", fetch: fetcher });

  assert.deepEqual(await client.getLatest("pump 7", 5), latest);
  assert.equal(seen[0].url, "http://api.test/telemetry/latest?asset_id=pump+7&limit=5");
  assert.equal(seen[0].method, "GET");
});

test("getLatest without a limit leaves the server default", async () => {
  const { fetcher, seen } = fakeFetch(200, {});
  await new FleetTelemetryClient({ baseURL: "http://api.test", fetch: fetcher }).getLatest("pump-7");
  assert.equal(seen[0].url, "http://api.test/telemetry/latest?asset_id=pump-7");
});

test("non-2xx responses throw FleetApiError with status and body", async () => {
  const body = '{"ok":false,"error":{"code":"db-read-failed"}}';
  const { fetcher } = fakeFetch(503, body);
  const client = new FleetTelemetryClient({ baseURL: "http://api.test", fetch: fetcher });

  await assert.rejects(
    () => client.getLatest("pump-7", 5),
    (err: unknown) =>
      err instanceof FleetApiError &&
      err.status === 503 &&
      err.body === body &&
      err.message === `GET /telemetry/latest?asset_id=pump-7&limit=5 503 ${body}`
  );
});
