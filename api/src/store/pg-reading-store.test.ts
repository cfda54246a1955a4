// SPDX-License-Identifier: Apache-2.0
// api/src/store/pg-reading-store.test.ts
import { test, after, mock } from "node:test";
import assert from "node:assert/strict";
import pg from "pg";
import { InvalidWindow, StoreUnavailable } from "../errors.js";
import { PgReadingStore } from "./pg-reading-store.js";

type Call = { text: string; values?: unknown[] };

const pools: pg.Pool[] = [];
after(async () => {
  await Promise.all(pools.map((p) => p.end()));
});

/** Pool that never connects; `query` answers from `impl`. */
function fakePool(impl: (text: string, values?: unknown[]) => Promise<{ rows: unknown[] }>) {
  const pool = new pg.Pool();
  pools.push(pool);
  const calls: Call[] = [];
  mock.method(pool, "query", async (text: string, values?: unknown[]) => {
    calls.push({ text, values });
    return impl(text, values);
  });
  return { store: new PgReadingStore(pool), calls };
}

const refused = () => Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:5432"));

test("append inserts one row and returns id and recorded_at", async () => {
  const at = new Date("2026-03-01T10:00:00.000Z");
  const { store, calls } = fakePool(async () => ({ rows: [{ id: 7, recorded_at: at }] }));

  const out = await store.append({ assetId: "pump-1", temperatureC: 90.5, vibrationRms: 1.2, pressurePsi: 44 });

  assert.deepEqual(out, { id: 7, recordedAt: at });
  assert.equal(calls.length, 1);
  assert.match(calls[0].text, /INSERT INTO asset_telemetry/);
  assert.match(calls[0].text, /RETURNING id, recorded_at/);
  assert.deepEqual(calls[0].values, ["pump-1", 90.5, 1.2, 44]);
});

test("fetchLatest orders by time then id and maps rows", async () => {
  const at = new Date("2026-03-01T10:00:00.000Z");
  const { store, calls } = fakePool(async () => ({
    rows: [
      { id: "12", asset_id: "pump-1", temperature_c: "90.5", vibration_rms: 1.5, pressure_psi: "45", recorded_at: at },
    ],
  }));

  const rows = await store.fetchLatest("pump-1", 5);

  assert.deepEqual(rows, [
    { id: 12, assetId: "pump-1", temperatureC: 90.5, vibrationRms: 1.5, pressurePsi: 45, recordedAt: at },
  ]);
  assert.match(calls[0].text, /ORDER BY recorded_at DESC, id DESC/);
  assert.match(calls[0].text, /LIMIT \$2/);
  assert.deepEqual(calls[0].values, ["pump-1", 5]);
});

test("fetchLatest returns [] for an asset without rows", async () => {
  const { store } = fakePool(async () => ({ rows: [] }));
  assert.deepEqual(await store.fetchLatest("nope", 5), []);
});

test("fetchLatest rejects an out-of-range window before querying", async () => {
  const { store, calls } = fakePool(async () => ({ rows: [] }));
  await assert.rejects(() => store.fetchLatest("pump-1", 51), InvalidWindow);
  assert.equal(calls.length, 0);
});

test("connection failures surface as StoreUnavailable, never as empty", async () => {
  const { store } = fakePool(refused);

  await assert.rejects(
    () => store.append({ assetId: "pump-1", temperatureC: 1, vibrationRms: 1, pressurePsi: 1 }),
    (err: unknown) => err instanceof StoreUnavailable && err.op === "append"
  );
  await assert.rejects(
    () => store.fetchLatest("pump-1", 5),
    (err: unknown) =>
      err instanceof StoreUnavailable &&
      err.op === "fetch" &&
      err.message === "store fetch failed: connect ECONNREFUSED 127.0.0.1:5432"
  );
  await assert.rejects(
    () => store.ping(),
    (err: unknown) => err instanceof StoreUnavailable && err.op === "ping"
  );
});

test("an insert that returns no row is a failed append", async () => {
  const { store } = fakePool(async () => ({ rows: [] }));
  await assert.rejects(
    () => store.append({ assetId: "pump-1", temperatureC: 1, vibrationRms: 1, pressurePsi: 1 }),
    StoreUnavailable
  );
});

test("migrate runs the schema script as given", async () => {
  const { store, calls } = fakePool(async () => ({ rows: [] }));
  await store.migrate("CREATE TABLE IF NOT EXISTS asset_telemetry ();");
  assert.deepEqual(calls, [{ text: "CREATE TABLE IF NOT EXISTS asset_telemetry ();", values: undefined }]);
});
