// SPDX-License-Identifier: Apache-2.0
// api/src/routes/health.ts
import { Router } from "express";
import { asyncH } from "../mw/async.js";
import type { ReadingStore } from "../store/reading-store.js";

export type HealthBody =
  | { ok: true; status: "ok"; db: "ok"; ts: string }
  | { ok: false; status: "degraded"; db: "unreachable"; ts: string; error: string };

/** /health reports 200 either way; the body says whether the store answered. */
export default function healthRoutes(store: Pick<ReadingStore, "ping">) {
  const r = Router();

  r.get(
    "/health",
    asyncH(async (_req, res) => {
      const ts = new Date().toISOString();
      try {
        await store.ping();
        const body: HealthBody = { ok: true, status: "ok", db: "ok", ts };
        return res.json(body);
      } catch (err: unknown) {
        const error = err instanceof Error ? err.message : String(err);
        const body: HealthBody = { ok: false, status: "degraded", db: "unreachable", ts, error };
        return res.json(body);
      }
    })
  );

  r.get("/ready", (_req, res) => {
    res.json({ ok: true });
  });

  return r;
}
