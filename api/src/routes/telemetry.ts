// SPDX-License-Identifier: Apache-2.0
// api/src/routes/telemetry.ts
import { Router, type RequestHandler } from "express";
import { z } from "zod";
import { InvalidWindow, sendError } from "../errors.js";
import { asyncH } from "../mw/async.js";
import { cacheControl } from "../mw/cacheControl.js";
import type { RiskAssessment } from "../risk/riskScore.js";
import { MAX_WINDOW, MIN_WINDOW, type Reading } from "../store/reading-store.js";
import type { TelemetryService } from "../telemetry/service.js";

export const TelemetryIn = z.object({
  asset_id: z.string().min(1),
  temperature_c: z.number().finite(),
  vibration_rms: z.number().finite(),
  pressure_psi: z.number().finite(),
});

export type WireReading = {
  id: number;
  asset_id: string;
  temperature_c: number;
  vibration_rms: number;
  pressure_psi: number;
  recorded_at: string;
};

export type WireRisk = {
  risk_score: number;
  risk_points: number;
  risk_level: RiskAssessment["riskLevel"];
  window_used: number;
  averages: { temperature_c: number; vibration_rms: number; pressure_psi: number };
};

export function toWireReading(r: Reading): WireReading {
  return {
    id: r.id,
    asset_id: r.assetId,
    temperature_c: r.temperatureC,
    vibration_rms: r.vibrationRms,
    pressure_psi: r.pressurePsi,
    recorded_at: r.recordedAt.toISOString(),
  };
}

export function toWireRisk(a: RiskAssessment | null): WireRisk | null {
  if (!a) return null;
  return {
    risk_score: a.riskScore,
    risk_points: a.riskPoints,
    risk_level: a.riskLevel,
    window_used: a.windowUsed,
    averages: {
      temperature_c: a.averages.temperatureC,
      vibration_rms: a.averages.vibrationRms,
      pressure_psi: a.averages.pressurePsi,
    },
  };
}

export type IngestBody = { ok: true; id: number; recorded_at: string };

export type LatestBody = {
  ok: true;
  asset_id: string;
  window_requested: number;
  window_used: number;
  count: number;
  readings: WireReading[];
  risk: WireRisk | null;
};

/** Absent -> fallback; anything but a plain integer in range -> InvalidWindow. */
export function parseWindow(raw: unknown, fallback: number): number {
  if (raw === undefined) return fallback;
  const n = typeof raw === "string" && /^-?\d+$/.test(raw.trim()) ? Number(raw) : NaN;
  if (!Number.isInteger(n) || n < MIN_WINDOW || n > MAX_WINDOW) {
    throw new InvalidWindow(n, MIN_WINDOW, MAX_WINDOW);
  }
  return n;
}

export default function telemetryRoutes(opts: {
  service: TelemetryService;
  defaultWindow: number;
  ingestGuard?: RequestHandler;
}) {
  const { service, defaultWindow } = opts;
  const r = Router();
  const guards: RequestHandler[] = opts.ingestGuard ? [opts.ingestGuard] : [];

  r.post(
    "/telemetry",
    ...guards,
    asyncH(async (req, res) => {
      const parsed = TelemetryIn.safeParse(req.body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return sendError(res, 400, "invalid-reading", issue ? `${issue.path.join(".")}: ${issue.message}` : undefined);
      }
      const b = parsed.data;
      const out = await service.ingest({
        assetId: b.asset_id,
        temperatureC: b.temperature_c,
        vibrationRms: b.vibration_rms,
        pressurePsi: b.pressure_psi,
      });
      const body: IngestBody = { ok: true, id: out.id, recorded_at: out.recordedAt.toISOString() };
      return res.status(201).json(body);
    })
  );

  r.get(
    "/telemetry/latest",
    cacheControl({ ttlSec: 0 }),
    asyncH(async (req, res) => {
      const assetId = typeof req.query.asset_id === "string" ? req.query.asset_id : "";
      if (!assetId) return sendError(res, 400, "invalid-asset-id", "asset_id is required");
      const limit = parseWindow(req.query.limit, defaultWindow);

      const w = await service.latest(assetId, limit);
      const body: LatestBody = {
        ok: true,
        asset_id: w.assetId,
        window_requested: w.windowRequested,
        window_used: w.windowUsed,
        count: w.readings.length,
        readings: w.readings.map(toWireReading),
        risk: toWireRisk(w.risk),
      };
      return res.json(body);
    })
  );

  return r;
}
