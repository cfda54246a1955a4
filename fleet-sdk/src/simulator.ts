import { setTimeout as delay } from "node:timers/promises";
import type { FleetTelemetryClient } from "./index.js";
import type { ReadingIn } from "./types.js";

const round = (x: number, dp: number) => Math.round(x * 10 ** dp) / 10 ** dp;
const uniform = (rng: () => number, lo: number, hi: number) => lo + (hi - lo) * rng();

/** Random reading spread wide enough to hit every risk band. */
export function makeReading(assetId: string, rng: () => number = Math.random): ReadingIn {
  return {
    asset_id: assetId,
    temperature_c: round(uniform(rng, 70, 150), 1),
    vibration_rms: round(uniform(rng, 1, 5), 2),
    pressure_psi: round(uniform(rng, 20, 70), 1),
  };
}

export type SimulatorOpts = {
  client: Pick<FleetTelemetryClient, "postReading" | "getLatest">;
  assetId: string;
  intervalMs: number;
  window: number;
  rng?: () => number;
  log?: (line: string) => void;
  signal?: AbortSignal;
  maxTicks?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

async function abortableSleep(ms: number, signal?: AbortSignal) {
  try {
    await delay(ms, undefined, { signal });
  } catch (e: unknown) {
    if (!(e instanceof Error && e.name === "AbortError")) throw e;
  }
}

const errMsg = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Posts a reading, then reads back the latest window, once per interval.
 * A failed step is logged and the loop moves on to the next tick.
 * Resolves with the number of ticks run.
 */
export async function runSimulator(opts: SimulatorOpts): Promise<number> {
  const { client, assetId, intervalMs, window, signal, maxTicks } = opts;
  const rng = opts.rng ?? Math.random;
  const log = opts.log ?? ((line: string) => console.log(line));
  const sleep = opts.sleep ?? abortableSleep;

  const tick = async () => {
    const payload = makeReading(assetId, rng);
    try {
      const res = await client.postReading(payload);
      log(
        `[client] POST /telemetry -> id=${res.id} ts=${res.recorded_at} ` +
          `temp=${payload.temperature_c} vib=${payload.vibration_rms} psi=${payload.pressure_psi}`
      );
    } catch (e: unknown) {
      log(`[client] POST /telemetry failed: ${errMsg(e)}`);
      return;
    }

    try {
      const data = await client.getLatest(assetId, window);
      const latest = data.readings[0];
      log(
        `[client] GET /telemetry/latest -> ` +
          `latest_id=${latest?.id ?? "none"} window_used=${data.window_used} ` +
          `latest_ts=${latest?.recorded_at ?? "none"} ` +
          `temp=${latest?.temperature_c ?? "none"} vib=${latest?.vibration_rms ?? "none"} psi=${latest?.pressure_psi ?? "none"} ` +
          `risk=${data.risk?.risk_score ?? "none"} level=${data.risk?.risk_level ?? "none"}`
      );
    } catch (e: unknown) {
      log(`[client] GET /telemetry/latest failed: ${errMsg(e)}`);
    }
  };

  let ticks = 0;
  while (!signal?.aborted) {
    await tick();
    ticks++;
    if (maxTicks !== undefined && ticks >= maxTicks) break;
    await sleep(intervalMs, signal);
  }
  return ticks;
}
