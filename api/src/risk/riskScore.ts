// SPDX-License-Identifier: Apache-2.0
// api/src/risk/riskScore.ts
import type { Reading } from "../store/reading-store.js";

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";
export type BandPoints = 0 | 1 | 2;

export type MetricAverages = {
  temperatureC: number;
  vibrationRms: number;
  pressurePsi: number;
};

export type RiskAssessment = {
  riskScore: number;
  riskPoints: number;
  riskLevel: RiskLevel;
  windowUsed: number;
  averages: MetricAverages;
};

type Metrics = Pick<Reading, "temperatureC" | "vibrationRms" | "pressurePsi">;

export const MAX_POINTS = 6;

export function round2(x: number): number {
  return Math.round((x + Number.EPSILON) * 100) / 100;
}

// Summed in sorted order so a permuted window yields the identical mean.
function mean(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  let sum = 0;
  for (const v of sorted) sum += v;
  return sum / sorted.length;
}

export function temperatureBand(avg: number): BandPoints {
  if (avg > 95) return 2;
  if (avg > 85) return 1;
  return 0;
}

export function vibrationBand(avg: number): BandPoints {
  if (avg > 3.5) return 2;
  if (avg > 2.5) return 1;
  return 0;
}

/** Both extremes count: low pressure is as risky as high. */
export function pressureBand(avg: number): BandPoints {
  if (avg < 30 || avg > 60) return 2;
  if (avg < 35 || avg > 55) return 1;
  return 0;
}

export function levelFor(points: number): RiskLevel {
  if (points <= 2) return "LOW";
  if (points <= 4) return "MEDIUM";
  return "HIGH";
}

/**
 * Reduces a window of readings to a risk assessment.
 * Returns null for an empty window: no history is not the same as LOW risk.
 * Bands compare against the unrounded means; only the reported averages are rounded.
 */
export function evaluateRisk(readings: readonly Metrics[]): RiskAssessment | null {
  const n = readings.length;
  if (n === 0) return null;

  const avg: MetricAverages = {
    temperatureC: mean(readings.map((r) => r.temperatureC)),
    vibrationRms: mean(readings.map((r) => r.vibrationRms)),
    pressurePsi: mean(readings.map((r) => r.pressurePsi)),
  };

  const riskPoints =
    temperatureBand(avg.temperatureC) +
    vibrationBand(avg.vibrationRms) +
    pressureBand(avg.pressurePsi);

  return {
    riskScore: round2(riskPoints / MAX_POINTS),
    riskPoints,
    riskLevel: levelFor(riskPoints),
    windowUsed: n,
    averages: {
      temperatureC: round2(avg.temperatureC),
      vibrationRms: round2(avg.vibrationRms),
      pressurePsi: round2(avg.pressurePsi),
    },
  };
}
