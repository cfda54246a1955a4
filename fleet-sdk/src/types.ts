export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export type ReadingIn = {
  asset_id: string;
  temperature_c: number;
  vibration_rms: number;
  pressure_psi: number;
};

export type StoredReading = ReadingIn & { id: number; recorded_at: string };

export type Risk = {
  risk_score: number;
  risk_points: number;
  risk_level: RiskLevel;
  window_used: number;
  averages: { temperature_c: number; vibration_rms: number; pressure_psi: number };
};

export type PostReadingResponse = { ok: true; id: number; recorded_at: string };

export type LatestResponse = {
  ok: true;
  asset_id: string;
  window_requested: number;
  window_used: number;
  count: number;
  readings: StoredReading[];
  risk: Risk | null;
};

export type HealthResponse = {
  ok: boolean;
  status: "ok" | "degraded";
  db: "ok" | "unreachable";
  ts: string;
  error?: string;
};
