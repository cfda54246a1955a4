import { z } from "zod";

const SimulatorEnvSchema = z.object({
  API_BASE: z.string().url().default("http://localhost:8000"),
  ASSET_ID: z.string().min(1).default("aircraft-demo-001"),
  INTERVAL_SECONDS: z.coerce.number().positive().default(10),
  WINDOW: z.coerce.number().int().min(1).max(50).default(5),
});

export type SimulatorEnv = z.infer<typeof SimulatorEnvSchema>;

/** Throws the ZodError on a bad value; blank variables take their defaults. */
export function loadSimulatorEnv(env: NodeJS.ProcessEnv = process.env): SimulatorEnv {
  const pick = (k: keyof SimulatorEnv) => {
    const v = env[k];
    return v === undefined || v.trim() === "" ? undefined : v;
  };
  return SimulatorEnvSchema.parse({
    API_BASE: pick("API_BASE"),
    ASSET_ID: pick("ASSET_ID"),
    INTERVAL_SECONDS: pick("INTERVAL_SECONDS"),
    WINDOW: pick("WINDOW"),
  });
}
