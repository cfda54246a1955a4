// SPDX-License-Identifier: Apache-2.0
// api/src/config.ts
import path from "node:path";
import { z } from "zod";
import { MAX_WINDOW, MIN_WINDOW } from "./store/reading-store.js";

const ByteLimit = z
  .string()
  .regex(/^\d+(kb|mb)?$/i)
  .or(z.number().int().positive())
  .transform((v) => String(v));

const Flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

/** "false" | "0" -> off, digits -> hop count, otherwise a subnet list for Express. */
const TrustProxy = z
  .string()
  .trim()
  .refine((v) => v.toLowerCase() !== "true", "give a hop count or a subnet list, not true")
  .default("false")
  .transform((v): false | number | string => {
    if (v === "false" || v === "0") return false;
    if (/^\d+$/.test(v)) return Number(v);
    return v;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  STORE_DRIVER: z.enum(["pg", "memory"]).default("pg"),
  DB_HOST: z.string().min(1).default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().min(1).default("fleetdb"),
  DB_USER: z.string().min(1).default("fleetuser"),
  DB_PASSWORD: z.string().default("fleetpass"),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_SCHEMA_FILE: z.string().default(path.join("api", "db", "init.sql")),
  DB_AUTO_MIGRATE: Flag,
  DEFAULT_WINDOW: z.coerce.number().int().min(MIN_WINDOW).max(MAX_WINDOW).default(5),
  JSON_LIMIT: ByteLimit.default("64kb"),
  ALLOWED_ORIGINS: z.string().default("*"),
  TRUST_PROXY: TrustProxy,
  REDIS_URL: z.string().url().optional().or(z.literal("")).default(""),
  RL_BUCKET: z.coerce.number().int().positive().default(120),
  RL_REFILL: z.coerce.number().positive().default(10),
  METRICS_ALLOWLIST: z.string().default(""),
  METRICS_BASIC_AUTH: z.string().default(""),
});

export type Config = z.infer<typeof EnvSchema>;

/** Throws the ZodError on invalid values; unset variables take their defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const pick = (k: keyof Config) => {
    const v = env[k];
    return v === undefined || v.trim() === "" ? undefined : v;
  };
  return EnvSchema.parse({
    PORT: pick("PORT"),
    LOG_LEVEL: pick("LOG_LEVEL"),
    STORE_DRIVER: pick("STORE_DRIVER"),
    DB_HOST: pick("DB_HOST"),
    DB_PORT: pick("DB_PORT"),
    DB_NAME: pick("DB_NAME"),
    DB_USER: pick("DB_USER"),
    DB_PASSWORD: pick("DB_PASSWORD"),
    DB_CONNECT_TIMEOUT_MS: pick("DB_CONNECT_TIMEOUT_MS"),
    DB_POOL_MAX: pick("DB_POOL_MAX"),
    DB_SCHEMA_FILE: pick("DB_SCHEMA_FILE"),
    DB_AUTO_MIGRATE: pick("DB_AUTO_MIGRATE"),
    DEFAULT_WINDOW: pick("DEFAULT_WINDOW"),
    JSON_LIMIT: pick("JSON_LIMIT"),
    ALLOWED_ORIGINS: pick("ALLOWED_ORIGINS"),
    TRUST_PROXY: pick("TRUST_PROXY"),
    REDIS_URL: pick("REDIS_URL"),
    RL_BUCKET: pick("RL_BUCKET"),
    RL_REFILL: pick("RL_REFILL"),
    METRICS_ALLOWLIST: pick("METRICS_ALLOWLIST"),
    METRICS_BASIC_AUTH: pick("METRICS_BASIC_AUTH"),
  });
}

export function pgOptions(cfg: Config) {
  return {
    host: cfg.DB_HOST,
    port: cfg.DB_PORT,
    database: cfg.DB_NAME,
    user: cfg.DB_USER,
    password: cfg.DB_PASSWORD,
    connectTimeoutMs: cfg.DB_CONNECT_TIMEOUT_MS,
    max: cfg.DB_POOL_MAX,
  };
}
