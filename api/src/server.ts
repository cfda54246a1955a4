// SPDX-License-Identifier: Apache-2.0
// api/src/server.ts
import fs from "node:fs";
import path from "node:path";
import { Redis } from "ioredis";

import { createApp } from "./app.js";
import { loadConfig, pgOptions } from "./config.js";
import { createLogger } from "./logger.js";
import { createMetrics } from "./metrics/registry.js";
import { MemoryBucketStore, RedisBucketStore, type BucketStore } from "./mw/rateLimit.js";
import { MemoryReadingStore } from "./store/memory-reading-store.js";
import { PgReadingStore } from "./store/pg-reading-store.js";
import type { ReadingStore } from "./store/reading-store.js";

const CFG = loadConfig();
const logger = createLogger(CFG.LOG_LEVEL);

/* -----------------------------
 * Store
 * ---------------------------*/
let store: ReadingStore;
if (CFG.STORE_DRIVER === "memory") {
  logger.warn("[api] STORE_DRIVER=memory: readings are lost on restart");
  store = new MemoryReadingStore();
} else {
  const pgStore = PgReadingStore.fromOptions(pgOptions(CFG));
  if (CFG.DB_AUTO_MIGRATE) {
    const file = path.resolve(process.cwd(), CFG.DB_SCHEMA_FILE);
    await pgStore.migrate(await fs.promises.readFile(file, "utf8"));
    logger.info({ file }, "[api] schema applied");
  }
  store = pgStore;
}

/* -----------------------------
 * Rate-limit buckets (Redis when configured)
 * ---------------------------*/
let redis: Redis | null = null;
let buckets: BucketStore;
if (CFG.REDIS_URL) {
  redis = new Redis(CFG.REDIS_URL);
  redis.on("error", (err) => logger.error({ err }, "Redis connection error"));
  buckets = new RedisBucketStore(redis);
} else {
  buckets = new MemoryBucketStore();
}

const app = createApp({ cfg: CFG, store, logger, metrics: createMetrics(), buckets });
const server = app.listen(CFG.PORT, () =>
  logger.info({ port: CFG.PORT, store: CFG.STORE_DRIVER }, "[api] listening")
);

/* -----------------------------
 * Graceful shutdown
 * ---------------------------*/
async function shutdown(signal: string) {
  logger.info({ signal }, "[api] shutting down");
  try {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await store.close();
    if (redis) await redis.quit();
  } catch (err: unknown) {
    logger.error({ err }, "[api] shutdown error");
  } finally {
    process.exit(0);
  }
}
process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
