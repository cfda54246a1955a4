// SPDX-License-Identifier: Apache-2.0
// scripts/migrate.ts
/**
 * Usage:
 *  DB_HOST=... npm run migrate
 */
import fs from "node:fs";
import path from "node:path";
import { loadConfig, pgOptions } from "../api/src/config.js";
import { createLogger } from "../api/src/logger.js";
import { PgReadingStore } from "../api/src/store/pg-reading-store.js";

export async function main() {
  const cfg = loadConfig();
  const logger = createLogger(cfg.LOG_LEVEL);
  const file = path.resolve(process.cwd(), cfg.DB_SCHEMA_FILE);
  const sql = await fs.promises.readFile(file, "utf8");

  const store = PgReadingStore.fromOptions(pgOptions(cfg));
  try {
    await store.migrate(sql);
    logger.info({ file, host: cfg.DB_HOST, db: cfg.DB_NAME }, "[migrate] schema applied");
  } finally {
    await store.close();
  }
}

if (process.argv[1]?.includes("migrate")) {
  main().catch((e) => { console.error(e); process.exit(1); });
}
