// SPDX-License-Identifier: Apache-2.0
// api/src/logger.ts
import { pino, type Logger } from "pino";
import type { Config } from "./config.js";

export type { Logger };

export function createLogger(level: Config["LOG_LEVEL"]): Logger {
  return pino({ level, base: { service: "fleet-telemetry-api" } });
}
