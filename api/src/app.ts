// SPDX-License-Identifier: Apache-2.0
// api/src/app.ts
import express, { type Request, type Response, type NextFunction } from "express";
import helmet from "helmet";
import cors from "cors";
import { pinoHttp } from "pino-http";
import { randomUUID } from "node:crypto";

import type { Config } from "./config.js";
import { InvalidWindow, StoreUnavailable, sendError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { AppMetrics } from "./metrics/registry.js";
import { asyncH } from "./mw/async.js";
import { metricsGuard } from "./mw/metricsGuard.js";
import { rateLimit, type BucketStore } from "./mw/rateLimit.js";
import healthRoutes from "./routes/health.js";
import telemetryRoutes from "./routes/telemetry.js";
import type { ReadingStore } from "./store/reading-store.js";
import { TelemetryService } from "./telemetry/service.js";

export type AppDeps = {
  cfg: Pick<
    Config,
    | "JSON_LIMIT"
    | "ALLOWED_ORIGINS"
    | "TRUST_PROXY"
    | "DEFAULT_WINDOW"
    | "RL_BUCKET"
    | "RL_REFILL"
    | "METRICS_ALLOWLIST"
    | "METRICS_BASIC_AUTH"
  >;
  store: ReadingStore;
  logger: Logger;
  metrics: AppMetrics;
  buckets: BucketStore;
};

type BodyParserError = { type: string; status: number; message: string };

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function createApp(deps: AppDeps) {
  const { cfg, store, logger, metrics } = deps;
  const service = new TelemetryService({ store, logger, metrics });

  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", cfg.TRUST_PROXY);

  /* -----------------------------
   * Logging
   * ---------------------------*/
  app.use(
    pinoHttp({
      logger,
      genReqId: (req, res) => {
        const hdr = req.headers["x-request-id"];
        const id = typeof hdr === "string" && hdr ? hdr : randomUUID();
        res.setHeader("X-Request-Id", id);
        return id;
      },
    })
  );

  /* -----------------------------
   * Security headers, CORS, JSON
   * ---------------------------*/
  app.use(helmet());
  app.use(cors({ origin: cfg.ALLOWED_ORIGINS }));
  app.use(express.json({ limit: cfg.JSON_LIMIT }));

  /* -----------------------------
   * Metrics (HTTP)
   * ---------------------------*/
  app.use((req, res, next) => {
    const end = metrics.httpDuration.startTimer();
    res.on("finish", () => {
      // route pattern, not the raw path: unknown paths share one series
      const pattern: unknown = req.route?.path;
      metrics.httpRequestsTotal.inc({
        route: typeof pattern === "string" ? pattern : "unmatched",
        method: req.method,
        code: String(res.statusCode),
      });
      end();
    });
    next();
  });
  app.get(
    "/metrics",
    metricsGuard({ allowlist: cfg.METRICS_ALLOWLIST, basicAuth: cfg.METRICS_BASIC_AUTH }),
    asyncH(async (_req, res) => {
      res.set("Content-Type", metrics.registry.contentType);
      res.end(await metrics.registry.metrics());
    })
  );

  /* -----------------------------
   * Routes
   * ---------------------------*/
  app.use(healthRoutes(store));
  app.use(
    telemetryRoutes({
      service,
      defaultWindow: cfg.DEFAULT_WINDOW,
      ingestGuard: asyncH(
        rateLimit({ bucketSize: cfg.RL_BUCKET, refillPerSec: cfg.RL_REFILL, store: deps.buckets })
      ),
    })
  );

  /* -----------------------------
   * Error handler
   * ---------------------------*/
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof InvalidWindow) {
      return sendError(res, 400, err.code, err.message);
    }
    if (err instanceof StoreUnavailable) {
      res.setHeader("Retry-After", "1");
      const code = err.op === "append" ? "db-insert-failed" : "db-read-failed";
      return sendError(res, 503, code, err.message);
    }
    if (isBodyParserError(err) && err.status < 500) {
      const code = err.type === "entity.parse.failed" ? "invalid-json" : err.type.replace(/\./g, "-");
      return sendError(res, err.status, code, err.message);
    }
    req.log.error({ err }, "unhandled error");
    const msg = err instanceof Error ? err.message : "internal";
    return sendError(res, 500, "internal", msg);
  });

  return app;
}
