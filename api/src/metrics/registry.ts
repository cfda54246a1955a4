// SPDX-License-Identifier: Apache-2.0
// api/src/metrics/registry.ts
import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export type AppMetrics = ReturnType<typeof createMetrics>;

/** One registry per app instance, so tests can build several apps side by side. */
export function createMetrics(opts: { defaults?: boolean } = {}) {
  const registry = new Registry();
  if (opts.defaults ?? true) collectDefaultMetrics({ register: registry });

  const httpDuration = new Histogram({
    name: "http_request_duration_seconds",
    help: "Request duration histogram",
    buckets: [0.01, 0.05, 0.1, 0.3, 0.6, 1, 2, 5],
    registers: [registry],
  });

  const httpRequestsTotal = new Counter({
    name: "fleet_requests_total",
    help: "Total HTTP requests",
    labelNames: ["route", "method", "code"],
    registers: [registry],
  });

  const readingsIngested = new Counter({
    name: "fleet_readings_ingested_total",
    help: "Readings stored",
    registers: [registry],
  });

  const riskEvaluations = new Counter({
    name: "fleet_risk_evaluations_total",
    help: "Risk evaluations by level (NONE = empty window)",
    labelNames: ["level"],
    registers: [registry],
  });

  const storeErrors = new Counter({
    name: "fleet_store_errors_total",
    help: "Store failures by operation",
    labelNames: ["op"],
    registers: [registry],
  });

  return { registry, httpDuration, httpRequestsTotal, readingsIngested, riskEvaluations, storeErrors };
}
