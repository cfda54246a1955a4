// SPDX-License-Identifier: Apache-2.0
// api/src/telemetry/service.ts
import { StoreUnavailable } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AppMetrics } from "../metrics/registry.js";
import { evaluateRisk, type RiskAssessment } from "../risk/riskScore.js";
import {
  assertWindow,
  type AppendResult,
  type Reading,
  type ReadingInput,
  type ReadingStore,
} from "../store/reading-store.js";

export type LatestWindow = {
  assetId: string;
  windowRequested: number;
  windowUsed: number;
  readings: Reading[];
  risk: RiskAssessment | null;
};

type Deps = {
  store: ReadingStore;
  logger: Logger;
  metrics: Pick<AppMetrics, "readingsIngested" | "riskEvaluations" | "storeErrors">;
};

export class TelemetryService {
  constructor(private deps: Deps) {}

  /** One reading, one row. Nothing is stored unless the store returns id and timestamp. */
  async ingest(input: ReadingInput): Promise<AppendResult> {
    try {
      const res = await this.deps.store.append(input);
      this.deps.metrics.readingsIngested.inc();
      return res;
    } catch (err: unknown) {
      this.onStoreError(err, input.assetId);
      throw err;
    }
  }

  /**
   * Fetches up to `limit` most recent readings and evaluates risk over exactly
   * the rows returned; `windowUsed` may be smaller than `windowRequested`.
   */
  async latest(assetId: string, limit: number): Promise<LatestWindow> {
    assertWindow(limit);
    let readings: Reading[];
    try {
      readings = await this.deps.store.fetchLatest(assetId, limit);
    } catch (err: unknown) {
      this.onStoreError(err, assetId);
      throw err;
    }

    const risk = evaluateRisk(readings);
    this.deps.metrics.riskEvaluations.inc({ level: risk?.riskLevel ?? "NONE" });
    return {
      assetId,
      windowRequested: limit,
      windowUsed: readings.length,
      readings,
      risk,
    };
  }

  private onStoreError(err: unknown, assetId: string) {
    if (!(err instanceof StoreUnavailable)) return;
    this.deps.metrics.storeErrors.inc({ op: err.op });
    this.deps.logger.error({ err, op: err.op, assetId }, "store unavailable");
  }
}
