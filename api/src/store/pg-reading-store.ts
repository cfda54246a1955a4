// SPDX-License-Identifier: Apache-2.0
// api/src/store/pg-reading-store.ts
import pg from "pg";
import { StoreUnavailable, type StoreOp } from "../errors.js";
import {
  assertWindow,
  type AppendResult,
  type Reading,
  type ReadingInput,
  type ReadingStore,
} from "./reading-store.js";

export type PgStoreOptions = {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectTimeoutMs: number;
  max: number;
};

type InsertRow = { id: number; recorded_at: Date };

type ReadingRow = {
  id: number;
  asset_id: string;
  temperature_c: number | string;
  vibration_rms: number | string;
  pressure_psi: number | string;
  recorded_at: Date;
};

const INSERT_SQL = `
  INSERT INTO asset_telemetry (asset_id, temperature_c, vibration_rms, pressure_psi)
  VALUES ($1, $2, $3, $4)
  RETURNING id, recorded_at`;

const LATEST_SQL = `
  SELECT id, asset_id, temperature_c, vibration_rms, pressure_psi, recorded_at
  FROM asset_telemetry
  WHERE asset_id = $1
  ORDER BY recorded_at DESC, id DESC
  LIMIT $2`;

export function toReading(row: ReadingRow): Reading {
  return {
    id: Number(row.id),
    assetId: row.asset_id,
    temperatureC: Number(row.temperature_c),
    vibrationRms: Number(row.vibration_rms),
    pressurePsi: Number(row.pressure_psi),
    recordedAt: row.recorded_at,
  };
}

export class PgReadingStore implements ReadingStore {
  constructor(private pool: pg.Pool) {}

  static fromOptions(o: PgStoreOptions): PgReadingStore {
    return new PgReadingStore(
      new pg.Pool({
        host: o.host,
        port: o.port,
        database: o.database,
        user: o.user,
        password: o.password,
        connectionTimeoutMillis: o.connectTimeoutMs,
        max: o.max,
      })
    );
  }

  async append(input: ReadingInput): Promise<AppendResult> {
    const res = await this.run("append", () =>
      this.pool.query<InsertRow>(INSERT_SQL, [
        input.assetId,
        input.temperatureC,
        input.vibrationRms,
        input.pressurePsi,
      ])
    );
    const row = res.rows[0];
    if (!row) throw new StoreUnavailable("append", { cause: new Error("insert returned no row") });
    return { id: Number(row.id), recordedAt: row.recorded_at };
  }

  async fetchLatest(assetId: string, limit: number): Promise<Reading[]> {
    assertWindow(limit);
    const res = await this.run("fetch", () => this.pool.query<ReadingRow>(LATEST_SQL, [assetId, limit]));
    return res.rows.map(toReading);
  }

  async ping(): Promise<void> {
    await this.run("ping", () => this.pool.query("SELECT 1"));
  }

  /** Applies the schema script (idempotent: CREATE ... IF NOT EXISTS). */
  async migrate(sql: string): Promise<void> {
    await this.pool.query(sql);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<T>(op: StoreOp, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw new StoreUnavailable(op, { cause: err });
    }
  }
}
