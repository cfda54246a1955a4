// SPDX-License-Identifier: Apache-2.0
// api/src/store/memory-reading-store.ts
import {
  assertWindow,
  compareLatestFirst,
  type AppendResult,
  type Reading,
  type ReadingInput,
  type ReadingStore,
} from "./reading-store.js";

/** Process-local reading table. Used with STORE_DRIVER=memory and in tests. */
export class MemoryReadingStore implements ReadingStore {
  private rows: Reading[] = [];
  private nextId = 1;

  constructor(private now: () => Date = () => new Date()) {}

  async append(input: ReadingInput): Promise<AppendResult> {
    const row: Reading = {
      id: this.nextId++,
      assetId: input.assetId,
      temperatureC: input.temperatureC,
      vibrationRms: input.vibrationRms,
      pressurePsi: input.pressurePsi,
      recordedAt: this.now(),
    };
    this.rows.push(row);
    return { id: row.id, recordedAt: row.recordedAt };
  }

  async fetchLatest(assetId: string, limit: number): Promise<Reading[]> {
    assertWindow(limit);
    return this.rows
      .filter((r) => r.assetId === assetId)
      .sort(compareLatestFirst)
      .slice(0, limit);
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
