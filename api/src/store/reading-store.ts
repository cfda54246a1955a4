// SPDX-License-Identifier: Apache-2.0
// api/src/store/reading-store.ts
import { InvalidWindow } from "../errors.js";

export const MIN_WINDOW = 1;
export const MAX_WINDOW = 50;

export type ReadingInput = {
  assetId: string;
  temperatureC: number;
  vibrationRms: number;
  pressurePsi: number;
};

export type Reading = Readonly<
  ReadingInput & {
    id: number;
    recordedAt: Date;
  }
>;

export type AppendResult = { id: number; recordedAt: Date };

/**
 * Read/write contract of the reading table.
 *
 * `fetchLatest` returns most-recent-first, ties on `recordedAt` broken by id
 * descending, and an empty array for an asset without history. Both methods
 * reject with `StoreUnavailable` when the backend fails; `fetchLatest` rejects
 * with `InvalidWindow` when `limit` is outside [MIN_WINDOW, MAX_WINDOW].
 */
export interface ReadingStore {
  append(input: ReadingInput): Promise<AppendResult>;
  fetchLatest(assetId: string, limit: number): Promise<Reading[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export function assertWindow(limit: number): number {
  if (!Number.isInteger(limit) || limit < MIN_WINDOW || limit > MAX_WINDOW) {
    throw new InvalidWindow(limit, MIN_WINDOW, MAX_WINDOW);
  }
  return limit;
}

/** Most-recent-first; equal timestamps fall back to the later insert. */
export function compareLatestFirst(a: Reading, b: Reading): number {
  const dt = b.recordedAt.getTime() - a.recordedAt.getTime();
  return dt !== 0 ? dt : b.id - a.id;
}
