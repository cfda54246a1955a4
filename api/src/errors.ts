// SPDX-License-Identifier: Apache-2.0
// api/src/errors.ts
import type { Response } from "express";

export type StoreOp = "append" | "fetch" | "ping";

/** Backing store could not be reached, or the statement failed. Retryable. */
export class StoreUnavailable extends Error {
  readonly code = "store-unavailable";

  constructor(readonly op: StoreOp, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : "unknown";
    super(`store ${op} failed: ${reason}`, options);
    this.name = "StoreUnavailable";
  }
}

export class InvalidWindow extends Error {
  readonly code = "invalid-window";

  constructor(readonly requested: number, min: number, max: number) {
    super(`window must be an integer in [${min}, ${max}], got ${requested}`);
    this.name = "InvalidWindow";
  }
}

export type ErrorBody = { ok: false; error: { code: string; detail?: string } };

export function sendError(res: Response, status: number, code: string, detail?: string) {
  const body: ErrorBody = { ok: false, error: { code, detail } };
  return res.status(status).json(body);
}
