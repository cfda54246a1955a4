// SPDX-License-Identifier: Apache-2.0
// api/src/mw/cacheControl.ts
import type { Request, Response, NextFunction } from "express";

/** ttlSec = 0 marks the response as uncacheable (`no-store`). */
export function cacheControl(opts: { ttlSec: number; swrSec?: number }) {
  const { ttlSec, swrSec = 0 } = opts;
  const value =
    ttlSec <= 0
      ? "no-store"
      : "public, max-age=" + ttlSec + (swrSec > 0 ? `, stale-while-revalidate=${swrSec}` : "");
  return (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("Cache-Control", value);
    next();
  };
}
