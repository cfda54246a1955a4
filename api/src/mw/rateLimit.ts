// SPDX-License-Identifier: Apache-2.0
// api/src/mw/rateLimit.ts
import type { Request, Response, NextFunction } from "express";
import type { Redis } from "ioredis";
import { sendError } from "../errors.js";

export type BucketOpts = { bucketSize: number; refillPerSec: number };

type BucketState = { tokens: number; last: number };

export interface BucketStore {
  /** Takes one token for `id`; false when the bucket is empty. */
  take(id: string, opts: BucketOpts, nowMs: number): Promise<boolean>;
}

function refill(st: BucketState | null, opts: BucketOpts, nowMs: number): number {
  const last = st?.last ?? nowMs;
  const tokens = st?.tokens ?? opts.bucketSize;
  const elapsedSec = Math.max(0, (nowMs - last) / 1000);
  return Math.min(opts.bucketSize, tokens + elapsedSec * opts.refillPerSec);
}

/** Process-local buckets. Full buckets are swept, at most once per `sweepEveryMs`. */
export class MemoryBucketStore implements BucketStore {
  private buckets = new Map<string, BucketState>();
  private lastSweep = 0;

  constructor(private sweepEveryMs = 1000) {}

  async take(id: string, opts: BucketOpts, nowMs: number): Promise<boolean> {
    if (nowMs - this.lastSweep >= this.sweepEveryMs) this.sweep(opts, nowMs);
    const tokens = refill(this.buckets.get(id) ?? null, opts, nowMs);
    const ok = tokens >= 1;
    this.buckets.set(id, { tokens: ok ? tokens - 1 : tokens, last: nowMs });
    return ok;
  }

  get bucketCount() {
    return this.buckets.size;
  }

  // A bucket that has refilled completely is the same as no bucket.
  private sweep(opts: BucketOpts, nowMs: number) {
    this.lastSweep = nowMs;
    for (const [id, st] of this.buckets) {
      if (refill(st, opts, nowMs) >= opts.bucketSize) this.buckets.delete(id);
    }
  }
}

/** Shared buckets for several API instances. Hash per key, expires after an idle hour. */
export class RedisBucketStore implements BucketStore {
  constructor(private redis: Redis, private prefix = "fleet:rl:") {}

  async take(id: string, opts: BucketOpts, nowMs: number): Promise<boolean> {
    const key = this.prefix + id;
    const st = await this.redis.hgetall(key);
    const prev = st.last === undefined ? null : { tokens: Number(st.tokens), last: Number(st.last) };
    const tokens = refill(prev, opts, nowMs);
    const ok = tokens >= 1;
    await this.redis.hset(key, { tokens: String(ok ? tokens - 1 : tokens), last: String(nowMs) });
    await this.redis.expire(key, 3600);
    return ok;
  }
}

/** Token bucket keyed by client ip. */
export function rateLimit(opts: BucketOpts & { store: BucketStore; now?: () => number }) {
  const { store, now = Date.now } = opts;
  return async (req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip || req.socket.remoteAddress || "unknown";
    if (!(await store.take(ip, opts, now()))) {
      res.setHeader("Retry-After", "1");
      return sendError(res, 429, "rate-limited");
    }
    return next();
  };
}
