// SPDX-License-Identifier: Apache-2.0
// api/src/mw/rateLimit.test.ts
import { test } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import express from "express";
import { asyncH } from "./async.js";
import { MemoryBucketStore, rateLimit } from "./rateLimit.js";

const opts = { bucketSize: 2, refillPerSec: 1 };

test("bucket empties, then refills over time", async () => {
  const b = new MemoryBucketStore();
  assert.equal(await b.take("10.0.0.1", opts, 0), true);
  assert.equal(await b.take("10.0.0.1", opts, 0), true);
  assert.equal(await b.take("10.0.0.1", opts, 0), false);
  assert.equal(await b.take("10.0.0.1", opts, 500), false);
  assert.equal(await b.take("10.0.0.1", opts, 1000), true);
});

test("refill never exceeds the bucket size", async () => {
  const b = new MemoryBucketStore();
  await b.take("10.0.0.1", opts, 0);
  assert.equal(await b.take("10.0.0.1", opts, 60_000), true);
  assert.equal(await b.take("10.0.0.1", opts, 60_000), true);
  assert.equal(await b.take("10.0.0.1", opts, 60_000), false);
});

test("buckets are per key", async () => {
  const b = new MemoryBucketStore();
  const one = { bucketSize: 1, refillPerSec: 1 };
  assert.equal(await b.take("a", one, 0), true);
  assert.equal(await b.take("a", one, 0), false);
  assert.equal(await b.take("b", one, 0), true);
});

test("full buckets are swept so idle keys do not accumulate", async () => {
  const b = new MemoryBucketStore(1000);
  const one = { bucketSize: 1, refillPerSec: 1 };
  await b.take("10.0.0.1", one, 0);
  await b.take("10.0.0.2", one, 0);
  assert.equal(b.bucketCount, 2);
  await b.take("10.0.0.3", one, 5000);
  assert.equal(b.bucketCount, 1);
});

test("a bucket still refilling survives the sweep", async () => {
  const b = new MemoryBucketStore(1000);
  const slow = { bucketSize: 1, refillPerSec: 0.001 };
  await b.take("10.0.0.1", slow, 0);
  await b.take("10.0.0.2", slow, 5000);
  assert.equal(b.bucketCount, 2);
  assert.equal(await b.take("10.0.0.1", slow, 5000), false);
});

async function statusesFor(trustProxy: false | number, forwardedFor: (i: number) => string) {
  const app = express();
  app.set("trust proxy", trustProxy);
  const store = new MemoryBucketStore();
  app.post(
    "/readings",
    asyncH(rateLimit({ bucketSize: 1, refillPerSec: 0.001, store })),
    (_req, res) => { res.status(201).end(); }
  );
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");
  try {
    const statuses: number[] = [];
    for (let i = 0; i < 4; i++) {
      const res = await fetch(`http://127.0.0.1:${addr.port}/readings`, {
        method: "POST",
        headers: { "X-Forwarded-For": forwardedFor(i) },
      });
      statuses.push(res.status);
    }
    return { statuses, buckets: store.bucketCount };
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

test("rotating X-Forwarded-For is ignored when no proxy is trusted", async () => {
  const out = await statusesFor(false, (i) => `10.0.${i}.1`);
  assert.deepEqual(out, { statuses: [201, 429, 429, 429], buckets: 1 });
});

test("with one trusted hop the key is the address the proxy saw", async () => {
  const out = await statusesFor(1, (i) => `10.0.${i}.1, 203.0.113.9`);
  assert.deepEqual(out, { statuses: [201, 429, 429, 429], buckets: 1 });
});
