// SPDX-License-Identifier: Apache-2.0
// api/src/mw/metricsGuard.ts
import type { Request, Response, NextFunction } from "express";

export type MetricsGuardOpts = {
  allowlist?: string; // comma separated IPs
  basicAuth?: string; // "user:pass"
};

export function metricsGuard(opts: MetricsGuardOpts = {}) {
  const allow = (opts.allowlist || "")
    .split(",").map(s => s.trim()).filter(Boolean);
  const basic = opts.basicAuth || "";
  return (req: Request, res: Response, next: NextFunction) => {
    const clientIp = req.ips[0] || req.ip || "";
    if (allow.length && !allow.includes(clientIp)) return res.status(403).end();
    if (basic) {
      const hdr = req.headers.authorization || "";
      if (!hdr.startsWith("Basic ")) { res.set("WWW-Authenticate", "Basic"); return res.status(401).end(); }
      const [u, p] = Buffer.from(hdr.slice(6), "base64").toString().split(":");
      const [eu, ep] = basic.split(":");
      if (u !== eu || p !== ep) return res.status(401).end();
    }
    next();
  };
}
