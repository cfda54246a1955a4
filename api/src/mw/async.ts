// SPDX-License-Identifier: Apache-2.0
// api/src/mw/async.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Forwards rejections of an async handler to the Express error handler. */
export const asyncH =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) =>
    Promise.resolve(fn(req, res, next)).catch(next);
