/**
 * Error → HTTP response mapping
 *
 *   EngineUnavailable   → 503 { error, retryable: true }
 *   EngineResponseError → 502 { error, retryable: false }
 *   StorageUnavailable  → 503 { error, retryable: true }
 *   ZodError            → 400 { error, issues }
 *   anything else       → 500
 */

import { StorageUnavailable } from "@counteroffer/database";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { EngineResponseError, EngineUnavailable } from "../lib/engines/errors";

/** Express 4 does not forward rejected promises to error middleware on its own */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function isMalformedJson(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  // Express recognizes error middleware by its four parameters
  _next: NextFunction,
): void {
  if (error instanceof ZodError) {
    res.status(400).json({
      error: "Invalid request body",
      issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
    return;
  }

  if (isMalformedJson(error)) {
    res.status(400).json({ error: "Request body is not valid JSON" });
    return;
  }

  if (error instanceof EngineUnavailable) {
    console.error(`api: ${req.method} ${req.path} - model engine unavailable: ${error.message}`);
    res.status(503).json({ error: error.message, retryable: true });
    return;
  }

  if (error instanceof EngineResponseError) {
    console.error(`api: ${req.method} ${req.path} - model engine error: ${error.message}`);
    res.status(502).json({ error: error.message, retryable: false });
    return;
  }

  if (error instanceof StorageUnavailable) {
    console.error(`api: ${req.method} ${req.path} - storage unavailable: ${error.message}`);
    res.status(503).json({ error: error.message, retryable: true });
    return;
  }

  console.error(`api: ${req.method} ${req.path} failed:`, error);
  res.status(500).json({ error: "Internal server error" });
}
