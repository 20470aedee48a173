/**
 * Shared JSON response helpers: `{ success: true, data }` or
 * `{ success: false, error: { code, message } }`.
 */

import type { Request, Response } from "express";
import { PipelineError, type ErrorCode } from "../../src/lib/errors.js";

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  VALIDATION_ERROR: 400,
};

export function paramId(req: Request, name: string): string {
  const v = req.params[name];
  return Array.isArray(v) ? v[0] ?? "" : (v ?? "");
}

export function sendData(res: Response, data: unknown, status = 200): void {
  res.status(status).json({ success: true, data });
}

export function sendError(res: Response, err: unknown): void {
  if (err instanceof PipelineError) {
    res.status(STATUS_BY_CODE[err.code] ?? 500).json({
      success: false,
      error: { code: err.code, message: err.message },
    });
    return;
  }
  console.error("[Server] Unhandled error:", err);
  res.status(500).json({
    success: false,
    error: {
      code: "INTERNAL_ERROR",
      message: err instanceof Error ? err.message : "Internal server error",
    },
  });
}
