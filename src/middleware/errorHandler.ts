// src/middleware/errorHandler.ts

import type { NextFunction, Request, Response } from "express";
import { getRequestId, sendError } from "../http/sendError";
import { logServerError } from "../utils/logger";

// body-parser marks its failures with `type` and `status`
function isMalformedBody(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  return "type" in err && err.type === "entity.parse.failed";
}

function isPayloadTooLarge(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  return "type" in err && err.type === "entity.too.large";
}

export function notFoundHandler(_req: Request, res: Response) {
  return sendError(res, 404, "Not Found", "NOT_FOUND");
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  if (isMalformedBody(err)) {
    return sendError(res, 400, "Request body must be valid JSON", "INVALID_REQUEST");
  }
  if (isPayloadTooLarge(err)) {
    return sendError(res, 413, "Request body too large", "INVALID_REQUEST");
  }

  logServerError("unhandled_error", err, getRequestId(res));
  return sendError(res, 500, "Server error", "SERVER_ERROR");
}
