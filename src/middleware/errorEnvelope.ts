// src/middleware/errorEnvelope.ts

import type { Request, Response, NextFunction } from "express";
import { getRequestId } from "../http/sendError";

function isErrorPayload(body: unknown): body is { error: unknown } {
  return typeof body === "object" && body !== null && "error" in body;
}

/** Tags every `{ error }` body with the request id, whoever wrote it. */
export function errorEnvelopeMiddleware(_req: Request, res: Response, next: NextFunction) {
  const originalJson = res.json.bind(res);

  res.json = (body?: unknown) => {
    const requestId = getRequestId(res);
    if (isErrorPayload(body) && requestId) {
      return originalJson({ ...body, requestId });
    }
    return originalJson(body);
  };

  next();
}
