// src/http/sendError.ts

import type { Response } from "express";
import type { ErrorBody, ErrorCode } from "../types";

export function getRequestId(res: Response): string | undefined {
  const rid: unknown = res.locals?.requestId;
  return typeof rid === "string" && rid.trim() ? rid : undefined;
}

export function sendError(
  res: Response,
  status: number,
  message: string,
  code?: ErrorCode
): Response {
  const requestId = getRequestId(res);
  const body: ErrorBody = {
    error: message,
    ...(code ? { code } : {}),
    ...(requestId ? { requestId } : {}),
  };
  return res.status(status).json(body);
}
