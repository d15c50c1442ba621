//src/middleware/auth.ts

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { sendError } from "../http/sendError";

function extractBearerToken(rawAuth: string | undefined): string | null {
  if (!rawAuth) return null;
  const m = rawAuth.match(/^Bearer\s+(.+)$/i);
  if (!m) return null;
  const token = m[1]?.trim();
  return token ? token : null;
}

/**
 * With a token configured every request must carry it, either as
 * `Authorization: Bearer <token>` or `x-auth-token`. Without one, all requests pass.
 */
export function createAuthMiddleware(expectedToken: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (req.method === "OPTIONS") return next();
    if (!expectedToken) return next();

    const bearer = extractBearerToken(req.get("authorization"));
    const xToken = (req.get("x-auth-token") ?? "").trim();
    const provided = bearer ?? (xToken.length > 0 ? xToken : null);

    if (!provided || provided !== expectedToken) {
      return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");
    }

    return next();
  };
}
