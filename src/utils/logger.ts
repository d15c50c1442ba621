// src/utils/logger.ts

type LogFields = Record<string, string | number | boolean | null | undefined>;

export function logInfo(msg: string, fields: LogFields = {}) {
  console.log(JSON.stringify({ level: "info", msg, ...fields }));
}

export function logServerError(context: string, err: unknown, requestId?: string) {
  const rid =
    typeof requestId === "string" && requestId.trim() ? ` requestId=${requestId.trim()}` : "";
  const name = err instanceof Error && err.name ? ` ${err.name}` : "";
  const msg = err instanceof Error ? err.message : String(err || "unknown error");
  const safeMsg = msg.length > 500 ? `${msg.slice(0, 500)}…` : msg;

  console.error(`[${context}]${rid}${name} ${safeMsg}`.trim());
}
