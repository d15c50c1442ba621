// src/ai/modelJson.ts

const FENCE_OPEN = /^```[a-zA-Z]*\s*/;
const FENCE_CLOSE = /\s*```\s*$/;

function stripCodeFence(text: string): string {
  if (!text.startsWith("```")) return text;
  return text.replace(FENCE_OPEN, "").replace(FENCE_CLOSE, "").trim();
}

function extractJsonBlock(text: string): string | null {
  if (text.startsWith("{") && text.endsWith("}")) return text;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start >= 0 && end > start) return text.slice(start, end + 1);
  return null;
}

/**
 * Best-effort read of a model reply that should be a JSON object: tolerates
 * markdown fences and chatter around the object. Returns null when nothing
 * parses to a plain object.
 */
export function parseModelJson(text: string): Record<string, unknown> | null {
  const raw = stripCodeFence(String(text || "").trim());
  if (!raw) return null;

  const candidate = extractJsonBlock(raw);
  if (!candidate) return null;

  try {
    const parsed: unknown = JSON.parse(candidate);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
    return { ...parsed };
  } catch {
    return null;
  }
}
