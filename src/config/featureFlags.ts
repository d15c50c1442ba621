//src/config/featureFlags.ts

export function isRoleplayAiEnabled(): boolean {
  const raw = String(process.env.ROLEPLAY_AI_ENABLED || "").toLowerCase().trim();
  return raw === "1" || raw === "true";
}
