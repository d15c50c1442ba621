//src/config/settings.ts

export type Settings = {
  appTitle: string;
  appDescription: string;
  version: string;
  port: number;
  openaiModel: string;
  authToken: string | null;
  rateLimitMax: number;
  conversationQuestionProbability: number;
  conversationMaxSteps: number;
};

const DEFAULTS = {
  port: 3000,
  openaiModel: "gpt-4o-mini",
  rateLimitMax: 120,
  conversationQuestionProbability: 0.3,
  conversationMaxSteps: 5,
};

function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (typeof raw !== "string" || !raw.trim()) return fallback;
  const n = Number(raw.trim());
  if (!Number.isInteger(n) || n <= 0) return fallback;
  return n;
}

function readProbability(raw: string | undefined, fallback: number): number {
  if (typeof raw !== "string" || !raw.trim()) return fallback;
  const n = Number(raw.trim());
  if (!Number.isFinite(n)) return fallback;
  return Math.min(1, Math.max(0, n));
}

function readString(raw: string | undefined): string | null {
  const t = (raw ?? "").trim();
  return t ? t : null;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    appTitle: "Language Learning Platform",
    appDescription: "Conversation and roleplay practice for language learners",
    version: "2.0.0",
    port: readPositiveInt(env.PORT, DEFAULTS.port),
    openaiModel: readString(env.OPENAI_MODEL) ?? DEFAULTS.openaiModel,
    authToken: readString(env.AUTH_TOKEN),
    rateLimitMax: readPositiveInt(env.RATE_LIMIT_MAX, DEFAULTS.rateLimitMax),
    conversationQuestionProbability: readProbability(
      env.CONVERSATION_QUESTION_PROBABILITY,
      DEFAULTS.conversationQuestionProbability
    ),
    conversationMaxSteps: readPositiveInt(env.CONVERSATION_MAX_STEPS, DEFAULTS.conversationMaxSteps),
  };
}

let cached: Settings | null = null;

export function getSettings(): Settings {
  if (!cached) cached = loadSettings();
  return cached;
}
