//src/services/roleplayService.ts

import type { SupportedLanguage } from "../types";
import type { ModelJsonClient } from "../ai/openaiClient";
import { parseModelJson } from "../ai/modelJson";
import { isRoleplayAiEnabled } from "../config/featureFlags";
import { languageName } from "../utils/languages";
import {
  validateEvaluation,
  validateScenario,
  type RoleplayEvaluation,
  type RoleplayScenario,
} from "../validation/roleplaySchema";

export type EvaluateResponseInput = {
  scenario: string;
  question_in_language: string;
  question_english: string;
  user_response: string;
  language: SupportedLanguage;
};

export type RoleplayOptions = { forceEnabled?: boolean };

export type RoleplayResult<T> = { value: T; source: "ai" | "fallback" };

const MAX_ATTEMPTS = 2;

export function fallbackScenario(language: SupportedLanguage): RoleplayScenario {
  return {
    scenario: "You are meeting a friend. They ask how you are doing.",
    question_in_language: "",
    question_english: "How are you?",
    language,
  };
}

export const FALLBACK_EVALUATION: RoleplayEvaluation = {
  needs_improvement: false,
  original: null,
  better: null,
};

export function buildScenarioPrompt(language: SupportedLanguage): string {
  const name = languageName(language);
  return [
    `Create a short roleplay scenario for ${name} learners, set in an everyday situation.`,
    "",
    "Return ONLY valid JSON with exactly these keys:",
    "{",
    '  "scenario": "English description of the situation (2-3 sentences)",',
    `  "question_in_language": "One question in ${name} that someone would ask in this situation",`,
    '  "question_english": "The same question in English"',
    "}",
    "",
    "RULES:",
    "- Keep the question natural and conversational.",
    "- Beginner-friendly vocabulary.",
  ].join("\n");
}

export function buildEvaluationPrompt(input: EvaluateResponseInput): string {
  const name = languageName(input.language);
  return [
    `Evaluate a ${name} learner's reply in a roleplay.`,
    "",
    `Scenario: ${input.scenario}`,
    `Question (${name}): ${input.question_in_language}`,
    `Question (English): ${input.question_english}`,
    `Learner's reply: ${input.user_response}`,
    "",
    "Check relevance to the question, grammar, naturalness and politeness.",
    "Only suggest an improvement when there is a clear problem.",
    "",
    "Return ONLY valid JSON with exactly these keys:",
    "{",
    '  "needs_improvement": true or false,',
    '  "original": "the learner\'s reply when improvement is needed, otherwise null",',
    `  "better": "an improved reply in ${name} when needed, otherwise null"`,
    "}",
  ].join("\n");
}

function isEnabled(opts?: RoleplayOptions): boolean {
  return typeof opts?.forceEnabled === "boolean" ? opts.forceEnabled : isRoleplayAiEnabled();
}

export async function generateScenario(
  language: SupportedLanguage,
  aiClient: ModelJsonClient,
  opts?: RoleplayOptions
): Promise<RoleplayResult<RoleplayScenario>> {
  if (!isEnabled(opts)) return { value: fallbackScenario(language), source: "fallback" };

  const prompt = buildScenarioPrompt(language);
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const parsed = parseModelJson(await aiClient.generateJson(prompt));
    if (!parsed) continue;
    const validated = validateScenario(parsed, language);
    if (validated.ok) return { value: validated.value, source: "ai" };
  }

  return { value: fallbackScenario(language), source: "fallback" };
}

export async function evaluateResponse(
  input: EvaluateResponseInput,
  aiClient: ModelJsonClient,
  opts?: RoleplayOptions
): Promise<RoleplayResult<RoleplayEvaluation>> {
  if (!isEnabled(opts)) return { value: { ...FALLBACK_EVALUATION }, source: "fallback" };

  const prompt = buildEvaluationPrompt(input);
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const parsed = parseModelJson(await aiClient.generateJson(prompt));
    if (!parsed) continue;
    const validated = validateEvaluation(parsed);
    if (!validated.ok) continue;

    const value = validated.value;
    if (value.needs_improvement && !value.original) {
      return { value: { ...value, original: input.user_response }, source: "ai" };
    }
    return { value, source: "ai" };
  }

  return { value: { ...FALLBACK_EVALUATION }, source: "fallback" };
}
