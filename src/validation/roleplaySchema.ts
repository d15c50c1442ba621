// src/validation/roleplaySchema.ts

import type { SupportedLanguage, ValidationResult } from "../types";

export type RoleplayScenario = {
  scenario: string;
  question_in_language: string;
  question_english: string;
  language: SupportedLanguage;
};

export type RoleplayEvaluation = {
  needs_improvement: boolean;
  original: string | null;
  better: string | null;
};

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function optionalText(value: unknown): string | null {
  return isNonEmptyString(value) ? value.trim() : null;
}

export function validateScenario(
  raw: Record<string, unknown>,
  language: SupportedLanguage
): ValidationResult<RoleplayScenario> {
  const errors: string[] = [];
  if (!isNonEmptyString(raw.scenario)) errors.push("scenario must be a non-empty string");
  if (!isNonEmptyString(raw.question_in_language)) errors.push("question_in_language must be a non-empty string");
  if (!isNonEmptyString(raw.question_english)) errors.push("question_english must be a non-empty string");
  if (errors.length) return { ok: false, errors };

  return {
    ok: true,
    value: {
      scenario: String(raw.scenario).trim(),
      question_in_language: String(raw.question_in_language).trim(),
      question_english: String(raw.question_english).trim(),
      // the model's own language field is ignored
      language,
    },
  };
}

export function validateEvaluation(raw: Record<string, unknown>): ValidationResult<RoleplayEvaluation> {
  if (typeof raw.needs_improvement !== "boolean") {
    return { ok: false, errors: ["needs_improvement must be a boolean"] };
  }
  if (!raw.needs_improvement) {
    return { ok: true, value: { needs_improvement: false, original: null, better: null } };
  }

  const better = optionalText(raw.better);
  if (!better) return { ok: false, errors: ["better is required when needs_improvement is true"] };

  return {
    ok: true,
    value: { needs_improvement: true, original: optionalText(raw.original), better },
  };
}
