// src/content/phrasePools.ts

import fs from "fs";
import path from "path";
import type { SupportedLanguage, ValidationResult } from "../types";
import { isSupportedLanguage } from "../utils/languages";

export type PhraseTables = {
  defaultLanguage: SupportedLanguage;
  greetings: Partial<Record<SupportedLanguage, string>>;
  questions: Partial<Record<SupportedLanguage, string[]>>;
  statements: Partial<Record<SupportedLanguage, string[]>>;
};

export type PhraseKind = "question" | "statement";

export class PhrasePoolError extends Error {
  constructor(message: string, readonly details: string[] = []) {
    super(details.length ? `${message}: ${details.join("; ")}` : message);
    this.name = "PhrasePoolError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function readGreetings(raw: unknown, errors: string[]): Partial<Record<SupportedLanguage, string>> {
  const out: Partial<Record<SupportedLanguage, string>> = {};
  if (!isRecord(raw)) {
    errors.push("greetings must be an object");
    return out;
  }
  for (const [lang, value] of Object.entries(raw)) {
    if (!isSupportedLanguage(lang)) {
      errors.push(`greetings.${lang}: unsupported language`);
      continue;
    }
    if (!isNonEmptyString(value)) {
      errors.push(`greetings.${lang}: must be a non-empty string`);
      continue;
    }
    out[lang] = value;
  }
  return out;
}

function readPool(
  name: "questions" | "statements",
  raw: unknown,
  errors: string[]
): Partial<Record<SupportedLanguage, string[]>> {
  const out: Partial<Record<SupportedLanguage, string[]>> = {};
  if (!isRecord(raw)) {
    errors.push(`${name} must be an object`);
    return out;
  }
  for (const [lang, value] of Object.entries(raw)) {
    if (!isSupportedLanguage(lang)) {
      errors.push(`${name}.${lang}: unsupported language`);
      continue;
    }
    if (!Array.isArray(value) || value.length === 0) {
      errors.push(`${name}.${lang}: must be a non-empty array`);
      continue;
    }
    const phrases = value.filter(isNonEmptyString);
    if (phrases.length !== value.length) {
      errors.push(`${name}.${lang}: every phrase must be a non-empty string`);
      continue;
    }
    out[lang] = phrases;
  }
  return out;
}

export function validatePhraseTables(raw: unknown): ValidationResult<PhraseTables> {
  const errors: string[] = [];
  if (!isRecord(raw)) return { ok: false, errors: ["phrase tables must be an object"] };

  const defaultLanguage = raw.defaultLanguage;
  if (!isSupportedLanguage(defaultLanguage)) {
    return { ok: false, errors: ["defaultLanguage must be a supported language"] };
  }

  const greetings = readGreetings(raw.greetings, errors);
  const questions = readPool("questions", raw.questions, errors);
  const statements = readPool("statements", raw.statements, errors);

  if (!greetings[defaultLanguage]) errors.push(`greetings.${defaultLanguage} is required`);
  if (!questions[defaultLanguage]) errors.push(`questions.${defaultLanguage} is required`);
  if (!statements[defaultLanguage]) errors.push(`statements.${defaultLanguage} is required`);

  if (errors.length) return { ok: false, errors };
  return { ok: true, value: { defaultLanguage, greetings, questions, statements } };
}

/**
 * Per-language greeting and phrase pools. Languages without their own entry
 * use the default language's.
 */
export class PhrasePools {
  private readonly defaultGreeting: string;
  private readonly defaultQuestions: readonly string[];
  private readonly defaultStatements: readonly string[];

  constructor(private readonly tables: PhraseTables) {
    const lang = tables.defaultLanguage;
    const greeting = tables.greetings[lang];
    const questions = tables.questions[lang];
    const statements = tables.statements[lang];
    if (!greeting || !questions?.length || !statements?.length) {
      throw new PhrasePoolError(`Missing phrases for default language ${lang}`);
    }
    this.defaultGreeting = greeting;
    this.defaultQuestions = questions;
    this.defaultStatements = statements;
  }

  get defaultLanguage(): SupportedLanguage {
    return this.tables.defaultLanguage;
  }

  greetingFor(language: SupportedLanguage): string {
    return this.tables.greetings[language] ?? this.defaultGreeting;
  }

  poolFor(kind: PhraseKind, language: SupportedLanguage): readonly string[] {
    if (kind === "question") return this.tables.questions[language] ?? this.defaultQuestions;
    return this.tables.statements[language] ?? this.defaultStatements;
  }
}

export function phrasePoolsFromJson(raw: unknown): PhrasePools {
  const result = validatePhraseTables(raw);
  if (!result.ok) throw new PhrasePoolError("Invalid conversation phrases", result.errors);
  return new PhrasePools(result.value);
}

const PHRASES_FILE = "conversationPhrases.json";

export function loadPhrasePools(filePath?: string): PhrasePools {
  const candidatePaths = filePath
    ? [filePath]
    : [
        path.join(__dirname, PHRASES_FILE),
        // dist/ builds do not copy JSON content, so fall back to the source tree
        path.join(process.cwd(), "src", "content", PHRASES_FILE),
      ];

  const found = candidatePaths.find((p) => fs.existsSync(p));
  if (!found) {
    throw new PhrasePoolError("Conversation phrases file not found", candidatePaths);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(found, "utf-8"));
  } catch (err) {
    throw new PhrasePoolError(`Could not parse ${found}`, [err instanceof Error ? err.message : String(err)]);
  }
  return phrasePoolsFromJson(parsed);
}
