// src/utils/languages.ts

import type { SupportedLanguage } from "../types";

export const DEFAULT_LANGUAGE: SupportedLanguage = "en-US";

export const SUPPORTED_LANGUAGES: Readonly<Record<SupportedLanguage, string>> = {
  "en-US": "English",
  "es-ES": "Spanish",
  "fr-FR": "French",
  "de-DE": "German",
  "it-IT": "Italian",
  "pt-BR": "Portuguese",
  "ja-JP": "Japanese",
  "ko-KR": "Korean",
  "zh-CN": "Mandarin Chinese",
  "ru-RU": "Russian",
  "ar-SA": "Arabic",
  "tl-PH": "Tagalog",
  "hi-IN": "Hindi",
  "th-TH": "Thai",
  "vi-VN": "Vietnamese",
  "nl-NL": "Dutch",
  "pl-PL": "Polish",
  "tr-TR": "Turkish",
  "sv-SE": "Swedish",
  "no-NO": "Norwegian",
};

export function isSupportedLanguage(value: unknown): value is SupportedLanguage {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, value);
}

export function supportedLanguageCodes(): SupportedLanguage[] {
  return Object.keys(SUPPORTED_LANGUAGES).filter(isSupportedLanguage);
}

/**
 * Missing or blank -> default language. Anything else must match a code exactly
 * (after trimming); unknown codes give null so the route can answer 400.
 */
export function parseLanguage(value: unknown): SupportedLanguage | null {
  if (value === undefined || value === null) return DEFAULT_LANGUAGE;
  if (typeof value !== "string") return null;
  const t = value.trim();
  if (!t) return DEFAULT_LANGUAGE;
  return isSupportedLanguage(t) ? t : null;
}

export function languageName(language: SupportedLanguage): string {
  return SUPPORTED_LANGUAGES[language];
}

export function unsupportedLanguageMessage(): string {
  return `Unsupported language. Supported: ${supportedLanguageCodes().join(", ")}`;
}
