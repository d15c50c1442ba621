//src/types/index.ts

export type SupportedLanguage =
  | "en-US"
  | "es-ES"
  | "fr-FR"
  | "de-DE"
  | "it-IT"
  | "pt-BR"
  | "ja-JP"
  | "ko-KR"
  | "zh-CN"
  | "ru-RU"
  | "ar-SA"
  | "tl-PH"
  | "hi-IN"
  | "th-TH"
  | "vi-VN"
  | "nl-NL"
  | "pl-PL"
  | "tr-TR"
  | "sv-SE"
  | "no-NO";

export type ErrorCode =
  | "INVALID_REQUEST"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "SERVER_ERROR";

export type ErrorBody = {
  error: string;
  code?: ErrorCode;
  requestId?: string;
};

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };
