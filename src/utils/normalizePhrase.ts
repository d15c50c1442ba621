// src/utils/normalizePhrase.ts

// Anything that is not a letter, number or whitespace.
const NON_WORD_CHARS = /[^\p{L}\p{N}\s]/gu;

export function normalizePhrase(text: string): string {
  return String(text ?? "")
    .normalize("NFC")
    .replace(NON_WORD_CHARS, "")
    .toLowerCase()
    .trim();
}

export function samePhrase(a: string, b: string): boolean {
  return normalizePhrase(a) === normalizePhrase(b);
}
