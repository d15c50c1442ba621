// src/state/sessionProgressTracker.ts

import crypto from "node:crypto";
import type { SupportedLanguage } from "../types";
import type { PhraseKind, PhrasePools } from "../content/phrasePools";
import { normalizePhrase, samePhrase } from "../utils/normalizePhrase";

export const DEFAULT_MAX_STEPS = 5;
export const DEFAULT_QUESTION_PROBABILITY = 0.3;

export const NOT_FOUND_MESSAGE = "Conversation not found. Please start a new conversation.";

export function retryMessage(expectedPhrase: string): string {
  return `Please say ${expectedPhrase} again.`;
}

export function completionMessage(maxSteps: number): string {
  return `You've completed all ${maxSteps} prompts. Fantastic work!`;
}

export type ConversationSession = {
  sessionId: string;
  language: SupportedLanguage;
  expectedPhrase: string;
  completedSteps: number;
  usedPhrases: string[];
};

export type StartResult = { sessionId: string; message: string };
export type ReplyResult = { message: string; ended: boolean };

export type SessionProgressTrackerOptions = {
  pools: PhrasePools;
  maxSteps?: number;
  /** Chance of drawing from the question pool rather than the statement pool. */
  questionProbability?: number;
  /** Returns a float in [0, 1). */
  random?: () => number;
  createId?: () => string;
};

type ActiveSession = {
  sessionId: string;
  language: SupportedLanguage;
  expectedPhrase: string;
  completedSteps: number;
  usedPhrases: Set<string>;
};

/**
 * Repeat-after-me practice. Holds a single active session for the whole
 * process: starting a session discards whichever one was running before.
 * All methods are synchronous, so requests never observe a half-applied step.
 */
export class SessionProgressTracker {
  private active: ActiveSession | null = null;

  private readonly pools: PhrasePools;
  private readonly maxSteps: number;
  private readonly questionProbability: number;
  private readonly random: () => number;
  private readonly createId: () => string;

  constructor(opts: SessionProgressTrackerOptions) {
    this.pools = opts.pools;
    this.maxSteps = opts.maxSteps ?? DEFAULT_MAX_STEPS;
    this.questionProbability = opts.questionProbability ?? DEFAULT_QUESTION_PROBABILITY;
    this.random = opts.random ?? Math.random;
    this.createId = opts.createId ?? (() => crypto.randomUUID());
  }

  start(language: SupportedLanguage): StartResult {
    const greeting = this.pools.greetingFor(language);
    const sessionId = this.createId();

    this.active = {
      sessionId,
      language,
      expectedPhrase: greeting,
      completedSteps: 0,
      usedPhrases: new Set([normalizePhrase(greeting)]),
    };

    return { sessionId, message: greeting };
  }

  reply(sessionId: string, userText: string, language: SupportedLanguage): ReplyResult {
    const session = this.active;
    if (!session || session.sessionId !== sessionId) {
      return { message: NOT_FOUND_MESSAGE, ended: true };
    }

    if (!samePhrase(userText, session.expectedPhrase)) {
      return { message: retryMessage(session.expectedPhrase), ended: false };
    }

    session.completedSteps += 1;

    if (session.completedSteps >= this.maxSteps) {
      this.active = null;
      return { message: completionMessage(this.maxSteps), ended: true };
    }

    const next = this.nextPhrase(session, language);
    session.expectedPhrase = next;
    session.usedPhrases.add(normalizePhrase(next));

    return { message: next, ended: false };
  }

  snapshot(sessionId: string): ConversationSession | null {
    const session = this.active;
    if (!session || session.sessionId !== sessionId) return null;
    return {
      sessionId: session.sessionId,
      language: session.language,
      expectedPhrase: session.expectedPhrase,
      completedSteps: session.completedSteps,
      usedPhrases: [...session.usedPhrases],
    };
  }

  private nextPhrase(session: ActiveSession, language: SupportedLanguage): string {
    const kind: PhraseKind = this.random() < this.questionProbability ? "question" : "statement";
    const pool = this.pools.poolFor(kind, language);

    const unseen = pool.filter((p) => !session.usedPhrases.has(normalizePhrase(p)));
    // Exhausted pool: repeats allowed.
    const candidates = unseen.length ? unseen : pool;

    const idx = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    return candidates[idx];
  }
}
