//src/controllers/conversationController.ts

import type { Request, Response } from "express";
import type { SessionProgressTracker } from "../state/sessionProgressTracker";
import { sendError } from "../http/sendError";
import { parseLanguage, unsupportedLanguageMessage } from "../utils/languages";

export type ConversationStartResponse = {
  conversation_id: string;
  ai_message: string;
};

export type ConversationReplyResponse = {
  ai_message: string;
  conversation_ended: boolean;
};

function readString(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

export function createConversationController(tracker: SessionProgressTracker) {
  // POST /conversation/start?language=
  const startConversation = (req: Request, res: Response) => {
    const rawLanguage: unknown = req.query?.language ?? req.body?.language;
    const language = parseLanguage(rawLanguage);
    if (!language) {
      return sendError(res, 400, unsupportedLanguageMessage(), "INVALID_REQUEST");
    }

    const { sessionId, message } = tracker.start(language);
    const body: ConversationStartResponse = { conversation_id: sessionId, ai_message: message };
    return res.status(200).json(body);
  };

  // POST /conversation/reply
  const replyToConversation = (req: Request, res: Response) => {
    const { conversation_id, user_message, language: rawLanguage } = req.body ?? {};

    const conversationId = readString(conversation_id);
    if (!conversationId || !conversationId.trim()) {
      return sendError(res, 400, "conversation_id is required", "INVALID_REQUEST");
    }

    const userMessage = readString(user_message);
    if (userMessage === null) {
      return sendError(res, 400, "user_message is required", "INVALID_REQUEST");
    }

    const language = parseLanguage(rawLanguage);
    if (!language) {
      return sendError(res, 400, unsupportedLanguageMessage(), "INVALID_REQUEST");
    }

    const { message, ended } = tracker.reply(conversationId.trim(), userMessage, language);
    const body: ConversationReplyResponse = { ai_message: message, conversation_ended: ended };
    return res.status(200).json(body);
  };

  return { startConversation, replyToConversation };
}
