//src/controllers/roleplayController.ts

import type { Request, Response } from "express";
import type { ModelJsonClient } from "../ai/openaiClient";
import { getRequestId, sendError } from "../http/sendError";
import { evaluateResponse, generateScenario } from "../services/roleplayService";
import { parseLanguage, unsupportedLanguageMessage } from "../utils/languages";
import { logInfo, logServerError } from "../utils/logger";

const EVALUATION_FIELDS = ["scenario", "question_in_language", "question_english", "user_response"] as const;

function toBoundedText(v: unknown, max = 2000): string | null {
  if (typeof v !== "string") return null;
  return v.trim().slice(0, max);
}

export function createRoleplayController(aiClient: ModelJsonClient) {
  // POST /roleplay/generate-scenario?language=
  const generateScenarioHandler = async (req: Request, res: Response) => {
    const rawLanguage: unknown = req.query?.language ?? req.body?.language;
    const language = parseLanguage(rawLanguage);
    if (!language) {
      return sendError(res, 400, unsupportedLanguageMessage(), "INVALID_REQUEST");
    }

    try {
      const { value, source } = await generateScenario(language, aiClient);
      logInfo("roleplay_scenario", { requestId: getRequestId(res), language, source });
      return res.status(200).json(value);
    } catch (err) {
      logServerError("roleplay.generateScenario", err, getRequestId(res));
      return sendError(res, 500, "Server error", "SERVER_ERROR");
    }
  };

  // POST /roleplay/evaluate-response
  const evaluateResponseHandler = async (req: Request, res: Response) => {
    const body: Record<string, unknown> = req.body ?? {};

    const fields: Record<(typeof EVALUATION_FIELDS)[number], string> = {
      scenario: "",
      question_in_language: "",
      question_english: "",
      user_response: "",
    };
    for (const key of EVALUATION_FIELDS) {
      const value = toBoundedText(body[key]);
      if (value === null) {
        return sendError(res, 400, `${key} is required`, "INVALID_REQUEST");
      }
      fields[key] = value;
    }

    const language = parseLanguage(body.language);
    if (!language) {
      return sendError(res, 400, unsupportedLanguageMessage(), "INVALID_REQUEST");
    }

    try {
      const { value, source } = await evaluateResponse({ ...fields, language }, aiClient);
      logInfo("roleplay_evaluation", { requestId: getRequestId(res), language, source });
      return res.status(200).json(value);
    } catch (err) {
      logServerError("roleplay.evaluateResponse", err, getRequestId(res));
      return sendError(res, 500, "Server error", "SERVER_ERROR");
    }
  };

  return { generateScenario: generateScenarioHandler, evaluateResponse: evaluateResponseHandler };
}
