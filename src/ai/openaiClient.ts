// src/ai/openaiClient.ts

import OpenAI from "openai";
import { getSettings } from "../config/settings";
import { logServerError } from "../utils/logger";

/** Anything that turns a prompt into raw model text expected to hold JSON. */
export type ModelJsonClient = {
  generateJson: (prompt: string) => Promise<string>;
};

export type GenerateJsonOptions = {
  temperature?: number;
  maxOutputTokens?: number;
};

let client: OpenAI | null = null;

function getClient(): OpenAI {
  if (!client) {
    if (!process.env.OPENAI_API_KEY) {
      throw new Error("OPENAI_API_KEY is not set");
    }
    client = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY,
    });
  }
  return client;
}

const JSON_SYSTEM_PROMPT =
  "You are a supportive language teacher. You output ONLY valid JSON. No markdown, no extra text. Follow the schema exactly.";

// Failures come back as "" so callers take their canned fallback.
export async function generateJson(prompt: string, opts?: GenerateJsonOptions): Promise<string> {
  try {
    const response = await getClient().responses.create({
      model: getSettings().openaiModel,
      input: [
        { role: "system", content: JSON_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      temperature: opts?.temperature ?? 0.7,
      max_output_tokens: opts?.maxOutputTokens ?? 400,
    });

    return response.output_text || "";
  } catch (err) {
    logServerError("openai.generateJson", err);
    return "";
  }
}

export const openaiJsonClient: ModelJsonClient = { generateJson: (prompt) => generateJson(prompt) };
