//  src/routes/general.ts

import { Router } from "express";
import type { Settings } from "../config/settings";
import { DEFAULT_LANGUAGE, SUPPORTED_LANGUAGES, supportedLanguageCodes } from "../utils/languages";

export function generalRoutes(settings: Settings): Router {
  const router = Router();

  // GET /
  router.get("/", (_req, res) => {
    res.json({
      name: settings.appTitle,
      description: settings.appDescription,
      version: settings.version,
      endpoints: {
        languages: "/languages",
        conversation: "/conversation",
        roleplay: "/roleplay",
        health: "/health",
      },
    });
  });

  // GET /languages
  router.get("/languages", (_req, res) => {
    res.json({
      default_language: DEFAULT_LANGUAGE,
      supported_languages: SUPPORTED_LANGUAGES,
      total_languages: supportedLanguageCodes().length,
    });
  });

  return router;
}
