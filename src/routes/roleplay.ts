//src/routes/roleplay.ts

import { Router } from "express";
import type { ModelJsonClient } from "../ai/openaiClient";
import { createRoleplayController } from "../controllers/roleplayController";

export function roleplayRoutes(aiClient: ModelJsonClient): Router {
  const router = Router();
  const { generateScenario, evaluateResponse } = createRoleplayController(aiClient);

  router.post("/generate-scenario", generateScenario);
  router.post("/evaluate-response", evaluateResponse);

  return router;
}
