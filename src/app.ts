// src/app.ts

import express, { type Express } from "express";
import cors from "cors";
import type { Settings } from "./config/settings";
import type { ModelJsonClient } from "./ai/openaiClient";
import type { SessionProgressTracker } from "./state/sessionProgressTracker";
import { requestContextMiddleware } from "./middleware/requestContext";
import { errorEnvelopeMiddleware } from "./middleware/errorEnvelope";
import { createRateLimitMiddleware } from "./middleware/rateLimit";
import { createAuthMiddleware } from "./middleware/auth";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { generalRoutes } from "./routes/general";
import { conversationRoutes } from "./routes/conversation";
import { roleplayRoutes } from "./routes/roleplay";

export type AppDeps = {
  settings: Settings;
  tracker: SessionProgressTracker;
  aiClient: ModelJsonClient;
};

export function createApp({ settings, tracker, aiClient }: AppDeps): Express {
  const app = express();

  app.use(requestContextMiddleware);
  app.use(errorEnvelopeMiddleware);

  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST"],
    })
  );

  //body size limit
  app.use(express.json({ limit: "1mb" }));

  app.use(createRateLimitMiddleware({ max: settings.rateLimitMax }));

  // health BEFORE Auth
  app.get("/health", (_req, res) => res.status(200).json({ status: "ok" }));

  app.use(createAuthMiddleware(settings.authToken));

  app.use(generalRoutes(settings));
  app.use("/conversation", conversationRoutes(tracker));
  app.use("/roleplay", roleplayRoutes(aiClient));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
