//src/routes/conversation.ts

import { Router } from "express";
import { createConversationController } from "../controllers/conversationController";
import type { SessionProgressTracker } from "../state/sessionProgressTracker";

export function conversationRoutes(tracker: SessionProgressTracker): Router {
  const router = Router();
  const { startConversation, replyToConversation } = createConversationController(tracker);

  router.post("/start", startConversation);
  router.post("/reply", replyToConversation);

  return router;
}
