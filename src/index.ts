// src/index.ts
// this is also known as the backend entry file

import "dotenv/config";
import { createApp } from "./app";
import { getSettings } from "./config/settings";
import { openaiJsonClient } from "./ai/openaiClient";
import { loadPhrasePools } from "./content/phrasePools";
import { SessionProgressTracker } from "./state/sessionProgressTracker";
import { logInfo } from "./utils/logger";

const settings = getSettings();

const tracker = new SessionProgressTracker({
  pools: loadPhrasePools(),
  maxSteps: settings.conversationMaxSteps,
  questionProbability: settings.conversationQuestionProbability,
});

const app = createApp({ settings, tracker, aiClient: openaiJsonClient });

app.listen(settings.port, () => {
  logInfo("server_started", { url: `http://localhost:${settings.port}` });
});
