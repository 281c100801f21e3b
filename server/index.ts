import "dotenv/config";
import express from "express";
import { WebClient } from "@slack/web-api";
import { loadSettings } from "./config/settings";
import { createGenerateContent } from "./llm/client";
import { addSecurityHeaders } from "./middleware/security";
import { registerRoutes } from "./routes";
import { createDocumentQueryService } from "./services/documentQueryService";
import { EventDeduplicator } from "./services/eventDeduplicator";
import { EventDispatcher } from "./slack/eventDispatcher";
import { createSlackEventsHandler } from "./slack/events";
import { createSlackMessenger, getBotUserId } from "./slack/slackApi";
import { getErrorMessage } from "./utils/errorHandler";
import { checkSlackConfiguration } from "./utils/slackConfigCheck";
import { logError, logInfo } from "./utils/slackLogger";

async function main(): Promise<void> {
  const settings = loadSettings();
  checkSlackConfiguration(settings);

  const slackClient = new WebClient(settings.slack.botToken);
  const botUserId = await getBotUserId(slackClient);
  logInfo(`[Server] Bot user id: ${botUserId}`);

  const dispatcher = new EventDispatcher({
    deduplicator: new EventDeduplicator(),
    triggers: { ...settings.triggers, botUserId },
    queryService: createDocumentQueryService({
      generateContent: createGenerateContent(settings.gemini.apiKey),
      fileSearchStoreName: settings.gemini.fileSearchStoreName,
      model: settings.gemini.model,
      fallbackEnabled: settings.gemini.fallbackEnabled,
      timeoutMs: settings.gemini.timeoutMs,
    }),
    messenger: createSlackMessenger(slackClient),
  });

  const app = express();
  app.disable("x-powered-by");
  app.use(addSecurityHeaders);

  const server = registerRoutes(app, createSlackEventsHandler({
    signingSecret: settings.slack.signingSecret,
    dispatcher,
    challengeBeforeVerify: settings.slack.challengeBeforeVerify,
  }));

  await new Promise<void>((resolve) => {
    server.listen(settings.server.port, settings.server.host, () => resolve());
  });
  logInfo(`[Server] Listening on ${settings.server.host}:${settings.server.port}`);
}

main().catch((error: unknown) => {
  logError(`[Server] Startup failed: ${getErrorMessage(error)}`);
  process.exit(1);
});
