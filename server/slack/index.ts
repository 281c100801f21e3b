/**
 * Slack Routes Registration
 * 
 * Purpose:
 * Registers Slack webhook endpoints with the Express app.
 * Uses raw body parsing for signature verification.
 * 
 * Layer: Slack (route setup)
 */

import type { Express } from "express";
import express from "express";
import type { SlackEventsHandler } from "./events";

export const SLACK_EVENTS_PATH = "/api/slack/events";

export function registerSlackRoutes(app: Express, slackEventsHandler: SlackEventsHandler) {
  app.post(
    SLACK_EVENTS_PATH,
    express.raw({ type: "application/json" }),
    slackEventsHandler
  );
}
