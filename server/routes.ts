import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { registerSlackRoutes } from "./slack";
import type { SlackEventsHandler } from "./slack/events";
import { handleRouteError } from "./utils/errorHandler";

export const SERVICE_NAME = "docsearch-slack-bridge";

export function healthHandler(_req: Request, res: Response): void {
  res.json({ status: "healthy", service: SERVICE_NAME });
}

export function readinessHandler(_req: Request, res: Response): void {
  res.json({ status: "ok" });
}

export function errorMiddleware(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }
  handleRouteError(res, err, "Express");
}

export function registerRoutes(app: Express, slackEventsHandler: SlackEventsHandler): Server {
  app.get("/", healthHandler);
  app.get("/health", readinessHandler);

  registerSlackRoutes(app, slackEventsHandler);

  app.use(errorMiddleware);

  return createServer(app);
}
