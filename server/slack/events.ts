/**
 * Slack Events Handler
 *
 * Purpose:
 * HTTP entry point for Slack Events API webhooks.
 *
 * Key Flows:
 * 1. URL verification (Slack challenge), optionally before the signature check
 * 2. Signature verification (403 on failure)
 * 3. Immediate 200 ACK for event callbacks (Slack retries after 3 seconds)
 * 4. Dispatch to the EventDispatcher
 *
 * Only authentication and malformed payloads answer with a non-200 status;
 * everything after the ACK reports back through the Slack thread.
 *
 * Layer: Slack (event handling)
 */

import type { Request, Response } from "express";
import { AuthFailureError, MalformedPayloadError, handleRouteError } from "../utils/errorHandler";
import { RequestLogger } from "../utils/slackLogger";
import type { DispatchOutcome, DispatchState, EventDispatcher } from "./eventDispatcher";
import { parseEnvelope, peekChallenge } from "./payload";
import { verifySlackSignature } from "./verify";

export interface SlackEventsHandlerDeps {
  signingSecret: string;
  dispatcher: EventDispatcher;
  /** Answer `url_verification` before checking the signature */
  challengeBeforeVerify?: boolean;
  /** Clock override for tests, seconds since epoch */
  nowSeconds?: () => number;
}

export type SlackEventsHandler = (req: Request, res: Response) => Promise<DispatchOutcome | null>;

/**
 * express.raw() leaves the body as a Buffer. Anything else (a content type
 * it skipped, or a parser mounted earlier) means the signed bytes are gone.
 */
function readRawBody(req: Request): string | null {
  return Buffer.isBuffer(req.body) ? req.body.toString("utf8") : null;
}

/**
 * Resolves with the dispatch outcome once the event has been fully handled,
 * or null when nothing was dispatched. The HTTP response is always sent
 * before dispatching starts.
 */
export function createSlackEventsHandler(deps: SlackEventsHandlerDeps): SlackEventsHandler {
  const { signingSecret, dispatcher, challengeBeforeVerify = false } = deps;
  const now = deps.nowSeconds ?? (() => Date.now() / 1000);

  return async function slackEventsHandler(req: Request, res: Response): Promise<DispatchOutcome | null> {
    const logger = new RequestLogger();
    logger.debug("Event request", { stage: "received" satisfies DispatchState });

    const retryNum = req.headers["x-slack-retry-num"];
    if (retryNum) {
      logger.info(`Retry #${retryNum} received (reason: ${req.headers["x-slack-retry-reason"]})`);
    }

    try {
      const rawBody = readRawBody(req);

      if (challengeBeforeVerify && rawBody !== null) {
        const challenge = peekChallenge(rawBody);
        if (challenge !== null) {
          logger.info("Received URL verification challenge (pre-verification)");
          res.status(200).json({ challenge });
          return null;
        }
      }

      if (rawBody === null || !verifySlackSignature(req.headers, rawBody, signingSecret, now())) {
        throw new AuthFailureError("Invalid Slack signature", {
          hasTimestamp: typeof req.headers["x-slack-request-timestamp"] === "string",
          hasRawBody: rawBody !== null,
        });
      }

      const envelope = parseEnvelope(rawBody);

      if (envelope.type === "url_verification") {
        logger.info("Received URL verification challenge");
        res.status(200).json({ challenge: envelope.challenge });
        return null;
      }

      // ACK first; the backend query takes seconds
      res.status(200).json({ status: "ok" });

      if (envelope.type !== "event_callback") {
        logger.debug(`Ignoring envelope type: ${envelope.envelopeType}`);
        return null;
      }

      const outcome = await dispatcher.dispatch(envelope.event);
      logger.bind({ eventId: envelope.event.eventId, channel: envelope.event.channelId });
      logger.info("Event handled", { outcome: outcome.state, duration: logger.getDuration() });
      return outcome;
    } catch (error) {
      if (error instanceof AuthFailureError) {
        logger.warn("Rejected request", { stage: "rejected" satisfies DispatchState, ...error.context });
      } else if (error instanceof MalformedPayloadError) {
        logger.warn("Malformed payload", { error: error.message, ...error.context });
      } else {
        logger.error("Unexpected error handling Slack event", error);
      }

      if (!res.headersSent) {
        handleRouteError(res, error, "SlackEvents");
      }
      return null;
    }
  };
}
