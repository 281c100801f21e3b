/**
 * Event Dispatcher
 *
 * Runs one Slack event through the pipeline after its signature has been
 * verified:
 *
 *   deduplicated → trigger_checked → processing → replied
 *
 * with `ignored` and `failed` as the other terminal states. Processing posts
 * an interim placeholder in the thread, queries the document store, sends the
 * formatted answer and then removes the placeholder. A failure anywhere in
 * that sequence ends in a best-effort error reply in the same thread; only
 * Slack calls are reported as messaging failures. `dispatch()` never throws;
 * each call owns its own state.
 *
 * Layer: Slack (event handling)
 */

import type { TriggerSettings } from "../config/settings";
import type { EventDeduplicator } from "../services/eventDeduplicator";
import type { DocumentQueryService } from "../services/documentQueryService";
import { MessagingFailureError, getErrorMessage } from "../utils/errorHandler";
import { RequestLogger } from "../utils/slackLogger";
import { getPlaceholderMessage, getUsageHint } from "./acknowledgments";
import { replyThreadOf, type InboundEvent } from "./payload";
import { formatReply } from "./replyFormatter";
import type { SlackMessenger } from "./slackApi";
import { evaluateTrigger, type IgnoreReason } from "./triggers";

export type DispatchState =
  | "received"
  | "verified"
  | "deduplicated"
  | "trigger_checked"
  | "processing"
  | "replied"
  | "rejected"
  | "ignored"
  | "failed";

export type DispatchOutcome =
  | { state: "ignored"; reason: IgnoreReason | "duplicate" | "usage_hint" }
  | { state: "replied"; sources: number; grounded: boolean; placeholderDeleted: boolean }
  | { state: "failed"; error: Error };

export interface EventDispatcherDeps {
  deduplicator: EventDeduplicator;
  triggers: TriggerSettings;
  queryService: DocumentQueryService;
  messenger: SlackMessenger;
}

export const ERROR_REPLY_PREFIX = ":x: Something went wrong while answering";

async function viaSlack<T>(operation: string, channel: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof MessagingFailureError) throw error;
    throw new MessagingFailureError(operation, getErrorMessage(error), undefined, { channel });
  }
}

export class EventDispatcher {
  constructor(private readonly deps: EventDispatcherDeps) {}

  async dispatch(event: InboundEvent): Promise<DispatchOutcome> {
    const threadTs = replyThreadOf(event);
    const logger = new RequestLogger({
      eventId: event.eventId,
      channel: event.channelId,
      threadTs,
      userId: event.userId,
    });
    logger.debug("Dispatch state", { stage: "verified" satisfies DispatchState });

    if (this.deps.deduplicator.seen(event.eventId)) {
      logger.info("Duplicate event - skipping");
      return { state: "ignored", reason: "duplicate" };
    }
    logger.debug("Dispatch state", { stage: "deduplicated" satisfies DispatchState });

    const decision = evaluateTrigger(event, this.deps.triggers);
    logger.debug("Dispatch state", { stage: "trigger_checked" satisfies DispatchState, decision: decision.kind });

    if (decision.kind === "ignore") {
      logger.debug(`Not triggered: ${decision.reason}`, { eventType: event.type });
      return { state: "ignored", reason: decision.reason };
    }

    if (decision.kind === "usage_hint") {
      try {
        await this.deps.messenger.postMessage({
          channel: event.channelId,
          threadTs,
          text: getUsageHint(),
        });
      } catch (error) {
        logger.error("Failed to send usage hint", error);
      }
      return { state: "ignored", reason: "usage_hint" };
    }

    logger.info("Processing question", {
      stage: "processing" satisfies DispatchState,
      mode: decision.mode,
      text: decision.question.substring(0, 100),
    });
    return this.process(event, decision.question, threadTs, logger);
  }

  private async process(
    event: InboundEvent,
    question: string,
    threadTs: string | undefined,
    logger: RequestLogger,
  ): Promise<DispatchOutcome> {
    const { messenger, queryService } = this.deps;
    const channel = event.channelId;

    try {
      const placeholderText = getPlaceholderMessage();
      const placeholder = await viaSlack("chat.postMessage", channel, () =>
        messenger.postMessage({ channel, threadTs, text: placeholderText }),
      );

      logger.startStage("query");
      const result = await queryService.query(question);
      const queryMs = logger.endStage("query");
      if (result.failure) {
        logger.error("Backend query failed", result.failure, {
          failureType: result.failure.failureType,
          queryMs,
        });
      }

      const reply = formatReply(result.answerText, result.sources, question);
      await viaSlack("chat.postMessage", channel, () =>
        messenger.postMessage({ channel, threadTs, ...reply }),
      );

      // The answer is already out; a leftover placeholder is only cosmetic
      let placeholderDeleted = true;
      try {
        await messenger.deleteMessage(channel, placeholder.ts);
      } catch (error) {
        placeholderDeleted = false;
        logger.warn("Failed to delete placeholder", { error: getErrorMessage(error) });
      }

      logger.info("Reply sent", {
        stage: "replied" satisfies DispatchState,
        sources: result.sources.length,
        grounded: result.grounded,
        queryMs,
      });
      return {
        state: "replied",
        sources: result.sources.length,
        grounded: result.grounded,
        placeholderDeleted,
      };
    } catch (error) {
      if (error instanceof MessagingFailureError) {
        logger.error("Slack API error", error, {
          stage: "failed" satisfies DispatchState,
          slackError: error.slackError,
        });
        await this.sendErrorReply(channel, threadTs, error.slackError ?? error.message, logger);
        return { state: "failed", error };
      }

      logger.error("Unexpected error while answering", error, { stage: "failed" satisfies DispatchState });
      await this.sendErrorReply(channel, threadTs, getErrorMessage(error), logger);
      return { state: "failed", error: error instanceof Error ? error : new Error(getErrorMessage(error)) };
    }
  }

  private async sendErrorReply(
    channel: string,
    threadTs: string | undefined,
    detail: string,
    logger: RequestLogger,
  ): Promise<void> {
    try {
      await this.deps.messenger.postMessage({
        channel,
        threadTs,
        text: `${ERROR_REPLY_PREFIX}: ${detail}`,
      });
    } catch (error) {
      logger.error("Failed to send error reply", error);
    }
  }
}
