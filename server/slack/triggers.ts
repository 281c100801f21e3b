/**
 * Trigger Evaluation
 *
 * Decides whether an inbound event should produce an answer. Two modes share
 * the rest of the pipeline and are selected by the event's declared type:
 * - keyword: plain channel messages containing a trigger keyword
 * - mention: `app_mention` events, with the bot's mention tokens stripped
 *
 * Layer: Slack (routing)
 */

import type { TriggerMode, TriggerSettings } from "../config/settings";
import type { InboundEvent } from "./payload";

export type IgnoreReason =
  | "unsupported_event"
  | "mode_disabled"
  | "bot_message"
  | "subtype"
  | "channel_not_allowed"
  | "no_keyword"
  | "handled_by_mention";

export type TriggerDecision =
  | { kind: "respond"; mode: TriggerMode; question: string }
  | { kind: "usage_hint"; mode: "mention" }
  | { kind: "ignore"; reason: IgnoreReason };

const LEADING_MENTION = /^\s*<@[^>]+>/;

/** Matches `<@U123>` and the labelled form `<@U123|name>` for one user id */
function userMentionPattern(userId: string): RegExp {
  const escaped = userId.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`\\s*<@${escaped}(?:\\|[^>]*)?>`, "g");
}

export function mentionsUser(text: string, userId: string): boolean {
  return userMentionPattern(userId).test(text);
}

/**
 * Strips the leading mention token and, when the bot id is known, every
 * other mention of the bot in the text.
 */
export function cleanMention(text: string, botUserId?: string): string {
  const withoutLeading = text.replace(LEADING_MENTION, "");
  const cleaned = botUserId
    ? withoutLeading.replace(userMentionPattern(botUserId), "")
    : withoutLeading;
  return cleaned.trim();
}

function channelAllowed(channel: string, allowed: Set<string>): boolean {
  return allowed.size === 0 || allowed.has(channel);
}

function evaluateKeywordMessage(event: InboundEvent, settings: TriggerSettings): TriggerDecision {
  if (event.senderIsBot) return { kind: "ignore", reason: "bot_message" };
  // Edits, deletions, joins etc. arrive as subtypes; only original messages count
  if (event.subtype) return { kind: "ignore", reason: "subtype" };
  if (!channelAllowed(event.channelId, settings.autoReplyChannels)) {
    return { kind: "ignore", reason: "channel_not_allowed" };
  }
  // Slack sends an app_mention alongside the message event for these
  if (settings.modes.has("mention") && settings.botUserId && mentionsUser(event.text, settings.botUserId)) {
    return { kind: "ignore", reason: "handled_by_mention" };
  }

  const text = event.text.toLowerCase();
  if (!settings.keywords.some((keyword) => text.includes(keyword))) {
    return { kind: "ignore", reason: "no_keyword" };
  }
  return { kind: "respond", mode: "keyword", question: event.text };
}

function evaluateMention(event: InboundEvent, settings: TriggerSettings): TriggerDecision {
  if (event.senderIsBot) return { kind: "ignore", reason: "bot_message" };
  if (!channelAllowed(event.channelId, settings.allowedChannels)) {
    return { kind: "ignore", reason: "channel_not_allowed" };
  }

  const question = cleanMention(event.text, settings.botUserId);
  if (!question) {
    return { kind: "usage_hint", mode: "mention" };
  }
  return { kind: "respond", mode: "mention", question };
}

export function evaluateTrigger(event: InboundEvent, settings: TriggerSettings): TriggerDecision {
  const mode: TriggerMode | null =
    event.type === "message" ? "keyword" :
    event.type === "app_mention" ? "mention" :
    null;

  if (mode === null) return { kind: "ignore", reason: "unsupported_event" };
  if (!settings.modes.has(mode)) return { kind: "ignore", reason: "mode_disabled" };

  return mode === "keyword"
    ? evaluateKeywordMessage(event, settings)
    : evaluateMention(event, settings);
}

export function shouldRespond(event: InboundEvent, settings: TriggerSettings): boolean {
  return evaluateTrigger(event, settings).kind === "respond";
}
