/**
 * Reply Formatting
 *
 * Renders an answer and its citations as Block Kit sections:
 * question, divider, answer, and (when there are any) up to five sources.
 *
 * Layer: Slack (presentation)
 */

import type { KnownBlock } from "@slack/web-api";
import { REPLY_CONSTANTS } from "../config/constants";
import { formatMarkdown } from "../utils/markdownFormatter";

export interface OutboundMessage {
  /** Plain-text fallback shown in notifications */
  text: string;
  blocks: KnownBlock[];
}

/** Slack treats `&`, `<` and `>` as control characters in mrkdwn */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatSources(sources: string[]): string {
  return sources
    .slice(0, REPLY_CONSTANTS.MAX_SOURCES)
    .map((source) => `• ${escapeMrkdwn(source)}`)
    .join("\n");
}

export function formatReply(answer: string, sources: string[], originalQuestion: string): OutboundMessage {
  const blocks: KnownBlock[] = [
    {
      type: "section",
      text: { type: "mrkdwn", text: `*Question:* ${originalQuestion}` },
    },
    { type: "divider" },
    {
      type: "section",
      text: { type: "mrkdwn", text: `*Answer:*\n${formatMarkdown(answer, "slack")}` },
    },
  ];

  if (sources.length > 0) {
    blocks.push({
      type: "section",
      text: { type: "mrkdwn", text: `*Sources:*\n${formatSources(sources)}` },
    });
  }

  return {
    text: formatMarkdown(answer, "plaintext"),
    blocks,
  };
}
