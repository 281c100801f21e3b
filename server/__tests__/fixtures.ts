import { vi } from "vitest";
import type { TriggerSettings } from "../config/settings";
import type { InboundEvent } from "../slack/payload";
import type { PostMessageParams, SlackMessenger } from "../slack/slackApi";

export function makeEvent(overrides: Partial<InboundEvent> = {}): InboundEvent {
  return {
    type: "message",
    eventId: "Ev001",
    subtype: undefined,
    channelId: "C1",
    text: "need a Proposal draft",
    timestamp: "1700000000.000100",
    threadTimestamp: undefined,
    senderIsBot: false,
    userId: "U42",
    ...overrides,
  };
}

export function makeTriggerSettings(overrides: Partial<TriggerSettings> = {}): TriggerSettings {
  return {
    keywords: ["proposal"],
    autoReplyChannels: new Set(["C1"]),
    allowedChannels: new Set(["C1"]),
    modes: new Set(["keyword", "mention"]),
    botUserId: "UBOT",
    ...overrides,
  };
}

export function makeMessenger() {
  let counter = 0;
  const postMessage = vi.fn(async (_params: PostMessageParams) => {
    counter += 1;
    return { ts: `1700000001.00000${counter}` };
  });
  const deleteMessage = vi.fn(async (_channel: string, _ts: string) => {});
  const messenger: SlackMessenger = { postMessage, deleteMessage };
  return { messenger, postMessage, deleteMessage };
}
