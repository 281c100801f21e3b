import { describe, it, expect } from "vitest";
import { parseEnvelope, peekChallenge, replyThreadOf } from "../slack/payload";
import { MalformedPayloadError } from "../utils/errorHandler";
import { makeEvent } from "./fixtures";

function callback(event: Record<string, unknown>, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ type: "event_callback", event_id: "Ev123", event, ...extra });
}

describe("parseEnvelope", () => {
  it("parses a url_verification handshake", () => {
    expect(parseEnvelope('{"type":"url_verification","challenge":"abc123"}')).toEqual({
      type: "url_verification",
      challenge: "abc123",
    });
  });

  it("normalizes an event callback into an InboundEvent", () => {
    const envelope = parseEnvelope(callback({
      type: "message",
      channel: "C1",
      text: "proposal?",
      ts: "1700000000.000100",
      thread_ts: "1699999999.000001",
      user: "U42",
    }));

    expect(envelope).toEqual({
      type: "event_callback",
      event: {
        type: "message",
        eventId: "Ev123",
        subtype: undefined,
        channelId: "C1",
        text: "proposal?",
        timestamp: "1700000000.000100",
        threadTimestamp: "1699999999.000001",
        senderIsBot: false,
        userId: "U42",
      },
    });
  });

  it("freezes the parsed event", () => {
    const envelope = parseEnvelope(callback({ type: "message", channel: "C1" }));
    if (envelope.type !== "event_callback") throw new Error("expected event_callback");
    expect(Object.isFrozen(envelope.event)).toBe(true);
  });

  it("marks bot authors by bot_id or the bot_message subtype", () => {
    const byId = parseEnvelope(callback({ type: "message", bot_id: "B1" }));
    const bySubtype = parseEnvelope(callback({ type: "message", subtype: "bot_message" }));

    expect(byId.type === "event_callback" && byId.event.senderIsBot).toBe(true);
    expect(bySubtype.type === "event_callback" && bySubtype.event.senderIsBot).toBe(true);
  });

  it("passes other envelope types through", () => {
    expect(parseEnvelope('{"type":"app_rate_limited"}')).toEqual({ type: "other", envelopeType: "app_rate_limited" });
  });

  it("throws MalformedPayloadError on invalid JSON", () => {
    expect(() => parseEnvelope("{not json")).toThrow(MalformedPayloadError);
    expect(() => parseEnvelope("{not json")).toThrow("Invalid JSON");
  });

  it("throws MalformedPayloadError on a callback without event_id", () => {
    const body = JSON.stringify({ type: "event_callback", event: { type: "message" } });
    expect(() => parseEnvelope(body)).toThrow(MalformedPayloadError);
  });

  it("throws MalformedPayloadError on a callback without an event", () => {
    const body = JSON.stringify({ type: "event_callback", event_id: "Ev1" });
    expect(() => parseEnvelope(body)).toThrow(MalformedPayloadError);
  });

  it("throws MalformedPayloadError when the envelope has no type", () => {
    expect(() => parseEnvelope('{"challenge":"x"}')).toThrow(MalformedPayloadError);
  });
});

describe("peekChallenge", () => {
  it("returns the challenge of a handshake", () => {
    expect(peekChallenge('{"type":"url_verification","challenge":"abc123"}')).toBe("abc123");
  });

  it("returns null for anything else, including broken JSON", () => {
    expect(peekChallenge(callback({ type: "message" }))).toBeNull();
    expect(peekChallenge("{not json")).toBeNull();
  });
});

describe("replyThreadOf", () => {
  it("replies into the parent thread of a thread reply", () => {
    expect(replyThreadOf(makeEvent({ timestamp: "2.0", threadTimestamp: "1.0" }))).toBe("1.0");
  });

  it("starts a thread on a top-level message", () => {
    expect(replyThreadOf(makeEvent({ timestamp: "2.0", threadTimestamp: undefined }))).toBe("2.0");
  });
});
