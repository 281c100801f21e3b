/**
 * Slack Events API payloads
 *
 * Parses the raw request body into one of the envelope shapes the bridge
 * handles and normalizes the inner event into an immutable `InboundEvent`.
 *
 * Layer: Slack (parsing)
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { MalformedPayloadError } from "../utils/errorHandler";

const urlVerificationSchema = z.object({
  type: z.literal("url_verification"),
  challenge: z.string(),
});

const slackEventSchema = z.object({
  type: z.string(),
  subtype: z.string().optional(),
  channel: z.string().optional(),
  text: z.string().optional(),
  ts: z.string().optional(),
  thread_ts: z.string().optional(),
  bot_id: z.string().optional(),
  user: z.string().optional(),
});

const eventCallbackSchema = z.object({
  type: z.literal("event_callback"),
  event_id: z.string().min(1),
  event: slackEventSchema,
});

const envelopeTypeSchema = z.object({ type: z.string() });

export interface InboundEvent {
  readonly type: string;
  readonly eventId: string;
  readonly subtype: string | undefined;
  readonly channelId: string;
  readonly text: string;
  readonly timestamp: string;
  /** Parent message of the thread; undefined for top-level messages */
  readonly threadTimestamp: string | undefined;
  readonly senderIsBot: boolean;
  readonly userId: string | undefined;
}

export type SlackEnvelope =
  | { type: "url_verification"; challenge: string }
  | { type: "event_callback"; event: InboundEvent }
  | { type: "other"; envelopeType: string };

function parseJson(rawBody: string): unknown {
  try {
    return JSON.parse(rawBody);
  } catch (error) {
    throw new MalformedPayloadError("Invalid JSON", {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedPayloadError(`Invalid ${what}: ${fromZodError(result.error).message}`);
  }
  return result.data;
}

/**
 * The challenge, if this body is a `url_verification` handshake; null otherwise.
 * Never throws, so it can run before the signature check.
 */
export function peekChallenge(rawBody: string): string | null {
  try {
    const result = urlVerificationSchema.safeParse(JSON.parse(rawBody));
    return result.success ? result.data.challenge : null;
  } catch {
    return null;
  }
}

/**
 * @throws MalformedPayloadError for invalid JSON or a callback missing its expected fields
 */
export function parseEnvelope(rawBody: string): SlackEnvelope {
  const data = parseJson(rawBody);
  const { type } = parseWith(envelopeTypeSchema, data, "envelope");

  if (type === "url_verification") {
    const { challenge } = parseWith(urlVerificationSchema, data, "url_verification payload");
    return { type: "url_verification", challenge };
  }

  if (type === "event_callback") {
    const callback = parseWith(eventCallbackSchema, data, "event_callback payload");
    const { event } = callback;

    const inbound: InboundEvent = Object.freeze({
      type: event.type,
      eventId: callback.event_id,
      subtype: event.subtype,
      channelId: event.channel ?? "",
      text: event.text ?? "",
      timestamp: event.ts ?? "",
      threadTimestamp: event.thread_ts,
      senderIsBot: Boolean(event.bot_id) || event.subtype === "bot_message",
      userId: event.user,
    });
    return { type: "event_callback", event: inbound };
  }

  return { type: "other", envelopeType: type };
}

/**
 * Thread to reply into: the parent of a thread reply, or the message itself
 * so that the reply starts a new thread.
 */
export function replyThreadOf(event: InboundEvent): string | undefined {
  return event.threadTimestamp || event.timestamp || undefined;
}
