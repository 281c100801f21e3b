/**
 * Slack integration layer.
 *
 * Responsibilities:
 * - Post messages into a channel or thread
 * - Delete the bridge's own interim messages
 * - Look up the bot's own user id
 *
 * Every Slack failure surfaces as a MessagingFailureError carrying the
 * platform error code (`not_in_channel`, `ratelimited`, ...).
 *
 * Layer: Integration (I/O only)
 */

import type { KnownBlock, WebClient } from "@slack/web-api";
import { formatMarkdown } from "../utils/markdownFormatter";
import { getErrorMessage, MessagingFailureError } from "../utils/errorHandler";

export type PostMessageParams = {
  channel: string;
  text: string;
  threadTs?: string;
  blocks?: KnownBlock[];
};

export type PostMessageResponse = {
  ts: string; // Message timestamp (unique ID)
};

export interface SlackMessenger {
  postMessage(params: PostMessageParams): Promise<PostMessageResponse>;
  deleteMessage(channel: string, ts: string): Promise<void>;
}

/** The part of the Web API client the messenger calls */
export type SlackChatClient = {
  chat: Pick<WebClient["chat"], "postMessage" | "delete">;
};

export type SlackAuthClient = {
  auth: Pick<WebClient["auth"], "test">;
};

export function getSlackErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("data" in error)) return undefined;
  const data = error.data;
  if (typeof data !== "object" || data === null || !("error" in data)) return undefined;
  return typeof data.error === "string" ? data.error : undefined;
}

function toMessagingFailure(operation: string, error: unknown, channel: string): MessagingFailureError {
  if (error instanceof MessagingFailureError) return error;
  const slackError = getSlackErrorCode(error);
  return new MessagingFailureError(operation, slackError ?? getErrorMessage(error), slackError, { channel });
}

export function createSlackMessenger(client: SlackChatClient): SlackMessenger {
  return {
    async postMessage({ channel, text, threadTs, blocks }) {
      try {
        const result = await client.chat.postMessage({
          channel,
          text: formatMarkdown(text, "slack"),
          thread_ts: threadTs,
          blocks,
        });

        if (!result.ts) {
          throw new MessagingFailureError("chat.postMessage", "response carried no message timestamp", undefined, { channel });
        }
        return { ts: result.ts };
      } catch (error) {
        throw toMessagingFailure("chat.postMessage", error, channel);
      }
    },

    async deleteMessage(channel, ts) {
      try {
        await client.chat.delete({ channel, ts });
      } catch (error) {
        throw toMessagingFailure("chat.delete", error, channel);
      }
    },
  };
}

/**
 * The bot's user id, used to tell mentions of the bot from mentions of people.
 */
export async function getBotUserId(client: SlackAuthClient): Promise<string> {
  try {
    const result = await client.auth.test();
    if (!result.user_id) {
      throw new MessagingFailureError("auth.test", "response carried no user id");
    }
    return result.user_id;
  } catch (error) {
    if (error instanceof MessagingFailureError) throw error;
    const slackError = getSlackErrorCode(error);
    throw new MessagingFailureError("auth.test", slackError ?? getErrorMessage(error), slackError);
  }
}
