import { describe, it, expect, vi } from "vitest";
import { createSlackMessenger, getBotUserId, getSlackErrorCode, type SlackAuthClient, type SlackChatClient } from "../slack/slackApi";
import { MessagingFailureError } from "../utils/errorHandler";

function makeClient() {
  const postMessage = vi.fn<SlackChatClient["chat"]["postMessage"]>()
    .mockResolvedValue({ ok: true, ts: "1700000002.000100" });
  const del = vi.fn<SlackChatClient["chat"]["delete"]>().mockResolvedValue({ ok: true });
  const client: SlackChatClient = { chat: { postMessage, delete: del } };
  return { client, postMessage, del };
}

function platformError(code: string): Error {
  return Object.assign(new Error(`An API error occurred: ${code}`), { data: { ok: false, error: code } });
}

describe("getSlackErrorCode", () => {
  it("reads the platform error code", () => {
    expect(getSlackErrorCode(platformError("ratelimited"))).toBe("ratelimited");
  });

  it("returns undefined for errors without Slack data", () => {
    expect(getSlackErrorCode(new Error("socket hang up"))).toBeUndefined();
    expect(getSlackErrorCode({ data: { error: 42 } })).toBeUndefined();
    expect(getSlackErrorCode(null)).toBeUndefined();
  });
});

describe("createSlackMessenger", () => {
  it("posts into the thread with Slack-flavoured markdown", async () => {
    const { client, postMessage } = makeClient();
    const messenger = createSlackMessenger(client);

    const result = await messenger.postMessage({ channel: "C1", text: "**Bold** answer", threadTs: "T1" });

    expect(result).toEqual({ ts: "1700000002.000100" });
    expect(postMessage).toHaveBeenCalledWith({
      channel: "C1",
      text: "*Bold* answer",
      thread_ts: "T1",
      blocks: undefined,
    });
  });

  it("fails when Slack returns no timestamp", async () => {
    const { client, postMessage } = makeClient();
    postMessage.mockResolvedValueOnce({ ok: true });
    const messenger = createSlackMessenger(client);

    await expect(messenger.postMessage({ channel: "C1", text: "hi" })).rejects.toThrow(
      "Slack error: chat.postMessage failed: response carried no message timestamp",
    );
  });

  it("wraps platform errors with their code", async () => {
    const { client, postMessage } = makeClient();
    postMessage.mockRejectedValueOnce(platformError("not_in_channel"));
    const messenger = createSlackMessenger(client);

    const error = await messenger.postMessage({ channel: "C9", text: "hi" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MessagingFailureError);
    if (error instanceof MessagingFailureError) {
      expect(error.slackError).toBe("not_in_channel");
      expect(error.message).toBe("Slack error: chat.postMessage failed: not_in_channel");
      expect(error.context).toEqual({ channel: "C9", operation: "chat.postMessage", slackError: "not_in_channel" });
    }
  });

  it("deletes a message and wraps delete failures", async () => {
    const { client, del } = makeClient();
    const messenger = createSlackMessenger(client);

    await messenger.deleteMessage("C1", "1700000002.000100");
    expect(del).toHaveBeenCalledWith({ channel: "C1", ts: "1700000002.000100" });

    del.mockRejectedValueOnce(new Error("socket hang up"));
    await expect(messenger.deleteMessage("C1", "X")).rejects.toThrow("Slack error: chat.delete failed: socket hang up");
  });
});

describe("getBotUserId", () => {
  it("returns the user id from auth.test", async () => {
    const test = vi.fn<SlackAuthClient["auth"]["test"]>().mockResolvedValue({ ok: true, user_id: "UBOT" });

    await expect(getBotUserId({ auth: { test } })).resolves.toBe("UBOT");
  });

  it("fails when auth.test returns no user id", async () => {
    const test = vi.fn<SlackAuthClient["auth"]["test"]>().mockResolvedValue({ ok: true });

    await expect(getBotUserId({ auth: { test } })).rejects.toThrow(
      "Slack error: auth.test failed: response carried no user id",
    );
  });

  it("wraps platform errors with their code", async () => {
    const test = vi.fn<SlackAuthClient["auth"]["test"]>().mockRejectedValue(platformError("invalid_auth"));

    const error = await getBotUserId({ auth: { test } }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MessagingFailureError);
    if (error instanceof MessagingFailureError) {
      expect(error.slackError).toBe("invalid_auth");
    }
  });
});
