/**
 * Bridge Settings
 *
 * Loads and validates the environment once at startup. Everything the
 * pipeline reads from configuration comes through `BridgeSettings`.
 */

import { z } from "zod";
import { MODEL_ASSIGNMENTS } from "./models";
import { TIMEOUT_CONSTANTS } from "./constants";

export const TRIGGER_MODES = ["keyword", "mention"] as const;
export type TriggerMode = typeof TRIGGER_MODES[number];

const commaList = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? fallback)
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

const required = (name: string) => z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

const envSchema = z.object({
  SLACK_BOT_TOKEN: required("SLACK_BOT_TOKEN"),
  SLACK_SIGNING_SECRET: required("SLACK_SIGNING_SECRET"),
  GEMINI_API_KEY: required("GEMINI_API_KEY"),
  FILE_SEARCH_STORE_NAME: required("FILE_SEARCH_STORE_NAME"),
  GEMINI_MODEL: z.string().min(1).default(MODEL_ASSIGNMENTS.GROUNDED_ANSWER),
  BOT_TRIGGER_KEYWORDS: commaList("제안서,proposal"),
  AUTO_REPLY_CHANNELS: commaList(""),
  ALLOWED_CHANNELS: commaList(""),
  BOT_TRIGGER_MODES: commaList(TRIGGER_MODES.join(",")).pipe(z.array(z.enum(TRIGGER_MODES))),
  QUERY_FALLBACK_ENABLED: flag(true),
  SLACK_CHALLENGE_BEFORE_VERIFY: flag(false),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUT_CONSTANTS.BACKEND_QUERY_TIMEOUT_MS),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
});

export interface TriggerSettings {
  /** Lower-cased keywords; a message triggers when its text contains any of them */
  keywords: string[];
  /** Channels for keyword listening; empty means every channel */
  autoReplyChannels: Set<string>;
  /** Channels for mentions; empty means every channel */
  allowedChannels: Set<string>;
  modes: Set<TriggerMode>;
  /** The bot's own Slack user id, resolved with `auth.test` at startup */
  botUserId?: string;
}

export interface BridgeSettings {
  slack: {
    botToken: string;
    signingSecret: string;
    challengeBeforeVerify: boolean;
  };
  gemini: {
    apiKey: string;
    model: string;
    fileSearchStoreName: string;
    fallbackEnabled: boolean;
    timeoutMs: number;
  };
  triggers: TriggerSettings;
  server: {
    port: number;
    host: string;
  };
}

/**
 * @throws ZodError when a required variable is missing or a value doesn't parse
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): BridgeSettings {
  const parsed = envSchema.parse(env);

  return {
    slack: {
      botToken: parsed.SLACK_BOT_TOKEN,
      signingSecret: parsed.SLACK_SIGNING_SECRET,
      challengeBeforeVerify: parsed.SLACK_CHALLENGE_BEFORE_VERIFY,
    },
    gemini: {
      apiKey: parsed.GEMINI_API_KEY,
      model: parsed.GEMINI_MODEL,
      fileSearchStoreName: parsed.FILE_SEARCH_STORE_NAME,
      fallbackEnabled: parsed.QUERY_FALLBACK_ENABLED,
      timeoutMs: parsed.BACKEND_TIMEOUT_MS,
    },
    triggers: {
      keywords: parsed.BOT_TRIGGER_KEYWORDS.map((keyword) => keyword.toLowerCase()),
      autoReplyChannels: new Set(parsed.AUTO_REPLY_CHANNELS),
      allowedChannels: new Set(parsed.ALLOWED_CHANNELS),
      modes: new Set(parsed.BOT_TRIGGER_MODES),
    },
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
    },
  };
}
