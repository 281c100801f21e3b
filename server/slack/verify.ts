/**
 * Slack Signature Verification
 *
 * Purpose:
 * Verifies that incoming webhooks are genuinely from Slack using HMAC-SHA256
 * signature validation. Prevents replay attacks with timestamp checking.
 *
 * Security: Required for all Slack webhook endpoints.
 *
 * Layer: Slack (security)
 */

import crypto from "crypto";
import type { IncomingHttpHeaders } from "http";
import { SIGNATURE_CONSTANTS } from "../config/constants";

export const SLACK_TIMESTAMP_HEADER = "x-slack-request-timestamp";
export const SLACK_SIGNATURE_HEADER = "x-slack-signature";

/**
 * Compute the `v0=` signature Slack would send for this timestamp and body.
 */
export function computeSlackSignature(
  signingSecret: string,
  timestamp: string,
  rawBody: string | Buffer,
): string {
  const hmac = crypto
    .createHmac("sha256", signingSecret)
    .update(`${SIGNATURE_CONSTANTS.VERSION}:${timestamp}:`)
    .update(rawBody)
    .digest("hex");

  return `${SIGNATURE_CONSTANTS.VERSION}=${hmac}`;
}

/**
 * @param rawBody - the request body exactly as received, before any JSON parsing
 * @param nowSeconds - wall-clock override for tests
 */
export function verifySlackSignature(
  headers: IncomingHttpHeaders,
  rawBody: string | Buffer,
  signingSecret: string,
  nowSeconds: number = Date.now() / 1000,
): boolean {
  const timestamp = headers[SLACK_TIMESTAMP_HEADER];
  const signature = headers[SLACK_SIGNATURE_HEADER];

  if (typeof timestamp !== "string" || typeof signature !== "string") {
    return false;
  }

  // Prevent replay attacks (5 minutes)
  const ts = Number(timestamp);
  if (timestamp.trim() === "" || !Number.isFinite(ts) ||
    Math.abs(nowSeconds - ts) > SIGNATURE_CONSTANTS.TOLERANCE_SECONDS) {
    return false;
  }

  const expected = Buffer.from(computeSlackSignature(signingSecret, timestamp, rawBody));
  const supplied = Buffer.from(signature);

  // timingSafeEqual throws on unequal lengths
  if (expected.length !== supplied.length) {
    return false;
  }

  return crypto.timingSafeEqual(expected, supplied);
}
