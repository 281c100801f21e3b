/**
 * Application Constants
 * 
 * Centralized configuration values used across the bridge.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

/**
 * Slack request signing
 */
export const SIGNATURE_CONSTANTS = {
  /**
   * Max age (seconds) of a Slack request timestamp before it's rejected as a replay attack.
   */
  TOLERANCE_SECONDS: 300, // 5 minutes

  /**
   * Version prefix of the signing base string and of the signature header.
   */
  VERSION: "v0",
} as const;

/**
 * In-memory event de-duplication
 */
export const DEDUPE_CONSTANTS = {
  /**
   * How long a processed event id is remembered (milliseconds).
   */
  TTL_MS: 60 * 60 * 1000, // 1 hour

  /**
   * Oldest ids are dropped once the registry grows past this size.
   */
  MAX_ENTRIES: 10000,
} as const;

/**
 * Reply rendering
 */
export const REPLY_CONSTANTS = {
  MAX_SOURCES: 5,
  UNKNOWN_SOURCE_TITLE: "Unknown",
  NO_ANSWER_TEXT: "I couldn't find an answer to that in the documents.",
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Default budget for one backend question-answering call (milliseconds).
   */
  BACKEND_QUERY_TIMEOUT_MS: 60000, // 1 minute
} as const;
