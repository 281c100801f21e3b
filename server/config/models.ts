/**
 * Centralized LLM Model Registry
 * 
 * Single source of truth for the Gemini models the bridge calls.
 * Changing a model here updates every usage.
 */

export const GEMINI_MODELS = {
  /**
   * Fast Gemini model with File Search grounding support.
   */
  FLASH: "gemini-2.5-flash",
} as const;

/**
 * Specific model assignments by task type.
 */
export const MODEL_ASSIGNMENTS = {
  // Answer grounded in the configured File Search store
  GROUNDED_ANSWER: GEMINI_MODELS.FLASH,

  // Retry without the store when the grounded call fails
  UNGROUNDED_FALLBACK: GEMINI_MODELS.FLASH,
} as const;
