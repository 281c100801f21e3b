/**
 * Document Query Service
 *
 * Asks the Gemini File Search store a question and returns the answer with
 * the titles of the documents it was grounded on. `query()` never rejects:
 * backend failures come back as a result carrying a user-facing message.
 *
 * Fallback: when the grounded call fails and fallback is enabled, the same
 * question is retried once without the store, with a prompt that makes the
 * model say when it has no real grounding.
 */

import type { GenerateContentFn, GroundedResponse } from "../llm/client";
import { buildUngroundedFallbackPrompt } from "../config/prompts";
import { MODEL_ASSIGNMENTS } from "../config/models";
import { REPLY_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import { BackendFailureError, classifyPipelineError } from "../utils/errorHandler";
import { logError, logInfo, logWarn } from "../utils/slackLogger";

export interface QueryResult {
  answerText: string;
  /** Document titles, de-duplicated, in the order the backend cited them */
  sources: string[];
  grounded: boolean;
  failure?: BackendFailureError;
}

export interface DocumentQueryService {
  query(question: string): Promise<QueryResult>;
}

export interface DocumentQueryOptions {
  generateContent: GenerateContentFn;
  fileSearchStoreName: string;
  model?: string;
  fallbackModel?: string;
  fallbackEnabled?: boolean;
  timeoutMs?: number;
}

export function extractSources(response: GroundedResponse): string[] {
  const chunks = response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? [];
  const titles = new Set<string>();

  for (const chunk of chunks) {
    if (!chunk.retrievedContext) continue;
    titles.add(chunk.retrievedContext.title || REPLY_CONSTANTS.UNKNOWN_SOURCE_TITLE);
  }

  return Array.from(titles);
}

function extractAnswer(response: GroundedResponse): string {
  const text = response.text?.trim();
  return text ? text : REPLY_CONSTANTS.NO_ANSWER_TEXT;
}

export function toFailureResult(error: unknown, question: string): QueryResult {
  const failure = new BackendFailureError(classifyPipelineError(error), {
    questionLength: question.length,
  });

  return {
    answerText: `:warning: ${failure.userMessage}`,
    sources: [],
    grounded: false,
    failure,
  };
}

export function createDocumentQueryService(options: DocumentQueryOptions): DocumentQueryService {
  const {
    generateContent,
    fileSearchStoreName,
    model = MODEL_ASSIGNMENTS.GROUNDED_ANSWER,
    fallbackModel = MODEL_ASSIGNMENTS.UNGROUNDED_FALLBACK,
    fallbackEnabled = true,
    timeoutMs = TIMEOUT_CONSTANTS.BACKEND_QUERY_TIMEOUT_MS,
  } = options;

  async function queryGrounded(question: string): Promise<QueryResult> {
    const response = await generateContent({
      model,
      contents: question,
      config: {
        tools: [{ fileSearch: { fileSearchStoreNames: [fileSearchStoreName] } }],
        abortSignal: AbortSignal.timeout(timeoutMs),
      },
    });

    return {
      answerText: extractAnswer(response),
      sources: extractSources(response),
      grounded: true,
    };
  }

  async function queryUngrounded(question: string): Promise<QueryResult> {
    const response = await generateContent({
      model: fallbackModel,
      contents: buildUngroundedFallbackPrompt(question),
      config: {
        abortSignal: AbortSignal.timeout(timeoutMs),
      },
    });

    // No store was searched, so nothing can be cited
    return {
      answerText: extractAnswer(response),
      sources: [],
      grounded: false,
    };
  }

  return {
    async query(question: string): Promise<QueryResult> {
      const start = Date.now();
      try {
        const result = await queryGrounded(question);
        logInfo("[DocumentQuery] Grounded answer received", {
          sources: result.sources.length,
          duration: Date.now() - start,
        });
        return result;
      } catch (groundedError) {
        if (!fallbackEnabled) {
          logError("[DocumentQuery] Grounded query failed", { error: String(groundedError) });
          return toFailureResult(groundedError, question);
        }
        logWarn("[DocumentQuery] Grounded query failed, retrying without the store", {
          error: String(groundedError),
        });
      }

      try {
        const result = await queryUngrounded(question);
        logInfo("[DocumentQuery] Ungrounded fallback answer received", { duration: Date.now() - start });
        return result;
      } catch (fallbackError) {
        logError("[DocumentQuery] Fallback query failed", { error: String(fallbackError) });
        return toFailureResult(fallbackError, question);
      }
    },
  };
}
