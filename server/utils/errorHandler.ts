import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AuthorizationError extends Error implements AppError {
  statusCode = 403;
  isOperational = true;
  constructor(message = "Access denied") {
    super(message);
    this.name = "AuthorizationError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

/**
 * Failure kinds of the event pipeline. Duplicate and not-triggered events are
 * outcomes, not errors, and have no kind here.
 */
export type PipelineErrorKind =
  | "auth_failure"
  | "backend_failure"
  | "messaging_failure"
  | "malformed_payload";

export type PipelineErrorContext = Record<string, string | number | boolean | undefined>;

export interface PipelineError extends AppError {
  kind: PipelineErrorKind;
  context: PipelineErrorContext;
}

export class AuthFailureError extends AuthorizationError implements PipelineError {
  kind = "auth_failure" as const;
  context: PipelineErrorContext;
  constructor(message = "Invalid Slack signature", context: PipelineErrorContext = {}) {
    super(message);
    this.name = "AuthFailureError";
    this.context = context;
  }
}

export class MalformedPayloadError extends ValidationError implements PipelineError {
  kind = "malformed_payload" as const;
  context: PipelineErrorContext;
  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message);
    this.name = "MalformedPayloadError";
    this.context = context;
  }
}

export type BackendFailureType = "quota" | "auth" | "timeout" | "internal";

export class BackendFailureError extends ExternalServiceError implements PipelineError {
  kind = "backend_failure" as const;
  context: PipelineErrorContext;
  failureType: BackendFailureType;
  userMessage: string;
  constructor(classified: ClassifiedError, context: PipelineErrorContext = {}) {
    super("Gemini", classified.errorMessage);
    this.name = "BackendFailureError";
    this.failureType = classified.type;
    this.userMessage = classified.userMessage;
    this.context = { ...context, errorCode: classified.errorCode };
  }
}

export class MessagingFailureError extends ExternalServiceError implements PipelineError {
  kind = "messaging_failure" as const;
  context: PipelineErrorContext;
  /** Slack platform error code, e.g. `not_in_channel` or `ratelimited` */
  slackError: string | undefined;
  constructor(operation: string, message: string, slackError?: string, context: PipelineErrorContext = {}) {
    super("Slack", `${operation} failed: ${message}`);
    this.name = "MessagingFailureError";
    this.slackError = slackError;
    this.context = { ...context, operation, slackError };
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return (
    error instanceof AuthFailureError ||
    error instanceof MalformedPayloadError ||
    error instanceof BackendFailureError ||
    error instanceof MessagingFailureError
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(res: Response, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export interface ClassifiedError {
  type: BackendFailureType;
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

function getErrorCode(err: unknown): string | number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("code" in err && (typeof err.code === "string" || typeof err.code === "number")) return err.code;
  return undefined;
}

/**
 * Map a backend failure to a user-facing message. The Gemini SDK reports
 * HTTP failures with a numeric `status`; aborts surface as AbortError/TimeoutError.
 */
export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = getErrorCode(err);
  const stack = err instanceof Error ? err.stack : undefined;

  if (errorCode === 429 || errorMessage.includes("RESOURCE_EXHAUSTED") ||
    errorMessage.toLowerCase().includes("quota")) {
    return {
      type: "quota",
      userMessage: "I can't search the documents right now: the AI service quota has been exceeded. Please try again later or contact an admin.",
      errorMessage, errorCode, stack,
    };
  }

  if (errorCode === 401 || errorCode === 403 || errorMessage.includes("API key not valid") ||
    errorMessage.includes("PERMISSION_DENIED")) {
    return {
      type: "auth",
      userMessage: "I can't search the documents right now: there's an issue with the AI service configuration. Please contact an admin.",
      errorMessage, errorCode, stack,
    };
  }

  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
    return {
      type: "timeout",
      userMessage: "The document search took too long to answer. Please try again.",
      errorMessage, errorCode, stack,
    };
  }

  return {
    type: "internal",
    userMessage: `Sorry, an error occurred while searching the documents: ${errorMessage}`,
    errorMessage, errorCode, stack,
  };
}
