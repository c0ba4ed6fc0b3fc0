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

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class AuthenticationError extends Error implements AppError {
  statusCode = 401;
  isOperational = true;
  constructor(message = "Authentication required") {
    super(message);
    this.name = "AuthenticationError";
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
 * The embedding backend failed or returned vectors we cannot use.
 * Ranking is never skipped in its place.
 */
export class EmbeddingUnavailableError extends ExternalServiceError {
  statusCode = 503;
  code = "EMBEDDING_UNAVAILABLE";
  constructor(message: string) {
    super("Embedding service", message);
    this.name = "EmbeddingUnavailableError";
  }
}

/**
 * The reasoning backend failed, timed out or answered with nothing.
 */
export class ReasoningUnavailableError extends ExternalServiceError {
  statusCode = 503;
  code = "REASONING_UNAVAILABLE";
  constructor(message: string) {
    super("Reasoning service", message);
    this.name = "ReasoningUnavailableError";
  }
}

export class RequestAbortedError extends Error implements AppError {
  statusCode = 499;
  isOperational = true;
  constructor(message = "Request aborted") {
    super(message);
    this.name = "RequestAbortedError";
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  isOperational = true;
  constructor(message = "Rate limit exceeded") {
    super(message);
    this.name = "RateLimitError";
  }
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

function isAppError(error: unknown): error is AppError {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (isAppError(error) && error.statusCode !== undefined) {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

export interface ClassifiedError {
  type: "provider_quota" | "provider_auth" | "provider_timeout" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
}

/**
 * Turn a provider SDK error into an operator-readable failure message.
 * Used by the backends so quota and credential problems are named as such.
 */
export function classifyBackendError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = readErrorCode(err);

  if (errorCode === "insufficient_quota" || errorCode === 429 ||
    errorMessage.includes("exceeded your current quota") ||
    errorMessage.toLowerCase().includes("rate limit")) {
    return {
      type: "provider_quota",
      userMessage: "the AI provider quota or rate limit has been exceeded",
      errorMessage, errorCode,
    };
  }

  if (errorCode === 401 || errorCode === 403 || errorMessage.includes("Incorrect API key") ||
    errorMessage.includes("invalid_api_key") || errorMessage.includes("is not set")) {
    return {
      type: "provider_auth",
      userMessage: "the AI provider credentials are missing or invalid",
      errorMessage, errorCode,
    };
  }

  if (err instanceof Error && (err.name === "AbortError" || /timed? ?out/i.test(errorMessage))) {
    return {
      type: "provider_timeout",
      userMessage: "the AI provider did not respond in time",
      errorMessage, errorCode,
    };
  }

  return {
    type: "internal",
    userMessage: errorMessage,
    errorMessage, errorCode,
  };
}

function readErrorCode(err: unknown): string | number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string" || typeof code === "number") return code;
  const status = "status" in err ? err.status : undefined;
  if (typeof status === "number") return status;
  return undefined;
}
