import { describe, it, expect, vi } from "vitest";
import type { Response } from "express";
import { z } from "zod";
import {
  ValidationError,
  NotFoundError,
  AuthenticationError,
  ExternalServiceError,
  EmbeddingUnavailableError,
  ReasoningUnavailableError,
  RequestAbortedError,
  RateLimitError,
  classifyBackendError,
  getErrorMessage,
  getErrorStatusCode,
  handleRouteError,
} from "../utils/errorHandler";

function createMockRes(): Partial<Response> {
  return {
    status: vi.fn().mockReturnThis(),
    json: vi.fn(),
  };
}

describe("Error Classes", () => {
  it("ValidationError has 400 status code", () => {
    const error = new ValidationError("question is required");
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe("question is required");
    expect(error.name).toBe("ValidationError");
    expect(error.isOperational).toBe(true);
  });

  it("NotFoundError has 404 status code", () => {
    const error = new NotFoundError("Route");
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe("Route not found");
  });

  it("AuthenticationError has 401 status code", () => {
    const error = new AuthenticationError();
    expect(error.statusCode).toBe(401);
    expect(error.message).toBe("Authentication required");
  });

  it("ExternalServiceError has 502 status code", () => {
    const error = new ExternalServiceError("Messages API", "timed out");
    expect(error.statusCode).toBe(502);
    expect(error.message).toBe("Messages API error: timed out");
    expect(error.service).toBe("Messages API");
  });

  it("backend unavailability is a 503 with a stable code", () => {
    const embedding = new EmbeddingUnavailableError("quota exceeded");
    const reasoning = new ReasoningUnavailableError("empty response");

    expect(embedding.statusCode).toBe(503);
    expect(embedding.code).toBe("EMBEDDING_UNAVAILABLE");
    expect(embedding.message).toBe("Embedding service error: quota exceeded");
    expect(embedding).toBeInstanceOf(ExternalServiceError);
    expect(reasoning.statusCode).toBe(503);
    expect(reasoning.code).toBe("REASONING_UNAVAILABLE");
    expect(reasoning.message).toBe("Reasoning service error: empty response");
  });

  it("RateLimitError and RequestAbortedError carry their status codes", () => {
    expect(new RateLimitError().statusCode).toBe(429);
    expect(new RateLimitError().message).toBe("Rate limit exceeded");
    expect(new RequestAbortedError().statusCode).toBe(499);
  });
});

describe("getErrorMessage", () => {
  it("formats a ZodError readably", () => {
    const result = z.object({ question: z.string() }).safeParse({ question: 42 });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(getErrorMessage(result.error)).toContain("Expected string, received number");
  });

  it("extracts message from standard Error", () => {
    expect(getErrorMessage(new Error("Something went wrong"))).toBe("Something went wrong");
  });

  it("returns default message for unknown error types", () => {
    expect(getErrorMessage("string error")).toBe("An unexpected error occurred");
    expect(getErrorMessage(null)).toBe("An unexpected error occurred");
    expect(getErrorMessage(42)).toBe("An unexpected error occurred");
  });
});

describe("getErrorStatusCode", () => {
  it("returns 400 for ZodError", () => {
    const result = z.object({ question: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(getErrorStatusCode(result.error)).toBe(400);
  });

  it("returns custom statusCode from AppError", () => {
    expect(getErrorStatusCode(new NotFoundError("X"))).toBe(404);
    expect(getErrorStatusCode(new AuthenticationError())).toBe(401);
    expect(getErrorStatusCode(new EmbeddingUnavailableError("x"))).toBe(503);
  });

  it("returns 500 for standard Error and unknown types", () => {
    expect(getErrorStatusCode(new Error("oops"))).toBe(500);
    expect(getErrorStatusCode("string")).toBe(500);
    expect(getErrorStatusCode(null)).toBe(500);
  });
});

describe("handleRouteError", () => {
  it("sends status and message", () => {
    const mockRes = createMockRes();

    handleRouteError(mockRes as Response, new ReasoningUnavailableError("empty response"));

    expect(mockRes.status).toHaveBeenCalledWith(503);
    expect(mockRes.json).toHaveBeenCalledWith({ error: "Reasoning service error: empty response" });
  });

  it("logs 5xx errors when context is provided", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    handleRouteError(createMockRes() as Response, new Error("Server error"), "Ask");

    expect(consoleSpy).toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it("does not log client errors", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    handleRouteError(createMockRes() as Response, new ValidationError("bad"), "Ask");

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });
});

describe("classifyBackendError", () => {
  it("recognizes quota errors by code, status or message", () => {
    expect(classifyBackendError(Object.assign(new Error("quota"), { code: "insufficient_quota" })).type).toBe("provider_quota");
    expect(classifyBackendError(Object.assign(new Error("Too Many Requests"), { status: 429 })).type).toBe("provider_quota");
    expect(classifyBackendError(new Error("You exceeded your current quota")).type).toBe("provider_quota");
  });

  it("recognizes credential errors", () => {
    const classified = classifyBackendError(Object.assign(new Error("Incorrect API key provided"), { status: 401 }));

    expect(classified).toEqual({
      type: "provider_auth",
      userMessage: "the AI provider credentials are missing or invalid",
      errorMessage: "Incorrect API key provided",
      errorCode: 401,
    });
  });

  it("recognizes timeouts and aborts", () => {
    const aborted = new Error("This operation was aborted");
    aborted.name = "AbortError";

    expect(classifyBackendError(aborted).type).toBe("provider_timeout");
    expect(classifyBackendError(new Error("Request timed out.")).type).toBe("provider_timeout");
  });

  it("passes anything else through as internal", () => {
    expect(classifyBackendError("socket hang up")).toEqual({
      type: "internal",
      userMessage: "socket hang up",
      errorMessage: "socket hang up",
      errorCode: undefined,
    });
  });
});
