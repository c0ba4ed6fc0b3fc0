/**
 * Shared test fakes: messages, a keyword-count embedding backend and a
 * scripted reasoning backend. No network.
 */

import { vi } from "vitest";
import { error, success, type Result } from "typechat";
import type { Message } from "@shared/schema";
import type { CompletionRequest, EmbeddingBackend, ReasoningBackend } from "../llm/backends";
import type { AppConfig } from "../config/appConfig";

export function makeMessage(id: string, person: string, text: string, timestamp = "2025-01-01T12:00:00Z"): Message {
  return { id, person, text, timestamp };
}

export const KEYWORDS = [
  "restaurant", "table", "dinner", "reservation", "nobu", "london", "trip",
  "hotel", "car", "phone", "opera", "chef", "yacht", "invoice", "favorite",
];

/**
 * One dimension per keyword (occurrence count) plus a constant bias
 * dimension, so no vector is ever all zeros.
 */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  const counts = KEYWORDS.map((k) => lower.split(k).length - 1);
  return [...counts, 1];
}

export function createKeywordEmbeddingBackend(maxBatchSize = 100) {
  const embed = vi.fn(async (texts: string[]): Promise<Result<number[][]>> => success(texts.map(keywordVector)));
  const backend: EmbeddingBackend = { model: "test-embedding", maxBatchSize, embed };
  return { backend, embed };
}

export function createFailingEmbeddingBackend(message = "embedding quota exceeded") {
  const embed = vi.fn(async (): Promise<Result<number[][]>> => error(message));
  const backend: EmbeddingBackend = { model: "test-embedding", maxBatchSize: 100, embed };
  return { backend, embed };
}

export function createScriptedReasoningBackend(reply: Result<string>) {
  const complete = vi.fn(async (_request: CompletionRequest): Promise<Result<string>> => reply);
  const backend: ReasoningBackend = { model: "test-reasoning", complete };
  return { backend, complete };
}

export const SOPHIA_CORPUS: Message[] = [
  makeMessage("m1", "Sophia Al-Farsi", "Book a table at Nobu, my favorite restaurant", "2025-01-15T12:00:00Z"),
  makeMessage("m2", "Sophia Al-Farsi", "Dinner reservation at Le Bernardin please", "2025-02-03T12:00:00Z"),
  makeMessage("m3", "Sophia Al-Farsi", "Call me at 555-123-4567 about the Carbone reservation", "2025-02-28T12:00:00Z"),
  makeMessage("m4", "Layla Kawaguchi", "Plan my trip to London in June", "2025-03-02T12:00:00Z"),
  makeMessage("m5", "Layla Kawaguchi", "A hotel near Covent Garden for the London trip", "2025-03-09T12:00:00Z"),
  makeMessage("m6", "Vikram Desai", "Dinner at a steak restaurant for my car club", "2025-02-11T12:00:00Z"),
];

export function makeConfig(overrides: Partial<AppConfig["retrieval"]> = {}): AppConfig {
  return {
    credentials: { openaiApiKey: "test-secret" },
    embeddingModel: "text-embedding-3-small",
    reasoning: { model: "gpt-4o-mini", temperature: 0.2, maxTokens: 400, maxCandidateChars: 500 },
    retrieval: {
      candidateLimit: 10,
      unmatchedPersonPolicy: "insufficient_data",
      maxQuestionChars: 1000,
      ...overrides,
    },
    sanitizer: { phoneFormats: ["nanp", "international"], idPrefixes: [] },
    corpus: { kind: "file", path: "data/sample-messages.json" },
    server: { port: 8080, rateLimit: { windowMs: 60000, maxRequests: 30 } },
  };
}
