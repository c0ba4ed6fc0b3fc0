/**
 * Backend adapters for the two outbound calls the pipeline makes.
 *
 * Each call resolves to an explicit Result (typechat's success/error), never
 * throws: provider exceptions and malformed payloads are folded into
 * error(message) here so nothing escapes across the pipeline boundary.
 */

import { error, success, type Result } from "typechat";
import { EMBEDDING_BATCH_LIMITS } from "../config/models";
import { RETRIEVAL_CONSTANTS } from "../config/constants";
import type { ReasoningConfig } from "../config/appConfig";
import { classifyBackendError } from "../utils/errorHandler";
import type { LLMClient } from "./client";

const DEFAULT_EMBEDDING_BATCH_SIZE = 64;

export interface EmbeddingBackend {
  readonly model: string;
  /** Most inputs a single embed() call accepts. */
  readonly maxBatchSize: number;
  embed(texts: string[], signal?: AbortSignal): Promise<Result<number[][]>>;
}

export type CompletionRequest = {
  system: string;
  prompt: string;
  jsonResponse?: boolean;
  signal?: AbortSignal;
};

export interface ReasoningBackend {
  readonly model: string;
  complete(request: CompletionRequest): Promise<Result<string>>;
}

/**
 * Check that a raw embedding payload is one finite, non-empty vector per
 * input, all of the same dimension.
 */
export function validateVectors(raw: unknown[], expectedCount: number): Result<number[][]> {
  if (raw.length !== expectedCount) {
    return error(`expected ${expectedCount} embeddings, received ${raw.length}`);
  }
  const vectors: number[][] = [];
  let dimension: number | undefined;
  for (const [i, entry] of raw.entries()) {
    if (!Array.isArray(entry) || entry.length === 0) {
      return error(`embedding ${i} is not a non-empty array`);
    }
    const vector: number[] = [];
    for (const value of entry) {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return error(`embedding ${i} contains a non-finite component`);
      }
      vector.push(value);
    }
    dimension ??= vector.length;
    if (vector.length !== dimension) {
      return error(`embedding ${i} has dimension ${vector.length}, expected ${dimension}`);
    }
    vectors.push(vector);
  }
  return success(vectors);
}

export function createEmbeddingBackend(client: LLMClient, model: string): EmbeddingBackend {
  return {
    model,
    maxBatchSize: EMBEDDING_BATCH_LIMITS[model] ?? DEFAULT_EMBEDDING_BATCH_SIZE,
    async embed(texts, signal) {
      if (texts.length === 0) return success([]);
      try {
        const raw = await client.embed({
          model,
          inputs: texts.map((t) => t.slice(0, RETRIEVAL_CONSTANTS.MAX_EMBEDDING_INPUT_CHARS)),
          signal,
        });
        return validateVectors(raw, texts.length);
      } catch (err) {
        const classified = classifyBackendError(err);
        console.warn(`[Embedding Backend] ${model} failed (${classified.type}): ${classified.errorMessage}`);
        return error(classified.userMessage);
      }
    },
  };
}

export function createReasoningBackend(client: LLMClient, config: ReasoningConfig): ReasoningBackend {
  return {
    model: config.model,
    async complete(request) {
      try {
        const response = await client.generateText({
          model: config.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          temperature: config.temperature,
          maxTokens: config.maxTokens,
          jsonResponse: request.jsonResponse,
          signal: request.signal,
        });
        const text = response.text.trim();
        if (!text) {
          return error(`${config.model} returned an empty response`);
        }
        return success(text);
      } catch (err) {
        const classified = classifyBackendError(err);
        console.warn(`[Reasoning Backend] ${config.model} failed (${classified.type}): ${classified.errorMessage}`);
        return error(classified.userMessage);
      }
    },
  };
}
