/**
 * Centralized Model Registry
 *
 * Single source of truth for the models the pipeline knows about. The
 * configured model names are matched against these sets to pick a provider;
 * unknown names fall back to prefix detection in the LLM client.
 *
 * REASONING TIERS:
 *
 * FAST_REASONING - gpt-4o-mini
 *   Cheapest model that still counts and aggregates reliably over ~10-20
 *   short messages. Default for answer synthesis.
 *
 * STANDARD_REASONING - gpt-4o
 *   Use when questions need longer temporal reasoning across candidates.
 */

export const LLM_MODELS = {
  FAST_REASONING: "gpt-4o-mini",
  STANDARD_REASONING: "gpt-4o",
} as const;

export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
} as const;

export const CLAUDE_MODELS = {
  HAIKU: "claude-3-5-haiku-latest",
} as const;

/**
 * Embedding models. Dimensions differ per model, so switching models
 * invalidates every cached vector (the cache lives in memory only).
 */
export const EMBEDDING_MODELS = {
  OPENAI_SMALL: "text-embedding-3-small",
  OPENAI_LARGE: "text-embedding-3-large",
  GEMINI: "gemini-embedding-001",
} as const;

export const MODEL_ASSIGNMENTS = {
  ANSWER_SYNTHESIS: LLM_MODELS.FAST_REASONING,
  MESSAGE_EMBEDDING: EMBEDDING_MODELS.OPENAI_SMALL,
} as const;

/**
 * Batch sizes accepted per embedding request.
 */
export const EMBEDDING_BATCH_LIMITS: Record<string, number> = {
  [EMBEDDING_MODELS.OPENAI_SMALL]: 256,
  [EMBEDDING_MODELS.OPENAI_LARGE]: 256,
  [EMBEDDING_MODELS.GEMINI]: 100,
};
