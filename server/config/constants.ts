/**
 * Application Constants
 *
 * Defaults and hard bounds used when building the AppConfig. Anything an
 * operator may change lives in appConfig.ts; these are the values it falls
 * back to and the limits it validates against.
 */

export const RETRIEVAL_CONSTANTS = {
  /**
   * Default K: candidates forwarded to the reasoning step per query.
   */
  DEFAULT_CANDIDATE_LIMIT: 10,

  /**
   * Upper bound on K. Keeps per-query prompt cost flat regardless of corpus size.
   */
  MAX_CANDIDATE_LIMIT: 50,

  /**
   * Embedding inputs are clipped to this many characters.
   */
  MAX_EMBEDDING_INPUT_CHARS: 8000,

  /**
   * Partial name tokens shorter than this never count as a person mention.
   */
  MIN_NAME_TOKEN_LENGTH: 3,
} as const;

export const PROMPT_LIMITS = {
  /**
   * Per-candidate text is truncated to this many characters in the prompt.
   */
  MAX_CANDIDATE_CHARS: 500,

  /**
   * Questions longer than this are rejected as input errors.
   */
  MAX_QUESTION_CHARS: 1000,
} as const;

export const REASONING_DEFAULTS = {
  TEMPERATURE: 0.2,
  MAX_TOKENS: 400,
} as const;

export const SERVER_DEFAULTS = {
  PORT: 8080,
  SERVICE_NAME: "Message Q&A Service",
} as const;

/**
 * Rate limiting configuration for the ask endpoints.
 */
export const RATE_LIMIT_CONSTANTS = {
  WINDOW_MS: 60 * 1000, // 1 minute
  MAX_REQUESTS: 30,
} as const;

export const SANITIZER_CONSTANTS = {
  /**
   * Re-scan passes before a message is replaced whole.
   */
  MAX_PASSES: 3,

  /**
   * Known identifiers shorter than this are not redacted literally
   * (too many false hits on ordinary words and numbers).
   */
  MIN_KNOWN_IDENTIFIER_LENGTH: 4,
} as const;
