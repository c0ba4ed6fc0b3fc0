/**
 * Application Configuration
 *
 * Builds the single AppConfig object from the environment once at startup.
 * Everything below the entry points receives the parsed config (or a slice of
 * it) as an argument; pipeline code never reads process.env.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { MODEL_ASSIGNMENTS } from "./models";
import {
  PROMPT_LIMITS,
  RATE_LIMIT_CONSTANTS,
  REASONING_DEFAULTS,
  RETRIEVAL_CONSTANTS,
  SERVER_DEFAULTS,
} from "./constants";

export const PHONE_FORMATS = ["nanp", "international"] as const;
export type PhoneFormat = typeof PHONE_FORMATS[number];

export const UNMATCHED_PERSON_POLICIES = ["insufficient_data", "broaden"] as const;
export type UnmatchedPersonPolicy = typeof UNMATCHED_PERSON_POLICIES[number];

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

function commaList<T extends z.ZodTypeAny>(item: T) {
  return z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((part) => part.trim())
        .filter(Boolean),
    )
    .pipe(z.array(item));
}

const envSchema = z
  .object({
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    GEMINI_API_KEY: optionalString,
    ANTHROPIC_API_KEY: optionalString,

    EMBEDDING_MODEL: z.string().trim().min(1).default(MODEL_ASSIGNMENTS.MESSAGE_EMBEDDING),
    REASONING_MODEL: z.string().trim().min(1).default(MODEL_ASSIGNMENTS.ANSWER_SYNTHESIS),
    REASONING_TEMPERATURE: z.coerce.number().min(0).max(2).default(REASONING_DEFAULTS.TEMPERATURE),
    REASONING_MAX_TOKENS: z.coerce.number().int().min(16).default(REASONING_DEFAULTS.MAX_TOKENS),

    CANDIDATE_LIMIT: z.coerce
      .number()
      .int()
      .min(1)
      .max(RETRIEVAL_CONSTANTS.MAX_CANDIDATE_LIMIT)
      .default(RETRIEVAL_CONSTANTS.DEFAULT_CANDIDATE_LIMIT),
    MIN_SIMILARITY: optionalString.pipe(z.coerce.number().min(-1).max(1).optional()),
    UNMATCHED_PERSON_POLICY: z.enum(UNMATCHED_PERSON_POLICIES).default("insufficient_data"),
    MAX_CANDIDATE_CHARS: z.coerce.number().int().min(40).default(PROMPT_LIMITS.MAX_CANDIDATE_CHARS),
    MAX_QUESTION_CHARS: z.coerce.number().int().min(10).default(PROMPT_LIMITS.MAX_QUESTION_CHARS),

    SANITIZER_PHONE_FORMATS: commaList(z.enum(PHONE_FORMATS)),
    SANITIZER_ID_PREFIXES: commaList(z.string().regex(/^[A-Za-z0-9_-]+$/, "id prefixes may only contain letters, digits, _ and -")),

    CORPUS_PATH: optionalString,
    CORPUS_URL: optionalString.pipe(z.string().url().optional()),

    PORT: z.coerce.number().int().min(0).max(65535).default(SERVER_DEFAULTS.PORT),
    ASK_API_KEY: optionalString,
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(RATE_LIMIT_CONSTANTS.WINDOW_MS),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().min(1).default(RATE_LIMIT_CONSTANTS.MAX_REQUESTS),
  });

export type ProviderCredentials = {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  geminiApiKey?: string;
  anthropicApiKey?: string;
};

export type RetrievalConfig = {
  /** K: hard upper bound on candidates reaching the reasoning step. */
  candidateLimit: number;
  /** Candidates scoring below this are dropped after ranking. */
  minSimilarity?: number;
  /** What to do when the caller names a person nobody in the corpus matches. */
  unmatchedPersonPolicy: UnmatchedPersonPolicy;
  maxQuestionChars: number;
};

export type SanitizerConfig = {
  phoneFormats: PhoneFormat[];
  idPrefixes: string[];
};

export type ReasoningConfig = {
  model: string;
  temperature: number;
  maxTokens: number;
  maxCandidateChars: number;
};

export type CorpusSource =
  | { kind: "file"; path: string }
  | { kind: "url"; url: string };

export type AppConfig = {
  credentials: ProviderCredentials;
  embeddingModel: string;
  reasoning: ReasoningConfig;
  retrieval: RetrievalConfig;
  sanitizer: SanitizerConfig;
  corpus: CorpusSource;
  server: {
    port: number;
    apiKey?: string;
    rateLimit: { windowMs: number; maxRequests: number };
  };
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Parse and validate the environment into an AppConfig.
 * Throws ConfigError with a readable message listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(fromZodError(parsed.error, { prefix: "Invalid configuration" }).message);
  }
  const e = parsed.data;

  return {
    credentials: {
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      geminiApiKey: e.GEMINI_API_KEY,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
    },
    embeddingModel: e.EMBEDDING_MODEL,
    reasoning: {
      model: e.REASONING_MODEL,
      temperature: e.REASONING_TEMPERATURE,
      maxTokens: e.REASONING_MAX_TOKENS,
      maxCandidateChars: e.MAX_CANDIDATE_CHARS,
    },
    retrieval: {
      candidateLimit: e.CANDIDATE_LIMIT,
      minSimilarity: e.MIN_SIMILARITY,
      unmatchedPersonPolicy: e.UNMATCHED_PERSON_POLICY,
      maxQuestionChars: e.MAX_QUESTION_CHARS,
    },
    sanitizer: {
      phoneFormats: e.SANITIZER_PHONE_FORMATS.length > 0 ? e.SANITIZER_PHONE_FORMATS : [...PHONE_FORMATS],
      idPrefixes: e.SANITIZER_ID_PREFIXES,
    },
    corpus: resolveCorpusSource(e.CORPUS_PATH, e.CORPUS_URL),
    server: {
      port: e.PORT,
      apiKey: e.ASK_API_KEY,
      rateLimit: {
        windowMs: e.RATE_LIMIT_WINDOW_MS,
        maxRequests: e.RATE_LIMIT_MAX_REQUESTS,
      },
    },
  };
}

// CORPUS_PATH wins when both are set
function resolveCorpusSource(path: string | undefined, url: string | undefined): CorpusSource {
  if (path) return { kind: "file", path };
  if (url) return { kind: "url", url };
  throw new ConfigError("Invalid configuration: either CORPUS_PATH or CORPUS_URL must be set");
}

/**
 * Log-safe summary: never includes credentials.
 */
export function describeConfig(config: AppConfig): string {
  const providers = [
    config.credentials.openaiApiKey && "openai",
    config.credentials.geminiApiKey && "gemini",
    config.credentials.anthropicApiKey && "claude",
  ].filter(Boolean);
  return [
    `embedding=${config.embeddingModel}`,
    `reasoning=${config.reasoning.model}`,
    `k=${config.retrieval.candidateLimit}`,
    `providers=${providers.join(",") || "none"}`,
    `corpus=${config.corpus.kind}`,
  ].join(" ");
}
