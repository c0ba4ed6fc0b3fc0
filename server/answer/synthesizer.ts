/**
 * Answer Synthesizer
 *
 * Responsibilities:
 * - Classify the question's answer shape (count, list, temporal, fact)
 * - Build the reasoning prompt from already-sanitized candidates
 * - Turn the reasoning backend's reply into an Answer
 *
 * This file MUST NOT:
 * - See raw Messages or message ids (it only receives SanitizedCandidates)
 * - Fabricate an answer when the backend fails
 *
 * Layer: Answer (one reasoning call per question)
 */

import { error, success, type Result } from "typechat";
import { z } from "zod";
import type { Answer, Query, QuestionShape, SanitizedCandidate } from "@shared/schema";
import type { ReasoningConfig } from "../config/appConfig";
import {
  NO_INFORMATION_ANSWER,
  buildAnswerSystemPrompt,
  buildAnswerUserPrompt,
  getPromptVersion,
} from "../config/prompts";
import type { ReasoningBackend } from "../llm/backends";

const COUNT_PATTERN = /\b(how many|how much|number of|count)\b/i;
const TEMPORAL_PATTERN = /\b(when|what time|what date|which day|what day)\b/i;
const LIST_PATTERN = /\b(favou?rites?|list|which|all)\b/i;

export function classifyQuestion(question: string): QuestionShape {
  if (COUNT_PATTERN.test(question)) return "count";
  if (TEMPORAL_PATTERN.test(question)) return "temporal";
  if (LIST_PATTERN.test(question)) return "list";
  return "fact";
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars).trimEnd()}...`;
}

/**
 * "[1] Sophia Al-Farsi (2024-05-01): Book a table at Nobu"
 *
 * The day is the calendar date written in the timestamp, not the date in the
 * server's timezone. Timestamps are validated ISO-8601 on load.
 */
export function formatCandidateLine(candidate: SanitizedCandidate, index: number, maxChars: number): string {
  const day = candidate.timestamp.slice(0, 10);
  return `[${index + 1}] ${candidate.person} (${day}): ${truncateText(candidate.text, maxChars)}`;
}

export function buildAnswerPrompt(
  question: string,
  candidates: readonly SanitizedCandidate[],
  maxCandidateChars: number,
): { system: string; prompt: string; shape: QuestionShape } {
  const shape = classifyQuestion(question);
  const lines = candidates.map((c, i) => formatCandidateLine(c, i, maxCandidateChars));
  return {
    system: buildAnswerSystemPrompt(shape),
    prompt: buildAnswerUserPrompt(question, lines),
    shape,
  };
}

const countResponseSchema = z.object({
  answer: z.string().trim().min(1),
  count: z.number().int().min(0),
});

const answerOnlySchema = z.object({
  answer: z.string().trim().min(1),
});

export type CountReply = {
  answer: string;
  count?: number;
};

/**
 * Reads a count reply. A JSON object whose count is missing or invalid still
 * yields its answer, without a count.
 */
export function parseCountResponse(raw: string): CountReply | null {
  const unfenced = raw.replace(/^```(?:json)?\s*/i, "").replace(/\s*```$/, "");
  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced);
  } catch {
    return null;
  }
  const counted = countResponseSchema.safeParse(parsed);
  if (counted.success) return counted.data;
  const answered = answerOnlySchema.safeParse(parsed);
  return answered.success ? { answer: answered.data.answer } : null;
}

function isNoInformation(text: string): boolean {
  return text.trim().toLowerCase().startsWith(NO_INFORMATION_ANSWER.slice(0, -1).toLowerCase());
}

export type SynthesizeOptions = {
  supportingCandidateIds?: string[];
  signal?: AbortSignal;
};

export class AnswerSynthesizer {
  constructor(
    private readonly backend: ReasoningBackend,
    private readonly config: Pick<ReasoningConfig, "maxCandidateChars">,
  ) {}

  async synthesize(
    query: Query,
    candidates: readonly SanitizedCandidate[],
    options: SynthesizeOptions = {},
  ): Promise<Result<Answer>> {
    const supportingCandidateIds = options.supportingCandidateIds ?? [];
    const { system, prompt, shape } = buildAnswerPrompt(query.rawText, candidates, this.config.maxCandidateChars);

    if (candidates.length === 0) {
      return success({ text: NO_INFORMATION_ANSWER, supportingCandidateIds: [], shape, insufficientData: true });
    }

    const promptVersion = getPromptVersion(shape === "count" ? "COUNT_ANSWER_PROMPT" : "ANSWER_SYSTEM_PROMPT");
    const reply = await this.backend.complete({
      system,
      prompt,
      jsonResponse: shape === "count",
      signal: options.signal,
    });
    if (!reply.success) return reply;

    const text = reply.data.trim();
    if (!text) return error(`${this.backend.model} returned an empty response`);

    if (shape === "count") {
      const counted = parseCountResponse(text);
      if (counted) {
        return success({
          text: counted.answer,
          supportingCandidateIds,
          shape,
          ...(counted.count !== undefined && { count: counted.count }),
          insufficientData: isNoInformation(counted.answer),
          promptVersion,
        });
      }
    }

    return success({
      text,
      supportingCandidateIds,
      shape,
      insufficientData: isNoInformation(text),
      promptVersion,
    });
  }
}
