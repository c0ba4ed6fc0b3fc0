/**
 * Query Orchestrator
 *
 * Runs one question through filtering -> ranking -> sanitizing -> synthesizing
 * and ends in exactly one of two terminal states: answered or failed(reason).
 *
 * Responsibilities:
 * - Validate the question and resolve the target person (caller or extracted)
 * - Sequence the stages and stop at the first failure, without retries
 * - Keep message ids out of the reasoning step (only SanitizedCandidates go in)
 * - Log per-stage timings
 *
 * This file MUST NOT:
 * - Read process.env (everything comes in through OrchestratorDeps)
 * - Fall back to unranked candidates when ranking fails
 *
 * Layer: Pipeline
 */

import type { Answer, Query, SanitizedCandidate, TargetPersonSource } from "@shared/schema";
import type { RetrievalConfig } from "../config/appConfig";
import type { MessageCorpus } from "../corpus/messageCorpus";
import type { EmbeddingIndex } from "../retrieval/embeddingIndex";
import { extractTargetPerson, filterByPerson } from "../retrieval/nameFilter";
import type { Sanitizer } from "../privacy/sanitizer";
import type { AnswerSynthesizer } from "../answer/synthesizer";
import {
  EmbeddingUnavailableError,
  ReasoningUnavailableError,
  RequestAbortedError,
} from "../utils/errorHandler";
import { getClarifyingMessage, getNoInformationMessage } from "../utils/notFoundMessages";

export type PipelineStage = "filtering" | "ranking" | "sanitizing" | "synthesizing";

export type FailureKind =
  | "input_error"
  | "embedding_unavailable"
  | "reasoning_unavailable"
  | "no_candidates_found"
  | "aborted";

export type FailureReason = {
  kind: FailureKind;
  stage: PipelineStage;
  message: string;
};

export type PipelineTrace = {
  targetPerson?: string;
  targetPersonSource: TargetPersonSource;
  filteredCount: number;
  candidateCount: number;
  stageTimings: Partial<Record<PipelineStage, number>>;
};

export type PipelineOutcome =
  | { state: "answered"; answer: Answer; trace: PipelineTrace }
  | { state: "failed"; reason: FailureReason; trace: PipelineTrace };

export type RunOptions = {
  targetPerson?: string;
  signal?: AbortSignal;
};

export type OrchestratorDeps = {
  corpus: MessageCorpus;
  index: EmbeddingIndex;
  sanitizer: Sanitizer;
  synthesizer: AnswerSynthesizer;
  retrieval: RetrievalConfig;
};

export class QueryOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Resolve the target person: an explicit caller value wins, otherwise a
   * corpus person named in the question, otherwise none.
   */
  resolveQuery(question: string, targetPerson?: string): Query {
    const explicit = targetPerson?.trim();
    if (explicit) {
      return { rawText: question, targetPerson: explicit, targetPersonSource: "caller" };
    }
    const extracted = extractTargetPerson(question, this.deps.corpus.persons());
    if (extracted) {
      return { rawText: question, targetPerson: extracted, targetPersonSource: "extracted" };
    }
    return { rawText: question, targetPersonSource: "none" };
  }

  async run(question: string, options: RunOptions = {}): Promise<PipelineOutcome> {
    const { corpus, index, sanitizer, synthesizer, retrieval } = this.deps;
    const { signal } = options;
    const trace: PipelineTrace = {
      targetPersonSource: "none",
      filteredCount: 0,
      candidateCount: 0,
      stageTimings: {},
    };
    const fail = (kind: FailureKind, stage: PipelineStage, message: string): PipelineOutcome => {
      console.warn(`[Orchestrator] Failed at ${stage} (${kind}): ${message}`);
      return { state: "failed", reason: { kind, stage, message }, trace };
    };
    const aborted = (stage: PipelineStage): PipelineOutcome | null =>
      signal?.aborted ? fail("aborted", stage, "request aborted") : null;

    const text = question.trim();
    if (!text) {
      return fail("input_error", "filtering", "question is empty");
    }
    if (text.length > retrieval.maxQuestionChars) {
      return fail("input_error", "filtering", `question exceeds ${retrieval.maxQuestionChars} characters`);
    }

    // Filtering
    let started = Date.now();
    const stopped = aborted("filtering");
    if (stopped) return stopped;

    const query = this.resolveQuery(text, options.targetPerson);
    trace.targetPerson = query.targetPerson;
    trace.targetPersonSource = query.targetPersonSource;

    const filtered = filterByPerson(corpus.all(), query.targetPerson);
    trace.filteredCount = filtered.messages.length;
    trace.stageTimings.filtering = Date.now() - started;

    if (
      query.targetPersonSource === "caller" &&
      !filtered.matched &&
      retrieval.unmatchedPersonPolicy === "insufficient_data"
    ) {
      return fail("no_candidates_found", "filtering", `no messages from "${query.targetPerson}"`);
    }

    // Ranking
    started = Date.now();
    const queryVector = await index.embed(text, signal);
    const abortedWhileEmbedding = aborted("ranking");
    if (abortedWhileEmbedding) return abortedWhileEmbedding;
    if (!queryVector.success) {
      return fail("embedding_unavailable", "ranking", queryVector.message);
    }

    const ranked = await index.rank(queryVector.data, filtered.messages, {
      limit: retrieval.candidateLimit,
      minSimilarity: retrieval.minSimilarity,
    });
    const abortedWhileRanking = aborted("ranking");
    if (abortedWhileRanking) return abortedWhileRanking;
    if (!ranked.success) {
      return fail("embedding_unavailable", "ranking", ranked.message);
    }
    trace.candidateCount = ranked.data.length;
    trace.stageTimings.ranking = Date.now() - started;

    if (ranked.data.length === 0) {
      return fail("no_candidates_found", "ranking", "no messages matched the question");
    }

    // Sanitizing
    started = Date.now();
    const sanitized: SanitizedCandidate[] = ranked.data.map((c) => sanitizer.sanitizeCandidate(c));
    trace.stageTimings.sanitizing = Date.now() - started;

    // Synthesizing
    started = Date.now();
    const answer = await synthesizer.synthesize(query, sanitized, {
      supportingCandidateIds: ranked.data.map((c) => c.message.id),
      signal,
    });
    const abortedWhileSynthesizing = aborted("synthesizing");
    if (abortedWhileSynthesizing) return abortedWhileSynthesizing;
    if (!answer.success) {
      return fail("reasoning_unavailable", "synthesizing", answer.message);
    }
    trace.stageTimings.synthesizing = Date.now() - started;

    const t = trace.stageTimings;
    console.log(
      `[Orchestrator] Answered (person=${trace.targetPersonSource}, filtered=${trace.filteredCount}, ` +
      `candidates=${trace.candidateCount}) filtering=${t.filtering}ms ranking=${t.ranking}ms ` +
      `sanitizing=${t.sanitizing}ms synthesizing=${t.synthesizing}ms`,
    );
    return { state: "answered", answer: answer.data, trace };
  }

  /**
   * Answer-or-throw wrapper over run() for the HTTP and CLI surfaces.
   * Questions the messages cannot answer become explicit answers; backend
   * failures and aborts throw.
   */
  async ask(question: string, options: RunOptions = {}): Promise<Answer> {
    const outcome = await this.run(question, options);
    if (outcome.state === "answered") return outcome.answer;

    const { reason, trace } = outcome;
    switch (reason.kind) {
      case "no_candidates_found":
        return {
          text: getNoInformationMessage({
            targetPerson: trace.targetPersonSource === "caller" ? trace.targetPerson : undefined,
          }),
          supportingCandidateIds: [],
          insufficientData: true,
        };
      case "input_error":
        return {
          text: getClarifyingMessage(reason.message),
          supportingCandidateIds: [],
          insufficientData: true,
        };
      case "embedding_unavailable":
        throw new EmbeddingUnavailableError(reason.message);
      case "reasoning_unavailable":
        throw new ReasoningUnavailableError(reason.message);
      case "aborted":
        throw new RequestAbortedError();
    }
  }
}
