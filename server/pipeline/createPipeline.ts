/**
 * Wires one QueryOrchestrator from an AppConfig and a loaded corpus.
 * Shared by the HTTP server and the CLI.
 */

import type { AppConfig } from "../config/appConfig";
import type { MessageCorpus } from "../corpus/messageCorpus";
import { LLMClient } from "../llm/client";
import { createEmbeddingBackend, createReasoningBackend } from "../llm/backends";
import { EmbeddingIndex } from "../retrieval/embeddingIndex";
import { Sanitizer } from "../privacy/sanitizer";
import { AnswerSynthesizer } from "../answer/synthesizer";
import { EmbeddingUnavailableError } from "../utils/errorHandler";
import { QueryOrchestrator } from "./orchestrator";

export type Pipeline = {
  orchestrator: QueryOrchestrator;
  index: EmbeddingIndex;
};

export function createPipeline(config: AppConfig, corpus: MessageCorpus, client = new LLMClient(config.credentials)): Pipeline {
  const index = new EmbeddingIndex(createEmbeddingBackend(client, config.embeddingModel));
  const sanitizer = new Sanitizer(config.sanitizer, corpus.identifiers());
  const synthesizer = new AnswerSynthesizer(createReasoningBackend(client, config.reasoning), config.reasoning);

  const orchestrator = new QueryOrchestrator({
    corpus,
    index,
    sanitizer,
    synthesizer,
    retrieval: config.retrieval,
  });
  return { orchestrator, index };
}

/**
 * Embed the whole corpus before serving. A failure here stops startup.
 */
export async function warmPipeline(pipeline: Pipeline, corpus: MessageCorpus): Promise<void> {
  const warmed = await pipeline.index.warm(corpus.all());
  if (!warmed.success) {
    throw new EmbeddingUnavailableError(warmed.message);
  }
}
