import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MessageCorpus } from "../corpus/messageCorpus";
import { LLMClient, type EmbeddingRequestOptions, type LLMRequestOptions, type LLMResponse } from "../llm/client";
import { createPipeline, warmPipeline } from "../pipeline/createPipeline";
import { EmbeddingUnavailableError } from "../utils/errorHandler";
import { SOPHIA_CORPUS, keywordVector, makeConfig } from "./fixtures";

class FakeClient extends LLMClient {
  readonly embedCalls: EmbeddingRequestOptions[] = [];
  readonly textCalls: LLMRequestOptions[] = [];
  failEmbeddings = false;

  constructor() {
    super({});
  }

  async embed(opts: EmbeddingRequestOptions): Promise<unknown[]> {
    this.embedCalls.push(opts);
    if (this.failEmbeddings) throw new Error("connection refused");
    return opts.inputs.map(keywordVector);
  }

  async generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
    this.textCalls.push(opts);
    return { text: " Nobu. ", provider: "openai", model: opts.model };
  }
}

describe("createPipeline", () => {
  const corpus = new MessageCorpus(SOPHIA_CORPUS);
  let client: FakeClient;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    client = new FakeClient();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("warms the whole corpus in one batch", async () => {
    const pipeline = createPipeline(makeConfig(), corpus, client);

    await warmPipeline(pipeline, corpus);

    expect(client.embedCalls).toHaveLength(1);
    expect(client.embedCalls[0].model).toBe("text-embedding-3-small");
    expect(client.embedCalls[0].inputs).toHaveLength(6);
  });

  it("answers through the configured models with the phone number redacted", async () => {
    const pipeline = createPipeline(makeConfig(), corpus, client);
    await warmPipeline(pipeline, corpus);

    const answer = await pipeline.orchestrator.ask("What is Sophia's favorite restaurant?");

    expect(answer.text).toBe("Nobu.");
    expect(client.textCalls).toHaveLength(1);
    const [system, user] = client.textCalls[0].messages;
    expect(client.textCalls[0].model).toBe("gpt-4o-mini");
    expect(system.role).toBe("system");
    expect(user.content).toContain("Call me at [PHONE_REDACTED] about the Carbone reservation");
    expect(user.content).not.toContain("555-123-4567");
  });

  it("fails warm-up with EmbeddingUnavailableError when the provider fails", async () => {
    client.failEmbeddings = true;
    const pipeline = createPipeline(makeConfig(), corpus, client);

    await expect(warmPipeline(pipeline, corpus)).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });
});
