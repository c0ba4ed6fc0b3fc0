import { describe, it, expect, vi } from "vitest";
import { error, success, type Result } from "typechat";
import type { Message } from "@shared/schema";
import type { EmbeddingBackend } from "../llm/backends";
import { EmbeddingIndex, compareCandidates, cosineSimilarity } from "../retrieval/embeddingIndex";
import { createKeywordEmbeddingBackend, makeMessage, KEYWORDS } from "./fixtures";

function createMapBackend(vectors: Record<string, number[]>) {
  const embed = vi.fn(async (texts: string[]): Promise<Result<number[][]>> =>
    success(texts.map((t) => vectors[t] ?? [0, 0])),
  );
  const backend: EmbeddingBackend = { model: "test-embedding", maxBatchSize: 100, embed };
  return { backend, embed };
}

function generateMessages(count: number): Message[] {
  return Array.from({ length: count }, (_, i) =>
    makeMessage(`gen-${i}`, `Person ${i % 7}`, `note ${i} about ${KEYWORDS[i % KEYWORDS.length]}`),
  );
}

describe("cosineSimilarity", () => {
  it("scores identical, orthogonal and opposite vectors", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1);
  });

  it("returns 0 for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe("compareCandidates", () => {
  it("breaks score ties by recency, then by id", () => {
    const older = { message: makeMessage("b", "P", "t", "2025-01-01T12:00:00Z"), similarityScore: 0.5 };
    const newer = { message: makeMessage("c", "P", "t", "2025-02-01T12:00:00Z"), similarityScore: 0.5 };
    const sameTime = { message: makeMessage("a", "P", "t", "2025-01-01T12:00:00Z"), similarityScore: 0.5 };

    expect([older, newer, sameTime].sort(compareCandidates).map((c) => c.message.id)).toEqual(["c", "a", "b"]);
  });
});

describe("EmbeddingIndex", () => {
  describe("rank", () => {
    it("orders by similarity, most recent first on ties, and respects the limit", async () => {
      const { backend } = createMapBackend({ a: [1, 0], b: [1, 0], c: [0, 1], d: [1, 1] });
      const index = new EmbeddingIndex(backend);
      const messages = [
        makeMessage("a", "P", "a", "2025-01-01T12:00:00Z"),
        makeMessage("b", "P", "b", "2025-03-01T12:00:00Z"),
        makeMessage("c", "P", "c", "2025-02-01T12:00:00Z"),
        makeMessage("d", "P", "d", "2025-02-01T12:00:00Z"),
      ];

      const result = await index.rank([1, 0], messages, { limit: 3 });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.map((c) => c.message.id)).toEqual(["b", "a", "d"]);
      expect(result.data[2]?.similarityScore).toBeCloseTo(Math.SQRT1_2);
    });

    it.each([10, 10_000])("never returns more than the limit for %i messages", async (count) => {
      const { backend } = createKeywordEmbeddingBackend(256);
      const index = new EmbeddingIndex(backend);
      const messages = generateMessages(count);
      const query = await index.embed("dinner reservation");
      if (!query.success) throw new Error(query.message);

      const top10 = await index.rank(query.data, messages, { limit: 10 });
      const top3 = await index.rank(query.data, messages, { limit: 3 });

      expect(top10.success && top10.data.length).toBe(10);
      expect(top3.success && top3.data.length).toBe(3);
    });

    it("is deterministic across calls and fresh indexes", async () => {
      const messages = generateMessages(200);
      const first = new EmbeddingIndex(createKeywordEmbeddingBackend().backend);
      const second = new EmbeddingIndex(createKeywordEmbeddingBackend().backend);
      const queryVector = [0, 0, 1, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1];

      const runs = await Promise.all([
        first.rank(queryVector, messages, { limit: 10 }),
        first.rank(queryVector, messages, { limit: 10 }),
        second.rank(queryVector, messages, { limit: 10 }),
      ]);
      const ids = runs.map((r) => (r.success ? r.data.map((c) => c.message.id) : []));

      expect(ids[0]).toHaveLength(10);
      expect(ids[1]).toEqual(ids[0]);
      expect(ids[2]).toEqual(ids[0]);
    });

    it("drops candidates below minSimilarity", async () => {
      const { backend } = createMapBackend({ a: [1, 0], c: [0, 1] });
      const index = new EmbeddingIndex(backend);
      const messages = [makeMessage("a", "P", "a"), makeMessage("c", "P", "c")];

      const result = await index.rank([1, 0], messages, { limit: 10, minSimilarity: 0.5 });

      expect(result.success && result.data.map((c) => c.message.id)).toEqual(["a"]);
    });

    it("returns nothing for an empty message list without calling the backend", async () => {
      const { backend, embed } = createMapBackend({});
      const index = new EmbeddingIndex(backend);

      const result = await index.rank([1, 0], [], { limit: 10 });

      expect(result).toEqual(success([]));
      expect(embed).not.toHaveBeenCalled();
    });

    it("fails on a dimension mismatch instead of scoring", async () => {
      const { backend } = createMapBackend({ a: [1, 0] });
      const index = new EmbeddingIndex(backend);

      const result = await index.rank([1, 0, 0], [makeMessage("a", "P", "a")], { limit: 10 });

      expect(result).toEqual(error("embedding dimension 2 does not match query dimension 3"));
    });
  });

  describe("cache", () => {
    it("embeds each message once across repeated and concurrent calls", async () => {
      const { backend, embed } = createKeywordEmbeddingBackend();
      const index = new EmbeddingIndex(backend);
      const messages = generateMessages(20);

      await Promise.all([index.embedMessages(messages), index.embedMessages(messages)]);
      await index.warm(messages);

      expect(embed).toHaveBeenCalledTimes(1);
      expect(index.cache.size).toBe(20);
    });

    it("returns the same vectors on every lookup", async () => {
      const { backend } = createKeywordEmbeddingBackend();
      const index = new EmbeddingIndex(backend);
      const messages = generateMessages(5);

      const first = await index.embedMessages(messages);
      const second = await index.embedMessages(messages);

      expect(first.success && second.success).toBe(true);
      if (!first.success || !second.success) return;
      for (const m of messages) {
        expect(second.data.get(m.id)).toBe(first.data.get(m.id));
      }
    });

    it("queues a duplicated id only once", async () => {
      const { backend, embed } = createKeywordEmbeddingBackend();
      const index = new EmbeddingIndex(backend);
      const m = makeMessage("dup", "P", "dinner");

      await index.embedMessages([m, m]);

      expect(embed).toHaveBeenCalledWith(["dinner"]);
    });

    it("re-embeds when the text under an id changes", async () => {
      const { backend, embed } = createKeywordEmbeddingBackend();
      const index = new EmbeddingIndex(backend);
      const m = makeMessage("m1", "P", "dinner");

      await index.embedMessages([m]);
      await index.embedMessages([{ ...m, text: "yacht" }]);

      expect(embed).toHaveBeenCalledTimes(2);
      expect(index.cache.size).toBe(1);
    });

    it("never caches query vectors", async () => {
      const { backend, embed } = createKeywordEmbeddingBackend();
      const index = new EmbeddingIndex(backend);

      await index.embed("dinner");
      await index.embed("dinner");

      expect(embed).toHaveBeenCalledTimes(2);
      expect(index.cache.size).toBe(0);
    });

    it("evicts failed entries so the next call retries", async () => {
      const embed = vi.fn(async (texts: string[]): Promise<Result<number[][]>> => success(texts.map(() => [1, 0])));
      embed.mockResolvedValueOnce(error("the AI provider quota or rate limit has been exceeded"));
      const index = new EmbeddingIndex({ model: "test-embedding", maxBatchSize: 100, embed });
      const messages = [makeMessage("a", "P", "a")];

      const failed = await index.embedMessages(messages);
      expect(failed).toEqual(error("the AI provider quota or rate limit has been exceeded"));
      expect(index.cache.size).toBe(0);

      const retried = await index.embedMessages(messages);
      expect(retried.success).toBe(true);
      expect(embed).toHaveBeenCalledTimes(2);
    });

    it("turns a throwing backend into an error result", async () => {
      const embed = vi.fn(async (): Promise<Result<number[][]>> => {
        throw new Error("socket hang up");
      });
      const index = new EmbeddingIndex({ model: "test-embedding", maxBatchSize: 100, embed });

      const result = await index.embedMessages([makeMessage("a", "P", "a")]);

      expect(result).toEqual(error("socket hang up"));
    });
  });

  describe("warm", () => {
    it("reports how many vectors are cached", async () => {
      const { backend, embed } = createKeywordEmbeddingBackend(4);
      const index = new EmbeddingIndex(backend);

      const result = await index.warm(generateMessages(10));

      expect(result).toEqual(success(10));
      expect(embed).toHaveBeenCalledTimes(3);
    });
  });
});
