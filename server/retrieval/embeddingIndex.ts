/**
 * Embedding index.
 *
 * Responsibilities:
 * - Embed corpus messages once and keep the vectors in an EmbeddingCache
 * - Embed each query fresh
 * - Rank candidates by cosine similarity, most recent first on ties
 *
 * Backend failures and malformed vectors come back as error results. There is
 * no fallback to an unranked candidate list.
 *
 * Layer: Retrieval (suspends only on the embedding backend)
 */

import { createHash } from "crypto";
import { error, success, type Result } from "typechat";
import type { Candidate, Message } from "@shared/schema";
import type { EmbeddingBackend } from "../llm/backends";
import { getErrorMessage } from "../utils/errorHandler";

export type Vector = readonly number[];

type CacheEntry = {
  fingerprint: string;
  vector: Promise<Result<Vector>>;
};

function fingerprint(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Message-embedding cache keyed by message id.
 *
 * Concurrency contract: read-many, write-once per id. The first caller for an
 * id stores a pending entry before the backend call starts; later callers
 * await that same entry instead of embedding again. A failed entry is evicted
 * so the next caller can retry. A text change under the same id (different
 * fingerprint) replaces the entry.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, CacheEntry>();

  get size(): number {
    return this.entries.size;
  }

  lookup(id: string, text: string): Promise<Result<Vector>> | undefined {
    const entry = this.entries.get(id);
    if (!entry || entry.fingerprint !== fingerprint(text)) return undefined;
    return entry.vector;
  }

  reserve(id: string, text: string, vector: Promise<Result<Vector>>): void {
    const entry: CacheEntry = { fingerprint: fingerprint(text), vector };
    this.entries.set(id, entry);
    void vector.then((result) => {
      if (!result.success && this.entries.get(id) === entry) {
        this.entries.delete(id);
      }
    });
  }
}

export function cosineSimilarity(a: Vector, b: Vector): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}

/**
 * Descending score, then more recent timestamp, then id. Total order, so a
 * fixed corpus, query and embeddings always rank the same way.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.similarityScore !== b.similarityScore) {
    return b.similarityScore - a.similarityScore;
  }
  const timeA = Date.parse(a.message.timestamp);
  const timeB = Date.parse(b.message.timestamp);
  if (timeA !== timeB) {
    return timeB - timeA;
  }
  return a.message.id < b.message.id ? -1 : a.message.id > b.message.id ? 1 : 0;
}

export type RankOptions = {
  limit: number;
  minSimilarity?: number;
};

export class EmbeddingIndex {
  constructor(
    private readonly backend: EmbeddingBackend,
    readonly cache: EmbeddingCache = new EmbeddingCache(),
  ) {}

  /**
   * Embed a query. Never cached.
   */
  async embed(text: string, signal?: AbortSignal): Promise<Result<Vector>> {
    const result = await this.backend.embed([text], signal);
    if (!result.success) return result;
    const [vector] = result.data;
    return vector ? success(Object.freeze(vector)) : error("embedding backend returned no vector for the query");
  }

  /**
   * Vectors for every message, embedding only those not already cached.
   * Missing messages go to the backend in batches of backend.maxBatchSize,
   * batches in parallel. Cache fills take no request signal: other requests
   * may be waiting on the same pending entry.
   */
  async embedMessages(messages: readonly Message[]): Promise<Result<Map<string, Vector>>> {
    const pending = new Map<string, Promise<Result<Vector>>>();
    const missing: Message[] = [];
    const queued = new Set<string>();

    for (const m of messages) {
      const cached = this.cache.lookup(m.id, m.text);
      if (cached) {
        pending.set(m.id, cached);
      } else if (!queued.has(m.id)) {
        queued.add(m.id);
        missing.push(m);
      }
    }

    const batchSize = Math.max(1, this.backend.maxBatchSize);
    for (let i = 0; i < missing.length; i += batchSize) {
      const batch = missing.slice(i, i + batchSize);
      const request = this.backend
        .embed(batch.map((m) => m.text))
        .catch((err: unknown) => error(getErrorMessage(err)));
      batch.forEach((m, j) => {
        const vector = request.then((result): Result<Vector> =>
          result.success ? success(Object.freeze(result.data[j] ?? [])) : result,
        );
        this.cache.reserve(m.id, m.text, vector);
        pending.set(m.id, vector);
      });
    }

    const vectors = new Map<string, Vector>();
    const entries = Array.from(pending.entries());
    const results = await Promise.all(entries.map(([, vector]) => vector));
    for (const [i, result] of results.entries()) {
      if (!result.success) return result;
      const [id] = entries[i];
      vectors.set(id, result.data);
    }
    return success(vectors);
  }

  /**
   * Embed a whole corpus up front so queries only pay for their own vector.
   */
  async warm(messages: readonly Message[]): Promise<Result<number>> {
    const started = Date.now();
    const result = await this.embedMessages(messages);
    if (!result.success) return result;
    console.log(`[EmbeddingIndex] Warmed ${result.data.size} message vectors in ${Date.now() - started}ms`);
    return success(result.data.size);
  }

  /**
   * Rank messages against a query vector. Returns at most `limit` candidates.
   */
  async rank(queryVector: Vector, messages: readonly Message[], options: RankOptions): Promise<Result<Candidate[]>> {
    const limit = Math.max(0, Math.floor(options.limit));
    if (limit === 0 || messages.length === 0) return success([]);

    const vectorsResult = await this.embedMessages(messages);
    if (!vectorsResult.success) return vectorsResult;
    const vectors = vectorsResult.data;

    const scored: Candidate[] = [];
    for (const message of messages) {
      const vector = vectors.get(message.id);
      if (!vector) {
        return error(`no embedding available for message ${message.id}`);
      }
      if (vector.length !== queryVector.length) {
        return error(`embedding dimension ${vector.length} does not match query dimension ${queryVector.length}`);
      }
      const similarityScore = cosineSimilarity(queryVector, vector);
      if (options.minSimilarity !== undefined && similarityScore < options.minSimilarity) continue;
      scored.push({ message, similarityScore });
    }

    return success(scored.sort(compareCandidates).slice(0, limit));
  }
}
