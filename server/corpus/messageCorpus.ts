/**
 * Message corpus.
 *
 * Responsibilities:
 * - Validate incoming records (ours or the upstream API's field names)
 * - Freeze messages so nothing downstream can mutate them
 * - Answer simple lookups (by id, distinct persons)
 *
 * This file MUST NOT:
 * - Call embedding or reasoning backends
 * - Rewrite message text (sanitization happens at the reasoning boundary)
 *
 * Layer: Corpus (in-memory, read-only after load)
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import { messageRecordSchema, type Message } from "@shared/schema";
import type { CorpusSource } from "../config/appConfig";

export type CorpusLoadReport = {
  accepted: number;
  skippedInvalid: number;
  skippedDuplicate: number;
};

export class MessageCorpus {
  private readonly messages: readonly Message[];
  private readonly byId: ReadonlyMap<string, Message>;

  constructor(messages: Message[]) {
    const byId = new Map<string, Message>();
    const frozen: Message[] = [];
    for (const m of messages) {
      if (byId.has(m.id)) continue;
      const copy = Object.freeze({ ...m });
      byId.set(copy.id, copy);
      frozen.push(copy);
    }
    this.messages = Object.freeze(frozen);
    this.byId = byId;
  }

  get size(): number {
    return this.messages.length;
  }

  all(): readonly Message[] {
    return this.messages;
  }

  get(id: string): Message | undefined {
    return this.byId.get(id);
  }

  /**
   * Distinct person names, in first-seen order.
   */
  persons(): string[] {
    return Array.from(new Set(this.messages.map((m) => m.person)));
  }

  /**
   * Message ids and upstream user ids. These are internal identifiers and must
   * never reach the reasoning step.
   */
  identifiers(): string[] {
    const ids = new Set<string>();
    for (const m of this.messages) {
      ids.add(m.id);
      if (m.userId) ids.add(m.userId);
    }
    return Array.from(ids);
  }
}

/**
 * Build a corpus from raw records. Invalid and duplicate-id records are
 * skipped and counted, never fatal.
 */
export function parseCorpus(records: unknown[]): { corpus: MessageCorpus; report: CorpusLoadReport } {
  const accepted: Message[] = [];
  const seen = new Set<string>();
  let skippedInvalid = 0;
  let skippedDuplicate = 0;

  for (const record of records) {
    const parsed = messageRecordSchema.safeParse(record);
    if (!parsed.success) {
      skippedInvalid++;
      continue;
    }
    if (seen.has(parsed.data.id)) {
      skippedDuplicate++;
      continue;
    }
    seen.add(parsed.data.id);
    accepted.push(parsed.data);
  }

  if (skippedInvalid > 0 || skippedDuplicate > 0) {
    console.warn(`[Corpus] Skipped ${skippedInvalid} invalid and ${skippedDuplicate} duplicate records`);
  }

  return {
    corpus: new MessageCorpus(accepted),
    report: { accepted: accepted.length, skippedInvalid, skippedDuplicate },
  };
}

// The messages API wraps records as { items: [...] }; dumps may be a bare array.
const payloadSchema = z.union([
  z.array(z.unknown()),
  z.object({ items: z.array(z.unknown()) }).transform((p) => p.items),
]);

export function parseCorpusPayload(payload: unknown): { corpus: MessageCorpus; report: CorpusLoadReport } {
  return parseCorpus(payloadSchema.parse(payload));
}

export async function loadCorpusFromFile(filePath: string): Promise<MessageCorpus> {
  const raw = await readFile(filePath, "utf-8");
  const { corpus, report } = parseCorpusPayload(JSON.parse(raw));
  console.log(`[Corpus] Loaded ${report.accepted} messages from ${filePath}`);
  return corpus;
}

export async function fetchCorpus(
  url: string,
  fetchImpl: typeof fetch = fetch,
): Promise<MessageCorpus> {
  const response = await fetchImpl(url, { headers: { Accept: "application/json" } });
  if (!response.ok) {
    throw new Error(`[Corpus] Messages API returned ${response.status} for ${url}`);
  }
  const { corpus, report } = parseCorpusPayload(await response.json());
  console.log(`[Corpus] Loaded ${report.accepted} messages from ${url}`);
  return corpus;
}

export function loadCorpus(source: CorpusSource): Promise<MessageCorpus> {
  return source.kind === "file" ? loadCorpusFromFile(source.path) : fetchCorpus(source.url);
}
