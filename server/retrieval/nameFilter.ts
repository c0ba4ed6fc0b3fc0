/**
 * Person name filter.
 *
 * Responsibilities:
 * - Normalize names (case, whitespace, diacritics, possessives)
 * - Match partial names against full-name records ("Sophia" -> "Sophia Al-Farsi")
 * - Pull a target name out of a question using the corpus's own persons
 *
 * Pure functions only. A target that matches nobody broadens to the full
 * input instead of failing; callers decide what an unmatched name means.
 *
 * Layer: Retrieval (deterministic, no backend calls)
 */

import type { Message } from "@shared/schema";
import { RETRIEVAL_CONSTANTS } from "../config/constants";

export type NameFilterResult = {
  messages: readonly Message[];
  matched: boolean;
};

const QUESTION_STOPWORDS = new Set([
  "a", "about", "all", "an", "and", "are", "as", "at", "be", "did", "do", "does",
  "for", "from", "has", "have", "how", "i", "in", "is", "it", "many", "me", "much",
  "my", "of", "on", "or", "said", "say", "tell", "that", "the", "their", "this",
  "to", "was", "were", "what", "when", "where", "which", "who", "why", "will", "with",
]);

/**
 * "  Zoë  O'Brien's " -> "zoe obrien"
 */
export function normalizeName(s: string): string {
  return s
    .normalize("NFD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/['’]s\b/g, "")
    .replace(/['’]/g, "")
    .replace(/[^\p{L}\p{N}\s-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Tokens split on whitespace and hyphens.
 * "Sophia Al-Farsi" -> ["sophia", "al", "farsi"]
 */
export function nameTokens(s: string): string[] {
  return normalizeName(s).split(/[\s-]+/).filter(Boolean);
}

/**
 * A record matches when the normalized names are equal, or every target token
 * is one of the record's tokens. No substring matching: "al" never matches "alan".
 */
export function personMatches(person: string, target: string): boolean {
  const normalizedTarget = normalizeName(target);
  if (!normalizedTarget) return false;
  if (normalizeName(person) === normalizedTarget) return true;

  const targetTokens = nameTokens(target);
  if (targetTokens.length === 0) return false;
  const personTokens = new Set(nameTokens(person));
  return targetTokens.every((t) => personTokens.has(t));
}

export function filterByPerson(
  messages: readonly Message[],
  targetPerson: string | undefined,
): NameFilterResult {
  if (!targetPerson || !normalizeName(targetPerson)) {
    return { messages, matched: false };
  }
  const filtered = messages.filter((m) => personMatches(m.person, targetPerson));
  if (filtered.length === 0) {
    return { messages, matched: false };
  }
  return { messages: filtered, matched: true };
}

/**
 * Find the longest run of question tokens that names a corpus person, either
 * by full name or by a single name token. Returns that run as written in the
 * normalized question, or undefined.
 */
export function extractTargetPerson(question: string, persons: readonly string[]): string | undefined {
  const questionTokens = nameTokens(question);
  if (questionTokens.length === 0) return undefined;

  const fullNames = new Set<string>();
  const partialTokens = new Set<string>();
  for (const person of persons) {
    const tokens = nameTokens(person);
    if (tokens.length === 0) continue;
    fullNames.add(tokens.join(" "));
    for (const t of tokens) {
      if (t.length >= RETRIEVAL_CONSTANTS.MIN_NAME_TOKEN_LENGTH && !QUESTION_STOPWORDS.has(t)) {
        partialTokens.add(t);
      }
    }
  }

  let best: string | undefined;
  let bestLength = 0;
  for (let start = 0; start < questionTokens.length; start++) {
    for (let end = questionTokens.length; end > start; end--) {
      const length = end - start;
      if (length <= bestLength) break;
      const run = questionTokens.slice(start, end).join(" ");
      const isName = fullNames.has(run) || (length === 1 && partialTokens.has(run));
      if (isName) {
        best = run;
        bestLength = length;
        break;
      }
    }
  }
  return best;
}
