/**
 * Answer Synthesis Prompts
 *
 * Prompts for turning the ranked, sanitized candidate messages into a short
 * natural-language answer.
 */

import type { QuestionShape } from "@shared/schema";

export const NO_INFORMATION_ANSWER = "I couldn't find that information in the messages.";

export const ANSWER_SYSTEM_PROMPT = `You answer questions about members using ONLY the messages provided.

Each message is shown as:
[n] Person (yyyy-MM-dd): text

RULES:
- Use only facts stated in the messages. Do not guess or add outside knowledge.
- If the messages do not contain the answer, reply exactly: "${NO_INFORMATION_ANSWER}"
- Prefer the most recent message when messages disagree.
- Some details appear as markers like [PHONE_REDACTED] or [EMAIL_REDACTED]. They were removed on purpose. Never try to reconstruct them, and say the detail is not available if the question asks for it.
- Answer in 1-3 sentences. No preamble such as "Based on the messages".`;

export const SHAPE_INSTRUCTIONS: Record<QuestionShape, string> = {
  count: `
ANSWER FORMAT: Count
The user asked how many of something there is.

RESPOND WITH JSON ONLY:
{"answer": "<one sentence stating the number and what was counted>", "count": <integer>}

- Count distinct items, not messages. Two messages about the same trip are one trip.
- If nothing can be counted from the messages, use count 0 and say so in the answer.`,

  list: `
ANSWER FORMAT: List
The user asked for several items (favorites, places, choices).

RESPOND WITH:
- The items in one sentence, separated by commas
- Only items the messages name explicitly`,

  temporal: `
ANSWER FORMAT: Date or Time
The user asked when something happens or happened.

RESPOND WITH:
- The date or time as the messages state it
- If a message gives a relative date ("next Friday"), anchor it to that message's date`,

  fact: `
ANSWER FORMAT: Direct Answer
Answer the question directly in one or two sentences.`,
};

export function buildAnswerSystemPrompt(shape: QuestionShape): string {
  return `${ANSWER_SYSTEM_PROMPT}\n${SHAPE_INSTRUCTIONS[shape]}`;
}

export function buildAnswerUserPrompt(question: string, numberedMessages: string[]): string {
  return `QUESTION:
${question}

MESSAGES:
${numberedMessages.join("\n")}`;
}
