/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts live here. Structure:
 * - answer.ts: answer synthesis system prompt and per-shape instructions
 * - versions.ts: prompt versions and change log
 */

export * from "./answer";
export * from "./versions";
