/**
 * Prompt Version Management
 *
 * Date-based versions: YYYY-MM-DD-NNN (e.g., 2026-10-12-001).
 * Every Answer records the version of the prompt that produced it.
 *
 * When updating a prompt:
 * 1. Increment the version number
 * 2. Add an entry to PROMPT_CHANGE_LOG with the reason
 */

export type PromptVersions = {
  ANSWER_SYSTEM_PROMPT: string;
  COUNT_ANSWER_PROMPT: string;
};

export const PROMPT_VERSIONS: PromptVersions = {
  ANSWER_SYSTEM_PROMPT: "2026-10-14-002",
  COUNT_ANSWER_PROMPT: "2026-10-14-001",
};

export const PROMPT_CHANGE_LOG: Record<keyof PromptVersions, Array<{ version: string; reason: string; date: string }>> = {
  ANSWER_SYSTEM_PROMPT: [
    { version: "2026-10-14-002", reason: "Tell the model about redaction markers so it stops answering with guessed phone numbers", date: "2026-10-14" },
    { version: "2026-10-12-001", reason: "Initial version", date: "2026-10-12" },
  ],
  COUNT_ANSWER_PROMPT: [
    { version: "2026-10-14-001", reason: "Count questions answer as JSON so the count is machine-readable", date: "2026-10-14" },
  ],
};

export function getPromptVersion(promptName: keyof PromptVersions): string {
  return PROMPT_VERSIONS[promptName];
}
