/**
 * Centralized Not-Found Messages
 *
 * Consistent answers for questions the pipeline cannot answer from the
 * messages. Used by ask() in place of a synthesized answer.
 */

export interface NotFoundContext {
  targetPerson?: string | null;
}

/**
 * If the user named someone we have no messages from, say that instead of
 * asking them to repeat the name.
 */
export function getNoInformationMessage(ctx: NotFoundContext): string {
  const { targetPerson } = ctx;

  if (targetPerson) {
    return `I couldn't find any messages from "${targetPerson}", so I can't answer that. The name might be spelled differently in the messages.`;
  }

  return "I couldn't find that information in the messages.";
}

export function getClarifyingMessage(reason: string): string {
  return `I couldn't answer that: ${reason}. Please ask a question about a member, for example "When is Layla planning her trip to London?"`;
}
