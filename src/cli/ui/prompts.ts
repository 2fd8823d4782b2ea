/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

/**
 * Yes/no question defaulting to "no". Cancelling (Ctrl+C) counts as "no".
 */
export async function confirmRemoval(message: string): Promise<boolean> {
  const answer = await p.confirm({ message, initialValue: false });
  return !p.isCancel(answer) && answer;
}
