/**
 * Request building
 */

import { HEADERS } from "../constants.js";
import type { Message } from "../types.js";
import { isMessage } from "../types.js";

/**
 * Build the message list for a question.
 *
 * The question always comes first as a "user" message, followed by the
 * well-formed history entries in their original order. Entries without a
 * string role and content are skipped, not reported.
 *
 * @param question - The new question
 * @param history - Prior messages; never mutated
 * @returns A fresh array of fresh message objects
 */
export function buildQuery(
  question: string,
  history: readonly unknown[] = [],
): Message[] {
  const messages: Message[] = [{ role: "user", content: question }];

  for (const entry of history) {
    if (!isMessage(entry)) {
      continue;
    }
    messages.push({ role: entry.role, content: entry.content });
  }

  return messages;
}

/**
 * Build the authorization and content-type headers.
 */
export function buildAuthHeaders(apiKey: string): Record<string, string> {
  return {
    [HEADERS.AUTHORIZATION]: `Bearer ${apiKey}`,
    [HEADERS.CONTENT_TYPE]: "application/json",
  };
}
