/**
 * Invocation id generation using Node.js crypto.
 */

import { randomUUID } from "node:crypto";

/** Short random id used to correlate the log lines of one parse/run call. */
export function generateId(): string {
  return randomUUID().slice(0, 8);
}
