/**
 * Zod validation helpers.
 */

import type { ZodIssue, ZodType, ZodTypeDef } from "zod";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; issues: string[] };

/** Validate input against a Zod schema, returning a structured result. */
export function validateInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const issues = result.error.issues.map(formatZodIssue);
  return { success: false, error: issues.join("; "), issues };
}

/** Format one issue as "path: message". */
export function formatZodIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${path}${issue.message}`;
}
