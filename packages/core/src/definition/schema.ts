/**
 * Zod schemas for builder input.
 *
 * Only the textual shape is checked here; structural rules (arity,
 * references, duplicates) are finalize()'s job.
 */

import { z } from "zod";

const NO_WHITESPACE = /^\S+$/;

const ShortFlagSchema = z
  .string()
  .refine((s) => [...s].length === 1 && s !== "-" && s !== "=", "must be a single character other than '-' or '='");

const LongFlagSchema = z
  .string()
  .min(1, "must not be empty")
  .refine((s) => !s.startsWith("-"), "must not start with '-'")
  .refine((s) => !s.includes("=") && NO_WHITESPACE.test(s), "must not contain '=' or whitespace");

export const CommandNameSchema = z
  .string()
  .min(1, "must not be empty")
  .regex(NO_WHITESPACE, "must not contain whitespace")
  .refine((s) => !s.startsWith("-"), "must not start with '-'");

export const ArgumentOptionsSchema = z.object({
  name: z.string().min(1, "must not be empty").regex(NO_WHITESPACE, "must not contain whitespace"),
  short: ShortFlagSchema.optional(),
  long: z.union([LongFlagSchema, z.literal(false)]).optional(),
  shortAliases: z.array(ShortFlagSchema).optional(),
  aliases: z.array(LongFlagSchema).optional(),
  env: z.string().min(1, "must not be empty").optional(),
  configKey: z
    .string()
    .min(1, "must not be empty")
    .refine((s) => s.split(".").every((part) => part.length > 0), "must not contain empty segments")
    .optional(),
  group: z.string().min(1, "must not be empty").optional(),
  conflictsWith: z.array(z.string().min(1)).optional(),
  requires: z.array(z.string().min(1)).optional(),
  valueName: z.string().min(1).optional(),
});

export const GroupOptionsSchema = z.object({
  id: z.string().min(1, "must not be empty").regex(NO_WHITESPACE, "must not contain whitespace"),
  members: z.array(z.string().min(1)).optional(),
  conflictsWith: z.array(z.string().min(1)).optional(),
});
