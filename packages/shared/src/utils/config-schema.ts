/**
 * Zod schemas for the external value sources the engine accepts.
 *
 * Loading and decoding files is the caller's job; these schemas check that
 * what was decoded has a shape the precedence resolver understands.
 */

import { z } from "zod";
import type { ConfigMapping, ConfigValue, EnvironmentSnapshot } from "@argloom/sdk";

export const ConfigValueSchema: z.ZodType<ConfigValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(ConfigValueSchema),
    z.record(ConfigValueSchema),
  ]),
);

export const ConfigMappingSchema: z.ZodType<ConfigMapping, z.ZodTypeDef, unknown> = z.record(ConfigValueSchema);

export const EnvironmentSchema: z.ZodType<EnvironmentSnapshot, z.ZodTypeDef, unknown> = z.record(z.string().optional());
