import { z } from "zod";
import type { JsonValue } from "../types/JsonValue.ts";

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Accepts any JSON value, nested to any depth.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([scalarSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)])
);
