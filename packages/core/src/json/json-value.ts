import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;

/** Any value that survives a JSON round trip */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Integer-like keys enumerate first, then the rest in insertion order */
export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);
