import { z } from 'zod';
import type { JsonValue } from '../framework';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Parse JSON text into a JsonValue.
 *
 * @throws Error when the text is not JSON
 */
export function parseJsonValue(text: string): JsonValue {
  return JsonValueSchema.parse(JSON.parse(text));
}
