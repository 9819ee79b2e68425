/**
 * Titan embedding envelope.
 *
 * Request:  { inputText, dimensions, normalize }
 * Response: { embedding, inputTextTokenCount }
 */

import { z } from 'zod';

export interface EmbeddingRequestBody {
  inputText: string;
  dimensions: number;
  normalize: boolean;
}

export const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
  inputTextTokenCount: z.number().int().nonnegative(),
});

export type EmbeddingResponseBody = z.infer<typeof EmbeddingResponseSchema>;
