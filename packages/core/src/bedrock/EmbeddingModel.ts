/**
 * Bedrock Embedding Model
 *
 * EmbeddingModel over InvokeModel, speaking the Titan text-embedding
 * envelope. Every text is one call; a batch either embeds every text or
 * fails with the first error.
 */

import {
  EmbeddingError,
  EmbeddingJsonError,
  EmbeddingProviderError,
  EmbeddingResponseError,
  type Embedding,
  type EmbeddingModel,
} from '../framework';
import {
  EmbeddingResponseSchema,
  describeValidationErrors,
  formatZodErrors,
  type EmbeddingRequestBody,
  type EmbeddingResponseBody,
} from '../schemas';
import { Logger } from '../utils/logger';
import { classifyBedrockError } from './error-classifier';
import type { EmbeddingModelSpec } from './models';
import type { BedrockRuntime, InvokeModelResult } from './runtime';

/** Largest batch a single embedTexts call accepts */
export const MAX_DOCUMENTS = 1024;

export class BedrockEmbeddingModel implements EmbeddingModel {
  readonly maxDocuments = MAX_DOCUMENTS;

  constructor(
    private readonly runtime: BedrockRuntime,
    private readonly model: EmbeddingModelSpec
  ) {}

  get modelId(): string {
    return this.model.modelId;
  }

  ndims(): number {
    return this.model.ndims;
  }

  /**
   * Embed one request body and return the decoded reply.
   */
  async documentToEmbeddings(request: EmbeddingRequestBody): Promise<EmbeddingResponseBody> {
    let result: InvokeModelResult;
    try {
      result = await this.runtime.invokeModel({
        modelId: this.model.modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify(request),
      });
    } catch (error) {
      const classified = classifyBedrockError(error);
      Logger.error(
        `[BedrockEmbedding] ✗ Request failed for model ${this.model.modelId}: ${classified.message}`
      );
      throw new EmbeddingProviderError(classified.message, {
        errorCode: classified.code,
        cause: error,
      });
    }

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(result.body);
    } catch (error) {
      throw new EmbeddingResponseError('Response body is not valid UTF-8', { cause: error });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new EmbeddingJsonError(
        `Response body is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingJsonError(
        `Unexpected embedding response: ${describeValidationErrors(formatZodErrors(parsed.error))}`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  async embedTexts(texts: Iterable<string>): Promise<Embedding[]> {
    const documents = [...texts];
    Logger.debug(`[BedrockEmbedding] Embedding ${documents.length} texts with ${this.model.modelId}`);

    const embeddings: Embedding[] = [];
    for (const document of documents) {
      try {
        const response = await this.documentToEmbeddings({
          inputText: document,
          dimensions: this.ndims(),
          normalize: true,
        });
        embeddings.push({ document, vec: response.embedding });
      } catch (error) {
        if (!(error instanceof EmbeddingError)) {
          throw error;
        }
        throw new EmbeddingResponseError(error.message, { cause: error });
      }
    }

    Logger.info(`[BedrockEmbedding] ✓ Embedded ${embeddings.length} texts`);
    return embeddings;
  }

  async embedText(text: string): Promise<Embedding> {
    const [embedding] = await this.embedTexts([text]);
    return embedding;
  }
}
