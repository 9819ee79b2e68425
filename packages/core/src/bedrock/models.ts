/**
 * Bedrock model catalogue.
 *
 * Known ids are listed for convenience; any other Bedrock model id (or
 * inference profile ARN) passes through verbatim.
 */

// ============================================================================
// Completion models
// ============================================================================

export const BedrockModel = {
  NOVA_MICRO: 'amazon.nova-micro-v1:0',
  NOVA_LITE: 'amazon.nova-lite-v1:0',
  NOVA_PRO: 'amazon.nova-pro-v1:0',
  MIXTRAL_8X7B_INSTRUCT: 'mistral.mixtral-8x7b-instruct-v0:1',
  CLAUDE_3_HAIKU: 'anthropic.claude-3-haiku-20240307-v1:0',
  CLAUDE_3_5_SONNET: 'anthropic.claude-3-5-sonnet-20240620-v1:0',
  LLAMA_3_8B_INSTRUCT: 'meta.llama3-8b-instruct-v1:0',
} as const;
export type KnownBedrockModel = (typeof BedrockModel)[keyof typeof BedrockModel];

/** A catalogue id, or any other id Bedrock accepts. */
export type BedrockModelId = KnownBedrockModel | (string & {});

/**
 * Strip the `bedrock:` prefix some configs put in front of model ids.
 */
export function resolveModelId(modelId: string): string {
  return modelId.replace(/^bedrock:/, '').trim();
}

// ============================================================================
// Embedding models
// ============================================================================

export const TITAN_TEXT_EMBEDDINGS_V2 = 'amazon.titan-embed-text-v2:0';

/** Output sizes Titan Text Embeddings V2 supports */
export const TITAN_V2_DIMENSIONS = [256, 512, 1024] as const;
export type TitanV2Dimensions = (typeof TITAN_V2_DIMENSIONS)[number];

export interface EmbeddingModelSpec {
  modelId: string;
  ndims: number;
}

export function titanTextEmbeddingsV2(ndims: TitanV2Dimensions = 1024): EmbeddingModelSpec {
  return { modelId: TITAN_TEXT_EMBEDDINGS_V2, ndims };
}

export function isTitanV2Dimensions(value: number): value is TitanV2Dimensions {
  return TITAN_V2_DIMENSIONS.some(size => size === value);
}

/**
 * Any embedding model that speaks the Titan request envelope.
 */
export function customEmbeddingModel(modelId: string, ndims: number): EmbeddingModelSpec {
  if (!Number.isInteger(ndims) || ndims <= 0) {
    throw new Error(`Embedding dimensions must be a positive integer, got ${ndims}`);
  }
  return { modelId: resolveModelId(modelId), ndims };
}

// ============================================================================
// Listing
// ============================================================================

export interface CatalogueEntry {
  name: string;
  modelId: string;
  kind: 'completion' | 'embedding';
}

export function listModels(): CatalogueEntry[] {
  const completion = Object.entries(BedrockModel).map(
    ([name, modelId]): CatalogueEntry => ({ name, modelId, kind: 'completion' })
  );
  return [
    ...completion,
    { name: 'TITAN_TEXT_EMBEDDINGS_V2', modelId: TITAN_TEXT_EMBEDDINGS_V2, kind: 'embedding' },
  ];
}
