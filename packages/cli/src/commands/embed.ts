/**
 * Embed Command
 *
 * Embeds each text with a Titan-compatible model and prints a preview of
 * every vector.
 *
 * Usage:
 *   bedrock-adapter embed "first text" "second text"
 *   bedrock-adapter embed "hello" --dimensions 256
 *   bedrock-adapter embed "hello" --model cohere.custom-v1 --dimensions 384
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  Client,
  TITAN_TEXT_EMBEDDINGS_V2,
  TITAN_V2_DIMENSIONS,
  customEmbeddingModel,
  isTitanV2Dimensions,
  resolveModelId,
  titanTextEmbeddingsV2,
  type Embedding,
  type EmbeddingModelSpec,
} from '@bedrock-adapter/core';
import { applyCommonOptions, buildClient, parseIntegerOption, type CommonOptions } from './options';

export interface EmbedCommandOptions extends CommonOptions {
  model: string;
  dimensions?: string;
}

const PREVIEW_VALUES = 4;

export function resolveEmbeddingModel(options: EmbedCommandOptions): EmbeddingModelSpec {
  const dimensions = parseIntegerOption('dimensions', options.dimensions);

  if (resolveModelId(options.model) !== TITAN_TEXT_EMBEDDINGS_V2) {
    if (dimensions === undefined) {
      throw new Error(`--dimensions is required for model ${options.model}`);
    }
    return customEmbeddingModel(options.model, dimensions);
  }

  if (dimensions === undefined) {
    return titanTextEmbeddingsV2();
  }
  if (!isTitanV2Dimensions(dimensions)) {
    throw new Error(
      `--dimensions must be one of ${TITAN_V2_DIMENSIONS.join(', ')} for ${TITAN_TEXT_EMBEDDINGS_V2}`
    );
  }
  return titanTextEmbeddingsV2(dimensions);
}

export function runEmbedding(
  client: Client,
  texts: string[],
  options: EmbedCommandOptions
): Promise<Embedding[]> {
  return client.embeddingModel(resolveEmbeddingModel(options)).embedTexts(texts);
}

export function formatEmbedding(embedding: Embedding): string {
  const preview = embedding.vec.slice(0, PREVIEW_VALUES).map(value => value.toFixed(4));
  const more = embedding.vec.length > PREVIEW_VALUES ? ', ...' : '';
  const dims = `${embedding.vec.length} dims`;
  return `${JSON.stringify(embedding.document)}: ${dims} [${preview.join(', ')}${more}]`;
}

export async function embedCommand(texts: string[], options: EmbedCommandOptions): Promise<void> {
  applyCommonOptions(options);

  const spinner = ora(`Embedding ${texts.length} texts...`).start();
  let client: Client | undefined;

  try {
    client = buildClient(options);
    const embeddings = await runEmbedding(client, texts, options);
    spinner.succeed(`Embedded ${embeddings.length} texts`);

    embeddings.forEach(embedding => {
      console.log(`  ${chalk.green('✓')} ${formatEmbedding(embedding)}`);
    });
  } catch (error) {
    spinner.fail('Embedding failed');
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  } finally {
    client?.destroy();
  }
}
