/**
 * @bedrock-adapter/cli
 *
 * Example command-line program for the Bedrock adapter.
 */

export { completeCommand, formatChoice, runCompletion } from './commands/complete';
export { embedCommand, formatEmbedding, resolveEmbeddingModel, runEmbedding } from './commands/embed';
export { formatModels, modelsCommand } from './commands/models';
