export * from './errors';
export * from './document-codec';
export * from './content-mapper';
export * from './error-classifier';
export * from './models';
export * from './runtime';
export { BedrockCompletionModel, buildConverseRequest, parseConverseResponse } from './CompletionModel';
export { BedrockEmbeddingModel, MAX_DOCUMENTS } from './EmbeddingModel';
export { Client, ClientBuilder } from './Client';
