export * from './json';
export * from './message';
export * from './tool';
export * from './completion';
export * from './embeddings';
export * from './errors';
export { CompletionRequestBuilder } from './CompletionRequestBuilder';
export { Agent, AgentBuilder } from './Agent';
export { Extractor, ExtractorBuilder, SUBMIT_TOOL_NAME } from './Extractor';
export { EmbeddingsBuilder, type EmbedTexts, type EmbeddedDocument } from './EmbeddingsBuilder';
