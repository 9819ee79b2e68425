export type { BedrockRuntime, InvokeModelResult, RuntimeConfig } from './types';
export { BedrockRuntimeAdapter } from './BedrockRuntimeAdapter';
export { MockRuntime, type ConverseHandler, type InvokeModelHandler } from './MockRuntime';
