/**
 * Bedrock Client
 *
 * Builds the runtime once and hands it to every model, agent, extractor and
 * embeddings builder made from it. The client holds no per-request state and
 * can be shared by concurrent callers.
 *
 * Usage:
 *   const client = Client.builder().region('us-west-2').build();
 *   const agent = client.agent(BedrockModel.NOVA_LITE).preamble('Be brief.').build();
 *   const reply = await agent.prompt('Hello');
 *
 *   // For testing
 *   const client = Client.builder().runtime(new MockRuntime({ converse })).build();
 */

import type { ConverseResponse } from '@aws-sdk/client-bedrock-runtime';
import type { z } from 'zod';
import {
  AgentBuilder,
  EmbeddingsBuilder,
  ExtractorBuilder,
  type EmbedTexts,
  type JsonObject,
} from '../framework';
import {
  resolveClientConfig,
  type ClientConfig,
  type ClientConfigInput,
} from '../schemas';
import { Logger } from '../utils/logger';
import { BedrockCompletionModel } from './CompletionModel';
import { BedrockEmbeddingModel } from './EmbeddingModel';
import type { BedrockModelId, EmbeddingModelSpec } from './models';
import { BedrockRuntimeAdapter, type BedrockRuntime } from './runtime';

export class ClientBuilder {
  private readonly config: ClientConfigInput = {};
  private runtimeOverride?: BedrockRuntime;

  region(region: string): this {
    this.config.region = region;
    return this;
  }

  /** Request timeout in ms */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  connectionTimeout(ms: number): this {
    this.config.connectionTimeout = ms;
    return this;
  }

  /** Attempts the SDK retry strategy may make per call */
  maxAttempts(attempts: number): this {
    this.config.maxAttempts = attempts;
    return this;
  }

  /**
   * Use this runtime instead of creating an SDK client.
   */
  runtime(runtime: BedrockRuntime): this {
    this.runtimeOverride = runtime;
    return this;
  }

  /**
   * @throws ConfigurationError when the settings do not validate
   */
  build(env: NodeJS.ProcessEnv = process.env): Client {
    const config = resolveClientConfig(this.config, env);
    const runtime = this.runtimeOverride ?? new BedrockRuntimeAdapter(config);
    return new Client(runtime, config);
  }
}

export class Client {
  constructor(
    readonly runtime: BedrockRuntime,
    readonly config: ClientConfig
  ) {}

  static builder(): ClientBuilder {
    return new ClientBuilder();
  }

  /**
   * A client configured from AWS_REGION and BEDROCK_TIMEOUT_MS alone.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Client {
    return new ClientBuilder().build(env);
  }

  completionModel(model: BedrockModelId): BedrockCompletionModel {
    return new BedrockCompletionModel(this.runtime, model);
  }

  agent(model: BedrockModelId): AgentBuilder<ConverseResponse> {
    return new AgentBuilder(this.completionModel(model));
  }

  /**
   * @param schema - validates what the model submits
   * @param parameters - JSON Schema of the same shape, shown to the model
   */
  extractor<T>(
    model: BedrockModelId,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    parameters: JsonObject
  ): ExtractorBuilder<T, ConverseResponse> {
    return new ExtractorBuilder(this.completionModel(model), schema, parameters);
  }

  embeddingModel(model: EmbeddingModelSpec): BedrockEmbeddingModel {
    return new BedrockEmbeddingModel(this.runtime, model);
  }

  embeddings<T>(model: EmbeddingModelSpec, toTexts: EmbedTexts<T>): EmbeddingsBuilder<T> {
    return new EmbeddingsBuilder(this.embeddingModel(model), toTexts);
  }

  destroy(): void {
    this.runtime.destroy();
    Logger.debug('[Client] Runtime released');
  }
}
