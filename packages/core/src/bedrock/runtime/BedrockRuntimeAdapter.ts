/**
 * Bedrock Runtime Adapter
 *
 * BedrockRuntime backed by the AWS SDK client.
 */

import {
  BedrockRuntimeClient,
  ConverseCommand,
  InvokeModelCommand,
  type ConverseCommandInput,
  type ConverseResponse,
  type InvokeModelCommandInput,
} from '@aws-sdk/client-bedrock-runtime';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { Logger } from '../../utils/logger';
import type { BedrockRuntime, InvokeModelResult, RuntimeConfig } from './types';

export class BedrockRuntimeAdapter implements BedrockRuntime {
  private client: BedrockRuntimeClient;

  constructor(config: RuntimeConfig) {
    this.client = new BedrockRuntimeClient({
      region: config.region,
      maxAttempts: config.maxAttempts,
      requestHandler: new NodeHttpHandler({
        requestTimeout: config.timeout,
        connectionTimeout: config.connectionTimeout,
        throwOnRequestTimeout: true,
      }),
    });

    Logger.info(
      `[BedrockRuntime] Initialized for region: ${config.region} (timeout: ${config.timeout}ms)`
    );
  }

  async converse(input: ConverseCommandInput): Promise<ConverseResponse> {
    return this.client.send(new ConverseCommand(input));
  }

  async invokeModel(input: InvokeModelCommandInput): Promise<InvokeModelResult> {
    const response = await this.client.send(new InvokeModelCommand(input));
    return { body: response.body, contentType: response.contentType };
  }

  destroy(): void {
    this.client.destroy();
    Logger.info('[BedrockRuntime] ✓ Client destroyed');
  }
}
