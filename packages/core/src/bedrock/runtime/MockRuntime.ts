/**
 * Mock Runtime
 *
 * In-process BedrockRuntime for unit tests.
 * Answers from handler functions and records every call for assertions.
 */

import type {
  ContentBlock,
  ConverseCommandInput,
  ConverseCommandOutput,
  ConverseResponse,
  InvokeModelCommandInput,
} from '@aws-sdk/client-bedrock-runtime';
import type { JsonValue } from '../../framework';
import { Logger } from '../../utils/logger';
import type { BedrockRuntime, InvokeModelResult } from './types';

export type ConverseHandler = (input: ConverseCommandInput) => ConverseResponse | Promise<ConverseResponse>;

export type InvokeModelHandler = (
  input: InvokeModelCommandInput
) => InvokeModelResult | Promise<InvokeModelResult>;

export class MockRuntime implements BedrockRuntime {
  private converseHandler?: ConverseHandler;
  private invokeModelHandler?: InvokeModelHandler;
  private converseCalls: ConverseCommandInput[] = [];
  private invokeModelCalls: InvokeModelCommandInput[] = [];
  destroyed = false;

  constructor(handlers: { converse?: ConverseHandler; invokeModel?: InvokeModelHandler } = {}) {
    this.converseHandler = handlers.converse;
    this.invokeModelHandler = handlers.invokeModel;
    Logger.debug('[MockRuntime] Initialized for testing');
  }

  onConverse(handler: ConverseHandler): this {
    this.converseHandler = handler;
    return this;
  }

  onInvokeModel(handler: InvokeModelHandler): this {
    this.invokeModelHandler = handler;
    return this;
  }

  getConverseCalls(): ConverseCommandInput[] {
    return [...this.converseCalls];
  }

  getLastConverseCall(): ConverseCommandInput | undefined {
    return this.converseCalls[this.converseCalls.length - 1];
  }

  getInvokeModelCalls(): InvokeModelCommandInput[] {
    return [...this.invokeModelCalls];
  }

  async converse(input: ConverseCommandInput): Promise<ConverseResponse> {
    this.converseCalls.push(input);
    if (!this.converseHandler) {
      throw new Error('[MockRuntime] No converse handler configured');
    }
    return this.converseHandler(input);
  }

  async invokeModel(input: InvokeModelCommandInput): Promise<InvokeModelResult> {
    this.invokeModelCalls.push(input);
    if (!this.invokeModelHandler) {
      throw new Error('[MockRuntime] No invokeModel handler configured');
    }
    return this.invokeModelHandler(input);
  }

  destroy(): void {
    this.destroyed = true;
  }

  // ==========================================================================
  // Canned replies
  // ==========================================================================

  /**
   * A Converse reply whose assistant message holds the given blocks.
   */
  static converseReply(content: ContentBlock[]): ConverseCommandOutput {
    return {
      $metadata: { httpStatusCode: 200 },
      output: { message: { role: 'assistant', content } },
      stopReason: content.some(block => block.toolUse !== undefined) ? 'tool_use' : 'end_turn',
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      metrics: { latencyMs: 1 },
    };
  }

  /**
   * An InvokeModel reply carrying a JSON body.
   */
  static jsonReply(body: JsonValue): InvokeModelResult {
    return {
      body: new TextEncoder().encode(JSON.stringify(body)),
      contentType: 'application/json',
    };
  }

  /**
   * A Titan embedding reply.
   */
  static embeddingReply(embedding: number[], inputTextTokenCount = 1): InvokeModelResult {
    return MockRuntime.jsonReply({ embedding, inputTextTokenCount });
  }
}
