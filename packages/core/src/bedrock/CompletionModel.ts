/**
 * Bedrock Completion Model
 *
 * CompletionModel over the Converse API. Each completion is one Converse
 * call: prior turns plus a new user turn holding the prompt and its
 * attachments, with the preamble as the system block.
 */

import type {
  ContentBlock,
  ConverseCommandInput,
  ConverseResponse,
  InferenceConfiguration,
  Message as BedrockMessage,
  Tool as BedrockTool,
} from '@aws-sdk/client-bedrock-runtime';
import {
  CompletionProviderError,
  CompletionRequestBuilder,
  CompletionRequestError,
  CompletionResponseError,
  promptWithContext,
  type CompletionModel,
  type CompletionRequest,
  type CompletionResponse,
  type ModelChoice,
  type ToolDefinition,
} from '../framework';
import { Logger, LogLevel } from '../utils/logger';
import { fromMessage, intoMessage, intoToolCall } from './content-mapper';
import { toWireDocument } from './document-codec';
import { classifyBedrockError } from './error-classifier';
import { BuildError, IntegrationError } from './errors';
import { resolveModelId, type BedrockModelId } from './models';
import type { BedrockRuntime } from './runtime';

// ============================================================================
// Request assembly
// ============================================================================

/**
 * Assemble the Converse input for a completion request.
 *
 * History turns are replayed leniently (unsupported items are dropped); the
 * new turn is plain text and always maps.
 *
 * @throws IntegrationError when a turn or tool cannot be put on the wire
 */
export function buildConverseRequest(
  modelId: string,
  request: CompletionRequest
): ConverseCommandInput {
  const messages: BedrockMessage[] = request.chatHistory.map(fromMessage);
  messages.push({ role: 'user', content: [{ text: promptWithContext(request) }] });

  const inferenceConfig: InferenceConfiguration = {};
  if (request.temperature !== undefined) {
    inferenceConfig.temperature = request.temperature;
  }
  if (request.maxTokens !== undefined) {
    inferenceConfig.maxTokens = request.maxTokens;
  }

  const input: ConverseCommandInput = { modelId, messages, inferenceConfig };

  if (request.additionalParams !== undefined) {
    input.additionalModelRequestFields = toWireDocument(request.additionalParams);
  }

  // Bedrock rejects a toolConfig with an empty tool list
  if (request.tools.length > 0) {
    input.toolConfig = { tools: request.tools.map(toToolSpec) };
  }

  if (request.preamble !== undefined) {
    input.system = [{ text: request.preamble }];
  }

  return input;
}

function toToolSpec(tool: ToolDefinition): BedrockTool {
  if (tool.name.trim() === '') {
    throw new BuildError('tool name is missing');
  }
  return {
    toolSpec: {
      name: tool.name,
      description: tool.description,
      inputSchema: { json: toWireDocument(tool.parameters) },
    },
  };
}

// ============================================================================
// Reply handling
// ============================================================================

/**
 * Pick the model's choice out of a Converse reply.
 * The first tool use wins over any text; otherwise the first text block.
 */
export function parseConverseResponse(response: ConverseResponse): ModelChoice {
  if (response.output === undefined) {
    throw new CompletionProviderError("Model didn't return any converse output");
  }
  const message = response.output.message;
  if (message === undefined) {
    throw new CompletionProviderError('Failed to extract message from converse output');
  }

  const blocks: ContentBlock[] = message.content ?? [];

  const toolUse = blocks.find(block => block.toolUse !== undefined)?.toolUse;
  if (toolUse !== undefined) {
    try {
      const call = intoToolCall(toolUse);
      return {
        type: 'toolCall',
        name: call.function.name,
        id: call.id,
        arguments: call.function.arguments,
      };
    } catch (error) {
      if (error instanceof IntegrationError) {
        throw new CompletionResponseError(error.message, { cause: error });
      }
      throw error;
    }
  }

  const text = blocks.find(block => block.text !== undefined)?.text;
  if (text !== undefined) {
    return { type: 'message', text };
  }

  throw new CompletionResponseError('Response did not contain a message or tool call');
}

// ============================================================================
// Model
// ============================================================================

export class BedrockCompletionModel implements CompletionModel<ConverseResponse> {
  readonly modelId: string;

  constructor(
    private readonly runtime: BedrockRuntime,
    modelId: BedrockModelId
  ) {
    this.modelId = resolveModelId(modelId);
  }

  /**
   * Start a request against this model.
   */
  completionRequest(prompt: string): CompletionRequestBuilder<ConverseResponse> {
    return new CompletionRequestBuilder(this, prompt);
  }

  async completion(request: CompletionRequest): Promise<CompletionResponse<ConverseResponse>> {
    let input: ConverseCommandInput;
    try {
      input = buildConverseRequest(this.modelId, request);
    } catch (error) {
      if (error instanceof IntegrationError) {
        Logger.error(`[BedrockCompletion] ✗ Could not build request: ${error.message}`);
        throw new CompletionRequestError(error.message, { cause: error });
      }
      throw error;
    }

    Logger.info(`[BedrockCompletion] Invoking model: ${this.modelId}`);
    const startTime = Date.now();

    let response: ConverseResponse;
    try {
      response = await this.runtime.converse(input);
    } catch (error) {
      const classified = classifyBedrockError(error);
      Logger.error(
        `[BedrockCompletion] ✗ Request failed for model ${this.modelId}: ${classified.message}`
      );
      throw new CompletionProviderError(classified.message, {
        errorCode: classified.code,
        cause: error,
      });
    }

    Logger.info(`[BedrockCompletion] ✓ Response received (${Date.now() - startTime}ms)`);
    if (response.usage) {
      Logger.info(
        `[BedrockCompletion] Tokens: ${response.usage.inputTokens} input, ${response.usage.outputTokens} output`
      );
    }
    logReply(response);

    return { choice: parseConverseResponse(response), rawResponse: response };
  }
}

function logReply(response: ConverseResponse): void {
  const message = response.output?.message;
  if (message === undefined || Logger.verbosity < LogLevel.DEBUG) {
    return;
  }
  try {
    Logger.debug('[BedrockCompletion] Reply:', intoMessage(message));
  } catch (error) {
    if (!(error instanceof IntegrationError)) {
      throw error;
    }
    Logger.debug(`[BedrockCompletion] Reply could not be mapped: ${error.message}`);
  }
}
