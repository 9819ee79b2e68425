/**
 * Tests for the Converse completion adapter.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ThrottlingException } from '@aws-sdk/client-bedrock-runtime';
import {
  BedrockCompletionModel,
  buildConverseRequest,
  parseConverseResponse,
} from '../src/bedrock/CompletionModel';
import { MockRuntime } from '../src/bedrock/runtime';
import {
  CompletionProviderError,
  CompletionRequestError,
  CompletionResponseError,
  assistantMessage,
  userMessage,
  type CompletionRequest,
} from '../src/framework';
import { Logger, LogLevel } from '../src/utils/logger';

const MODEL = 'amazon.nova-lite-v1:0';

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return { prompt: 'Where is Oslo?', chatHistory: [], documents: [], tools: [], ...overrides };
}

describe('buildConverseRequest', () => {
  it('assembles history, prompt, settings, tools and preamble', () => {
    const input = buildConverseRequest(
      MODEL,
      request({
        preamble: 'Be brief.',
        chatHistory: [userMessage('hi'), assistantMessage('hello')],
        documents: [{ id: 'doc1', text: 'Oslo is in Norway.' }],
        tools: [
          {
            name: 'get_weather',
            description: 'Look up the weather',
            parameters: { type: 'object', properties: { city: { type: 'string' } } },
          },
        ],
        temperature: 0.3,
        maxTokens: 200,
        additionalParams: { top_k: 40 },
      })
    );

    expect(input).toEqual({
      modelId: MODEL,
      messages: [
        { role: 'user', content: [{ text: 'hi' }] },
        { role: 'assistant', content: [{ text: 'hello' }] },
        {
          role: 'user',
          content: [
            {
              text: '<attachments>\n<file id: doc1>\nOslo is in Norway.\n</file>\n</attachments>\n\nWhere is Oslo?',
            },
          ],
        },
      ],
      inferenceConfig: { temperature: 0.3, maxTokens: 200 },
      additionalModelRequestFields: { top_k: 40 },
      toolConfig: {
        tools: [
          {
            toolSpec: {
              name: 'get_weather',
              description: 'Look up the weather',
              inputSchema: {
                json: { type: 'object', properties: { city: { type: 'string' } } },
              },
            },
          },
        ],
      },
      system: [{ text: 'Be brief.' }],
    });
  });

  it('leaves out the tool configuration when there are no tools', () => {
    const input = buildConverseRequest(MODEL, request());

    expect('toolConfig' in input).toBe(false);
    expect('system' in input).toBe(false);
    expect('additionalModelRequestFields' in input).toBe(false);
    expect(input.inferenceConfig).toEqual({});
    expect(input.messages).toEqual([{ role: 'user', content: [{ text: 'Where is Oslo?' }] }]);
  });

  it('accepts a tool with an empty parameter schema', () => {
    const input = buildConverseRequest(
      MODEL,
      request({ tools: [{ name: 'ping', description: 'Ping', parameters: {} }] })
    );

    expect(input.toolConfig?.tools).toEqual([
      { toolSpec: { name: 'ping', description: 'Ping', inputSchema: { json: {} } } },
    ]);
  });

  it('rejects a tool without a name', () => {
    const unnamed = request({ tools: [{ name: ' ', description: '', parameters: {} }] });

    expect(() => buildConverseRequest(MODEL, unnamed)).toThrow('Failed to build: tool name is missing');
  });
});

describe('parseConverseResponse', () => {
  it('prefers a tool use over text', () => {
    const choice = parseConverseResponse(
      MockRuntime.converseReply([
        { toolUse: { toolUseId: 'call-1', name: 'get_weather', input: { city: 'Oslo' } } },
        { text: 'Let me look that up.' },
      ])
    );

    expect(choice).toEqual({
      type: 'toolCall',
      name: 'get_weather',
      id: 'call-1',
      arguments: { city: 'Oslo' },
    });
  });

  it('picks a tool use even when text comes first', () => {
    const choice = parseConverseResponse(
      MockRuntime.converseReply([
        { text: 'Looking.' },
        { toolUse: { toolUseId: 'call-2', name: 'lookup', input: {} } },
        { toolUse: { toolUseId: 'call-3', name: 'other', input: {} } },
      ])
    );

    expect(choice).toEqual({ type: 'toolCall', name: 'lookup', id: 'call-2', arguments: {} });
  });

  it('returns the first text block', () => {
    expect(
      parseConverseResponse(MockRuntime.converseReply([{ text: 'Norway.' }, { text: 'Europe.' }]))
    ).toEqual({ type: 'message', text: 'Norway.' });
  });

  it('fails when there is neither text nor a tool use', () => {
    const parse = () => parseConverseResponse(MockRuntime.converseReply([]));

    expect(parse).toThrow(CompletionResponseError);
    expect(parse).toThrow('Response did not contain a message or tool call');
  });

  it('rejects a tool use without an id', () => {
    const parse = () =>
      parseConverseResponse(
        MockRuntime.converseReply([{ toolUse: { toolUseId: undefined, name: 'lookup', input: {} } }])
      );

    expect(parse).toThrow(CompletionResponseError);
    expect(parse).toThrow('Model error: Tool use id is missing');
  });

  it('rejects a tool use without a name', () => {
    const parse = () =>
      parseConverseResponse(
        MockRuntime.converseReply([{ toolUse: { toolUseId: 'call-4', name: undefined, input: {} } }])
      );

    expect(parse).toThrow(CompletionResponseError);
    expect(parse).toThrow('Model error: Tool use name is missing');
  });

  it('fails when there is no output', () => {
    const parse = () =>
      parseConverseResponse({ ...MockRuntime.converseReply([]), output: undefined });

    expect(parse).toThrow(CompletionProviderError);
    expect(parse).toThrow("Model didn't return any converse output");
  });

  it('fails when the output is not a message', () => {
    expect(() =>
      parseConverseResponse({
        ...MockRuntime.converseReply([]),
        output: { $unknown: ['somethingElse', {}] },
      })
    ).toThrow('Failed to extract message from converse output');
  });
});

describe('BedrockCompletionModel', () => {
  beforeEach(() => {
    vi.spyOn(Logger, 'error').mockImplementation(() => undefined);
    vi.spyOn(Logger, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the request and returns the choice with the raw reply', async () => {
    const reply = MockRuntime.converseReply([{ text: 'Norway.' }]);
    const runtime = new MockRuntime({ converse: () => reply });
    const model = new BedrockCompletionModel(runtime, `bedrock:${MODEL}`);

    const response = await model.completionRequest('Where is Oslo?').temperature(0).send();

    expect(response.choice).toEqual({ type: 'message', text: 'Norway.' });
    expect(response.rawResponse).toBe(reply);
    expect(runtime.getLastConverseCall()?.modelId).toBe(MODEL);
    expect(runtime.getLastConverseCall()?.inferenceConfig).toEqual({ temperature: 0 });
  });

  it('skips unmapped reply blocks without warning', async () => {
    vi.restoreAllMocks();
    Logger.setVerbosity(LogLevel.WARN);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const runtime = new MockRuntime({
      converse: () =>
        MockRuntime.converseReply([
          { reasoningContent: { reasoningText: { text: 'thinking', signature: 'sig' } } },
          { text: 'Oslo.' },
        ]),
    });
    const model = new BedrockCompletionModel(runtime, MODEL);

    try {
      const response = await model.completion(request());

      expect(response.choice).toEqual({ type: 'message', text: 'Oslo.' });
      expect(warn).not.toHaveBeenCalled();
    } finally {
      Logger.setVerbosity(undefined);
    }
  });

  it('logs the mapped reply at debug verbosity', async () => {
    Logger.setVerbosity(LogLevel.DEBUG);
    const debug = vi.spyOn(Logger, 'debug').mockImplementation(() => undefined);
    vi.spyOn(Logger, 'info').mockImplementation(() => undefined);
    const runtime = new MockRuntime({
      converse: () =>
        MockRuntime.converseReply([
          { reasoningContent: { reasoningText: { text: 'thinking', signature: 'sig' } } },
          { text: 'Oslo.' },
        ]),
    });
    const model = new BedrockCompletionModel(runtime, MODEL);

    try {
      await model.completion(request());
    } finally {
      Logger.setVerbosity(undefined);
    }

    expect(debug).toHaveBeenCalledWith(
      '[ContentMapper] Dropping reasoningContent from assistant reply: ' +
        'Unsupported feature: ContentBlock variant reasoningContent in an assistant turn'
    );
    expect(debug).toHaveBeenCalledWith('[BedrockCompletion] Reply:', {
      role: 'assistant',
      content: [{ type: 'text', text: 'Oslo.' }],
    });
  });

  it('classifies service failures', async () => {
    const runtime = new MockRuntime({
      converse: () => {
        throw new ThrottlingException({ $metadata: {}, message: 'Too many requests' });
      },
    });
    const model = new BedrockCompletionModel(runtime, MODEL);

    const error = await model.completion(request()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CompletionProviderError);
    expect(error).toMatchObject({
      message: 'Too many requests',
      errorCode: 'ThrottlingException',
    });
  });

  it('reports request assembly failures without calling Bedrock', async () => {
    const runtime = new MockRuntime({ converse: () => MockRuntime.converseReply([{ text: 'x' }]) });
    const model = new BedrockCompletionModel(runtime, MODEL);

    const history = request({
      chatHistory: [{ role: 'user', content: [{ type: 'audio', data: 'AQID' }] }],
    });

    await expect(model.completion(history)).rejects.toThrow(
      new CompletionRequestError('Failed to build: user message has no content Bedrock supports')
    );
    expect(runtime.getConverseCalls()).toHaveLength(0);
  });

  it('replays history leniently', async () => {
    const runtime = new MockRuntime({ converse: () => MockRuntime.converseReply([{ text: 'ok' }]) });
    const model = new BedrockCompletionModel(runtime, MODEL);

    await model.completion(
      request({
        chatHistory: [
          {
            role: 'user',
            content: [
              { type: 'image', data: 'AQID', mediaType: 'image/svg+xml' },
              { type: 'text', text: 'see attached' },
            ],
          },
        ],
      })
    );

    expect(runtime.getLastConverseCall()?.messages?.[0]).toEqual({
      role: 'user',
      content: [{ text: 'see attached' }],
    });
  });
});
