/**
 * Tests for the completion contracts and request builder.
 */

import { describe, it, expect } from 'vitest';
import {
  CompletionRequestBuilder,
  promptWithContext,
  renderContextDocument,
  toolResultMessage,
  userMessage,
  type CompletionModel,
  type CompletionRequest,
  type CompletionResponse,
} from '../src/framework';

class EchoModel implements CompletionModel<CompletionRequest> {
  async completion(request: CompletionRequest): Promise<CompletionResponse<CompletionRequest>> {
    return { choice: { type: 'message', text: request.prompt }, rawResponse: request };
  }
}

describe('renderContextDocument', () => {
  it('renders a document without metadata', () => {
    expect(renderContextDocument({ id: 'd1', text: 'Body' })).toBe('<file id: d1>\nBody\n</file>\n');
  });

  it('renders metadata with sorted keys', () => {
    expect(
      renderContextDocument({
        id: 'd2',
        text: 'Body',
        additionalProps: { source: 'wiki', lang: 'en' },
      })
    ).toBe('<file id: d2>\n<metadata lang: "en" source: "wiki" />\nBody\n</file>\n');
  });
});

describe('promptWithContext', () => {
  it('returns the bare prompt when there are no documents', () => {
    expect(promptWithContext({ prompt: 'Hi', documents: [] })).toBe('Hi');
  });

  it('puts attachments before the prompt', () => {
    expect(
      promptWithContext({
        prompt: 'Compare them.',
        documents: [
          { id: 'a', text: 'First' },
          { id: 'b', text: 'Second' },
        ],
      })
    ).toBe(
      '<attachments>\n<file id: a>\nFirst\n</file>\n<file id: b>\nSecond\n</file>\n</attachments>\n\nCompare them.'
    );
  });
});

describe('CompletionRequestBuilder', () => {
  it('collects every setting', () => {
    const request = new CompletionRequestBuilder(new EchoModel(), 'Hello')
      .preamble('Be kind.')
      .messages([userMessage('earlier')])
      .message(toolResultMessage('call-1', '42'))
      .document({ id: 'd', text: 'ctx' })
      .tool({ name: 't', description: 'a tool', parameters: {} })
      .temperature(0.5)
      .maxTokens(64)
      .additionalParams({ top_p: 0.9 })
      .build();

    expect(request).toEqual({
      prompt: 'Hello',
      preamble: 'Be kind.',
      chatHistory: [
        userMessage('earlier'),
        {
          role: 'user',
          content: [{ type: 'toolResult', id: 'call-1', content: [{ type: 'text', text: '42' }] }],
        },
      ],
      documents: [{ id: 'd', text: 'ctx' }],
      tools: [{ name: 't', description: 'a tool', parameters: {} }],
      temperature: 0.5,
      maxTokens: 64,
      additionalParams: { top_p: 0.9 },
    });
  });

  it('builds independent requests', () => {
    const builder = new CompletionRequestBuilder(new EchoModel(), 'Hello');
    const first = builder.build();
    builder.document({ id: 'late', text: 'added later' });

    expect(first.documents).toEqual([]);
    expect(builder.build().documents).toHaveLength(1);
  });

  it('sends through the model', async () => {
    const response = await new CompletionRequestBuilder(new EchoModel(), 'ping').send();

    expect(response.choice).toEqual({ type: 'message', text: 'ping' });
    expect(response.rawResponse.prompt).toBe('ping');
  });
});
