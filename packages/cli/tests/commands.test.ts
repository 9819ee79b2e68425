/**
 * Tests for the CLI command helpers. Bedrock is replaced by MockRuntime.
 */

import { describe, it, expect } from 'vitest';
import { Client, MockRuntime } from '@bedrock-adapter/core';
import { formatChoice, runCompletion } from '../src/commands/complete';
import { formatEmbedding, resolveEmbeddingModel, runEmbedding } from '../src/commands/embed';
import { formatModels } from '../src/commands/models';
import { parseIntegerOption, parseNumberOption, parseParams } from '../src/commands/options';

describe('option parsing', () => {
  it('parses numbers', () => {
    expect(parseNumberOption('temperature', '0.7')).toBe(0.7);
    expect(parseNumberOption('temperature', undefined)).toBeUndefined();
  });

  it('rejects text where a number is expected', () => {
    expect(() => parseNumberOption('temperature', 'hot')).toThrow(
      '--temperature must be a number, got "hot"'
    );
    expect(() => parseNumberOption('temperature', ' ')).toThrow(
      '--temperature must be a number, got " "'
    );
  });

  it('requires positive integers where counts are expected', () => {
    expect(parseIntegerOption('max-tokens', '100')).toBe(100);
    expect(() => parseIntegerOption('max-tokens', '1.5')).toThrow(
      '--max-tokens must be a positive integer, got "1.5"'
    );
  });

  it('parses --params as JSON', () => {
    expect(parseParams('{"top_k":5}')).toEqual({ top_k: 5 });
    expect(parseParams(undefined)).toBeUndefined();
    expect(() => parseParams('{bad')).toThrow(/^--params is not valid JSON: /);
  });
});

describe('complete', () => {
  it('sends the prompt with every option applied', async () => {
    const runtime = new MockRuntime({
      converse: () => MockRuntime.converseReply([{ text: 'Oslo.' }]),
    });
    const client = Client.builder().runtime(runtime).build({});

    const choice = await runCompletion(client, 'Capital of Norway?', {
      model: 'bedrock:amazon.nova-lite-v1:0',
      preamble: 'Terse.',
      temperature: '0.7',
      maxTokens: '100',
      params: '{"top_k":5}',
    });

    expect(choice).toEqual({ type: 'message', text: 'Oslo.' });
    expect(runtime.getLastConverseCall()).toEqual({
      modelId: 'amazon.nova-lite-v1:0',
      messages: [{ role: 'user', content: [{ text: 'Capital of Norway?' }] }],
      inferenceConfig: { temperature: 0.7, maxTokens: 100 },
      additionalModelRequestFields: { top_k: 5 },
      system: [{ text: 'Terse.' }],
    });
  });

  it('formats text and tool call choices', () => {
    expect(formatChoice({ type: 'message', text: 'Hello' })).toBe('Hello');
    expect(
      formatChoice({ type: 'toolCall', name: 'lookup', id: 'call-1', arguments: { q: 'x' } })
    ).toBe('Tool call: lookup (call-1)\n{\n  "q": "x"\n}');
  });
});

describe('embed', () => {
  it('defaults to Titan V2 at 1024 dimensions', () => {
    expect(resolveEmbeddingModel({ model: 'amazon.titan-embed-text-v2:0' })).toEqual({
      modelId: 'amazon.titan-embed-text-v2:0',
      ndims: 1024,
    });
  });

  it('only takes sizes Titan V2 supports', () => {
    expect(() =>
      resolveEmbeddingModel({ model: 'amazon.titan-embed-text-v2:0', dimensions: '300' })
    ).toThrow('--dimensions must be one of 256, 512, 1024 for amazon.titan-embed-text-v2:0');
  });

  it('needs dimensions for other models', () => {
    expect(() => resolveEmbeddingModel({ model: 'acme.embed-v1' })).toThrow(
      '--dimensions is required for model acme.embed-v1'
    );
    expect(resolveEmbeddingModel({ model: 'acme.embed-v1', dimensions: '384' })).toEqual({
      modelId: 'acme.embed-v1',
      ndims: 384,
    });
  });

  it('embeds every text', async () => {
    const runtime = new MockRuntime({
      invokeModel: () => MockRuntime.embeddingReply([0.25, 0.5]),
    });
    const client = Client.builder().runtime(runtime).build({});

    const embeddings = await runEmbedding(client, ['a', 'b'], {
      model: 'amazon.titan-embed-text-v2:0',
      dimensions: '256',
    });

    expect(embeddings.map(embedding => embedding.document)).toEqual(['a', 'b']);
    expect(runtime.getInvokeModelCalls()).toHaveLength(2);
  });

  it('previews the first values of a vector', () => {
    expect(formatEmbedding({ document: 'hi', vec: [0.1, 0.2, 0.3, 0.4, 0.5] })).toBe(
      '"hi": 5 dims [0.1000, 0.2000, 0.3000, 0.4000, ...]'
    );
    expect(formatEmbedding({ document: 'x', vec: [1] })).toBe('"x": 1 dims [1.0000]');
  });
});

describe('models', () => {
  it('aligns model ids', () => {
    expect(
      formatModels([
        { name: 'NOVA_MICRO', modelId: 'amazon.nova-micro-v1:0', kind: 'completion' },
        { name: 'AB', modelId: 'x.y', kind: 'completion' },
      ])
    ).toEqual(['NOVA_MICRO  amazon.nova-micro-v1:0', 'AB          x.y']);
  });
});
