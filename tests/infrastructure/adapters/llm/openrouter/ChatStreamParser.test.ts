import { describe, expect, it } from 'vitest';
import { InvalidResponseError, OpenRouterError } from '../../../../../src/application/errors/ProviderError.js';
import { ChatStreamParser } from '../../../../../src/infrastructure/adapters/llm/openrouter/ChatStreamParser.js';
import { completed, parsedTextResponse, rawTextResponse, textDelta } from '../../../../helpers/fixtures.js';

describe('ChatStreamParser', () => {
  const parser = new ChatStreamParser();

  it('turns text deltas into output_text chunks', () => {
    expect(parser.parse(textDelta('Hel'))).toEqual({ type: 'output_text', data: 'Hel', usage: null });
  });

  it('turns the completed event into a response chunk with usage', () => {
    expect(parser.parse(completed(rawTextResponse('Hello')))).toEqual({
      type: 'response',
      data: parsedTextResponse('Hello'),
      usage: { inputTokens: 12, outputTokens: 8, totalTokens: 20 },
    });
  });

  it('reports null usage when the completed response has none', () => {
    const { usage: _usage, ...withoutUsage } = rawTextResponse('Hello');

    expect(parser.parse(completed(withoutUsage))).toEqual({
      type: 'response',
      data: parsedTextResponse('Hello'),
      usage: null,
    });
  });

  it.each([
    { type: 'response.created', response: {} },
    { type: 'response.in_progress' },
    { type: 'response.output_text.done', text: 'Hello' },
    'not-an-event',
    null,
  ])('ignores %j', (event) => {
    expect(parser.parse(event)).toBeNull();
  });

  it('rejects a text delta without text', () => {
    expect(() => parser.parse({ type: 'response.output_text.delta' })).toThrowError(InvalidResponseError);
  });

  it('throws the upstream message for a failed response', () => {
    const event = {
      type: 'response.failed',
      response: { id: 'resp_9', error: { code: 'rate_limit_exceeded', message: 'Rate limit reached' } },
    };

    expect(() => parser.parse(event)).toThrowError(OpenRouterError);
    expect(() => parser.parse(event)).toThrowError('Rate limit reached');
  });

  it('falls back to a generic message when a failed response has no error', () => {
    expect(() => parser.parse({ type: 'response.failed', response: { error: null } })).toThrowError(
      'OpenRouter response failed',
    );
  });

  it('throws with the reason for an incomplete response', () => {
    expect(() =>
      parser.parse({ type: 'response.incomplete', response: { incomplete_details: { reason: 'content_filter' } } }),
    ).toThrowError('OpenRouter response incomplete: content_filter');
  });

  it('throws for a stream error event', () => {
    expect(() => parser.parse({ type: 'error', code: 'server_error', message: 'Stream reset' })).toThrowError(
      'Stream reset',
    );
  });
});
