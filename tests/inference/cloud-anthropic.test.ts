import Anthropic from '@anthropic-ai/sdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  CloudAnthropicAdapter,
  type AnthropicStreamClient,
  type AnthropicStreamParams
} from '../../src/inference/cloud-anthropic.js';
import { collect } from '../helpers.js';

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

async function* replay(events: unknown[]): AsyncGenerator<unknown> {
  for (const event of events) {
    yield event;
  }
}

function textDelta(text: string): unknown {
  return { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text } };
}

function stubClient(events: unknown[]) {
  const createMessageStream = vi.fn<AnthropicStreamClient['createMessageStream']>(
    async () => replay(events)
  );
  const client: AnthropicStreamClient = { createMessageStream };
  return { client, createMessageStream };
}

describe('CloudAnthropicAdapter', () => {
  it('accepts keys with the expected prefix without a network call', async () => {
    const adapter = new CloudAnthropicAdapter({ model: 'claude-3-5-haiku-latest', credential: 'sk-ant-xyz' });

    expect(await adapter.probe()).toEqual({ ok: true, message: 'Anthropic API key format valid' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects keys with the wrong shape', async () => {
    const adapter = new CloudAnthropicAdapter({ model: 'claude-3-5-haiku-latest', credential: 'bad-key' });
    expect(await adapter.probe()).toEqual({ ok: false, message: 'Invalid API key format' });
  });

  it('requires a key to probe', async () => {
    const adapter = new CloudAnthropicAdapter({ model: 'claude-3-5-haiku-latest' });
    expect(await adapter.probe()).toEqual({
      ok: false,
      message: 'API key is required for cloud providers'
    });
  });

  it('streams text deltas and passes the system prompt separately', async () => {
    const { client, createMessageStream } = stubClient([
      { type: 'message_start', message: {} },
      { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
      textDelta('Hello'),
      { type: 'ping' },
      textDelta(' world'),
      { type: 'content_block_stop', index: 0 },
      { type: 'message_delta', delta: { stop_reason: 'end_turn' } },
      { type: 'message_stop' }
    ]);
    const adapter = new CloudAnthropicAdapter({
      model: 'claude-3-5-haiku-latest',
      credential: 'test-secret',
      client
    });

    const fragments = await collect(adapter.stream({ text: 'Hi', systemPrompt: 'Be kind' }));

    expect(fragments).toEqual([
      { kind: 'text', text: 'Hello' },
      { kind: 'text', text: ' world' }
    ]);
    const expected: AnthropicStreamParams = {
      model: 'claude-3-5-haiku-latest',
      max_tokens: 4096,
      system: 'Be kind',
      messages: [{ role: 'user', content: 'Hi' }]
    };
    expect(createMessageStream.mock.calls[0]?.[0]).toEqual(expected);
  });

  it('drops leading assistant turns and omits an empty system prompt', async () => {
    const { client, createMessageStream } = stubClient([{ type: 'message_stop' }]);
    const adapter = new CloudAnthropicAdapter({ model: 'm', credential: 'test-secret', client });

    await collect(
      adapter.stream({
        text: 'Next?',
        history: [
          { role: 'assistant', content: 'Welcome' },
          { role: 'user', content: 'Hello' },
          { role: 'assistant', content: 'Hi' }
        ]
      })
    );

    expect(createMessageStream.mock.calls[0]?.[0]).toEqual({
      model: 'm',
      max_tokens: 4096,
      messages: [
        { role: 'user', content: 'Hello' },
        { role: 'assistant', content: 'Hi' },
        { role: 'user', content: 'Next?' }
      ]
    });
  });

  it('ends with a provider error after partial output', async () => {
    const { client } = stubClient([
      textDelta('Hi'),
      { type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } },
      textDelta('never')
    ]);
    const adapter = new CloudAnthropicAdapter({ model: 'm', credential: 'test-secret', client });

    expect(await collect(adapter.stream({ text: 'Hi' }))).toEqual([
      { kind: 'text', text: 'Hi' },
      { kind: 'error', code: 'PROVIDER', message: 'Overloaded' }
    ]);
  });

  it('maps SDK timeouts', async () => {
    const createMessageStream = vi.fn<AnthropicStreamClient['createMessageStream']>(async () => {
      throw new Anthropic.APIConnectionTimeoutError();
    });
    const adapter = new CloudAnthropicAdapter({
      model: 'm',
      credential: 'test-secret',
      client: { createMessageStream }
    });

    expect(await collect(adapter.stream({ text: 'Hi' }))).toEqual([
      { kind: 'error', code: 'TIMEOUT', message: 'Request timed out' }
    ]);
  });

  it('ends with a credential error when no key is set', async () => {
    const { client, createMessageStream } = stubClient([]);
    const adapter = new CloudAnthropicAdapter({ model: 'm', client });

    expect(await collect(adapter.stream({ text: 'Hi' }))).toEqual([
      { kind: 'error', code: 'CREDENTIAL', message: 'API key is required for cloud providers' }
    ]);
    expect(createMessageStream).not.toHaveBeenCalled();
  });

  it('aborts the request when the consumer stops early', async () => {
    const { client, createMessageStream } = stubClient([textDelta('one'), textDelta('two')]);
    const adapter = new CloudAnthropicAdapter({ model: 'm', credential: 'test-secret', client });

    for await (const fragment of adapter.stream({ text: 'Hi' })) {
      expect(fragment).toEqual({ kind: 'text', text: 'one' });
      break;
    }

    expect(createMessageStream.mock.calls[0]?.[1].aborted).toBe(true);
  });
});
