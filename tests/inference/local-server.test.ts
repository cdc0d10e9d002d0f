import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LocalServerAdapter } from '../../src/inference/local-server.js';
import {
  collect,
  failingBody,
  hangUntilAborted,
  jsonResponse,
  ndjsonLine,
  sseLine,
  streamingResponse,
  texts
} from '../helpers.js';

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function requestBody(call: number): unknown {
  const init = fetchMock.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

describe('LocalServerAdapter (ndjson-chat)', () => {
  const adapter = () => new LocalServerAdapter({ model: 'gemma3:4b' });

  it('lists models on probe', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ models: [{ name: 'gemma3:4b' }, { name: 'llama3:8b' }] })
    );

    expect(await adapter().probe()).toEqual({
      ok: true,
      message: 'Connected. Models: gemma3:4b, llama3:8b'
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:11434/api/tags');
  });

  it('reports refused connections without throwing', async () => {
    fetchMock.mockRejectedValueOnce(
      new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:11434') })
    );

    expect(await adapter().probe()).toEqual({
      ok: false,
      message: 'Connection failed: connect ECONNREFUSED 127.0.0.1:11434'
    });
  });

  it('reports unexpected status codes', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 500 }));
    expect(await adapter().probe()).toEqual({ ok: false, message: 'Server returned status 500' });
  });

  it('streams content in order across arbitrary chunk borders', async () => {
    const wire = [
      ndjsonLine('Hel'),
      ndjsonLine('lo'),
      ndjsonLine(' there'),
      ndjsonLine('', true)
    ].join('');
    fetchMock.mockResolvedValueOnce(streamingResponse([wire.slice(0, 17), wire.slice(17, 60), wire.slice(60)]));

    const fragments = await collect(
      adapter().stream({ text: 'Hi', systemPrompt: 'Be brief' })
    );

    expect(fragments).toEqual([
      { kind: 'text', text: 'Hel' },
      { kind: 'text', text: 'lo' },
      { kind: 'text', text: ' there' }
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:11434/api/chat');
    expect(requestBody(0)).toEqual({
      model: 'gemma3:4b',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi' }
      ],
      stream: true
    });
  });

  it('skips malformed lines', async () => {
    fetchMock.mockResolvedValueOnce(
      streamingResponse([ndjsonLine('a'), 'not json\n', ndjsonLine('b'), ndjsonLine('', true)])
    );

    expect(texts(await collect(adapter().stream({ text: 'Hi' })))).toEqual(['a', 'b']);
  });

  it('fails a response made only of malformed lines', async () => {
    fetchMock.mockResolvedValueOnce(streamingResponse(['garbage\n', 'more garbage\n']));

    expect(await collect(adapter().stream({ text: 'Hi' }))).toEqual([
      { kind: 'error', code: 'PROTOCOL', message: 'Response could not be decoded (2 malformed lines)' }
    ]);
  });

  it('ignores lines after the final one', async () => {
    fetchMock.mockResolvedValueOnce(
      streamingResponse([ndjsonLine('a'), ndjsonLine('', true), ndjsonLine('late')])
    );

    expect(texts(await collect(adapter().stream({ text: 'Hi' })))).toEqual(['a']);
  });

  it('reports error statuses with the response body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('model "x" not found', { status: 404 }));

    expect(await collect(adapter().stream({ text: 'Hi' }))).toEqual([
      { kind: 'error', code: 'HTTP_STATUS', message: 'Server returned status 404: model "x" not found' }
    ]);
  });

  it('reports in-band errors as provider failures', async () => {
    fetchMock.mockResolvedValueOnce(
      streamingResponse([ndjsonLine('partial'), '{"error":"out of memory"}\n'])
    );

    expect(await collect(adapter().stream({ text: 'Hi' }))).toEqual([
      { kind: 'text', text: 'partial' },
      { kind: 'error', code: 'PROVIDER', message: 'out of memory' }
    ]);
  });

  it('keeps partial output when the connection drops', async () => {
    const dropped = new TypeError('terminated', { cause: new Error('other side closed') });
    fetchMock.mockResolvedValueOnce(new Response(failingBody([ndjsonLine('Hel')], dropped)));

    expect(await collect(adapter().stream({ text: 'Hi' }))).toEqual([
      { kind: 'text', text: 'Hel' },
      { kind: 'error', code: 'CONNECTIVITY', message: 'Connection lost: other side closed' }
    ]);
  });

  it('aborts the request when the consumer stops early', async () => {
    fetchMock.mockResolvedValueOnce(
      streamingResponse([ndjsonLine('one'), ndjsonLine('two'), ndjsonLine('', true)])
    );

    for await (const fragment of adapter().stream({ text: 'Hi' })) {
      expect(fragment).toEqual({ kind: 'text', text: 'one' });
      break;
    }

    expect(fetchMock.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
  });

  it('ends with a timeout fragment when generation takes too long', async () => {
    fetchMock.mockImplementationOnce(hangUntilAborted);
    const slow = new LocalServerAdapter({ model: 'gemma3:4b', timeouts: { generationMs: 20 } });

    expect(await collect(slow.stream({ text: 'Hi' }))).toEqual([
      { kind: 'error', code: 'TIMEOUT', message: 'Request timed out' }
    ]);
  });

  it('honours the caller signal', async () => {
    fetchMock.mockImplementationOnce(hangUntilAborted);
    const caller = new AbortController();
    const pending = collect(adapter().stream({ text: 'Hi', signal: caller.signal }));
    caller.abort();

    expect(await pending).toEqual([
      { kind: 'error', code: 'CONNECTIVITY', message: 'Request aborted' }
    ]);
  });

  it('strips trailing slashes from custom endpoints', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ models: [] }));
    const custom = new LocalServerAdapter({ model: 'm', endpoint: 'http://gpu-box:11434//' });

    await custom.probe();
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://gpu-box:11434/api/tags');
  });

  it('lists model names and returns none on failure', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ models: [{ name: 'a' }, { size: 1 }, { name: 'b' }] }));
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    expect(await adapter().listModels()).toEqual(['a', 'b']);
    expect(await adapter().listModels()).toEqual([]);
  });
});

describe('LocalServerAdapter (openai-compatible)', () => {
  const adapter = () =>
    new LocalServerAdapter({ model: 'qwen2.5-7b-instruct', dialect: 'openai-compatible' });

  it('probes the model list endpoint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: [{ id: 'qwen2.5-7b-instruct' }] }));

    expect(await adapter().probe()).toEqual({ ok: true, message: 'Connected to local server' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:1234/v1/models');
  });

  it('streams server-sent deltas until [DONE]', async () => {
    fetchMock.mockResolvedValueOnce(
      streamingResponse([
        'data: {"choices":[{"delta":{"role":"assistant"}}]}\n\n',
        sseLine('Good'),
        ': keep-alive\n\n',
        sseLine(' morning'),
        'data: [DONE]\n\n',
        sseLine('ignored')
      ])
    );

    const fragments = await collect(adapter().stream({ text: 'Hi' }));

    expect(texts(fragments)).toEqual(['Good', ' morning']);
    expect(fragments).toHaveLength(2);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:1234/v1/chat/completions');
  });

  it('reports error statuses with the decoded message', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: 'No models loaded' } }, 400));

    expect(await collect(adapter().stream({ text: 'Hi' }))).toEqual([
      { kind: 'error', code: 'HTTP_STATUS', message: 'Error: No models loaded' }
    ]);
  });
});
