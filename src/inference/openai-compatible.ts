import type { Logger } from '../logger.js';
import type { GenerationRequest, StreamFragment } from '../types/index.js';
import { ConnectivityError, ProtocolError } from '../types/index.js';
import { decodeLineStream } from './adapter.js';
import { decodeOpenAiSseLine } from './decoders.js';
import { readErrorMessage } from './http.js';
import { buildChatMessages } from './prompt.js';

export interface OpenAiChatCall {
  url: string;
  model: string;
  headers?: Record<string, string>;
  request: GenerationRequest;
  signal: AbortSignal;
  log: Logger;
}

// POST /chat/completions with stream: true, shared by LM Studio style servers and OpenAI itself
export async function* streamOpenAiChat(call: OpenAiChatCall): AsyncGenerator<StreamFragment> {
  const response = await fetch(call.url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...call.headers },
    body: JSON.stringify({
      model: call.model,
      messages: buildChatMessages(call.request),
      stream: true
    }),
    signal: call.signal
  });

  if (!response.ok) {
    const message = await readErrorMessage(response);
    throw new ConnectivityError('HTTP_STATUS', `Error: ${message}`, { status: response.status });
  }
  if (!response.body) {
    throw new ProtocolError('Response had no body');
  }

  yield* decodeLineStream(response.body, decodeOpenAiSseLine, call.log);
}
