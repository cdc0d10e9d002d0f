import { ProtocolError } from '../types/index.js';
import { isRecord } from './http.js';

export interface DecodedChunk {
  text?: string;
  done: boolean;
  /** Provider-reported failure carried inside an otherwise valid payload. */
  error?: string;
}

export type LineDecoder = (line: string) => DecodedChunk;

const NOTHING: DecodedChunk = { done: false };

const MAX_QUOTED_PAYLOAD = 80;

function parsePayload(payload: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = JSON.parse(payload);
  } catch (error) {
    throw new ProtocolError(`Malformed JSON payload: ${payload.slice(0, MAX_QUOTED_PAYLOAD)}`, {
      cause: error
    });
  }
  if (!isRecord(data)) {
    throw new ProtocolError(`Expected a JSON object, got: ${payload.slice(0, MAX_QUOTED_PAYLOAD)}`);
  }
  return data;
}

function ssePayload(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith('data:')) return undefined;
  return trimmed.slice('data:'.length).trimStart();
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

// {"message":{"role":"assistant","content":"..."},"done":false}
export function decodeNdjsonChatLine(line: string): DecodedChunk {
  const trimmed = line.trim();
  if (!trimmed) return NOTHING;

  const data = parsePayload(trimmed);
  if (typeof data.error === 'string') {
    return { done: true, error: data.error };
  }

  const message = data.message;
  return {
    text: isRecord(message) ? nonEmpty(message.content) : undefined,
    done: data.done === true
  };
}

// data: {"choices":[{"delta":{"content":"..."}}]}
export function decodeOpenAiSseLine(line: string): DecodedChunk {
  const payload = ssePayload(line);
  if (payload === undefined || payload === '') return NOTHING;
  if (payload === '[DONE]') return { done: true };

  const data = parsePayload(payload);
  if (isRecord(data.error)) {
    return { done: true, error: nonEmpty(data.error.message) ?? 'Unknown provider error' };
  }

  const choices = data.choices;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const delta = isRecord(first) ? first.delta : undefined;

  return {
    text: isRecord(delta) ? nonEmpty(delta.content) : undefined,
    done: false
  };
}

export function decodeAnthropicEvent(event: unknown): DecodedChunk {
  if (!isRecord(event)) {
    throw new ProtocolError('Expected a stream event object');
  }

  switch (event.type) {
    case 'content_block_delta': {
      const delta = event.delta;
      if (isRecord(delta) && delta.type === 'text_delta') {
        return { text: nonEmpty(delta.text), done: false };
      }
      return NOTHING;
    }
    case 'message_stop':
      return { done: true };
    case 'error': {
      const error = event.error;
      return {
        done: true,
        error: (isRecord(error) ? nonEmpty(error.message) : undefined) ?? 'Unknown provider error'
      };
    }
    default:
      return NOTHING;
  }
}

/**
 * Raw-SSE form of `decodeAnthropicEvent` for callers that read the wire
 * themselves, e.g. through `decodeLineStream`. The cloud adapter goes
 * through the SDK and decodes events directly.
 *
 * ```
 * event: content_block_delta
 * data: {"type":"content_block_delta","delta":{"type":"text_delta","text":"..."}}
 * ```
 */
export function decodeAnthropicSseLine(line: string): DecodedChunk {
  const payload = ssePayload(line);
  if (payload === undefined || payload === '') return NOTHING;
  return decodeAnthropicEvent(parsePayload(payload));
}
