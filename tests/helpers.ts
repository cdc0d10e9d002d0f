import type { StreamFragment } from '../src/types/index.js';

const encoder = new TextEncoder();

export function bytesBody(parts: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(part);
      controller.close();
    }
  });
}

export function textBody(chunks: string[]): ReadableStream<Uint8Array> {
  return bytesBody(chunks.map((chunk) => encoder.encode(chunk)));
}

/** Delivers `chunks` one read at a time, then fails the next read with `error`. */
export function failingBody(chunks: string[], error: unknown): ReadableStream<Uint8Array> {
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index++];
      if (chunk === undefined) {
        controller.error(error);
      } else {
        controller.enqueue(encoder.encode(chunk));
      }
    }
  });
}

export function streamingResponse(chunks: string[], status = 200): Response {
  return new Response(textBody(chunks), { status });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of stream) {
    items.push(item);
  }
  return items;
}

export function ndjsonLine(content: string, done = false): string {
  return `${JSON.stringify({ message: { role: 'assistant', content }, done })}\n`;
}

export function sseLine(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`;
}

export function texts(fragments: StreamFragment[]): string[] {
  return fragments.flatMap((fragment) => (fragment.kind === 'text' ? [fragment.text] : []));
}

/** A fetch stand-in that never answers and rejects with the abort reason. */
export function hangUntilAborted(
  _input: unknown,
  init?: Parameters<typeof fetch>[1]
): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
