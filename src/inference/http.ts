export interface RequestScope {
  signal: AbortSignal;
  /** Aborts whatever is still in flight. Safe to call after completion. */
  release(): void;
}

export function openScope(timeoutMs: number, callerSignal?: AbortSignal): RequestScope {
  const controller = new AbortController();
  const signals = [controller.signal, AbortSignal.timeout(timeoutMs)];
  if (callerSignal) signals.push(callerSignal);

  return {
    signal: AbortSignal.any(signals),
    release: () => controller.abort()
  };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

// Splits a byte stream into lines; chunk borders may fall anywhere, even inside a UTF-8 sequence
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        yield stripCarriageReturn(buffer.slice(0, newline));
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield stripCarriageReturn(buffer);
    }
  } finally {
    reader.releaseLock();
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls a readable cause out of an error response. Handles both
 * `{ "error": { "message": ... } }` and `{ "error": "..." }` bodies and
 * falls back to the raw text.
 */
export async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text();

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return text.trim() || 'Unknown';
  }

  if (isRecord(data)) {
    const error = data.error;
    if (isRecord(error) && typeof error.message === 'string') return error.message;
    if (typeof error === 'string') return error;
  }
  return text.trim() || 'Unknown';
}
