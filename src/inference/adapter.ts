import type { Logger } from '../logger.js';
import type {
  GenerationRequest,
  ProbeResult,
  ProviderFamily,
  StreamFragment
} from '../types/index.js';
import { ProtocolError, describeError, errorFragment } from '../types/index.js';
import type { DecodedChunk, LineDecoder } from './decoders.js';
import { openScope, readLines } from './http.js';

export interface ProviderAdapter {
  readonly family: ProviderFamily;
  readonly model: string;

  /** Never rejects; failures come back as `{ ok: false, message }`. */
  probe(): Promise<ProbeResult>;

  /**
   * Lazy, finite, not restartable. Failures end the stream with one error
   * fragment after whatever text was already produced. Breaking out of the
   * iteration aborts the underlying request.
   */
  stream(request: GenerationRequest): AsyncGenerator<StreamFragment>;
}

export interface AdapterTimeouts {
  probeMs: number;
  generationMs: number;
}

export const DEFAULT_TIMEOUTS: AdapterTimeouts = {
  probeMs: 5_000,
  generationMs: 120_000
};

export abstract class BaseAdapter implements ProviderAdapter {
  abstract readonly family: ProviderFamily;
  readonly timeouts: AdapterTimeouts;

  constructor(
    readonly model: string,
    protected readonly log: Logger,
    timeouts: Partial<AdapterTimeouts> = {}
  ) {
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...timeouts };
  }

  protected abstract check(): Promise<ProbeResult>;

  protected abstract generate(
    request: GenerationRequest,
    signal: AbortSignal
  ): AsyncGenerator<StreamFragment>;

  async probe(): Promise<ProbeResult> {
    try {
      const result = await this.check();
      this.log.debug({ ok: result.ok }, result.message);
      return result;
    } catch (error) {
      const message = describeError(error);
      this.log.warn({ err: error }, `Probe failed: ${message}`);
      return { ok: false, message };
    }
  }

  async *stream(request: GenerationRequest): AsyncGenerator<StreamFragment> {
    const scope = openScope(this.timeouts.generationMs, request.signal);
    let emitted = 0;

    try {
      for await (const fragment of this.generate(request, scope.signal)) {
        emitted++;
        yield fragment;
      }
      this.log.debug({ fragments: emitted }, 'Stream complete');
    } catch (error) {
      const fragment = errorFragment(error);
      this.log.warn({ code: fragment.code, fragments: emitted }, fragment.message);
      yield fragment;
    } finally {
      scope.release();
    }
  }
}

/**
 * Runs a line-oriented response body through a dialect decoder. Malformed
 * lines are skipped; if nothing but malformed lines arrived the whole
 * response is treated as undecodable.
 */
export async function* decodeLineStream(
  body: ReadableStream<Uint8Array>,
  decode: LineDecoder,
  log: Logger
): AsyncGenerator<StreamFragment> {
  let emitted = 0;
  let malformed = 0;

  for await (const line of readLines(body)) {
    let chunk: DecodedChunk;
    try {
      chunk = decode(line);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      malformed++;
      log.debug({ err: error }, 'Skipping malformed line');
      continue;
    }

    if (chunk.text) {
      emitted++;
      yield { kind: 'text', text: chunk.text };
    }
    if (chunk.error) {
      throw new ProtocolError(chunk.error, { code: 'PROVIDER' });
    }
    if (chunk.done) return;
  }

  if (malformed > 0 && emitted === 0) {
    throw new ProtocolError(`Response could not be decoded (${malformed} malformed lines)`);
  }
}
