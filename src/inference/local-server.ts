import { logger as rootLogger, type Logger } from '../logger.js';
import type {
  GenerationRequest,
  LocalServerDialect,
  ProbeResult,
  StreamFragment
} from '../types/index.js';
import { ConnectivityError, ProtocolError, describeError } from '../types/index.js';
import { BaseAdapter, decodeLineStream, type AdapterTimeouts } from './adapter.js';
import { decodeNdjsonChatLine } from './decoders.js';
import { isRecord } from './http.js';
import { streamOpenAiChat } from './openai-compatible.js';
import { buildChatMessages } from './prompt.js';

export const DEFAULT_LOCAL_ENDPOINTS: Record<LocalServerDialect, string> = {
  'ndjson-chat': 'http://localhost:11434',
  'openai-compatible': 'http://localhost:1234'
};

export interface LocalServerOptions {
  model: string;
  dialect?: LocalServerDialect;
  endpoint?: string;
  timeouts?: Partial<AdapterTimeouts>;
  logger?: Logger;
}

function modelNames(data: unknown, listKey: 'models' | 'data', nameKey: 'name' | 'id'): string[] {
  if (!isRecord(data)) return [];
  const list = data[listKey];
  if (!Array.isArray(list)) return [];

  const names: string[] = [];
  for (const item of list) {
    const name = isRecord(item) ? item[nameKey] : undefined;
    if (typeof name === 'string') {
      names.push(name);
    }
  }
  return names;
}

/**
 * Inference server on the local machine. Speaks either the NDJSON chat
 * dialect (`/api/chat`, Ollama style) or the OpenAI-compatible SSE dialect
 * (`/v1/chat/completions`, LM Studio style).
 */
export class LocalServerAdapter extends BaseAdapter {
  readonly family = 'local-server' as const;
  readonly dialect: LocalServerDialect;
  readonly baseUrl: string;

  constructor(options: LocalServerOptions) {
    const dialect = options.dialect ?? 'ndjson-chat';
    super(
      options.model,
      (options.logger ?? rootLogger).child({ component: 'local-server', dialect }),
      options.timeouts
    );
    this.dialect = dialect;
    this.baseUrl = (options.endpoint ?? DEFAULT_LOCAL_ENDPOINTS[dialect]).replace(/\/+$/, '');
  }

  private get listUrl(): string {
    return this.dialect === 'ndjson-chat' ? `${this.baseUrl}/api/tags` : `${this.baseUrl}/v1/models`;
  }

  private async fetchModelList(): Promise<Response> {
    return fetch(this.listUrl, { signal: AbortSignal.timeout(this.timeouts.probeMs) });
  }

  protected async check(): Promise<ProbeResult> {
    const response = await this.fetchModelList();
    if (response.status !== 200) {
      return { ok: false, message: `Server returned status ${response.status}` };
    }

    if (this.dialect === 'openai-compatible') {
      return { ok: true, message: 'Connected to local server' };
    }

    const names = modelNames(await response.json(), 'models', 'name');
    return { ok: true, message: `Connected. Models: ${names.slice(0, 5).join(', ')}` };
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await this.fetchModelList();
      if (response.status !== 200) return [];
      const data: unknown = await response.json();
      return this.dialect === 'ndjson-chat'
        ? modelNames(data, 'models', 'name')
        : modelNames(data, 'data', 'id');
    } catch (error) {
      this.log.warn(`Could not list models: ${describeError(error)}`);
      return [];
    }
  }

  protected async *generate(
    request: GenerationRequest,
    signal: AbortSignal
  ): AsyncGenerator<StreamFragment> {
    if (this.dialect === 'openai-compatible') {
      yield* streamOpenAiChat({
        url: `${this.baseUrl}/v1/chat/completions`,
        model: this.model,
        request,
        signal,
        log: this.log
      });
      return;
    }

    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages: buildChatMessages(request),
        stream: true
      }),
      signal
    });

    if (!response.ok) {
      const body = (await response.text()).trim();
      throw new ConnectivityError(
        'HTTP_STATUS',
        `Server returned status ${response.status}${body ? `: ${body}` : ''}`,
        { status: response.status }
      );
    }
    if (!response.body) {
      throw new ProtocolError('Response had no body');
    }

    yield* decodeLineStream(response.body, decodeNdjsonChatLine, this.log);
  }
}
