import { logger as rootLogger, type Logger } from '../logger.js';
import type { GenerationRequest, ProbeResult, StreamFragment } from '../types/index.js';
import { CredentialError } from '../types/index.js';
import { BaseAdapter, type AdapterTimeouts } from './adapter.js';
import { streamOpenAiChat } from './openai-compatible.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const CLOUD_PROBE_MS = 10_000;

export interface CloudOpenAiOptions {
  model: string;
  credential?: string;
  endpoint?: string;
  timeouts?: Partial<AdapterTimeouts>;
  logger?: Logger;
}

export class CloudOpenAiAdapter extends BaseAdapter {
  readonly family = 'cloud-openai-style' as const;
  readonly baseUrl: string;
  private readonly credential?: string;

  constructor(options: CloudOpenAiOptions) {
    super(
      options.model,
      (options.logger ?? rootLogger).child({ component: 'cloud-openai' }),
      { probeMs: CLOUD_PROBE_MS, ...options.timeouts }
    );
    this.credential = options.credential;
    this.baseUrl = (options.endpoint ?? OPENAI_BASE_URL).replace(/\/+$/, '');
  }

  private authHeaders(): Record<string, string> {
    if (!this.credential) {
      throw new CredentialError('API key is required for cloud providers');
    }
    return { Authorization: `Bearer ${this.credential}` };
  }

  // A model list call is the cheapest authenticated round trip
  protected async check(): Promise<ProbeResult> {
    if (!this.credential) {
      return { ok: false, message: 'API key is required for cloud providers' };
    }

    const response = await fetch(`${this.baseUrl}/models`, {
      headers: this.authHeaders(),
      signal: AbortSignal.timeout(this.timeouts.probeMs)
    });
    if (response.status === 200) {
      return { ok: true, message: 'Connected to OpenAI' };
    }
    return { ok: false, message: `API returned status ${response.status}` };
  }

  protected async *generate(
    request: GenerationRequest,
    signal: AbortSignal
  ): AsyncGenerator<StreamFragment> {
    yield* streamOpenAiChat({
      url: `${this.baseUrl}/chat/completions`,
      model: this.model,
      headers: this.authHeaders(),
      request,
      signal,
      log: this.log
    });
  }
}
