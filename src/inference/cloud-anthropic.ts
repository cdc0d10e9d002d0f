import Anthropic from '@anthropic-ai/sdk';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { ChatTurn, GenerationRequest, ProbeResult, StreamFragment } from '../types/index.js';
import { ConnectivityError, CredentialError, ProtocolError } from '../types/index.js';
import { BaseAdapter, type AdapterTimeouts } from './adapter.js';
import { decodeAnthropicEvent } from './decoders.js';
import { buildConversationTurns } from './prompt.js';

const ANTHROPIC_KEY_PREFIX = 'sk-ant-';
const MAX_OUTPUT_TOKENS = 4096;

export interface AnthropicStreamParams {
  model: string;
  max_tokens: number;
  system?: string;
  messages: ChatTurn[];
}

/** The single SDK call this adapter needs; tests supply their own. */
export interface AnthropicStreamClient {
  createMessageStream(params: AnthropicStreamParams, signal: AbortSignal): Promise<AsyncIterable<unknown>>;
}

export function createSdkStreamClient(apiKey: string, timeoutMs: number): AnthropicStreamClient {
  const client = new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs });
  return {
    createMessageStream: (params, signal) =>
      client.messages.create({ ...params, stream: true }, { signal })
  };
}

export interface CloudAnthropicOptions {
  model: string;
  credential?: string;
  client?: AnthropicStreamClient;
  timeouts?: Partial<AdapterTimeouts>;
  logger?: Logger;
}

function translateSdkError(error: unknown): unknown {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ConnectivityError('TIMEOUT', 'Request timed out', { cause: error });
  }
  if (error instanceof Anthropic.APIUserAbortError) {
    return new ConnectivityError('CONNECTIVITY', 'Request aborted', { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ConnectivityError('CONNECTIVITY', `Connection failed: ${error.message}`, {
      cause: error
    });
  }
  if (error instanceof Anthropic.APIError) {
    return new ConnectivityError('HTTP_STATUS', `Error: ${error.message}`, {
      cause: error,
      status: error.status
    });
  }
  return error;
}

export class CloudAnthropicAdapter extends BaseAdapter {
  readonly family = 'cloud-anthropic-style' as const;
  private readonly credential?: string;
  private client?: AnthropicStreamClient;

  constructor(options: CloudAnthropicOptions) {
    super(
      options.model,
      (options.logger ?? rootLogger).child({ component: 'cloud-anthropic' }),
      options.timeouts
    );
    this.credential = options.credential;
    this.client = options.client;
  }

  // No cheap authenticated endpoint exists, so only the key shape is checked
  protected async check(): Promise<ProbeResult> {
    if (!this.credential) {
      return { ok: false, message: 'API key is required for cloud providers' };
    }
    if (this.credential.startsWith(ANTHROPIC_KEY_PREFIX)) {
      return { ok: true, message: 'Anthropic API key format valid' };
    }
    return { ok: false, message: 'Invalid API key format' };
  }

  private streamClient(): AnthropicStreamClient {
    if (!this.credential) {
      throw new CredentialError('API key is required for cloud providers');
    }
    this.client ??= createSdkStreamClient(this.credential, this.timeouts.generationMs);
    return this.client;
  }

  protected async *generate(
    request: GenerationRequest,
    signal: AbortSignal
  ): AsyncGenerator<StreamFragment> {
    const client = this.streamClient();
    const params: AnthropicStreamParams = {
      model: this.model,
      max_tokens: MAX_OUTPUT_TOKENS,
      messages: buildConversationTurns(request)
    };
    if (request.systemPrompt) {
      params.system = request.systemPrompt;
    }

    try {
      const events = await client.createMessageStream(params, signal);
      for await (const event of events) {
        const chunk = decodeAnthropicEvent(event);
        if (chunk.text) {
          yield { kind: 'text', text: chunk.text };
        }
        if (chunk.error) {
          throw new ProtocolError(chunk.error, { code: 'PROVIDER' });
        }
        if (chunk.done) return;
      }
    } catch (error) {
      throw translateSdkError(error);
    }
  }
}
