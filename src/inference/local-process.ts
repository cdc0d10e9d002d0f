import { isAbsolute, resolve } from 'path';
import { homedir } from 'os';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { GenerationRequest, ProbeResult, StreamFragment } from '../types/index.js';
import { BaseAdapter, type AdapterTimeouts } from './adapter.js';
import type { ModelArena, ModelSpec } from './model-arena.js';
import { flattenConversation } from './prompt.js';

export const DEFAULT_MODELS_DIR = resolve(homedir(), '.consultgate', 'models');

export interface LocalProcessOptions {
  model: string;
  arena: ModelArena;
  modelsDir?: string;
  contextSize?: number;
  maxTokens?: number;
  timeouts?: Partial<AdapterTimeouts>;
  logger?: Logger;
}

// Bridges the engine's text callback into a pull-based sequence
class TextQueue implements AsyncIterable<string> {
  private readonly items: string[] = [];
  private waiting?: () => void;
  private closed = false;
  private failure?: { error: unknown };

  push(text: string): void {
    this.items.push(text);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  fail(error: unknown): void {
    this.failure = { error };
    this.close();
  }

  private wake(): void {
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    for (;;) {
      const next = this.items.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.failure) throw this.failure.error;
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waiting = resolve;
      });
    }
  }
}

/**
 * Runs the model inside this process. The engine has no multi-turn API, so
 * the conversation is flattened into one role-prefixed prompt.
 */
export class LocalProcessAdapter extends BaseAdapter {
  readonly family = 'local-process' as const;
  readonly spec: ModelSpec;
  private readonly arena: ModelArena;
  private readonly maxTokens?: number;

  constructor(options: LocalProcessOptions) {
    super(
      options.model,
      (options.logger ?? rootLogger).child({ component: 'local-process' }),
      options.timeouts
    );
    this.arena = options.arena;
    this.maxTokens = options.maxTokens;
    this.spec = {
      modelPath: isAbsolute(options.model)
        ? options.model
        : resolve(options.modelsDir ?? DEFAULT_MODELS_DIR, options.model),
      contextSize: options.contextSize
    };
  }

  // Loads the model if it is not already resident
  protected async check(): Promise<ProbeResult> {
    const lease = await this.arena.acquire(this.spec);
    lease.release();
    return { ok: true, message: `Model loaded: ${this.model}` };
  }

  protected async *generate(
    request: GenerationRequest,
    signal: AbortSignal
  ): AsyncGenerator<StreamFragment> {
    const lease = await this.arena.acquire(this.spec);
    const local = new AbortController();
    const queue = new TextQueue();

    const run = lease.model
      .generate(flattenConversation(request), {
        signal: AbortSignal.any([signal, local.signal]),
        maxTokens: this.maxTokens,
        onText: (text) => {
          if (text) queue.push(text);
        }
      })
      .then(
        () => queue.close(),
        (error: unknown) => queue.fail(error)
      )
      // Released when the engine run settles, not when the consumer returns
      .finally(() => lease.release());

    try {
      for await (const text of queue) {
        yield { kind: 'text', text };
      }
    } finally {
      local.abort();
      await run;
    }
  }
}
