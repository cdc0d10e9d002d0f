import type { Logger } from '../logger.js';

export interface ModelSpec {
  modelPath: string;
  contextSize?: number;
}

export interface EngineGenerateOptions {
  signal: AbortSignal;
  maxTokens?: number;
  onText(text: string): void;
}

export interface LoadedModel {
  /** Resolves when generation ends; rejects if it fails or is aborted. */
  generate(prompt: string, options: EngineGenerateOptions): Promise<void>;
  dispose(): Promise<void>;
}

export interface LocalEngine {
  load(spec: ModelSpec): Promise<LoadedModel>;
}

export interface ModelLease {
  model: LoadedModel;
  release(): void;
}

export function fingerprint(spec: ModelSpec): string {
  return `${spec.modelPath}::${spec.contextSize ?? 'auto'}`;
}

class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => held);
    return previous.then(() => release);
  }
}

/**
 * Holds at most one resident model. Loading, probing and generation all go
 * through the same lock, so generations run strictly one after another and
 * a model is swapped only when the requested spec has a different
 * fingerprint.
 */
export class ModelArena {
  private readonly lock = new AsyncLock();
  private resident?: { fingerprint: string; model: LoadedModel };

  constructor(
    private readonly engine: LocalEngine,
    private readonly log: Logger
  ) {}

  get residentFingerprint(): string | undefined {
    return this.resident?.fingerprint;
  }

  async acquire(spec: ModelSpec): Promise<ModelLease> {
    const release = await this.lock.acquire();
    try {
      return { model: await this.ensureLoaded(spec), release };
    } catch (error) {
      release();
      throw error;
    }
  }

  async unload(): Promise<void> {
    const release = await this.lock.acquire();
    try {
      await this.disposeResident();
    } finally {
      release();
    }
  }

  private async ensureLoaded(spec: ModelSpec): Promise<LoadedModel> {
    const wanted = fingerprint(spec);
    if (this.resident?.fingerprint === wanted) {
      return this.resident.model;
    }

    await this.disposeResident();

    const startTime = Date.now();
    this.log.info({ model: spec.modelPath }, 'Loading local model');
    const model = await this.engine.load(spec);
    this.resident = { fingerprint: wanted, model };
    this.log.info({ model: spec.modelPath, load_ms: Date.now() - startTime }, 'Local model loaded');
    return model;
  }

  private async disposeResident(): Promise<void> {
    const resident = this.resident;
    if (!resident) return;
    this.resident = undefined;
    await resident.model.dispose();
    this.log.info({ fingerprint: resident.fingerprint }, 'Local model unloaded');
  }
}
