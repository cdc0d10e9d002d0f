import { logger as rootLogger, type Logger } from '../logger.js';
import {
  createAdapter,
  LlamaCppEngine,
  ModelArena,
  type AdapterDependencies,
  type AdapterFactory,
  type LocalEngine,
  type ProviderAdapter
} from '../inference/index.js';
import type {
  BackendSelection,
  ChatTurn,
  GatewayConfig,
  ProbeResult,
  ProviderFamily,
  StreamFragment
} from '../types/index.js';
import {
  BackendSelectionSchema,
  CONSENT_REQUIRED_MESSAGE,
  ConfigurationError,
  NOT_CONFIGURED_MESSAGE,
  isCloudFamily
} from '../types/index.js';

export interface GatewayOptions {
  logger?: Logger;
  engine?: LocalEngine;
  adapterFactory?: AdapterFactory;
  adapterDeps?: Omit<AdapterDependencies, 'arena' | 'logger'>;
}

export interface GatewayStatus {
  configured: boolean;
  family?: ProviderFamily;
  model?: string;
  dialect?: string;
  consentGranted: boolean;
  requiresConsent: boolean;
}

export interface GenerateOptions {
  systemPrompt?: string;
  history?: ChatTurn[];
  signal?: AbortSignal;
}

/**
 * Owns the current backend configuration and the one adapter built from it.
 *
 * Configuration changes are not safe while a stream is in flight; callers
 * serialize them.
 */
export class ConsultationGateway {
  private readonly log: Logger;
  private readonly arena: ModelArena;
  private readonly adapterFactory: AdapterFactory;
  private readonly adapterDeps: AdapterDependencies;
  private selection?: BackendSelection;
  private adapter?: ProviderAdapter;
  private consentInstitutional = false;
  private consentData = false;

  constructor(options: GatewayOptions = {}) {
    const base = options.logger ?? rootLogger;
    this.log = base.child({ component: 'gateway' });
    this.arena = new ModelArena(options.engine ?? new LlamaCppEngine(), base.child({ component: 'model-arena' }));
    this.adapterFactory = options.adapterFactory ?? createAdapter;
    this.adapterDeps = { ...options.adapterDeps, arena: this.arena, logger: base };
  }

  static fromSettings(settings: GatewayConfig, options: GatewayOptions = {}): ConsultationGateway {
    const gateway = new ConsultationGateway(options);
    gateway.configure(settings);
    gateway.setInstitutionalConsent(settings.consentInstitutional);
    gateway.setDataConsent(settings.consentData);
    return gateway;
  }

  /**
   * Validates the selection and rebuilds the adapter, discarding the previous
   * one. Consent flags are kept across reconfiguration.
   */
  configure(selection: BackendSelection): GatewayStatus {
    const parsed = BackendSelectionSchema.safeParse(selection);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError('INVALID_CONFIG', `Invalid backend configuration: ${detail}`);
    }

    const previous = this.selection?.family;
    this.selection = parsed.data;
    this.adapter = this.adapterFactory(this.currentConfig(parsed.data), this.adapterDeps);

    this.log.info(
      { family: parsed.data.family, model: parsed.data.modelId, previous },
      'Backend configured'
    );
    return this.status();
  }

  setInstitutionalConsent(granted: boolean): void {
    this.consentInstitutional = granted;
    this.log.info({ granted }, 'Institutional consent updated');
  }

  setDataConsent(granted: boolean): void {
    this.consentData = granted;
    this.log.info({ granted }, 'Data consent updated');
  }

  get consentGranted(): boolean {
    return this.consentInstitutional && this.consentData;
  }

  status(): GatewayStatus {
    const family = this.selection?.family;
    return {
      configured: this.selection !== undefined,
      family,
      model: this.selection?.modelId,
      dialect: this.selection?.dialect,
      consentGranted: this.consentGranted,
      requiresConsent: family !== undefined && isCloudFamily(family)
    };
  }

  /** Current settings, credential included, for the settings store. */
  toSettings(): GatewayConfig | undefined {
    return this.selection ? this.currentConfig(this.selection) : undefined;
  }

  async probe(): Promise<ProbeResult> {
    if (!this.adapter) {
      return { ok: false, message: NOT_CONFIGURED_MESSAGE };
    }
    const result = await this.adapter.probe();
    this.log.info({ family: this.adapter.family, ok: result.ok }, `Probe: ${result.message}`);
    return result;
  }

  async *generate(
    userText: string,
    options: GenerateOptions = {}
  ): AsyncGenerator<StreamFragment> {
    const adapter = this.adapter;
    if (!adapter) {
      yield { kind: 'error', code: 'NOT_CONFIGURED', message: NOT_CONFIGURED_MESSAGE };
      return;
    }

    if (isCloudFamily(adapter.family) && !this.consentGranted) {
      this.log.warn({ family: adapter.family }, 'Generation refused: cloud consent not granted');
      yield { kind: 'error', code: 'CONSENT_REQUIRED', message: CONSENT_REQUIRED_MESSAGE };
      return;
    }

    yield* adapter.stream({
      text: userText,
      systemPrompt: options.systemPrompt,
      history: options.history,
      signal: options.signal
    });
  }

  /** Frees the resident local model, if any. */
  async close(): Promise<void> {
    await this.arena.unload();
  }

  private currentConfig(selection: BackendSelection): GatewayConfig {
    return {
      ...selection,
      consentInstitutional: this.consentInstitutional,
      consentData: this.consentData
    };
  }
}
