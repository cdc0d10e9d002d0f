import type { Logger } from '../logger.js';
import type { GatewayConfig } from '../types/index.js';
import type { AdapterTimeouts, ProviderAdapter } from './adapter.js';
import { CloudAnthropicAdapter, type AnthropicStreamClient } from './cloud-anthropic.js';
import { CLOUD_PROBE_MS, CloudOpenAiAdapter } from './cloud-openai.js';
import { LocalProcessAdapter } from './local-process.js';
import { LocalServerAdapter } from './local-server.js';
import type { ModelArena } from './model-arena.js';

export { BaseAdapter, DEFAULT_TIMEOUTS, decodeLineStream } from './adapter.js';
export type { AdapterTimeouts, ProviderAdapter } from './adapter.js';
export * from './decoders.js';
export { readLines, openScope } from './http.js';
export { buildChatMessages, buildConversationTurns, flattenConversation } from './prompt.js';
export { LocalServerAdapter, DEFAULT_LOCAL_ENDPOINTS } from './local-server.js';
export { CloudOpenAiAdapter, CLOUD_PROBE_MS, OPENAI_BASE_URL } from './cloud-openai.js';
export { CloudAnthropicAdapter, createSdkStreamClient } from './cloud-anthropic.js';
export type { AnthropicStreamClient, AnthropicStreamParams } from './cloud-anthropic.js';
export { LocalProcessAdapter, DEFAULT_MODELS_DIR } from './local-process.js';
export { ModelArena, fingerprint } from './model-arena.js';
export type { LocalEngine, LoadedModel, ModelSpec, EngineGenerateOptions } from './model-arena.js';
export { LlamaCppEngine } from './llama-engine.js';

export interface AdapterDependencies {
  arena: ModelArena;
  logger: Logger;
  modelsDir?: string;
  timeouts?: Partial<AdapterTimeouts>;
  /** Probe timeout for the cloud model list call; `timeouts.probeMs` does not apply to it. */
  cloudProbeMs?: number;
  anthropicClient?: AnthropicStreamClient;
  localProcess?: { contextSize?: number; maxTokens?: number };
}

export type AdapterFactory = (config: GatewayConfig, deps: AdapterDependencies) => ProviderAdapter;

// The family set is closed; adding a variant means adding a case here
export const createAdapter: AdapterFactory = (config, deps) => {
  switch (config.family) {
    case 'local-process':
      return new LocalProcessAdapter({
        model: config.modelId,
        arena: deps.arena,
        modelsDir: deps.modelsDir,
        contextSize: deps.localProcess?.contextSize,
        maxTokens: deps.localProcess?.maxTokens,
        timeouts: deps.timeouts,
        logger: deps.logger
      });

    case 'local-server':
      return new LocalServerAdapter({
        model: config.modelId,
        dialect: config.dialect,
        endpoint: config.endpoint,
        timeouts: deps.timeouts,
        logger: deps.logger
      });

    case 'cloud-openai-style':
      return new CloudOpenAiAdapter({
        model: config.modelId,
        credential: config.credential,
        endpoint: config.endpoint,
        timeouts: { ...deps.timeouts, probeMs: deps.cloudProbeMs ?? CLOUD_PROBE_MS },
        logger: deps.logger
      });

    case 'cloud-anthropic-style':
      return new CloudAnthropicAdapter({
        model: config.modelId,
        credential: config.credential,
        client: deps.anthropicClient,
        timeouts: deps.timeouts,
        logger: deps.logger
      });

    default: {
      const unreachable: never = config.family;
      throw new Error(`Unsupported provider family: ${String(unreachable)}`);
    }
  }
};
