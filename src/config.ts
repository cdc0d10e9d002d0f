import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { AdapterDependencies } from './inference/index.js';
import { BackendSelectionSchema, ConfigurationError } from './types/index.js';

const HOME_DIR = resolve(homedir(), '.consultgate');

const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8088),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  cors: z
    .object({
      allowed_origins: z.array(z.string()).default(['http://localhost:*'])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_minute: z.number().int().positive().default(60)
    })
    .default({}),
  // Used when no settings have been saved yet
  gateway: BackendSelectionSchema.default({
    family: 'local-server',
    modelId: 'gemma3:4b',
    dialect: 'ndjson-chat'
  }),
  local_process: z
    .object({
      models_dir: z.string().default(resolve(HOME_DIR, 'models')),
      context_size: z.number().int().positive().optional(),
      max_tokens: z.number().int().positive().optional()
    })
    .default({}),
  timeouts: z
    .object({
      probe_ms: z.number().int().positive().default(5_000),
      cloud_probe_ms: z.number().int().positive().default(10_000),
      generation_ms: z.number().int().positive().default(120_000)
    })
    .default({}),
  storage: z
    .object({
      settings_file: z.string().default(resolve(HOME_DIR, 'settings.yaml')),
      audit_log: z.string().default(resolve(HOME_DIR, 'logs', 'audit.jsonl'))
    })
    .default({})
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const CONFIG_PATHS = [
  resolve(process.cwd(), 'consultgate.yaml'),
  resolve(HOME_DIR, 'config.yaml'),
  resolve(homedir(), '.config', 'consultgate', 'config.yaml')
];

export function parseConfig(raw: unknown, source = 'config'): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('INVALID_CONFIG', `Invalid ${source}: ${detail}`);
  }
  return parsed.data;
}

export function loadConfig(paths: string[] = CONFIG_PATHS, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  let config: ServerConfig | undefined;

  for (const path of paths) {
    if (existsSync(path)) {
      config = parseConfig(parseYaml(readFileSync(path, 'utf-8')), path);
      break;
    }
  }
  config ??= parseConfig({});

  const port = env.CONSULTGATE_PORT;
  if (port !== undefined) {
    const parsedPort = Number.parseInt(port, 10);
    if (Number.isNaN(parsedPort)) {
      throw new ConfigurationError('INVALID_CONFIG', `CONSULTGATE_PORT is not a number: ${port}`);
    }
    config.server.port = parsedPort;
  }

  return config;
}

// "http://localhost:*" style wildcards become anchored patterns
export function originMatchers(origins: string[]): (string | RegExp)[] {
  return origins.map((origin) => {
    if (!origin.includes('*')) return origin;
    const escaped = origin.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
    return new RegExp(`^${escaped}$`);
  });
}

export function adapterDepsFromConfig(config: ServerConfig): Omit<AdapterDependencies, 'arena' | 'logger'> {
  return {
    modelsDir: config.local_process.models_dir,
    localProcess: {
      contextSize: config.local_process.context_size,
      maxTokens: config.local_process.max_tokens
    },
    timeouts: {
      probeMs: config.timeouts.probe_ms,
      generationMs: config.timeouts.generation_ms
    },
    cloudProbeMs: config.timeouts.cloud_probe_ms
  };
}
