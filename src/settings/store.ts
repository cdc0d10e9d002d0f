import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { logger as rootLogger, type Logger } from '../logger.js';
import { GatewaySettingsSchema, type GatewayConfig } from '../types/index.js';

export const DEFAULT_SETTINGS_PATH = resolve(homedir(), '.consultgate', 'settings.yaml');

/**
 * Persists the gateway's backend selection and consent flags between runs.
 * The file may hold a credential, so it is written owner-only.
 */
export class SettingsStore {
  private readonly log: Logger;

  constructor(
    readonly path: string = DEFAULT_SETTINGS_PATH,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'settings' });
  }

  load(): GatewayConfig | null {
    if (!existsSync(this.path)) return null;

    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      this.log.warn({ err: error, path: this.path }, 'Settings file is not valid YAML; ignoring it');
      return null;
    }

    const parsed = GatewaySettingsSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ path: this.path, issues: parsed.error.issues.length }, 'Settings file failed validation; ignoring it');
      return null;
    }
    return parsed.data;
  }

  save(settings: GatewayConfig): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    writeFileSync(this.path, stringifyYaml(settings), { mode: 0o600 });
    this.log.info({ path: this.path, family: settings.family }, 'Settings saved');
  }

  clear(): void {
    if (existsSync(this.path)) {
      unlinkSync(this.path);
      this.log.info({ path: this.path }, 'Settings cleared');
    }
  }
}
