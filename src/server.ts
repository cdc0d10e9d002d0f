#!/usr/bin/env node
import { AuditLog } from './audit/index.js';
import { buildServer } from './app.js';
import { adapterDepsFromConfig, loadConfig, originMatchers } from './config.js';
import { ConsultationGateway } from './gateway/index.js';
import { logger } from './logger.js';
import { SettingsStore } from './settings/store.js';

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('ConsultGate starting...');

  const settings = new SettingsStore(config.storage.settings_file, logger);
  const audit = new AuditLog(config.storage.audit_log);

  const gatewayOptions = {
    logger,
    adapterDeps: adapterDepsFromConfig(config)
  };

  const stored = settings.load();
  let gateway: ConsultationGateway;
  if (stored) {
    gateway = ConsultationGateway.fromSettings(stored, gatewayOptions);
  } else {
    gateway = new ConsultationGateway(gatewayOptions);
    gateway.configure(config.gateway);
  }

  const app = await buildServer({
    gateway,
    settings,
    audit,
    logger,
    corsOrigins: originMatchers(config.cors.allowed_origins),
    requestsPerMinute: config.rate_limits.requests_per_minute
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`ConsultGate listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'ConsultGate failed to start');
  process.exit(1);
});
