import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const underTest = process.env.VITEST !== undefined;
  const level = options.level ?? process.env.LOG_LEVEL ?? (underTest ? 'silent' : 'info');
  const pretty = options.pretty ?? (process.env.NODE_ENV !== 'production' && !underTest);

  if (!pretty) {
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: { colorize: true }
    }
  });
}

export const logger = createLogger();
