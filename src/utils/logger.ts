import pino, { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  service?: string;
}

function createLoggerOptions(config: LoggerConfig = {}): LoggerOptions {
  return {
    level: config.level ?? process.env.LOG_LEVEL ?? 'info',
    base: {
      pid: process.pid,
      service: config.service ?? 'awaitq',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export function createLogger(config?: LoggerConfig): Logger {
  return pino(createLoggerOptions(config));
}

// Shared logger; queues bind a child per queue name.
export const logger = createLogger();

export default logger;
