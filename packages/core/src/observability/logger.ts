import { pino, type Logger, type LoggerOptions } from 'pino';

export const loggerOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'bankdw-dimensions' },
  redact: {
    paths: ['*.password', '*.secret', '*.token', 'headers.authorization'],
    remove: true,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const rootLogger: Logger = pino(loggerOptions);

/**
 * Child logger bound to a module name.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

export type { Logger };
