import pino, { type Logger } from 'pino';
import type { LogLevel } from '@tessera/types';

export type { Logger };

export const logger = pino({
  level: process.env.TESSERA_LOG_LEVEL ?? 'info',
  base: {
    service: 'tessera',
  },
});

// Create child loggers for different modules
export const createLogger = (module: string, level?: LogLevel): Logger =>
  level === undefined ? logger.child({ module }) : logger.child({ module }, { level });

/** Logger that discards everything, for tests */
export const silentLogger: Logger = pino({ level: 'silent' });
