/**
 * Logger utility using pino
 */

import pino from 'pino';
import { getConfig } from '../config/index.js';

let _logger: pino.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    const config = getConfig();

    const transport = config.logFormat === 'pretty' && config.logLevel !== 'silent'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    _logger = pino({
      level: config.logLevel,
      transport,
    });
  }
  return _logger;
}

/**
 * Create a child logger with context
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

/**
 * Drop the cached logger so the next call picks up the current config
 */
export function resetLogger(): void {
  _logger = null;
}
