import pino, { type Logger } from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  level: config.LOG_LEVEL,
  base: { service: 'poster-relay' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

export type { Logger };

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
