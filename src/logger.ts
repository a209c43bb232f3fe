import pino, { type Logger } from 'pino';
import { config } from './config';

export type { Logger };

export const logger: Logger = pino({
  name: 'goalpost',
  level: config.nodeEnv === 'test' ? 'silent' : config.logLevel,
  redact: {
    paths: ['token', '*.token', 'apiKey'],
    censor: '[redacted]',
  },
});
