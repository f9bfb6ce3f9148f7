import pino, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from './schema.js';

export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL' | 'SYMBOL' | 'PAPER_MODE'>): Logger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    base: {
      service: 'position-risk-engine',
      symbol: config.SYMBOL,
      mode: config.PAPER_MODE ? 'paper' : 'live'
    },
    redact: ['TERMINAL_API_KEY', 'TERMINAL_API_SECRET', '*.TERMINAL_API_SECRET']
  };

  return pino(options);
}
