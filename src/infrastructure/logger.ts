import pino, { type Logger } from 'pino';
import type { DecoderConfig } from './config.js';

export function createLogger(config: Pick<DecoderConfig, 'logLevel'>): Logger {
  return pino({ level: config.logLevel });
}
