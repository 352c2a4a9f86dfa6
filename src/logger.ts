import { pino, type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';

// Query names must never reach a log line. Core code does not pass them to the
// logger; these paths catch anything that slips through request logging.
const REDACT_PATHS = [
  'domain',
  'domains',
  'name',
  'qname',
  'query',
  '*.domain',
  '*.domains',
  '*.name',
  '*.qname',
  'req.body',
  'req.query'
];

export function loggerOptions(config: Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL'>): LoggerOptions {
  const level = config.LOG_LEVEL ?? (config.NODE_ENV === 'test' ? 'silent' : config.NODE_ENV === 'production' ? 'info' : 'debug');
  return {
    level,
    base: undefined,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' }
  };
}

export function createLogger(config: Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL'>): Logger {
  return pino(loggerOptions(config));
}

export type { Logger };
