/**
 * Logging Configuration
 * Single source of truth for logger behavior
 */

// The process logger is built at import time; .env must be loaded first
import 'dotenv/config';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  redactFields: string[];
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const rawLevel = (env.LOG_LEVEL || 'info').toLowerCase();

  return {
    level: isLogLevel(rawLevel) ? rawLevel : 'info',
    pretty: env.LOG_PRETTY === 'true',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,token,password,apiKey,api_key,secret')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
