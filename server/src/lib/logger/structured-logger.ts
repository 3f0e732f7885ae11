/**
 * Structured Logger
 *
 * - JSON output (pino) for machine parsing
 * - Sensitive field redaction, top level and one level deep
 * - Child loggers carry request/session context
 */

import { pino, type Logger } from 'pino';
import { getLoggingConfig, type LoggingConfig } from '../../config/logging.config.js';

export type { Logger };

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Redact the field at top level and one level deep.
 * Names that are not plain identifiers are skipped.
 */
function redactPaths(fields: string[]): string[] {
  return fields
    .filter(field => IDENTIFIER.test(field))
    .flatMap(field => [field, `*.${field}`]);
}

export function createLogger(config: LoggingConfig = getLoggingConfig()): Logger {
  return pino({
    level: config.level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: redactPaths(config.redactFields), censor: '[REDACTED]' },
    ...(config.pretty
      ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
      : {}),
  });
}

/**
 * Process-wide logger
 * Configure via LOG_LEVEL / LOG_PRETTY / LOG_REDACT_FIELDS
 */
export const logger = createLogger();
