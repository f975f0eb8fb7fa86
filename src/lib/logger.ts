// Path: src/lib/logger.ts
// Centralized Pino logger for op-env-sync

import pino from 'pino';
import { createRequire } from 'node:module';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDev = process.env.NODE_ENV !== 'production';

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

function hasPinoPretty(): boolean {
  if (pinoPrettyAvailable === null) {
    try {
      createRequire(import.meta.url).resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }
  return pinoPrettyAvailable;
}

/**
 * Pretty transport on stderr when pino-pretty is installed.
 * Command output owns stdout, so logs never go there.
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (isTest || !isDev || !hasPinoPretty()) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

const transport = createTransport();

/**
 * Base logger instance
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal, silent (default: warn)
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'warn'),
    transport,
    base: {
      service: 'op-env-sync',
    },
    // Secret values never reach the log
    redact: {
      paths: ['value', 'secrets', '*.value', 'assignments', 'content'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  transport ? undefined : pino.destination(2)
);

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'fly' });
 * log.info({ app: 'myapp' }, 'Secrets staged');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

// Pre-configured module loggers
export const opLogger = createLogger({ module: '1password' });
export const flyLogger = createLogger({ module: 'fly' });
export const gitLogger = createLogger({ module: 'git' });
export const syncLogger = createLogger({ module: 'sync' });
export const configLogger = createLogger({ module: 'config' });

export type Logger = pino.Logger;
