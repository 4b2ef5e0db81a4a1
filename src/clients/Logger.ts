import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'accesskey', 'authorization'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Replace values of sensitive keys with [REDACTED], recursively
 */
export function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase().replace(/[_-]/g, '');
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    } else if (Array.isArray(value)) {
      sanitized[key] = value.map(item => (isPlainObject(item) ? sanitizeMeta(item) : item));
    }
  }

  return sanitized;
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: Record<string, unknown> = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...('code' in error && { code: error.code }),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logRunStart(runId: string, targetCount: number): void {
    this.info('Backup run started', {
      operation: 'run_start',
      runId,
      targetCount,
    });
  }

  logRunComplete(runId: string, status: string, duration: number, meta?: LogMeta): void {
    const message = `Backup run finished: ${status}`;
    const runMeta = { operation: 'run_complete', runId, status, duration, ...meta };

    if (status === 'success') {
      this.info(message, runMeta);
    } else {
      this.warn(message, runMeta);
    }
  }

  logTargetTransition(targetId: string, from: string, to: string, meta?: LogMeta): void {
    this.info(`Target ${targetId}: ${from} -> ${to}`, {
      operation: 'target_transition',
      targetId,
      from,
      to,
      ...meta,
    });
  }

  logRetention(targetId: string, location: string, deletedCount: number, keptCount: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      targetId,
      location,
      deletedCount,
      keptCount,
    });
  }

  logConfigurationStart(config: Record<string, unknown>): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }
}
