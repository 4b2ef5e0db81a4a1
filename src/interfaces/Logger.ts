export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup runs
  logRunStart(runId: string, targetCount: number): void;
  logRunComplete(runId: string, status: string, duration: number, meta?: LogMeta): void;
  logTargetTransition(targetId: string, from: string, to: string, meta?: LogMeta): void;
  logRetention(targetId: string, location: string, deletedCount: number, keptCount: number): void;
  logConfigurationStart(config: Record<string, unknown>): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
