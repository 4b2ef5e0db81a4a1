import { LogLevel } from './Logger';

export type DatabaseEngine = 'postgres' | 'mysql';

export type BackoffStrategy = 'fixed' | 'exponential';

export type NotificationChannel = 'telegram' | 'webhook' | 'log';

/**
 * Retention rules for one target. When both dimensions are set an artifact
 * is kept if either of them keeps it.
 */
export interface RetentionPolicy {
  /** Keep the newest N artifacts */
  keepLast?: number;

  /** Keep artifacts no older than this many days */
  maxAgeDays?: number;
}

/**
 * One database to back up
 */
export interface BackupTarget {
  id: string;
  engine: DatabaseEngine;
  host: string;
  port: number;
  user: string;

  /** Absent when the whole server is dumped */
  database?: string;
  allDatabases: boolean;

  /** Resolved from the environment variable named by `passwordEnv` */
  password?: string;
  passwordEnv?: string;

  enabled: boolean;
  extraArgs: string[];

  /** Path to the dump binary, defaults to pg_dump / mysqldump on PATH */
  dumpCommand?: string;

  retention: RetentionPolicy;
  timeoutSeconds: number;
}

export interface RetryConfig {
  maxAttempts: number;
  backoff: BackoffStrategy;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface S3DestinationConfig {
  bucket: string;
  prefix: string;
  region: string;
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export interface DestinationConfig {
  root: string;
  s3?: S3DestinationConfig;
}

export interface TelegramSettings {
  chatId: string;
  botToken: string;
}

export interface WebhookSettings {
  url: string;
  headers: Record<string, string>;
}

export interface NotificationConfig {
  channel: NotificationChannel;
  telegram?: TelegramSettings;
  webhook?: WebhookSettings;
}

export interface BackupConfig {
  schedule?: string; // cron format
  timezone: string;
  runOnStart: boolean;
  logLevel: LogLevel;
  workDir: string;
  concurrency: number;
  retry: RetryConfig;
  destination: DestinationConfig;
  notifications: NotificationConfig;
  targets: BackupTarget[];
}
