import { readFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as cron from 'node-cron';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  BackupConfig,
  BackupTarget,
  DatabaseEngine,
  NotificationConfig,
  S3DestinationConfig,
} from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';
import { ConfigurationError } from '../errors/BackupError';

export { ConfigurationError };

export const DEFAULT_CONFIG_PATH = './backup.yaml';

const DEFAULT_PORTS: Record<DatabaseEngine, number> = {
  postgres: 5432,
  mysql: 3306,
};

const retentionSchema = z
  .object({
    keepLast: z.number().int().min(0).optional(),
    maxAgeDays: z.number().positive().optional(),
  })
  .strict();

const targetSchema = z
  .object({
    id: z
      .string()
      .regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be lowercase letters, digits, "-" or "_"'),
    engine: z.enum(['postgres', 'mysql']).default('postgres'),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
    user: z.string().min(1),
    database: z.string().min(1).optional(),
    allDatabases: z.boolean().default(false),
    passwordEnv: z.string().min(1).optional(),
    enabled: z.boolean().default(true),
    extraArgs: z.array(z.string()).default([]),
    dumpCommand: z.string().min(1).optional(),
    retention: retentionSchema.optional(),
    timeoutSeconds: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine((target, ctx) => {
    if (target.allDatabases === (target.database !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['database'],
        message: 'set either database or allDatabases: true',
      });
    }
  });

const configFileSchema = z
  .object({
    schedule: z.string().min(1).optional(),
    timezone: z.string().min(1).default('UTC'),
    runOnStart: z.boolean().default(false),
    logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
    workDir: z.string().min(1).optional(),
    concurrency: z.number().int().min(1).max(32).default(1),
    timeoutSeconds: z.number().int().positive().default(3600),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10).default(3),
        backoff: z.enum(['fixed', 'exponential']).default('exponential'),
        initialDelayMs: z.number().int().min(0).default(5000),
        maxDelayMs: z.number().int().min(0).default(60000),
      })
      .strict()
      .default({}),
    retention: retentionSchema.default({}),
    destination: z
      .object({
        root: z.string().min(1),
        s3: z
          .object({
            bucket: z.string().min(1),
            prefix: z.string().default(''),
            region: z.string().min(1).default('us-east-1'),
            endpoint: z.string().url().optional(),
          })
          .strict()
          .optional(),
      })
      .strict(),
    notifications: z
      .object({
        channel: z.enum(['telegram', 'webhook', 'log']).default('log'),
        telegram: z.object({ chatId: z.string().min(1) }).strict().optional(),
        webhook: z
          .object({
            url: z.string().url(),
            headers: z.record(z.string()).default({}),
          })
          .strict()
          .optional(),
      })
      .strict()
      .default({}),
    targets: z
      .array(targetSchema)
      .min(1)
      .superRefine((targets, ctx) => {
        const seen = new Set<string>();
        targets.forEach((target, index) => {
          if (seen.has(target.id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, 'id'],
              message: `duplicate target id "${target.id}"`,
            });
          }
          seen.add(target.id);
        });
      }),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Loads the YAML settings document, applies environment overrides, resolves
 * credential references and validates everything before any target runs.
 */
export class ConfigurationManager {
  /**
   * Resolve the settings file path from the `--config` value, BACKUP_CONFIG_PATH or the default
   */
  static resolveConfigPath(fromFlag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
    return path.resolve(fromFlag || env.BACKUP_CONFIG_PATH || DEFAULT_CONFIG_PATH);
  }

  static loadConfiguration(configPath: string, env: NodeJS.ProcessEnv = process.env): BackupConfig {
    let raw: string;
    try {
      raw = readFileSync(configPath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let document: unknown;
    try {
      document = parseYaml(raw);
    } catch (error) {
      throw new ConfigurationError(
        `Configuration file ${configPath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return ConfigurationManager.parseConfiguration(document, env);
  }

  /**
   * Validate a parsed settings document. Every problem is collected so the
   * operator sees them all at once.
   */
  static parseConfiguration(document: unknown, env: NodeJS.ProcessEnv = process.env): BackupConfig {
    const parsed = configFileSchema.safeParse(document ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map(formatIssue);
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const file = parsed.data;
    const issues: string[] = [];

    const schedule = env.BACKUP_SCHEDULE || file.schedule;
    if (schedule && !cron.validate(schedule)) {
      issues.push(`schedule: "${schedule}" is not a valid cron expression`);
    }

    let logLevel = file.logLevel;
    if (env.LOG_LEVEL) {
      const level = z.nativeEnum(LogLevel).safeParse(env.LOG_LEVEL.toLowerCase());
      if (level.success) {
        logLevel = level.data;
      } else {
        issues.push(`LOG_LEVEL: "${env.LOG_LEVEL}" is not one of ${Object.values(LogLevel).join(', ')}`);
      }
    }

    if (env.DB_HOST && file.targets.length > 1) {
      issues.push(`DB_HOST: only applies to a single target, ${file.targets.length} are configured`);
    }

    const targets = file.targets.map((target, index) =>
      ConfigurationManager.buildTarget(target, file, env, index, issues)
    );
    const s3 = ConfigurationManager.buildS3Destination(file, env, issues);
    const notifications = ConfigurationManager.buildNotifications(file, env, issues);

    if (file.retry.maxDelayMs < file.retry.initialDelayMs) {
      issues.push('retry.maxDelayMs: must not be lower than retry.initialDelayMs');
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const config: BackupConfig = {
      timezone: file.timezone,
      runOnStart: file.runOnStart,
      logLevel,
      workDir: path.resolve(file.workDir ?? path.join(os.tmpdir(), 'db-backup')),
      concurrency: file.concurrency,
      retry: file.retry,
      destination: {
        root: path.resolve(file.destination.root),
        ...(s3 && { s3 }),
      },
      notifications,
      targets,
    };

    if (schedule) {
      config.schedule = schedule;
    }

    return deepFreeze(config);
  }

  /**
   * Copy of the configuration that is safe to write to logs
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    const { destination, notifications, targets, ...rest } = config;

    return {
      ...rest,
      destination: {
        root: destination.root,
        ...(destination.s3 && {
          s3: {
            bucket: destination.s3.bucket,
            prefix: destination.s3.prefix,
            region: destination.s3.region,
            endpoint: destination.s3.endpoint,
            accessKeyId: '[REDACTED]',
            secretAccessKey: '[REDACTED]',
          },
        }),
      },
      notifications: {
        channel: notifications.channel,
        ...(notifications.telegram && {
          telegram: { chatId: notifications.telegram.chatId, botToken: '[REDACTED]' },
        }),
        ...(notifications.webhook && {
          webhook: { url: notifications.webhook.url, headers: '[REDACTED]' },
        }),
      },
      targets: targets.map(({ password, ...target }) => ({
        ...target,
        password: password === undefined ? undefined : '[REDACTED]',
      })),
    };
  }

  private static buildTarget(
    target: ConfigFile['targets'][number],
    file: ConfigFile,
    env: NodeJS.ProcessEnv,
    index: number,
    issues: string[]
  ): BackupTarget {
    let password: string | undefined;
    if (target.passwordEnv) {
      password = env[target.passwordEnv];
      if (!password) {
        issues.push(
          `targets.${index}.passwordEnv: environment variable ${target.passwordEnv} is not set`
        );
      }
    }

    const result: BackupTarget = {
      id: target.id,
      engine: target.engine,
      host: (file.targets.length === 1 && env.DB_HOST) || target.host,
      port: target.port ?? DEFAULT_PORTS[target.engine],
      user: target.user,
      allDatabases: target.allDatabases,
      enabled: target.enabled,
      extraArgs: target.extraArgs,
      retention: target.retention ?? file.retention,
      timeoutSeconds: target.timeoutSeconds ?? file.timeoutSeconds,
    };

    if (target.database) result.database = target.database;
    if (password) result.password = password;
    if (target.passwordEnv) result.passwordEnv = target.passwordEnv;
    if (target.dumpCommand) result.dumpCommand = target.dumpCommand;

    return result;
  }

  private static buildS3Destination(
    file: ConfigFile,
    env: NodeJS.ProcessEnv,
    issues: string[]
  ): S3DestinationConfig | undefined {
    const bucket = env.S3_BUCKET || env.S3_BUCKET_NAME || file.destination.s3?.bucket;
    if (!bucket) {
      return undefined;
    }

    const accessKeyId = env.S3_ACCESS_KEY || env.AWS_ACCESS_KEY_ID;
    const secretAccessKey = env.S3_SECRET_KEY || env.AWS_SECRET_ACCESS_KEY;
    if (!accessKeyId || !secretAccessKey) {
      issues.push('destination.s3: S3_ACCESS_KEY and S3_SECRET_KEY must be set in the environment');
    }

    const endpoint = env.S3_ENDPOINT || file.destination.s3?.endpoint;
    const s3: S3DestinationConfig = {
      bucket,
      prefix: (env.S3_PATH ?? file.destination.s3?.prefix ?? '').replace(/^\/+|\/+$/g, ''),
      region: env.S3_REGION || file.destination.s3?.region || 'us-east-1',
      accessKeyId: accessKeyId ?? '',
      secretAccessKey: secretAccessKey ?? '',
    };

    if (endpoint) {
      s3.endpoint = endpoint;
    }

    return s3;
  }

  private static buildNotifications(
    file: ConfigFile,
    env: NodeJS.ProcessEnv,
    issues: string[]
  ): NotificationConfig {
    const { channel } = file.notifications;

    if (channel === 'telegram') {
      const chatId = env.TELEGRAM_CHAT_ID || file.notifications.telegram?.chatId;
      const botToken = env.TELEGRAM_BOT_TOKEN;
      if (!chatId) {
        issues.push('notifications.telegram.chatId: required for the telegram channel');
      }
      if (!botToken) {
        issues.push('notifications.telegram: TELEGRAM_BOT_TOKEN must be set in the environment');
      }
      return { channel, telegram: { chatId: chatId ?? '', botToken: botToken ?? '' } };
    }

    if (channel === 'webhook') {
      const url = env.WEBHOOK_URL || file.notifications.webhook?.url;
      if (!url) {
        issues.push('notifications.webhook.url: required for the webhook channel');
      }
      return {
        channel,
        webhook: { url: url ?? '', headers: file.notifications.webhook?.headers ?? {} },
      };
    }

    return { channel };
  }
}
