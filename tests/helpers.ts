import { BackupConfig, BackupTarget } from '../src/interfaces/BackupConfig';
import { Logger, LogLevel } from '../src/interfaces/Logger';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logRunStart: jest.fn(),
    logRunComplete: jest.fn(),
    logTargetTransition: jest.fn(),
    logRetention: jest.fn(),
    logConfigurationStart: jest.fn(),
  };
}

export function makeTarget(overrides: Partial<BackupTarget> = {}): BackupTarget {
  return {
    id: 'app',
    engine: 'postgres',
    host: 'db.test',
    port: 5432,
    user: 'backup',
    database: 'app',
    allDatabases: false,
    password: 'test-secret',
    enabled: true,
    extraArgs: [],
    retention: {},
    timeoutSeconds: 60,
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<BackupConfig> = {}): BackupConfig {
  return {
    timezone: 'UTC',
    runOnStart: false,
    logLevel: LogLevel.INFO,
    workDir: '/tmp/db-backup-test',
    concurrency: 1,
    retry: { maxAttempts: 3, backoff: 'exponential', initialDelayMs: 10, maxDelayMs: 100 },
    destination: { root: '/tmp/db-backup-test/out' },
    notifications: { channel: 'log' },
    targets: [makeTarget()],
    ...overrides,
  };
}
