#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  ConfigurationManager,
  ConfigurationError,
  DEFAULT_CONFIG_PATH,
} from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { ArchiveWriter } from './clients/ArchiveWriter';
import { LocalArtifactStore, S3ArtifactStore } from './clients/ArtifactStore';
import { BackupOrchestrator, ExitCode, resolveExitCode } from './clients/BackupOrchestrator';
import { ConnectionProbe } from './clients/ConnectionProbe';
import { CronScheduler } from './clients/CronScheduler';
import { DumpExecutor } from './clients/DumpExecutor';
import { createNotifier } from './clients/Notifier';
import { RetentionManager } from './clients/RetentionManager';
import { S3Client } from './clients/S3Client';
import { BackupConfig } from './interfaces/BackupConfig';
import { RemoteStore } from './interfaces/ArtifactStore';
import { LogLevel } from './interfaces/Logger';
import { toError } from './errors/BackupError';

export interface CliOptions {
  configPath: string;

  /** Run once and exit even when a schedule is configured */
  once: boolean;

  /** Only probe the configured targets */
  check: boolean;
}

type ParsedFlags = {
  config?: string;
  once: boolean;
  check: boolean;
};

function parseConfigPath(value: string): string {
  if (value.startsWith('-')) {
    throw new InvalidArgumentError('expected a file path, not an option.');
  }
  return value;
}

export function createProgram(): Command {
  return new Command()
    .name('db-backup')
    .description('Scheduled logical backups of PostgreSQL and MySQL databases')
    .option(
      '--config <path>',
      `settings file (default: BACKUP_CONFIG_PATH or ${DEFAULT_CONFIG_PATH})`,
      parseConfigPath
    )
    .option('--once', 'run once and exit even when a schedule is configured', false)
    .option('--check', 'probe the configured targets and exit', false)
    .allowExcessArguments(false)
    .exitOverride();
}

/**
 * Parse the command line. Throws CommanderError for an unknown option, a
 * missing value or an explicit --help.
 */
export function parseArguments(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const program = createProgram();
  program.parse(argv, { from: 'user' });
  const flags = program.opts<ParsedFlags>();

  return {
    configPath: ConfigurationManager.resolveConfigPath(flags.config, env),
    once: flags.once,
    check: flags.check,
  };
}

interface Components {
  config: BackupConfig;
  orchestrator: BackupOrchestrator;
  probe: ConnectionProbe;
  s3Client?: S3Client;
}

/**
 * Main application class that initializes and coordinates all components
 */
class BackupApplication {
  private logger: Logger;
  private components: Components | null = null;
  private cronScheduler: CronScheduler | null = null;
  private runController: AbortController | null = null;
  private isShuttingDown = false;

  constructor(
    private options: CliOptions,
    private env: NodeJS.ProcessEnv = process.env
  ) {
    // Reconfigured once the configuration is loaded
    this.logger = new Logger(LogLevel.INFO);
  }

  /**
   * Load configuration and wire components. Throws ConfigurationError when
   * the settings are invalid, before any target is touched.
   */
  async initialize(): Promise<void> {
    this.logger.info('Database backup service starting...', { configPath: this.options.configPath });

    const config = ConfigurationManager.loadConfiguration(this.options.configPath, this.env);
    this.logger = new Logger(config.logLevel);
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

    let s3Client: S3Client | undefined;
    let remoteStore: RemoteStore | undefined;
    if (config.destination.s3) {
      const s3 = config.destination.s3;
      s3Client = new S3Client(s3, this.logger);
      remoteStore = new S3ArtifactStore(s3Client, s3.bucket, s3.prefix);
    }

    const orchestrator = new BackupOrchestrator(config, {
      dumpExecutor: new DumpExecutor(this.logger),
      archiveWriter: new ArchiveWriter(config.destination.root, this.logger),
      retentionManager: new RetentionManager(this.logger),
      localStore: new LocalArtifactStore(config.destination.root, this.logger),
      remoteStore,
      notifier: createNotifier(config.notifications, this.logger),
      logger: this.logger,
    });

    this.components = { config, orchestrator, probe: new ConnectionProbe(this.logger), s3Client };

    // A check never touches files another run may still be writing
    if (!this.options.check) {
      await orchestrator.cleanupStaleFiles();
    }
    this.logger.info('Application initialized successfully');
  }

  /**
   * Probe every enabled target and the S3 bucket
   */
  async check(): Promise<ExitCode> {
    const { config, probe, s3Client } = this.requireComponents();
    let healthy = true;

    for (const target of config.targets.filter(candidate => candidate.enabled)) {
      const result = await probe.probe(target);
      healthy = healthy && result.reachable;
    }

    if (s3Client) {
      const reachable = await s3Client.testConnection();
      this.logger.info(`S3 bucket ${reachable ? 'is' : 'is not'} reachable`, { reachable });
      healthy = healthy && reachable;
    }

    return healthy ? ExitCode.SUCCESS : ExitCode.TARGET_FAILED;
  }

  async runOnce(): Promise<ExitCode> {
    const { orchestrator } = this.requireComponents();
    const controller = new AbortController();
    this.runController = controller;

    try {
      const result = await orchestrator.executeRun(controller.signal);
      return resolveExitCode(result);
    } finally {
      this.runController = null;
      await orchestrator.releaseWorkDir();
    }
  }

  /**
   * Start the scheduler and begin scheduled backups
   */
  async start(): Promise<void> {
    const { config, orchestrator, probe } = this.requireComponents();
    if (!config.schedule) {
      throw new ConfigurationError('No schedule configured');
    }

    // Reachability is informational here, each run reports its own failures
    for (const target of config.targets.filter(candidate => candidate.enabled)) {
      await probe.probe(target);
    }

    this.cronScheduler = new CronScheduler(
      {
        cronExpression: config.schedule,
        timezone: config.timezone,
        runOnInit: config.runOnStart,
      },
      signal => orchestrator.executeRun(signal),
      this.logger
    );
    this.cronScheduler.start();

    this.logger.info('Database backup service started', { schedule: config.schedule });
  }

  get scheduled(): boolean {
    return !this.options.once && !this.options.check && Boolean(this.components?.config.schedule);
  }

  /**
   * Interrupt whatever is running. Resolves to the exit code for the process.
   */
  async shutdown(): Promise<ExitCode> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return ExitCode.INTERRUPTED;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.runController) {
      this.runController.abort();
      return ExitCode.INTERRUPTED;
    }

    if (this.cronScheduler) {
      const wasRunning = this.cronScheduler.isRunInProgress();
      await this.cronScheduler.stop();
      await this.requireComponents().orchestrator.releaseWorkDir();
      this.logger.info('Database backup service shutdown completed');
      return wasRunning ? ExitCode.INTERRUPTED : ExitCode.SUCCESS;
    }

    return ExitCode.SUCCESS;
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        const interruptingOnce = this.runController !== null;

        this.shutdown()
          .then(code => {
            // A single run exits on its own once the interrupted run has reported
            if (!interruptingOnce) process.exit(code);
          })
          .catch(error => {
            this.logger.error('Error during shutdown', toError(error));
            process.exit(ExitCode.FATAL);
          });
      });
    });

    process.on('uncaughtException', error => {
      this.logger.error('Uncaught exception', error);
      process.exit(ExitCode.FATAL);
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason));
      process.exit(ExitCode.FATAL);
    });
  }

  get log(): Logger {
    return this.logger;
  }

  private requireComponents(): Components {
    if (!this.components) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    return this.components;
  }
}

/**
 * Main application entry point. Resolves to the exit code, or null while the
 * scheduler keeps the process alive.
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<ExitCode | null> {
  let options: CliOptions;
  try {
    options = parseArguments(argv);
  } catch (error) {
    // Commander has already written the usage error or the help text
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.CONFIGURATION_ERROR;
    }
    throw error;
  }

  const app = new BackupApplication(options);
  app.setupSignalHandlers();

  try {
    await app.initialize();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      app.log.error('Configuration error', error, { issues: error.issues });
      return ExitCode.CONFIGURATION_ERROR;
    }
    throw error;
  }

  if (options.check) {
    return app.check();
  }

  if (!app.scheduled) {
    return app.runOnce();
  }

  await app.start();
  return null;
}

// Export for testing
export { BackupApplication, main };

if (require.main === module) {
  main()
    .then(code => {
      if (code !== null) process.exit(code);
    })
    .catch(error => {
      console.error('Fatal error starting application:', error);
      process.exit(ExitCode.FATAL);
    });
}
