import * as cron from 'node-cron';
import {
  CronScheduler as ICronScheduler,
  CronSchedulerConfig,
  ScheduledRun,
} from '../interfaces/CronScheduler';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../errors/BackupError';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * CronScheduler implementation using node-cron library.
 * A trigger that fires while the previous run is still going is skipped.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private config: CronSchedulerConfig,
    private run: ScheduledRun,
    private logger: Logger
  ) {}

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    const timezone = this.config.timezone || 'UTC';
    this.logger.info(`Starting cron scheduler with expression: ${this.config.cronExpression}`, {
      cronExpression: this.config.cronExpression,
      timezone,
    });

    try {
      this.task = cron.schedule(this.config.cronExpression, () => this.trigger('schedule'), {
        scheduled: false,
        timezone,
      });
      this.task.start();
    } catch (error) {
      this.task = null;
      throw new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        toError(error)
      );
    }

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => this.trigger('startup'));
    }
  }

  async stop(): Promise<void> {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.logger.info('Stopping cron scheduler...');
    this.task.stop();
    this.task = null;

    if (this.controller && this.inFlight) {
      this.logger.warn('Interrupting backup run in progress');
      this.controller.abort();
      await this.inFlight;
    }

    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  isRunInProgress(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * Start a run unless one is already executing. Resolves once the run is over.
   */
  trigger(source: 'schedule' | 'startup'): Promise<void> {
    if (this.inFlight) {
      this.logger.warn('Backup is already running, skipping this scheduled execution', { source });
      return this.inFlight;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.inFlight = this.execute(controller.signal, source).finally(() => {
      this.controller = null;
      this.inFlight = null;
    });

    return this.inFlight;
  }

  private async execute(signal: AbortSignal, source: string): Promise<void> {
    const startTime = Date.now();

    try {
      const result = await this.run(signal);
      this.logger.info(`Scheduled backup run ${result.runId} finished: ${result.status}`, {
        source,
        runId: result.runId,
        status: result.status,
        duration: Date.now() - startTime,
      });
    } catch (error) {
      this.logger.error('Scheduled backup execution failed', toError(error), {
        source,
        duration: Date.now() - startTime,
        cronExpression: this.config.cronExpression,
      });
    }
  }
}
