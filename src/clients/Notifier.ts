import { NotificationConfig, TelegramSettings, WebhookSettings } from '../interfaces/BackupConfig';
import { RunResult, RunStatus, TargetOutcome } from '../interfaces/BackupOrchestrator';
import { Logger } from '../interfaces/Logger';
import { Notifier } from '../interfaces/Notifier';
import { ConfigurationError, DeliveryError, formatError, toError } from '../errors/BackupError';

export const DELIVERY_TIMEOUT_MS = 10_000;
export const TELEGRAM_API_URL = 'https://api.telegram.org';

// Bot API rejects messages above 4096 characters
const TELEGRAM_MAX_MESSAGE_CHARS = 4000;

const STATUS_LABELS: Record<RunStatus, string> = {
  success: 'SUCCESS',
  partial_failure: 'PARTIAL FAILURE',
  failure: 'FAILURE',
  interrupted: 'INTERRUPTED',
};

export interface ReportOptions {
  /** Escape text and emphasize the header for Telegram's HTML parse mode */
  html?: boolean;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

function formatOutcome(outcome: TargetOutcome): string {
  switch (outcome.status) {
    case 'succeeded': {
      const artifact = outcome.artifact;
      const detail = artifact ? `${artifact.name} (${formatMegabytes(artifact.size)} MB)` : 'no artifact';
      const remote = artifact?.remoteLocation ? `, uploaded to ${artifact.remoteLocation}` : '';
      return `${outcome.targetId}: succeeded, ${detail}${remote}`;
    }
    case 'failed': {
      const error = outcome.error;
      const reason = error ? `${error.kind} at ${error.step}: ${error.message}` : 'unknown error';
      const kept = outcome.artifact ? ` (local artifact ${outcome.artifact.name} kept)` : '';
      return `${outcome.targetId}: failed after ${outcome.attempts} attempt(s), ${reason}${kept}`;
    }
    case 'skipped':
      return `${outcome.targetId}: skipped (${outcome.skipReason ?? 'not run'})`;
  }
}

/**
 * Cut a report at the last line boundary within `limit`, so no escaped
 * entity or tag is split
 */
export function truncateReport(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const cut = text.lastIndexOf('\n', limit);
  return `${text.slice(0, cut > 0 ? cut : limit)}\n…`;
}

/**
 * Human readable summary of a run, one line per target in configuration order
 */
export function formatRunReport(run: RunResult, options: ReportOptions = {}): string {
  const escape = options.html ? escapeHtml : (text: string): string => text;
  const count = (status: TargetOutcome['status']): number =>
    run.outcomes.filter(outcome => outcome.status === status).length;

  const header = `Backup run ${run.runId}: ${STATUS_LABELS[run.status]}`;
  const duration = ((run.finishedAt.getTime() - run.startedAt.getTime()) / 1000).toFixed(1);

  const lines = [
    options.html ? `<b>${escape(header)}</b>` : header,
    `Targets: ${count('succeeded')} succeeded, ${count('failed')} failed, ${count('skipped')} skipped`,
    `Duration: ${duration}s`,
    ...run.outcomes.map(outcome => `- ${escape(formatOutcome(outcome))}`),
  ];

  return lines.join('\n');
}

/**
 * Sends the run report to a chat through the Telegram Bot API
 */
export class TelegramNotifier implements Notifier {
  readonly channel = 'telegram';

  constructor(
    private settings: TelegramSettings,
    private logger: Logger,
    private apiUrl: string = TELEGRAM_API_URL
  ) {}

  async notify(run: RunResult): Promise<void> {
    const text = truncateReport(formatRunReport(run, { html: true }), TELEGRAM_MAX_MESSAGE_CHARS);

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/bot${this.settings.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.settings.chatId,
          text,
          parse_mode: 'HTML',
        }),
        signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
      });
    } catch (error) {
      // The token is part of the URL, keep it out of the message
      throw new DeliveryError(`Telegram request failed: ${formatError(error)}`, this.channel, toError(error));
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new DeliveryError(
        `Telegram API responded with ${response.status}${body ? `: ${body.slice(0, 500)}` : ''}`,
        this.channel
      );
    }

    this.logger.info('Telegram notification sent', { runId: run.runId, chatId: this.settings.chatId });
  }
}

/**
 * POSTs a JSON summary of the run to an HTTP endpoint
 */
export class WebhookNotifier implements Notifier {
  readonly channel = 'webhook';

  constructor(
    private settings: WebhookSettings,
    private logger: Logger
  ) {}

  async notify(run: RunResult): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.settings.url, {
        method: 'POST',
        headers: { ...this.settings.headers, 'Content-Type': 'application/json' },
        body: JSON.stringify(buildWebhookPayload(run)),
        signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
      });
    } catch (error) {
      throw new DeliveryError(`Webhook request failed: ${formatError(error)}`, this.channel, toError(error));
    }

    if (!response.ok) {
      throw new DeliveryError(`Webhook responded with ${response.status}`, this.channel);
    }

    this.logger.info('Webhook notification sent', { runId: run.runId, statusCode: response.status });
  }
}

export function buildWebhookPayload(run: RunResult): Record<string, unknown> {
  return {
    runId: run.runId,
    status: run.status,
    startedAt: run.startedAt.toISOString(),
    finishedAt: run.finishedAt.toISOString(),
    targets: run.outcomes.map(outcome => ({
      targetId: outcome.targetId,
      status: outcome.status,
      attempts: outcome.attempts,
      ...(outcome.artifact && {
        artifact: {
          name: outcome.artifact.name,
          size: outcome.artifact.size,
          checksum: outcome.artifact.checksum,
          remoteLocation: outcome.artifact.remoteLocation,
        },
      }),
      ...(outcome.error && { error: outcome.error }),
      ...(outcome.skipReason && { skipReason: outcome.skipReason }),
    })),
    text: formatRunReport(run),
  };
}

/**
 * Writes the report through the application logger
 */
export class LogNotifier implements Notifier {
  readonly channel = 'log';

  constructor(private logger: Logger) {}

  async notify(run: RunResult): Promise<void> {
    const report = formatRunReport(run);
    if (run.status === 'success') {
      this.logger.info(report, { runId: run.runId, status: run.status });
    } else {
      this.logger.warn(report, { runId: run.runId, status: run.status });
    }
  }
}

export function createNotifier(config: NotificationConfig, logger: Logger): Notifier {
  switch (config.channel) {
    case 'telegram':
      if (!config.telegram) {
        throw new ConfigurationError('Telegram channel selected without telegram settings');
      }
      return new TelegramNotifier(config.telegram, logger);
    case 'webhook':
      if (!config.webhook) {
        throw new ConfigurationError('Webhook channel selected without webhook settings');
      }
      return new WebhookNotifier(config.webhook, logger);
    case 'log':
      return new LogNotifier(logger);
  }
}
