import {
  LogNotifier,
  TelegramNotifier,
  WebhookNotifier,
  buildWebhookPayload,
  createNotifier,
  escapeHtml,
  formatRunReport,
  truncateReport,
} from '../src/clients/Notifier';
import { ConfigurationError, DeliveryError } from '../src/errors/BackupError';
import { RunResult, TargetOutcome } from '../src/interfaces/BackupOrchestrator';
import { createMockLogger } from './helpers';

const STARTED_AT = new Date('2024-01-01T03:00:00.000Z');
const FINISHED_AT = new Date('2024-01-01T03:00:12.340Z');
const ARTIFACT_NAME = 'app_20240101T030000000Z_00.sql.gz';
const REMOTE = `s3://test-bucket/databases/app/${ARTIFACT_NAME}`;

function outcome(overrides: Partial<TargetOutcome> & Pick<TargetOutcome, 'targetId' | 'status'>): TargetOutcome {
  return {
    attempts: 1,
    dumpAttempts: [],
    retention: [],
    startedAt: STARTED_AT,
    finishedAt: FINISHED_AT,
    ...overrides,
  };
}

function makeRun(overrides: Partial<RunResult> = {}): RunResult {
  return {
    runId: 'run-1',
    status: 'partial_failure',
    startedAt: STARTED_AT,
    finishedAt: FINISHED_AT,
    outcomes: [
      outcome({
        targetId: 'app',
        status: 'succeeded',
        artifact: {
          targetId: 'app',
          name: ARTIFACT_NAME,
          createdAt: STARTED_AT,
          size: 1572864,
          path: `/var/backups/app/${ARTIFACT_NAME}`,
          checksum: 'abc123',
          remoteLocation: REMOTE,
        },
      }),
      outcome({
        targetId: 'shop',
        status: 'failed',
        attempts: 3,
        error: {
          kind: 'DumpProcessError',
          step: 'dump',
          message: 'mysqldump failed for shop with exit code 2: Got error 2002 <socket>',
        },
      }),
      outcome({ targetId: 'legacy', status: 'skipped', attempts: 0, skipReason: 'disabled' }),
    ],
    ...overrides,
  };
}

describe('formatRunReport', () => {
  it('should list every target in order', () => {
    expect(formatRunReport(makeRun()).split('\n')).toEqual([
      'Backup run run-1: PARTIAL FAILURE',
      'Targets: 1 succeeded, 1 failed, 1 skipped',
      'Duration: 12.3s',
      `- app: succeeded, ${ARTIFACT_NAME} (1.50 MB), uploaded to ${REMOTE}`,
      '- shop: failed after 3 attempt(s), DumpProcessError at dump: mysqldump failed for shop with exit code 2: Got error 2002 <socket>',
      '- legacy: skipped (disabled)',
    ]);
  });

  it('should escape target lines and bold the header in HTML mode', () => {
    const lines = formatRunReport(makeRun(), { html: true }).split('\n');

    expect(lines[0]).toBe('<b>Backup run run-1: PARTIAL FAILURE</b>');
    expect(lines[4]).toBe(
      '- shop: failed after 3 attempt(s), DumpProcessError at dump: mysqldump failed for shop with exit code 2: Got error 2002 &lt;socket&gt;'
    );
  });

  it('should mention a local artifact kept after a failed upload', () => {
    const run = makeRun({
      status: 'failure',
      outcomes: [
        outcome({
          targetId: 'app',
          status: 'failed',
          artifact: {
            targetId: 'app',
            name: ARTIFACT_NAME,
            createdAt: STARTED_AT,
            size: 10,
            path: `/var/backups/app/${ARTIFACT_NAME}`,
            checksum: 'abc123',
          },
          error: { kind: 'UploadError', step: 'upload', message: 'Access denied' },
        }),
      ],
    });

    expect(formatRunReport(run).split('\n').slice(3)).toEqual([
      `- app: failed after 1 attempt(s), UploadError at upload: Access denied (local artifact ${ARTIFACT_NAME} kept)`,
    ]);
  });

  it('should keep short reports unchanged', () => {
    expect(truncateReport('a\nb', 10)).toBe('a\nb');
  });

  it('should cut at the last line boundary within the limit', () => {
    expect(truncateReport('first line\nsecond &lt;line&gt;', 20)).toBe('first line\n…');
  });

  it('should escape HTML special characters', () => {
    expect(escapeHtml('a < b && c > d')).toBe('a &lt; b &amp;&amp; c &gt; d');
  });
});

describe('TelegramNotifier', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let logger: ReturnType<typeof createMockLogger>;
  let notifier: TelegramNotifier;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    logger = createMockLogger();
    notifier = new TelegramNotifier({ chatId: '100', botToken: 'test-token' }, logger);
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should send the HTML report to the chat', async () => {
    fetchSpy.mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    const run = makeRun();

    await notifier.notify(run);

    expect(fetchSpy).toHaveBeenCalledWith(
      'https://api.telegram.org/bottest-token/sendMessage',
      expect.objectContaining({ method: 'POST', headers: { 'Content-Type': 'application/json' } })
    );
    const [, init] = fetchSpy.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '100',
      text: formatRunReport(run, { html: true }),
      parse_mode: 'HTML',
    });
    expect(logger.info).toHaveBeenCalledWith('Telegram notification sent', { runId: 'run-1', chatId: '100' });
  });

  it('should truncate reports above the message limit', async () => {
    fetchSpy.mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    const outcomes = Array.from({ length: 200 }, (_, index) =>
      outcome({ targetId: `target-${index}`, status: 'skipped', attempts: 0, skipReason: 'disabled' })
    );

    await notifier.notify(makeRun({ outcomes }));

    const [, init] = fetchSpy.mock.calls[0];
    const body: { text: string } = JSON.parse(String(init?.body));
    expect(body.text).toHaveLength(3985);
    expect(body.text.endsWith('\n- target-120: skipped (disabled)\n…')).toBe(true);
  });

  it('should not split escaped characters when truncating', async () => {
    fetchSpy.mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    const outcomes = Array.from({ length: 100 }, (_, index) =>
      outcome({
        targetId: `target-${index}`,
        status: 'failed',
        error: { kind: 'DumpProcessError', step: 'dump', message: '<<<<<<<<<<&&&&&&&&&&' },
      })
    );

    await notifier.notify(makeRun({ outcomes }));

    const [, init] = fetchSpy.mock.calls[0];
    const body: { text: string } = JSON.parse(String(init?.body));
    const lines = body.text.split('\n');
    expect(lines[lines.length - 1]).toBe('…');
    expect(lines[lines.length - 2]).toMatch(/&amp;&amp;&amp;&amp;&amp;&amp;&amp;&amp;&amp;&amp;$/);
  });

  it('should reject with DeliveryError on an API error', async () => {
    fetchSpy.mockResolvedValue(new Response('Bad Request: chat not found', { status: 400 }));

    const error = await notifier.notify(makeRun()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({
      channel: 'telegram',
      message: 'Telegram API responded with 400: Bad Request: chat not found',
    });
  });

  it('should keep the token out of network failure messages', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(notifier.notify(makeRun())).rejects.toThrow('Telegram request failed: TypeError: fetch failed');
  });
});

describe('WebhookNotifier', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let notifier: WebhookNotifier;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    notifier = new WebhookNotifier(
      { url: 'https://hooks.test/backup', headers: { Authorization: 'Bearer test-token' } },
      createMockLogger()
    );
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should post the JSON payload with configured headers', async () => {
    fetchSpy.mockResolvedValue(new Response(null, { status: 204 }));

    await notifier.notify(makeRun());

    expect(fetchSpy).toHaveBeenCalledWith(
      'https://hooks.test/backup',
      expect.objectContaining({
        method: 'POST',
        headers: { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' },
      })
    );
    const [, init] = fetchSpy.mock.calls[0];
    const body: { status: string; targets: unknown[] } = JSON.parse(String(init?.body));
    expect(body.status).toBe('partial_failure');
    expect(body.targets).toEqual([
      {
        targetId: 'app',
        status: 'succeeded',
        attempts: 1,
        artifact: { name: ARTIFACT_NAME, size: 1572864, checksum: 'abc123', remoteLocation: REMOTE },
      },
      {
        targetId: 'shop',
        status: 'failed',
        attempts: 3,
        error: {
          kind: 'DumpProcessError',
          step: 'dump',
          message: 'mysqldump failed for shop with exit code 2: Got error 2002 <socket>',
        },
      },
      { targetId: 'legacy', status: 'skipped', attempts: 0, skipReason: 'disabled' },
    ]);
  });

  it('should reject with DeliveryError on a non-success status', async () => {
    fetchSpy.mockResolvedValue(new Response('oops', { status: 500 }));

    await expect(notifier.notify(makeRun())).rejects.toThrow(new DeliveryError('Webhook responded with 500', 'webhook'));
  });
});

describe('buildWebhookPayload', () => {
  it('should carry ISO timestamps and the plain text report', () => {
    const run = makeRun();

    expect(buildWebhookPayload(run)).toMatchObject({
      runId: 'run-1',
      startedAt: '2024-01-01T03:00:00.000Z',
      finishedAt: '2024-01-01T03:00:12.340Z',
      text: formatRunReport(run),
    });
  });
});

describe('LogNotifier', () => {
  it('should log a successful run at info level', async () => {
    const logger = createMockLogger();
    const run = makeRun({ status: 'success', outcomes: [] });

    await new LogNotifier(logger).notify(run);

    expect(logger.info).toHaveBeenCalledWith(formatRunReport(run), { runId: 'run-1', status: 'success' });
  });

  it('should log any other run at warn level', async () => {
    const logger = createMockLogger();
    const run = makeRun();

    await new LogNotifier(logger).notify(run);

    expect(logger.warn).toHaveBeenCalledWith(formatRunReport(run), { runId: 'run-1', status: 'partial_failure' });
    expect(logger.info).not.toHaveBeenCalled();
  });
});

describe('createNotifier', () => {
  const logger = createMockLogger();

  it('should build the configured channel', () => {
    expect(createNotifier({ channel: 'log' }, logger)).toBeInstanceOf(LogNotifier);
    expect(
      createNotifier({ channel: 'telegram', telegram: { chatId: '100', botToken: 'test-token' } }, logger)
    ).toBeInstanceOf(TelegramNotifier);
    expect(
      createNotifier({ channel: 'webhook', webhook: { url: 'https://hooks.test/backup', headers: {} } }, logger)
    ).toBeInstanceOf(WebhookNotifier);
  });

  it('should reject a channel without its settings', () => {
    expect(() => createNotifier({ channel: 'telegram' }, logger)).toThrow(ConfigurationError);
  });
});
