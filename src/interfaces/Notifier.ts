import { RunResult } from './BackupOrchestrator';

/**
 * A notification channel. One implementation per channel, chosen from
 * configuration when the application starts.
 */
export interface Notifier {
  readonly channel: string;

  /** Deliver a report of the run, rejects with DeliveryError */
  notify(run: RunResult): Promise<void>;
}
