/**
 * Error taxonomy for backup runs. The orchestrator drives its state machine
 * from `kind` and `retryable`, never from the concrete class.
 */
export type BackupErrorKind =
  | 'Timeout'
  | 'DumpProcessError'
  | 'EmptyOutput'
  | 'ArchiveWriteError'
  | 'UploadError'
  | 'Interrupted'
  | 'ConfigurationError'
  | 'DeliveryError';

export type BackupStep = 'dump' | 'archive' | 'upload' | 'startup' | 'notification';

export class BackupError extends Error {
  constructor(
    message: string,
    public readonly kind: BackupErrorKind,
    public readonly step: BackupStep,
    public readonly retryable: boolean,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export type DumpErrorKind = 'Timeout' | 'DumpProcessError' | 'EmptyOutput' | 'Interrupted';

export class DumpError extends BackupError {
  declare readonly kind: DumpErrorKind;

  constructor(
    message: string,
    kind: DumpErrorKind,
    retryable: boolean,
    public readonly exitCode: number | null = null,
    cause?: Error
  ) {
    super(message, kind, 'dump', retryable, cause);
    this.name = 'DumpError';
  }
}

export class ArchiveWriteError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'ArchiveWriteError', 'archive', true, cause);
    this.name = 'ArchiveWriteError';
  }
}

/**
 * The S3 client retries transient failures itself, so an upload error that
 * reaches the orchestrator is final for the attempt.
 */
export class UploadError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'UploadError', 'upload', false, cause);
    this.name = 'UploadError';
  }
}

export class InterruptedError extends BackupError {
  constructor(message = 'Backup run was interrupted', step: BackupStep = 'dump') {
    super(message, 'Interrupted', step, false);
    this.name = 'InterruptedError';
  }
}

export class ConfigurationError extends BackupError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'ConfigurationError', 'startup', false);
    this.name = 'ConfigurationError';
  }
}

export class DeliveryError extends BackupError {
  constructor(
    message: string,
    public readonly channel: string,
    cause?: Error
  ) {
    super(message, 'DeliveryError', 'notification', false, cause);
    this.name = 'DeliveryError';
  }
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
