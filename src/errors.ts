/**
 * Error taxonomy for a backup run.
 *
 * Only `FetchError` is recoverable: the orchestrator records it against the
 * file and moves on. Every other kind ends the session as `failed`.
 */

export type BackupErrorKind = 'auth' | 'listing' | 'fetch' | 'archive_io' | 'config';

export abstract class BackupError extends Error {
  abstract readonly kind: BackupErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Credential expired, revoked or rejected. The user has to sign in again.
 */
export class AuthError extends BackupError {
  readonly kind = 'auth';
}

export type ListingFailureReason = 'auth' | 'transport';

export class ListingError extends BackupError {
  readonly kind = 'listing';

  constructor(
    message: string,
    readonly page: number,
    readonly reason: ListingFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type FetchFailureReason = 'export_too_large' | 'forbidden' | 'not_found' | 'unavailable';

export class FetchError extends BackupError {
  readonly kind = 'fetch';

  constructor(
    message: string,
    readonly fileId: string,
    readonly reason: FetchFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ArchiveIOError extends BackupError {
  readonly kind = 'archive_io';
}

export class ConfigError extends BackupError {
  readonly kind = 'config';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
