import { v4 as uuidv4 } from 'uuid';
import { AuthError, BackupError, FetchError, errorMessage } from '../errors.js';
import path from 'path';
import { createLogger, type Logger } from '../logger.js';
import { ArchiveWriter } from './archiveWriter.js';
import { ContentFetcher } from './contentFetcher.js';
import { EntryNamer } from './entryNames.js';
import { EntryStager } from './entryStaging.js';
import { walkFiles } from './listingWalker.js';
import type { BackupProgress, BackupState, DriveApis, FinalizedArchive } from './types.js';
import { TERMINAL_STATES } from './types.js';

export interface BackupJobOptions {
  /**
   * Resolves the provider APIs once the job starts. Credential refresh
   * belongs here, so an expired token fails the job before listing.
   */
  connect: () => Promise<DriveApis>;
  /** Directory receiving this job's archives. Entries are staged in `.staging` below it. */
  directory: string;
  budgetBytes: number;
  compressionLevel?: number;
  pageSize?: number;
  jobId?: string;
  /** Called with a snapshot after every file and on every state change. */
  onProgress?: (progress: BackupProgress) => void;
  logger?: Logger;
}

/**
 * Handle on a running job: cancel it, or await `done` to join it.
 * `done` never rejects; the outcome is in the returned progress.
 */
export interface BackupTask {
  readonly jobId: string;
  readonly signal: AbortSignal;
  readonly done: Promise<BackupProgress>;
  cancel(): void;
}

function initialProgress(jobId: string): BackupProgress {
  return {
    jobId,
    state: 'created',
    discoveredFiles: 0,
    processedFiles: 0,
    succeededFiles: 0,
    failedFiles: 0,
    bytesFetched: 0,
    bytesWritten: 0,
    currentFile: '',
    archiveIndex: 0,
    archives: [],
    failures: [],
    startedAt: Date.now(),
  };
}

/**
 * One backup run: list -> fetch -> archive, one file at a time.
 *
 * Per-file fetch failures are recorded and skipped. Listing, credential and
 * archive failures end the run as `failed`; archives finalized before that
 * point are left in place.
 */
export class BackupJob {
  readonly jobId: string;
  private readonly progress: BackupProgress;
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private task: BackupTask | null = null;

  constructor(private readonly options: BackupJobOptions) {
    this.jobId = options.jobId ?? uuidv4();
    this.progress = initialProgress(this.jobId);
    this.log = (options.logger ?? createLogger('backup')).child(this.jobId.slice(0, 8));
  }

  get state(): BackupState {
    return this.progress.state;
  }

  get isRunning(): boolean {
    return this.task !== null && !TERMINAL_STATES.has(this.progress.state);
  }

  snapshot(): BackupProgress {
    return structuredClone(this.progress);
  }

  /**
   * Start the run in the background. Calling it again returns the same task.
   */
  start(): BackupTask {
    if (this.task) return this.task;

    const done = this.run();
    this.task = {
      jobId: this.jobId,
      signal: this.controller.signal,
      done,
      cancel: () => this.cancel(),
    };
    return this.task;
  }

  /** Takes effect between files, never mid-stream. */
  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.log.info('Cancellation requested');
      this.controller.abort();
    }
  }

  private setState(state: BackupState): void {
    this.progress.state = state;
    this.publish();
  }

  private publish(): void {
    this.options.onProgress?.(this.snapshot());
  }

  private onArchiveFinalized = (archive: FinalizedArchive): void => {
    this.progress.archives.push(archive.fileName);
  };

  private async run(): Promise<BackupProgress> {
    const { options, progress } = this;
    const signal = this.controller.signal;
    const writer = new ArchiveWriter({
      directory: options.directory,
      budgetBytes: options.budgetBytes,
      compressionLevel: options.compressionLevel,
      onArchiveFinalized: this.onArchiveFinalized,
    });
    const namer = new EntryNamer();
    const stager = new EntryStager(path.join(options.directory, '.staging'));

    this.publish();

    try {
      const apis = await options.connect();
      const fetcher = new ContentFetcher(apis.content);

      this.setState('listing');
      this.log.info('Listing files');

      const records = walkFiles(apis.index, {
        pageSize: options.pageSize,
        onPage: ({ page, received, kept }) => {
          this.log.debug(`Page ${page}: ${received} entries, ${kept} to back up`);
        },
      });

      for await (const record of records) {
        if (signal.aborted) break;

        if (progress.state !== 'transferring') this.setState('transferring');
        progress.discoveredFiles++;
        progress.currentFile = record.name;

        try {
          const fetched = await fetcher.fetch(record);
          const staged = await stager.stage(fetched.stream);
          progress.bytesFetched += fetched.bytesRead();
          this.log.debug(`Fetched "${record.name}" by ${fetched.mode} (${staged.size} bytes)`);
          try {
            progress.bytesWritten += await writer.writeEntry(namer.next(record), stager.open(staged), staged.size);
          } finally {
            await stager.release(staged);
          }
          progress.succeededFiles++;
        } catch (error) {
          if (!(error instanceof FetchError)) throw error;

          progress.failedFiles++;
          progress.failures.push({
            fileId: record.id,
            name: record.name,
            reason: error.reason,
            message: error.message,
          });
          this.log.warn(`Skipped "${record.name}": ${error.reason}`);
        }

        progress.processedFiles++;
        progress.archiveIndex = writer.currentIndex;
        this.publish();
      }

      await writer.close();
      progress.archiveIndex = writer.currentIndex;
      progress.currentFile = '';
      progress.finishedAt = Date.now();
      this.setState(signal.aborted ? 'cancelled' : 'completed');
      this.log.info(
        `Backup ${progress.state}: ${progress.succeededFiles} archived, ${progress.failedFiles} skipped, ` +
          `${progress.archives.length} archive(s)`
      );
    } catch (error) {
      await this.salvage(writer);
      progress.error = errorMessage(error);
      progress.errorKind = error instanceof BackupError ? error.kind : 'unexpected';
      progress.archiveIndex = writer.currentIndex;
      progress.finishedAt = Date.now();
      this.setState('failed');
      if (error instanceof AuthError) {
        this.log.error(`Backup failed, re-authentication required: ${progress.error}`);
      } else {
        this.log.error(`Backup failed: ${progress.error}`);
      }
    }

    await stager.dispose().catch((error: unknown) => {
      this.log.error(`Could not remove staging files: ${errorMessage(error)}`);
    });
    return this.snapshot();
  }

  /**
   * Keep what was completed before a fatal error: finalize the open archive
   * if the writer is still healthy.
   */
  private async salvage(writer: ArchiveWriter): Promise<void> {
    if (!writer.isUsable) return;
    try {
      await writer.close();
    } catch (closeError) {
      this.log.error(`Could not finalize the open archive: ${errorMessage(closeError)}`);
    }
  }
}
