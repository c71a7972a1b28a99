import archiver from 'archiver';
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { once } from 'events';
import { Transform, type Readable, type TransformCallback } from 'stream';
import { ArchiveIOError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { FinalizedArchive } from './types.js';

const log = createLogger('archive');

export interface ArchiveWriterOptions {
  directory: string;
  /** Ceiling on entry content bytes per archive. */
  budgetBytes: number;
  compressionLevel?: number;
  filePrefix?: string;
  onArchiveFinalized?: (archive: FinalizedArchive) => void;
}

interface ArchiveHandle {
  index: number;
  fileName: string;
  path: string;
  partPath: string;
  archive: archiver.Archiver;
  output: fs.WriteStream;
  contentBytes: number;
  entries: number;
  failure: Error | null;
}

export function archiveFileName(prefix: string, index: number): string {
  return `${prefix}_${String(index).padStart(3, '0')}.zip`;
}

/**
 * Streams entries into numbered ZIP archives, rotating to a new archive once
 * the content budget is used up.
 *
 * An entry is never split across archives. When its size is known up front
 * and would overflow a non-empty archive, the archive is rotated first;
 * otherwise the budget check runs per chunk and the rotation waits for the
 * entry to finish, so such an archive can end up over budget by its last
 * entry. A single entry larger than the budget gets an archive of its own.
 *
 * Archives are written as `<name>.part` and renamed once finalized, so a
 * file named `backup_NNN.zip` is always complete.
 */
export class ArchiveWriter {
  private current: ArchiveHandle | null = null;
  private nextIndex = 1;
  private rotatePending = false;
  private broken = false;
  private readonly finalized: FinalizedArchive[] = [];
  private readonly prefix: string;

  constructor(private readonly options: ArchiveWriterOptions) {
    this.prefix = options.filePrefix ?? 'backup';
  }

  get archives(): readonly FinalizedArchive[] {
    return this.finalized;
  }

  /** Sequence number of the open archive, else of the last one opened. */
  get currentIndex(): number {
    return this.nextIndex - 1;
  }

  get isUsable(): boolean {
    return !this.broken;
  }

  /**
   * Write one entry and resolve with the number of content bytes written.
   */
  async writeEntry(name: string, source: Readable, expectedSize?: number): Promise<number> {
    if (this.broken) {
      throw new ArchiveIOError('Archive writer is unusable after an earlier failure');
    }

    if (
      this.current &&
      this.current.entries > 0 &&
      expectedSize !== undefined &&
      this.current.contentBytes + expectedSize > this.options.budgetBytes
    ) {
      await this.rotate();
    }

    const handle = this.current ?? (await this.open());
    const budget = this.options.budgetBytes;
    let entryBytes = 0;

    const counter = new Transform({
      transform: (chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) => {
        entryBytes += chunk.length;
        handle.contentBytes += chunk.length;
        if (handle.contentBytes > budget) {
          this.rotatePending = true;
        }
        callback(null, chunk);
      },
    });

    try {
      await new Promise<void>((resolve, reject) => {
        let settled = false;
        const settle = (error?: Error): void => {
          if (settled) return;
          settled = true;
          handle.archive.removeListener('entry', onEntry);
          handle.archive.removeListener('error', onFailure);
          handle.output.removeListener('error', onFailure);
          if (error) reject(error);
          else resolve();
        };
        const onEntry = (): void => settle();
        const onFailure = (error: Error): void => settle(error);
        // Stays attached: a late error from an abandoned source must not go unhandled
        const onSourceError = (error: Error): void => {
          if (settled) {
            log.debug(`Ignoring late error from "${name}": ${error.message}`);
            return;
          }
          settle(new Error(`source stream failed mid-entry: ${error.message}`, { cause: error }));
        };

        source.on('error', onSourceError);
        if (handle.failure) {
          settle(handle.failure);
          return;
        }
        handle.archive.once('entry', onEntry);
        handle.archive.once('error', onFailure);
        handle.output.once('error', onFailure);

        source.pipe(counter);
        handle.archive.append(counter, { name });
      });
    } catch (error) {
      source.unpipe(counter);
      source.destroy();
      counter.destroy();
      await this.discard(handle).catch((discardError: unknown) => {
        log.error(`Could not discard ${handle.fileName}: ${errorMessage(discardError)}`);
      });
      throw new ArchiveIOError(`Failed to write "${name}" into ${handle.fileName}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    handle.entries++;
    log.debug(`${handle.fileName} <- ${name} (${entryBytes} bytes, archive at ${handle.contentBytes})`);

    if (this.rotatePending) {
      await this.rotate();
    }

    return entryBytes;
  }

  /**
   * Finalize the open archive, if any. The writer stays usable; the next
   * entry opens a new archive.
   */
  async close(): Promise<readonly FinalizedArchive[]> {
    if (this.current) {
      await this.seal(this.current);
    }
    this.rotatePending = false;
    return this.finalized;
  }

  private async rotate(): Promise<void> {
    if (this.current) {
      await this.seal(this.current);
    }
    this.rotatePending = false;
  }

  private async open(): Promise<ArchiveHandle> {
    const index = this.nextIndex;
    const fileName = archiveFileName(this.prefix, index);
    const finalPath = path.join(this.options.directory, fileName);
    const partPath = `${finalPath}.part`;

    let output: fs.WriteStream;
    try {
      await fsp.mkdir(this.options.directory, { recursive: true });
      output = fs.createWriteStream(partPath);
      await once(output, 'open');
    } catch (error) {
      this.broken = true;
      throw new ArchiveIOError(`Cannot create ${partPath}: ${errorMessage(error)}`, { cause: error });
    }

    const archive = archiver('zip', { zlib: { level: this.options.compressionLevel ?? 6 } });
    const handle: ArchiveHandle = {
      index,
      fileName,
      path: finalPath,
      partPath,
      archive,
      output,
      contentBytes: 0,
      entries: 0,
      failure: null,
    };

    // Recorded so an error between entries surfaces on the next write or seal
    archive.on('error', (error: Error) => {
      handle.failure ??= error;
    });
    output.on('error', (error: Error) => {
      handle.failure ??= error;
    });
    archive.on('warning', (error: Error) => {
      log.warn(`${fileName}: ${error.message}`);
    });

    archive.pipe(output);
    this.nextIndex++;
    this.current = handle;
    log.info(`Opened ${fileName}`);
    return handle;
  }

  private async seal(handle: ArchiveHandle): Promise<void> {
    this.current = null;

    try {
      if (handle.failure) throw handle.failure;
      await Promise.all([once(handle.output, 'close'), handle.archive.finalize()]);
      if (handle.failure) throw handle.failure;
      await fsp.rename(handle.partPath, handle.path);
    } catch (error) {
      this.broken = true;
      await fsp.rm(handle.partPath, { force: true });
      throw new ArchiveIOError(`Failed to finalize ${handle.fileName}: ${errorMessage(error)}`, { cause: error });
    }

    const summary: FinalizedArchive = {
      index: handle.index,
      fileName: handle.fileName,
      path: handle.path,
      entries: handle.entries,
      contentBytes: handle.contentBytes,
    };
    this.finalized.push(summary);
    log.info(`Finalized ${handle.fileName} (${handle.entries} entries, ${handle.contentBytes} bytes)`);
    this.options.onArchiveFinalized?.(summary);
  }

  private async discard(handle: ArchiveHandle): Promise<void> {
    this.current = null;
    this.broken = true;

    try {
      handle.archive.abort();
      if (!handle.output.closed) {
        // Write errors after destroy land in the handle's error listener
        const closed = new Promise<void>((resolve) => handle.output.once('close', () => resolve()));
        handle.output.destroy();
        await closed;
      }
    } finally {
      await fsp.rm(handle.partPath, { force: true }).catch((error: unknown) => {
        log.error(`Could not remove ${handle.partPath}: ${errorMessage(error)}`);
      });
    }
    log.warn(`Discarded unfinished ${handle.fileName}`);
  }
}
