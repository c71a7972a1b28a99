import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { ArchiveIOError, BackupError, errorMessage } from '../errors.js';

export interface StagedEntry {
  path: string;
  size: number;
}

/**
 * Spools each fetched file to disk before it enters an archive, so a
 * download that breaks halfway never touches the open archive and every
 * entry is appended with its exact size.
 */
export class EntryStager {
  private sequence = 0;

  constructor(private readonly directory: string) {}

  /**
   * Copy `source` to a staging file. Errors raised by the source (fetch and
   * auth failures) are rethrown as they are; local disk failures become
   * `ArchiveIOError`.
   */
  async stage(source: Readable): Promise<StagedEntry> {
    try {
      await fsp.mkdir(this.directory, { recursive: true });
    } catch (error) {
      source.destroy();
      throw new ArchiveIOError(`Cannot create staging directory ${this.directory}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.sequence++;
    const filePath = path.join(this.directory, `entry-${this.sequence}.tmp`);

    try {
      await pipeline(source, fs.createWriteStream(filePath));
      const { size } = await fsp.stat(filePath);
      return { path: filePath, size };
    } catch (error) {
      await fsp.rm(filePath, { force: true });
      if (error instanceof BackupError) throw error;
      throw new ArchiveIOError(`Cannot stage ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  open(entry: StagedEntry): Readable {
    return fs.createReadStream(entry.path);
  }

  async release(entry: StagedEntry): Promise<void> {
    await fsp.rm(entry.path, { force: true });
  }

  /** Remove the staging directory and anything left in it. */
  async dispose(): Promise<void> {
    await fsp.rm(this.directory, { recursive: true, force: true });
  }
}
