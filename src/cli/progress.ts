import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { BackupProgress } from '../backup/types.js';

/**
 * Format bytes to human readable string (KB, MB, GB)
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

/**
 * One-line status for a running backup
 */
export function describeProgress(progress: BackupProgress): string {
  switch (progress.state) {
    case 'created':
      return 'Preparing';
    case 'listing':
      return 'Listing files';
    default: {
      const skipped = progress.failedFiles > 0 ? chalk.yellow(`, ${progress.failedFiles} skipped`) : '';
      const archive = progress.archiveIndex > 0 ? chalk.gray(` -> archive #${progress.archiveIndex}`) : '';
      const current = progress.currentFile ? chalk.gray(` ${progress.currentFile}`) : '';
      return `${progress.succeededFiles} archived (${formatBytes(progress.bytesWritten)})${skipped}${archive}${current}`;
    }
  }
}

export interface BackupSpinner {
  update(progress: BackupProgress): void;
  finish(progress: BackupProgress): void;
}

export function createBackupSpinner(): BackupSpinner {
  const spinner: Ora = ora({ text: 'Preparing', indent: 2 }).start();

  return {
    update(progress) {
      spinner.text = describeProgress(progress);
    },
    finish(progress) {
      const summary = `${progress.succeededFiles} files, ${formatBytes(progress.bytesWritten)} in ${progress.archives.length} archive(s)`;
      if (progress.state === 'completed') {
        spinner.succeed(`Backup complete: ${summary}`);
      } else if (progress.state === 'cancelled') {
        spinner.warn(`Backup cancelled: ${summary}`);
      } else {
        spinner.fail(`Backup failed: ${progress.error ?? 'unknown error'}`);
      }
    },
  };
}
