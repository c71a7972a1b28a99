import chalk from 'chalk';
import path from 'path';
import { loadConfig } from '../../config.js';
import { CredentialStore } from '../../auth/credentialStore.js';
import { BackupJob } from '../../backup/orchestrator.js';
import { setLogLevel } from '../../logger.js';
import { GoogleAuthProvider, googleDriveApis } from '../../storage/drive/driveClient.js';
import { createBackupSpinner, formatBytes } from '../progress.js';

export interface RunOptions {
  refreshToken?: string;
  out?: string;
  budget?: number;
}

/**
 * Headless backup of one account, authorised by a refresh token.
 */
export async function runCommand(options: RunOptions): Promise<void> {
  const config = loadConfig();
  // The spinner owns the terminal; only warnings and errors get through
  setLogLevel(config.logLevel === 'debug' ? 'debug' : 'warn');

  console.log(chalk.bold('\n  Google Drive Backup\n'));

  if (!config.oauth) {
    console.log(chalk.red('  GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set.'));
    process.exitCode = 1;
    return;
  }

  const refreshToken = options.refreshToken ?? process.env.GOOGLE_REFRESH_TOKEN;
  if (!refreshToken) {
    console.log(chalk.red('  A refresh token is required (--refresh-token or GOOGLE_REFRESH_TOKEN).'));
    process.exitCode = 1;
    return;
  }

  const authProvider = new GoogleAuthProvider(config.oauth);
  const apiFactory = googleDriveApis(config.oauth);
  // No access token yet: expiry 0 forces a refresh before listing
  const store = new CredentialStore({ accessToken: '', refreshToken, expiryDate: 0 });
  const directory = path.resolve(options.out ?? path.join(config.backupRoot, `run-${Date.now()}`));

  const spinner = createBackupSpinner();
  const job = new BackupJob({
    directory,
    budgetBytes: options.budget ?? config.archiveBudgetBytes,
    compressionLevel: config.compressionLevel,
    pageSize: config.listPageSize,
    connect: async () => {
      if (store.isExpired()) {
        store.update(await authProvider.refresh(store.get()));
      }
      return apiFactory(store.get(), (update) => store.update(update));
    },
    onProgress: (progress) => spinner.update(progress),
  });

  const task = job.start();
  const onInterrupt = (): void => task.cancel();
  process.once('SIGINT', onInterrupt);

  const result = await task.done;
  process.removeListener('SIGINT', onInterrupt);
  spinner.finish(result);

  if (result.archives.length > 0) {
    console.log(chalk.gray(`\n  Archives in ${directory}:`));
    for (const fileName of result.archives) {
      console.log(chalk.white(`    ${fileName}`));
    }
  }

  if (result.failures.length > 0) {
    console.log(chalk.yellow(`\n  ${result.failures.length} file(s) skipped:`));
    for (const failure of result.failures) {
      console.log(chalk.gray(`    ${failure.name} (${failure.reason})`));
    }
  }

  console.log(chalk.gray(`\n  ${formatBytes(result.bytesWritten)} written\n`));

  if (result.state !== 'completed') {
    process.exitCode = 1;
  }
}
