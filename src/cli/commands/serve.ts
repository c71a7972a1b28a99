import chalk from 'chalk';
import type { Server } from 'http';
import { loadConfig, type AppConfig } from '../../config.js';
import { ConfigError } from '../../errors.js';
import { createLogger, setLogLevel } from '../../logger.js';
import { SessionRegistry } from '../../backup/sessionRegistry.js';
import type { DriveApiFactory } from '../../backup/types.js';
import { GoogleAuthProvider, googleDriveApis } from '../../storage/drive/driveClient.js';
import { createApp } from '../../server/app.js';

const log = createLogger('serve');

const unconfiguredApis: DriveApiFactory = () => {
  throw new ConfigError('GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set');
};

function banner(config: AppConfig, port: number): string {
  return `
  ╔═══════════════════════════════════════════════════╗
  ║         Drive Backup Server                       ║
  ╠═══════════════════════════════════════════════════╣
  ║  Status:    Running                               ║
  ║  Port:      ${String(port).padEnd(37)}║
  ║  Callback:  ${config.redirectUri.padEnd(37).slice(0, 37)}║
  ║  Archives:  ${config.backupRoot.padEnd(37).slice(0, 37)}║
  ╚═══════════════════════════════════════════════════╝
  `;
}

export async function serveCommand(options: { port?: number; host?: string }): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (!config.oauth) {
    console.log(chalk.yellow('  WARNING: GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set in .env file'));
  }

  const authProvider = config.oauth ? new GoogleAuthProvider(config.oauth) : null;
  const registry = new SessionRegistry({
    backupRoot: config.backupRoot,
    sessionTtlMs: config.sessionTtlMs,
    archiveBudgetBytes: config.archiveBudgetBytes,
    compressionLevel: config.compressionLevel,
    listPageSize: config.listPageSize,
    apiFactory: config.oauth ? googleDriveApis(config.oauth) : unconfiguredApis,
    authProvider,
  });
  registry.startCleanup(config.cleanupIntervalMs);

  const app = createApp({ config, registry, authProvider });
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });
  console.log(chalk.cyan(banner(config, port)));

  let stopping = false;
  const stop = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, stopping`);
    server.close();
    await registry.shutdown();
    log.info('All backup jobs stopped');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      stop(signal).catch((error: unknown) => {
        log.error('Shutdown failed', error);
        process.exitCode = 1;
      });
    });
  }
}
