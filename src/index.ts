#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
import { serveCommand, runCommand, checkEnvCommand } from './cli/commands/index.js';
import { errorMessage } from './errors.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');
const VERSION = pkg.version;

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function parseBytes(value: string): number {
  const bytes = Number(value);
  if (!Number.isInteger(bytes) || bytes <= 0) {
    throw new InvalidArgumentError('Budget must be a positive number of bytes.');
  }
  return bytes;
}

const program = new Command();

program
  .name('drive-backup')
  .description('Back up a Google Drive account into size-bounded ZIP archives')
  .version(VERSION, '-v, --version', 'Show version number');

// Serve command
program
  .command('serve')
  .description('Run the backup web service')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .option('-H, --host <host>', 'Interface to bind')
  .action(async (options: { port?: number; host?: string }) => {
    await serveCommand(options);
  });

// Run command
program
  .command('run')
  .description('Back up one account from the command line')
  .option('-t, --refresh-token <token>', 'OAuth refresh token (default: $GOOGLE_REFRESH_TOKEN)')
  .option('-o, --out <dir>', 'Directory for the archives')
  .option('-b, --budget <bytes>', 'Maximum content bytes per archive', parseBytes)
  .action(async (options: { refreshToken?: string; out?: string; budget?: number }) => {
    await runCommand(options);
  });

// Check env command
program
  .command('check-env')
  .description('Show which OAuth settings are configured')
  .action(() => {
    checkEnvCommand();
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`\n  Error: ${errorMessage(error)}\n`));
  process.exitCode = 1;
});
