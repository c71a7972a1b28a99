import chalk from 'chalk';
import dotenv from 'dotenv';

const REQUIRED = ['GOOGLE_CLIENT_ID', 'GOOGLE_CLIENT_SECRET', 'REDIRECT_URL'] as const;

export function checkEnvCommand(): void {
  dotenv.config();
  console.log(chalk.bold('\n  Checking environment variables...\n'));

  let missing = 0;
  for (const name of REQUIRED) {
    if (process.env[name]) {
      console.log(chalk.green(`  ✅ ${name} set`));
    } else {
      console.log(chalk.red(`  ❌ ${name} not set`));
      missing++;
    }
  }
  console.log();

  if (missing > 0) {
    process.exitCode = 1;
  }
}
