/**
 * @module program
 * Builds the `berth` Commander program. Kept apart from the bin entry so
 * tests can parse arguments in-process.
 */

import { Command } from 'commander';
import type { ProgramOptions } from './context.js';
import { registerCheck } from './commands/check.js';
import { registerInstall } from './commands/install.js';
import { registerHealth } from './commands/health.js';
import { registerSecrets } from './commands/secrets.js';
import { registerVolumes } from './commands/volumes.js';
import { registerCert } from './commands/cert.js';
import { registerChain } from './commands/chain.js';
import { registerApp } from './commands/app.js';
import { registerBackup } from './commands/backup.js';

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('berth')
    .description('Deploy and operate a trust-anchor node stack with docker compose')
    .version('0.1.0')
    .option('-c, --config <path>', 'path to berth.yaml')
    .option('--verbose', 'print every lifecycle event');

  registerCheck(program, options);
  registerInstall(program, options);
  registerHealth(program, options);
  registerSecrets(program, options);
  registerVolumes(program, options);
  registerCert(program, options);
  registerChain(program, options);
  registerApp(program, options);
  registerBackup(program, options);

  return program;
}
