/**
 * @module commands/app
 * `berth app`: application container setup, the first admin user and the
 * encryption key.
 */

import type { Command } from 'commander';
import { askTerminal, withDeployer, type ProgramOptions } from '../context.js';
import { GRAY, INFO, RED, RESET, WARN, log, OK, printStructuredError, statusIcon, warnAll } from '../output.js';

export function registerApp(program: Command, options: ProgramOptions): void {
  const ask = options.prompt ?? askTerminal;
  const app = program.command('app').description('Application operations');

  app
    .command('setup')
    .description('Dependencies, migrations, seeders and optional components')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.setupApplication();
        if (!result.ok) {
          printStructuredError(result.error);
          return false;
        }
        for (const step of result.value) {
          log(statusIcon(step.status), `${step.name} ${GRAY}${step.duration}ms${RESET}`);
        }
        warnAll(result.warnings);
        return true;
      });
    });

  app
    .command('create-admin')
    .description('Create the first admin user interactively')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.createAdmin(true);
        if (!result.ok) {
          printStructuredError(result.error);
          return false;
        }
        log(OK, 'Admin user created');
        return true;
      });
    });

  app
    .command('regenerate-key')
    .description('Generate a new application encryption key')
    .option('--yes', 'do not ask for confirmation')
    .action(async (opts: { yes?: boolean }) => {
      if (!opts.yes) {
        log(WARN, 'Data encrypted with the current key will no longer be readable');
        const answer = await ask(`${RED}Regenerate the encryption key? [y/N] ${RESET}`);
        if (answer.trim().toLowerCase() !== 'y') {
          log(INFO, 'Cancelled');
          return;
        }
      }
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.regenerateEncryptionKey();
        if (!result.ok) {
          printStructuredError(result.error);
          return false;
        }
        log(OK, 'Encryption key regenerated');
        return true;
      });
    });
}
