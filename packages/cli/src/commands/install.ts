/**
 * @module commands/install
 * `berth install`: run the thirteen install phases.
 *
 * A required phase failure halts the run and is reported with its ordinal;
 * nothing completed before it is undone.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { withDeployer, type ProgramOptions } from '../context.js';
import {
  BOLD, GRAY, GREEN, RED, RESET,
  heading, log, printStructuredError, statusIcon, warnAll,
} from '../output.js';

function parseOrdinal(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

export function registerInstall(program: Command, options: ProgramOptions): void {
  program
    .command('install')
    .description('Full install: credentials, images, certificates, services, chain and application')
    .option('--from <n>', 'resume at phase n', parseOrdinal)
    .option('--non-interactive', 'skip prompts (admin creation is left for later)')
    .action(async (opts: { from?: number; nonInteractive?: boolean }) => {
      await withDeployer(program, options, async (deployer) => {
        const { deployment } = deployer;
        heading(`Installing ${deployment.networkTarget} (${deployment.mode}) on ${deployment.serviceHost}`);

        const report = await deployer.install({ from: opts.from, interactive: !opts.nonInteractive });

        console.log('');
        for (const phase of report.phases) {
          const ms = phase.duration > 0 ? ` ${GRAY}${phase.duration}ms${RESET}` : '';
          log(statusIcon(phase.status), `${phase.ordinal}. ${phase.name}${ms}`);
          warnAll(phase.warnings);
        }

        if (report.failure) {
          console.error(`\n${RED}${BOLD}Install halted at phase ${report.failure.ordinal} (${report.failure.name})${RESET}`);
          printStructuredError(report.failure.error);
          console.error(`  ${GRAY}→ resume with: berth install --from ${report.failure.ordinal}${RESET}\n`);
          return false;
        }

        console.log(`\n${GREEN}${BOLD}Install complete${RESET} ${GRAY}(${(report.duration / 1000).toFixed(1)}s)${RESET}\n`);
        return true;
      });
    });
}
