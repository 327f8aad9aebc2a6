/**
 * @module commands/check
 * `berth check`: host preflight without touching the deployment.
 */

import type { Command } from 'commander';
import { withDeployer, type ProgramOptions } from '../context.js';
import { BOLD, GRAY, RESET, heading, log, statusIcon } from '../output.js';

export function registerCheck(program: Command, options: ProgramOptions): void {
  program
    .command('check')
    .description('Verify Docker, compose, disk space and ports')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        heading('Preflight');
        const report = await deployer.check();
        for (const check of report.checks) {
          log(statusIcon(check.status), `${check.name} ${GRAY}${check.message}${RESET}`);
        }
        console.log(`\n  ${BOLD}overall:${RESET} ${statusIcon(report.overall)} ${report.overall}\n`);
        return report.overall !== 'unhealthy';
      });
    });
}
