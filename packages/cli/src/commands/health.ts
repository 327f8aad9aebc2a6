/**
 * @module commands/health
 * `berth health` and `berth sync-status`.
 */

import type { Command } from 'commander';
import type { SyncStatus } from '@berth/core';
import { withDeployer, type ProgramOptions } from '../context.js';
import { BOLD, GRAY, RESET, heading, log, statusIcon, warnAll } from '../output.js';

function describeSync(sync: SyncStatus): string {
  const blocks = sync.currentBlock === null ? '' : ` block ${sync.currentBlock}`;
  const target = sync.highestBlock === null ? '' : `/${sync.highestBlock}`;
  const progress = sync.progress === null ? '' : ` (${sync.progress}%)`;
  const peers = sync.peerCount === null ? '' : `, ${sync.peerCount} peers`;
  return `${sync.state}${blocks}${target}${progress}${peers}`;
}

export function registerHealth(program: Command, options: ProgramOptions): void {
  program
    .command('health')
    .description('Service, sync and certificate health')
    .option('--json', 'print the report as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withDeployer(program, options, async (deployer) => {
        const report = await deployer.healthCheck();

        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
          return report.overall !== 'unhealthy';
        }

        heading('Health');
        for (const check of report.checks) {
          log(statusIcon(check.status), `${check.name} ${GRAY}${check.message}${RESET}`);
        }
        console.log(`\n  ${BOLD}overall:${RESET} ${statusIcon(report.overall)} ${report.overall}\n`);
        return report.overall !== 'unhealthy';
      });
    });

  program
    .command('sync-status')
    .description('Blockchain client catch-up state')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const sync = await deployer.syncStatus();
        if (sync === null) {
          log(statusIcon('skipped'), 'No RPC endpoint configured');
          return true;
        }
        log(statusIcon(sync.state), describeSync(sync));
        warnAll(sync.warnings);
        return sync.state !== 'unreachable';
      });
    });
}
