/**
 * @module commands/chain
 * `berth chain`: network settings, static peers and the chainspec.
 */

import type { Command } from 'commander';
import { withDeployer, type ProgramOptions } from '../context.js';
import { GRAY, RESET, log, OK, INFO, printStructuredError, warnAll } from '../output.js';

export function registerChain(program: Command, options: ProgramOptions): void {
  const chain = program.command('chain').description('Blockchain network operations');

  chain
    .command('configure')
    .description('Apply the network target to the env files and node artifacts')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.configureChain();
        if (!result.ok) {
          printStructuredError(result.error);
          return false;
        }
        const report = result.value;
        log(OK, `Configured ${deployer.deployment.networkTarget} ${GRAY}${report.chainDir}${RESET}`);
        log(report.statsEnabled ? OK : INFO, `stats reporting ${report.statsEnabled ? 'enabled' : 'disabled'}`);
        if (report.seededKeys.length > 0) log(OK, `seeded ${report.seededKeys.length} node env keys`);
        if (report.nodeRestarted) log(OK, 'node restarted');
        warnAll(result.warnings);
        return true;
      });
    });

  chain
    .command('refresh-nodes')
    .description('Rewrite static-nodes.json from the network stats service')
    .option('--restart', 'restart the blockchain client afterwards')
    .action(async (opts: { restart?: boolean }) => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.refreshStaticNodes({ restart: opts.restart ?? false });
        if (!result.ok) {
          printStructuredError(result.error);
          return false;
        }
        const report = result.value;
        if (report.staticNodes === 'unchanged') {
          log(INFO, 'static-nodes.json unchanged');
        } else {
          log(OK, `wrote ${report.count} peers to static-nodes.json`);
        }
        if (report.contact !== null) log(OK, `contact ${GRAY}${report.contact}${RESET}`);
        if (report.restarted) log(OK, 'nethermind restarted');
        warnAll(result.warnings);
        return true;
      });
    });

  chain
    .command('update-spec')
    .description('Replace shyftchainspec.json with the published chainspec')
    .option('--restart', 'restart the blockchain client when it is running')
    .action(async (opts: { restart?: boolean }) => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.updateChainspec({ restart: opts.restart ?? false });
        if (!result.ok) {
          printStructuredError(result.error);
          return false;
        }
        const report = result.value;
        if (report.status === 'unchanged') {
          log(INFO, `Chainspec is identical to ${GRAY}${report.url}${RESET}`);
        } else {
          log(OK, `Updated ${report.path} ${GRAY}(${report.bytes} bytes)${RESET}`);
          if (report.backupPath !== null) log(INFO, `previous chainspec kept as ${report.backupPath}`);
        }
        if (report.restarted) log(OK, 'nethermind restarted');
        warnAll(result.warnings);
        return true;
      });
    });
}
