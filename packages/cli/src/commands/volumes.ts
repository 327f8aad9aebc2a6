/**
 * @module commands/volumes
 * `berth volumes`: list, reset and destroy persistent volumes.
 *
 * `destroy` asks for the scope and then the confirmation phrase when they
 * are not given as options; the core refuses anything that does not match.
 */

import type { Command } from 'commander';
import { askTerminal, withDeployer, type ProgramOptions } from '../context.js';
import { BOLD, FAIL, GRAY, INFO, OK, RED, RESET, YELLOW, heading, log, WARN } from '../output.js';

export function registerVolumes(program: Command, options: ProgramOptions): void {
  const ask = options.prompt ?? askTerminal;
  const volumes = program.command('volumes').description('Persistent volume operations');

  volumes
    .command('list')
    .description('Catalogued volumes and whether they exist')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        heading('Volumes');
        for (const volume of await deployer.listVolumes()) {
          const icon = volume.exists ? OK : INFO;
          const kind = volume.classification === 'preserved' ? `${YELLOW}preserved${RESET}` : 'resettable';
          log(icon, `${volume.volume} ${GRAY}(${volume.owner})${RESET} ${kind}`);
        }
        return true;
      });
    });

  volumes
    .command('reset')
    .description('Remove the resettable volumes; preserved volumes are kept')
    .option('--yes', 'do not ask for confirmation')
    .action(async (opts: { yes?: boolean }) => {
      if (!opts.yes) {
        const answer = await ask(`${YELLOW}Remove all resettable volumes? [y/N] ${RESET}`);
        if (answer.trim().toLowerCase() !== 'y') {
          log(INFO, 'Cancelled');
          return;
        }
      }
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.resetVolumes();
        for (const name of result.removed) log(OK, `removed ${name}`);
        for (const name of result.absent) log(INFO, `${name} ${GRAY}(not present)${RESET}`);
        for (const { name, error } of result.failed) log(FAIL, `${name}: ${error}`);
        return result.failed.length === 0;
      });
    });

  volumes
    .command('destroy')
    .description('Tear down containers and volumes after confirmation')
    .option('--scope <scope>', 'all | resettable | none')
    .option('--confirm <phrase>', 'confirmation phrase')
    .action(async (opts: { scope?: string; confirm?: string }) => {
      let scope = opts.scope;
      if (scope === undefined) {
        console.log(`\n${BOLD}Which volumes should be removed?${RESET}`);
        console.log('  1) all         every volume, including chain data');
        console.log('  2) resettable  keep preserved volumes');
        console.log('  3) none        containers only');
        scope = await ask('Choice: ');
      }
      const confirmation = opts.confirm ?? await ask(`${RED}Type DESTROY to continue: ${RESET}`);

      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.destroy({ scope, confirmation });
        if (result.status === 'aborted') {
          log(WARN, `Aborted: ${result.reason}`);
          return false;
        }
        if (result.containersRemoved) log(OK, 'containers removed');
        for (const name of result.removed) log(OK, `removed ${name}`);
        for (const { name, error } of result.failed) log(FAIL, `${name}: ${error}`);
        return result.failed.length === 0;
      });
    });
}
