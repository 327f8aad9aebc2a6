/**
 * @module commands/secrets
 * `berth secrets`: webhook rotation and a strength report.
 */

import type { Command } from 'commander';
import { withDeployer, type ProgramOptions } from '../context.js';
import { GRAY, RESET, heading, log, OK, printStructuredError, statusIcon, warnAll } from '../output.js';

function strengthStatus(strength: string): string {
  if (strength === 'strong') return 'pass';
  if (strength === 'weak') return 'fail';
  return 'warn';
}

export function registerSecrets(program: Command, options: ProgramOptions): void {
  const secrets = program.command('secrets').description('Credential operations');

  secrets
    .command('rotate-webhook')
    .description('Generate a new webhook secret for node and dashboard')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.rotateWebhook();
        if (!result.ok) {
          printStructuredError(result.error);
          return false;
        }
        log(OK, 'Webhook secret rotated and verified in both env files');
        if (result.value.restarted.length > 0) {
          log(OK, `Restarted ${result.value.restarted.join(', ')}`);
        }
        warnAll(result.warnings);
        return true;
      });
    });

  secrets
    .command('check')
    .description('Report the strength of stored credentials')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        heading(`Credentials (${deployer.deployment.mode})`);
        const audit = await deployer.auditCredentials();
        for (const entry of audit) {
          log(statusIcon(strengthStatus(entry.strength)), `${entry.key} ${entry.strength} ${GRAY}${entry.location}${RESET}`);
          warnAll(entry.warnings);
        }
        return audit.every((entry) => entry.strength !== 'weak');
      });
    });
}
