/**
 * @module commands/cert
 * `berth cert`: obtain, renew and inspect the service-host certificate.
 */

import type { Command } from 'commander';
import { withDeployer, type ProgramOptions } from '../context.js';
import { GRAY, RESET, log, OK, INFO, WARN, printStructuredError, statusIcon, warnAll } from '../output.js';

export function registerCert(program: Command, options: ProgramOptions): void {
  const cert = program.command('cert').description('Certificate operations');

  cert
    .command('obtain')
    .description('Request a certificate for the service host')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.obtainCertificate();
        switch (result.status) {
          case 'obtained':
            log(OK, `Certificate for ${result.domain} ${GRAY}${result.certPath}${RESET}`);
            return true;
          case 'rejected':
            log(WARN, `${result.domain}: ${result.reason}`);
            return false;
          case 'failed':
            printStructuredError(result.error);
            return false;
        }
      });
    });

  cert
    .command('renew')
    .description('Renew certificates that are due and reload the proxy')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.renewCertificate();
        switch (result.status) {
          case 'renewed':
            log(OK, result.reloaded ? 'Renewed; proxy reloaded' : 'Renewed');
            warnAll(result.warnings);
            return true;
          case 'not_due':
            log(INFO, 'Not due for renewal');
            return true;
          case 'skipped':
            log(INFO, result.reason);
            return true;
          case 'failed':
            printStructuredError(result.error);
            return false;
        }
      });
    });

  cert
    .command('auto-renew')
    .description('Start the certbot service that checks for renewals every 12 hours')
    .option('--force', 'enable even on a development deployment')
    .option('--restart', 'restart the service when it is already running')
    .action(async (opts: { force?: boolean; restart?: boolean }) => {
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.enableAutoRenewal(opts);
        switch (result.status) {
          case 'started':
            log(OK, `Auto-renewal enabled ${GRAY}(logs: docker compose logs certbot)${RESET}`);
            return true;
          case 'restarted':
            log(OK, 'Auto-renewal service restarted');
            return true;
          case 'already_running':
            log(INFO, 'Auto-renewal service already running');
            return true;
          case 'skipped':
            log(INFO, result.reason);
            return true;
          case 'failed':
            printStructuredError(result.error);
            return false;
        }
      });
    });

  cert
    .command('status')
    .description('Expiry state of the service-host certificate')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const status = await deployer.certificateStatus();
        const days = status.daysRemaining === null ? '' : ` ${GRAY}(${status.daysRemaining} days)${RESET}`;
        log(statusIcon(status.state), `${deployer.deployment.serviceHost}: ${status.state}${days}`);
        if (status.error) log(WARN, status.error);
        return status.state !== 'expired';
      });
    });
}
