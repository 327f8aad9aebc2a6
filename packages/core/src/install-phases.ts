/**
 * @module install-phases
 * The thirteen install phases, bound to their collaborators.
 */

import type { Bus, CertificateRecord, Clock, CredentialStore, Deployment, ServiceDescriptor } from './types.js';
import type { BerthConfig } from './config-loader.js';
import { parseDuration } from './config-loader.js';
import type { ComposeClient } from './compose-engine.js';
import type { InstallPhase } from './orchestrator.js';
import type { PreflightChecker } from './resilience/preflight.js';
import type { CredentialManager } from './credentials/credential-manager.js';
import { ensureIdentity, type KeypairSource } from './credentials/identity.js';
import type { CertificateManager } from './certificates/certificate-manager.js';
import { describeIneligibility, ineligibilityReason } from './certificates/domain.js';
import { renderProxyConfig } from './certificates/proxy-config.js';
import type { ResourceManager } from './resources/resource-manager.js';
import type { ChainConfigurator } from './chain/chain-config.js';
import type { AppSetup } from './application/app-setup.js';
import { awaitAllReady, unreadyError } from './readiness-gate.js';
import { orderByDependencies } from './topology.js';
import { fail, failWith, succeed, type ErrorCode } from './resilience/error-codes.js';

export interface InstallDeps {
  deployment: Deployment;
  config: BerthConfig;
  compose: ComposeClient;
  preflight: PreflightChecker;
  credentials: CredentialManager;
  stores: { root: CredentialStore; node: CredentialStore; dashboard: CredentialStore };
  keypairSource: KeypairSource;
  certificates: CertificateManager;
  resources: ResourceManager;
  services: ServiceDescriptor[];
  chain: ChainConfigurator;
  app: AppSetup;
  /** Absolute template directory and rendered output path */
  proxy: { templatesDir: string; outputPath: string };
  clock?: Clock;
  bus?: Bus;
}

const ERROR_CODES: readonly ErrorCode[] = [
  'DOCKER_UNAVAILABLE',
  'DISK_SPACE_LOW',
  'CONFIGURATION_ERROR',
  'PORT_CONFLICT',
];

function checkErrorCode(details: Record<string, unknown> | undefined): ErrorCode {
  const code = details?.['errorCode'];
  return ERROR_CODES.find((c) => c === code) ?? 'DEPENDENCY_UNREADY';
}

export function createInstallPhases(deps: InstallDeps): InstallPhase[] {
  const { deployment, config, compose, stores, credentials } = deps;

  return [
    {
      ordinal: 1,
      name: 'dependency verification',
      description: 'Docker daemon, compose plugin, compose file, disk space and ports',
      required: true,
      action: async () => {
        const report = await deps.preflight.runAll(deployment);
        const failed = report.checks.filter((c) => c.status === 'fail');
        const first = failed[0];
        if (first) {
          return fail(checkErrorCode(first.details), failed.map((c) => c.message).join('; '), { checks: report.checks });
        }
        return succeed(report, report.checks.filter((c) => c.status === 'warn').map((c) => c.message));
      },
    },
    {
      ordinal: 2,
      name: 'credential generation',
      description: 'Database password, application key and webhook secret',
      required: true,
      action: async () => {
        const database = await credentials.ensureDatabaseCredentials(stores.root, stores.dashboard);
        if (!database.ok) return database;
        const appKey = await credentials.ensureAppKey(stores.dashboard);
        if (!appKey.ok) return appKey;
        const webhook = await credentials.syncWebhookSecret(stores.node, stores.dashboard);
        if (!webhook.ok) return webhook;
        return succeed(
          { database: database.value.password.action, appKeyCreated: appKey.value.created, webhook: webhook.value.source },
          database.warnings,
        );
      },
    },
    {
      ordinal: 3,
      name: 'resource build',
      description: 'Build service images',
      required: true,
      action: () => compose.build(),
    },
    {
      ordinal: 4,
      name: 'identity generation',
      description: 'Trust anchor keypair in the node env',
      required: true,
      action: () => ensureIdentity(stores.node, deployment.commonName, deps.keypairSource),
    },
    {
      ordinal: 5,
      name: 'certificate setup',
      description: 'Obtain a public certificate for the service host',
      required: false,
      action: async () => {
        if (!config.certificates.obtainOnInstall) {
          return succeed('disabled', ['Certificate request disabled (certificates.obtainOnInstall: false)']);
        }
        const reason = ineligibilityReason(deployment.serviceHost);
        if (reason !== null) {
          return succeed('ineligible', [`No certificate for ${deployment.serviceHost}: ${describeIneligibility(reason)}`]);
        }
        const result = await deps.certificates.obtain(deployment.serviceHost);
        switch (result.status) {
          case 'obtained':
            return succeed(result);
          case 'rejected':
            return succeed(result, [result.reason]);
          case 'failed':
            return failWith(result.error);
        }
      },
    },
    {
      ordinal: 6,
      name: 'proxy configuration',
      description: 'Render the reverse-proxy configuration',
      required: true,
      action: async () => {
        const warnings: string[] = [];
        let certificate: CertificateRecord | null = null;
        if (ineligibilityReason(deployment.serviceHost) === null) {
          const status = await deps.certificates.status(deployment.serviceHost);
          if (status.error) warnings.push(`Certificate status unavailable: ${status.error}`);
          certificate = status.record;
        }
        const rendered = await renderProxyConfig({
          templatesDir: deps.proxy.templatesDir,
          outputPath: deps.proxy.outputPath,
          serviceHost: deployment.serviceHost,
          certificate,
        });
        if (!rendered.ok) return rendered;
        return succeed(rendered.value, warnings);
      },
    },
    {
      ordinal: 7,
      name: 'resettable-resource reset',
      description: 'Remove resettable volumes; preserved volumes are never touched',
      required: true,
      action: async () => {
        // Nothing may be running on a fresh host; a volume still in use fails below.
        const down = await compose.down();
        const warnings = down.ok ? [] : [`Stopping containers failed: ${down.error.message}`];
        const result = await deps.resources.resetResettable();
        if (result.failed.length > 0) {
          return fail('EXTERNAL_TOOL_FAILURE', `Could not remove ${result.failed.map((f) => f.name).join(', ')}`, {
            failed: result.failed,
          });
        }
        return succeed(result, warnings);
      },
    },
    {
      ordinal: 8,
      name: 'service start',
      description: 'Start every service',
      required: true,
      action: () => compose.up(),
    },
    {
      ordinal: 9,
      name: 'readiness wait',
      description: 'Wait for every service to answer its probe',
      required: true,
      action: async () => {
        const result = await awaitAllReady(orderByDependencies(deps.services), {
          intervalSeconds: parseDuration(config.readiness.interval) / 1000,
          timeoutSeconds: parseDuration(config.readiness.allServicesTimeout) / 1000,
          clock: deps.clock,
          bus: deps.bus,
        });
        if (!result.ok) return failWith(unreadyError(result.notReady));
        return succeed(result);
      },
    },
    {
      ordinal: 10,
      name: 'chain-specific configuration',
      description: `Network settings for ${deployment.networkTarget}`,
      required: true,
      action: () => deps.chain.configure(),
    },
    {
      ordinal: 11,
      name: 'application setup',
      description: 'Dependencies, migrations and keys inside the application container',
      required: true,
      action: () => deps.app.runSteps(config.application.setup),
    },
    {
      ordinal: 12,
      name: 'optional components',
      description: 'Horizon, Passport env link and address-proof storage',
      required: false,
      action: () => deps.app.runOptional(config.application.optional),
    },
    {
      ordinal: 13,
      name: 'interactive finalization',
      description: 'Create the first admin user',
      required: false,
      action: (context) => deps.app.createAdmin(context.interactive),
    },
  ];
}
