/**
 * @module deployer
 * Deployer: one object per loaded deployment, wiring every lifecycle
 * component and exposing the operations the CLI runs.
 *
 * Each public operation is recorded in the operation log. Collaborators that
 * reach outside the process (commands, env files, RPC, ethstats, the clock)
 * can be replaced through {@link DeployerOverrides}.
 */

import path from 'node:path';
import type { Clock, CredentialStore, Deployment, PersistentResource, Probe, SyncStatus } from './types.js';
import { systemClock } from './types.js';
import { buildDeployment, loadConfig, parseDuration, type BerthConfig, type LoadedConfig } from './config-loader.js';
import { ProcessExecutor, type CommandExecutor } from './command-executor.js';
import { ComposeClient } from './compose-engine.js';
import { EnvFileStore } from './credential-store.js';
import { EventBus } from './event-bus.js';
import { createStore, OperationLog, type OperationStatus, type Store } from './store.js';
import { DeployError, failWith, succeed, type Outcome } from './resilience/error-codes.js';
import { PreflightChecker, type PreflightReport } from './resilience/preflight.js';
import { CredentialManager } from './credentials/credential-manager.js';
import { containerKeypairSource, ensureIdentity, type KeypairSource } from './credentials/identity.js';
import type { SecretAlphabet } from './credentials/secret-generator.js';
import { HttpJsonRpcClient, type JsonRpcClient } from './health/rpc-client.js';
import { HealthMonitor, type CertificateStatus, type HealthReport } from './health/health-monitor.js';
import { CertificateManager, type AutoRenewalResult, type ObtainResult, type RenewResult } from './certificates/certificate-manager.js';
import { isEligibleDomain } from './certificates/domain.js';
import { ResourceManager, type DestroyRequest, type DestroyResult, type ResetResult } from './resources/resource-manager.js';
import { ChainConfigurator, type ChainConfigureReport, type ChainspecReport, type StaticNodesReport } from './chain/chain-config.js';
import type { EnodeFetcher } from './chain/ethstats-client.js';
import { AppSetup, type StepReport } from './application/app-setup.js';
import { InstallOrchestrator, type InstallReport, type RunOptions } from './orchestrator.js';
import { createInstallPhases } from './install-phases.js';
import { createServiceDescriptors, SERVICES } from './topology.js';
import {
  BackupManager,
  type AppFilesRestore,
  type BackupEntry,
  type BackupKind,
  type CleanResult,
  type FullBackupResult,
  type RestoreRequest,
} from './backups/backup-manager.js';

export interface DeploymentStores {
  root: CredentialStore;
  node: CredentialStore;
  dashboard: CredentialStore;
}

export interface DeployerOverrides {
  executor?: CommandExecutor;
  stores?: Partial<DeploymentStores>;
  rpc?: JsonRpcClient;
  clock?: Clock;
  bus?: EventBus;
  operationStore?: Store;
  fetchEnodes?: EnodeFetcher;
  keypairSource?: KeypairSource;
  isPortInUse?: (port: number) => Promise<boolean>;
  generate?: (length: number, alphabet: SecretAlphabet) => string;
}

export interface VolumeListing extends PersistentResource {
  volume: string;
  exists: boolean;
}

const CREDENTIAL_AUDIT_KEYS: ReadonlyArray<readonly [keyof DeploymentStores, string[]]> = [
  ['root', ['POSTGRES_PASSWORD']],
  ['dashboard', ['DB_PASSWORD', 'APP_KEY', 'WEBHOOK_CLIENT_SECRET']],
  ['node', ['WEBHOOK_CLIENT_SECRET']],
];

function outcomeStatus(outcome: Outcome<unknown>): { status: OperationStatus; detail?: string } {
  return outcome.ok ? { status: 'success' } : { status: 'failed', detail: outcome.error.message };
}

export class Deployer {
  readonly bus: EventBus;
  readonly compose: ComposeClient;
  readonly stores: DeploymentStores;
  readonly credentials: CredentialManager;
  readonly resources: ResourceManager;
  readonly certificates: CertificateManager;
  readonly chain: ChainConfigurator;
  readonly app: AppSetup;
  readonly health: HealthMonitor;
  readonly preflight: PreflightChecker;
  readonly backups: BackupManager;
  readonly log: OperationLog;

  private readonly config: BerthConfig;
  private readonly rpc: JsonRpcClient;
  private readonly clock: Clock;
  private readonly operationStore: Store;
  private readonly keypairSource: KeypairSource;
  private readonly projectDir: string;

  /**
   * Load `berth.yaml`, validate the deployment and wire a Deployer.
   *
   * @throws {DeployError} CONFIGURATION_ERROR
   */
  static async fromConfig(configPath?: string, overrides: DeployerOverrides = {}): Promise<Deployer> {
    const loaded = await loadConfig(configPath);
    const deployment = buildDeployment(loaded);
    if (!deployment.ok) {
      const { code, message, details } = deployment.error;
      throw new DeployError(code, message, details);
    }
    return new Deployer(loaded, deployment.value, overrides);
  }

  constructor(
    loaded: LoadedConfig,
    readonly deployment: Deployment,
    overrides: DeployerOverrides = {},
  ) {
    const { config, projectDir } = loaded;
    this.config = config;
    this.projectDir = projectDir;
    this.bus = overrides.bus ?? new EventBus();
    this.clock = overrides.clock ?? systemClock;
    const resolve = (relative: string): string => path.resolve(projectDir, relative);

    const executor = overrides.executor ?? new ProcessExecutor();
    this.compose = new ComposeClient(executor, {
      composeFile: deployment.composeFile,
      projectName: deployment.projectName,
      projectDir,
    });
    this.rpc = overrides.rpc ?? new HttpJsonRpcClient(config.rpc.url, parseDuration(config.rpc.timeout));

    this.stores = {
      root: overrides.stores?.root ?? new EnvFileStore(resolve(config.files.root)),
      node: overrides.stores?.node ?? new EnvFileStore(resolve(config.files.node)),
      dashboard: overrides.stores?.dashboard ?? new EnvFileStore(resolve(config.files.dashboard)),
    };

    this.credentials = new CredentialManager({ mode: deployment.mode, bus: this.bus, generate: overrides.generate });
    this.keypairSource = overrides.keypairSource ?? containerKeypairSource(this.compose, SERVICES.node);
    this.resources = new ResourceManager(this.compose, { bus: this.bus });
    this.preflight = new PreflightChecker(executor, { bus: this.bus, isPortInUse: overrides.isPortInUse });

    const readiness = {
      intervalSeconds: parseDuration(config.readiness.interval) / 1000,
      timeoutSeconds: parseDuration(config.readiness.timeout) / 1000,
    };

    this.certificates = new CertificateManager({
      compose: this.compose,
      rootEnv: this.stores.root,
      webroot: config.certificates.webroot,
      liveDir: config.certificates.liveDir,
      expiryThresholdDays: config.certificates.expiryThresholdDays,
      mode: deployment.mode,
      proxyWait: readiness,
      clock: this.clock,
      bus: this.bus,
    });

    const services = createServiceDescriptors({ compose: this.compose, rpc: this.rpc, rootEnv: this.stores.root });
    const probeOf = (name: string): Probe => services.find((s) => s.name === name)?.probe ?? (async () => false);
    const nodeProbe = probeOf(SERVICES.node);

    this.chain = new ChainConfigurator({
      networkTarget: deployment.networkTarget,
      chainsDir: resolve(config.chain.directory),
      compose: this.compose,
      rootEnv: this.stores.root,
      nodeEnv: this.stores.node,
      rpc: this.rpc,
      statsSecret: config.chain.statsSecret,
      nodeProbe,
      readiness,
      fetchEnodes: overrides.fetchEnodes,
      clock: this.clock,
      bus: this.bus,
    });

    this.app = new AppSetup({
      compose: this.compose,
      service: config.application.service,
      dashboardEnv: this.stores.dashboard,
      adminCommand: config.application.adminCommand,
      bus: this.bus,
    });

    this.health = new HealthMonitor({
      services,
      rpc: this.rpc,
      certificateStatus: isEligibleDomain(deployment.serviceHost) ? () => this.certificates.status(deployment.serviceHost) : undefined,
      concurrency: config.health.concurrency,
      probeTimeoutMs: parseDuration(config.health.probeTimeout),
      bus: this.bus,
    });

    this.backups = new BackupManager({
      compose: this.compose,
      executor,
      backupDir: resolve(config.backups.directory),
      projectDir,
      rootEnv: this.stores.root,
      envFiles: [config.files.root, config.files.dashboard, config.files.node],
      databaseProbe: probeOf(SERVICES.database),
      cacheProbe: probeOf(SERVICES.cache),
      readiness,
      clock: this.clock,
      bus: this.bus,
    });

    this.operationStore = overrides.operationStore ?? createStore({ type: 'file', filePath: resolve(config.log.file) });
    this.log = new OperationLog(this.operationStore, deployment.projectName);
  }

  // ── Install ─────────────────────────────────────────────────────────

  createOrchestrator(): InstallOrchestrator {
    const phases = createInstallPhases({
      deployment: this.deployment,
      config: this.config,
      compose: this.compose,
      preflight: this.preflight,
      credentials: this.credentials,
      stores: this.stores,
      keypairSource: this.keypairSource,
      certificates: this.certificates,
      resources: this.resources,
      services: createServiceDescriptors({ compose: this.compose, rpc: this.rpc, rootEnv: this.stores.root }),
      chain: this.chain,
      app: this.app,
      proxy: {
        templatesDir: path.resolve(this.projectDir, this.config.certificates.templatesDir),
        outputPath: path.resolve(this.projectDir, this.config.certificates.proxyConfigOutput),
      },
      clock: this.clock,
      bus: this.bus,
    });
    return new InstallOrchestrator(phases, this.bus);
  }

  install(options: RunOptions = {}): Promise<InstallReport> {
    return this.log.track('install', () => this.createOrchestrator().run(options), (report) =>
      report.failure
        ? { status: 'aborted', detail: `phase ${report.failure.ordinal} (${report.failure.name}): ${report.failure.error.message}` }
        : { status: 'success' },
    );
  }

  check(): Promise<PreflightReport> {
    return this.log.track('check', () => this.preflight.runAll(this.deployment), (report) => ({
      status: report.overall === 'unhealthy' ? 'failed' : 'success',
      detail: report.overall,
    }));
  }

  // ── Credentials ─────────────────────────────────────────────────────

  /**
   * New webhook secret in every scope. Dependants are restarted only after
   * the written values verify, and only if they are running.
   */
  rotateWebhook(): Promise<Outcome<{ restarted: string[] }>> {
    return this.log.track('secrets.rotate-webhook', async () => {
      const rotated = await this.credentials.rotateWebhookSecret(this.stores.node, this.stores.dashboard);
      if (!rotated.ok) return failWith<{ restarted: string[] }>(rotated.error);

      const running = (await this.compose.runningServices()) ?? [];
      const dependants = [SERVICES.app, SERVICES.node].filter((s) => running.includes(s));
      if (dependants.length === 0) return succeed({ restarted: [] }, ['No dependent services running; restart skipped']);

      const restart = await this.compose.restart(dependants);
      if (!restart.ok) {
        return succeed({ restarted: [] }, [`Secret rotated but restart failed: ${restart.error.message}`]);
      }
      return succeed({ restarted: dependants });
    }, outcomeStatus);
  }

  async auditCredentials(): Promise<Awaited<ReturnType<CredentialManager['audit']>>> {
    const results = await Promise.all(
      CREDENTIAL_AUDIT_KEYS.map(([store, keys]) => this.credentials.audit(this.stores[store], keys)),
    );
    return results.flat();
  }

  /** Keypair step on its own. */
  ensureIdentity(): ReturnType<typeof ensureIdentity> {
    return this.log.track('identity', () => ensureIdentity(this.stores.node, this.deployment.commonName, this.keypairSource), outcomeStatus);
  }

  // ── Volumes ─────────────────────────────────────────────────────────

  resetVolumes(): Promise<ResetResult> {
    return this.log.track('volumes.reset', () => this.resources.resetResettable(), (result) =>
      result.failed.length > 0
        ? { status: 'failed', detail: result.failed.map((f) => f.name).join(', ') }
        : { status: 'success', detail: `removed ${result.removed.length}` },
    );
  }

  destroy(request: DestroyRequest): Promise<DestroyResult> {
    return this.log.track('volumes.destroy', () => this.resources.destroyAll(request), (result) =>
      result.status === 'aborted'
        ? { status: 'aborted', detail: result.reason }
        : { status: result.failed.length > 0 ? 'failed' : 'success', detail: `scope ${result.scope}` },
    );
  }

  async listVolumes(): Promise<VolumeListing[]> {
    return Promise.all(
      this.resources.list().map(async (resource) => {
        const volume = this.compose.volumeName(resource.name);
        return { ...resource, volume, exists: await this.compose.volumeExists(volume) };
      }),
    );
  }

  // ── Health ──────────────────────────────────────────────────────────

  healthCheck(): Promise<HealthReport> {
    return this.log.track('health', () => this.health.runHealthCheck(), (report) => ({
      status: report.overall === 'unhealthy' ? 'failed' : 'success',
      detail: report.overall,
    }));
  }

  async syncStatus(): Promise<SyncStatus | null> {
    return this.health.syncStatus();
  }

  // ── Certificates ────────────────────────────────────────────────────

  obtainCertificate(): Promise<ObtainResult> {
    return this.log.track('cert.obtain', () => this.certificates.obtain(this.deployment.serviceHost), (result) => ({
      status: result.status === 'obtained' ? 'success' : 'failed',
      detail: result.status,
    }));
  }

  renewCertificate(): Promise<RenewResult> {
    return this.log.track('cert.renew', () => this.certificates.renew(), (result) => ({
      status: result.status === 'failed' ? 'failed' : 'success',
      detail: result.status,
    }));
  }

  enableAutoRenewal(options: { force?: boolean; restart?: boolean } = {}): Promise<AutoRenewalResult> {
    return this.log.track('cert.auto-renew', () => this.certificates.enableAutoRenewal(options), (result) => ({
      status: result.status === 'failed' ? 'failed' : 'success',
      detail: result.status,
    }));
  }

  certificateStatus(): Promise<CertificateStatus> {
    return this.certificates.status(this.deployment.serviceHost);
  }

  // ── Chain ───────────────────────────────────────────────────────────

  configureChain(): Promise<Outcome<ChainConfigureReport>> {
    return this.log.track('chain.configure', () => this.chain.configure(), outcomeStatus);
  }

  refreshStaticNodes(options: { restart?: boolean } = {}): Promise<Outcome<StaticNodesReport>> {
    return this.log.track('chain.refresh-nodes', () => this.chain.refreshStaticNodes(options), outcomeStatus);
  }

  updateChainspec(options: { restart?: boolean } = {}): Promise<Outcome<ChainspecReport>> {
    return this.log.track('chain.update-spec', () => this.chain.updateChainspec(options), outcomeStatus);
  }

  // ── Application ─────────────────────────────────────────────────────

  /** Setup steps, then the optional components. */
  setupApplication(): Promise<Outcome<StepReport[]>> {
    return this.log.track('app.setup', async () => {
      const setup = await this.app.runSteps(this.config.application.setup);
      if (!setup.ok) return setup;
      const optional = await this.app.runOptional(this.config.application.optional);
      if (!optional.ok) return optional;
      return succeed([...setup.value, ...optional.value], [...setup.warnings, ...optional.warnings]);
    }, outcomeStatus);
  }

  createAdmin(interactive = true): Promise<Outcome<'created' | 'skipped'>> {
    return this.log.track('app.create-admin', () => this.app.createAdmin(interactive), outcomeStatus);
  }

  regenerateEncryptionKey(): Promise<Outcome<void>> {
    return this.log.track('app.regenerate-key', () => this.app.regenerateEncryptionKey(), outcomeStatus);
  }

  // ── Backups ─────────────────────────────────────────────────────────

  backup(kind: BackupKind): Promise<Outcome<BackupEntry | null>> {
    return this.log.track(`backup.${kind}`, (): Promise<Outcome<BackupEntry | null>> => {
      switch (kind) {
        case 'database':
          return this.backups.backupDatabase();
        case 'cache':
          return this.backups.backupCache();
        case 'app_files':
          return this.backups.backupAppFiles();
      }
    }, outcomeStatus);
  }

  fullBackup(): Promise<Outcome<FullBackupResult>> {
    return this.log.track('backup.full', () => this.backups.fullBackup(), (outcome) =>
      outcome.ok && outcome.value.failed.length > 0
        ? { status: 'failed', detail: outcome.value.failed.map((f) => f.kind).join(', ') }
        : outcomeStatus(outcome),
    );
  }

  listBackups(): Promise<BackupEntry[]> {
    return this.backups.list();
  }

  /** Archives older than `days` (default: the configured retention). */
  expiredBackups(days = this.config.backups.retentionDays): Promise<BackupEntry[]> {
    return this.backups.findExpired(days);
  }

  cleanBackups(confirmation: string, days = this.config.backups.retentionDays): Promise<Outcome<CleanResult>> {
    return this.log.track('backup.clean', () => this.backups.cleanOld({ days, confirmation }), outcomeStatus);
  }

  restoreBackup(kind: BackupKind, request: RestoreRequest): Promise<Outcome<{ file: string } | AppFilesRestore>> {
    return this.log.track(`restore.${kind}`, (): Promise<Outcome<{ file: string } | AppFilesRestore>> => {
      switch (kind) {
        case 'database':
          return this.backups.restoreDatabase(request);
        case 'cache':
          return this.backups.restoreCache(request);
        case 'app_files':
          return this.backups.restoreAppFiles(request);
      }
    }, (outcome) =>
      !outcome.ok && outcome.error.code === 'CONFIRMATION_MISMATCH'
        ? { status: 'aborted', detail: outcome.error.message }
        : outcomeStatus(outcome),
    );
  }

  async close(): Promise<void> {
    this.bus.clear();
    await this.operationStore.close();
  }
}
