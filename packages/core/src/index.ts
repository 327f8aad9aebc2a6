// @berth/core - deployment lifecycle engine

// Types
export * from './types.js';

// Config Loader
export {
  loadConfig,
  buildDeployment,
  deriveMode,
  isNetworkTarget,
  parseDuration,
  BerthConfigSchema,
  AppStepSchema,
  DEFAULT_SETUP_STEPS,
  DEFAULT_OPTIONAL_STEPS,
} from './config-loader.js';
export type { BerthConfig, AppStep, LoadedConfig } from './config-loader.js';

// Variable Resolver
export { resolveVariables, resolveObjectVariables, findUnresolved } from './variable-resolver.js';
export type { VariableContext } from './variable-resolver.js';

// Command Executor
export { ProcessExecutor, succeeded, describeResult, DEFAULT_COMMAND_TIMEOUT_MS } from './command-executor.js';
export type { CommandExecutor, CommandResult, RunOptions as CommandRunOptions } from './command-executor.js';

// Compose Engine
export {
  ComposeClient,
  buildComposeArgs,
  buildUpArgs,
  buildDownArgs,
  buildExecArgs,
  buildRunOnceArgs,
  parseServiceList,
} from './compose-engine.js';
export type { ComposeTarget, ExecOptions, RunOnceOptions, UpOptions } from './compose-engine.js';

// Credential Store
export { EnvFileStore, MemoryCredentialStore, formatEnvAssignment, upsertEnvLine, parseEnv } from './credential-store.js';
export type { EnvFileStoreOptions } from './credential-store.js';

// Readiness Gate
export { awaitReady, awaitAllReady, unreadyError, DEFAULT_INTERVAL_SECONDS } from './readiness-gate.js';
export type { GateOptions, ReadyResult, AllReadyResult, AllReadyOptions } from './readiness-gate.js';

// Credentials
export { generateSecret, generateKeyMaterial, randomBytesGenerator, webCryptoGenerator, DEFAULT_GENERATORS } from './credentials/secret-generator.js';
export type { SecretAlphabet, SecretGenerator } from './credentials/secret-generator.js';
export { assessStrength, classifyStrength, isDenylisted, WEAK_VALUES, PRODUCTION_MIN_LENGTH, DEVELOPMENT_MIN_LENGTH } from './credentials/strength.js';
export type { StrengthAssessment } from './credentials/strength.js';
export { CredentialManager, WEBHOOK_SECRET_KEY, WEBHOOK_SECRET_MIN_LENGTH } from './credentials/credential-manager.js';
export type { UpsertResult, SyncResult, CredentialManagerOptions } from './credentials/credential-manager.js';
export { ensureIdentity, containerKeypairSource, parseKeypairOutput, IDENTITY_KEYS, KeypairSchema } from './credentials/identity.js';
export type { Keypair, KeypairSource } from './credentials/identity.js';

// Resources
export { ResourceManager, parseDestroyScope, DESTROY_PHRASE } from './resources/resource-manager.js';
export type { VolumeDriver, ResetResult, DestroyScope, DestroyRequest, DestroyResult } from './resources/resource-manager.js';

// Topology
export { SERVICES, RESOURCE_CATALOG, DEFAULT_DATABASE_ACCOUNT, createServiceDescriptors, orderByDependencies, readDatabaseAccount } from './topology.js';
export type { ServiceName, TopologyDeps, DatabaseAccount } from './topology.js';

// Backups
export { BackupManager, backupStamp, classifyBackupFile, parseAvailableMb, RESTORE_PHRASE, DELETE_PHRASE } from './backups/backup-manager.js';
export type {
  BackupCompose,
  BackupKind,
  BackupEntry,
  BackupManagerOptions,
  FullBackupResult,
  RestoreRequest,
  AppFilesRestore,
  CleanRequest,
  CleanResult,
} from './backups/backup-manager.js';

// Health
export { HttpJsonRpcClient, decodeHexQuantity } from './health/rpc-client.js';
export type { JsonRpcClient, RpcResponse, FetchLike } from './health/rpc-client.js';
export { HealthMonitor, checkService, checkAll, deriveSyncStatus, parseSyncing, DEFAULT_PROBE_TIMEOUT_MS } from './health/health-monitor.js';
export type { ServiceCheck, CheckAllResult, CheckAllOptions, CertificateStatus, HealthReport, HealthMonitorOptions } from './health/health-monitor.js';

// Certificates
export { isEligibleDomain, ineligibilityReason, describeIneligibility } from './certificates/domain.js';
export type { IneligibleReason } from './certificates/domain.js';
export {
  CertificateManager,
  classifyCertificate,
  classifyRenewal,
  parseCertificatesOutput,
  daysRemaining,
  CERT_PATH_KEY,
  KEY_PATH_KEY,
} from './certificates/certificate-manager.js';
export type { ObtainResult, RenewResult, AutoRenewalResult, CertificateCompose, CertificateManagerOptions } from './certificates/certificate-manager.js';
export { renderProxyConfig, PLAIN_TEMPLATE, SSL_TEMPLATE } from './certificates/proxy-config.js';
export type { ProxyConfigRequest, ProxyConfigResult } from './certificates/proxy-config.js';

// Chain
export { ChainConfigurator, NETWORKS, CHAIN_ENV_KEYS, rewriteForContainers } from './chain/chain-config.js';
export type { NetworkProfile, ChainConfigureReport, StaticNodesReport, ChainspecReport } from './chain/chain-config.js';
export { fetchEnodes, extractEnodes } from './chain/ethstats-client.js';
export type { EnodeFetcher } from './chain/ethstats-client.js';

// Application
export { AppSetup } from './application/app-setup.js';
export type { StepReport, StepStatus } from './application/app-setup.js';

// Orchestrator
export { InstallOrchestrator, describePhase } from './orchestrator.js';
export type { InstallPhase, InstallReport, PhaseReport, PhaseStatus, PhaseContext, RunOptions as InstallRunOptions } from './orchestrator.js';
export { createInstallPhases } from './install-phases.js';
export type { InstallDeps } from './install-phases.js';

// Deployer
export { Deployer } from './deployer.js';
export type { DeployerOverrides, DeploymentStores, VolumeListing } from './deployer.js';

// Event Bus
export { EventBus, createEventBus, publish } from './event-bus.js';

// Concurrency
export { Semaphore, settleWithLimit, withTimeout } from './concurrency.js';

// Operation Log
export { MemoryStore, FileStore, OperationLog, createStore } from './store.js';
export type { Store, StoreOptions, OperationRecord, OperationStatus } from './store.js';

// Resilience
export { PreflightChecker, computeOverallHealth, parseDfOutput, isPortInUse, DEFAULT_PORTS } from './resilience/preflight.js';
export type { PreflightReport, PreflightOptions } from './resilience/preflight.js';
export {
  DeployError,
  createStructuredError,
  toStructuredError,
  succeed,
  fail,
  failWith,
  ERROR_METADATA,
} from './resilience/error-codes.js';
export type { ErrorCode, ErrorCategory, ErrorSeverity, StructuredError, Outcome } from './resilience/error-codes.js';
