// ==================== Deployment ====================

/** Known chain targets a deployment can join. */
export const NETWORK_TARGETS = ['veriscope_testnet', 'fed_testnet', 'fed_mainnet'] as const;

export type NetworkTarget = (typeof NETWORK_TARGETS)[number];

export type DeploymentMode = 'development' | 'production';

/** One target environment, built once at startup and never mutated. */
export interface Deployment {
  /** Public host name, used for certificate issuance */
  readonly serviceHost: string;
  /** Organisation label */
  readonly commonName: string;
  readonly networkTarget: NetworkTarget;
  readonly mode: DeploymentMode;
  /** Compose project name, prefix of every volume */
  readonly projectName: string;
  /** Compose file path, relative to the project directory */
  readonly composeFile: string;
  /** Absolute project directory */
  readonly projectDir: string;
}

// ==================== Services ====================

/** Side-effect-free readiness check. */
export type Probe = () => Promise<boolean>;

export interface ServiceDescriptor {
  name: string;
  probe: Probe;
  /** Services that must be ready first */
  dependsOn: string[];
  /** Readiness timeout override in seconds */
  timeoutSeconds?: number;
}

export type ServiceState = 'up' | 'down';

// ==================== Credentials ====================

export type StrengthClass = 'weak' | 'acceptable' | 'strong';

/** A place a credential value is mirrored to. */
export interface CredentialLocation {
  store: CredentialStore;
  /** Key inside this store; defaults to the credential key */
  key?: string;
}

export interface Credential {
  key: string;
  value: string;
  scope: CredentialLocation[];
}

/** Key/value configuration file abstraction. */
export interface CredentialStore {
  /** Human-readable location, e.g. the file path */
  readonly location: string;
  exists(): Promise<boolean>;
  read(key: string): Promise<string | undefined>;
  readAll(): Promise<Map<string, string>>;
  /** Upsert a key, preserving every unrelated entry */
  write(key: string, value: string): Promise<void>;
}

// ==================== Resources ====================

export type ResourceClassification = 'resettable' | 'preserved';

export interface PersistentResource {
  name: string;
  classification: ResourceClassification;
  /** Owning service */
  owner: string;
}

// ==================== Certificates ====================

export interface CertificateRecord {
  domain: string;
  certPath: string;
  keyPath: string;
  expiresAt: Date;
}

export type CertificateState = 'absent' | 'valid' | 'expiring_soon' | 'expired';

// ==================== Chain ====================

export type SyncState = 'unknown' | 'syncing' | 'synced' | 'unreachable';

/** Recomputed on every health check, never persisted. */
export interface SyncStatus {
  currentBlock: number | null;
  highestBlock: number | null;
  peerCount: number | null;
  state: SyncState;
  /** Integer percentage while syncing, null when unknown */
  progress: number | null;
  warnings: string[];
}

// ==================== Time ====================

/** Injectable time source so polling loops can run under a fake scheduler. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

// ==================== Events ====================

export interface BusMessage {
  event: string;
  data: unknown;
  timestamp?: number;
}

export interface Bus {
  emit(channel: string, message: BusMessage): void;
  subscribe(channel: string, handler: (msg: BusMessage) => void): () => void;
}

export type BusChannel = 'install' | 'credentials' | 'resources' | 'health' | 'certificates' | 'chain' | 'backups';

// ==================== Health ====================

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface HealthCheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  details?: Record<string, unknown>;
  /** Check duration in ms */
  duration: number;
}

export type OverallHealth = 'healthy' | 'degraded' | 'unhealthy';
