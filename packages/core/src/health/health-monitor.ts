/**
 * @module health/health-monitor
 * Service probes, blockchain sync status and the aggregated health report.
 *
 * Probes fan out with bounded parallelism and each one is capped by a
 * timeout, so one hung service cannot stall or fail the others.
 */

import { z } from 'zod';
import type {
  Bus,
  CertificateRecord,
  CertificateState,
  HealthCheckResult,
  OverallHealth,
  ServiceDescriptor,
  ServiceState,
  SyncStatus,
} from '../types.js';
import { settleWithLimit, withTimeout } from '../concurrency.js';
import { publish } from '../event-bus.js';
import { computeOverallHealth } from '../resilience/preflight.js';
import { decodeHexQuantity, type JsonRpcClient } from './rpc-client.js';

// =====================================================================
// Service checks
// =====================================================================

export interface ServiceCheck {
  name: string;
  state: ServiceState;
  duration: number;
  error?: string;
}

export interface CheckAllResult {
  up: string[];
  down: string[];
  checks: ServiceCheck[];
}

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

/** A probe that throws, answers false or exceeds the timeout is Down. */
export async function checkService(descriptor: ServiceDescriptor, timeoutMs = DEFAULT_PROBE_TIMEOUT_MS): Promise<ServiceCheck> {
  const start = Date.now();
  try {
    const ready = await withTimeout(descriptor.probe(), timeoutMs, () => false);
    return { name: descriptor.name, state: ready ? 'up' : 'down', duration: Date.now() - start };
  } catch (err) {
    return {
      name: descriptor.name,
      state: 'down',
      duration: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export interface CheckAllOptions {
  /** Probes in flight at once (default 4) */
  concurrency?: number;
  probeTimeoutMs?: number;
}

/** Fan out every probe, wait for all, report in descriptor order. */
export async function checkAll(descriptors: ServiceDescriptor[], options: CheckAllOptions = {}): Promise<CheckAllResult> {
  const settled = await settleWithLimit(descriptors, options.concurrency ?? 4, (descriptor) =>
    checkService(descriptor, options.probeTimeoutMs),
  );

  const checks = settled.map((outcome, index): ServiceCheck => {
    const name = descriptors[index]?.name ?? `service-${index}`;
    if (outcome.status === 'fulfilled') return outcome.value;
    return { name, state: 'down', duration: 0, error: String(outcome.reason) };
  });

  return {
    up: checks.filter((c) => c.state === 'up').map((c) => c.name),
    down: checks.filter((c) => c.state === 'down').map((c) => c.name),
    checks,
  };
}

// =====================================================================
// Sync status
// =====================================================================

const SyncingObjectSchema = z.object({
  highestBlock: z.union([z.string(), z.number()]),
  currentBlock: z.union([z.string(), z.number()]).optional(),
});

type SyncingValue = false | { currentBlock: number | null; highestBlock: number | null };

/** `false`, a progress object, or `null` when the value cannot be read. */
export function parseSyncing(result: unknown): SyncingValue | null {
  if (result === false) return false;
  const parsed = SyncingObjectSchema.safeParse(result);
  if (!parsed.success) return null;
  return {
    currentBlock: decodeHexQuantity(parsed.data.currentBlock),
    highestBlock: decodeHexQuantity(parsed.data.highestBlock),
  };
}

/**
 * Derive the node's sync state from `eth_syncing`, `net_peerCount` and
 * `eth_blockNumber`. A field that fails to parse degrades to null; only the
 * loss of both the sync and height answers makes the node unreachable.
 */
export async function deriveSyncStatus(rpc: JsonRpcClient): Promise<SyncStatus> {
  const [syncingResponse, peersResponse, heightResponse] = await Promise.all([
    rpc.call('eth_syncing'),
    rpc.call('net_peerCount'),
    rpc.call('eth_blockNumber'),
  ]);

  const syncing = syncingResponse.ok ? parseSyncing(syncingResponse.result) : null;
  const peerCount = peersResponse.ok ? decodeHexQuantity(peersResponse.result) : null;
  const height = heightResponse.ok ? decodeHexQuantity(heightResponse.result) : null;

  const warnings: string[] = [];
  if (peerCount === 0) warnings.push('isolated node: 0 peers connected');

  if (syncing === false) {
    return {
      currentBlock: height,
      highestBlock: null,
      peerCount,
      state: height !== null ? 'synced' : 'unknown',
      progress: height !== null ? 100 : null,
      warnings,
    };
  }

  if (syncing !== null) {
    const current = syncing.currentBlock ?? height;
    const highest = syncing.highestBlock;
    if (highest === null || highest === 0) {
      warnings.push('sync target height unknown');
      return { currentBlock: current, highestBlock: highest, peerCount, state: 'unknown', progress: null, warnings };
    }
    const progress = current === null ? null : Math.min(100, Math.floor((current * 100) / highest));
    return { currentBlock: current, highestBlock: highest, peerCount, state: 'syncing', progress, warnings };
  }

  return {
    currentBlock: height,
    highestBlock: null,
    peerCount,
    state: height === null ? 'unreachable' : 'unknown',
    progress: null,
    warnings,
  };
}

// =====================================================================
// Health report
// =====================================================================

export interface CertificateStatus {
  state: CertificateState;
  record: CertificateRecord | null;
  daysRemaining: number | null;
  /** Set when the authority store could not be read */
  error?: string;
}

export interface HealthReport {
  overall: OverallHealth;
  services: CheckAllResult;
  sync: SyncStatus | null;
  certificate: CertificateStatus | null;
  checks: HealthCheckResult[];
  timestamp: number;
  duration: number;
}

export interface HealthMonitorOptions {
  services: ServiceDescriptor[];
  rpc?: JsonRpcClient;
  /** Present when the deployment expects a certificate */
  certificateStatus?: () => Promise<CertificateStatus>;
  concurrency?: number;
  probeTimeoutMs?: number;
  bus?: Bus;
}

export class HealthMonitor {
  constructor(private readonly options: HealthMonitorOptions) {}

  checkAll(): Promise<CheckAllResult> {
    return checkAll(this.options.services, {
      concurrency: this.options.concurrency,
      probeTimeoutMs: this.options.probeTimeoutMs,
    });
  }

  async syncStatus(): Promise<SyncStatus | null> {
    return this.options.rpc ? deriveSyncStatus(this.options.rpc) : null;
  }

  async runHealthCheck(): Promise<HealthReport> {
    const start = Date.now();
    const [services, sync, certificate] = await Promise.all([
      this.checkAll(),
      this.syncStatus(),
      this.options.certificateStatus ? this.options.certificateStatus() : Promise.resolve(null),
    ]);

    const checks: HealthCheckResult[] = services.checks.map((check) => ({
      name: `service:${check.name}`,
      status: check.state === 'up' ? 'pass' : 'fail',
      message: check.state === 'up' ? 'Up' : `Down${check.error ? `: ${check.error}` : ''}`,
      duration: check.duration,
    }));
    if (sync) checks.push(scoreSync(sync));
    if (certificate) checks.push(scoreCertificate(certificate));

    const report: HealthReport = {
      overall: computeOverallHealth(checks),
      services,
      sync,
      certificate,
      checks,
      timestamp: Date.now(),
      duration: Date.now() - start,
    };
    publish(this.options.bus, 'health', 'health_report', { overall: report.overall, down: services.down });
    return report;
  }
}

function scoreSync(sync: SyncStatus): HealthCheckResult {
  const details = { ...sync };
  const suffix = sync.warnings.length > 0 ? ` (${sync.warnings.join('; ')})` : '';
  switch (sync.state) {
    case 'synced':
      return {
        name: 'chain_sync',
        status: sync.warnings.length > 0 ? 'warn' : 'pass',
        message: `Synced at block ${sync.currentBlock ?? '?'}${suffix}`,
        details,
        duration: 0,
      };
    case 'syncing':
      return {
        name: 'chain_sync',
        status: 'warn',
        message: `Syncing ${sync.currentBlock ?? '?'}/${sync.highestBlock ?? '?'} (${sync.progress ?? '?'}%)${suffix}`,
        details,
        duration: 0,
      };
    case 'unknown':
      return { name: 'chain_sync', status: 'warn', message: `Sync state unknown${suffix}`, details, duration: 0 };
    case 'unreachable':
      return { name: 'chain_sync', status: 'fail', message: 'Node RPC unreachable', details, duration: 0 };
  }
}

function scoreCertificate(certificate: CertificateStatus): HealthCheckResult {
  const days = certificate.daysRemaining;
  switch (certificate.state) {
    case 'valid':
      return { name: 'certificate', status: 'pass', message: `Valid for ${days ?? '?'} more days`, duration: 0 };
    case 'expiring_soon':
      return { name: 'certificate', status: 'warn', message: `Expires in ${days ?? '?'} days; renew soon`, duration: 0 };
    case 'expired':
      return { name: 'certificate', status: 'fail', message: 'Certificate has expired', duration: 0 };
    case 'absent':
      return {
        name: 'certificate',
        status: 'warn',
        message: certificate.error ? `Certificate status unavailable: ${certificate.error}` : 'No certificate issued',
        duration: 0,
      };
  }
}
