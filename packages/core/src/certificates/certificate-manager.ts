/**
 * @module certificates/certificate-manager
 * Obtain, renew and inspect the public certificate of the service host.
 *
 * The authority client runs in a throwaway `certbot` container using the
 * webroot challenge, so the reverse proxy must be up before any request.
 * Certificate records are always re-read from `certbot certificates`.
 */

import type { Bus, CertificateRecord, CertificateState, Clock, CredentialStore, DeploymentMode, Probe } from '../types.js';
import { systemClock } from '../types.js';
import type { CommandResult } from '../command-executor.js';
import { describeResult, succeeded } from '../command-executor.js';
import type { ExecOptions, RunOnceOptions, UpOptions } from '../compose-engine.js';
import { publish } from '../event-bus.js';
import { awaitReady } from '../readiness-gate.js';
import { createStructuredError, fail, succeed, type Outcome, type StructuredError } from '../resilience/error-codes.js';
import { SERVICES } from '../topology.js';
import type { CertificateStatus } from '../health/health-monitor.js';
import { describeIneligibility, ineligibilityReason } from './domain.js';

// =====================================================================
// Types
// =====================================================================

/** The compose operations certificate handling needs. */
export interface CertificateCompose {
  up(services: string[], options?: UpOptions): Promise<Outcome>;
  isRunning(service: string): Promise<boolean>;
  exec(service: string, argv: string[], options?: ExecOptions): Promise<CommandResult>;
  runOnce(service: string, argv: string[], options?: RunOnceOptions): Promise<CommandResult>;
  removeContainers(nameFilter: string): Promise<string[]>;
  restart(services: string[]): Promise<Outcome>;
}

export type ObtainResult =
  | { status: 'obtained'; domain: string; certPath: string; keyPath: string }
  | { status: 'rejected'; domain: string; reason: string }
  | { status: 'failed'; domain: string; error: StructuredError };

export type RenewResult =
  | { status: 'renewed'; reloaded: boolean; warnings: string[] }
  | { status: 'not_due' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: StructuredError };

export type AutoRenewalResult =
  | { status: 'started' | 'restarted' | 'already_running' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: StructuredError };

export interface CertificateManagerOptions {
  compose: CertificateCompose;
  /** Root env file receiving SSL_CERT_PATH / SSL_KEY_PATH */
  rootEnv: CredentialStore;
  webroot?: string;
  liveDir?: string;
  expiryThresholdDays?: number;
  /** Development deployments skip renewal and auto-renewal */
  mode?: DeploymentMode;
  /** Proxy readiness before a challenge; defaults to "proxy container running" */
  proxyProbe?: Probe;
  proxyWait?: { intervalSeconds: number; timeoutSeconds: number };
  clock?: Clock;
  bus?: Bus;
}

export const CERT_PATH_KEY = 'SSL_CERT_PATH';
export const KEY_PATH_KEY = 'SSL_KEY_PATH';
export const DEFAULT_EXPIRY_THRESHOLD_DAYS = 30;

const CERTBOT_CONTAINER_FILTER = 'certbot-run';
const CERTBOT_TIMEOUT_MS = 5 * 60_000;
const DAY_MS = 86_400_000;

// =====================================================================
// Parsing & classification
// =====================================================================

const NOT_DUE_MARKER = /not (yet )?due for renewal|No renewals were attempted/i;
const RENEWED_MARKER = /Congratulations|renewals succeeded|successfully renewed/i;

/** Decide a renewal outcome from the certbot exit and output. */
export function classifyRenewal(result: CommandResult): 'renewed' | 'not_due' | 'failed' {
  if (!succeeded(result)) return 'failed';
  const output = `${result.stdout}\n${result.stderr}`;
  // A run over several lineages can report both; any renewal needs a reload.
  if (RENEWED_MARKER.test(output)) return 'renewed';
  if (NOT_DUE_MARKER.test(output)) return 'not_due';
  return 'not_due';
}

/**
 * Records from `certbot certificates` output. Blocks without a readable
 * expiry date are dropped.
 */
export function parseCertificatesOutput(stdout: string): CertificateRecord[] {
  const records: CertificateRecord[] = [];
  const blocks = stdout.split(/^\s*Certificate Name:/m).slice(1);

  for (const block of blocks) {
    const domain = block.split('\n')[0]?.trim() ?? '';
    const expiry = /Expiry Date:\s*(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2}:\d{2}))?([+-]\d{2}:\d{2}|Z)?/.exec(block);
    const certPath = /Certificate Path:\s*(\S+)/.exec(block)?.[1];
    const keyPath = /Private Key Path:\s*(\S+)/.exec(block)?.[1];
    if (domain.length === 0 || !expiry) continue;

    const expiresAt = new Date(`${expiry[1]}T${expiry[2] ?? '00:00:00'}${expiry[3] ?? 'Z'}`);
    if (Number.isNaN(expiresAt.getTime())) continue;

    records.push({
      domain,
      certPath: certPath ?? `/etc/letsencrypt/live/${domain}/fullchain.pem`,
      keyPath: keyPath ?? `/etc/letsencrypt/live/${domain}/privkey.pem`,
      expiresAt,
    });
  }
  return records;
}

/** Whole days until expiry, negative once expired. */
export function daysRemaining(record: CertificateRecord, now: number): number {
  return Math.floor((record.expiresAt.getTime() - now) / DAY_MS);
}

export function classifyCertificate(
  record: CertificateRecord | null,
  now: number,
  thresholdDays = DEFAULT_EXPIRY_THRESHOLD_DAYS,
): CertificateState {
  if (!record) return 'absent';
  const days = daysRemaining(record, now);
  if (days < 0) return 'expired';
  if (days < thresholdDays) return 'expiring_soon';
  return 'valid';
}

// =====================================================================
// CertificateManager
// =====================================================================

export class CertificateManager {
  private readonly webroot: string;
  private readonly liveDir: string;
  private readonly clock: Clock;

  constructor(private readonly options: CertificateManagerOptions) {
    this.webroot = options.webroot ?? '/var/www/certbot';
    this.liveDir = options.liveDir ?? '/etc/letsencrypt/live';
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Request a certificate for `domain`.
   *
   * `rejected` means the domain can never be issued one and nothing was
   * contacted; `failed` covers the proxy, the authority and the env write.
   */
  async obtain(domain: string): Promise<ObtainResult> {
    const reason = ineligibilityReason(domain);
    if (reason !== null) {
      const message = `${domain || '(empty)'}: ${describeIneligibility(reason)}`;
      publish(this.options.bus, 'certificates', 'certificate_rejected', { domain, reason });
      return { status: 'rejected', domain, reason: message };
    }

    const { compose } = this.options;
    publish(this.options.bus, 'certificates', 'certificate_obtain_start', { domain });
    await compose.removeContainers(CERTBOT_CONTAINER_FILTER);

    const proxy = await this.ensureProxy(true);
    if (!proxy.ok) return { status: 'failed', domain, error: proxy.error };

    const result = await compose.runOnce(
      SERVICES.certbot,
      [
        'certonly',
        '--webroot',
        `--webroot-path=${this.webroot}`,
        '--non-interactive',
        '--agree-tos',
        '--register-unsafely-without-email',
        '--preferred-challenges',
        'http',
        '-d',
        domain,
      ],
      { entrypoint: 'certbot', timeoutMs: CERTBOT_TIMEOUT_MS },
    );
    await compose.removeContainers(CERTBOT_CONTAINER_FILTER);

    if (!succeeded(result)) {
      const error = createStructuredError(
        'EXTERNAL_TOOL_FAILURE',
        `Certificate request for ${domain} failed: ${describeResult('certbot', ['certonly'], result)}`,
        { domain, stderr: result.stderr },
      );
      publish(this.options.bus, 'certificates', 'certificate_failed', { domain, code: error.code });
      return { status: 'failed', domain, error };
    }

    const certPath = `${this.liveDir}/${domain}/fullchain.pem`;
    const keyPath = `${this.liveDir}/${domain}/privkey.pem`;
    try {
      await this.options.rootEnv.write(CERT_PATH_KEY, certPath);
      await this.options.rootEnv.write(KEY_PATH_KEY, keyPath);
    } catch (err) {
      const error = createStructuredError(
        'EXTERNAL_TOOL_FAILURE',
        `Certificate issued but ${this.options.rootEnv.location} could not be updated: ${err instanceof Error ? err.message : String(err)}`,
        { domain },
      );
      return { status: 'failed', domain, error };
    }

    publish(this.options.bus, 'certificates', 'certificate_obtained', { domain, certPath });
    return { status: 'obtained', domain, certPath, keyPath };
  }

  /** Renew due certificates; the proxy is reloaded only when one was renewed. */
  async renew(): Promise<RenewResult> {
    if (this.options.mode === 'development') {
      publish(this.options.bus, 'certificates', 'renewal_skipped', { mode: 'development' });
      return { status: 'skipped', reason: 'Development mode: certificates are not renewed' };
    }

    const { compose } = this.options;
    await compose.removeContainers(CERTBOT_CONTAINER_FILTER);

    const proxy = await this.ensureProxy(false);
    if (!proxy.ok) return { status: 'failed', error: proxy.error };

    const result = await compose.runOnce(SERVICES.certbot, ['renew'], { entrypoint: 'certbot', timeoutMs: CERTBOT_TIMEOUT_MS });
    await compose.removeContainers(CERTBOT_CONTAINER_FILTER);

    const outcome = classifyRenewal(result);
    if (outcome === 'failed') {
      const error = createStructuredError(
        'EXTERNAL_TOOL_FAILURE',
        `Certificate renewal failed: ${describeResult('certbot', ['renew'], result)}`,
        { stderr: result.stderr },
      );
      publish(this.options.bus, 'certificates', 'certificate_failed', { code: error.code });
      return { status: 'failed', error };
    }
    if (outcome === 'not_due') {
      publish(this.options.bus, 'certificates', 'renewal_not_due', {});
      return { status: 'not_due' };
    }

    const reload = await compose.exec(SERVICES.proxy, ['nginx', '-s', 'reload'], { timeoutMs: 30_000 });
    const warnings = succeeded(reload)
      ? []
      : [`Proxy reload failed (${describeResult('nginx', ['-s', 'reload'], reload)}); restart ${SERVICES.proxy} manually`];
    publish(this.options.bus, 'certificates', 'certificate_renewed', { reloaded: succeeded(reload) });
    return { status: 'renewed', reloaded: succeeded(reload), warnings };
  }

  /**
   * Run the long-lived certbot service, which checks for renewals every 12
   * hours. A running one is left alone unless `restart` is set. Development
   * deployments are skipped unless `force` is set.
   */
  async enableAutoRenewal(options: { force?: boolean; restart?: boolean } = {}): Promise<AutoRenewalResult> {
    if (this.options.mode === 'development' && !options.force) {
      return { status: 'skipped', reason: 'Development mode: auto-renewal is not enabled (use force to override)' };
    }

    const { compose } = this.options;
    if (await compose.isRunning(SERVICES.certbot)) {
      if (!options.restart) return { status: 'already_running' };
      const restarted = await compose.restart([SERVICES.certbot]);
      if (!restarted.ok) return { status: 'failed', error: restarted.error };
      publish(this.options.bus, 'certificates', 'auto_renewal_enabled', { restarted: true });
      return { status: 'restarted' };
    }

    const started = await compose.up([SERVICES.certbot]);
    if (!started.ok) {
      return {
        status: 'failed',
        error: createStructuredError('DEPENDENCY_UNREADY', `Certbot service could not be started: ${started.error.message}`, {
          service: SERVICES.certbot,
        }),
      };
    }
    publish(this.options.bus, 'certificates', 'auto_renewal_enabled', { restarted: false });
    return { status: 'started' };
  }

  /** Every certificate the authority store holds. */
  async list(): Promise<Outcome<CertificateRecord[]>> {
    const result = await this.options.compose.runOnce(SERVICES.certbot, ['certificates'], {
      entrypoint: 'certbot',
      noDeps: true,
      timeoutMs: 60_000,
    });
    if (!succeeded(result)) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot list certificates: ${describeResult('certbot', ['certificates'], result)}`);
    }
    return succeed(parseCertificatesOutput(result.stdout));
  }

  /** Current state of the certificate for `domain`, re-derived on each call. */
  async status(domain: string): Promise<CertificateStatus> {
    const listed = await this.list();
    if (!listed.ok) {
      return { state: 'absent', record: null, daysRemaining: null, error: listed.error.message };
    }
    const record = listed.value.find((r) => r.domain === domain) ?? null;
    const now = this.clock.now();
    return {
      state: classifyCertificate(record, now, this.options.expiryThresholdDays),
      record,
      daysRemaining: record ? daysRemaining(record, now) : null,
    };
  }

  private async ensureProxy(noDeps: boolean): Promise<Outcome> {
    const { compose } = this.options;
    const started = await compose.up([SERVICES.proxy], { noDeps });
    if (!started.ok) {
      return fail('DEPENDENCY_UNREADY', `Reverse proxy could not be started: ${started.error.message}`, {
        service: SERVICES.proxy,
      });
    }

    const probe = this.options.proxyProbe ?? (() => compose.isRunning(SERVICES.proxy));
    const wait = this.options.proxyWait ?? { intervalSeconds: 2, timeoutSeconds: 30 };
    const ready = await awaitReady(probe, { ...wait, clock: this.clock });
    if (ready.status === 'timed_out') {
      return fail('DEPENDENCY_UNREADY', `Reverse proxy not ready after ${wait.timeoutSeconds}s`, {
        service: SERVICES.proxy,
        attempts: ready.attempts,
      });
    }
    return succeed(undefined);
  }
}
