/**
 * @module resilience/preflight
 * Dependency verification run before anything is built or started.
 *
 * Validates Docker daemon connectivity, the compose plugin, the compose file,
 * disk space and host ports, returning a structured {@link PreflightReport}.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { createServer } from 'node:net';
import { platform as osPlatform } from 'node:os';
import type { Bus, CheckStatus, Deployment, HealthCheckResult, OverallHealth } from '../types.js';
import type { CommandExecutor } from '../command-executor.js';
import { succeeded } from '../command-executor.js';
import { publish } from '../event-bus.js';

export interface PreflightReport {
  overall: OverallHealth;
  checks: HealthCheckResult[];
  timestamp: number;
  duration: number;
}

export interface PreflightOptions {
  bus?: Bus;
  /** Below this many GB free the check fails (default 20) */
  minDiskGB?: number;
  /** Below this many GB free the check warns (default 50) */
  recommendedDiskGB?: number;
  ports?: number[];
  /** Override the port probe (tests) */
  isPortInUse?: (port: number) => Promise<boolean>;
}

export const DEFAULT_PORTS = [80, 443, 5432, 6379, 8545];

// =====================================================================
// PreflightChecker
// =====================================================================

export class PreflightChecker {
  private readonly isPortInUse: (port: number) => Promise<boolean>;

  constructor(
    private readonly executor: CommandExecutor,
    private readonly options: PreflightOptions = {},
  ) {
    this.isPortInUse = options.isPortInUse ?? isPortInUse;
  }

  /** `docker info` with a 5s timeout. */
  async checkDockerDaemon(): Promise<HealthCheckResult> {
    const start = Date.now();
    const result = await this.executor.run('docker', ['info'], { timeoutMs: 5_000 });
    if (succeeded(result)) {
      return { name: 'docker_daemon', status: 'pass', message: 'Docker daemon is reachable', details: {}, duration: Date.now() - start };
    }
    return {
      name: 'docker_daemon',
      status: 'fail',
      message: 'Docker daemon is not reachable',
      details: { error: result.stderr.trim(), errorCode: 'DOCKER_UNAVAILABLE' },
      duration: Date.now() - start,
    };
  }

  async checkComposePlugin(): Promise<HealthCheckResult> {
    const start = Date.now();
    const result = await this.executor.run('docker', ['compose', 'version', '--short'], { timeoutMs: 5_000 });
    if (succeeded(result)) {
      return {
        name: 'compose_plugin',
        status: 'pass',
        message: `docker compose ${result.stdout.trim()}`,
        details: { version: result.stdout.trim() },
        duration: Date.now() - start,
      };
    }
    return {
      name: 'compose_plugin',
      status: 'fail',
      message: 'docker compose plugin is not installed',
      details: { error: result.stderr.trim(), errorCode: 'DOCKER_UNAVAILABLE' },
      duration: Date.now() - start,
    };
  }

  async checkComposeFile(deployment: Deployment): Promise<HealthCheckResult> {
    const start = Date.now();
    const file = path.resolve(deployment.projectDir, deployment.composeFile);
    try {
      await fs.access(file);
      return { name: 'compose_file', status: 'pass', message: `Found ${file}`, details: { file }, duration: Date.now() - start };
    } catch {
      return {
        name: 'compose_file',
        status: 'fail',
        message: `Compose file not found: ${file}`,
        details: { file, errorCode: 'CONFIGURATION_ERROR' },
        duration: Date.now() - start,
      };
    }
  }

  /**
   * Parses `df` output for the project filesystem. Uses `-BG` on Linux
   * and `-g` on macOS for gigabyte units.
   */
  async checkDiskSpace(directory: string): Promise<HealthCheckResult> {
    const start = Date.now();
    const minGB = this.options.minDiskGB ?? 20;
    const recommendedGB = this.options.recommendedDiskGB ?? 50;
    const isMac = osPlatform() === 'darwin';

    const result = await this.executor.run('df', [isMac ? '-g' : '-BG', directory], { timeoutMs: 5_000 });
    const availableGB = succeeded(result) ? parseDfOutput(result.stdout) : null;

    if (availableGB === null) {
      return {
        name: 'disk_space',
        status: 'warn',
        message: 'Could not check disk space',
        details: { rawOutput: result.stdout.trim(), error: result.stderr.trim() },
        duration: Date.now() - start,
      };
    }

    let status: CheckStatus;
    if (availableGB < minGB) {
      status = 'fail';
    } else if (availableGB < recommendedGB) {
      status = 'warn';
    } else {
      status = 'pass';
    }

    return {
      name: 'disk_space',
      status,
      message: `${availableGB}GB available (minimum ${minGB}GB, recommended ${recommendedGB}GB)`,
      details: { availableGB, minGB, recommendedGB, ...(status === 'pass' ? {} : { errorCode: 'DISK_SPACE_LOW' }) },
      duration: Date.now() - start,
    };
  }

  /** Ports already bound on the host only warn: the stack may be running. */
  async checkPorts(): Promise<HealthCheckResult> {
    const start = Date.now();
    const ports = this.options.ports ?? DEFAULT_PORTS;
    const busy: number[] = [];
    for (const port of ports) {
      if (await this.isPortInUse(port)) busy.push(port);
    }
    return {
      name: 'host_ports',
      status: busy.length > 0 ? 'warn' : 'pass',
      message: busy.length > 0 ? `Ports already in use: ${busy.join(', ')}` : 'All required ports are free',
      details: { ports, busy, ...(busy.length > 0 ? { errorCode: 'PORT_CONFLICT' } : {}) },
      duration: Date.now() - start,
    };
  }

  /**
   * Run every check and aggregate.
   *
   * Overall status: `unhealthy` if any check fails, `degraded` if any warns,
   * `healthy` otherwise.
   */
  async runAll(deployment: Deployment): Promise<PreflightReport> {
    const start = Date.now();
    publish(this.options.bus, 'install', 'preflight_start', { project: deployment.projectName });

    const checks: HealthCheckResult[] = [];
    const record = (result: HealthCheckResult): void => {
      checks.push(result);
      publish(this.options.bus, 'install', 'preflight_check', {
        name: result.name,
        status: result.status,
        message: result.message,
      });
    };

    const docker = await this.checkDockerDaemon();
    record(docker);
    if (docker.status === 'pass') {
      record(await this.checkComposePlugin());
    }
    record(await this.checkComposeFile(deployment));
    record(await this.checkDiskSpace(deployment.projectDir));
    record(await this.checkPorts());

    const overall = computeOverallHealth(checks);
    const duration = Date.now() - start;
    publish(this.options.bus, 'install', 'preflight_end', { overall, duration });

    return { overall, checks, timestamp: Date.now(), duration };
  }
}

// =====================================================================
// Helpers
// =====================================================================

/** Compute overall health from individual check results. */
export function computeOverallHealth(checks: HealthCheckResult[]): OverallHealth {
  if (checks.some(c => c.status === 'fail')) return 'unhealthy';
  if (checks.some(c => c.status === 'warn')) return 'degraded';
  return 'healthy';
}

/**
 * Available GB from `df` output: the 4th column of the second line
 * (Filesystem  Size  Used  Avail  Use%  Mounted).
 */
export function parseDfOutput(output: string): number | null {
  const lines = output.trim().split('\n');
  if (lines.length < 2) return null;

  const parts = (lines[1] ?? '').trim().split(/\s+/);
  if (parts.length < 4) return null;

  const parsed = parseInt(parts[3] ?? '', 10);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Bind a temporary server on the port; `EADDRINUSE` means the port is taken.
 */
export async function isPortInUse(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();

    server.once('error', (err: NodeJS.ErrnoException) => {
      resolve(err.code === 'EADDRINUSE');
    });

    server.listen(port, '0.0.0.0', () => {
      server.close(() => resolve(false));
    });
  });
}
