/**
 * Unit tests for PreflightChecker with a scripted executor and a stubbed
 * port probe.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PreflightChecker, computeOverallHealth, parseDfOutput } from '../../../src/resilience/preflight.js';
import type { Deployment, HealthCheckResult } from '../../../src/types.js';
import { FakeExecutor, exited } from '../fakes.js';

const DF = (availableGB: number) =>
  `Filesystem     1G-blocks  Used Available Use% Mounted on\n/dev/sda1          200G   50G      ${availableGB}G  25% /\n`;

describe('parseDfOutput', () => {
  it('reads the available column', () => {
    expect(parseDfOutput(DF(120))).toBe(120);
  });

  it('returns null for unexpected output', () => {
    expect(parseDfOutput('')).toBeNull();
    expect(parseDfOutput('Filesystem\n/dev/sda1 1')).toBeNull();
  });
});

describe('computeOverallHealth', () => {
  const check = (status: HealthCheckResult['status']): HealthCheckResult => ({
    name: 'x',
    status,
    message: '',
    details: {},
    duration: 0,
  });

  it('takes the worst status', () => {
    expect(computeOverallHealth([check('pass'), check('pass')])).toBe('healthy');
    expect(computeOverallHealth([check('pass'), check('warn')])).toBe('degraded');
    expect(computeOverallHealth([check('warn'), check('fail')])).toBe('unhealthy');
  });
});

describe('PreflightChecker', () => {
  let projectDir: string;
  let deployment: Deployment;

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'berth-preflight-'));
    await fs.writeFile(path.join(projectDir, 'docker-compose.yml'), 'services: {}\n');
    deployment = {
      serviceHost: 'anchor.example.org',
      commonName: 'example-org',
      networkTarget: 'fed_testnet',
      mode: 'production',
      projectName: 'anchor',
      composeFile: 'docker-compose.yml',
      projectDir,
    };
  });

  afterEach(async () => {
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  function executor(availableGB = 120): FakeExecutor {
    return new FakeExecutor()
      .on('docker compose version', exited(0, 'v2.29.1\n'))
      .on(/^df /, exited(0, DF(availableGB)));
  }

  it('is healthy when everything passes', async () => {
    const checker = new PreflightChecker(executor(), { isPortInUse: async () => false });
    const report = await checker.runAll(deployment);

    expect(report.overall).toBe('healthy');
    expect(report.checks.map((c) => [c.name, c.status])).toEqual([
      ['docker_daemon', 'pass'],
      ['compose_plugin', 'pass'],
      ['compose_file', 'pass'],
      ['disk_space', 'pass'],
      ['host_ports', 'pass'],
    ]);
    expect(report.checks[1]?.message).toBe('docker compose v2.29.1');
  });

  it('skips the compose plugin check when the daemon is down', async () => {
    const exec = executor().on('docker info', exited(1, '', 'Cannot connect to the Docker daemon'));
    const report = await new PreflightChecker(exec, { isPortInUse: async () => false }).runAll(deployment);

    expect(report.overall).toBe('unhealthy');
    expect(report.checks.map((c) => c.name)).not.toContain('compose_plugin');
    expect(report.checks[0]?.details).toEqual({ error: 'Cannot connect to the Docker daemon', errorCode: 'DOCKER_UNAVAILABLE' });
  });

  it('fails for a missing compose file', async () => {
    const checker = new PreflightChecker(executor(), { isPortInUse: async () => false });
    const result = await checker.checkComposeFile({ ...deployment, composeFile: 'missing.yml' });
    expect(result.status).toBe('fail');
    expect(result.message).toBe(`Compose file not found: ${path.join(projectDir, 'missing.yml')}`);
  });

  it('grades disk space against the thresholds', async () => {
    const low = await new PreflightChecker(executor(10)).checkDiskSpace(projectDir);
    const tight = await new PreflightChecker(executor(30)).checkDiskSpace(projectDir);
    expect(low.status).toBe('fail');
    expect(tight.status).toBe('warn');
    expect(tight.message).toBe('30GB available (minimum 20GB, recommended 50GB)');
  });

  it('warns about busy ports', async () => {
    const checker = new PreflightChecker(executor(), { ports: [80, 443, 8545], isPortInUse: async (port) => port !== 443 });
    const result = await checker.checkPorts();
    expect(result.status).toBe('warn');
    expect(result.message).toBe('Ports already in use: 80, 8545');
    expect(result.details).toEqual({ ports: [80, 443, 8545], busy: [80, 8545], errorCode: 'PORT_CONFLICT' });
  });
});
