/**
 * Full install of a fed_testnet deployment through Deployer, with every
 * external collaborator replaced: docker by a scripted executor, env files
 * by in-memory stores, the node RPC by canned answers and time by a
 * virtual clock.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Deployer } from '../../src/deployer.js';
import { MemoryCredentialStore } from '../../src/credential-store.js';
import { MemoryStore } from '../../src/store.js';
import { succeed } from '../../src/resilience/error-codes.js';
import { FakeClock, FakeExecutor, FakeRpcClient, exited } from './fakes.js';

const NOW = Date.UTC(2026, 0, 1);
const ACCOUNT = `0x${'1'.repeat(40)}`;
const PRIVATE_KEY = 'ab'.repeat(32);
const COMPOSE = 'docker compose -f docker-compose.yml -p anchor';

const RUNNING = ['postgres', 'redis', 'nethermind', 'app', 'ta-node', 'nginx'].join('\n');
const CERTIFICATES = [
  'Found the following certs:',
  '  Certificate Name: anchor.example.org',
  '    Expiry Date: 2026-03-02 10:15:00+00:00 (VALID: 60 days)',
  '    Certificate Path: /etc/letsencrypt/live/anchor.example.org/fullchain.pem',
  '    Private Key Path: /etc/letsencrypt/live/anchor.example.org/privkey.pem',
].join('\n');
const DF = 'Filesystem 1G-blocks Used Available Use% Mounted on\n/dev/sda1 500G 100G 400G 20% /\n';

const BERTH_YAML = `
project:
  name: anchor
deployment:
  serviceHost: anchor.example.org
  commonName: example-org
  networkTarget: fed_testnet
readiness:
  interval: 1s
  timeout: 5s
  allServicesTimeout: 10s
chain:
  statsSecret: test-secret
`;

function healthyExecutor(): FakeExecutor {
  return new FakeExecutor()
    .on('ps --services --status running', exited(0, RUNNING))
    .on('redis-cli ping', exited(0, 'PONG\n'))
    .on('certbot certificates', exited(0, CERTIFICATES))
    .on(/^df /, exited(0, DF));
}

describe('fed_testnet install', () => {
  let projectDir: string;
  let executor: FakeExecutor;
  let root: MemoryCredentialStore;
  let node: MemoryCredentialStore;
  let dashboard: MemoryCredentialStore;
  let operations: MemoryStore;
  let deployer: Deployer;

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'berth-install-'));
    await fs.writeFile(path.join(projectDir, 'berth.yaml'), BERTH_YAML);
    await fs.writeFile(path.join(projectDir, 'docker-compose.yml'), 'services: {}\n');
    await fs.mkdir(path.join(projectDir, 'templates'));
    await fs.writeFile(path.join(projectDir, 'templates', 'nginx.conf'), 'server_name {{config.serviceHost}};\n');
    await fs.writeFile(
      path.join(projectDir, 'templates', 'nginx-ssl.conf'),
      'server_name {{config.serviceHost}};\nssl_certificate {{config.certPath}};\n',
    );
    await fs.mkdir(path.join(projectDir, 'chains', 'fed_testnet', 'artifacts'), { recursive: true });
    await fs.writeFile(
      path.join(projectDir, 'chains', 'fed_testnet', 'ta-node-env'),
      'HTTP=http://localhost:8545\nLOG_LEVEL=info\nWEBHOOK_CLIENT_SECRET=\n',
    );

    executor = healthyExecutor();
    root = new MemoryCredentialStore('memory:.env', { POSTGRES_PASSWORD: 'secret' });
    node = new MemoryCredentialStore('memory:veriscope_ta_node/.env', {});
    dashboard = new MemoryCredentialStore('memory:veriscope_ta_dashboard/.env', { WEBHOOK_CLIENT_SECRET: 'changeme' });
    operations = new MemoryStore();

    deployer = await Deployer.fromConfig(path.join(projectDir, 'berth.yaml'), {
      executor,
      stores: { root, node, dashboard },
      rpc: new FakeRpcClient({
        web3_clientVersion: { ok: true, result: 'Nethermind/v1.25.4' },
        eth_syncing: { ok: true, result: false },
        net_peerCount: { ok: true, result: '0x5' },
        eth_blockNumber: { ok: true, result: '0x64' },
        admin_nodeInfo: { ok: true, result: { enode: 'enode://ffff@203.0.113.7:30303' } },
      }),
      clock: new FakeClock(NOW),
      operationStore: operations,
      keypairSource: async () => succeed({ address: ACCOUNT, privateKey: PRIVATE_KEY }),
      fetchEnodes: async () => succeed([]),
      isPortInUse: async () => false,
    });
  });

  afterEach(async () => {
    await deployer.close();
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  it('derives a production deployment from the host', () => {
    expect(deployer.deployment).toMatchObject({
      serviceHost: 'anchor.example.org',
      networkTarget: 'fed_testnet',
      mode: 'production',
      projectName: 'anchor',
      projectDir,
    });
  });

  it('completes all thirteen phases', async () => {
    const report = await deployer.install({ interactive: false });

    expect(report.status).toBe('completed');
    expect(report.phases.map((p) => p.ordinal)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
    expect(report.phases.every((p) => p.status === 'ok' || p.status === 'warning')).toBe(true);
    expect(report.phases[12]?.warnings).toEqual([
      'Admin user not created; run `berth app create-admin` (php artisan createuser:admin)',
    ]);
    expect((await operations.getOperations())[0]).toMatchObject({ operation: 'install', status: 'success' });
  });

  it('replaces the weak database password with a strong one in both env files', async () => {
    await deployer.install({ interactive: false });

    const password = await root.read('POSTGRES_PASSWORD');
    expect(password).not.toBe('secret');
    expect(password?.length).toBeGreaterThanOrEqual(20);
    expect(await dashboard.read('DB_PASSWORD')).toBe(password);
    expect(await dashboard.read('DB_USERNAME')).toBe('trustanchor');
  });

  it('leaves node and dashboard with the identical webhook secret', async () => {
    await deployer.install({ interactive: false });

    const fromNode = await node.read('WEBHOOK_CLIENT_SECRET');
    expect(fromNode).toMatch(/^[0-9a-f]{64}$/);
    expect(await dashboard.read('WEBHOOK_CLIENT_SECRET')).toBe(fromNode);
  });

  it('removes each resettable volume exactly once and never touches chain data', async () => {
    await deployer.install({ interactive: false });

    expect(executor.linesMatching('volume rm')).toEqual([
      'docker volume rm anchor_postgres_data',
      'docker volume rm anchor_redis_data',
      'docker volume rm anchor_app_data',
      'docker volume rm anchor_artifacts',
    ]);
    expect(executor.linesMatching('nethermind_data')).toEqual([]);
  });

  it('starts services only after the reset', async () => {
    await deployer.install({ interactive: false });

    const lines = executor.calls.map((c) => c.line);
    const lastRemoval = lines.lastIndexOf('docker volume rm anchor_artifacts');
    const down = lines.indexOf(`${COMPOSE} down`);
    const up = lines.indexOf(`${COMPOSE} up -d`);
    expect(lines.indexOf(`${COMPOSE} build`)).toBeLessThan(down);
    expect(down).toBeLessThan(lastRemoval);
    expect(lastRemoval).toBeLessThan(up);
  });

  it('writes identity, chain settings, certificate paths and the TLS proxy config', async () => {
    await deployer.install({ interactive: false });

    expect(node.snapshot()).toMatchObject({
      TRUST_ANCHOR_ACCOUNT: ACCOUNT,
      TRUST_ANCHOR_PK: PRIVATE_KEY,
      TRUST_ANCHOR_PREFNAME: 'example-org',
      HTTP: 'http://nethermind:8545',
      LOG_LEVEL: 'info',
    });
    expect(root.snapshot()).toMatchObject({
      SSL_CERT_PATH: '/etc/letsencrypt/live/anchor.example.org/fullchain.pem',
      CHAIN_STATS_SECRET: 'test-secret',
      CHAIN_STATS_ENABLED: 'true',
    });
    expect(await fs.readFile(path.join(projectDir, 'nginx', 'nginx.conf'), 'utf-8')).toBe(
      'server_name anchor.example.org;\nssl_certificate /etc/letsencrypt/live/anchor.example.org/fullchain.pem;\n',
    );
  });

  it('reports every service Up afterwards', async () => {
    await deployer.install({ interactive: false });
    const health = await deployer.healthCheck();

    expect(health.services.checks.map((c) => [c.name, c.state])).toEqual([
      ['postgres', 'up'],
      ['redis', 'up'],
      ['nethermind', 'up'],
      ['app', 'up'],
      ['ta-node', 'up'],
      ['nginx', 'up'],
    ]);
    expect(health.overall).toBe('healthy');
    expect(health.certificate?.state).toBe('valid');
  });

  it('halts at the readiness wait when a service never answers', async () => {
    executor.on('pg_isready', exited(2, '', 'no response'));
    const report = await deployer.install({ interactive: false });

    expect(report.status).toBe('aborted');
    expect(report.failure).toMatchObject({ ordinal: 9, name: 'readiness wait', error: { code: 'DEPENDENCY_UNREADY' } });
    expect(report.phases).toHaveLength(9);
    expect(executor.linesMatching('restart ta-node')).toEqual([]);
    expect((await operations.getOperations())[0]).toMatchObject({ operation: 'install', status: 'aborted' });
  });

  it('keeps going when stopping containers fails before the reset', async () => {
    executor.on(`${COMPOSE} down`, exited(1, '', 'daemon busy'));
    const report = await deployer.install({ interactive: false });

    expect(report.status).toBe('completed');
    expect(report.phases[6]).toMatchObject({
      ordinal: 7,
      status: 'warning',
      warnings: [`Stopping containers failed: \`${COMPOSE} down\` exited with code 1: daemon busy`],
    });
    expect(executor.linesMatching('volume rm')).toHaveLength(4);
  });

  it('resumes from a later phase without repeating the reset', async () => {
    const report = await deployer.install({ from: 8, interactive: false });

    expect(report.status).toBe('completed');
    expect(report.phases.slice(0, 7).every((p) => p.status === 'skipped')).toBe(true);
    expect(executor.linesMatching('volume rm')).toEqual([]);
    expect(await root.read('POSTGRES_PASSWORD')).toBe('secret');
  });
});
