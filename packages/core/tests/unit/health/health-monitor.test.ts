/**
 * Unit tests for health-monitor: bounded probe fan-out, sync status
 * derivation and report scoring.
 */

import { describe, it, expect } from 'vitest';
import {
  HealthMonitor,
  checkAll,
  checkService,
  deriveSyncStatus,
  type CertificateStatus,
} from '../../../src/health/health-monitor.js';
import type { ServiceDescriptor } from '../../../src/types.js';
import { FakeRpcClient } from '../fakes.js';

function service(name: string, probe: () => Promise<boolean>): ServiceDescriptor {
  return { name, dependsOn: [], probe };
}

const up = (name: string): ServiceDescriptor => service(name, async () => true);
const down = (name: string): ServiceDescriptor => service(name, async () => false);

function syncedRpc(peers = '0x5'): FakeRpcClient {
  return new FakeRpcClient({
    eth_syncing: { ok: true, result: false },
    net_peerCount: { ok: true, result: peers },
    eth_blockNumber: { ok: true, result: '0x64' },
  });
}

describe('checkService', () => {
  it('marks a throwing probe Down with its message', async () => {
    const check = await checkService(service('redis', async () => {
      throw new Error('exec failed');
    }));
    expect(check).toMatchObject({ name: 'redis', state: 'down', error: 'exec failed' });
  });

  it('marks a hung probe Down once the timeout passes', async () => {
    const check = await checkService(service('app', () => new Promise<boolean>(() => {})), 20);
    expect(check.state).toBe('down');
  });
});

describe('checkAll', () => {
  it('keeps descriptor order and never exceeds the concurrency limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const slow = (name: string, result: boolean): ServiceDescriptor =>
      service(name, async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return result;
      });

    const result = await checkAll(
      [slow('postgres', true), slow('redis', false), slow('nethermind', true), slow('app', true), slow('nginx', false)],
      { concurrency: 2 },
    );

    expect(maxInFlight).toBe(2);
    expect(result.checks.map((c) => c.name)).toEqual(['postgres', 'redis', 'nethermind', 'app', 'nginx']);
    expect(result.up).toEqual(['postgres', 'nethermind', 'app']);
    expect(result.down).toEqual(['redis', 'nginx']);
  });
});

describe('deriveSyncStatus', () => {
  it('reports synced at the current height', async () => {
    expect(await deriveSyncStatus(syncedRpc())).toEqual({
      currentBlock: 100,
      highestBlock: null,
      peerCount: 5,
      state: 'synced',
      progress: 100,
      warnings: [],
    });
  });

  it('computes integer progress while syncing', async () => {
    const rpc = new FakeRpcClient({
      eth_syncing: { ok: true, result: { currentBlock: '0x32', highestBlock: '0xc8', startingBlock: '0x0' } },
      net_peerCount: { ok: true, result: '0x3' },
      eth_blockNumber: { ok: true, result: '0x32' },
    });
    expect(await deriveSyncStatus(rpc)).toEqual({
      currentBlock: 50,
      highestBlock: 200,
      peerCount: 3,
      state: 'syncing',
      progress: 25,
      warnings: [],
    });
  });

  it('caps progress at 100', async () => {
    const rpc = new FakeRpcClient({
      eth_syncing: { ok: true, result: { currentBlock: '0x12c', highestBlock: '0xc8' } },
      net_peerCount: { ok: true, result: '0x3' },
      eth_blockNumber: { ok: true, result: '0x12c' },
    });
    expect((await deriveSyncStatus(rpc)).progress).toBe(100);
  });

  it('treats a zero target height as unknown rather than dividing by it', async () => {
    const rpc = new FakeRpcClient({
      eth_syncing: { ok: true, result: { currentBlock: '0x0', highestBlock: '0x0' } },
      net_peerCount: { ok: true, result: '0x2' },
      eth_blockNumber: { ok: true, result: '0x0' },
    });
    const status = await deriveSyncStatus(rpc);

    expect(status.state).toBe('unknown');
    expect(status.progress).toBeNull();
    expect(status.warnings).toEqual(['sync target height unknown']);
  });

  it('warns about an isolated node', async () => {
    const status = await deriveSyncStatus(syncedRpc('0x0'));

    expect(status.state).toBe('synced');
    expect(status.peerCount).toBe(0);
    expect(status.warnings).toEqual(['isolated node: 0 peers connected']);
  });

  it('is unreachable only when both sync and height queries fail', async () => {
    const status = await deriveSyncStatus(new FakeRpcClient());
    expect(status).toEqual({
      currentBlock: null,
      highestBlock: null,
      peerCount: null,
      state: 'unreachable',
      progress: null,
      warnings: [],
    });

    const heightOnly = new FakeRpcClient({
      eth_syncing: { ok: true, result: 'not-an-object' },
      eth_blockNumber: { ok: true, result: '0x10' },
    });
    expect((await deriveSyncStatus(heightOnly)).state).toBe('unknown');
  });
});

describe('HealthMonitor', () => {
  function certificate(state: CertificateStatus['state'], daysRemaining: number | null, error?: string): () => Promise<CertificateStatus> {
    return async () => ({ state, record: null, daysRemaining, error });
  }

  it('is healthy when every service is up, the node is synced and the certificate is valid', async () => {
    const monitor = new HealthMonitor({
      services: [up('postgres'), up('nginx')],
      rpc: syncedRpc(),
      certificateStatus: certificate('valid', 80),
    });
    const report = await monitor.runHealthCheck();

    expect(report.overall).toBe('healthy');
    expect(report.checks.map((c) => [c.name, c.status])).toEqual([
      ['service:postgres', 'pass'],
      ['service:nginx', 'pass'],
      ['chain_sync', 'pass'],
      ['certificate', 'pass'],
    ]);
  });

  it('is degraded for an expiring certificate or an isolated node', async () => {
    const expiring = await new HealthMonitor({
      services: [up('postgres')],
      certificateStatus: certificate('expiring_soon', 12),
    }).runHealthCheck();
    expect(expiring.overall).toBe('degraded');
    expect(expiring.checks[1]?.message).toBe('Expires in 12 days; renew soon');

    const isolated = await new HealthMonitor({ services: [up('postgres')], rpc: syncedRpc('0x0') }).runHealthCheck();
    expect(isolated.overall).toBe('degraded');
    expect(isolated.checks[1]?.message).toBe('Synced at block 100 (isolated node: 0 peers connected)');
  });

  it('is unhealthy when a service is down or the certificate expired', async () => {
    const serviceDown = await new HealthMonitor({ services: [up('postgres'), down('redis')] }).runHealthCheck();
    expect(serviceDown.overall).toBe('unhealthy');
    expect(serviceDown.services.down).toEqual(['redis']);
    expect(serviceDown.checks[1]).toMatchObject({ name: 'service:redis', status: 'fail', message: 'Down' });

    const expired = await new HealthMonitor({ services: [up('postgres')], certificateStatus: certificate('expired', -3) }).runHealthCheck();
    expect(expired.overall).toBe('unhealthy');
  });

  it('warns when the certificate store cannot be read', async () => {
    const report = await new HealthMonitor({
      services: [],
      certificateStatus: certificate('absent', null, 'certbot exited with code 1'),
    }).runHealthCheck();

    expect(report.checks).toEqual([
      { name: 'certificate', status: 'warn', message: 'Certificate status unavailable: certbot exited with code 1', duration: 0 },
    ]);
    expect(report.sync).toBeNull();
  });
});
