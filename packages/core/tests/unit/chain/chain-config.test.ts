/**
 * ChainConfigurator against a temporary chains root, in-memory env files
 * and a stubbed compose client.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  ChainConfigurator,
  NETWORKS,
  chainspecStamp,
  rewriteForContainers,
  type ChainCompose,
} from '../../../src/chain/chain-config.js';
import { MemoryCredentialStore } from '../../../src/credential-store.js';
import type { FetchLike } from '../../../src/health/rpc-client.js';
import { fail, succeed } from '../../../src/resilience/error-codes.js';
import { FakeClock, FakeRpcClient } from '../fakes.js';

const PEER = 'enode://cccc@10.0.0.3:30303';
const SELF = 'enode://ffff@203.0.113.7:30303';

/** A chainspec padded past the minimum size. */
function chainspec(name: string): string {
  return `${JSON.stringify({ name, engine: { authorityRound: {} }, padding: 'x'.repeat(6000) })}\n`;
}

function serving(body: string, status = 200) {
  const requested: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    requested.push(url);
    return new Response(body, { status });
  };
  return { fetchImpl, requested };
}

function fakeCompose() {
  const compose = {
    volumeName: vi.fn((resource: string) => `berth_${resource}`),
    isRunning: vi.fn(),
    restart: vi.fn(),
    runContainer: vi.fn(),
  } satisfies Record<keyof ChainCompose, Mock>;
  compose.isRunning.mockResolvedValue(true);
  compose.restart.mockResolvedValue(succeed(undefined));
  compose.runContainer.mockResolvedValue(succeed(undefined));
  return compose;
}

describe('rewriteForContainers', () => {
  it('maps host-local addresses to service names', () => {
    expect(rewriteForContainers('http://localhost:8545')).toBe('http://nethermind:8545');
    expect(rewriteForContainers('redis://127.0.0.1:6379')).toBe('redis://redis:6379');
    expect(rewriteForContainers('http://localhost:8000/webhook')).toBe('http://nginx:80/webhook');
    expect(rewriteForContainers('info')).toBe('info');
  });
});

describe('ChainConfigurator', () => {
  let chainsDir: string;
  let chainDir: string;
  let rootEnv: MemoryCredentialStore;
  let nodeEnv: MemoryCredentialStore;
  let rpc: FakeRpcClient;

  beforeEach(async () => {
    chainsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'berth-chains-'));
    chainDir = path.join(chainsDir, 'fed_testnet');
    await fs.mkdir(path.join(chainDir, 'artifacts'), { recursive: true });
    await fs.writeFile(
      path.join(chainDir, 'ta-node-env'),
      'HTTP=http://localhost:8545\nLOG_LEVEL=info\nWEBHOOK_CLIENT_SECRET=\n',
    );
    rootEnv = new MemoryCredentialStore('memory:.env', {});
    nodeEnv = new MemoryCredentialStore('memory:ta-node/.env', { LOG_LEVEL: 'debug' });
    rpc = new FakeRpcClient({ admin_nodeInfo: { ok: true, result: { enode: SELF } } });
  });

  afterEach(async () => {
    await fs.rm(chainsDir, { recursive: true, force: true });
  });

  function configurator(compose: ChainCompose, extra: { statsSecret?: string; fetched?: string[] | null; fetch?: FetchLike } = {}) {
    return new ChainConfigurator({
      networkTarget: 'fed_testnet',
      chainsDir,
      compose,
      rootEnv,
      nodeEnv,
      rpc,
      statsSecret: extra.statsSecret,
      fetch: extra.fetch,
      clock: new FakeClock(),
      fetchEnodes: async () =>
        extra.fetched === null
          ? fail('EXTERNAL_TOOL_FAILURE', 'ethstats connection failed')
          : succeed(extra.fetched ?? [PEER]),
    });
  }

  describe('configure', () => {
    it('writes stats settings, seeds missing node keys and copies artifacts', async () => {
      const compose = fakeCompose();
      const result = await configurator(compose, { statsSecret: 'test-secret' }).configure();

      expect(result).toEqual({
        ok: true,
        value: { chainDir, statsEnabled: true, seededKeys: ['HTTP', 'WEBHOOK_CLIENT_SECRET'], artifactsCopied: true, nodeRestarted: true },
        warnings: [],
      });
      expect(rootEnv.snapshot()).toEqual({
        CHAIN_STATS_SERVER: NETWORKS.fed_testnet.statsServer,
        CHAIN_STATS_SECRET: 'test-secret',
        CHAIN_STATS_ENABLED: 'true',
      });
      expect(nodeEnv.snapshot()).toEqual({
        LOG_LEVEL: 'debug',
        HTTP: 'http://nethermind:8545',
        WEBHOOK_CLIENT_SECRET: '',
      });
      const args = compose.runContainer.mock.calls[0]?.[0];
      expect(args).toContain(`${chainDir}:/source:ro`);
      expect(args).toContain('berth_artifacts:/target');
      expect(compose.restart).toHaveBeenCalledWith(['ta-node']);
    });

    it('disables stats without a secret and skips a stopped node', async () => {
      const compose = fakeCompose();
      compose.isRunning.mockResolvedValue(false);
      const result = await configurator(compose).configure();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.statsEnabled).toBe(false);
      expect(result.value.nodeRestarted).toBe(false);
      expect(result.warnings).toEqual([
        'No chain.statsSecret configured; ethstats reporting disabled',
        'ta-node is not running; start it to apply the chain configuration',
      ]);
      expect(rootEnv.snapshot()).toEqual({
        CHAIN_STATS_SERVER: NETWORKS.fed_testnet.statsServer,
        CHAIN_STATS_ENABLED: 'false',
      });
      expect(compose.restart).not.toHaveBeenCalled();
    });

    it('fails for a missing chain directory', async () => {
      await fs.rm(chainDir, { recursive: true });
      const result = await configurator(fakeCompose()).configure();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('CONFIGURATION_ERROR');
      expect(result.error.message).toBe(`Chain directory not found: ${chainDir}`);
      expect(rootEnv.snapshot()).toEqual({});
    });
  });

  describe('refreshStaticNodes', () => {
    it('writes the fetched peers and records this node as contact', async () => {
      const compose = fakeCompose();
      const result = await configurator(compose).refreshStaticNodes({ restart: true });

      expect(result).toEqual({
        ok: true,
        value: { staticNodes: 'updated', count: 1, contact: SELF, restarted: true },
        warnings: [],
      });
      expect(JSON.parse(await fs.readFile(path.join(chainDir, 'static-nodes.json'), 'utf-8'))).toEqual([PEER]);
      expect(rootEnv.snapshot()).toEqual({ CHAIN_STATS_CONTACT: SELF });
      expect(compose.restart).toHaveBeenCalledWith(['nethermind']);
    });

    it('keeps the existing file when no peers come back', async () => {
      await fs.writeFile(path.join(chainDir, 'static-nodes.json'), '["enode://old@10.0.0.9:30303"]\n');
      const result = await configurator(fakeCompose(), { fetched: [] }).refreshStaticNodes();

      expect(result.ok && result.value).toEqual({ staticNodes: 'unchanged', count: 0, contact: SELF, restarted: false });
      expect(result.warnings).toEqual(['No static nodes retrieved; keeping existing static-nodes.json']);
      expect(await fs.readFile(path.join(chainDir, 'static-nodes.json'), 'utf-8')).toBe('["enode://old@10.0.0.9:30303"]\n');
    });

    it('turns a fetch failure into a warning', async () => {
      rpc.set('admin_nodeInfo', { ok: false, error: 'method not found' });
      const result = await configurator(fakeCompose(), { fetched: null }).refreshStaticNodes();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({ staticNodes: 'unchanged', count: 0, contact: null, restarted: false });
      expect(result.warnings).toEqual([
        'ethstats connection failed; keeping existing static-nodes.json',
        "Could not read this node's enode from admin_nodeInfo",
      ]);
    });
  });

  describe('updateChainspec', () => {
    const specFile = () => path.join(chainDir, 'shyftchainspec.json');

    beforeEach(async () => {
      await fs.writeFile(specFile(), chainspec('old'));
    });

    it('replaces a changed chainspec and keeps a timestamped copy', async () => {
      const compose = fakeCompose();
      compose.isRunning.mockResolvedValue(false);
      const { fetchImpl, requested } = serving(chainspec('new'));
      const result = await configurator(compose, { fetch: fetchImpl }).updateChainspec();

      const backupPath = `${specFile()}.backup.${chainspecStamp(0)}`;
      expect(requested).toEqual(['https://spec.shyft.network/ShyftTestnet-current.json']);
      expect(result).toEqual({
        ok: true,
        value: {
          status: 'updated',
          url: 'https://spec.shyft.network/ShyftTestnet-current.json',
          path: specFile(),
          bytes: Buffer.byteLength(chainspec('new')),
          backupPath,
          restarted: false,
        },
        warnings: [],
      });
      expect(await fs.readFile(specFile(), 'utf-8')).toBe(chainspec('new'));
      expect(await fs.readFile(backupPath, 'utf-8')).toBe(chainspec('old'));
    });

    it('leaves an identical chainspec alone', async () => {
      const result = await configurator(fakeCompose(), { fetch: serving(chainspec('old')).fetchImpl }).updateChainspec();

      expect(result.ok && result.value.status).toBe('unchanged');
      expect((await fs.readdir(chainDir)).filter((f) => f.includes('.backup.'))).toEqual([]);
    });

    it('prefers SHYFT_CHAINSPEC_URL from the env', async () => {
      await rootEnv.write('SHYFT_CHAINSPEC_URL', 'https://spec.example.test/custom.json');
      const { fetchImpl, requested } = serving(chainspec('old'));
      await configurator(fakeCompose(), { fetch: fetchImpl }).updateChainspec();

      expect(requested).toEqual(['https://spec.example.test/custom.json']);
    });

    it('warns when the node is running and restarts it on request', async () => {
      const compose = fakeCompose();
      const first = await configurator(compose, { fetch: serving(chainspec('new')).fetchImpl }).updateChainspec();
      expect(first.warnings).toEqual(['nethermind is running; restart it to apply the new chainspec']);
      expect(compose.restart).not.toHaveBeenCalled();

      await fs.writeFile(specFile(), chainspec('old'));
      const second = await configurator(compose, { fetch: serving(chainspec('new')).fetchImpl }).updateChainspec({ restart: true });
      expect(second.ok && second.value.restarted).toBe(true);
      expect(compose.restart).toHaveBeenCalledWith(['nethermind']);
    });

    it('rejects a download that is too small', async () => {
      const result = await configurator(fakeCompose(), { fetch: serving('{"name":"tiny"}').fetchImpl }).updateChainspec();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('VERIFICATION_FAILED');
      expect(result.error.message).toBe('Downloaded chainspec is too small (15 bytes, expected at least 5120)');
      expect(await fs.readFile(specFile(), 'utf-8')).toBe(chainspec('old'));
    });

    it('rejects a download that is not JSON', async () => {
      const result = await configurator(fakeCompose(), { fetch: serving(`<html>${'x'.repeat(6000)}</html>`).fetchImpl }).updateChainspec();

      expect(!result.ok && result.error.message).toBe('Downloaded chainspec is not valid JSON');
    });

    it('reports an HTTP error status', async () => {
      const result = await configurator(fakeCompose(), { fetch: serving('not found', 404).fetchImpl }).updateChainspec();

      expect(!result.ok && result.error.message).toBe(
        'Failed to download chainspec from https://spec.shyft.network/ShyftTestnet-current.json: HTTP 404',
      );
    });

    it('needs an existing chainspec file', async () => {
      await fs.rm(specFile());
      const result = await configurator(fakeCompose(), { fetch: serving(chainspec('new')).fetchImpl }).updateChainspec();

      expect(!result.ok && result.error.message).toBe(`Chainspec file not found: ${specFile()}`);
    });

    it('has no default URL for veriscope_testnet', async () => {
      const result = await new ChainConfigurator({
        networkTarget: 'veriscope_testnet',
        chainsDir,
        compose: fakeCompose(),
        rootEnv,
        nodeEnv,
        rpc,
      }).updateChainspec();

      expect(!result.ok && result.error.code).toBe('CONFIGURATION_ERROR');
      expect(!result.ok && result.error.message).toBe('No default chainspec URL for veriscope_testnet; set SHYFT_CHAINSPEC_URL');
    });
  });
});
