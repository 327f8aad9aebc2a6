/**
 * @module chain/chain-config
 * Network-specific configuration: ethstats reporting, the node env seed,
 * contract artifacts, the static peer list and the chainspec.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { Bus, Clock, CredentialStore, NetworkTarget, Probe } from '../types.js';
import { systemClock } from '../types.js';
import type { Outcome } from '../resilience/error-codes.js';
import { fail, succeed } from '../resilience/error-codes.js';
import { parseEnv } from '../credential-store.js';
import { publish } from '../event-bus.js';
import { awaitReady } from '../readiness-gate.js';
import { SERVICES } from '../topology.js';
import type { FetchLike, JsonRpcClient } from '../health/rpc-client.js';
import { fetchEnodes, type EnodeFetcher } from './ethstats-client.js';

// =====================================================================
// Network table
// =====================================================================

export interface NetworkProfile {
  /** ethstats reporting endpoint */
  statsServer: string;
  /** ethstats WebSocket that publishes the node list */
  nodesEndpoint: string;
  /** Directory under the chains root */
  chainDir: string;
  /** Published chainspec, when the network has one */
  chainspecUrl: string | null;
}

export const NETWORKS: Readonly<Record<NetworkTarget, NetworkProfile>> = Object.freeze({
  veriscope_testnet: {
    statsServer: 'wss://stats.testnet.shyft.network/api',
    nodesEndpoint: 'wss://stats.testnet.shyft.network/primus/',
    chainDir: 'veriscope_testnet',
    chainspecUrl: null,
  },
  fed_testnet: {
    statsServer: 'wss://fedstats.veriscope.network/api',
    nodesEndpoint: 'wss://fedstats.veriscope.network/primus/',
    chainDir: 'fed_testnet',
    chainspecUrl: 'https://spec.shyft.network/ShyftTestnet-current.json',
  },
  fed_mainnet: {
    statsServer: 'wss://stats.shyft.network/api',
    nodesEndpoint: 'wss://stats.shyft.network/primus/',
    chainDir: 'fed_mainnet',
    chainspecUrl: 'https://spec.shyft.network/ShyftMainnet-current.json',
  },
});

export const CHAIN_ENV_KEYS = {
  server: 'CHAIN_STATS_SERVER',
  secret: 'CHAIN_STATS_SECRET',
  enabled: 'CHAIN_STATS_ENABLED',
  contact: 'CHAIN_STATS_CONTACT',
  chainspecUrl: 'SHYFT_CHAINSPEC_URL',
} as const;

export const NODE_ENV_TEMPLATE = 'ta-node-env';
export const STATIC_NODES_FILE = 'static-nodes.json';
export const CHAINSPEC_FILE = 'shyftchainspec.json';
/** Anything smaller is an error page, not a chainspec. */
export const MIN_CHAINSPEC_BYTES = 5120;

/** Host-local addresses in the node env template and their in-network names. */
const CONTAINER_ADDRESS_REWRITES: ReadonlyArray<readonly [string, string]> = [
  ['http://localhost:8545', 'http://nethermind:8545'],
  ['ws://localhost:8545', 'ws://nethermind:8545'],
  ['http://localhost:8000', 'http://nginx:80'],
  ['redis://127.0.0.1:6379', 'redis://redis:6379'],
  ['/opt/veriscope/veriscope_ta_node/artifacts/', '/app/artifacts/'],
];

export function rewriteForContainers(value: string): string {
  return CONTAINER_ADDRESS_REWRITES.reduce((acc, [from, to]) => acc.split(from).join(to), value);
}

// =====================================================================
// Types
// =====================================================================

/** The compose operations chain configuration needs. */
export interface ChainCompose {
  volumeName(resource: string): string;
  isRunning(service: string): Promise<boolean>;
  restart(services: string[]): Promise<Outcome>;
  runContainer(args: string[]): Promise<Outcome>;
}

export interface ChainConfiguratorOptions {
  networkTarget: NetworkTarget;
  /** Absolute chains root */
  chainsDir: string;
  compose: ChainCompose;
  rootEnv: CredentialStore;
  nodeEnv: CredentialStore;
  rpc: JsonRpcClient;
  statsSecret?: string;
  nodeProbe?: Probe;
  readiness?: { intervalSeconds: number; timeoutSeconds: number };
  fetchEnodes?: EnodeFetcher;
  fetch?: FetchLike;
  clock?: Clock;
  bus?: Bus;
}

export interface ChainConfigureReport {
  chainDir: string;
  statsEnabled: boolean;
  /** Keys copied from the node env template */
  seededKeys: string[];
  artifactsCopied: boolean;
  nodeRestarted: boolean;
}

export interface StaticNodesReport {
  staticNodes: 'updated' | 'unchanged';
  count: number;
  contact: string | null;
  restarted: boolean;
}

export interface ChainspecReport {
  status: 'updated' | 'unchanged';
  url: string;
  path: string;
  bytes: number;
  /** Copy of the replaced file */
  backupPath: string | null;
  restarted: boolean;
}

/** Local time as `YYYYMMDD_HHMMSS`, the suffix of chainspec backups. */
export function chainspecStamp(epochMs: number): string {
  const d = new Date(epochMs);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =====================================================================
// ChainConfigurator
// =====================================================================

export class ChainConfigurator {
  private readonly profile: NetworkProfile;
  private readonly chainDir: string;

  constructor(private readonly options: ChainConfiguratorOptions) {
    this.profile = NETWORKS[options.networkTarget];
    this.chainDir = path.join(options.chainsDir, this.profile.chainDir);
  }

  get staticNodesPath(): string {
    return path.join(this.chainDir, STATIC_NODES_FILE);
  }

  async configure(): Promise<Outcome<ChainConfigureReport>> {
    const { bus } = this.options;
    if (!(await isDirectory(this.chainDir))) {
      return fail('CONFIGURATION_ERROR', `Chain directory not found: ${this.chainDir}`, { networkTarget: this.options.networkTarget });
    }
    publish(bus, 'chain', 'chain_configure_start', { networkTarget: this.options.networkTarget });
    const warnings: string[] = [];

    const secret = this.options.statsSecret ?? '';
    const statsEnabled = secret.length > 0;
    try {
      await this.options.rootEnv.write(CHAIN_ENV_KEYS.server, this.profile.statsServer);
      if (statsEnabled) await this.options.rootEnv.write(CHAIN_ENV_KEYS.secret, secret);
      await this.options.rootEnv.write(CHAIN_ENV_KEYS.enabled, String(statsEnabled));
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot write chain settings to ${this.options.rootEnv.location}: ${errorMessage(err)}`);
    }
    if (!statsEnabled) warnings.push('No chain.statsSecret configured; ethstats reporting disabled');

    const seeded = await this.seedNodeEnv();
    if (!seeded.ok) return seeded;
    warnings.push(...seeded.warnings);

    let artifactsCopied = false;
    if (await isDirectory(path.join(this.chainDir, 'artifacts'))) {
      const copy = await this.options.compose.runContainer([
        '-v', `${this.chainDir}:/source:ro`,
        '-v', `${this.options.compose.volumeName('artifacts')}:/target`,
        'alpine', 'sh', '-c', 'rm -rf /target/* && cp -r /source/artifacts/. /target/',
      ]);
      if (!copy.ok) return fail('EXTERNAL_TOOL_FAILURE', `Copying chain artifacts failed: ${copy.error.message}`);
      artifactsCopied = true;
    } else {
      warnings.push(`No artifacts directory in ${this.chainDir}`);
    }

    const restarted = await this.restartNode();
    if (!restarted.ok) return restarted;
    warnings.push(...restarted.warnings);

    const report: ChainConfigureReport = {
      chainDir: this.chainDir,
      statsEnabled,
      seededKeys: seeded.value,
      artifactsCopied,
      nodeRestarted: restarted.value,
    };
    publish(bus, 'chain', 'chain_configured', report);
    return succeed(report, warnings);
  }

  /**
   * Pull the peer list from ethstats into `static-nodes.json`. An empty or
   * unreadable list keeps the existing file.
   */
  async refreshStaticNodes(options: { restart?: boolean } = {}): Promise<Outcome<StaticNodesReport>> {
    const fetcher = this.options.fetchEnodes ?? ((endpoint: string) => fetchEnodes(endpoint));
    const warnings: string[] = [];

    const fetched = await fetcher(this.profile.nodesEndpoint);
    let count = 0;
    let staticNodes: StaticNodesReport['staticNodes'] = 'unchanged';
    if (!fetched.ok) {
      warnings.push(`${fetched.error.message}; keeping existing ${STATIC_NODES_FILE}`);
    } else if (fetched.value.length === 0) {
      warnings.push(...fetched.warnings, `No static nodes retrieved; keeping existing ${STATIC_NODES_FILE}`);
    } else {
      try {
        await fs.mkdir(this.chainDir, { recursive: true });
        await fs.writeFile(this.staticNodesPath, `${JSON.stringify(fetched.value, null, 2)}\n`, 'utf-8');
      } catch (err) {
        return fail('EXTERNAL_TOOL_FAILURE', `Cannot write ${this.staticNodesPath}: ${errorMessage(err)}`);
      }
      count = fetched.value.length;
      staticNodes = 'updated';
    }
    publish(this.options.bus, 'chain', 'static_nodes', { staticNodes, count });

    const contact = await this.nodeContact();
    if (contact !== null) {
      try {
        await this.options.rootEnv.write(CHAIN_ENV_KEYS.contact, contact);
      } catch (err) {
        return fail('EXTERNAL_TOOL_FAILURE', `Cannot write ${CHAIN_ENV_KEYS.contact}: ${errorMessage(err)}`);
      }
    } else {
      warnings.push('Could not read this node\'s enode from admin_nodeInfo');
    }

    let restarted = false;
    if (options.restart) {
      const restart = await this.options.compose.restart([SERVICES.chain]);
      if (!restart.ok) return fail('EXTERNAL_TOOL_FAILURE', `Restarting ${SERVICES.chain} failed: ${restart.error.message}`);
      restarted = true;
    }

    return succeed({ staticNodes, count, contact, restarted }, warnings);
  }

  /**
   * Replace `shyftchainspec.json` with the published chainspec. The
   * download must be valid JSON of at least {@link MIN_CHAINSPEC_BYTES};
   * the old file is kept beside it with a timestamp suffix.
   */
  async updateChainspec(options: { restart?: boolean } = {}): Promise<Outcome<ChainspecReport>> {
    const { compose, bus } = this.options;
    let url: string;
    try {
      url = (await this.options.rootEnv.read(CHAIN_ENV_KEYS.chainspecUrl)) || (this.profile.chainspecUrl ?? '');
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot read ${this.options.rootEnv.location}: ${errorMessage(err)}`);
    }
    if (url === '') {
      return fail('CONFIGURATION_ERROR', `No default chainspec URL for ${this.options.networkTarget}; set ${CHAIN_ENV_KEYS.chainspecUrl}`, {
        networkTarget: this.options.networkTarget,
      });
    }

    const file = path.join(this.chainDir, CHAINSPEC_FILE);
    let current: Buffer;
    try {
      current = await fs.readFile(file);
    } catch {
      return fail('CONFIGURATION_ERROR', `Chainspec file not found: ${file}`);
    }

    const fetchImpl: FetchLike = this.options.fetch ?? ((target, init) => fetch(target, init));
    let downloaded: Buffer;
    try {
      const response = await fetchImpl(url, { method: 'GET' });
      if (!response.ok) return fail('EXTERNAL_TOOL_FAILURE', `Failed to download chainspec from ${url}: HTTP ${response.status}`);
      downloaded = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Failed to download chainspec from ${url}: ${errorMessage(err)}`);
    }

    if (downloaded.length < MIN_CHAINSPEC_BYTES) {
      return fail('VERIFICATION_FAILED', `Downloaded chainspec is too small (${downloaded.length} bytes, expected at least ${MIN_CHAINSPEC_BYTES})`, { url });
    }
    try {
      JSON.parse(downloaded.toString('utf8'));
    } catch {
      return fail('VERIFICATION_FAILED', 'Downloaded chainspec is not valid JSON', { url });
    }

    const report: ChainspecReport = { status: 'unchanged', url, path: file, bytes: downloaded.length, backupPath: null, restarted: false };
    if (downloaded.equals(current)) {
      publish(bus, 'chain', 'chainspec', { status: report.status, url });
      return succeed(report);
    }

    const backupPath = `${file}.backup.${chainspecStamp((this.options.clock ?? systemClock).now())}`;
    try {
      await fs.copyFile(file, backupPath);
      await fs.writeFile(file, downloaded, { mode: 0o644 });
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot update ${file}: ${errorMessage(err)}`);
    }
    report.status = 'updated';
    report.backupPath = backupPath;
    publish(bus, 'chain', 'chainspec', { status: report.status, url, backupPath });

    const warnings: string[] = [];
    if (await compose.isRunning(SERVICES.chain)) {
      if (options.restart) {
        const restart = await compose.restart([SERVICES.chain]);
        if (!restart.ok) return fail('EXTERNAL_TOOL_FAILURE', `Restarting ${SERVICES.chain} failed: ${restart.error.message}`);
        report.restarted = true;
      } else {
        warnings.push(`${SERVICES.chain} is running; restart it to apply the new chainspec`);
      }
    }
    return succeed(report, warnings);
  }

  private async nodeContact(): Promise<string | null> {
    const info = await this.options.rpc.call('admin_nodeInfo');
    if (!info.ok || info.result === null || typeof info.result !== 'object') return null;
    const enode: unknown = Reflect.get(info.result, 'enode');
    return typeof enode === 'string' && enode.startsWith('enode://') ? enode : null;
  }

  /** Copy every template key the node env lacks; existing keys win. */
  private async seedNodeEnv(): Promise<Outcome<string[]>> {
    const { nodeEnv } = this.options;
    let existing: Map<string, string>;
    try {
      existing = await nodeEnv.readAll();
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot read ${nodeEnv.location}: ${errorMessage(err)}`);
    }

    const templatePath = path.join(this.chainDir, NODE_ENV_TEMPLATE);
    let template: string;
    try {
      template = await fs.readFile(templatePath, 'utf-8');
    } catch {
      return succeed([], [`No ${NODE_ENV_TEMPLATE} template in ${this.chainDir}`]);
    }

    const seeded: string[] = [];
    try {
      for (const [key, value] of parseEnv(template)) {
        if (existing.has(key)) continue;
        await nodeEnv.write(key, rewriteForContainers(value));
        seeded.push(key);
      }
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot seed ${nodeEnv.location}: ${errorMessage(err)}`);
    }
    publish(this.options.bus, 'chain', 'node_env_seeded', { keys: seeded.length });
    return succeed(seeded);
  }

  private async restartNode(): Promise<Outcome<boolean>> {
    const { compose } = this.options;
    if (!(await compose.isRunning(SERVICES.node))) {
      return succeed(false, [`${SERVICES.node} is not running; start it to apply the chain configuration`]);
    }
    const restart = await compose.restart([SERVICES.node]);
    if (!restart.ok) return fail('EXTERNAL_TOOL_FAILURE', `Restarting ${SERVICES.node} failed: ${restart.error.message}`);

    if (this.options.nodeProbe) {
      const wait = this.options.readiness ?? { intervalSeconds: 2, timeoutSeconds: 60 };
      const ready = await awaitReady(this.options.nodeProbe, { ...wait, clock: this.options.clock ?? systemClock });
      if (ready.status === 'timed_out') {
        return fail('DEPENDENCY_UNREADY', `${SERVICES.node} not ready ${wait.timeoutSeconds}s after restart`, {
          service: SERVICES.node,
          attempts: ready.attempts,
        });
      }
    }
    return succeed(true);
  }
}
