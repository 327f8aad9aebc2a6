/**
 * @module topology
 * The static service table and persistent resource catalog of a deployment.
 */

import type { CredentialStore, PersistentResource, ServiceDescriptor } from './types.js';
import type { ComposeClient } from './compose-engine.js';
import type { JsonRpcClient } from './health/rpc-client.js';
import { succeeded } from './command-executor.js';

// =====================================================================
// Services
// =====================================================================

export const SERVICES = {
  database: 'postgres',
  cache: 'redis',
  chain: 'nethermind',
  app: 'app',
  node: 'ta-node',
  proxy: 'nginx',
  certbot: 'certbot',
} as const;

export type ServiceName = (typeof SERVICES)[keyof typeof SERVICES];

const PROBE_TIMEOUT_MS = 10_000;

export const DEFAULT_DATABASE_ACCOUNT = 'trustanchor';

export interface DatabaseAccount {
  user: string;
  database: string;
}

/** POSTGRES_USER and POSTGRES_DB from the compose env, or the image defaults when unset. */
export async function readDatabaseAccount(rootEnv?: Pick<CredentialStore, 'read'>): Promise<DatabaseAccount> {
  if (!rootEnv) return { user: DEFAULT_DATABASE_ACCOUNT, database: DEFAULT_DATABASE_ACCOUNT };
  const user = (await rootEnv.read('POSTGRES_USER')) || DEFAULT_DATABASE_ACCOUNT;
  const database = (await rootEnv.read('POSTGRES_DB')) || DEFAULT_DATABASE_ACCOUNT;
  return { user, database };
}

export interface TopologyDeps {
  compose: ComposeClient;
  rpc: JsonRpcClient;
  /** Compose env holding the database role `pg_isready` connects as */
  rootEnv?: Pick<CredentialStore, 'read'>;
}

/**
 * Descriptors for every long-running service, with read-only probes:
 * a probe only asks; it never starts, restarts or writes anything.
 */
export function createServiceDescriptors(deps: TopologyDeps): ServiceDescriptor[] {
  const { compose, rpc } = deps;
  const execOk = async (service: string, argv: string[], expect?: RegExp): Promise<boolean> => {
    const result = await compose.exec(service, argv, { timeoutMs: PROBE_TIMEOUT_MS });
    return succeeded(result) && (expect === undefined || expect.test(result.stdout));
  };

  return [
    {
      name: SERVICES.database,
      dependsOn: [],
      probe: async () => {
        const { user } = await readDatabaseAccount(deps.rootEnv);
        return execOk(SERVICES.database, ['pg_isready', '-U', user]);
      },
    },
    {
      name: SERVICES.cache,
      dependsOn: [],
      probe: () => execOk(SERVICES.cache, ['redis-cli', 'ping'], /PONG/),
    },
    {
      name: SERVICES.chain,
      dependsOn: [],
      probe: async () => (await rpc.call('web3_clientVersion')).ok,
    },
    {
      name: SERVICES.app,
      dependsOn: [SERVICES.database, SERVICES.cache],
      probe: () => execOk(SERVICES.app, ['php', 'artisan', '--version']),
    },
    {
      name: SERVICES.node,
      dependsOn: [SERVICES.app, SERVICES.chain],
      probe: () => execOk(SERVICES.node, ['pgrep', '-f', 'node']),
    },
    {
      name: SERVICES.proxy,
      dependsOn: [SERVICES.app],
      probe: () => compose.isRunning(SERVICES.proxy),
    },
  ];
}

/** Dependencies first. Throws on cycles or unknown dependencies. */
export function orderByDependencies(services: ServiceDescriptor[]): ServiceDescriptor[] {
  const serviceMap = new Map<string, ServiceDescriptor>();
  for (const svc of services) {
    serviceMap.set(svc.name, svc);
  }

  const visited = new Set<string>();
  const visiting = new Set<string>();
  const sorted: ServiceDescriptor[] = [];

  const visit = (name: string, path: string[]): void => {
    if (visited.has(name)) return;
    if (visiting.has(name)) {
      throw new Error(`Circular dependency detected: ${[...path, name].join(' → ')}`);
    }
    visiting.add(name);

    const svc = serviceMap.get(name);
    if (!svc) {
      throw new Error(`Unknown service dependency: "${name}"`);
    }
    for (const dep of svc.dependsOn) {
      if (!serviceMap.has(dep)) {
        throw new Error(`Service "${name}" depends on unknown service "${dep}"`);
      }
      visit(dep, [...path, name]);
    }

    visiting.delete(name);
    visited.add(name);
    sorted.push(svc);
  };

  for (const svc of services) {
    visit(svc.name, []);
  }
  return sorted;
}

// =====================================================================
// Persistent resources
// =====================================================================

/**
 * Classification is looked up here, never taken from a caller: a routine
 * reset can only ever see the resettable entries.
 */
export const RESOURCE_CATALOG: readonly PersistentResource[] = Object.freeze([
  { name: 'postgres_data', classification: 'resettable', owner: SERVICES.database },
  { name: 'redis_data', classification: 'resettable', owner: SERVICES.cache },
  { name: 'app_data', classification: 'resettable', owner: SERVICES.app },
  { name: 'artifacts', classification: 'resettable', owner: SERVICES.node },
  { name: 'nethermind_data', classification: 'preserved', owner: SERVICES.chain },
  { name: 'certbot_conf', classification: 'preserved', owner: SERVICES.certbot },
  { name: 'certbot_www', classification: 'preserved', owner: SERVICES.certbot },
]);
