/**
 * @module credentials/identity
 * Node signing identity (account address + private key).
 *
 * The keypair is produced inside the node image, which already ships
 * `ethers`, by a throwaway container. Output is validated before anything is
 * written, and an existing identity is never replaced.
 */

import { z } from 'zod';
import type { CredentialStore } from '../types.js';
import type { ComposeClient } from '../compose-engine.js';
import { describeResult, succeeded } from '../command-executor.js';
import { fail, succeed, type Outcome } from '../resilience/error-codes.js';

export const IDENTITY_KEYS = {
  account: 'TRUST_ANCHOR_ACCOUNT',
  privateKey: 'TRUST_ANCHOR_PK',
  preferredName: 'TRUST_ANCHOR_PREFNAME',
} as const;

export const KeypairSchema = z.object({
  address: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 0x-prefixed 20-byte address'),
  privateKey: z.string().regex(/^[0-9a-fA-F]{64}$/, 'expected 32 hex-encoded bytes without 0x'),
});

export type Keypair = z.infer<typeof KeypairSchema>;

export type KeypairSource = () => Promise<Outcome<Keypair>>;

const KEYPAIR_SCRIPT = [
  "const ethers = require('ethers');",
  'const wallet = ethers.Wallet.createRandom();',
  'console.log(JSON.stringify({ address: wallet.address, privateKey: wallet.privateKey.substring(2) }));',
].join(' ');

/** Extract and validate the last JSON line printed by the generator. */
export function parseKeypairOutput(stdout: string): Outcome<Keypair> {
  const line = stdout
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.startsWith('{'))
    .pop();
  if (!line) return fail('VALIDATION_FAILED', 'Keypair generator printed no JSON');

  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return fail('VALIDATION_FAILED', 'Keypair generator printed malformed JSON');
  }
  const parsed = KeypairSchema.safeParse(raw);
  if (!parsed.success) {
    return fail('VALIDATION_FAILED', `Keypair generator output rejected: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return succeed(parsed.data);
}

/** Keypair source running `node -e` in a one-off node container. */
export function containerKeypairSource(compose: ComposeClient, service = 'ta-node'): KeypairSource {
  return async () => {
    const argv = ['node', '-e', KEYPAIR_SCRIPT];
    const result = await compose.runOnce(service, argv, { noDeps: true, timeoutMs: 120_000 });
    if (!succeeded(result)) {
      return fail('EXTERNAL_TOOL_FAILURE', describeResult('docker compose run', [service, ...argv.slice(0, 2)], result), {
        stderr: result.stderr,
      });
    }
    return parseKeypairOutput(result.stdout);
  };
}

/**
 * Ensure the node env holds an identity. An existing valid account/key pair
 * is kept; the preferred name always follows the deployment's common name.
 */
export async function ensureIdentity(
  node: CredentialStore,
  commonName: string,
  source: KeypairSource,
): Promise<Outcome<{ account: string; generated: boolean }>> {
  try {
    return await writeIdentity(node, commonName, source);
  } catch (err) {
    return fail('EXTERNAL_TOOL_FAILURE', `Cannot update ${node.location}: ${err instanceof Error ? err.message : String(err)}`, {
      location: node.location,
    });
  }
}

async function writeIdentity(
  node: CredentialStore,
  commonName: string,
  source: KeypairSource,
): Promise<Outcome<{ account: string; generated: boolean }>> {
  const existing = KeypairSchema.safeParse({
    address: await node.read(IDENTITY_KEYS.account),
    privateKey: await node.read(IDENTITY_KEYS.privateKey),
  });

  let account: string;
  let generated = false;
  if (existing.success) {
    account = existing.data.address;
  } else {
    const keypair = await source();
    if (!keypair.ok) return keypair;
    await node.write(IDENTITY_KEYS.account, keypair.value.address);
    await node.write(IDENTITY_KEYS.privateKey, keypair.value.privateKey);
    account = keypair.value.address;
    generated = true;

    const stored = await node.read(IDENTITY_KEYS.privateKey);
    if (stored !== keypair.value.privateKey) {
      return fail('VERIFICATION_FAILED', `Private key did not persist in ${node.location}`);
    }
  }

  await node.write(IDENTITY_KEYS.preferredName, commonName);
  return succeed({ account, generated });
}
