import { describe, it, expect, vi } from 'vitest';
import {
  containerKeypairSource,
  ensureIdentity,
  parseKeypairOutput,
  IDENTITY_KEYS,
  type Keypair,
} from '../../../src/credentials/identity.js';
import { ComposeClient } from '../../../src/compose-engine.js';
import { MemoryCredentialStore } from '../../../src/credential-store.js';
import { fail, succeed } from '../../../src/resilience/error-codes.js';
import { FakeExecutor, exited } from '../fakes.js';

const keypair: Keypair = { address: `0x${'1a'.repeat(20)}`, privateKey: 'ab'.repeat(32) };
const keypairJson = JSON.stringify(keypair);

describe('parseKeypairOutput', () => {
  it('takes the last JSON line', () => {
    const result = parseKeypairOutput(`npm notice\n${keypairJson}\n`);
    expect(result.ok && result.value).toEqual(keypair);
  });

  it('rejects missing, malformed and invalid output', () => {
    const none = parseKeypairOutput('nothing here');
    expect(!none.ok && none.error.message).toBe('Keypair generator printed no JSON');

    const malformed = parseKeypairOutput('{not json');
    expect(!malformed.ok && malformed.error.message).toBe('Keypair generator printed malformed JSON');

    const invalid = parseKeypairOutput(JSON.stringify({ address: '0x12', privateKey: keypair.privateKey }));
    expect(!invalid.ok && invalid.error.message).toBe(
      'Keypair generator output rejected: expected a 0x-prefixed 20-byte address',
    );
  });
});

describe('ensureIdentity', () => {
  it('generates and stores an identity when none exists', async () => {
    const node = new MemoryCredentialStore('memory:node');
    const result = await ensureIdentity(node, 'example-org', async () => succeed(keypair));

    expect(result.ok && result.value).toEqual({ account: keypair.address, generated: true });
    expect(node.snapshot()).toEqual({
      [IDENTITY_KEYS.account]: keypair.address,
      [IDENTITY_KEYS.privateKey]: keypair.privateKey,
      [IDENTITY_KEYS.preferredName]: 'example-org',
    });
  });

  it('keeps an existing identity and only refreshes the name', async () => {
    const node = new MemoryCredentialStore('memory:node', {
      [IDENTITY_KEYS.account]: keypair.address,
      [IDENTITY_KEYS.privateKey]: keypair.privateKey,
      [IDENTITY_KEYS.preferredName]: 'old-name',
    });
    const source = vi.fn(async () => succeed(keypair));
    const result = await ensureIdentity(node, 'example-org', source);

    expect(result.ok && result.value.generated).toBe(false);
    expect(source).not.toHaveBeenCalled();
    expect(await node.read(IDENTITY_KEYS.preferredName)).toBe('example-org');
  });

  it('writes nothing when the source fails', async () => {
    const node = new MemoryCredentialStore('memory:node');
    const result = await ensureIdentity(node, 'example-org', async () => fail('EXTERNAL_TOOL_FAILURE', 'image missing'));

    expect(result.ok).toBe(false);
    expect(node.snapshot()).toEqual({});
  });
});

class ReadOnlyStore extends MemoryCredentialStore {
  override async write(): Promise<void> {
    throw new Error('EACCES: permission denied');
  }
}

describe('ensureIdentity store failures', () => {
  it('returns a failed outcome when the env file cannot be written', async () => {
    const node = new ReadOnlyStore('memory:node');
    const result = await ensureIdentity(node, 'example-org', async () => succeed(keypair));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('EXTERNAL_TOOL_FAILURE');
    expect(result.error.message).toBe('Cannot update memory:node: EACCES: permission denied');
  });
});

describe('containerKeypairSource', () => {
  const target = { composeFile: 'docker-compose.yml', projectName: 'veriscope', projectDir: '/srv' };

  it('runs the generator in a throwaway node container', async () => {
    const executor = new FakeExecutor().on('node -e', exited(0, `${keypairJson}\n`));
    const result = await containerKeypairSource(new ComposeClient(executor, target))();

    expect(result.ok && result.value).toEqual(keypair);
    expect(executor.calls[0]?.args.slice(0, 10)).toEqual([
      'compose', '-f', 'docker-compose.yml', '-p', 'veriscope', 'run', '--rm', '-T', '--no-deps', 'ta-node',
    ]);
  });

  it('fails when the container exits non-zero', async () => {
    const executor = new FakeExecutor().on('node -e', exited(1, '', "Cannot find module 'ethers'"));
    const result = await containerKeypairSource(new ComposeClient(executor, target))();

    expect(!result.ok && result.error.code).toBe('EXTERNAL_TOOL_FAILURE');
  });
});
