import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileStore, MemoryStore, OperationLog, createStore, type OperationRecord } from '../../src/store.js';

function record(id: string, overrides: Partial<OperationRecord> = {}): OperationRecord {
  return { id, operation: 'install', project: 'anchor', status: 'running', startTime: 1000, ...overrides };
}

describe('MemoryStore', () => {
  it('returns newest first, filtered by project and limited', async () => {
    const store = new MemoryStore();
    await store.saveOperation(record('a'));
    await store.saveOperation(record('b', { project: 'other' }));
    await store.saveOperation(record('c'));

    expect((await store.getOperations()).map((r) => r.id)).toEqual(['c', 'b', 'a']);
    expect((await store.getOperations('anchor')).map((r) => r.id)).toEqual(['c', 'a']);
    expect((await store.getOperations(undefined, 1)).map((r) => r.id)).toEqual(['c']);
  });

  it('patches a record in place', async () => {
    const store = new MemoryStore();
    await store.saveOperation(record('a'));
    await store.updateOperation('a', { status: 'success', endTime: 2000 });
    await store.updateOperation('missing', { status: 'failed' });
    expect(await store.getOperations()).toEqual([record('a', { status: 'success', endTime: 2000 })]);
  });
});

describe('FileStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'berth-store-'));
    file = path.join(dir, 'logs', 'operations.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes on close and reloads', async () => {
    const store = new FileStore(file);
    await store.saveOperation(record('a', { status: 'success' }));
    await store.close();

    const reopened = new FileStore(file);
    expect(await reopened.getOperations()).toEqual([record('a', { status: 'success' })]);
    await reopened.close();
  });

  it('starts fresh from an unreadable log', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{"operations": "nope"}');
    const store = new FileStore(file);
    expect(await store.getOperations()).toEqual([]);
    await store.close();
  });

  it('is created by createStore', async () => {
    const store = createStore({ type: 'file', filePath: file });
    expect(store).toBeInstanceOf(FileStore);
    await store.close();
    expect(createStore()).toBeInstanceOf(MemoryStore);
  });
});

describe('OperationLog.track', () => {
  it('records start and success', async () => {
    const store = new MemoryStore();
    const log = new OperationLog(store, 'anchor');
    const value = await log.track('volumes.reset', async () => 42);

    expect(value).toBe(42);
    const [entry] = await log.recent();
    expect(entry).toMatchObject({ operation: 'volumes.reset', project: 'anchor', status: 'success' });
    expect(entry?.endTime).toBeGreaterThanOrEqual(entry?.startTime ?? 0);
  });

  it('maps the result through describe', async () => {
    const store = new MemoryStore();
    const log = new OperationLog(store, 'anchor');
    await log.track('install', async () => ({ ok: false }), () => ({ status: 'aborted', detail: 'phase 9' }));
    expect((await log.recent())[0]).toMatchObject({ status: 'aborted', detail: 'phase 9' });
  });

  it('records a thrown error and rethrows it', async () => {
    const store = new MemoryStore();
    const log = new OperationLog(store, 'anchor');
    await expect(log.track('destroy', async () => {
      throw new Error('docker unavailable');
    })).rejects.toThrow('docker unavailable');
    expect((await log.recent())[0]).toMatchObject({ status: 'failed', detail: 'docker unavailable' });
  });
});
