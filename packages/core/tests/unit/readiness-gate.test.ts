/**
 * Unit tests for readiness-gate, driven by a virtual clock.
 */

import { describe, it, expect } from 'vitest';
import { awaitAllReady, awaitReady, unreadyError } from '../../src/readiness-gate.js';
import { createEventBus } from '../../src/event-bus.js';
import { DeployError } from '../../src/resilience/error-codes.js';
import type { ServiceDescriptor } from '../../src/types.js';
import { FakeClock } from './fakes.js';

function readyAfter(attempts: number): () => Promise<boolean> {
  let calls = 0;
  return async () => ++calls >= attempts;
}

describe('awaitReady', () => {
  it('returns ready as soon as the probe succeeds', async () => {
    const clock = new FakeClock();
    const result = await awaitReady(readyAfter(3), { intervalSeconds: 2, timeoutSeconds: 10, clock });
    expect(result).toEqual({ status: 'ready', attempts: 3, elapsedMs: 4000 });
  });

  it('times out after the full window with one attempt per interval', async () => {
    const clock = new FakeClock();
    const result = await awaitReady(async () => false, { intervalSeconds: 2, timeoutSeconds: 10, clock });

    expect(result).toEqual({ status: 'timed_out', attempts: 6, elapsedMs: 10_000, lastError: undefined });
    expect(clock.sleeps).toEqual([2000, 2000, 2000, 2000, 2000]);
  });

  it('shortens the last sleep to the remaining window', async () => {
    const clock = new FakeClock();
    const result = await awaitReady(async () => false, { intervalSeconds: 3, timeoutSeconds: 10, clock });

    expect(result.attempts).toBe(5);
    expect(clock.sleeps).toEqual([3000, 3000, 3000, 1000]);
  });

  it('treats a throwing probe as not ready and keeps its message', async () => {
    const clock = new FakeClock();
    const result = await awaitReady(async () => {
      throw new Error('connection refused');
    }, { intervalSeconds: 1, timeoutSeconds: 0, clock });

    expect(result).toEqual({ status: 'timed_out', attempts: 1, elapsedMs: 0, lastError: 'connection refused' });
  });

  it('rejects a non-positive interval', async () => {
    await expect(awaitReady(async () => true, { intervalSeconds: 0, timeoutSeconds: 10 })).rejects.toThrow(DeployError);
  });
});

describe('awaitAllReady', () => {
  it('collects every service that does not become ready', async () => {
    const clock = new FakeClock();
    const bus = createEventBus();
    const events: string[] = [];
    bus.subscribe('install', (msg) => events.push(msg.event));

    const services: ServiceDescriptor[] = [
      { name: 'postgres', dependsOn: [], probe: readyAfter(1) },
      { name: 'nethermind', dependsOn: [], probe: async () => false, timeoutSeconds: 4 },
    ];
    const result = await awaitAllReady(services, { intervalSeconds: 2, timeoutSeconds: 10, clock, bus });

    expect(result.ok).toBe(false);
    expect(result.ready).toEqual(['postgres']);
    expect(result.notReady).toEqual([{ name: 'nethermind', attempts: 3, elapsedMs: 4000, lastError: undefined }]);
    expect(events).toEqual(['readiness_wait', 'service_ready', 'readiness_wait', 'service_not_ready']);

    const error = unreadyError(result.notReady);
    expect(error.code).toBe('DEPENDENCY_UNREADY');
    expect(error.message).toBe('Services not ready: nethermind');
  });
});
