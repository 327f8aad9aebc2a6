/**
 * @module readiness-gate
 * Bounded polling of side-effect-free readiness probes.
 *
 * The wait blocks the calling phase for at most `timeoutSeconds` and sleeps a
 * fixed interval between attempts. Time comes from an injectable
 * {@link Clock}, so the same loop runs under timers or a fake scheduler.
 */

import type { Bus, Clock, Probe, ServiceDescriptor } from './types.js';
import { systemClock } from './types.js';
import { publish } from './event-bus.js';
import { createStructuredError, DeployError, type StructuredError } from './resilience/error-codes.js';

// =====================================================================
// Types
// =====================================================================

export interface GateOptions {
  intervalSeconds: number;
  timeoutSeconds: number;
  clock?: Clock;
}

export type ReadyResult =
  | { status: 'ready'; attempts: number; elapsedMs: number }
  | { status: 'timed_out'; attempts: number; elapsedMs: number; lastError?: string };

export interface AllReadyResult {
  /** True when every service became ready */
  ok: boolean;
  ready: string[];
  notReady: Array<{ name: string; attempts: number; elapsedMs: number; lastError?: string }>;
}

export const DEFAULT_INTERVAL_SECONDS = 2;

// =====================================================================
// awaitReady
// =====================================================================

/**
 * Invoke `probe` until it reports ready or `timeoutSeconds` elapse.
 *
 * A probe that throws counts as "not ready". Never rejects for a failing
 * probe; returns `timed_out` instead.
 */
export async function awaitReady(probe: Probe, options: GateOptions): Promise<ReadyResult> {
  if (!(options.intervalSeconds > 0) || !(options.timeoutSeconds >= 0)) {
    throw new DeployError('VALIDATION_FAILED', 'Readiness interval must be positive and timeout non-negative', {
      intervalSeconds: options.intervalSeconds,
      timeoutSeconds: options.timeoutSeconds,
    });
  }

  const clock = options.clock ?? systemClock;
  const intervalMs = options.intervalSeconds * 1000;
  const timeoutMs = options.timeoutSeconds * 1000;
  const start = clock.now();
  let attempts = 0;
  let lastError: string | undefined;

  for (;;) {
    attempts++;
    let ready = false;
    try {
      ready = await probe();
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
    }

    const elapsedMs = clock.now() - start;
    if (ready) return { status: 'ready', attempts, elapsedMs };
    if (elapsedMs >= timeoutMs) return { status: 'timed_out', attempts, elapsedMs, lastError };

    await clock.sleep(Math.min(intervalMs, timeoutMs - elapsedMs));
  }
}

// =====================================================================
// awaitAllReady
// =====================================================================

export interface AllReadyOptions {
  intervalSeconds: number;
  /** Applied to services without their own `timeoutSeconds` */
  timeoutSeconds: number;
  clock?: Clock;
  bus?: Bus;
}

/**
 * Gate every service in turn, each with its own timeout. Failures are
 * collected, so the caller sees every service that is not ready.
 */
export async function awaitAllReady(services: ServiceDescriptor[], options: AllReadyOptions): Promise<AllReadyResult> {
  const ready: string[] = [];
  const notReady: AllReadyResult['notReady'] = [];

  for (const service of services) {
    publish(options.bus, 'install', 'readiness_wait', { service: service.name });
    const result = await awaitReady(service.probe, {
      intervalSeconds: options.intervalSeconds,
      timeoutSeconds: service.timeoutSeconds ?? options.timeoutSeconds,
      clock: options.clock,
    });

    if (result.status === 'ready') {
      ready.push(service.name);
      publish(options.bus, 'install', 'service_ready', { service: service.name, elapsedMs: result.elapsedMs });
    } else {
      notReady.push({ name: service.name, attempts: result.attempts, elapsedMs: result.elapsedMs, lastError: result.lastError });
      publish(options.bus, 'install', 'service_not_ready', { service: service.name, elapsedMs: result.elapsedMs });
    }
  }

  return { ok: notReady.length === 0, ready, notReady };
}

/** DEPENDENCY_UNREADY error naming every service that did not come up. */
export function unreadyError(notReady: AllReadyResult['notReady']): StructuredError {
  const names = notReady.map((s) => s.name).join(', ');
  return createStructuredError('DEPENDENCY_UNREADY', `Services not ready: ${names}`, {
    services: notReady,
  });
}
