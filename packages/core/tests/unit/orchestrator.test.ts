/**
 * Unit tests for InstallOrchestrator: ordering, halting on a required
 * failure, optional failures as warnings, and resuming with `from`.
 */

import { describe, it, expect, vi } from 'vitest';
import { InstallOrchestrator, describePhase, type InstallPhase } from '../../src/orchestrator.js';
import { createEventBus } from '../../src/event-bus.js';
import { DeployError, fail, succeed, type Outcome } from '../../src/resilience/error-codes.js';

function phase(
  ordinal: number,
  action: () => Promise<Outcome<unknown>> = async () => succeed(undefined),
  required = true,
): InstallPhase {
  return {
    ordinal,
    name: `step-${ordinal}`,
    description: `Phase ${ordinal}`,
    required,
    action: vi.fn(action),
  };
}

describe('InstallOrchestrator', () => {
  it('rejects phases out of order', () => {
    expect(() => new InstallOrchestrator([phase(1), phase(3)])).toThrow(
      'Install phases out of order: expected 2, got 3 (step-3)',
    );
  });

  it('runs every phase and completes', async () => {
    const phases = [phase(1), phase(2, async () => succeed(undefined, ['port 80 in use'])), phase(3)];
    const report = await new InstallOrchestrator(phases).run({ interactive: false });

    expect(report.status).toBe('completed');
    expect(report.failure).toBeUndefined();
    expect(report.phases.map((p) => [p.ordinal, p.status])).toEqual([
      [1, 'ok'],
      [2, 'warning'],
      [3, 'ok'],
    ]);
    expect(report.phases[1]?.warnings).toEqual(['port 80 in use']);
    expect(phases[0]?.action).toHaveBeenCalledWith({ interactive: false });
  });

  it('halts at a failed required phase and names it', async () => {
    const phases = [phase(1), phase(2, async () => fail('DEPENDENCY_UNREADY', 'postgres not ready')), phase(3)];
    const report = await new InstallOrchestrator(phases).run();

    expect(report.status).toBe('aborted');
    expect(report.failure).toMatchObject({ ordinal: 2, name: 'step-2', error: { code: 'DEPENDENCY_UNREADY', message: 'postgres not ready' } });
    expect(report.phases.map((p) => p.status)).toEqual(['ok', 'failed']);
    expect(phases[2]?.action).not.toHaveBeenCalled();
  });

  it('continues past a failed optional phase', async () => {
    const phases = [phase(1, async () => fail('EXTERNAL_TOOL_FAILURE', 'certbot refused'), false), phase(2)];
    const report = await new InstallOrchestrator(phases).run();

    expect(report.status).toBe('completed');
    expect(report.phases[0]).toMatchObject({ status: 'warning', warnings: ['certbot refused'] });
    expect(phases[1]?.action).toHaveBeenCalledTimes(1);
  });

  it('aborts when an optional phase throws', async () => {
    const phases = [
      phase(1, async () => {
        throw new DeployError('CONFIGURATION_ERROR', 'bad template');
      }, false),
      phase(2),
    ];
    const report = await new InstallOrchestrator(phases).run();
    expect(report.status).toBe('aborted');
    expect(report.failure?.error.code).toBe('CONFIGURATION_ERROR');
    expect(phases[1]?.action).not.toHaveBeenCalled();
  });

  it('resumes at `from`, reporting earlier phases as skipped', async () => {
    const phases = [phase(1), phase(2), phase(3)];
    const report = await new InstallOrchestrator(phases).run({ from: 3 });

    expect(report.phases.map((p) => p.status)).toEqual(['skipped', 'skipped', 'ok']);
    expect(phases[0]?.action).not.toHaveBeenCalled();
    expect(phases[2]?.action).toHaveBeenCalledTimes(1);
  });

  it.each([0, 4, 1.5])('refuses from=%s', async (from) => {
    await expect(new InstallOrchestrator([phase(1), phase(2), phase(3)]).run({ from })).rejects.toThrow(
      `--from must be between 1 and 3, got ${from}`,
    );
  });

  it('publishes progress on the install channel', async () => {
    const bus = createEventBus();
    const events: string[] = [];
    bus.subscribe('install', (msg) => events.push(msg.event));
    await new InstallOrchestrator([phase(1), phase(2, async () => fail('VALIDATION_FAILED', 'no'))], bus).run();
    expect(events).toEqual(['install_start', 'phase_start', 'phase_end', 'phase_start', 'install_aborted']);
  });
});

describe('describePhase', () => {
  it('names the ordinal and phase', () => {
    expect(describePhase({ ordinal: 9, name: 'readiness wait' })).toBe('phase 9 (readiness wait)');
  });
});
