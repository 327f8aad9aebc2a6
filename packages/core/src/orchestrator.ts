/**
 * @module orchestrator
 * InstallOrchestrator: runs the fixed, numbered install phases in order.
 *
 * A failed required phase stops the run and names the phase; phases already
 * completed are left as they are. A failed optional phase becomes a warning.
 * Any phase that throws aborts the run, whatever its `required` flag.
 */

import type { Bus } from './types.js';
import { publish } from './event-bus.js';
import { DeployError, toStructuredError, type Outcome, type StructuredError } from './resilience/error-codes.js';

// =====================================================================
// Types
// =====================================================================

export interface PhaseContext {
  interactive: boolean;
}

export interface InstallPhase {
  /** 1-based position in the sequence */
  readonly ordinal: number;
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
  action(context: PhaseContext): Promise<Outcome<unknown>>;
}

export type PhaseStatus = 'ok' | 'warning' | 'failed' | 'skipped';

export interface PhaseReport {
  ordinal: number;
  name: string;
  status: PhaseStatus;
  warnings: string[];
  duration: number;
  error?: StructuredError;
}

export interface InstallReport {
  status: 'completed' | 'aborted';
  phases: PhaseReport[];
  failure?: { ordinal: number; name: string; error: StructuredError };
  duration: number;
}

export interface RunOptions {
  /** Resume at this ordinal; earlier phases are reported as skipped */
  from?: number;
  interactive?: boolean;
}

/** "phase 9 (readiness wait)" */
export function describePhase(phase: Pick<InstallPhase, 'ordinal' | 'name'>): string {
  return `phase ${phase.ordinal} (${phase.name})`;
}

// =====================================================================
// InstallOrchestrator
// =====================================================================

export class InstallOrchestrator {
  private readonly phases: readonly InstallPhase[];

  constructor(
    phases: readonly InstallPhase[],
    private readonly bus?: Bus,
  ) {
    phases.forEach((phase, index) => {
      if (phase.ordinal !== index + 1) {
        throw new DeployError('CONFIGURATION_ERROR', `Install phases out of order: expected ${index + 1}, got ${phase.ordinal} (${phase.name})`);
      }
    });
    this.phases = phases;
  }

  list(): readonly InstallPhase[] {
    return this.phases;
  }

  async run(options: RunOptions = {}): Promise<InstallReport> {
    const from = options.from ?? 1;
    if (!Number.isInteger(from) || from < 1 || from > this.phases.length) {
      throw new DeployError('VALIDATION_FAILED', `--from must be between 1 and ${this.phases.length}, got ${from}`);
    }

    const context: PhaseContext = { interactive: options.interactive ?? true };
    const start = Date.now();
    const reports: PhaseReport[] = [];
    publish(this.bus, 'install', 'install_start', { from, phases: this.phases.length });

    for (const phase of this.phases) {
      if (phase.ordinal < from) {
        reports.push({ ordinal: phase.ordinal, name: phase.name, status: 'skipped', warnings: [], duration: 0 });
        continue;
      }

      publish(this.bus, 'install', 'phase_start', { ordinal: phase.ordinal, name: phase.name });
      const phaseStart = Date.now();
      let outcome: Outcome<unknown>;
      let thrown = false;
      try {
        outcome = await phase.action(context);
      } catch (err) {
        thrown = true;
        outcome = { ok: false, error: toStructuredError(err) };
      }
      const duration = Date.now() - phaseStart;

      if (outcome.ok) {
        const report: PhaseReport = {
          ordinal: phase.ordinal,
          name: phase.name,
          status: outcome.warnings.length > 0 ? 'warning' : 'ok',
          warnings: outcome.warnings,
          duration,
        };
        reports.push(report);
        publish(this.bus, 'install', 'phase_end', { ordinal: phase.ordinal, status: report.status, warnings: report.warnings });
        continue;
      }

      if (!phase.required && !thrown) {
        reports.push({
          ordinal: phase.ordinal,
          name: phase.name,
          status: 'warning',
          warnings: [outcome.error.message],
          duration,
          error: outcome.error,
        });
        publish(this.bus, 'install', 'phase_end', { ordinal: phase.ordinal, status: 'warning', warnings: [outcome.error.message] });
        continue;
      }

      reports.push({ ordinal: phase.ordinal, name: phase.name, status: 'failed', warnings: [], duration, error: outcome.error });
      const failure = { ordinal: phase.ordinal, name: phase.name, error: outcome.error };
      publish(this.bus, 'install', 'install_aborted', { ordinal: phase.ordinal, name: phase.name, code: outcome.error.code });
      return { status: 'aborted', phases: reports, failure, duration: Date.now() - start };
    }

    publish(this.bus, 'install', 'install_complete', { duration: Date.now() - start });
    return { status: 'completed', phases: reports, duration: Date.now() - start };
  }
}
