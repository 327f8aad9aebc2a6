/**
 * @module application/app-setup
 * Application-level setup steps run inside service containers.
 */

import type { Bus, CredentialStore } from '../types.js';
import type { CommandResult } from '../command-executor.js';
import { describeResult, succeeded } from '../command-executor.js';
import type { ExecOptions } from '../compose-engine.js';
import type { AppStep } from '../config-loader.js';
import { parseDuration } from '../config-loader.js';
import { publish } from '../event-bus.js';
import { fail, succeed, type Outcome } from '../resilience/error-codes.js';

export interface AppSetupCompose {
  exec(service: string, argv: string[], options?: ExecOptions): Promise<CommandResult>;
}

export type StepStatus = 'ok' | 'failed' | 'skipped';

export interface StepReport {
  name: string;
  status: StepStatus;
  required: boolean;
  duration: number;
  error?: string;
}

export interface AppSetupOptions {
  compose: AppSetupCompose;
  /** Service used by steps that name none */
  service: string;
  /** Consulted by `skipIfKey` */
  dashboardEnv: CredentialStore;
  adminCommand: string[];
  bus?: Bus;
}

export const ENCRYPT_GENERATE_COMMAND = ['php', 'artisan', 'encrypt:generate'];

const STEP_TIMEOUT_MS = 10 * 60_000;
const ADMIN_TIMEOUT_MS = 30 * 60_000;

export class AppSetup {
  constructor(private readonly options: AppSetupOptions) {}

  /**
   * Run steps in order. A failed required step stops the run and fails it;
   * a failed optional step becomes a warning.
   */
  async runSteps(steps: readonly AppStep[]): Promise<Outcome<StepReport[]>> {
    const reports: StepReport[] = [];
    const warnings: string[] = [];

    for (const step of steps) {
      const report = await this.runStep(step);
      reports.push(report);
      publish(this.options.bus, 'install', 'app_step', { name: report.name, status: report.status });

      if (report.status !== 'failed') continue;
      if (step.required) {
        return fail('EXTERNAL_TOOL_FAILURE', `Setup step "${step.name}" failed: ${report.error ?? 'unknown error'}`, {
          step: step.name,
          steps: reports,
        });
      }
      warnings.push(`${step.name}: ${report.error ?? 'failed'}`);
    }
    return succeed(reports, warnings);
  }

  /** Every failure is a warning, whatever the step says. */
  async runOptional(steps: readonly AppStep[]): Promise<Outcome<StepReport[]>> {
    return this.runSteps(steps.map((step) => ({ ...step, required: false })));
  }

  /**
   * Interactive admin creation on an inherited TTY. Non-interactive runs are
   * skipped with the command to run later.
   */
  async createAdmin(interactive: boolean): Promise<Outcome<'created' | 'skipped'>> {
    const { compose, service, adminCommand } = this.options;
    if (!interactive) {
      return succeed('skipped', [`Admin user not created; run \`berth app create-admin\` (${adminCommand.join(' ')})`]);
    }
    const result = await compose.exec(service, adminCommand, { interactive: true, timeoutMs: ADMIN_TIMEOUT_MS });
    if (!succeeded(result)) {
      return fail('EXTERNAL_TOOL_FAILURE', `Admin creation failed: ${describeResult(adminCommand[0] ?? 'admin', adminCommand.slice(1), result)}`);
    }
    return succeed('created');
  }

  /**
   * Replace the application's encryption key. Data encrypted under the old
   * key can no longer be read.
   */
  async regenerateEncryptionKey(): Promise<Outcome<void>> {
    const { compose, service } = this.options;
    const [command = '', ...args] = ENCRYPT_GENERATE_COMMAND;
    const result = await compose.exec(service, ENCRYPT_GENERATE_COMMAND, { input: 'yes\n', timeoutMs: STEP_TIMEOUT_MS });
    if (!succeeded(result)) {
      return fail('EXTERNAL_TOOL_FAILURE', `Encryption key regeneration failed: ${describeResult(command, args, result)}`);
    }
    publish(this.options.bus, 'install', 'encryption_key_regenerated', { service });
    return succeed(undefined);
  }

  private async runStep(step: AppStep): Promise<StepReport> {
    const start = Date.now();
    const base = { name: step.name, required: step.required };

    if (step.skipIfKey !== undefined) {
      let present: string | undefined;
      try {
        present = await this.options.dashboardEnv.read(step.skipIfKey);
      } catch (err) {
        return { ...base, status: 'failed', duration: Date.now() - start, error: err instanceof Error ? err.message : String(err) };
      }
      if (present !== undefined && present !== '') {
        return { ...base, status: 'skipped', duration: 0 };
      }
    }

    const [command = '', ...args] = step.command;
    const result = await this.options.compose.exec(step.service ?? this.options.service, step.command, {
      input: step.input,
      timeoutMs: step.timeout ? parseDuration(step.timeout) : STEP_TIMEOUT_MS,
    });
    if (succeeded(result)) {
      return { ...base, status: 'ok', duration: Date.now() - start };
    }
    return { ...base, status: 'failed', duration: Date.now() - start, error: describeResult(command, args, result) };
  }
}
