/**
 * @module command-executor
 * Runs external tools with a timeout and captures exit code and output.
 *
 * `run()` never rejects because a tool failed. A non-zero exit, a timeout
 * and a spawn failure are three distinct result kinds that callers narrow on:
 * "the dependency has not started yet" (timeout) is treated differently from
 * "the dependency rejected the request" (exited, non-zero).
 */

import { spawn } from 'node:child_process';

// =====================================================================
// Public Interfaces
// =====================================================================

export interface RunOptions {
  /** Maximum execution time in milliseconds (default 60 000) */
  timeoutMs?: number;
  cwd?: string;
  env?: Record<string, string>;
  /** Written to stdin, then stdin is closed */
  input?: string;
  /** Attach the child to the caller's terminal; output is not captured */
  interactive?: boolean;
}

interface ResultBase {
  stdout: string;
  stderr: string;
  /** Wall-clock duration in ms */
  duration: number;
}

export type CommandResult =
  | (ResultBase & { kind: 'exited'; exitCode: number })
  | (ResultBase & { kind: 'timeout'; exitCode: null })
  | (ResultBase & { kind: 'spawn_error'; exitCode: null });

export interface CommandExecutor {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;

/** Exited with code 0. */
export function succeeded(result: CommandResult): boolean {
  return result.kind === 'exited' && result.exitCode === 0;
}

/** One-line description for error messages and logs. */
export function describeResult(command: string, args: string[], result: CommandResult): string {
  const line = [command, ...args].join(' ');
  switch (result.kind) {
    case 'exited': {
      const stderr = result.stderr.trim();
      return stderr
        ? `\`${line}\` exited with code ${result.exitCode}: ${lastLines(stderr, 5)}`
        : `\`${line}\` exited with code ${result.exitCode}`;
    }
    case 'timeout':
      return `\`${line}\` timed out after ${result.duration}ms`;
    case 'spawn_error':
      return `\`${line}\` could not be started: ${result.stderr}`;
  }
}

function lastLines(text: string, count: number): string {
  return text.split('\n').slice(-count).join('\n');
}

// =====================================================================
// ProcessExecutor
// =====================================================================

/**
 * {@link CommandExecutor} backed by `child_process.spawn`.
 *
 * On timeout the child receives SIGTERM, then SIGKILL two seconds later.
 */
export class ProcessExecutor implements CommandExecutor {
  constructor(private readonly defaults: { cwd?: string; env?: Record<string, string> } = {}) {}

  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    const start = Date.now();

    return new Promise<CommandResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;

      const settle = (result: CommandResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        resolve(result);
      };

      const proc = spawn(command, args, {
        cwd: options.cwd ?? this.defaults.cwd,
        env: { ...process.env, ...this.defaults.env, ...options.env },
        stdio: options.interactive ? 'inherit' : ['pipe', 'pipe', 'pipe'],
      });

      let killTimer: ReturnType<typeof setTimeout> | undefined;
      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGTERM');
        killTimer = setTimeout(() => proc.kill('SIGKILL'), 2000);
      }, timeoutMs);

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      if (proc.stdin) {
        // The child may exit without draining its input; its exit status decides.
        proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code !== 'EPIPE') stderr += `stdin: ${err.message}\n`;
        });
        if (options.input !== undefined) proc.stdin.write(options.input);
        proc.stdin.end();
      }

      proc.on('error', (err) => {
        settle({ kind: 'spawn_error', exitCode: null, stdout, stderr: err.message, duration: Date.now() - start });
      });

      proc.on('close', (code) => {
        const duration = Date.now() - start;
        if (timedOut) {
          settle({ kind: 'timeout', exitCode: null, stdout, stderr, duration });
          return;
        }
        // Killed by a signal without our timer: report as a failed exit
        settle({ kind: 'exited', exitCode: code ?? 1, stdout, stderr, duration });
      });
    });
  }
}
