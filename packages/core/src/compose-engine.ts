/**
 * @module compose-engine
 * Container orchestration through the `docker compose` and `docker` CLIs.
 *
 * Argument builders are exported for testing; {@link ComposeClient} runs
 * them through a {@link CommandExecutor} so every call can be faked.
 */

import type { CommandExecutor, CommandResult, RunOptions } from './command-executor.js';
import { describeResult, succeeded } from './command-executor.js';
import { fail, succeed, type Outcome } from './resilience/error-codes.js';

// =====================================================================
// Public Interfaces
// =====================================================================

/** Which compose project the client talks to. */
export interface ComposeTarget {
  composeFile: string;
  projectName: string;
  /** Working directory for every docker invocation */
  projectDir: string;
}

export interface UpOptions {
  /** Do not start linked services */
  noDeps?: boolean;
}

export interface ExecOptions {
  /** Written to the command's stdin */
  input?: string;
  /** Attach a TTY (for prompts); output is not captured */
  interactive?: boolean;
  timeoutMs?: number;
}

export interface RunOnceOptions {
  entrypoint?: string;
  /** Do not start linked services */
  noDeps?: boolean;
  timeoutMs?: number;
}

const BUILD_TIMEOUT_MS = 30 * 60_000;
const LIFECYCLE_TIMEOUT_MS = 5 * 60_000;
const QUERY_TIMEOUT_MS = 15_000;

// =====================================================================
// Command Builders (exported for testing)
// =====================================================================

/** `docker compose -f <file> -p <project> ...rest` */
export function buildComposeArgs(target: ComposeTarget, ...rest: string[]): string[] {
  return ['compose', '-f', target.composeFile, '-p', target.projectName, ...rest];
}

export function buildUpArgs(target: ComposeTarget, services: string[] = [], options: UpOptions = {}): string[] {
  const args = ['up', '-d'];
  if (options.noDeps) args.push('--no-deps');
  return buildComposeArgs(target, ...args, ...services);
}

export function buildDownArgs(target: ComposeTarget, options: { removeOrphans?: boolean } = {}): string[] {
  const args = ['down'];
  if (options.removeOrphans) args.push('--remove-orphans');
  return buildComposeArgs(target, ...args);
}

export function buildExecArgs(
  target: ComposeTarget,
  service: string,
  argv: string[],
  options: { interactive?: boolean } = {},
): string[] {
  const args = ['exec'];
  if (!options.interactive) args.push('-T');
  return buildComposeArgs(target, ...args, service, ...argv);
}

export function buildRunOnceArgs(
  target: ComposeTarget,
  service: string,
  argv: string[],
  options: { entrypoint?: string; noDeps?: boolean } = {},
): string[] {
  const args = ['run', '--rm', '-T'];
  if (options.noDeps) args.push('--no-deps');
  if (options.entrypoint) args.push('--entrypoint', options.entrypoint);
  return buildComposeArgs(target, ...args, service, ...argv);
}

/** Parse `docker compose ps --services` output into service names. */
export function parseServiceList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// =====================================================================
// ComposeClient
// =====================================================================

export class ComposeClient {
  constructor(
    private readonly executor: CommandExecutor,
    readonly target: ComposeTarget,
  ) {}

  /** Docker volume name of a project resource. */
  volumeName(resource: string): string {
    return `${this.target.projectName}_${resource}`;
  }

  async build(services: string[] = []): Promise<Outcome> {
    return this.expect(buildComposeArgs(this.target, 'build', ...services), { timeoutMs: BUILD_TIMEOUT_MS });
  }

  async up(services: string[] = [], options: UpOptions = {}): Promise<Outcome> {
    return this.expect(buildUpArgs(this.target, services, options), { timeoutMs: LIFECYCLE_TIMEOUT_MS });
  }

  async down(options: { removeOrphans?: boolean } = {}): Promise<Outcome> {
    return this.expect(buildDownArgs(this.target, options), { timeoutMs: LIFECYCLE_TIMEOUT_MS });
  }

  async stop(services: string[]): Promise<Outcome> {
    return this.expect(buildComposeArgs(this.target, 'stop', ...services), { timeoutMs: LIFECYCLE_TIMEOUT_MS });
  }

  async restart(services: string[]): Promise<Outcome> {
    return this.expect(buildComposeArgs(this.target, 'restart', ...services), { timeoutMs: LIFECYCLE_TIMEOUT_MS });
  }

  /** Run a command in a running service container. Never rejects. */
  exec(service: string, argv: string[], options: ExecOptions = {}): Promise<CommandResult> {
    return this.docker(buildExecArgs(this.target, service, argv, options), {
      input: options.input,
      interactive: options.interactive,
      timeoutMs: options.timeoutMs ?? LIFECYCLE_TIMEOUT_MS,
    });
  }

  /** Run a command in a throwaway container of a service. Never rejects. */
  runOnce(service: string, argv: string[], options: RunOnceOptions = {}): Promise<CommandResult> {
    return this.docker(buildRunOnceArgs(this.target, service, argv, options), {
      timeoutMs: options.timeoutMs ?? LIFECYCLE_TIMEOUT_MS,
    });
  }

  /** Running service names, or `null` when compose could not be queried. */
  async runningServices(): Promise<string[] | null> {
    const result = await this.docker(
      buildComposeArgs(this.target, 'ps', '--services', '--status', 'running'),
      { timeoutMs: QUERY_TIMEOUT_MS },
    );
    return succeeded(result) ? parseServiceList(result.stdout) : null;
  }

  async isRunning(service: string): Promise<boolean> {
    const running = await this.runningServices();
    return running?.includes(service) ?? false;
  }

  /** Id of the service's container, running or stopped; `null` when there is none. */
  async containerId(service: string): Promise<string | null> {
    const result = await this.docker(buildComposeArgs(this.target, 'ps', '-aq', service), { timeoutMs: QUERY_TIMEOUT_MS });
    if (!succeeded(result)) return null;
    return parseServiceList(result.stdout)[0] ?? null;
  }

  /** `docker cp` between the host and a container (`<id>:<path>` on either side). */
  async copy(source: string, destination: string): Promise<Outcome> {
    return this.expect(['cp', source, destination], { timeoutMs: LIFECYCLE_TIMEOUT_MS });
  }

  // ── Volumes ─────────────────────────────────────────────────────────

  async volumeExists(volume: string): Promise<boolean> {
    const result = await this.docker(['volume', 'inspect', volume], { timeoutMs: QUERY_TIMEOUT_MS });
    return succeeded(result);
  }

  async removeVolume(volume: string): Promise<Outcome> {
    return this.expect(['volume', 'rm', volume], { timeoutMs: QUERY_TIMEOUT_MS });
  }

  /** Volume names starting with `prefix`; empty when docker is unreachable. */
  async listVolumes(prefix: string): Promise<string[]> {
    const result = await this.docker(['volume', 'ls', '--format', '{{.Name}}'], { timeoutMs: QUERY_TIMEOUT_MS });
    if (!succeeded(result)) return [];
    return parseServiceList(result.stdout).filter((name) => name.startsWith(prefix));
  }

  // ── Plain docker ────────────────────────────────────────────────────

  /** `docker run --rm ...` for one-off helper containers. */
  async runContainer(args: string[], timeoutMs = LIFECYCLE_TIMEOUT_MS): Promise<Outcome> {
    return this.expect(['run', '--rm', ...args], { timeoutMs });
  }

  /** Force-remove containers whose name matches a filter. */
  async removeContainers(nameFilter: string): Promise<string[]> {
    const list = await this.docker(['ps', '-aq', '--filter', `name=${nameFilter}`], { timeoutMs: QUERY_TIMEOUT_MS });
    const ids = succeeded(list) ? parseServiceList(list.stdout) : [];
    if (ids.length > 0) {
      await this.docker(['rm', '-f', ...ids], { timeoutMs: QUERY_TIMEOUT_MS });
    }
    return ids;
  }

  docker(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return this.executor.run('docker', args, { cwd: this.target.projectDir, ...options });
  }

  private async expect(args: string[], options: RunOptions): Promise<Outcome> {
    const result = await this.docker(args, options);
    if (succeeded(result)) return succeed(undefined);
    return fail('EXTERNAL_TOOL_FAILURE', describeResult('docker', args, result), {
      kind: result.kind,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
}
