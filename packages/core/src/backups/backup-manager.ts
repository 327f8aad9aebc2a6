/**
 * @module backups/backup-manager
 * Database, cache and env-file backups for a running deployment.
 *
 * Every archive is gzip-compressed and verified after it is written:
 *
 * - `postgres-<stamp>.sql.gz`: `pg_dump` of the application database
 * - `redis-<stamp>.rdb.gz`: the cache's `dump.rdb` after a `SAVE`
 * - `app-files-<stamp>.tar.gz`: the root, node and dashboard env files
 *
 * Restores and retention cleanup take a confirmation phrase and touch
 * nothing when it does not match.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import { gunzip as gunzipCallback, gzip as gzipCallback } from 'node:zlib';
import type { Readable } from 'node:stream';
import * as tar from 'tar-stream';
import type { Bus, Clock, CredentialStore, Probe } from '../types.js';
import type { CommandExecutor, CommandResult } from '../command-executor.js';
import { describeResult, succeeded } from '../command-executor.js';
import type { ExecOptions, UpOptions } from '../compose-engine.js';
import { publish } from '../event-bus.js';
import { awaitReady } from '../readiness-gate.js';
import { systemClock } from '../types.js';
import { createStructuredError, fail, failWith, succeed, type Outcome, type StructuredError } from '../resilience/error-codes.js';
import { readDatabaseAccount, SERVICES } from '../topology.js';

const gzip = promisify(gzipCallback);
const gunzip = promisify(gunzipCallback);

// =====================================================================
// Types
// =====================================================================

/** The compose operations backups need. */
export interface BackupCompose {
  exec(service: string, argv: string[], options?: ExecOptions): Promise<CommandResult>;
  isRunning(service: string): Promise<boolean>;
  stop(services: string[]): Promise<Outcome>;
  up(services: string[], options?: UpOptions): Promise<Outcome>;
  containerId(service: string): Promise<string | null>;
  copy(source: string, destination: string): Promise<Outcome>;
}

export type BackupKind = 'database' | 'cache' | 'app_files';

export interface BackupEntry {
  kind: BackupKind;
  /** File name inside the backup directory */
  file: string;
  path: string;
  /** Bytes on disk */
  size: number;
  modifiedAt: Date;
}

export interface FullBackupResult {
  entries: BackupEntry[];
  failed: Array<{ kind: BackupKind; error: StructuredError }>;
}

export interface RestoreRequest {
  /** Absolute, or relative to the backup directory */
  file: string;
  /** Must equal {@link RESTORE_PHRASE} */
  confirmation: string;
  /** Accept an archive outside the backup and project directories */
  allowOutside?: boolean;
}

export interface AppFilesRestore {
  restored: string[];
  /** Archive of the env files that were overwritten, when any existed */
  preRestoreBackup: string | null;
}

export interface CleanRequest {
  days: number;
  /** Must equal {@link DELETE_PHRASE} */
  confirmation: string;
}

export interface CleanResult {
  deleted: string[];
  failed: Array<{ file: string; error: string }>;
}

export interface BackupManagerOptions {
  compose: BackupCompose;
  /** Runs `df` for the free-space check */
  executor: CommandExecutor;
  backupDir: string;
  projectDir: string;
  /** Compose env holding POSTGRES_USER / POSTGRES_DB */
  rootEnv: Pick<CredentialStore, 'read'>;
  /** Env files archived by {@link BackupManager.backupAppFiles}, relative to the project directory */
  envFiles: string[];
  databaseProbe: Probe;
  cacheProbe: Probe;
  readiness?: { intervalSeconds: number; timeoutSeconds: number };
  clock?: Clock;
  bus?: Bus;
}

export const RESTORE_PHRASE = 'yes';
export const DELETE_PHRASE = 'DELETE';

const PATTERNS: ReadonlyArray<[BackupKind, RegExp]> = [
  ['database', /^postgres-\d{8}-\d{6}\.sql\.gz$/],
  ['cache', /^redis-\d{8}-\d{6}\.rdb\.gz$/],
  ['app_files', /^app-files-\d{8}-\d{6}\.tar\.gz$/],
];

const REQUIRED_SPACE_MB: Record<BackupKind, number> = { database: 100, cache: 100, app_files: 50 };
const DUMP_TIMEOUT_MS = 30 * 60_000;
const CACHE_DUMP_PATH = '/data/dump.rdb';
const DAY_MS = 86_400_000;

// =====================================================================
// Helpers
// =====================================================================

/** `YYYYMMDD-HHMMSS` in UTC. */
export function backupStamp(epochMs: number): string {
  const iso = new Date(epochMs).toISOString();
  return `${iso.slice(0, 10).replaceAll('-', '')}-${iso.slice(11, 19).replaceAll(':', '')}`;
}

/** Backup kind of a file name, or `null` for anything else in the directory. */
export function classifyBackupFile(file: string): BackupKind | null {
  for (const [kind, pattern] of PATTERNS) {
    if (pattern.test(file)) return kind;
  }
  return null;
}

/** Available megabytes from `df -Pm` output. */
export function parseAvailableMb(stdout: string): number | null {
  const row = stdout.trim().split('\n')[1];
  const available = row?.trim().split(/\s+/)[3];
  if (available === undefined || !/^\d+$/.test(available)) return null;
  return Number(available);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function isInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

async function packTar(files: ReadonlyMap<string, Buffer>): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const pack = tar.pack();
    const chunks: Buffer[] = [];
    pack.on('data', (chunk: Buffer) => chunks.push(chunk));
    pack.on('end', () => resolve(Buffer.concat(chunks)));
    pack.on('error', reject);

    for (const [name, content] of files) {
      pack.entry({ name, size: content.length, mode: 0o600 }, content);
    }
    pack.finalize();
  });
}

async function unpackTar(archive: Buffer): Promise<Map<string, Buffer>> {
  return new Promise((resolve, reject) => {
    const extract = tar.extract();
    const files = new Map<string, Buffer>();
    extract.on('entry', (header: tar.Headers, stream: Readable, next: (error?: unknown) => void) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        if (header.type === 'file') files.set(header.name, Buffer.concat(chunks));
        next();
      });
    });
    extract.on('finish', () => resolve(files));
    extract.on('error', reject);
    extract.end(archive);
  });
}

// =====================================================================
// BackupManager
// =====================================================================

export class BackupManager {
  private readonly clock: Clock;
  private readonly readiness: { intervalSeconds: number; timeoutSeconds: number };

  constructor(private readonly options: BackupManagerOptions) {
    this.clock = options.clock ?? systemClock;
    this.readiness = options.readiness ?? { intervalSeconds: 2, timeoutSeconds: 30 };
  }

  get directory(): string {
    return this.options.backupDir;
  }

  // ── Backup ──────────────────────────────────────────────────────────

  async backupDatabase(): Promise<Outcome<BackupEntry>> {
    const prepared = await this.prepare('database');
    if (!prepared.ok) return prepared;

    const ready = await this.requireService(SERVICES.database, this.options.databaseProbe);
    if (!ready.ok) return this.failed('database', ready.error);

    const { user, database } = await readDatabaseAccount(this.options.rootEnv);
    const argv = ['pg_dump', '-U', user, database];
    const dump = await this.options.compose.exec(SERVICES.database, argv, { timeoutMs: DUMP_TIMEOUT_MS });
    if (!succeeded(dump)) {
      return this.failed('database', createStructuredError('EXTERNAL_TOOL_FAILURE', describeResult('pg_dump', argv.slice(1), dump), { service: SERVICES.database }));
    }
    if (dump.stdout.length === 0) {
      return this.failed('database', createStructuredError('VERIFICATION_FAILED', 'pg_dump produced no output', { database }));
    }

    const file = path.join(this.options.backupDir, `postgres-${backupStamp(this.clock.now())}.sql.gz`);
    await fs.writeFile(file, await gzip(Buffer.from(dump.stdout, 'utf8')), { mode: 0o600 });
    return this.finish('database', file, prepared.warnings);
  }

  async backupCache(): Promise<Outcome<BackupEntry>> {
    const prepared = await this.prepare('cache');
    if (!prepared.ok) return prepared;

    const { compose } = this.options;
    if (!(await compose.isRunning(SERVICES.cache))) {
      return this.failed('cache', createStructuredError('DEPENDENCY_UNREADY', `${SERVICES.cache} is not running`, { service: SERVICES.cache }));
    }

    const save = await compose.exec(SERVICES.cache, ['redis-cli', 'SAVE']);
    if (!succeeded(save)) {
      return this.failed('cache', createStructuredError('EXTERNAL_TOOL_FAILURE', describeResult('redis-cli', ['SAVE'], save), { service: SERVICES.cache }));
    }

    const container = await compose.containerId(SERVICES.cache);
    if (container === null) {
      return this.failed('cache', createStructuredError('DEPENDENCY_UNREADY', `No ${SERVICES.cache} container found`, { service: SERVICES.cache }));
    }

    const file = path.join(this.options.backupDir, `redis-${backupStamp(this.clock.now())}.rdb.gz`);
    const raw = file.slice(0, -'.gz'.length);
    const copied = await compose.copy(`${container}:${CACHE_DUMP_PATH}`, raw);
    if (!copied.ok) return this.failed('cache', copied.error);

    try {
      await fs.writeFile(file, await gzip(await fs.readFile(raw)), { mode: 0o600 });
    } finally {
      await fs.rm(raw, { force: true });
    }
    return this.finish('cache', file, prepared.warnings);
  }

  /** Archive the env files that exist; `null` with a warning when there are none. */
  async backupAppFiles(): Promise<Outcome<BackupEntry | null>> {
    const prepared = await this.prepare('app_files');
    if (!prepared.ok) return prepared;

    const files = await this.readEnvFiles();
    if (files.size === 0) {
      return succeed(null, [...prepared.warnings, 'No env files found to back up']);
    }

    const file = path.join(this.options.backupDir, `app-files-${backupStamp(this.clock.now())}.tar.gz`);
    await fs.writeFile(file, await gzip(await packTar(files)), { mode: 0o600 });
    return this.finish('app_files', file, prepared.warnings);
  }

  /** Every kind in turn; a failing kind does not stop the others. */
  async fullBackup(): Promise<Outcome<FullBackupResult>> {
    const result: FullBackupResult = { entries: [], failed: [] };
    const warnings: string[] = [];
    const steps: Array<[BackupKind, () => Promise<Outcome<BackupEntry | null>>]> = [
      ['database', () => this.backupDatabase()],
      ['cache', () => this.backupCache()],
      ['app_files', () => this.backupAppFiles()],
    ];

    for (const [kind, step] of steps) {
      const outcome = await step();
      if (!outcome.ok) {
        result.failed.push({ kind, error: outcome.error });
        continue;
      }
      warnings.push(...outcome.warnings);
      if (outcome.value) result.entries.push(outcome.value);
    }

    publish(this.options.bus, 'backups', 'full_backup_complete', {
      files: result.entries.map((e) => e.file),
      failed: result.failed.map((f) => f.kind),
    });
    return succeed(result, warnings);
  }

  // ── Inspect ─────────────────────────────────────────────────────────

  /** Recognised archives in the backup directory, newest first. */
  async list(): Promise<BackupEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.options.backupDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const entries: BackupEntry[] = [];
    for (const file of names) {
      const kind = classifyBackupFile(file);
      if (kind === null) continue;
      const filePath = path.join(this.options.backupDir, file);
      const stat = await fs.stat(filePath);
      if (!stat.isFile()) continue;
      entries.push({ kind, file, path: filePath, size: stat.size, modifiedAt: stat.mtime });
    }
    return entries.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || b.file.localeCompare(a.file));
  }

  /**
   * The file exists, is not empty and decompresses; for env-file archives
   * the tar stream must also read to the end.
   */
  async verify(filePath: string): Promise<Outcome<{ size: number }>> {
    let content: Buffer;
    try {
      content = await fs.readFile(filePath);
    } catch (err) {
      return fail('VERIFICATION_FAILED', `Backup file not readable: ${filePath}: ${errorMessage(err)}`, { path: filePath });
    }
    if (content.length === 0) {
      return fail('VERIFICATION_FAILED', `Backup file is empty: ${filePath}`, { path: filePath });
    }

    try {
      const inflated = await gunzip(content);
      if (filePath.endsWith('.tar.gz')) await unpackTar(inflated);
    } catch (err) {
      return fail('VERIFICATION_FAILED', `Backup file is corrupted: ${filePath}: ${errorMessage(err)}`, { path: filePath });
    }
    return succeed({ size: content.length });
  }

  async findExpired(days: number): Promise<BackupEntry[]> {
    const cutoff = this.clock.now() - days * DAY_MS;
    return (await this.list()).filter((entry) => entry.modifiedAt.getTime() < cutoff);
  }

  // ── Retention ───────────────────────────────────────────────────────

  async cleanOld(request: CleanRequest): Promise<Outcome<CleanResult>> {
    if (!Number.isInteger(request.days) || request.days < 1) {
      return fail('VALIDATION_FAILED', `Retention must be a whole number of days, got ${request.days}`, { days: request.days });
    }

    const expired = await this.findExpired(request.days);
    const result: CleanResult = { deleted: [], failed: [] };
    if (expired.length === 0) return succeed(result);

    if (request.confirmation !== DELETE_PHRASE) {
      return fail('CONFIRMATION_MISMATCH', `Confirmation phrase did not match "${DELETE_PHRASE}"`, { operation: 'clean' });
    }

    for (const entry of expired) {
      try {
        await fs.unlink(entry.path);
        result.deleted.push(entry.file);
      } catch (err) {
        result.failed.push({ file: entry.file, error: errorMessage(err) });
      }
    }
    publish(this.options.bus, 'backups', 'backups_cleaned', { days: request.days, ...result });
    return succeed(result);
  }

  // ── Restore ─────────────────────────────────────────────────────────

  async restoreDatabase(request: RestoreRequest): Promise<Outcome<{ file: string }>> {
    const checked = await this.checkRestore(request);
    if (!checked.ok) return checked;
    const file = checked.value;

    const ready = await this.requireService(SERVICES.database, this.options.databaseProbe);
    if (!ready.ok) return ready;

    const sql = (await gunzip(await fs.readFile(file))).toString('utf8');
    const { user, database } = await readDatabaseAccount(this.options.rootEnv);
    const argv = ['psql', '-U', user, database];
    const restored = await this.options.compose.exec(SERVICES.database, argv, { input: sql, timeoutMs: DUMP_TIMEOUT_MS });
    if (!succeeded(restored)) {
      return fail('EXTERNAL_TOOL_FAILURE', describeResult('psql', argv.slice(1), restored), { file });
    }

    publish(this.options.bus, 'backups', 'restore_complete', { kind: 'database', file });
    return succeed({ file });
  }

  /** Stop the cache, replace its dump file and start it again. */
  async restoreCache(request: RestoreRequest): Promise<Outcome<{ file: string }>> {
    const checked = await this.checkRestore(request);
    if (!checked.ok) return checked;
    const file = checked.value;
    const { compose } = this.options;

    const stopped = await compose.stop([SERVICES.cache]);
    if (!stopped.ok) return stopped;

    const container = await compose.containerId(SERVICES.cache);
    if (container === null) {
      return fail('DEPENDENCY_UNREADY', `No ${SERVICES.cache} container found`, { service: SERVICES.cache });
    }

    const staged = path.join(this.options.backupDir, `.restore-${backupStamp(this.clock.now())}.rdb`);
    let copied: Outcome;
    try {
      await fs.writeFile(staged, await gunzip(await fs.readFile(file)), { mode: 0o600 });
      copied = await compose.copy(staged, `${container}:${CACHE_DUMP_PATH}`);
    } catch (err) {
      copied = fail('EXTERNAL_TOOL_FAILURE', `Cannot stage ${file}: ${errorMessage(err)}`, { file });
    } finally {
      await fs.rm(staged, { force: true });
    }

    // Started again even when the copy failed, with its old data.
    const started = await compose.up([SERVICES.cache], { noDeps: true });
    if (!copied.ok) return copied;
    if (!started.ok) return started;

    const ready = await awaitReady(this.options.cacheProbe, { ...this.readiness, clock: this.clock });
    if (ready.status === 'timed_out') {
      return fail('DEPENDENCY_UNREADY', `${SERVICES.cache} not ready after restore`, { service: SERVICES.cache, lastError: ready.lastError });
    }

    publish(this.options.bus, 'backups', 'restore_complete', { kind: 'cache', file });
    return succeed({ file });
  }

  /**
   * Write the archived env files back. The current files are archived to
   * `pre-restore-<stamp>.tar.gz` first; services must be restarted to see
   * the restored values.
   */
  async restoreAppFiles(request: RestoreRequest): Promise<Outcome<AppFilesRestore>> {
    const checked = await this.checkRestore(request);
    if (!checked.ok) return checked;
    const file = checked.value;

    const archived = await unpackTar(await gunzip(await fs.readFile(file)));
    for (const name of archived.keys()) {
      if (path.isAbsolute(name) || !isInside(this.options.projectDir, path.resolve(this.options.projectDir, name))) {
        return fail('VALIDATION_FAILED', `Archive entry escapes the project directory: ${name}`, { file, entry: name });
      }
    }

    let preRestoreBackup: string | null = null;
    const current = await this.readEnvFiles();
    if (current.size > 0) {
      preRestoreBackup = path.join(this.options.backupDir, `pre-restore-${backupStamp(this.clock.now())}.tar.gz`);
      await fs.writeFile(preRestoreBackup, await gzip(await packTar(current)), { mode: 0o600 });
    }

    for (const [name, content] of archived) {
      const target = path.resolve(this.options.projectDir, name);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, { mode: 0o600 });
    }

    const restored = [...archived.keys()];
    publish(this.options.bus, 'backups', 'restore_complete', { kind: 'app_files', file, restored });
    return succeed({ restored, preRestoreBackup }, ['Restart the services to apply the restored env files']);
  }

  // ── Internals ───────────────────────────────────────────────────────

  /** Writable backup directory with enough free space for `kind`. */
  private async prepare(kind: BackupKind): Promise<Outcome<void>> {
    const dir = this.options.backupDir;
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.access(dir, fs.constants.W_OK);
    } catch (err) {
      return this.failed(kind, createStructuredError('CONFIGURATION_ERROR', `Backup directory not writable: ${dir}: ${errorMessage(err)}`, { directory: dir }));
    }

    const required = REQUIRED_SPACE_MB[kind];
    const df = await this.options.executor.run('df', ['-Pm', dir], { timeoutMs: 5_000 });
    const available = succeeded(df) ? parseAvailableMb(df.stdout) : null;
    if (available === null) {
      return succeed(undefined, [`Could not check free space in ${dir}`]);
    }
    if (available < required) {
      return this.failed(kind, createStructuredError('DISK_SPACE_LOW', `Insufficient disk space: ${required}MB required, ${available}MB available`, {
        directory: dir,
        requiredMb: required,
        availableMb: available,
      }));
    }
    return succeed(undefined);
  }

  private async requireService(service: string, probe: Probe): Promise<Outcome<void>> {
    if (!(await this.options.compose.isRunning(service))) {
      return fail('DEPENDENCY_UNREADY', `${service} is not running`, { service });
    }
    const ready = await awaitReady(probe, { ...this.readiness, clock: this.clock });
    if (ready.status === 'timed_out') {
      return fail('DEPENDENCY_UNREADY', `${service} not ready after ${this.readiness.timeoutSeconds}s`, { service, lastError: ready.lastError });
    }
    return succeed(undefined);
  }

  /** Resolve, locate and verify the archive, then check the confirmation. */
  private async checkRestore(request: RestoreRequest): Promise<Outcome<string>> {
    const { backupDir, projectDir } = this.options;
    const file = path.resolve(backupDir, request.file);
    if (!request.allowOutside && !isInside(backupDir, file) && !isInside(projectDir, file)) {
      return fail('VALIDATION_FAILED', `Backup file is outside ${backupDir} and ${projectDir}: ${file}`, { file });
    }

    const verified = await this.verify(file);
    if (!verified.ok) return verified;

    if (request.confirmation !== RESTORE_PHRASE) {
      return fail('CONFIRMATION_MISMATCH', `Restore not confirmed (type "${RESTORE_PHRASE}" to continue)`, { file });
    }
    return succeed(file);
  }

  private async readEnvFiles(): Promise<Map<string, Buffer>> {
    const files = new Map<string, Buffer>();
    for (const relative of this.options.envFiles) {
      try {
        files.set(relative, await fs.readFile(path.resolve(this.options.projectDir, relative)));
      } catch (err) {
        if (!isMissing(err)) throw err;
      }
    }
    return files;
  }

  private async finish(kind: BackupKind, file: string, warnings: string[]): Promise<Outcome<BackupEntry>> {
    const verified = await this.verify(file);
    if (!verified.ok) return this.failed(kind, verified.error);

    const stat = await fs.stat(file);
    const entry: BackupEntry = { kind, file: path.basename(file), path: file, size: stat.size, modifiedAt: stat.mtime };
    publish(this.options.bus, 'backups', 'backup_created', { kind, file: entry.file, size: entry.size });
    return succeed(entry, warnings);
  }

  private failed<T>(kind: BackupKind, error: StructuredError): Outcome<T> {
    publish(this.options.bus, 'backups', 'backup_failed', { kind, code: error.code, message: error.message });
    return failWith(error);
  }
}
