/**
 * @module commands/backup
 * `berth backup`: create, list, clean and restore deployment backups.
 *
 * `clean` and `restore` ask for their confirmation phrase unless it is
 * given with `--confirm`; a phrase that does not match cancels.
 */

import type { Command } from 'commander';
import type { BackupEntry, BackupKind, StructuredError } from '@berth/core';
import { askTerminal, withDeployer, type ProgramOptions } from '../context.js';
import { FAIL, GRAY, INFO, OK, RED, RESET, WARN, heading, log, printStructuredError, warnAll } from '../output.js';

const KIND_ALIASES: ReadonlyMap<string, BackupKind> = new Map<string, BackupKind>([
  ['database', 'database'],
  ['db', 'database'],
  ['cache', 'cache'],
  ['redis', 'cache'],
  ['files', 'app_files'],
]);

function parseKind(input: string): BackupKind | null {
  return KIND_ALIASES.get(input.trim().toLowerCase()) ?? null;
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function describeEntry(entry: BackupEntry): string {
  return `${entry.file} ${GRAY}${formatSize(entry.size)}, ${entry.modifiedAt.toISOString()}${RESET}`;
}

/** A declined phrase is a cancel, not a failure. */
function reportFailure(error: StructuredError): boolean {
  if (error.code === 'CONFIRMATION_MISMATCH') {
    log(INFO, 'Cancelled');
    return true;
  }
  printStructuredError(error);
  return false;
}

export function registerBackup(program: Command, options: ProgramOptions): void {
  const ask = options.prompt ?? askTerminal;
  const backup = program.command('backup').description('Backup and restore');

  backup
    .command('create')
    .description('Back up the database, the cache, the env files, or all three')
    .argument('[kind]', 'database | cache | files | all', 'all')
    .action(async (kindArg: string) => {
      const kind = kindArg === 'all' ? 'all' : parseKind(kindArg);
      if (kind === null) {
        log(FAIL, `Unknown backup kind "${kindArg}" (expected database, cache, files or all)`);
        process.exitCode = 1;
        return;
      }

      await withDeployer(program, options, async (deployer) => {
        if (kind !== 'all') {
          const result = await deployer.backup(kind);
          if (!result.ok) return reportFailure(result.error);
          if (result.value) log(OK, describeEntry(result.value));
          warnAll(result.warnings);
          return true;
        }

        const result = await deployer.fullBackup();
        if (!result.ok) return reportFailure(result.error);
        for (const entry of result.value.entries) log(OK, describeEntry(entry));
        for (const { kind: failedKind, error } of result.value.failed) log(FAIL, `${failedKind}: ${error.message}`);
        warnAll(result.warnings);
        return result.value.failed.length === 0;
      });
    });

  backup
    .command('list')
    .description('Archives in the backup directory, newest first')
    .action(async () => {
      await withDeployer(program, options, async (deployer) => {
        const entries = await deployer.listBackups();
        heading(`Backups in ${deployer.backups.directory}`);
        if (entries.length === 0) {
          log(INFO, 'No backups found');
          return true;
        }
        for (const entry of entries) log(INFO, `${entry.kind.padEnd(9)} ${describeEntry(entry)}`);
        return true;
      });
    });

  backup
    .command('clean')
    .description('Delete archives older than the retention period')
    .option('--days <n>', 'retention in days (default: backups.retentionDays)')
    .option('--confirm <phrase>', 'confirmation phrase')
    .action(async (opts: { days?: string; confirm?: string }) => {
      const days = opts.days === undefined ? undefined : Number(opts.days);
      if (days !== undefined && !(Number.isInteger(days) && days >= 1)) {
        log(FAIL, `--days must be a whole number of days, got "${opts.days}"`);
        process.exitCode = 1;
        return;
      }

      await withDeployer(program, options, async (deployer) => {
        const expired = await deployer.expiredBackups(days);
        if (expired.length === 0) {
          log(INFO, 'No expired backups');
          return true;
        }

        log(WARN, 'The following backups will be deleted:');
        for (const entry of expired) log(INFO, describeEntry(entry));
        const confirmation = opts.confirm ?? await ask(`${RED}Type DELETE to confirm: ${RESET}`);

        const result = await deployer.cleanBackups(confirmation, days);
        if (!result.ok) return reportFailure(result.error);
        for (const file of result.value.deleted) log(OK, `deleted ${file}`);
        for (const { file, error } of result.value.failed) log(FAIL, `${file}: ${error}`);
        return result.value.failed.length === 0;
      });
    });

  backup
    .command('restore')
    .description('Restore the database, the cache or the env files from an archive')
    .argument('<kind>', 'database | cache | files')
    .argument('<file>', 'archive path, absolute or relative to the backup directory')
    .option('--confirm <phrase>', 'confirmation phrase')
    .option('--allow-outside', 'accept an archive outside the backup and project directories')
    .action(async (kindArg: string, file: string, opts: { confirm?: string; allowOutside?: boolean }) => {
      const kind = parseKind(kindArg);
      if (kind === null) {
        log(FAIL, `Unknown backup kind "${kindArg}" (expected database, cache or files)`);
        process.exitCode = 1;
        return;
      }

      const confirmation = opts.confirm ?? await ask(`${RED}This replaces the current ${kindArg} data. Type yes to continue: ${RESET}`);
      await withDeployer(program, options, async (deployer) => {
        const result = await deployer.restoreBackup(kind, { file, confirmation, allowOutside: opts.allowOutside });
        if (!result.ok) return reportFailure(result.error);
        log(OK, `Restored ${kindArg} from ${file}`);
        warnAll(result.warnings);
        return true;
      });
    });
}
