/**
 * @module credential-store
 * Key/value configuration files (`.env` style), one per service.
 *
 * Reads go through dotenv's parser so quoting and comments behave exactly as
 * they do for the services consuming the files. Writes edit the file line by
 * line: unrelated keys, comments and ordering are preserved, and the first
 * mutating write of a store instance copies the file to `<file>.bak`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import type { CredentialStore } from './types.js';
import { DeployError } from './resilience/error-codes.js';

// =====================================================================
// Line editing
// =====================================================================

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Render `KEY="value"`, falling back to single quotes when the value holds a
 * double quote or backslash (dotenv expands escapes inside double quotes).
 */
export function formatEnvAssignment(key: string, value: string): string {
  if (!KEY_PATTERN.test(key)) {
    throw new DeployError('VALIDATION_FAILED', `Invalid env key "${key}"`);
  }
  if (/[\r\n]/.test(value)) {
    throw new DeployError('VALIDATION_FAILED', `Value for ${key} must be a single line`);
  }
  if (!value.includes('"') && !value.includes('\\')) return `${key}="${value}"`;
  if (!value.includes("'")) return `${key}='${value}'`;
  throw new DeployError('VALIDATION_FAILED', `Value for ${key} mixes both quote characters`);
}

/**
 * Upsert one key in env-file text. The first assignment is replaced in place,
 * later duplicates are dropped, and a missing key is appended.
 */
export function upsertEnvLine(content: string, key: string, value: string): string {
  const assignment = formatEnvAssignment(key, value);
  const matcher = new RegExp(`^\\s*(?:export\\s+)?${escapeRegExp(key)}\\s*=`);
  const lines = content.length > 0 ? content.replace(/\r?\n$/, '').split(/\r?\n/) : [];

  let replaced = false;
  const next: string[] = [];
  for (const line of lines) {
    if (matcher.test(line)) {
      if (!replaced) next.push(assignment);
      replaced = true;
    } else {
      next.push(line);
    }
  }
  if (!replaced) next.push(assignment);
  return `${next.join('\n')}\n`;
}

export function parseEnv(content: string): Map<string, string> {
  return new Map(Object.entries(dotenv.parse(content)));
}

// =====================================================================
// EnvFileStore
// =====================================================================

export interface EnvFileStoreOptions {
  /** Copy the file to `<file>.bak` before the first change (default true) */
  backup?: boolean;
}

export class EnvFileStore implements CredentialStore {
  private backedUp = false;

  constructor(
    readonly location: string,
    private readonly options: EnvFileStoreOptions = {},
  ) {}

  async exists(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.location);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async readAll(): Promise<Map<string, string>> {
    const content = await this.readContent();
    return content === null ? new Map() : parseEnv(content);
  }

  async read(key: string): Promise<string | undefined> {
    return (await this.readAll()).get(key);
  }

  async write(key: string, value: string): Promise<void> {
    const current = await this.readContent();
    const next = upsertEnvLine(current ?? '', key, value);
    if (next === current) return;

    if (current !== null && !this.backedUp && this.options.backup !== false) {
      await fs.copyFile(this.location, `${this.location}.bak`);
      this.backedUp = true;
    }
    await fs.mkdir(path.dirname(this.location), { recursive: true });
    await fs.writeFile(this.location, next, 'utf-8');
  }

  private async readContent(): Promise<string | null> {
    try {
      return await fs.readFile(this.location, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
  }
}

// =====================================================================
// MemoryCredentialStore
// =====================================================================

/** In-memory store for dry runs and tests. */
export class MemoryCredentialStore implements CredentialStore {
  private readonly entries: Map<string, string>;
  private present: boolean;

  constructor(
    readonly location: string,
    initial?: Record<string, string>,
  ) {
    this.entries = new Map(Object.entries(initial ?? {}));
    this.present = initial !== undefined;
  }

  async exists(): Promise<boolean> {
    return this.present;
  }

  async readAll(): Promise<Map<string, string>> {
    return new Map(this.entries);
  }

  async read(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async write(key: string, value: string): Promise<void> {
    formatEnvAssignment(key, value);
    this.entries.set(key, value);
    this.present = true;
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }
}
