/**
 * @module credentials/credential-manager
 * Generation, validation and cross-service synchronisation of secrets.
 *
 * Every write goes through {@link CredentialManager.upsertCredential} or
 * {@link CredentialManager.synchronizeAcrossScopes}; the latter re-reads each
 * scoped file and compares bytes before reporting success.
 */

import type { Bus, Credential, CredentialStore, DeploymentMode, StrengthClass } from '../types.js';
import { publish } from '../event-bus.js';
import { fail, succeed, type Outcome } from '../resilience/error-codes.js';
import { readDatabaseAccount } from '../topology.js';
import { assessStrength } from './strength.js';
import { generateKeyMaterial, generateSecret, type SecretAlphabet } from './secret-generator.js';

// =====================================================================
// Types
// =====================================================================

export interface UpsertResult {
  previousExisted: boolean;
  action: 'created' | 'replaced' | 'preserved';
  /** The value held by the store after the call */
  effectiveValue: string;
  previousStrength?: StrengthClass;
}

export type SyncResult =
  | { status: 'verified_ok'; locations: string[] }
  | { status: 'verification_failed'; failures: Array<{ location: string; key: string; reason: string }> };

export interface CredentialManagerOptions {
  mode: DeploymentMode;
  bus?: Bus;
  /** Override the random source (tests) */
  generate?: (length: number, alphabet: SecretAlphabet) => string;
}

export const WEBHOOK_SECRET_KEY = 'WEBHOOK_CLIENT_SECRET';
export const WEBHOOK_SECRET_MIN_LENGTH = 32;
const WEBHOOK_SECRET_LENGTH = 64;
const DATABASE_PASSWORD_LENGTH = 32;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sameBytes(a: string, b: string): boolean {
  return Buffer.from(a, 'utf8').equals(Buffer.from(b, 'utf8'));
}

// =====================================================================
// CredentialManager
// =====================================================================

export class CredentialManager {
  private readonly generator: (length: number, alphabet: SecretAlphabet) => string;

  constructor(private readonly options: CredentialManagerOptions) {
    this.generator = options.generate ?? ((length, alphabet) => generateSecret(length, alphabet));
  }

  get mode(): DeploymentMode {
    return this.options.mode;
  }

  /** @throws {DeployError} ENTROPY_UNAVAILABLE, which aborts the calling phase */
  generateSecret(length = 32, alphabet: SecretAlphabet = 'alphanumeric'): string {
    return this.generator(length, alphabet);
  }

  classifyStrength(value: string): StrengthClass {
    return assessStrength(value, this.options.mode).strength;
  }

  /**
   * Write `value` unless the store already holds a non-weak value for `key`.
   *
   * A weak existing value is replaced and reported as `credential_replaced`.
   * A weak candidate is rejected before anything is written.
   */
  async upsertCredential(store: CredentialStore, key: string, value: string): Promise<Outcome<UpsertResult>> {
    const candidate = assessStrength(value, this.options.mode);
    if (candidate.strength === 'weak') {
      publish(this.options.bus, 'credentials', 'credential_rejected', { key, location: store.location, warnings: candidate.warnings });
      return fail('VALIDATION_FAILED', `Refusing to write a weak value for ${key}: ${candidate.warnings.join(', ')}`, {
        key,
        location: store.location,
      });
    }

    let existing: string | undefined;
    try {
      existing = await store.read(key);
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot read ${store.location}: ${errorMessage(err)}`, { key });
    }

    const warnings = candidate.strength === 'acceptable' ? candidate.warnings.map((w) => `${key}: ${w}`) : [];

    if (existing !== undefined) {
      const previous = assessStrength(existing, this.options.mode);
      if (previous.strength !== 'weak') {
        const kept = previous.strength === 'acceptable' ? previous.warnings.map((w) => `${key}: ${w}`) : [];
        return succeed(
          { previousExisted: true, action: 'preserved', effectiveValue: existing, previousStrength: previous.strength },
          kept,
        );
      }
    }

    try {
      await store.write(key, value);
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot write ${key} to ${store.location}: ${errorMessage(err)}`, { key });
    }

    if (existing === undefined) {
      return succeed({ previousExisted: false, action: 'created', effectiveValue: value }, warnings);
    }

    publish(this.options.bus, 'credentials', 'credential_replaced', {
      key,
      location: store.location,
      reason: assessStrength(existing, this.options.mode).warnings,
    });
    return succeed(
      { previousExisted: true, action: 'replaced', effectiveValue: value, previousStrength: 'weak' },
      [...warnings, `${key}: replaced weak value in ${store.location}`],
    );
  }

  /**
   * Write the credential to every scoped location, then re-read each one and
   * compare byte-for-byte. Any failed write or mismatch is reported; the
   * caller must not restart dependants on `verification_failed`.
   */
  async synchronizeAcrossScopes(credential: Credential): Promise<SyncResult> {
    const failures: Array<{ location: string; key: string; reason: string }> = [];

    for (const location of credential.scope) {
      const key = location.key ?? credential.key;
      try {
        await location.store.write(key, credential.value);
      } catch (err) {
        failures.push({ location: location.store.location, key, reason: `write failed: ${errorMessage(err)}` });
      }
    }

    for (const location of credential.scope) {
      const key = location.key ?? credential.key;
      if (failures.some((f) => f.location === location.store.location && f.key === key)) continue;
      try {
        const stored = await location.store.read(key);
        if (stored === undefined) {
          failures.push({ location: location.store.location, key, reason: 'missing after write' });
        } else if (!sameBytes(stored, credential.value)) {
          failures.push({ location: location.store.location, key, reason: 'value differs after write' });
        }
      } catch (err) {
        failures.push({ location: location.store.location, key, reason: `read-back failed: ${errorMessage(err)}` });
      }
    }

    if (failures.length > 0 || credential.scope.length === 0) {
      publish(this.options.bus, 'credentials', 'verification_failed', { key: credential.key, failures });
      return { status: 'verification_failed', failures };
    }
    publish(this.options.bus, 'credentials', 'credential_synchronized', {
      key: credential.key,
      locations: credential.scope.map((l) => l.store.location),
    });
    return { status: 'verified_ok', locations: credential.scope.map((l) => l.store.location) };
  }

  // ── Deployment credentials ─────────────────────────────────────────

  /**
   * Database password (generated unless a non-weak one exists), user and
   * database name in the root env, mirrored into the dashboard env.
   */
  async ensureDatabaseCredentials(
    root: CredentialStore,
    dashboard: CredentialStore,
  ): Promise<Outcome<{ password: UpsertResult; user: string; database: string }>> {
    const password = await this.upsertCredential(root, 'POSTGRES_PASSWORD', this.generateSecret(DATABASE_PASSWORD_LENGTH));
    if (!password.ok) return password;

    const { user, database } = await readDatabaseAccount(root);

    const mirrors: Credential[] = [
      { key: 'POSTGRES_PASSWORD', value: password.value.effectiveValue, scope: [{ store: root }, { store: dashboard, key: 'DB_PASSWORD' }] },
      { key: 'POSTGRES_USER', value: user, scope: [{ store: root }, { store: dashboard, key: 'DB_USERNAME' }] },
      { key: 'POSTGRES_DB', value: database, scope: [{ store: root }, { store: dashboard, key: 'DB_DATABASE' }] },
    ];
    for (const credential of mirrors) {
      const sync = await this.synchronizeAcrossScopes(credential);
      if (sync.status === 'verification_failed') {
        return fail('VERIFICATION_FAILED', `${credential.key} differs between env files`, { failures: sync.failures });
      }
    }

    return succeed({ password: password.value, user, database }, password.warnings);
  }

  /** Application encryption key, created once and never rotated here. */
  async ensureAppKey(dashboard: CredentialStore): Promise<Outcome<{ created: boolean }>> {
    const existing = await dashboard.read('APP_KEY');
    if (existing) return succeed({ created: false });
    const value = `base64:${generateKeyMaterial(32)}`;
    try {
      await dashboard.write('APP_KEY', value);
    } catch (err) {
      return fail('EXTERNAL_TOOL_FAILURE', `Cannot write APP_KEY to ${dashboard.location}: ${errorMessage(err)}`);
    }
    return succeed({ created: true });
  }

  // ── Webhook shared secret ──────────────────────────────────────────

  private usableWebhookSecret(value: string | undefined): value is string {
    return value !== undefined
      && value.length >= WEBHOOK_SECRET_MIN_LENGTH
      && assessStrength(value, this.options.mode).strength === 'strong';
  }

  /**
   * Make the node and dashboard hold the same webhook secret. The node's
   * value wins, then the dashboard's; a new one is generated when neither is
   * usable.
   */
  async syncWebhookSecret(
    node: CredentialStore,
    dashboard: CredentialStore,
  ): Promise<Outcome<{ source: 'node' | 'dashboard' | 'generated' }>> {
    const fromNode = await node.read(WEBHOOK_SECRET_KEY);
    const fromDashboard = await dashboard.read(WEBHOOK_SECRET_KEY);

    let source: 'node' | 'dashboard' | 'generated';
    let value: string;
    if (this.usableWebhookSecret(fromNode)) {
      source = 'node';
      value = fromNode;
    } else if (this.usableWebhookSecret(fromDashboard)) {
      source = 'dashboard';
      value = fromDashboard;
    } else {
      source = 'generated';
      value = this.generateSecret(WEBHOOK_SECRET_LENGTH, 'hex');
    }

    return this.writeWebhookSecret(node, dashboard, value, source);
  }

  /** Replace the webhook secret in both scopes with a fresh value. */
  async rotateWebhookSecret(node: CredentialStore, dashboard: CredentialStore): Promise<Outcome<{ source: 'generated' }>> {
    return this.writeWebhookSecret(node, dashboard, this.generateSecret(WEBHOOK_SECRET_LENGTH, 'hex'), 'generated');
  }

  private async writeWebhookSecret<S extends string>(
    node: CredentialStore,
    dashboard: CredentialStore,
    value: string,
    source: S,
  ): Promise<Outcome<{ source: S }>> {
    const sync = await this.synchronizeAcrossScopes({
      key: WEBHOOK_SECRET_KEY,
      value,
      scope: [{ store: node }, { store: dashboard }],
    });
    if (sync.status === 'verification_failed') {
      return fail('VERIFICATION_FAILED', 'Webhook secret is not identical in every scoped env file', {
        failures: sync.failures,
      });
    }
    return succeed({ source });
  }

  // ── Audit ──────────────────────────────────────────────────────────

  /** Strength of every listed key in a store; absent keys are reported as such. */
  async audit(
    store: CredentialStore,
    keys: string[],
  ): Promise<Array<{ key: string; location: string; strength: StrengthClass | 'absent'; warnings: string[] }>> {
    const values = await store.readAll();
    return keys.map((key) => {
      const value = values.get(key);
      if (value === undefined) return { key, location: store.location, strength: 'absent' as const, warnings: [] };
      const assessment = assessStrength(value, this.options.mode);
      return { key, location: store.location, strength: assessment.strength, warnings: assessment.warnings };
    });
  }
}
