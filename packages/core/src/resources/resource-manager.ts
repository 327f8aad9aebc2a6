/**
 * @module resources/resource-manager
 * Persistent volume lifecycle: routine resets and confirmed destruction.
 *
 * Which volumes a reset may touch is decided by looking each name up in the
 * resource catalog, so passing a preserved name to
 * {@link ResourceManager.resetResettable} is a no-op for that name.
 */

import type { Bus, PersistentResource } from '../types.js';
import { createStructuredError, type Outcome, type StructuredError } from '../resilience/error-codes.js';
import { publish } from '../event-bus.js';
import { RESOURCE_CATALOG } from '../topology.js';

// =====================================================================
// Types
// =====================================================================

/** The subset of the compose client the manager needs. */
export interface VolumeDriver {
  volumeName(resource: string): string;
  volumeExists(volume: string): Promise<boolean>;
  removeVolume(volume: string): Promise<Outcome>;
  listVolumes(prefix: string): Promise<string[]>;
  down(options: { removeOrphans?: boolean }): Promise<Outcome>;
}

export interface ResetResult {
  removed: string[];
  failed: Array<{ name: string; error: string }>;
  /** Resettable resources that had no volume */
  absent: string[];
  /** Requested names that are preserved or not in the catalog */
  skipped: string[];
}

export type DestroyScope = 'all' | 'resettable' | 'none';

export const DESTROY_PHRASE = 'DESTROY';

export interface DestroyRequest {
  /** `all` / `resettable` / `none`, or the menu numbers 1 / 2 / 3 */
  scope: string;
  /** Must equal {@link DESTROY_PHRASE} exactly */
  confirmation: string;
}

export type DestroyResult =
  | {
    status: 'destroyed';
    scope: DestroyScope;
    containersRemoved: boolean;
    removed: string[];
    failed: Array<{ name: string; error: string }>;
  }
  | { status: 'aborted'; reason: string; error: StructuredError };

const SCOPE_ALIASES: ReadonlyMap<string, DestroyScope> = new Map<string, DestroyScope>([
  ['all', 'all'],
  ['1', 'all'],
  ['resettable', 'resettable'],
  ['2', 'resettable'],
  ['none', 'none'],
  ['3', 'none'],
]);

export function parseDestroyScope(input: string): DestroyScope | null {
  return SCOPE_ALIASES.get(input.trim().toLowerCase()) ?? null;
}

// =====================================================================
// ResourceManager
// =====================================================================

export class ResourceManager {
  private readonly catalog: ReadonlyMap<string, PersistentResource>;
  private readonly bus: Bus | undefined;

  constructor(
    private readonly driver: VolumeDriver,
    options: { catalog?: readonly PersistentResource[]; bus?: Bus } = {},
  ) {
    this.catalog = new Map((options.catalog ?? RESOURCE_CATALOG).map((r): [string, PersistentResource] => [r.name, r]));
    this.bus = options.bus;
  }

  /** Catalog entries in declaration order. */
  list(): PersistentResource[] {
    return [...this.catalog.values()];
  }

  classify(name: string): PersistentResource['classification'] | undefined {
    return this.catalog.get(name)?.classification;
  }

  /**
   * Remove every resettable volume among `names` (default: the whole
   * catalog). Failures are collected; the caller decides whether a partial
   * reset is acceptable.
   */
  async resetResettable(names: readonly string[] = [...this.catalog.keys()]): Promise<ResetResult> {
    const result: ResetResult = { removed: [], failed: [], absent: [], skipped: [] };

    for (const name of new Set(names)) {
      if (this.classify(name) !== 'resettable') {
        result.skipped.push(name);
        continue;
      }
      await this.removeOne(name, result);
    }

    publish(this.bus, 'resources', 'reset_complete', result);
    return result;
  }

  /**
   * Two-tier confirmed teardown. The scope must parse and the phrase must
   * match before anything is touched; otherwise the result is `aborted`
   * with no side effects.
   */
  async destroyAll(request: DestroyRequest): Promise<DestroyResult> {
    const scope = parseDestroyScope(request.scope);
    if (scope === null) {
      return this.abort('scope', `Unknown scope "${request.scope}" (expected all, resettable or none)`);
    }
    if (request.confirmation !== DESTROY_PHRASE) {
      return this.abort('confirmation', `Confirmation phrase did not match "${DESTROY_PHRASE}"`);
    }

    publish(this.bus, 'resources', 'destroy_start', { scope });
    const down = await this.driver.down({ removeOrphans: true });
    const result: ResetResult = { removed: [], failed: [], absent: [], skipped: [] };
    if (!down.ok) {
      result.failed.push({ name: 'containers', error: down.error.message });
    }

    const targets = this.destroyTargets(scope);
    for (const name of targets) {
      await this.removeOne(name, result);
    }

    if (scope === 'all') {
      const prefix = this.driver.volumeName('');
      const known = new Set(targets.map((name) => this.driver.volumeName(name)));
      for (const volume of await this.driver.listVolumes(prefix)) {
        if (known.has(volume)) continue;
        const removed = await this.driver.removeVolume(volume);
        if (removed.ok) result.removed.push(volume.slice(prefix.length));
        else result.failed.push({ name: volume.slice(prefix.length), error: removed.error.message });
      }
    }

    const destroyed: DestroyResult = {
      status: 'destroyed',
      scope,
      containersRemoved: down.ok,
      removed: result.removed,
      failed: result.failed,
    };
    publish(this.bus, 'resources', 'destroy_complete', destroyed);
    return destroyed;
  }

  private abort(step: 'scope' | 'confirmation', reason: string): DestroyResult {
    publish(this.bus, 'resources', 'destroy_aborted', { reason: step });
    return { status: 'aborted', reason, error: createStructuredError('CONFIRMATION_MISMATCH', reason, { step }) };
  }

  private destroyTargets(scope: DestroyScope): string[] {
    switch (scope) {
      case 'all':
        return [...this.catalog.keys()];
      case 'resettable':
        return this.list().filter((r) => r.classification === 'resettable').map((r) => r.name);
      case 'none':
        return [];
    }
  }

  private async removeOne(name: string, result: ResetResult): Promise<void> {
    const volume = this.driver.volumeName(name);
    if (!(await this.driver.volumeExists(volume))) {
      result.absent.push(name);
      return;
    }
    const removed = await this.driver.removeVolume(volume);
    if (removed.ok) {
      result.removed.push(name);
      publish(this.bus, 'resources', 'volume_removed', { name, volume });
    } else {
      result.failed.push({ name, error: removed.error.message });
    }
  }
}
