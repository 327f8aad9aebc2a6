/**
 * @module store
 * Persistence layer for the operation log.
 *
 * Two implementations:
 * - MemoryStore: in-memory (tests, dry runs)
 * - FileStore: JSON file-based, flushed lazily and on close()
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

// =====================================================================
// Record Types
// =====================================================================

export type OperationStatus = 'running' | 'success' | 'failed' | 'aborted';

export interface OperationRecord {
  id: string;
  /** Operation name, e.g. `install` or `secrets.rotate-webhook` */
  operation: string;
  project: string;
  status: OperationStatus;
  startTime: number;
  endTime?: number;
  detail?: string;
}

const OperationRecordSchema = z.object({
  id: z.string(),
  operation: z.string(),
  project: z.string(),
  status: z.enum(['running', 'success', 'failed', 'aborted']),
  startTime: z.number(),
  endTime: z.number().optional(),
  detail: z.string().optional(),
});

const FileStoreDataSchema = z.object({
  operations: z.array(OperationRecordSchema),
});

type FileStoreData = z.infer<typeof FileStoreDataSchema>;

const MAX_RECORDS = 2000;

// =====================================================================
// Store Interface
// =====================================================================

export interface Store {
  saveOperation(record: OperationRecord): Promise<void>;
  updateOperation(id: string, patch: Partial<OperationRecord>): Promise<void>;
  /** Newest first */
  getOperations(project?: string, limit?: number): Promise<OperationRecord[]>;
  close(): Promise<void>;
}

// =====================================================================
// MemoryStore
// =====================================================================

export class MemoryStore implements Store {
  private operations: OperationRecord[] = [];

  async saveOperation(record: OperationRecord): Promise<void> {
    this.operations.unshift(record);
    if (this.operations.length > MAX_RECORDS) this.operations.length = MAX_RECORDS;
  }

  async updateOperation(id: string, patch: Partial<OperationRecord>): Promise<void> {
    const entry = this.operations.find(r => r.id === id);
    if (entry) Object.assign(entry, patch);
  }

  async getOperations(project?: string, limit = 100): Promise<OperationRecord[]> {
    const filtered = project
      ? this.operations.filter(r => r.project === project)
      : this.operations;
    return filtered.slice(0, limit);
  }

  async close(): Promise<void> {
    // no-op
  }
}

// =====================================================================
// FileStore: JSON file-based persistence
// =====================================================================

export class FileStore implements Store {
  private data: FileStoreData;
  private dirty = false;
  private flushTimer?: ReturnType<typeof setTimeout>;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.data = this.load();
  }

  private load(): FileStoreData {
    if (!fs.existsSync(this.filePath)) return { operations: [] };
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch {
      return { operations: [] };
    }
    const parsed = FileStoreDataSchema.safeParse(raw);
    // Unreadable log: start a fresh one
    return parsed.success ? parsed.data : { operations: [] };
  }

  private scheduleFlush(): void {
    this.dirty = true;
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushSync();
      this.flushTimer = undefined;
    }, 1000);
    this.flushTimer.unref();
  }

  private flushSync(): void {
    if (!this.dirty) return;
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.data, null, 2), 'utf-8');
    this.dirty = false;
  }

  async saveOperation(record: OperationRecord): Promise<void> {
    this.data.operations.unshift(record);
    if (this.data.operations.length > MAX_RECORDS) this.data.operations.length = MAX_RECORDS;
    this.scheduleFlush();
  }

  async updateOperation(id: string, patch: Partial<OperationRecord>): Promise<void> {
    const entry = this.data.operations.find(r => r.id === id);
    if (entry) {
      Object.assign(entry, patch);
      this.scheduleFlush();
    }
  }

  async getOperations(project?: string, limit = 100): Promise<OperationRecord[]> {
    const filtered = project
      ? this.data.operations.filter(r => r.project === project)
      : this.data.operations;
    return filtered.slice(0, limit);
  }

  async close(): Promise<void> {
    if (this.flushTimer) clearTimeout(this.flushTimer);
    this.flushTimer = undefined;
    this.flushSync();
  }
}

// =====================================================================
// OperationLog
// =====================================================================

let sequence = 0;

/**
 * Records the start and end of every top-level operation.
 *
 * ```ts
 * const log = new OperationLog(store, 'trust-anchor');
 * const result = await log.track('volumes.reset', () => resources.resetResettable());
 * ```
 */
export class OperationLog {
  constructor(
    private readonly store: Store,
    private readonly project: string,
  ) {}

  async track<T>(
    operation: string,
    action: () => Promise<T>,
    describe: (result: T) => { status: OperationStatus; detail?: string } = () => ({ status: 'success' }),
  ): Promise<T> {
    const id = `${Date.now().toString(36)}-${(sequence++).toString(36)}`;
    await this.store.saveOperation({
      id,
      operation,
      project: this.project,
      status: 'running',
      startTime: Date.now(),
    });
    try {
      const result = await action();
      await this.store.updateOperation(id, { ...describe(result), endTime: Date.now() });
      return result;
    } catch (err) {
      await this.store.updateOperation(id, {
        status: 'failed',
        endTime: Date.now(),
        detail: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  recent(limit = 20): Promise<OperationRecord[]> {
    return this.store.getOperations(this.project, limit);
  }
}

// =====================================================================
// Factory
// =====================================================================

export interface StoreOptions {
  type?: 'memory' | 'file';
  /** File path for FileStore (default: logs/operations.json in cwd) */
  filePath?: string;
}

export function createStore(options?: StoreOptions): Store {
  const type = options?.type ?? 'memory';
  if (type === 'file') {
    const filePath = options?.filePath ?? path.join(process.cwd(), 'logs', 'operations.json');
    return new FileStore(filePath);
  }
  return new MemoryStore();
}
