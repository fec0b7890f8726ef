/**
 * Run-level state kept beside the ledger: the sync lock and a rolling
 * history of completed runs
 */

import { mkdir, readFile, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { LockError, toError } from '../errors/index.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

/**
 * Sync history entry, one per completed run
 */
export interface SyncHistoryEntry {
  timestamp: string;
  added: number;
  modified: number;
  deleted: number;
  unsupported: number;
  failed: number;
  chunkFiles: number;
  duration: number;
  errors: string[];
}

const SyncHistorySchema = z.array(
  z.object({
    timestamp: z.string(),
    added: z.number(),
    modified: z.number(),
    deleted: z.number(),
    unsupported: z.number(),
    failed: z.number(),
    chunkFiles: z.number(),
    duration: z.number(),
    errors: z.array(z.string()),
  })
);

const LOCK_FILE = 'sync.lock';
const HISTORY_FILE = 'sync-history.json';
export const LOCK_DURATION_MS = 1000 * 60 * 30; // 30 minutes
const MAX_HISTORY_ENTRIES = 30;

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class RunStateManager {
  constructor(
    private readonly dataDir: string,
    private readonly now: () => number = Date.now
  ) {}

  private get lockPath(): string {
    return join(this.dataDir, LOCK_FILE);
  }

  private get historyPath(): string {
    return join(this.dataDir, HISTORY_FILE);
  }

  /**
   * Time the current lock was taken, or null when there is none
   */
  private async readLockTime(): Promise<number | null> {
    try {
      const raw = await readFile(this.lockPath, 'utf8');
      const lockTime = parseInt(raw.trim(), 10);
      // An unreadable lock is treated as taken at the epoch, i.e. stale
      return Number.isNaN(lockTime) ? 0 : lockTime;
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return null;
      throw error;
    }
  }

  /**
   * Acquire the lock for this output directory.
   * Returns false if another run holds a lock younger than 30 minutes.
   */
  async acquireLock(): Promise<boolean> {
    await mkdir(this.dataDir, { recursive: true });

    try {
      await writeFile(this.lockPath, this.now().toString(), { flag: 'wx' });
      return true;
    } catch (error) {
      if (!isErrno(error, 'EEXIST')) {
        throw new LockError('Failed to create sync lock', {
          path: this.lockPath,
          error: toError(error).message,
        });
      }
    }

    if (await this.isLocked()) {
      return false;
    }

    console.warn(`Replacing stale sync lock at ${this.lockPath}`);
    await writeFileAtomic(this.lockPath, this.now().toString());
    return true;
  }

  async releaseLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!isErrno(error, 'ENOENT')) throw error;
    }
  }

  /**
   * Check if a sync is currently in progress
   */
  async isLocked(): Promise<boolean> {
    const lockTime = await this.readLockTime();
    if (lockTime === null) return false;
    return this.now() - lockTime < LOCK_DURATION_MS;
  }

  /**
   * Prepend an entry, keeping the newest MAX_HISTORY_ENTRIES
   */
  async saveSyncHistory(entry: SyncHistoryEntry): Promise<void> {
    const entries = await this.getSyncHistory(MAX_HISTORY_ENTRIES);
    const next = [entry, ...entries]
      .sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime())
      .slice(0, MAX_HISTORY_ENTRIES);
    await writeFileAtomic(this.historyPath, JSON.stringify(next, null, 2));
  }

  /**
   * History entries, newest first
   */
  async getSyncHistory(limit: number = MAX_HISTORY_ENTRIES): Promise<SyncHistoryEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.historyPath, 'utf8');
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return [];
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn(`Ignoring unreadable sync history at ${this.historyPath}`);
      return [];
    }

    const parsed = SyncHistorySchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`Ignoring malformed sync history at ${this.historyPath}`);
      return [];
    }

    return parsed.data
      .sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime())
      .slice(0, limit);
  }
}
