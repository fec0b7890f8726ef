/**
 * Durable storage of sync ledgers, one JSON document per synced folder
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { LedgerError, toError } from '../errors/index.js';
import type { SyncLedger } from '../types/index.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

export interface LedgerStore {
  /**
   * Load the ledger for a folder, or null if the folder was never synced.
   * Throws LedgerError when a ledger exists but cannot be read.
   */
  load(folderId: string): Promise<SyncLedger | null>;

  /**
   * Replace the stored ledger atomically
   */
  save(ledger: SyncLedger): Promise<void>;
}

const LedgerRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  path: z.string(),
  mimeType: z.string(),
  modifiedTime: z.string(),
  fingerprint: z.string(),
  status: z.enum(['active', 'deleted', 'unsupported']),
  textRef: z.string().optional(),
  textHash: z.string().optional(),
  unsupportedReason: z.string().optional(),
  syncedAt: z.string(),
  deletedAt: z.string().optional(),
});

export const SyncLedgerSchema = z
  .object({
    version: z.literal(1),
    folderId: z.string().min(1),
    folderName: z.string(),
    createdAt: z.string(),
    lastRunAt: z.string().nullable(),
    records: z.record(LedgerRecordSchema),
  })
  .superRefine((ledger, ctx) => {
    for (const [key, record] of Object.entries(ledger.records)) {
      if (record.id !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `record key ${key} does not match id ${record.id}`,
          path: ['records', key, 'id'],
        });
      }
      if (record.status === 'active' && !record.textRef) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `active record ${key} has no text reference`,
          path: ['records', key, 'textRef'],
        });
      }
    }
  });

/**
 * Folder ids are Drive ids ([A-Za-z0-9_-]) or "root"; anything else is rejected
 * so an id can never escape the data directory.
 */
function ledgerFileName(folderId: string): string {
  if (!/^[0-9A-Za-z_-]+$/.test(folderId)) {
    throw new LedgerError('Invalid folder id for ledger', { folderId });
  }
  return `ledger-${folderId}.json`;
}

/**
 * Stores each ledger as `<dataDir>/ledger-<folderId>.json`
 */
export class FileLedgerStore implements LedgerStore {
  constructor(private readonly dataDir: string) {}

  pathFor(folderId: string): string {
    return join(this.dataDir, ledgerFileName(folderId));
  }

  async load(folderId: string): Promise<SyncLedger | null> {
    const path = this.pathFor(folderId);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new LedgerError('Failed to read ledger', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new LedgerError('Ledger is not valid JSON', {
        path,
        error: toError(error).message,
      });
    }

    const parsed = SyncLedgerSchema.safeParse(json);
    if (!parsed.success) {
      throw new LedgerError('Ledger does not match the expected format', {
        path,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    if (parsed.data.folderId !== folderId) {
      throw new LedgerError('Ledger belongs to a different folder', {
        path,
        expected: folderId,
        found: parsed.data.folderId,
      });
    }

    return parsed.data;
  }

  async save(ledger: SyncLedger): Promise<void> {
    const path = this.pathFor(ledger.folderId);
    try {
      await writeFileAtomic(path, JSON.stringify(ledger, null, 2));
    } catch (error) {
      throw new LedgerError('Failed to write ledger', {
        path,
        error: toError(error).message,
      });
    }
  }
}
