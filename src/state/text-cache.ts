/**
 * Cache of extracted document text, referenced from ledger records
 */

import { readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { LedgerError, toError } from '../errors/index.js';
import { computeTextHash } from '../ledger/hash.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

export interface TextCache {
  /**
   * Store text for a file and return the reference to keep in its record.
   * References include a digest of the text, so a new version never
   * overwrites the one an earlier ledger points at.
   */
  write(fileId: string, text: string): Promise<string>;
  read(ref: string): Promise<string>;
  remove(ref: string): Promise<void>;
}

const SAFE_REF = /^[0-9A-Za-z_-]+\.txt$/;

export class FileTextCache implements TextCache {
  constructor(private readonly dir: string) {}

  private resolve(ref: string): string {
    if (!SAFE_REF.test(ref)) {
      throw new LedgerError('Invalid text reference', { ref });
    }
    return join(this.dir, ref);
  }

  async write(fileId: string, text: string): Promise<string> {
    const ref = `${fileId}-${computeTextHash(text).slice(0, 16)}.txt`;
    await writeFileAtomic(this.resolve(ref), text);
    return ref;
  }

  /**
   * A missing cache entry means the ledger and the cache disagree, which the
   * run cannot repair on its own.
   */
  async read(ref: string): Promise<string> {
    const path = this.resolve(ref);
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw new LedgerError('Cached text is missing or unreadable', {
        ref,
        path,
        error: toError(error).message,
      });
    }
  }

  async remove(ref: string): Promise<void> {
    try {
      await unlink(this.resolve(ref));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }
  }
}
