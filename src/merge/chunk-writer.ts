/**
 * Writes merged chunks as numbered files in a folder's output directory
 */

import { readdir, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { MergedChunk } from '../types/index.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

export interface ChunkWriter {
  /**
   * Write every chunk and remove part files left over from a previous run
   * that produced more chunks. Returns the written paths in order.
   */
  writeChunks(chunks: readonly MergedChunk[], sections: ReadonlyMap<string, string>): Promise<string[]>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class FileChunkWriter implements ChunkWriter {
  private readonly partPattern: RegExp;

  constructor(
    private readonly outputDir: string,
    private readonly prefix: string
  ) {
    this.partPattern = new RegExp(`^${escapeRegExp(prefix)}_part(\\d+)\\.md$`);
  }

  /**
   * 1-based file name for a 0-based chunk index
   */
  fileName(sequenceIndex: number): string {
    return `${this.prefix}_part${sequenceIndex + 1}.md`;
  }

  async writeChunks(
    chunks: readonly MergedChunk[],
    sections: ReadonlyMap<string, string>
  ): Promise<string[]> {
    const written: string[] = [];

    for (const chunk of chunks) {
      const parts = chunk.memberIds.map(id => {
        const section = sections.get(id);
        if (section === undefined) {
          throw new Error(`No rendered text for chunk member ${id}`);
        }
        return section;
      });

      const path = join(this.outputDir, this.fileName(chunk.sequenceIndex));
      await writeFileAtomic(path, parts.join(''));
      written.push(path);
    }

    await this.removeStaleParts(chunks.length);

    console.log(`Wrote ${written.length} merged file(s) to ${this.outputDir}`);
    return written;
  }

  private async removeStaleParts(keep: number): Promise<void> {
    const entries = await readdir(this.outputDir).catch((error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') return [];
      throw error;
    });

    for (const entry of entries) {
      const match = entry.match(this.partPattern);
      if (match && parseInt(match[1], 10) > keep) {
        await unlink(join(this.outputDir, entry));
        console.log(`Removed stale merged file: ${entry}`);
      }
    }
  }
}
