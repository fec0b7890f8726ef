/**
 * Packs document texts into size-bounded merged chunks
 */

import type { MergedChunk } from '../types/index.js';

export interface ChunkLimits {
  maxBytes: number;
  maxWords: number;
}

export const DEFAULT_CHUNK_LIMITS: ChunkLimits = {
  maxBytes: 200 * 1024 * 1024,
  maxWords: 450_000,
};

/**
 * Text that goes into a chunk, keyed by the ledger record it came from
 */
export interface PlanEntry {
  id: string;
  text: string;
}

/**
 * Count whitespace-separated words without allocating a split array
 */
export function countWords(text: string): number {
  let words = 0;
  let inWord = false;

  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    // space, \t, \n, \v, \f, \r, NBSP, and the U+2000 block of typographic spaces
    const isSpace =
      code === 0x20 ||
      (code >= 0x09 && code <= 0x0d) ||
      code === 0xa0 ||
      code === 0x1680 ||
      (code >= 0x2000 && code <= 0x200a) ||
      code === 0x2028 ||
      code === 0x2029 ||
      code === 0x202f ||
      code === 0x205f ||
      code === 0x3000 ||
      code === 0xfeff;

    if (isSpace) {
      inWord = false;
    } else if (!inWord) {
      words++;
      inWord = true;
    }
  }

  return words;
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function validateLimits(limits: ChunkLimits): void {
  if (!Number.isFinite(limits.maxBytes) || limits.maxBytes <= 0) {
    throw new Error('maxBytes must be positive');
  }

  if (!Number.isFinite(limits.maxWords) || limits.maxWords <= 0) {
    throw new Error('maxWords must be positive');
  }
}

/**
 * Greedily pack entries, in the order given, into chunks.
 *
 * A chunk is closed before an entry that would push it past either limit.
 * Entries are never split: one that exceeds a limit on its own fills a chunk
 * by itself. No entries means no chunks.
 */
export function planChunks(
  entries: readonly PlanEntry[],
  limits: ChunkLimits = DEFAULT_CHUNK_LIMITS
): MergedChunk[] {
  validateLimits(limits);

  const chunks: MergedChunk[] = [];
  let open: MergedChunk | null = null;

  for (const entry of entries) {
    const bytes = byteLength(entry.text);
    const words = countWords(entry.text);

    if (
      open &&
      (open.byteSize + bytes > limits.maxBytes || open.wordCount + words > limits.maxWords)
    ) {
      chunks.push(open);
      open = null;
    }

    if (!open) {
      open = { sequenceIndex: chunks.length, byteSize: 0, wordCount: 0, memberIds: [] };
    }

    open.memberIds.push(entry.id);
    open.byteSize += bytes;
    open.wordCount += words;
  }

  if (open) {
    chunks.push(open);
  }

  return chunks;
}
