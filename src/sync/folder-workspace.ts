/**
 * Per-folder output layout, keyed by folder id so folders sharing a name
 * never share a directory:
 *
 *   <outputRoot>/<folder> (<folderId>)/<folder>_partN.md
 *   <outputRoot>/<folder> (<folderId>)/.data/ledger-<folderId>.json
 *   <outputRoot>/<folder> (<folderId>)/.data/texts/<fileId>-<digest>.txt
 *   <outputRoot>/<folder> (<folderId>)/.data/sync-history.json
 *   <outputRoot>/<folder> (<folderId>)/.data/sync.lock
 */

import { join } from 'node:path';
import type { ResolvedTarget } from '../drive/drive-client.js';
import { sanitizeFolderName } from '../drive/drive-url.js';
import { FileChunkWriter, type ChunkWriter } from '../merge/chunk-writer.js';
import { FileLedgerStore, type LedgerStore } from '../state/ledger-store.js';
import { RunStateManager } from '../state/run-state-manager.js';
import { FileTextCache, type TextCache } from '../state/text-cache.js';

export interface FolderWorkspace {
  outputDir: string;
  ledgerStore: LedgerStore;
  textCache: TextCache;
  runState: RunStateManager;
  chunkWriter: ChunkWriter;
}

export type WorkspaceFactory = (folder: ResolvedTarget) => FolderWorkspace;

export const DATA_DIR = '.data';

export function folderDirectoryName(folder: Pick<ResolvedTarget, 'id' | 'name'>): string {
  return `${sanitizeFolderName(folder.name)} (${folder.id})`;
}

export function createFileWorkspaceFactory(outputRoot: string): WorkspaceFactory {
  return folder => {
    const name = sanitizeFolderName(folder.name);
    const outputDir = join(outputRoot, folderDirectoryName(folder));
    const dataDir = join(outputDir, DATA_DIR);

    return {
      outputDir,
      ledgerStore: new FileLedgerStore(dataDir),
      textCache: new FileTextCache(join(dataDir, 'texts')),
      runState: new RunStateManager(dataDir),
      chunkWriter: new FileChunkWriter(outputDir, name),
    };
  };
}
