/**
 * Main sync orchestrator
 * Coordinates one run: list, diff, extract deltas, apply, merge, persist
 */

import type { RemoteFileSource, ResolvedTarget } from '../drive/drive-client.js';
import { parseDriveUrl } from '../drive/drive-url.js';
import {
  AuthError,
  ConfigError,
  ErrorCollector,
  ExtractionError,
  LedgerError,
  LockError,
  logError,
  toError,
} from '../errors/index.js';
import type { TextExtractor } from '../extract/text-extractor.js';
import {
  activeRecords,
  applyLedgerChanges,
  countByStatus,
  createLedger,
  diffLedger,
  type ApplySummary,
  type ExtractionOutcome,
  type FileChange,
  type LedgerDiff,
} from '../ledger/change-ledger.js';
import { computeTextHash } from '../ledger/hash.js';
import { renderDocumentSection } from '../merge/document-section.js';
import {
  DEFAULT_CHUNK_LIMITS,
  planChunks,
  type ChunkLimits,
  type PlanEntry,
} from '../merge/merge-planner.js';
import { MetricsCollector } from '../monitoring/metrics.js';
import type { SyncHistoryEntry } from '../state/run-state-manager.js';
import type { TextCache } from '../state/text-cache.js';
import type { LedgerRecord, MergedChunk, SyncLedger, SyncReport } from '../types/index.js';
import type { FolderWorkspace, WorkspaceFactory } from './folder-workspace.js';

export interface SyncConfig {
  limits: ChunkLimits;
}

export interface SyncOptions {
  metrics?: MetricsCollector;
  now?: () => Date;
}

type PendingChange = Extract<FileChange, { kind: 'added' | 'modified' }>;

interface CommittedRun {
  summary: ApplySummary;
  records: LedgerRecord[];
  chunks: MergedChunk[];
  chunkFiles: string[];
}

/**
 * Main sync orchestrator
 */
export class SyncOrchestrator {
  private metricsCollector: MetricsCollector;
  private now: () => Date;

  constructor(
    private source: RemoteFileSource,
    private extractor: TextExtractor,
    private workspaceFor: WorkspaceFactory,
    private config: SyncConfig = { limits: DEFAULT_CHUNK_LIMITS },
    options: SyncOptions = {}
  ) {
    this.metricsCollector = options.metrics ?? new MetricsCollector();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sync one Drive folder (or shared drive, or single file) into its output
   * directory. Per-file failures are reported; anything else aborts the run
   * before merged files or the ledger are written.
   */
  async run(folderUrl: string): Promise<SyncReport> {
    const target = parseDriveUrl(folderUrl);
    if (!target) {
      throw new ConfigError('Not a recognisable Google Drive URL or id', { url: folderUrl });
    }

    this.metricsCollector.start();

    try {
      const folder = await this.source.resolveTarget(target);
      const workspace = this.workspaceFor(folder);

      console.log(`Syncing "${folder.name}" into ${workspace.outputDir}`);

      if (!(await workspace.runState.acquireLock())) {
        throw new LockError('Another sync is already running for this folder', {
          outputDir: workspace.outputDir,
        });
      }

      try {
        return await this.syncFolder(folder, workspace);
      } finally {
        await workspace.runState.releaseLock();
      }
    } catch (error) {
      const err = toError(error);

      this.metricsCollector.recordError(err);
      this.metricsCollector.end(false);
      console.log(this.metricsCollector.getSummary());

      logError(err);
      throw err;
    }
  }

  private async syncFolder(folder: ResolvedTarget, workspace: FolderWorkspace): Promise<SyncReport> {
    const startTime = Date.now();
    const runTime = this.now();
    const errorCollector = new ErrorCollector();

    // 1. Load the ledger. A corrupt ledger throws here, before any write.
    const ledger =
      (await workspace.ledgerStore.load(folder.id)) ?? createLedger(folder.id, folder.name, runTime);
    ledger.folderName = folder.name;

    // 2. List and diff
    const listing = await this.source.listFiles(folder);
    const diff = diffLedger(ledger, listing);

    console.log(
      `Changes: ${diff.added.length} added, ${diff.modified.length} modified, ` +
        `${diff.deleted.length} deleted, ${diff.unchanged.length} unchanged`
    );

    const { summary, records, chunks, chunkFiles } = await this.extractAndCommit(
      ledger,
      diff,
      workspace,
      runTime,
      errorCollector
    );

    const counts = countByStatus(ledger);
    console.log(
      `Ledger saved: ${counts.active} active, ${counts.unsupported} unsupported, ${counts.deleted} deleted`
    );

    await this.discardTexts(workspace.textCache, summary.releasedTextRefs);

    const duration = Date.now() - startTime;
    const errors = errorCollector.getSummary().errors.map(e => e.message);

    this.metricsCollector.end(true);
    console.log(this.metricsCollector.getSummary());

    const historyEntry: SyncHistoryEntry = {
      timestamp: runTime.toISOString(),
      added: summary.added,
      modified: summary.modified,
      deleted: summary.deleted,
      unsupported: summary.unsupported,
      failed: summary.failed,
      chunkFiles: chunkFiles.length,
      duration,
      errors,
    };
    await workspace.runState.saveSyncHistory(historyEntry);

    return {
      folderId: folder.id,
      folderName: folder.name,
      outputDir: workspace.outputDir,
      added: summary.added,
      modified: summary.modified,
      deleted: summary.deleted,
      unchanged: diff.unchanged.length,
      unsupported: summary.unsupported,
      failed: summary.failed,
      activeDocuments: records.length,
      chunkFiles,
      totalBytes: chunks.reduce((sum, chunk) => sum + chunk.byteSize, 0),
      totalWords: chunks.reduce((sum, chunk) => sum + chunk.wordCount, 0),
      downloadedBytes: this.metricsCollector.getMetrics().downloadedBytes,
      duration,
      errors,
    };
  }

  /**
   * Extract deltas, apply them, write the merged files and save the ledger.
   *
   * Texts cached by this run are removed again if anything fails before the
   * ledger is saved, so the stored ledger never points at text it did not
   * record.
   */
  private async extractAndCommit(
    ledger: SyncLedger,
    diff: LedgerDiff,
    workspace: FolderWorkspace,
    runTime: Date,
    errorCollector: ErrorCollector
  ): Promise<CommittedRun> {
    const pendingTexts: string[] = [];

    try {
      // 3. Regenerate text for new and changed files only, one at a time
      const outcomes = new Map<string, ExtractionOutcome>();
      for (const change of [...diff.added, ...diff.modified]) {
        const outcome = await this.processFile(
          change,
          workspace.textCache,
          pendingTexts,
          errorCollector
        );
        outcomes.set(change.file.id, outcome);

        if (outcome.status === 'failed') {
          this.metricsCollector.recordFileProcessed('failed');
        } else {
          this.metricsCollector.recordFileProcessed(change.kind);
          if (outcome.status === 'unsupported') {
            this.metricsCollector.recordFileProcessed('unsupported');
          }
        }
      }

      for (const change of diff.deleted) {
        console.log(`Removed from Drive: ${change.previous.path}`);
        this.metricsCollector.recordFileProcessed('deleted');
      }

      // 4. Apply
      const summary = applyLedgerChanges(ledger, diff, outcomes, runTime);

      // 5. Render every active document and re-pack all of them
      const records = activeRecords(ledger);
      const sections = new Map<string, string>();
      const entries: PlanEntry[] = [];

      for (const [index, record] of records.entries()) {
        if (!record.textRef) {
          throw new LedgerError('Active record has no cached text', { fileId: record.id });
        }
        const text = await workspace.textCache.read(record.textRef);
        const section = renderDocumentSection(record, text, index + 1);
        sections.set(record.id, section);
        entries.push({ id: record.id, text: section });
      }

      const chunks = planChunks(entries, this.config.limits);
      const chunkFiles = await workspace.chunkWriter.writeChunks(chunks, sections);
      this.metricsCollector.recordChunksWritten(chunkFiles.length);

      // 6. Commit
      ledger.lastRunAt = runTime.toISOString();
      await workspace.ledgerStore.save(ledger);

      return { summary, records, chunks, chunkFiles };
    } catch (error) {
      await this.discardTexts(workspace.textCache, pendingTexts);
      throw error;
    }
  }

  private async discardTexts(textCache: TextCache, refs: readonly string[]): Promise<void> {
    for (const ref of refs) {
      await textCache.remove(ref).catch(error => {
        console.warn(`Could not remove cached text ${ref}`, { error: toError(error).message });
      });
    }
  }

  /**
   * Download, extract and cache one file.
   *
   * Parse failures mark the file unsupported. Transient fetch failures leave
   * it for the next run. Auth and local storage failures abort the run.
   */
  private async processFile(
    change: PendingChange,
    textCache: TextCache,
    pendingTexts: string[],
    errorCollector: ErrorCollector
  ): Promise<ExtractionOutcome> {
    const file = change.file;

    if (!this.extractor.supports(file.mimeType)) {
      console.log(`Skipping unsupported file: ${file.path} (${file.mimeType})`);
      return { status: 'unsupported', reason: `Unsupported file type: ${file.mimeType}` };
    }

    console.log(`Processing file: ${file.path} (${file.id})`);

    let text: string;
    try {
      const download = await this.source.downloadFile(file);
      this.metricsCollector.recordDownloadedBytes(download.data.length);
      text = await this.extractor.extract(file, download);
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }

      const err = toError(error);
      if (err instanceof ExtractionError) {
        console.warn(`Could not extract text from ${file.path}: ${err.message}`);
        return { status: 'unsupported', reason: err.message };
      }

      errorCollector.addError(err, { fileId: file.id, path: file.path });
      this.metricsCollector.recordError(err, { fileId: file.id });
      logError(err, { fileId: file.id });
      return { status: 'failed', error: err };
    }

    const textHash = computeTextHash(text);
    if (change.kind === 'modified' && change.previous.textHash === textHash) {
      console.log(`Metadata changed but text is identical: ${file.path}`);
    }

    const textRef = await textCache.write(file.id, text);
    if (textRef !== change.previous?.textRef) {
      pendingTexts.push(textRef);
    }
    return { status: 'extracted', textRef, textHash };
  }
}
