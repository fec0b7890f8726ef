/**
 * Change ledger: compares a remote listing against the stored records and
 * applies the outcome of a sync run to them.
 *
 * `diffLedger` is a pure comparison. All mutation goes through
 * `applyLedgerChanges`, which is the single writer of `ledger.records`.
 */

import type { LedgerRecord, RemoteFile, SyncLedger } from '../types/index.js';

export type FileChange =
  | { kind: 'added'; file: RemoteFile; previous?: LedgerRecord }
  | { kind: 'modified'; file: RemoteFile; previous: LedgerRecord }
  | { kind: 'deleted'; previous: LedgerRecord }
  | { kind: 'unchanged'; file: RemoteFile; previous: LedgerRecord };

export type ChangeKind = FileChange['kind'];

export interface LedgerDiff {
  added: Extract<FileChange, { kind: 'added' }>[];
  modified: Extract<FileChange, { kind: 'modified' }>[];
  deleted: Extract<FileChange, { kind: 'deleted' }>[];
  unchanged: Extract<FileChange, { kind: 'unchanged' }>[];
}

/**
 * Result of processing one added or modified file
 */
export type ExtractionOutcome =
  | { status: 'extracted'; textRef: string; textHash: string }
  | { status: 'unsupported'; reason: string }
  | { status: 'failed'; error: Error };

export interface ApplySummary {
  added: number;
  modified: number;
  deleted: number;
  unsupported: number;
  failed: number;
  /** Unchanged files whose name or location was refreshed */
  moved: number;
  /** Cached texts no record points at any more; safe to remove once the ledger is saved */
  releasedTextRefs: string[];
}

export function createLedger(folderId: string, folderName: string, now: Date): SyncLedger {
  return {
    version: 1,
    folderId,
    folderName,
    createdAt: now.toISOString(),
    lastRunAt: null,
    records: {},
  };
}

/**
 * Classify every remote file and every stored record.
 *
 * A record marked deleted whose id shows up again is reported as added, so it
 * is rebuilt from scratch rather than revived.
 */
export function diffLedger(ledger: SyncLedger, listing: readonly RemoteFile[]): LedgerDiff {
  const diff: LedgerDiff = { added: [], modified: [], deleted: [], unchanged: [] };

  // Drive lists a file once per parent inside the tree; keep the smallest path
  const files = new Map<string, RemoteFile>();
  for (const file of listing) {
    const kept = files.get(file.id);
    if (!kept || compareCodeUnits(file.path, kept.path) < 0) {
      files.set(file.id, file);
    }
  }

  for (const file of files.values()) {
    const previous = ledger.records[file.id];

    if (!previous || previous.status === 'deleted') {
      diff.added.push({ kind: 'added', file, previous });
    } else if (
      previous.modifiedTime !== file.modifiedTime ||
      previous.fingerprint !== file.fingerprint
    ) {
      diff.modified.push({ kind: 'modified', file, previous });
    } else {
      diff.unchanged.push({ kind: 'unchanged', file, previous });
    }
  }

  for (const record of Object.values(ledger.records)) {
    if (record.status !== 'deleted' && !files.has(record.id)) {
      diff.deleted.push({ kind: 'deleted', previous: record });
    }
  }

  return diff;
}

function recordFromFile(
  file: RemoteFile,
  outcome: Exclude<ExtractionOutcome, { status: 'failed' }>,
  syncedAt: string
): LedgerRecord {
  const base = {
    id: file.id,
    name: file.name,
    path: file.path,
    mimeType: file.mimeType,
    modifiedTime: file.modifiedTime,
    fingerprint: file.fingerprint,
    syncedAt,
  };

  if (outcome.status === 'extracted') {
    return { ...base, status: 'active', textRef: outcome.textRef, textHash: outcome.textHash };
  }

  return { ...base, status: 'unsupported', unsupportedReason: outcome.reason };
}

/**
 * Write the result of a run into the ledger.
 *
 * Files with a `failed` outcome keep their previous record (or stay absent), so
 * the next diff picks them up again. Files without an outcome are treated the
 * same way.
 */
export function applyLedgerChanges(
  ledger: SyncLedger,
  diff: LedgerDiff,
  outcomes: ReadonlyMap<string, ExtractionOutcome>,
  now: Date
): ApplySummary {
  const timestamp = now.toISOString();
  const summary: ApplySummary = {
    added: 0,
    modified: 0,
    deleted: 0,
    unsupported: 0,
    failed: 0,
    moved: 0,
    releasedTextRefs: [],
  };

  for (const change of [...diff.added, ...diff.modified]) {
    const outcome = outcomes.get(change.file.id);

    if (!outcome || outcome.status === 'failed') {
      summary.failed++;
      continue;
    }

    const record = recordFromFile(change.file, outcome, timestamp);
    ledger.records[change.file.id] = record;

    const previousRef = change.previous?.textRef;
    if (previousRef && previousRef !== record.textRef) {
      summary.releasedTextRefs.push(previousRef);
    }

    if (change.kind === 'added') {
      summary.added++;
    } else {
      summary.modified++;
    }

    if (outcome.status === 'unsupported') {
      summary.unsupported++;
    }
  }

  for (const change of diff.deleted) {
    const record = ledger.records[change.previous.id];
    if (!record || record.status === 'deleted') continue;

    const { textRef, ...rest } = record;
    ledger.records[record.id] = { ...rest, status: 'deleted', deletedAt: timestamp };
    if (textRef) {
      summary.releasedTextRefs.push(textRef);
    }
    summary.deleted++;
  }

  for (const change of diff.unchanged) {
    const record = ledger.records[change.file.id];
    if (!record) continue;

    if (record.path !== change.file.path || record.name !== change.file.name) {
      ledger.records[record.id] = { ...record, name: change.file.name, path: change.file.path };
      summary.moved++;
    }
  }

  return summary;
}

/**
 * Sort key comparison by UTF-16 code unit, independent of the host locale
 */
function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Active records in merge order: by path, then id
 */
export function activeRecords(ledger: SyncLedger): LedgerRecord[] {
  return Object.values(ledger.records)
    .filter(record => record.status === 'active')
    .sort((a, b) => compareCodeUnits(a.path, b.path) || compareCodeUnits(a.id, b.id));
}

export function countByStatus(ledger: SyncLedger): Record<LedgerRecord['status'], number> {
  const counts = { active: 0, deleted: 0, unsupported: 0 };
  for (const record of Object.values(ledger.records)) {
    counts[record.status]++;
  }
  return counts;
}
